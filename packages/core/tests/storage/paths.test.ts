import { describe, expect, it } from "vitest";
import {
  addressPath,
  contactAddress,
  contactPath,
  contactsListAddress,
  isDirectoryPath,
  ownerRoot,
  paymentEndpointAddress,
  paymentEndpointPath,
  paymentListAddress,
  trailingSegment,
} from "../../src";
import { keyText, testKey } from "../helpers";

const payee = testKey("p");
const contact = testKey("c");

describe("payment endpoint addressing", () => {
  it("should root addresses at the owner's pubky URL", () => {
    expect(ownerRoot(payee)).toBe(`pubky://${keyText("p")}`);
  });

  it("should place each method under the v0 prefix", () => {
    expect(paymentEndpointPath("lightning")).toBe(
      "/pub/paykit.app/v0/lightning",
    );
    expect(paymentEndpointAddress(payee, "lightning")).toBe(
      `pubky://${keyText("p")}/pub/paykit.app/v0/lightning`,
    );
  });

  it("should list the parent directory of the endpoints", () => {
    expect(paymentListAddress(payee)).toBe(
      `pubky://${keyText("p")}/pub/paykit.app/v0/`,
    );
  });
});

describe("contacts addressing", () => {
  it("should place one marker per contact under follows", () => {
    expect(contactPath(contact)).toBe(`/pub/pubky.app/follows/${keyText("c")}`);
    expect(contactAddress(payee, contact)).toBe(
      `pubky://${keyText("p")}/pub/pubky.app/follows/${keyText("c")}`,
    );
  });

  it("should list the follows directory", () => {
    expect(contactsListAddress(payee)).toBe(
      `pubky://${keyText("p")}/pub/pubky.app/follows/`,
    );
  });
});

describe("path helpers", () => {
  it("should detect pseudo-directories", () => {
    expect(isDirectoryPath("/pub/paykit.app/v0/nested/")).toBe(true);
    expect(isDirectoryPath("/pub/paykit.app/v0/lightning")).toBe(false);
  });

  it("should extract the trailing segment", () => {
    expect(trailingSegment("/pub/paykit.app/v0/lightning")).toBe("lightning");
    expect(trailingSegment("onchain")).toBe("onchain");
  });

  it("should return undefined for an empty trailing segment", () => {
    expect(trailingSegment("/pub/paykit.app/v0/")).toBeUndefined();
    expect(trailingSegment("")).toBeUndefined();
  });
});

describe("addressPath", () => {
  it("should return the path of a pubky address", () => {
    expect(addressPath(`pubky://${keyText("p")}/pub/paykit.app/v0/lightning`)).toBe(
      "/pub/paykit.app/v0/lightning",
    );
  });

  it("should keep the trailing slash of a directory", () => {
    expect(addressPath(`pubky://${keyText("p")}/pub/pubky.app/follows/`)).toBe(
      "/pub/pubky.app/follows/",
    );
  });

  it("should return the root path when there is none", () => {
    expect(addressPath(`pubky://${keyText("p")}`)).toBe("/");
  });
});
