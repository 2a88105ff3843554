import { describe, expect, it } from "vitest";
import {
  InvalidMethodIdError,
  InvalidPublicKeyError,
  PaykitError,
  StorageRequestError,
  TransportError,
  UnimplementedError,
} from "../../src";

describe("PaykitError codes", () => {
  it('TransportError should have code "transport"', () => {
    const error = new TransportError("boom");
    expect(error.code).toBe("transport");
    expect(error.message).toBe("boom");
  });

  it('UnimplementedError should have code "unimplemented" and name its label', () => {
    const error = new UnimplementedError("fetch_known_contacts");
    expect(error.code).toBe("unimplemented");
    expect(error.message).toBe("fetch_known_contacts is not implemented yet");
  });

  it('InvalidMethodIdError should have code "invalid_method_id"', () => {
    const error = new InvalidMethodIdError("a/b");
    expect(error.code).toBe("invalid_method_id");
  });

  it('InvalidPublicKeyError should have code "invalid_public_key"', () => {
    const error = new InvalidPublicKeyError("nope", "too short");
    expect(error.code).toBe("invalid_public_key");
    expect(error.message).toBe('Invalid public key "nope": too short');
  });

  it("StorageRequestError should carry the status", () => {
    const error = new StorageRequestError("Not found", 404);
    expect(error.code).toBe("storage_request_failed");
    expect(error.status).toBe(404);
  });

  it("should preserve cause via ErrorOptions", () => {
    const original = new Error("socket hang up");
    const error = new TransportError("list failed", { cause: original });
    expect(error.cause).toBe(original);
  });

  it("All PaykitError subclasses should set name to constructor name", () => {
    const errors: PaykitError[] = [
      new TransportError("test"),
      new UnimplementedError("test"),
      new InvalidMethodIdError("test"),
      new InvalidPublicKeyError("test", "reason"),
      new StorageRequestError("test"),
    ];

    for (const error of errors) {
      expect(error.name).toBe(error.constructor.name);
      expect(error).toBeInstanceOf(PaykitError);
      expect(error).toBeInstanceOf(Error);
    }
  });
});
