import { describe, expect, it } from "vitest";
import { validateConfig } from "../../src/config/schema";
import { ConfigurationError } from "../../src/errors/configuration-error";

const SESSION_KEY = `${"s".repeat(51)}y`;

describe("Config Validation", () => {
  describe("valid configs", () => {
    it("applies defaults to an empty config", () => {
      const result = validateConfig({});
      expect(result).toEqual({
        testnet: false,
        logLevel: "warn",
        fetchConcurrency: 1,
      });
    });

    it("accepts testnet", () => {
      const result = validateConfig({ testnet: true });
      expect(result.testnet).toBe(true);
    });

    it('accepts logLevel "silent"', () => {
      const result = validateConfig({ logLevel: "silent" });
      expect(result.logLevel).toBe("silent");
    });

    it("accepts a fetchConcurrency within bounds", () => {
      expect(validateConfig({ fetchConcurrency: 8 }).fetchConcurrency).toBe(8);
      expect(validateConfig({ fetchConcurrency: 32 }).fetchConcurrency).toBe(
        32,
      );
    });

    it("accepts a z-base-32 sessionPublicKey", () => {
      const result = validateConfig({ sessionPublicKey: SESSION_KEY });
      expect(result.sessionPublicKey).toBe(SESSION_KEY);
    });
  });

  describe("invalid configs", () => {
    it("rejects an unknown logLevel", () => {
      expect(() => validateConfig({ logLevel: "verbose" })).toThrow(
        ConfigurationError,
      );
    });

    it("rejects a zero fetchConcurrency", () => {
      expect(() => validateConfig({ fetchConcurrency: 0 })).toThrow(
        ConfigurationError,
      );
    });

    it("rejects a fractional fetchConcurrency", () => {
      expect(() => validateConfig({ fetchConcurrency: 1.5 })).toThrow(
        ConfigurationError,
      );
    });

    it("rejects a fetchConcurrency above 32", () => {
      expect(() => validateConfig({ fetchConcurrency: 33 })).toThrow(
        ConfigurationError,
      );
    });

    it("rejects a malformed sessionPublicKey with the field path", () => {
      try {
        validateConfig({ sessionPublicKey: "not-a-key" });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigurationError);
        expect((err as ConfigurationError).code).toBe("invalid_config");
        expect((err as ConfigurationError).message).toBe(
          "Invalid Paykit configuration:\n  - sessionPublicKey: Must be a 52-character z-base-32 public key",
        );
      }
    });

    it("rejects a non-object config", () => {
      expect(() => validateConfig("testnet")).toThrow(
        "Invalid Paykit configuration:",
      );
    });
  });
});
