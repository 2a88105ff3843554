import { InvalidPublicKeyError } from "./domain-error";

const Z_BASE_32_ALPHABET = "ybndrfg8ejkmcpqxot1uwisza345h769";
/** 32 bytes of ed25519 key, 5 bits per character, rounded up. */
const ENCODED_LENGTH = 52;
/** 52 * 5 = 260 bits: the low 4 bits of the last character are padding. */
const PADDING_MASK = 0b01111;

const Z_BASE_32_PATTERN = new RegExp(`^[${Z_BASE_32_ALPHABET}]+$`);

/**
 * Immutable Value Object identifying a participant of the storage network.
 * Holds the canonical lowercase z-base-32 form of an ed25519 public key.
 *
 * @example
 * ```ts
 * const payee = PublicKey.parse(input);
 * payee.equals(PublicKey.parse(input.toUpperCase())); // true
 * `${payee}` === payee.z32; // true
 * ```
 */
export class PublicKey {
  readonly z32: string;

  private constructor(z32: string) {
    this.z32 = z32;
  }

  /**
   * @throws InvalidPublicKeyError if the text is not a 52-character z-base-32
   * string, or its last character sets padding bits.
   */
  static parse(text: string): PublicKey {
    if (typeof text !== "string") {
      throw new InvalidPublicKeyError(String(text), "expected a string");
    }

    const normalized = text.trim().toLowerCase();

    if (normalized.length !== ENCODED_LENGTH) {
      throw new InvalidPublicKeyError(
        text,
        `expected ${ENCODED_LENGTH} characters, got ${normalized.length}`,
      );
    }

    if (!Z_BASE_32_PATTERN.test(normalized)) {
      throw new InvalidPublicKeyError(text, "not z-base-32 encoded");
    }

    const last = Z_BASE_32_ALPHABET.indexOf(
      normalized.charAt(ENCODED_LENGTH - 1),
    );
    if ((last & PADDING_MASK) !== 0) {
      throw new InvalidPublicKeyError(text, "non-zero padding bits");
    }

    return new PublicKey(normalized);
  }

  /** Non-throwing variant of `parse`. */
  static tryParse(text: string): PublicKey | undefined {
    try {
      return PublicKey.parse(text);
    } catch (err) {
      if (err instanceof InvalidPublicKeyError) return undefined;
      throw err;
    }
  }

  /** Accepts either an already parsed key or its string form. */
  static from(value: PublicKey | string): PublicKey {
    return value instanceof PublicKey ? value : PublicKey.parse(value);
  }

  equals(other: PublicKey): boolean {
    return this.z32 === other.z32;
  }

  toString(): string {
    return this.z32;
  }

  toJSON(): string {
    return this.z32;
  }
}
