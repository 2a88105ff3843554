import { PublicKey } from "../src";

/**
 * Canonical 52-character z-base-32 key: one repeated alphabet character,
 * closed by "y" so the padding bits stay zero.
 */
export function keyText(char: string): string {
  return `${char.repeat(51)}y`;
}

export function testKey(char: string): PublicKey {
  return PublicKey.parse(keyText(char));
}

export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}
