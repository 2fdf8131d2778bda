// FNV-1a (64-bit) hashing of UTF-8 names

export const FNV_OFFSET_BASIS_64 = 0xcbf29ce484222325n;
export const FNV_PRIME_64 = 0x100000001b3n;

const MASK_64 = 0xffffffffffffffffn;

const encoder = new TextEncoder();

/**
 * Hash a string with 64-bit FNV-1a over its UTF-8 bytes.
 */
export function fnv1a64(input: string): bigint {
  let hash = FNV_OFFSET_BASIS_64;
  for (const byte of encoder.encode(input)) {
    hash ^= BigInt(byte);
    hash = (hash * FNV_PRIME_64) & MASK_64;
  }
  return hash;
}
