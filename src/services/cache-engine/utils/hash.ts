/**
 * Non-cryptographic hashing for cache keys
 * @module services/cache-engine/utils/hash
 *
 * FNV-1a 64-bit over the UTF-8 bytes of the input. Stable across
 * processes and restarts (no seed).
 */

const FNV_OFFSET_BASIS_64 = 0xcbf29ce484222325n;
const FNV_PRIME_64 = 0x100000001b3n;
const MASK_64 = 0xffffffffffffffffn;

const encoder = new TextEncoder();

export function fnv1a64(input: string): bigint {
  let hash = FNV_OFFSET_BASIS_64;

  for (const byte of encoder.encode(input)) {
    hash ^= BigInt(byte);
    hash = (hash * FNV_PRIME_64) & MASK_64;
  }

  return hash;
}

export function toBase36(value: bigint): string {
  return value.toString(36);
}

/**
 * 64-bit hash of the input encoded in base 36 (at most 13 characters)
 */
export function hashToBase36(input: string): string {
  return toBase36(fnv1a64(input));
}
