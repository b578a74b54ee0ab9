/**
 * 64-bit hashing helpers. Values are `bigint` wrapped to 64 bits.
 */

const MASK_64 = (1n << 64n) - 1n;

const FNV_OFFSET_64 = 0xcbf29ce484222325n;
const FNV_PRIME_64 = 0x100000001b3n;

/**
 * Polynomial string hash: `hash = hash * 31 + code`, wrapping at 2^64.
 * Cheap and stable across runs; used for shader define names.
 */
export function hashString64(value: string): bigint {
  let hash = 0n;
  for (let i = 0; i < value.length; i++) {
    hash = (hash * 31n + BigInt(value.charCodeAt(i))) & MASK_64;
  }
  return hash;
}

/**
 * Fold a sequence of 64-bit values with the same recurrence as hashString64.
 */
export function foldHashes64(values: Iterable<bigint>): bigint {
  let hash = 0n;
  for (const value of values) {
    hash = (hash * 31n + value) & MASK_64;
  }
  return hash;
}

/**
 * FNV-1a over raw bytes.
 */
export function hashBytes64(bytes: Uint8Array): bigint {
  let hash = FNV_OFFSET_64;
  for (let i = 0; i < bytes.length; i++) {
    hash ^= BigInt(bytes[i]);
    hash = (hash * FNV_PRIME_64) & MASK_64;
  }
  return hash;
}

/**
 * FNV-1a over the eight little-endian bytes of a 64-bit integer.
 */
export function hashU64(value: bigint): bigint {
  let hash = FNV_OFFSET_64;
  let rest = value & MASK_64;
  for (let i = 0; i < 8; i++) {
    hash ^= rest & 0xffn;
    hash = (hash * FNV_PRIME_64) & MASK_64;
    rest >>= 8n;
  }
  return hash;
}

/**
 * View any buffer-like value as bytes without copying.
 */
export function asBytes(data: ArrayBuffer | ArrayBufferView): Uint8Array {
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}
