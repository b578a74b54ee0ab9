import { asBytes, hashBytes64, hashU64 } from '../../utils/hash';

/**
 * 64-bit content identity of a bound resource.
 * Equal keys mean the bind group built for the previous value is still valid.
 */
export type BindKey = bigint;

/** Resource left to its default (placeholder texture, fallback sampler) */
const ZERO: BindKey = 0n;

export const BindKey = {
  ZERO,

  /** Key of a serialized payload */
  fromBytes(data: ArrayBuffer | ArrayBufferView): BindKey {
    return hashBytes64(asBytes(data));
  },

  /** Key of an opaque GPU resource identity */
  fromId(id: number): BindKey {
    return hashU64(BigInt(id));
  },

  combine(...keys: BindKey[]): BindKey {
    let combined = 0n;
    for (const key of keys) combined ^= key;
    return combined;
  },

  toString(key: BindKey): string {
    return key.toString(16).padStart(16, '0');
  },
} as const;
