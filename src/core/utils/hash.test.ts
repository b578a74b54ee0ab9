import { describe, it, expect } from 'vitest';
import { asBytes, foldHashes64, hashBytes64, hashString64, hashU64 } from './hash';

describe('hash', () => {
  describe('hashString64', () => {
    it('should apply hash * 31 + code per character', () => {
      expect(hashString64('')).toBe(0n);
      expect(hashString64('A')).toBe(65n);
      expect(hashString64('AB')).toBe(65n * 31n + 66n);
    });

    it('should wrap at 64 bits', () => {
      const hash = hashString64('A_VERY_LONG_DEFINE_NAME_THAT_OVERFLOWS');
      expect(hash).toBeGreaterThanOrEqual(0n);
      expect(hash).toBeLessThan(1n << 64n);
    });
  });

  describe('foldHashes64', () => {
    it('should fold values with the string recurrence', () => {
      expect(foldHashes64([])).toBe(0n);
      expect(foldHashes64([65n, 66n])).toBe(hashString64('AB'));
    });
  });

  describe('hashBytes64', () => {
    it('should return the FNV-1a offset basis for no input', () => {
      expect(hashBytes64(new Uint8Array(0))).toBe(0xcbf29ce484222325n);
    });

    it('should match the FNV-1a reference value for "a"', () => {
      expect(hashBytes64(new Uint8Array([0x61]))).toBe(0xaf63dc4c8601ec8cn);
    });
  });

  describe('hashU64', () => {
    it('should hash the eight little-endian bytes of the value', () => {
      expect(hashU64(1n)).toBe(hashBytes64(new Uint8Array([1, 0, 0, 0, 0, 0, 0, 0])));
      expect(hashU64(1n)).not.toBe(hashU64(2n));
    });
  });

  describe('asBytes', () => {
    it('should view a typed array slice without copying', () => {
      const data = new Uint8Array([1, 2, 3, 4]);
      const view = asBytes(data.subarray(1, 3));
      expect(Array.from(view)).toEqual([2, 3]);
      expect(view.buffer).toBe(data.buffer);
    });
  });
});
