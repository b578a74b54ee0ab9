import { foldHashes64, hashString64 } from '../../../utils/hash';

function compareHashes(a: bigint, b: bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Active conditional-compilation flags for one shader variant.
 *
 * Flags are stored as sorted, deduplicated 64-bit hashes, so two sets built
 * from the same names in any order (with or without repeats) are equal and
 * share one combined hash.
 */
export class DefineSet {
  static readonly EMPTY = new DefineSet([]);

  private readonly _hashes: readonly bigint[];
  private readonly _members: ReadonlySet<bigint>;
  private readonly _hash: bigint;

  private constructor(hashes: Iterable<bigint>) {
    const unique = new Set(hashes);
    this._hashes = Array.from(unique).sort(compareHashes);
    this._members = unique;
    this._hash = foldHashes64(this._hashes);
  }

  static of(...names: string[]): DefineSet {
    return DefineSet.from(names);
  }

  static from(names: Iterable<string>): DefineSet {
    const hashes = Array.from(names, hashString64);
    return hashes.length === 0 ? DefineSet.EMPTY : new DefineSet(hashes);
  }

  /** Combined order-independent hash */
  get hash(): bigint {
    return this._hash;
  }

  /** Number of distinct flags */
  get size(): number {
    return this._hashes.length;
  }

  /** Hex form used inside composition keys */
  get key(): string {
    return this._hash.toString(16).padStart(16, '0');
  }

  has(name: string): boolean {
    return this._members.has(hashString64(name));
  }

  /**
   * New set with additional flags
   */
  with(...names: string[]): DefineSet {
    return new DefineSet([...this._hashes, ...names.map(hashString64)]);
  }

  equals(other: DefineSet): boolean {
    if (this._hashes.length !== other._hashes.length) return false;
    return this._hashes.every((hash, i) => hash === other._hashes[i]);
  }
}
