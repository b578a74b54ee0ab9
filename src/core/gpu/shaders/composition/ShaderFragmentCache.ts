import path from 'path';
import type { CachedFragment } from './types';
import type { DefineSet } from './DefineSet';
import type { ShaderIO } from './ShaderIO';
import type { ShaderReference } from './ShaderReference';
import { ShaderRef, parentDirectory, referenceKey } from './ShaderReference';
import type { ShaderModuleRegistry } from './ShaderModuleRegistry';
import { ShaderPreprocessor } from './ShaderPreprocessor';
import { ShaderError } from './errors';

interface FragmentEntry {
  reference: ShaderReference;
  fragment: CachedFragment;
  /** IO modification stamp at parse time (path references only) */
  modified?: number;
}

export interface ShaderFragmentCacheOptions {
  io: ShaderIO;
  registry: ShaderModuleRegistry;
  preprocessor?: ShaderPreprocessor;
}

/**
 * Caches parsed fragments by (reference, define set).
 * A hit never re-reads or re-parses and returns the same object.
 */
export class ShaderFragmentCache {
  private cache = new Map<string, FragmentEntry>();
  private io: ShaderIO;
  private registry: ShaderModuleRegistry;
  private preprocessor: ShaderPreprocessor;
  private parses = 0;
  private unsubscribe: () => void;

  constructor(options: ShaderFragmentCacheOptions) {
    this.io = options.io;
    this.registry = options.registry;
    this.preprocessor = options.preprocessor ?? new ShaderPreprocessor();
    this.unsubscribe = this.registry.onReplace((name) => {
      this.invalidate(ShaderRef.module(name));
    });
  }

  /**
   * Get a cached fragment or load and parse it.
   */
  getOrParse(ref: ShaderReference, defines: DefineSet): CachedFragment {
    const key = `${referenceKey(ref)}|${defines.key}`;

    const cached = this.cache.get(key);
    if (cached) return cached.fragment;

    const source = this.load(ref);
    const modified = ref.kind === 'path' ? this.io.lastModified?.(ref.path) : undefined;
    const fragment = this.preprocessor.parse(source, parentDirectory(ref), defines);
    this.parses++;

    this.cache.set(key, { reference: ref, fragment, modified });
    return fragment;
  }

  /**
   * Drop every variant of one reference, or everything.
   *
   * @returns Number of fragments removed
   */
  invalidate(ref?: ShaderReference): number {
    if (!ref) {
      const count = this.cache.size;
      this.cache.clear();
      return count;
    }

    const refKey = referenceKey(ref);
    return this.removeWhere((entry) => referenceKey(entry.reference) === refKey);
  }

  /**
   * Drop fragments read from a file path (relative to the IO root or absolute).
   *
   * @returns Number of fragments removed
   */
  invalidatePath(filePath: string): number {
    const target = this.resolvePath(filePath);
    return this.removeWhere(
      (entry) => entry.reference.kind === 'path' && this.resolvePath(entry.reference.path) === target,
    );
  }

  /**
   * Poll the IO collaborator for modified files and drop their fragments.
   *
   * @returns Paths whose fragments were dropped
   */
  checkForChanges(): string[] {
    const changed = new Set<string>();

    for (const entry of this.cache.values()) {
      if (entry.reference.kind !== 'path') continue;
      const modified = this.io.lastModified?.(entry.reference.path);
      if (modified !== entry.modified) {
        changed.add(entry.reference.path);
      }
    }

    for (const filePath of changed) {
      this.invalidatePath(filePath);
    }

    return Array.from(changed);
  }

  /**
   * Get cache statistics.
   */
  getStats(): { totalFragments: number; parses: number; keys: string[] } {
    return {
      totalFragments: this.cache.size,
      parses: this.parses,
      keys: Array.from(this.cache.keys()),
    };
  }

  /**
   * Drop every fragment and stop following registry replacements
   */
  destroy(): void {
    this.unsubscribe();
    this.cache.clear();
  }

  private load(ref: ShaderReference): string {
    if (ref.kind !== 'path') {
      return this.registry.load(ref);
    }

    try {
      return this.io.read(ref.path);
    } catch (err) {
      throw ShaderError.io(ref.path, err);
    }
  }

  /**
   * Canonical form of a path, as used to match watcher events against cached references
   */
  resolvePath(filePath: string): string {
    if (this.io.resolve) return this.io.resolve(filePath);
    return path.posix.normalize(filePath.replace(/\\/g, '/'));
  }

  private removeWhere(predicate: (entry: FragmentEntry) => boolean): number {
    let removed = 0;
    for (const [key, entry] of this.cache) {
      if (predicate(entry)) {
        this.cache.delete(key);
        removed++;
      }
    }
    return removed;
  }
}
