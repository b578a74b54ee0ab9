import type { ShaderCompiler } from './types';
import type { ShaderIO } from './ShaderIO';
import type { ShaderReference } from './ShaderReference';
import { DefineSet } from './DefineSet';
import { FileShaderIO } from './ShaderIO';
import { Shader } from './Shader';
import { ShaderComposer } from './ShaderComposer';
import { WgslShaderCompiler } from './ShaderCompiler';
import { ShaderFragmentCache } from './ShaderFragmentCache';
import { ShaderModuleRegistry } from './ShaderModuleRegistry';
import { ShaderRef, describeReference, referenceKey } from './ShaderReference';

export interface ShaderVariantCacheOptions {
  /** Reads `path` references. Defaults to FileShaderIO rooted at `shaderRoot` */
  io?: ShaderIO;
  /** Directory for the default FileShaderIO (default: cwd) */
  shaderRoot?: string;
  /** Named modules for `#include <name>` */
  registry?: ShaderModuleRegistry;
  /** Register the built-in `core/` modules (default: true) */
  defaultModules?: boolean;
  /** Validator and reflector. Defaults to WgslShaderCompiler */
  compiler?: ShaderCompiler;
  /** Log compositions and invalidations */
  verbose?: boolean;
}

/**
 * Caches composed, validated shaders by (reference, define set).
 *
 * Variants are created lazily on first use and cached until invalidated.
 * Failures are not cached: a failed request is retried in full next time.
 */
export class ShaderVariantCache {
  private cache = new Map<string, Shader>();
  private _registry: ShaderModuleRegistry;
  private _fragments: ShaderFragmentCache;
  private composer: ShaderComposer;
  private compiler: ShaderCompiler;
  private verbose: boolean;
  private unsubscribe: () => void;

  constructor(options: ShaderVariantCacheOptions = {}) {
    this.verbose = options.verbose ?? false;

    this._registry = options.registry ?? new ShaderModuleRegistry();
    if (options.defaultModules ?? true) {
      this._registry.registerDefaults();
    }

    this._fragments = new ShaderFragmentCache({
      io: options.io ?? new FileShaderIO(options.shaderRoot),
      registry: this._registry,
    });
    this.composer = new ShaderComposer(this._fragments, { verbose: this.verbose });
    this.compiler = options.compiler ?? new WgslShaderCompiler();
    this.unsubscribe = this._registry.onReplace((name) => {
      this.invalidate(ShaderRef.module(name));
    });
  }

  /**
   * Cache key of a variant: `<reference key>|<define hash>`
   */
  static keyOf(ref: ShaderReference, defines: DefineSet): string {
    return `${referenceKey(ref)}|${defines.key}`;
  }

  /**
   * Get a cached shader or compose + validate a new one.
   *
   * @returns The identical Shader object for repeated requests
   */
  getOrCreate(ref: ShaderReference, defines: DefineSet = DefineSet.EMPTY): Shader {
    const key = ShaderVariantCache.keyOf(ref, defines);

    const cached = this.cache.get(key);
    if (cached) return cached;

    const composed = this.composer.compose(ref, defines);
    const reflection = this.compiler.compile(composed.source, composed.language, key);

    const shader = new Shader({
      key,
      reference: ref,
      defines,
      source: composed.source,
      language: composed.language,
      bindings: reflection.bindings,
      includes: composed.includes,
    });

    this.cache.set(key, shader);
    return shader;
  }

  /**
   * Check if a variant is already cached.
   */
  has(ref: ShaderReference, defines: DefineSet = DefineSet.EMPTY): boolean {
    return this.cache.has(ShaderVariantCache.keyOf(ref, defines));
  }

  /**
   * Invalidate every variant that includes a reference, or all variants.
   *
   * @param ref - If provided, drop only shaders built from this reference. Otherwise drop all.
   */
  invalidate(ref?: ShaderReference): void {
    if (!ref) {
      this.cache.clear();
      this._fragments.invalidate();
      return;
    }

    this._fragments.invalidate(ref);
    const removed = this.removeWhere((shader) => shader.includesReference(ref));
    this.log(`Invalidated ${removed} variant(s) of ${describeReference(ref)}`);
  }

  /**
   * Invalidate fragments and shaders that read a file.
   *
   * @returns Number of shaders removed
   */
  invalidatePath(filePath: string): number {
    const target = this._fragments.resolvePath(filePath);
    this._fragments.invalidatePath(filePath);

    const removed = this.removeWhere((shader) =>
      shader.includes.some(
        (ref) => ref.kind === 'path' && this._fragments.resolvePath(ref.path) === target,
      ),
    );
    this.log(`Invalidated ${removed} variant(s) reading ${filePath}`);
    return removed;
  }

  /**
   * Poll shader files for modification and invalidate what changed.
   *
   * @returns Changed paths
   */
  checkForChanges(): string[] {
    const changed = this._fragments.checkForChanges();
    for (const filePath of changed) {
      this.invalidatePath(filePath);
    }
    return changed;
  }

  /**
   * Get cache statistics.
   */
  getStats(): { totalVariants: number; totalFragments: number; keys: string[] } {
    return {
      totalVariants: this.cache.size,
      totalFragments: this._fragments.getStats().totalFragments,
      keys: Array.from(this.cache.keys()),
    };
  }

  get registry(): ShaderModuleRegistry {
    return this._registry;
  }

  get fragments(): ShaderFragmentCache {
    return this._fragments;
  }

  /**
   * Get the underlying composer (for direct composition without caching).
   */
  getComposer(): ShaderComposer {
    return this.composer;
  }

  /**
   * Destroy all cached entries.
   */
  destroy(): void {
    this.unsubscribe();
    this.cache.clear();
    this._fragments.destroy();
  }

  private removeWhere(predicate: (shader: Shader) => boolean): number {
    let removed = 0;
    for (const [key, shader] of this.cache) {
      if (predicate(shader)) {
        this.cache.delete(key);
        removed++;
      }
    }
    return removed;
  }

  private log(message: string): void {
    if (this.verbose) {
      console.log(`[ShaderVariantCache] ${message}`);
    }
  }
}
