/**
 * Shader Watcher
 * Monitors a shader directory and invalidates cached variants when files change
 */

import { FSWatcher, watch } from 'chokidar';
import path from 'path';
import type { ShaderVariantCache } from './ShaderVariantCache';
import { debounce, type Debounced } from '../../../utils/debounce';

const SHADER_EXTENSIONS = ['.wgsl', '.glsl', '.vert', '.frag', '.comp'];

export interface ShaderWatcherOptions {
  /** Directory to watch */
  rootPath: string;
  /** Quiet period before pending changes are applied (default: 100ms) */
  debounceMs?: number;
  /** Called with the changed paths after their variants were invalidated */
  onChange?: (paths: string[]) => void;
}

export class ShaderWatcher {
  private watcher: FSWatcher | null = null;
  private rootPath: string;
  private cache: ShaderVariantCache;
  private onChange?: (paths: string[]) => void;
  private pending = new Set<string>();
  private flushDebounced: Debounced<[]>;

  constructor(cache: ShaderVariantCache, options: ShaderWatcherOptions) {
    this.cache = cache;
    this.rootPath = path.resolve(options.rootPath);
    this.onChange = options.onChange;
    this.flushDebounced = debounce(() => this.flush(), options.debounceMs ?? 100);
  }

  /**
   * Start watching the directory
   */
  start(): void {
    if (this.watcher) return;

    console.log(`[ShaderWatcher] Watching: ${this.rootPath}`);

    this.watcher = watch(this.rootPath, {
      ignored: [/(^|[/\\])\../, /node_modules/],
      persistent: true,
      ignoreInitial: true,
    });

    this.watcher
      .on('change', (filePath) => this.notify(filePath))
      .on('unlink', (filePath) => this.notify(filePath))
      .on('add', (filePath) => this.notify(filePath))
      .on('error', (error) => console.error('[ShaderWatcher] Error:', error));
  }

  /**
   * Stop watching; pending changes are dropped
   */
  async stop(): Promise<void> {
    this.flushDebounced.cancel();
    this.pending.clear();

    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
      console.log('[ShaderWatcher] Stopped');
    }
  }

  /**
   * Record a changed file. Invalidation happens once the debounce window closes.
   */
  notify(filePath: string): void {
    if (!SHADER_EXTENSIONS.includes(path.extname(filePath).toLowerCase())) return;

    this.pending.add(filePath);
    this.flushDebounced();
  }

  /**
   * Check if watcher is active
   */
  isActive(): boolean {
    return this.watcher !== null;
  }

  private flush(): void {
    const paths = Array.from(this.pending);
    this.pending.clear();

    for (const filePath of paths) {
      const removed = this.cache.invalidatePath(filePath);
      console.log(`[ShaderWatcher] ${filePath}: ${removed} variant(s) invalidated`);
    }

    this.onChange?.(paths);
  }
}
