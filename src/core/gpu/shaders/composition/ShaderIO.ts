/**
 * ShaderIO - loads shader text referenced by path
 * FileShaderIO reads from disk, MemoryShaderIO holds sources in a map
 */

import fs from 'fs';
import path from 'path';

/**
 * External IO collaborator used for `path` shader references.
 * `read` throws on failure; the caller wraps the error as an IoError.
 */
export interface ShaderIO {
  read(filePath: string): string;

  /** Modification stamp used for hot reload; undefined when unknown */
  lastModified?(filePath: string): number | undefined;

  /** Absolute location of a shader path, used to match watcher events */
  resolve?(filePath: string): string;
}

/**
 * Reads shader paths relative to a root directory
 */
export class FileShaderIO implements ShaderIO {
  private rootPath: string;

  constructor(rootPath: string = process.cwd()) {
    this.rootPath = path.resolve(rootPath);
  }

  get root(): string {
    return this.rootPath;
  }

  read(filePath: string): string {
    return fs.readFileSync(this.resolve(filePath), 'utf8');
  }

  lastModified(filePath: string): number | undefined {
    try {
      return fs.statSync(this.resolve(filePath)).mtimeMs;
    } catch (err) {
      console.warn(`[FileShaderIO] Cannot stat ${filePath}:`, err);
      return undefined;
    }
  }

  resolve(filePath: string): string {
    return path.resolve(this.rootPath, filePath);
  }
}

/**
 * In-memory shader sources, e.g. generated at runtime or embedded in a bundle.
 * Every write bumps the path's modification stamp.
 */
export class MemoryShaderIO implements ShaderIO {
  private sources = new Map<string, { source: string; version: number }>();
  private readCounts = new Map<string, number>();
  private clock = 0;

  constructor(initial: Record<string, string> = {}) {
    for (const [filePath, source] of Object.entries(initial)) {
      this.write(filePath, source);
    }
  }

  write(filePath: string, source: string): this {
    this.sources.set(filePath, { source, version: ++this.clock });
    return this;
  }

  delete(filePath: string): boolean {
    return this.sources.delete(filePath);
  }

  read(filePath: string): string {
    this.readCounts.set(filePath, (this.readCounts.get(filePath) ?? 0) + 1);

    const entry = this.sources.get(filePath);
    if (!entry) {
      throw new Error(`[MemoryShaderIO] No such shader: ${filePath}`);
    }
    return entry.source;
  }

  lastModified(filePath: string): number | undefined {
    return this.sources.get(filePath)?.version;
  }

  /**
   * Number of read() calls for a path (or for all paths)
   */
  getReadCount(filePath?: string): number {
    if (filePath !== undefined) {
      return this.readCounts.get(filePath) ?? 0;
    }
    let total = 0;
    for (const count of this.readCounts.values()) total += count;
    return total;
  }
}
