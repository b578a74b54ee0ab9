import type { ShaderReference } from './ShaderReference';
import { describeReference } from './ShaderReference';
import { ShaderError } from './errors';
import { CoreModuleNames, getCoreModuleSource, getDefaultShaderSource } from '../../ShaderLoader';

export type ModuleReplacedListener = (name: string) => void;

/**
 * Named shader modules available to `#include <name>`.
 *
 * Owned by a composition service and passed to the caches that need it.
 * Re-registering a name with different text replaces its source and notifies
 * `onReplace` listeners, so caches drop what was built from the old text.
 */
export class ShaderModuleRegistry {
  private modules = new Map<string, string>();
  private listeners = new Set<ModuleReplacedListener>();

  register(name: string, source: string): this {
    const previous = this.modules.get(name);
    this.modules.set(name, source);

    if (previous !== undefined && previous !== source) {
      for (const listener of this.listeners) {
        listener(name);
      }
    }
    return this;
  }

  /**
   * Subscribe to source replacements.
   *
   * @returns Unsubscribe function
   */
  onReplace(listener: ModuleReplacedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Register the built-in `core/` modules
   */
  registerDefaults(): this {
    for (const name of CoreModuleNames) {
      this.register(name, getCoreModuleSource(name));
    }
    return this;
  }

  has(name: string): boolean {
    return this.modules.has(name);
  }

  names(): string[] {
    return Array.from(this.modules.keys());
  }

  /**
   * Source text for a module or built-in reference.
   * Path references are not served by the registry.
   */
  load(ref: ShaderReference): string {
    switch (ref.kind) {
      case 'default':
        return getDefaultShaderSource(ref.shader);
      case 'module': {
        const source = this.modules.get(ref.name);
        if (source === undefined) {
          throw ShaderError.invalidModule(ref.name);
        }
        return source;
      }
      case 'path':
        throw new Error(`[ShaderModuleRegistry] Cannot load path reference ${describeReference(ref)}`);
    }
  }
}
