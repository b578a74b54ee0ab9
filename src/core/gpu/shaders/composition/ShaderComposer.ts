import type { ComposedShader } from './types';
import type { DefineSet } from './DefineSet';
import type { ShaderReference } from './ShaderReference';
import type { ShaderFragmentCache } from './ShaderFragmentCache';
import { describeReference, referenceKey, referenceLanguage } from './ShaderReference';
import { ShaderError } from './errors';

export interface ShaderComposerOptions {
  /** Log every composed shader */
  verbose?: boolean;
}

/**
 * ShaderComposer resolves a root reference's include graph into one source text.
 *
 * Pipeline:
 * 1. Determines the language from the root reference
 * 2. Pops references from a work queue seeded with the root
 * 3. Moves unresolved includes to the queue front and re-queues the dependent at the back
 * 4. Appends a fragment once all of its includes have been emitted
 * 5. Fails with CircularInclude when a reference comes back before any fragment was emitted
 *
 * Every fragment is emitted exactly once, after everything it includes.
 */
export class ShaderComposer {
  private fragments: ShaderFragmentCache;
  private verbose: boolean;

  constructor(fragments: ShaderFragmentCache, options: ShaderComposerOptions = {}) {
    this.fragments = fragments;
    this.verbose = options.verbose ?? false;
  }

  /**
   * Compose a root reference under a define set.
   */
  compose(root: ShaderReference, defines: DefineSet): ComposedShader {
    const language = referenceLanguage(root);

    const queue: ShaderReference[] = [root];
    const included: ShaderReference[] = [];
    const includedKeys = new Set<string>();
    // References popped since the last emitted fragment
    const visited = new Set<string>();

    let source = '';

    for (let ref = queue.shift(); ref !== undefined; ref = queue.shift()) {
      const key = referenceKey(ref);
      if (includedKeys.has(key)) continue;

      if (visited.has(key)) {
        throw ShaderError.circularInclude(ref);
      }
      visited.add(key);

      const fragment = this.fragments.getOrParse(ref, defines);
      const pending = fragment.includes.filter((inc) => !includedKeys.has(referenceKey(inc)));

      if (pending.length > 0) {
        for (let i = pending.length - 1; i >= 0; i--) {
          moveToFront(queue, pending[i]);
        }
        queue.push(ref);
        continue;
      }

      visited.clear();
      if (source.length > 0 && !source.endsWith('\n')) {
        source += '\n';
      }
      source += fragment.source;
      included.push(ref);
      includedKeys.add(key);
    }

    if (this.verbose) {
      console.log(
        `[ShaderComposer] Composed ${describeReference(root)} from ${included.length} fragment(s)`,
      );
    }

    return { source, language, includes: included };
  }
}

function moveToFront(queue: ShaderReference[], ref: ShaderReference): void {
  const key = referenceKey(ref);
  for (let i = queue.length - 1; i >= 0; i--) {
    if (referenceKey(queue[i]) === key) {
      queue.splice(i, 1);
    }
  }
  queue.unshift(ref);
}
