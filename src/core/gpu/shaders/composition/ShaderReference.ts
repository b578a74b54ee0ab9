import path from 'path';
import type { ShaderLanguage } from './types';
import { ShaderError } from './errors';

/**
 * Shaders compiled into the library (see ShaderLoader)
 */
export type DefaultShader = 'vertex' | 'fragment';

/**
 * Identifies one unit of shader source.
 *
 * - `default`: a built-in shader
 * - `path`: a file read through the IO collaborator; its directory resolves relative includes
 * - `module`: a named module from the registry (`#include <name>`)
 */
export type ShaderReference =
  | { kind: 'default'; shader: DefaultShader }
  | { kind: 'path'; path: string }
  | { kind: 'module'; name: string };

export const ShaderRef = {
  default(shader: DefaultShader): ShaderReference {
    return { kind: 'default', shader };
  },

  path(filePath: string): ShaderReference {
    return { kind: 'path', path: normalize(filePath) };
  },

  module(name: string): ShaderReference {
    return { kind: 'module', name };
  },
} as const;

/**
 * Canonical string form. Two references are equal iff their keys are equal.
 */
export function referenceKey(ref: ShaderReference): string {
  switch (ref.kind) {
    case 'default':
      return `default:${ref.shader}`;
    case 'path':
      return `path:${ref.path}`;
    case 'module':
      return `module:${ref.name}`;
  }
}

export function describeReference(ref: ShaderReference): string {
  switch (ref.kind) {
    case 'default':
      return `<default ${ref.shader}>`;
    case 'path':
      return `"${ref.path}"`;
    case 'module':
      return `<${ref.name}>`;
  }
}

export function referencesEqual(a: ShaderReference, b: ShaderReference): boolean {
  return referenceKey(a) === referenceKey(b);
}

/**
 * Directory used to resolve `#include "..."` inside this reference.
 * Only path references carry one.
 */
export function parentDirectory(ref: ShaderReference): string | undefined {
  if (ref.kind !== 'path') return undefined;
  return path.posix.dirname(ref.path);
}

/**
 * Resolve a quoted include against the including file's directory
 */
export function joinInclude(relative: string, parentDir: string | undefined): ShaderReference {
  if (parentDir === undefined || parentDir === '.') {
    return ShaderRef.path(relative);
  }
  return ShaderRef.path(path.posix.join(parentDir, relative));
}

const LANGUAGE_BY_EXTENSION: Record<string, ShaderLanguage> = {
  wgsl: 'wgsl',
  glsl: 'glsl',
  vert: 'glsl',
  frag: 'glsl',
  comp: 'glsl',
};

/**
 * Determine the shading language of a reference from its extension.
 * Built-in shaders are WGSL.
 */
export function referenceLanguage(ref: ShaderReference): ShaderLanguage {
  if (ref.kind === 'default') return 'wgsl';

  const name = ref.kind === 'path' ? ref.path : ref.name;
  const extension = path.posix.extname(name);
  if (extension === '' || extension === '.') {
    throw ShaderError.noExtension(name);
  }

  const language = LANGUAGE_BY_EXTENSION[extension.slice(1)];
  if (language === undefined) {
    throw ShaderError.unknownExtension(extension.slice(1));
  }
  return language;
}

function normalize(filePath: string): string {
  return path.posix.normalize(filePath.replace(/\\/g, '/'));
}
