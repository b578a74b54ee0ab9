import type { ShaderReference } from './ShaderReference';

// ============ Languages ============

export type ShaderLanguage = 'wgsl' | 'glsl';

// ============ Fragments ============

/**
 * One parsed unit of shader source for a given define set.
 * Include directives have been removed from `source`; their targets
 * are listed in `includes` and inlined at composition time.
 */
export interface CachedFragment {
  /** Processed source (comments stripped, inactive blocks removed) */
  source: string;

  /** Included references in first-seen order, without duplicates */
  includes: ShaderReference[];
}

// ============ Reflection ============

/**
 * Resource kinds a shader can declare at a (group, binding) location
 */
export type ReflectedBindingKind =
  | 'uniform-buffer'
  | 'storage-buffer'
  | 'texture'
  | 'storage-texture'
  | 'sampler'
  | 'external-texture';

/**
 * A global resource declared by a compiled shader.
 */
export interface ReflectedBinding {
  name: string;
  group: number;
  binding: number;
  kind: ReflectedBindingKind;
}

export interface ShaderReflection {
  bindings: ReflectedBinding[];
}

/**
 * Validates composed source and reflects its global bindings.
 * Implementations throw ShaderError('ValidationError') on invalid input.
 */
export interface ShaderCompiler {
  compile(source: string, language: ShaderLanguage, label: string): ShaderReflection;
}

// ============ Composition ============

/**
 * Result of resolving an include graph into one source text.
 */
export interface ComposedShader {
  /** Concatenated fragment sources, dependencies first */
  source: string;

  /** Language of the root reference */
  language: ShaderLanguage;

  /** Every reference that contributed text, in emission order (root last) */
  includes: ShaderReference[];
}
