export { ShaderPreprocessor } from './ShaderPreprocessor';
export { ShaderModuleRegistry } from './ShaderModuleRegistry';
export { FileShaderIO, MemoryShaderIO } from './ShaderIO';
export type { ShaderIO } from './ShaderIO';
export { ShaderFragmentCache } from './ShaderFragmentCache';
export type { ShaderFragmentCacheOptions } from './ShaderFragmentCache';
export { ShaderComposer } from './ShaderComposer';
export type { ShaderComposerOptions } from './ShaderComposer';
export { WgslShaderCompiler } from './ShaderCompiler';
export { Shader } from './Shader';
export type { ShaderInit } from './Shader';
export { ShaderVariantCache } from './ShaderVariantCache';
export type { ShaderVariantCacheOptions } from './ShaderVariantCache';
export { ShaderWatcher } from './ShaderWatcher';
export type { ShaderWatcherOptions } from './ShaderWatcher';
export { DefineSet } from './DefineSet';
export {
  ShaderRef,
  referenceKey,
  referencesEqual,
  referenceLanguage,
  parentDirectory,
  describeReference,
} from './ShaderReference';
export type { ShaderReference, DefaultShader } from './ShaderReference';
export { ShaderError, BindingError } from './errors';
export type { ShaderErrorKind } from './errors';
export type {
  ShaderLanguage,
  CachedFragment,
  ComposedShader,
  ReflectedBinding,
  ReflectedBindingKind,
  ShaderReflection,
  ShaderCompiler,
} from './types';
