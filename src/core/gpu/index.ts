/**
 * GPU Module - WebGPU abstraction layer
 * Shader composition, binding layouts and the runtime binding cache
 */

// Core context
export { GPUContext } from './GPUContext';
export type { GPUContextOptions } from './GPUContext';

// Buffer abstractions
export { UnifiedGPUBuffer, UniformBuilder, alignTo256, alignTo4 } from './GPUBuffer';
export type { GPUBufferType, GPUBufferOptions } from './GPUBuffer';

// Texture abstractions
export { UnifiedGPUTexture, SharedTextureView, SharedSampler, SamplerFactory } from './GPUTexture';
export type { GPUTextureOptions, GPUSamplerOptions } from './GPUTexture';

// Shader module diagnostics
export { inspectShaderModule } from './GPUShaderModule';
export type { ShaderCompilationResult } from './GPUShaderModule';

// Built-in shader sources
export {
  DefaultShaderFiles,
  CoreModuleNames,
  getDefaultShaderSource,
  getCoreModuleSource,
  clearShaderSourceCache,
} from './ShaderLoader';
export type { CoreModuleName } from './ShaderLoader';

// Bind group utilities
export { BindGroupLayoutBuilder, BindGroupBuilder, createLayoutEntry } from './GPUBindGroup';
export type {
  BufferBindingType,
  SamplerBindingType,
  TextureSampleType,
  StorageTextureAccess,
  BufferLayoutEntry,
  SamplerLayoutEntry,
  TextureLayoutEntry,
  StorageTextureLayoutEntry,
  LayoutEntry,
} from './GPUBindGroup';

// Flags and shared types
export { ShaderStage, BufferUsage, TextureUsage, visibilityToFlags } from './types';
export type { BindingVisibility, BindingLocation, GPUDeviceLike, GPUQueueLike } from './types';

// Shader composition
export * from './shaders/composition';

// Binding cache
export * from './bindings';
