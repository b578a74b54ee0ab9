/**
 * WebGPU Type Definitions
 * Flag constants and shared interfaces for the GPU abstraction layer.
 *
 * The WebGPU namespaces (GPUShaderStage, GPUBufferUsage, ...) only exist as
 * runtime globals inside a WebGPU host, so their values are mirrored here.
 */

/**
 * Shader stage visibility bits (GPUShaderStage)
 */
export const ShaderStage = {
  VERTEX: 0x1,
  FRAGMENT: 0x2,
  COMPUTE: 0x4,
  ALL: 0x1 | 0x2 | 0x4,
} as const;

/**
 * Buffer usage bits (GPUBufferUsage)
 */
export const BufferUsage = {
  MAP_READ: 0x0001,
  MAP_WRITE: 0x0002,
  COPY_SRC: 0x0004,
  COPY_DST: 0x0008,
  INDEX: 0x0010,
  VERTEX: 0x0020,
  UNIFORM: 0x0040,
  STORAGE: 0x0080,
  INDIRECT: 0x0100,
  QUERY_RESOLVE: 0x0200,
} as const;

/**
 * Texture usage bits (GPUTextureUsage)
 */
export const TextureUsage = {
  COPY_SRC: 0x01,
  COPY_DST: 0x02,
  TEXTURE_BINDING: 0x04,
  STORAGE_BINDING: 0x08,
  RENDER_ATTACHMENT: 0x10,
} as const;

/**
 * Binding visibility shorthand accepted by the layout builders
 */
export type BindingVisibility = 'vertex' | 'fragment' | 'compute' | 'all' | GPUShaderStageFlags;

/**
 * Convert a visibility shorthand to GPUShaderStageFlags
 */
export function visibilityToFlags(visibility: BindingVisibility): GPUShaderStageFlags {
  if (typeof visibility === 'number') return visibility;

  switch (visibility) {
    case 'vertex':
      return ShaderStage.VERTEX;
    case 'fragment':
      return ShaderStage.FRAGMENT;
    case 'compute':
      return ShaderStage.COMPUTE;
    case 'all':
      return ShaderStage.ALL;
  }
}

/**
 * Location of a binding inside a pipeline layout
 */
export interface BindingLocation {
  group: number;
  binding: number;
}

/**
 * The slice of GPUQueue the binding cache writes through
 */
export type GPUQueueLike = Pick<GPUQueue, 'writeBuffer' | 'writeTexture'>;

/**
 * The slice of GPUDevice used by shader composition and the binding cache.
 * Anything satisfying this can stand in for a real device.
 */
export interface GPUDeviceLike {
  readonly queue: GPUQueueLike;
  createBuffer(descriptor: GPUBufferDescriptor): GPUBuffer;
  createTexture(descriptor: GPUTextureDescriptor): GPUTexture;
  createSampler(descriptor?: GPUSamplerDescriptor): GPUSampler;
  createBindGroupLayout(descriptor: GPUBindGroupLayoutDescriptor): GPUBindGroupLayout;
  createPipelineLayout(descriptor: GPUPipelineLayoutDescriptor): GPUPipelineLayout;
  createBindGroup(descriptor: GPUBindGroupDescriptor): GPUBindGroup;
  createShaderModule(descriptor: GPUShaderModuleDescriptor): GPUShaderModule;
}
