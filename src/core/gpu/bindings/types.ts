import type { BindingVisibility } from '../types';
import type {
  LayoutEntry,
  SamplerBindingType,
  StorageTextureAccess,
  TextureSampleType,
} from '../GPUBindGroup';
import type { UnifiedGPUBuffer } from '../GPUBuffer';
import type { SharedSampler, SharedTextureView } from '../GPUTexture';

// ============ Requests ============

export type BindingKind =
  | 'uniform-buffer'
  | 'storage-buffer'
  | 'texture'
  | 'storage-texture'
  | 'sampler';

interface BindingRequestBase {
  /** Variable name in the shader */
  name: string;
  visibility: BindingVisibility;
}

export interface UniformBufferRequest extends BindingRequestBase {
  kind: 'uniform-buffer';
  hasDynamicOffset?: boolean;
  minBindingSize?: number;
}

export interface StorageBufferRequest extends BindingRequestBase {
  kind: 'storage-buffer';
  readOnly?: boolean;
  hasDynamicOffset?: boolean;
  minBindingSize?: number;
}

export interface TextureRequest extends BindingRequestBase {
  kind: 'texture';
  sampleType?: TextureSampleType;
  viewDimension?: GPUTextureViewDimension;
  multisampled?: boolean;
}

export interface StorageTextureRequest extends BindingRequestBase {
  kind: 'storage-texture';
  format: GPUTextureFormat;
  access?: StorageTextureAccess;
  viewDimension?: GPUTextureViewDimension;
}

export interface SamplerRequest extends BindingRequestBase {
  kind: 'sampler';
  samplerType?: SamplerBindingType;
}

/**
 * A named resource slot a type wants bound
 */
export type BindingRequest =
  | UniformBufferRequest
  | StorageBufferRequest
  | TextureRequest
  | StorageTextureRequest
  | SamplerRequest;

/**
 * Kind-specific parameters that can be replaced before matching
 */
export interface BindingOverride {
  visibility?: BindingVisibility;
  hasDynamicOffset?: boolean;
  minBindingSize?: number;
  readOnly?: boolean;
  sampleType?: TextureSampleType;
  viewDimension?: GPUTextureViewDimension;
  multisampled?: boolean;
  format?: GPUTextureFormat;
  access?: StorageTextureAccess;
  samplerType?: SamplerBindingType;
}

/**
 * Apply an override to a request. Parameters that do not exist for the
 * request's kind are ignored.
 */
export function applyOverride(request: BindingRequest, params: BindingOverride): BindingRequest {
  const visibility = params.visibility ?? request.visibility;

  switch (request.kind) {
    case 'uniform-buffer':
      return {
        ...request,
        visibility,
        hasDynamicOffset: params.hasDynamicOffset ?? request.hasDynamicOffset,
        minBindingSize: params.minBindingSize ?? request.minBindingSize,
      };
    case 'storage-buffer':
      return {
        ...request,
        visibility,
        readOnly: params.readOnly ?? request.readOnly,
        hasDynamicOffset: params.hasDynamicOffset ?? request.hasDynamicOffset,
        minBindingSize: params.minBindingSize ?? request.minBindingSize,
      };
    case 'texture':
      return {
        ...request,
        visibility,
        sampleType: params.sampleType ?? request.sampleType,
        viewDimension: params.viewDimension ?? request.viewDimension,
        multisampled: params.multisampled ?? request.multisampled,
      };
    case 'storage-texture':
      return {
        ...request,
        visibility,
        format: params.format ?? request.format,
        access: params.access ?? request.access,
        viewDimension: params.viewDimension ?? request.viewDimension,
      };
    case 'sampler':
      return {
        ...request,
        visibility,
        samplerType: params.samplerType ?? request.samplerType,
      };
  }
}

/**
 * Layout entry for a request, in GPUBindGroup's simplified format
 */
export function requestToLayoutEntry(request: BindingRequest): LayoutEntry {
  switch (request.kind) {
    case 'uniform-buffer':
      return {
        type: 'buffer',
        bufferType: 'uniform',
        hasDynamicOffset: request.hasDynamicOffset,
        minBindingSize: request.minBindingSize,
      };
    case 'storage-buffer':
      return {
        type: 'buffer',
        bufferType: request.readOnly === false ? 'storage' : 'read-only-storage',
        hasDynamicOffset: request.hasDynamicOffset,
        minBindingSize: request.minBindingSize,
      };
    case 'texture':
      return {
        type: 'texture',
        sampleType: request.sampleType,
        viewDimension: request.viewDimension,
        multisampled: request.multisampled,
      };
    case 'storage-texture':
      return {
        type: 'storageTexture',
        format: request.format,
        access: request.access,
        viewDimension: request.viewDimension,
      };
    case 'sampler':
      return {
        type: 'sampler',
        samplerType: request.samplerType,
      };
  }
}

// ============ Values ============

/** Serialized payload (written to a cache-owned buffer) or a caller-owned buffer */
export type BufferValue = ArrayBuffer | ArrayBufferView | UnifiedGPUBuffer;

/** `null` binds a 1x1 placeholder texture */
export type TextureValue = SharedTextureView | null;

/** `null` binds a linear clamp-to-edge sampler */
export type SamplerValue = SharedSampler | null;

export interface BindingValueByKind {
  'uniform-buffer': BufferValue;
  'storage-buffer': BufferValue;
  texture: TextureValue;
  'storage-texture': TextureValue;
  sampler: SamplerValue;
}

export type BindingValue = BindingValueByKind[BindingKind];

// ============ Statistics ============

export interface BindingStats {
  bindGroupsCreated: number;
  buffersCreated: number;
  /** Payload writes into existing buffers */
  bufferWrites: number;
  texturesCreated: number;
}
