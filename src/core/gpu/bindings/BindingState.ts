import type { GPUContext } from '../GPUContext';
import type { TextureSampleType } from '../GPUBindGroup';
import type {
  BindingRequest,
  BindingStats,
  BindingValue,
  BufferValue,
  SamplerValue,
  TextureValue,
} from './types';
import { UnifiedGPUBuffer } from '../GPUBuffer';
import { SamplerFactory, SharedSampler, SharedTextureView, UnifiedGPUTexture } from '../GPUTexture';
import { BindingError } from '../shaders/composition/errors';
import { BindKey } from './BindKey';

interface BufferState {
  kind: 'uniform-buffer' | 'storage-buffer';
  /** Buffer created by the cache for serialized payloads */
  owned: UnifiedGPUBuffer | null;
}

interface TextureState {
  kind: 'texture' | 'storage-texture';
  format: GPUTextureFormat;
  viewDimension: GPUTextureViewDimension;
  /** Multisampled layouts have no placeholder */
  multisampled: boolean;
  /** Created on the first null value */
  placeholder: UnifiedGPUTexture | null;
}

interface SamplerState {
  kind: 'sampler';
  comparison: boolean;
  /** Shared preset used for null values */
  fallback: SharedSampler | null;
}

/**
 * Backing state owned by one binding entry, selected by the request kind
 */
export type BindingState = BufferState | TextureState | SamplerState;

export function createBindingState(request: BindingRequest): BindingState {
  switch (request.kind) {
    case 'uniform-buffer':
    case 'storage-buffer':
      return { kind: request.kind, owned: null };
    case 'texture':
      return {
        kind: 'texture',
        format: placeholderFormat(request.sampleType),
        viewDimension: request.viewDimension ?? '2d',
        multisampled: request.multisampled ?? false,
        placeholder: null,
      };
    case 'storage-texture':
      return {
        kind: 'storage-texture',
        format: request.format,
        viewDimension: request.viewDimension ?? '2d',
        multisampled: false,
        placeholder: null,
      };
    case 'sampler':
      return { kind: 'sampler', comparison: request.samplerType === 'comparison', fallback: null };
  }
}

/**
 * Placeholder format compatible with a texture layout's sample type
 */
function placeholderFormat(sampleType: TextureSampleType | undefined): GPUTextureFormat {
  switch (sampleType) {
    case 'depth':
      return 'depth32float';
    case 'uint':
      return 'r32uint';
    case 'sint':
      return 'r32sint';
    default:
      return 'rgba8unorm';
  }
}

/**
 * BindKey of a value: payload bytes for serialized data, identity for GPU
 * resources, ZERO for defaults
 */
export function bindKeyOf(value: BindingValue): BindKey {
  if (value === null) return BindKey.ZERO;
  if (value instanceof ArrayBuffer || ArrayBuffer.isView(value)) {
    return BindKey.fromBytes(value);
  }
  return BindKey.fromId(value.id);
}

/**
 * Produce the GPU resource for a value, creating or writing backing storage as needed.
 */
export function resolveBinding(
  ctx: GPUContext,
  name: string,
  state: BindingState,
  value: BindingValue,
  stats: BindingStats,
): GPUBindingResource {
  switch (state.kind) {
    case 'uniform-buffer':
    case 'storage-buffer':
      return resolveBuffer(ctx, name, state, expectBuffer(name, value), stats);
    case 'texture':
    case 'storage-texture':
      return resolveTexture(ctx, name, state, expectTexture(name, value), stats);
    case 'sampler':
      return resolveSampler(ctx, state, expectSampler(name, value));
  }
}

/**
 * Destroy GPU objects the state created
 */
export function releaseBindingState(state: BindingState): void {
  switch (state.kind) {
    case 'uniform-buffer':
    case 'storage-buffer':
      state.owned?.destroy();
      state.owned = null;
      break;
    case 'texture':
    case 'storage-texture':
      state.placeholder?.destroy();
      state.placeholder = null;
      break;
    case 'sampler':
      // Fallback samplers are shared presets
      state.fallback = null;
      break;
  }
}

function resolveBuffer(
  ctx: GPUContext,
  name: string,
  state: BufferState,
  value: BufferValue,
  stats: BindingStats,
): GPUBindingResource {
  if (value instanceof UnifiedGPUBuffer) {
    if (state.owned) {
      state.owned.destroy();
      state.owned = null;
    }
    return { buffer: value.buffer, offset: 0, size: value.size };
  }

  let buffer = state.owned;
  if (buffer && buffer.fits(value.byteLength)) {
    buffer.write(ctx, value);
    stats.bufferWrites++;
  } else {
    buffer?.destroy();
    buffer =
      state.kind === 'uniform-buffer'
        ? UnifiedGPUBuffer.createUniform(ctx, { data: value, label: name })
        : UnifiedGPUBuffer.createStorage(ctx, { data: value, label: name });
    state.owned = buffer;
    stats.buffersCreated++;
  }

  return { buffer: buffer.buffer, offset: 0, size: buffer.size };
}

function resolveTexture(
  ctx: GPUContext,
  name: string,
  state: TextureState,
  value: TextureValue,
  stats: BindingStats,
): GPUBindingResource {
  if (value) return value.view;

  if (state.multisampled) {
    throw new BindingError(`[Bindings] "${name}" is multisampled and needs a texture; null has no placeholder`);
  }

  if (!state.placeholder) {
    state.placeholder = UnifiedGPUTexture.createPlaceholder(ctx, {
      format: state.format,
      storage: state.kind === 'storage-texture',
      viewDimension: state.viewDimension,
    });
    stats.texturesCreated++;
  }
  return state.placeholder.view.view;
}

function resolveSampler(ctx: GPUContext, state: SamplerState, value: SamplerValue): GPUBindingResource {
  if (value) return value.sampler;

  if (!state.fallback) {
    state.fallback = state.comparison ? SamplerFactory.depthCompare(ctx) : SamplerFactory.linear(ctx);
  }
  return state.fallback.sampler;
}

function expectBuffer(name: string, value: BindingValue): BufferValue {
  if (value instanceof UnifiedGPUBuffer || value instanceof ArrayBuffer || ArrayBuffer.isView(value)) {
    return value;
  }
  throw new BindingError(`[Bindings] "${name}" expects buffer data or a UnifiedGPUBuffer`);
}

function expectTexture(name: string, value: BindingValue): TextureValue {
  if (value === null || value instanceof SharedTextureView) {
    return value;
  }
  throw new BindingError(`[Bindings] "${name}" expects a SharedTextureView or null`);
}

function expectSampler(name: string, value: BindingValue): SamplerValue {
  if (value === null || value instanceof SharedSampler) {
    return value;
  }
  throw new BindingError(`[Bindings] "${name}" expects a SharedSampler or null`);
}
