/**
 * GPUTexture - Texture, view and sampler handles for WebGPU
 * Every handle carries an `id` so bind groups can tell when a resource was swapped
 */

import type { GPUContext } from './GPUContext';
import type { GPUDeviceLike } from './types';
import { TextureUsage } from './types';
import { nextResourceId } from '../utils/id';

/** Options for texture creation */
export interface GPUTextureOptions {
  /** Texture label for debugging */
  label?: string;
  /** Texture width */
  width: number;
  /** Texture height */
  height: number;
  /** Texture format */
  format?: GPUTextureFormat;
  /** Number of mip levels (1 = no mipmaps) */
  mipLevelCount?: number;
  /** Sample count for multisampling */
  sampleCount?: number;
  /** Whether texture is used as render target */
  renderTarget?: boolean;
  /** Whether texture is used for sampling */
  sampled?: boolean;
  /** Whether texture is used for storage (compute) */
  storage?: boolean;
  /** Whether texture can be copied to */
  copyDst?: boolean;
  /** Whether texture can be copied from */
  copySrc?: boolean;
}

/** Options for sampler creation */
export interface GPUSamplerOptions {
  /** Sampler label for debugging */
  label?: string;
  /** Address mode for U coordinate */
  addressModeU?: GPUAddressMode;
  /** Address mode for V coordinate */
  addressModeV?: GPUAddressMode;
  /** Address mode for W coordinate */
  addressModeW?: GPUAddressMode;
  /** Magnification filter */
  magFilter?: GPUFilterMode;
  /** Minification filter */
  minFilter?: GPUFilterMode;
  /** Mipmap filter */
  mipmapFilter?: GPUMipmapFilterMode;
  /** Comparison function for depth textures */
  compare?: GPUCompareFunction;
  /** Maximum anisotropy */
  maxAnisotropy?: number;
}

/**
 * A texture view that can be shared between bindings.
 * Two values bind the same resource iff their ids are equal.
 */
export class SharedTextureView {
  readonly id: number;
  readonly texture: UnifiedGPUTexture;
  readonly view: GPUTextureView;

  constructor(texture: UnifiedGPUTexture, view: GPUTextureView) {
    this.id = nextResourceId();
    this.texture = texture;
    this.view = view;
  }
}

/**
 * Unified GPU texture class
 */
export class UnifiedGPUTexture {
  readonly id: number;
  private _texture: GPUTexture;
  private _defaultView: SharedTextureView;
  private _format: GPUTextureFormat;
  private _width: number;
  private _height: number;
  private _label: string;
  private _viewDimension: GPUTextureViewDimension;
  private _destroyed = false;

  private constructor(
    texture: GPUTexture,
    format: GPUTextureFormat,
    width: number,
    height: number,
    label: string,
    viewDimension: GPUTextureViewDimension = '2d',
  ) {
    this.id = nextResourceId();
    this._texture = texture;
    this._format = format;
    this._width = width;
    this._height = height;
    this._label = label;
    this._viewDimension = viewDimension;
    this._defaultView = new SharedTextureView(
      this,
      texture.createView({ label: `${label}-view`, dimension: viewDimension }),
    );
  }

  /**
   * Create a 2D texture
   */
  static create2D(ctx: GPUContext, options: GPUTextureOptions): UnifiedGPUTexture {
    const {
      label = 'texture-2d',
      width,
      height,
      format = 'rgba8unorm',
      mipLevelCount = 1,
      sampleCount = 1,
      renderTarget = false,
      sampled = true,
      storage = false,
      copyDst = true,
      copySrc = false,
    } = options;

    let usage = 0;
    if (renderTarget) usage |= TextureUsage.RENDER_ATTACHMENT;
    if (sampled) usage |= TextureUsage.TEXTURE_BINDING;
    if (storage) usage |= TextureUsage.STORAGE_BINDING;
    if (copyDst) usage |= TextureUsage.COPY_DST;
    if (copySrc) usage |= TextureUsage.COPY_SRC;

    const texture = ctx.device.createTexture({
      label,
      size: { width, height, depthOrArrayLayers: 1 },
      format,
      mipLevelCount,
      sampleCount,
      dimension: '2d',
      usage,
    });

    return new UnifiedGPUTexture(texture, format, width, height, label);
  }

  /**
   * Create a 1x1 texture bound where no texture was provided.
   * Cube dimensions get 6 layers; rgba8unorm placeholders are filled with one texel per layer.
   */
  static createPlaceholder(
    ctx: GPUContext,
    options: {
      format?: GPUTextureFormat;
      storage?: boolean;
      viewDimension?: GPUTextureViewDimension;
      rgba?: [number, number, number, number];
    } = {},
  ): UnifiedGPUTexture {
    const { format = 'rgba8unorm', storage = false, viewDimension = '2d', rgba = [255, 255, 255, 255] } = options;
    const label = storage ? 'placeholder-storage-texture' : 'placeholder-texture';
    const layers = viewDimension === 'cube' || viewDimension === 'cube-array' ? 6 : 1;
    const dimension: GPUTextureDimension = viewDimension === '1d' || viewDimension === '3d' ? viewDimension : '2d';

    let usage = TextureUsage.TEXTURE_BINDING | TextureUsage.COPY_DST;
    if (storage) usage |= TextureUsage.STORAGE_BINDING;

    const size = { width: 1, height: 1, depthOrArrayLayers: layers };
    const texture = ctx.device.createTexture({ label, size, format, dimension, usage });
    const placeholder = new UnifiedGPUTexture(texture, format, 1, 1, label, viewDimension);

    if (format === 'rgba8unorm') {
      const texels = new Uint8Array(4 * layers);
      for (let layer = 0; layer < layers; layer++) {
        texels.set(rgba, layer * 4);
      }
      ctx.queue.writeTexture({ texture }, texels, { bytesPerRow: 4, rowsPerImage: 1 }, size);
    }

    return placeholder;
  }

  /**
   * Create an additional view of this texture
   */
  createView(descriptor: GPUTextureViewDescriptor = {}): SharedTextureView {
    return new SharedTextureView(this, this._texture.createView(descriptor));
  }

  // Getters
  get texture(): GPUTexture {
    return this._texture;
  }

  /** Default 2D view */
  get view(): SharedTextureView {
    return this._defaultView;
  }

  get format(): GPUTextureFormat {
    return this._format;
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  get label(): string {
    return this._label;
  }

  get viewDimension(): GPUTextureViewDimension {
    return this._viewDimension;
  }

  /**
   * Destroy the texture and release GPU memory
   */
  destroy(): void {
    if (this._destroyed) return;
    this._destroyed = true;
    this._texture.destroy();
  }
}

/**
 * A sampler that can be shared between bindings
 */
export class SharedSampler {
  readonly id: number;
  readonly sampler: GPUSampler;

  constructor(sampler: GPUSampler) {
    this.id = nextResourceId();
    this.sampler = sampler;
  }
}

/**
 * Sampler factory with common presets, cached per device
 */
export class SamplerFactory {
  private static cache = new WeakMap<GPUDeviceLike, Map<string, SharedSampler>>();

  /**
   * Create a linear filtering sampler with clamp-to-edge
   */
  static linear(ctx: GPUContext, label = 'sampler-linear'): SharedSampler {
    return this.cached(ctx, 'linear-clamp', {
      label,
      magFilter: 'linear',
      minFilter: 'linear',
      mipmapFilter: 'linear',
      addressModeU: 'clamp-to-edge',
      addressModeV: 'clamp-to-edge',
      addressModeW: 'clamp-to-edge',
    });
  }

  /**
   * Create a nearest filtering sampler with clamp-to-edge
   */
  static nearest(ctx: GPUContext, label = 'sampler-nearest'): SharedSampler {
    return this.cached(ctx, 'nearest-clamp', {
      label,
      magFilter: 'nearest',
      minFilter: 'nearest',
      mipmapFilter: 'nearest',
      addressModeU: 'clamp-to-edge',
      addressModeV: 'clamp-to-edge',
      addressModeW: 'clamp-to-edge',
    });
  }

  /**
   * Create a depth comparison sampler for shadow mapping
   */
  static depthCompare(ctx: GPUContext, label = 'sampler-depth-compare'): SharedSampler {
    return this.cached(ctx, 'depth-compare', {
      label,
      magFilter: 'linear',
      minFilter: 'linear',
      compare: 'less',
      addressModeU: 'clamp-to-edge',
      addressModeV: 'clamp-to-edge',
    });
  }

  /**
   * Create a custom sampler (not cached)
   */
  static custom(ctx: GPUContext, options: GPUSamplerOptions): SharedSampler {
    return new SharedSampler(
      ctx.device.createSampler({
        label: options.label || 'sampler-custom',
        magFilter: options.magFilter || 'linear',
        minFilter: options.minFilter || 'linear',
        mipmapFilter: options.mipmapFilter || 'linear',
        addressModeU: options.addressModeU || 'clamp-to-edge',
        addressModeV: options.addressModeV || 'clamp-to-edge',
        addressModeW: options.addressModeW || 'clamp-to-edge',
        compare: options.compare,
        maxAnisotropy: options.maxAnisotropy || 1,
      }),
    );
  }

  /**
   * Clear the sampler cache
   */
  static clearCache(): void {
    this.cache = new WeakMap();
  }

  private static cached(ctx: GPUContext, key: string, descriptor: GPUSamplerDescriptor): SharedSampler {
    let samplers = this.cache.get(ctx.device);
    if (!samplers) {
      samplers = new Map();
      this.cache.set(ctx.device, samplers);
    }

    let sampler = samplers.get(key);
    if (!sampler) {
      sampler = new SharedSampler(ctx.device.createSampler(descriptor));
      samplers.set(key, sampler);
    }
    return sampler;
  }
}
