/**
 * GPUBindGroup - Bind group and layout builders driven by the binding cache
 */

import type { GPUContext } from './GPUContext';
import type { BindingVisibility } from './types';
import { visibilityToFlags } from './types';

/** Buffer binding type */
export type BufferBindingType = 'uniform' | 'storage' | 'read-only-storage';

/** Sampler binding type */
export type SamplerBindingType = 'filtering' | 'non-filtering' | 'comparison';

/** Texture sample type */
export type TextureSampleType = 'float' | 'unfilterable-float' | 'depth' | 'sint' | 'uint';

/** Storage texture access */
export type StorageTextureAccess = 'write-only' | 'read-only' | 'read-write';

/** Layout entry for a buffer */
export interface BufferLayoutEntry {
  type: 'buffer';
  bufferType?: BufferBindingType;
  hasDynamicOffset?: boolean;
  minBindingSize?: number;
}

/** Layout entry for a sampler */
export interface SamplerLayoutEntry {
  type: 'sampler';
  samplerType?: SamplerBindingType;
}

/** Layout entry for a texture */
export interface TextureLayoutEntry {
  type: 'texture';
  sampleType?: TextureSampleType;
  viewDimension?: GPUTextureViewDimension;
  multisampled?: boolean;
}

/** Layout entry for a storage texture */
export interface StorageTextureLayoutEntry {
  type: 'storageTexture';
  access?: StorageTextureAccess;
  format: GPUTextureFormat;
  viewDimension?: GPUTextureViewDimension;
}

/** Union type for all layout entry types */
export type LayoutEntry =
  | BufferLayoutEntry
  | SamplerLayoutEntry
  | TextureLayoutEntry
  | StorageTextureLayoutEntry;

/**
 * Create a bind group layout entry from our simplified format
 */
export function createLayoutEntry(
  binding: number,
  visibility: BindingVisibility,
  entry: LayoutEntry,
): GPUBindGroupLayoutEntry {
  const base: GPUBindGroupLayoutEntry = {
    binding,
    visibility: visibilityToFlags(visibility),
  };

  switch (entry.type) {
    case 'buffer':
      return {
        ...base,
        buffer: {
          type: entry.bufferType || 'uniform',
          hasDynamicOffset: entry.hasDynamicOffset || false,
          minBindingSize: entry.minBindingSize || 0,
        },
      };
    case 'sampler':
      return {
        ...base,
        sampler: {
          type: entry.samplerType || 'filtering',
        },
      };
    case 'texture':
      return {
        ...base,
        texture: {
          sampleType: entry.sampleType || 'float',
          viewDimension: entry.viewDimension || '2d',
          multisampled: entry.multisampled || false,
        },
      };
    case 'storageTexture':
      return {
        ...base,
        storageTexture: {
          access: entry.access || 'write-only',
          format: entry.format,
          viewDimension: entry.viewDimension || '2d',
        },
      };
  }
}

/**
 * Bind group layout builder
 */
export class BindGroupLayoutBuilder {
  private entries: GPUBindGroupLayoutEntry[] = [];
  private label: string;

  constructor(label = 'bind-group-layout') {
    this.label = label;
  }

  /**
   * Add an entry in the simplified format
   */
  entry(binding: number, visibility: BindingVisibility, entry: LayoutEntry): this {
    this.entries.push(createLayoutEntry(binding, visibility, entry));
    return this;
  }

  /**
   * Build the bind group layout
   */
  build(ctx: GPUContext): GPUBindGroupLayout {
    return ctx.device.createBindGroupLayout({
      label: this.label,
      entries: this.entries,
    });
  }
}

/**
 * Bind group builder
 */
export class BindGroupBuilder {
  private entries: GPUBindGroupEntry[] = [];
  private label: string;

  constructor(label = 'bind-group') {
    this.label = label;
  }

  /**
   * Add an already resolved resource
   */
  resource(binding: number, resource: GPUBindingResource): this {
    this.entries.push({ binding, resource });
    return this;
  }

  /**
   * Build the bind group
   */
  build(ctx: GPUContext, layout: GPUBindGroupLayout): GPUBindGroup {
    return ctx.device.createBindGroup({
      label: this.label,
      layout,
      entries: this.entries,
    });
  }
}
