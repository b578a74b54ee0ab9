/**
 * GPUBuffer - Uniform and storage buffers with automatic alignment
 */

import type { ReadonlyMat4, ReadonlyVec4 } from 'gl-matrix';
import type { GPUContext } from './GPUContext';
import { BufferUsage } from './types';
import { nextResourceId } from '../utils/id';

/** Buffer usage types */
export type GPUBufferType = 'uniform' | 'storage';

/** Options for buffer creation */
export interface GPUBufferOptions {
  /** Buffer label for debugging */
  label?: string;
  /** Initial data to upload */
  data?: ArrayBuffer | ArrayBufferView;
  /** Buffer size in bytes (required if no data provided) */
  size?: number;
  /** Whether the buffer can be copied from (for readback) */
  readback?: boolean;
  /** Whether the buffer can be copied to (for updates) */
  writable?: boolean;
}

/**
 * Calculates aligned size for uniform buffers (must be 256-byte aligned)
 */
export function alignTo256(size: number): number {
  return Math.ceil(size / 256) * 256;
}

/**
 * Calculates aligned size for storage buffers (must be 4-byte aligned)
 */
export function alignTo4(size: number): number {
  return Math.ceil(size / 4) * 4;
}

const USAGE_BY_TYPE: Record<GPUBufferType, GPUBufferUsageFlags> = {
  uniform: BufferUsage.UNIFORM,
  storage: BufferUsage.STORAGE,
};

const ALIGN_BY_TYPE: Record<GPUBufferType, (size: number) => number> = {
  uniform: alignTo256,
  storage: alignTo4,
};

/**
 * Unified GPU buffer class.
 * `id` is unique per buffer and changes whenever a buffer is recreated.
 */
export class UnifiedGPUBuffer {
  readonly id: number;
  private _buffer: GPUBuffer;
  private _size: number;
  private _type: GPUBufferType;
  private _usage: GPUBufferUsageFlags;
  private _label: string;
  private _destroyed = false;

  private constructor(
    buffer: GPUBuffer,
    size: number,
    type: GPUBufferType,
    usage: GPUBufferUsageFlags,
    label: string,
  ) {
    this.id = nextResourceId();
    this._buffer = buffer;
    this._size = size;
    this._type = type;
    this._usage = usage;
    this._label = label;
  }

  /**
   * Create a uniform buffer (automatically aligned to 256 bytes)
   */
  static createUniform(ctx: GPUContext, options: GPUBufferOptions): UnifiedGPUBuffer {
    return UnifiedGPUBuffer.create(ctx, 'uniform', options);
  }

  /**
   * Create a storage buffer
   */
  static createStorage(ctx: GPUContext, options: GPUBufferOptions): UnifiedGPUBuffer {
    return UnifiedGPUBuffer.create(ctx, 'storage', options);
  }

  private static create(
    ctx: GPUContext,
    type: GPUBufferType,
    options: GPUBufferOptions,
  ): UnifiedGPUBuffer {
    const { size, data, label = `${type}-buffer`, readback = false, writable = true } = options;

    let usage = USAGE_BY_TYPE[type];
    if (writable) usage |= BufferUsage.COPY_DST;
    if (readback) usage |= BufferUsage.COPY_SRC;

    const dataSize = data ? data.byteLength : size ?? 0;
    if (!dataSize) throw new Error('[UnifiedGPUBuffer] Either data or size must be provided');

    const bufferSize = ALIGN_BY_TYPE[type](dataSize);

    const buffer = ctx.device.createBuffer({
      size: bufferSize,
      usage,
      label,
    });

    const result = new UnifiedGPUBuffer(buffer, bufferSize, type, usage, label);
    if (data) {
      result.write(ctx, data);
    }
    return result;
  }

  /**
   * True when `byteLength` bytes can be written at offset 0
   */
  fits(byteLength: number): boolean {
    return byteLength <= this._size;
  }

  /**
   * Write data to the buffer
   */
  write(ctx: GPUContext, data: ArrayBuffer | ArrayBufferView, offset = 0): void {
    if (!(this._usage & BufferUsage.COPY_DST)) {
      throw new Error(`[UnifiedGPUBuffer] ${this._label} is not writable (missing COPY_DST usage)`);
    }
    if (offset + data.byteLength > this._size) {
      throw new Error(
        `[UnifiedGPUBuffer] Write of ${data.byteLength} bytes at ${offset} exceeds ${this._label} (${this._size} bytes)`,
      );
    }

    if (data instanceof ArrayBuffer) {
      ctx.queue.writeBuffer(this._buffer, offset, data);
    } else {
      ctx.queue.writeBuffer(this._buffer, offset, data.buffer, data.byteOffset, data.byteLength);
    }
  }

  // Getters
  get buffer(): GPUBuffer {
    return this._buffer;
  }

  get size(): number {
    return this._size;
  }

  get type(): GPUBufferType {
    return this._type;
  }

  get label(): string {
    return this._label;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  /**
   * Destroy the buffer and release GPU memory
   */
  destroy(): void {
    if (this._destroyed) return;
    this._destroyed = true;
    this._buffer.destroy();
  }
}

/**
 * Helper class for building structured uniform data
 */
export class UniformBuilder {
  private data: Float32Array;
  private offset: number = 0;

  constructor(floatCount: number) {
    this.data = new Float32Array(floatCount);
  }

  /**
   * Add a float value
   */
  float(value: number): this {
    this.data[this.offset++] = value;
    return this;
  }

  /**
   * Add a vec3 (3 floats, padded to 4 for alignment)
   */
  vec3(x: number, y: number, z: number): this {
    this.data[this.offset++] = x;
    this.data[this.offset++] = y;
    this.data[this.offset++] = z;
    this.data[this.offset++] = 0; // padding
    return this;
  }

  /**
   * Add a vec4 (4 floats)
   */
  vec4(value: ReadonlyVec4): this {
    for (let i = 0; i < 4; i++) {
      this.data[this.offset++] = value[i];
    }
    return this;
  }

  /**
   * Add a mat4 (16 floats, column-major)
   */
  mat4(matrix: ReadonlyMat4): this {
    for (let i = 0; i < 16; i++) {
      this.data[this.offset++] = matrix[i];
    }
    return this;
  }

  /**
   * Add padding to align to vec4 boundary
   */
  alignVec4(): this {
    const remainder = this.offset % 4;
    if (remainder !== 0) {
      this.offset += 4 - remainder;
    }
    return this;
  }

  /**
   * Get the built data
   */
  build(): Float32Array {
    return this.data;
  }

  /**
   * Reset the builder for reuse
   */
  reset(): this {
    this.offset = 0;
    this.data.fill(0);
    return this;
  }
}
