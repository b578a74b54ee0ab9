/**
 * GPUContext - WebGPU device handle shared by shader and binding caches
 * Wraps an acquired device (or anything shaped like one) and its queue
 */

import type { GPUDeviceLike, GPUQueueLike } from './types';

export interface GPUContextOptions {
  powerPreference?: GPUPowerPreference;
  requiredFeatures?: GPUFeatureName[];
  requiredLimits?: Record<string, number>;
  /** Device label for debugging */
  label?: string;
}

/**
 * Owns the device used to create shader modules, buffers and bind groups.
 * Constructed explicitly and passed to every cache that needs GPU access.
 */
export class GPUContext {
  private _device: GPUDeviceLike;
  private _lost = false;

  constructor(device: GPUDeviceLike) {
    this._device = device;
  }

  /**
   * Acquire an adapter and device from a WebGPU entry point
   * (`navigator.gpu` in a browser, a Dawn binding under Node)
   */
  static async create(gpu: GPU, options: GPUContextOptions = {}): Promise<GPUContext> {
    const adapter = await gpu.requestAdapter({
      powerPreference: options.powerPreference ?? 'high-performance',
    });

    if (!adapter) {
      throw new Error('[GPUContext] Failed to acquire WebGPU adapter');
    }

    const device = await adapter.requestDevice({
      label: options.label,
      requiredFeatures: options.requiredFeatures ?? [],
      requiredLimits: options.requiredLimits ?? {},
    });

    const ctx = new GPUContext(device);

    device.lost.then(
      (info) => {
        ctx._lost = true;
        console.error('[GPUContext] Device lost:', info.message);
      },
      (err: unknown) => console.error('[GPUContext] Device lost handler failed:', err),
    );

    return ctx;
  }

  get device(): GPUDeviceLike {
    return this._device;
  }

  get queue(): GPUQueueLike {
    return this._device.queue;
  }

  /** True once the underlying device reported loss */
  get isLost(): boolean {
    return this._lost;
  }

  /**
   * Create a shader module from WGSL source
   */
  createShaderModule(code: string, label?: string): GPUShaderModule {
    return this._device.createShaderModule({
      code,
      label: label ?? 'shader',
    });
  }
}
