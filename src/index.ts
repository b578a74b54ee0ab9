/**
 * shader-weaver - WGSL shader composition and WebGPU binding cache
 */

export * from './core/gpu';
export * from './core/materials';
export { debounce } from './core/utils/debounce';
export type { Debounced } from './core/utils/debounce';
