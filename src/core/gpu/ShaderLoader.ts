/**
 * ShaderLoader - Built-in WGSL sources
 * Default shaders and the `core/` modules are read once from shaders/wgsl/
 */

import fs from 'fs';
import type { DefaultShader } from './shaders/composition/ShaderReference';

const WGSL_DIR = new URL('./shaders/wgsl/', import.meta.url);

/**
 * Files backing the built-in default shaders
 */
export const DefaultShaderFiles: Record<DefaultShader, string> = {
  vertex: 'default_vertex.wgsl',
  fragment: 'default_fragment.wgsl',
};

/**
 * Built-in modules, registered under these names by ShaderModuleRegistry.registerDefaults()
 */
export const CoreModuleNames = [
  'core/camera.wgsl',
  'core/mesh.wgsl',
  'core/vertex_output.wgsl',
  'core/unlit.wgsl',
] as const;

export type CoreModuleName = (typeof CoreModuleNames)[number];

/**
 * Source cache keyed by file name
 */
const sourceCache = new Map<string, string>();

function readWgsl(file: string): string {
  const cached = sourceCache.get(file);
  if (cached !== undefined) return cached;

  const source = fs.readFileSync(new URL(file, WGSL_DIR), 'utf8');
  sourceCache.set(file, source);
  return source;
}

/**
 * Get the source of a built-in default shader
 */
export function getDefaultShaderSource(shader: DefaultShader): string {
  return readWgsl(DefaultShaderFiles[shader]);
}

/**
 * Get the source of a built-in module
 */
export function getCoreModuleSource(name: CoreModuleName): string {
  return readWgsl(name);
}

/**
 * Clear the source cache
 */
export function clearShaderSourceCache(): void {
  sourceCache.clear();
}
