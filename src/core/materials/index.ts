/**
 * Sample binding consumers for the default shaders
 */

export { Camera } from './Camera';
export type { CameraOptions } from './Camera';
export { MeshTransform } from './MeshTransform';
export { UnlitMaterial } from './UnlitMaterial';
export type { UnlitMaterialOptions } from './UnlitMaterial';
