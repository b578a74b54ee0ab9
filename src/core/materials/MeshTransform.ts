/**
 * MeshTransform - Model matrix bound as the `mesh` uniform
 */

import { mat4, quat } from 'gl-matrix';
import type { ReadonlyQuat, ReadonlyVec3 } from 'gl-matrix';
import { UniformBuilder } from '../gpu/GPUBuffer';
import { defineBindings } from '../gpu/bindings/BindingDeclaration';

export class MeshTransform {
  static readonly bindings = defineBindings<MeshTransform>()
    .uniform('mesh', (mesh) => mesh.uniformData(), { visibility: 'vertex' })
    .build();

  readonly matrix = mat4.create();
  private uniforms = new UniformBuilder(16);

  setTranslation(translation: ReadonlyVec3): this {
    mat4.fromTranslation(this.matrix, translation);
    return this;
  }

  /**
   * Replace the matrix with a translation, rotation and scale
   */
  setFromRotationTranslationScale(
    rotation: ReadonlyQuat = quat.create(),
    translation: ReadonlyVec3 = [0, 0, 0],
    scale: ReadonlyVec3 = [1, 1, 1],
  ): this {
    mat4.fromRotationTranslationScale(this.matrix, rotation, translation, scale);
    return this;
  }

  uniformData(): Float32Array {
    return this.uniforms.reset().mat4(this.matrix).build();
  }
}
