/**
 * Camera - View and projection state bound as the `camera` uniform
 */

import { mat4, vec3 } from 'gl-matrix';
import type { ReadonlyVec3 } from 'gl-matrix';
import { UniformBuilder } from '../gpu/GPUBuffer';
import { defineBindings } from '../gpu/bindings/BindingDeclaration';

export interface CameraOptions {
  /** Vertical field of view in radians */
  fov?: number;
  aspect?: number;
  near?: number;
  far?: number;
}

// Coordinate system: right-handed, camera looks down -Z
const UP: ReadonlyVec3 = [0, 1, 0];

export class Camera {
  static readonly bindings = defineBindings<Camera>()
    .uniform('camera', (camera) => camera.uniformData(), { visibility: 'vertex' })
    .build();

  readonly viewMatrix = mat4.create();
  readonly projectionMatrix = mat4.create();
  private viewProjection = mat4.create();
  private _position = vec3.create();
  private uniforms = new UniformBuilder(20);

  constructor(options: CameraOptions = {}) {
    const { fov = Math.PI / 4, aspect = 1, near = 0.1, far = 1000 } = options;
    mat4.perspective(this.projectionMatrix, fov, aspect, near, far);
  }

  get position(): ReadonlyVec3 {
    return this._position;
  }

  /**
   * Place the camera at `position` looking at `target`
   */
  lookAt(position: ReadonlyVec3, target: ReadonlyVec3): this {
    vec3.copy(this._position, position);
    mat4.lookAt(this.viewMatrix, position, target, UP);
    return this;
  }

  setPerspective(fov: number, aspect: number, near: number, far: number): this {
    mat4.perspective(this.projectionMatrix, fov, aspect, near, far);
    return this;
  }

  /**
   * view_proj (16 floats) followed by position (vec4)
   */
  uniformData(): Float32Array {
    mat4.multiply(this.viewProjection, this.projectionMatrix, this.viewMatrix);
    const [x, y, z] = this._position;
    return this.uniforms.reset().mat4(this.viewProjection).vec4([x, y, z, 1]).build();
  }
}
