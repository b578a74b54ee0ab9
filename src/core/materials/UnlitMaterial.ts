/**
 * UnlitMaterial - Flat color material with an optional base color texture
 *
 * The texture and sampler bindings only exist in the TEXTURED variant of the
 * default fragment shader; without it the layout drops them.
 */

import { vec4 } from 'gl-matrix';
import type { ReadonlyVec4 } from 'gl-matrix';
import type { SharedSampler, SharedTextureView } from '../gpu/GPUTexture';
import { UniformBuilder } from '../gpu/GPUBuffer';
import { defineBindings } from '../gpu/bindings/BindingDeclaration';

export interface UnlitMaterialOptions {
  baseColor?: ReadonlyVec4;
  texture?: SharedTextureView | null;
  sampler?: SharedSampler | null;
}

export class UnlitMaterial {
  static readonly bindings = defineBindings<UnlitMaterial>()
    .uniform('material', (material) => material.uniformData(), { visibility: 'fragment' })
    .texture('base_color_texture', (material) => material.texture, { visibility: 'fragment' })
    .sampler('base_color_sampler', (material) => material.sampler, { visibility: 'fragment' })
    .build();

  readonly baseColor = vec4.fromValues(1, 1, 1, 1);
  /** null binds a white placeholder */
  texture: SharedTextureView | null;
  /** null binds the shared linear sampler */
  sampler: SharedSampler | null;
  private uniforms = new UniformBuilder(4);

  constructor(options: UnlitMaterialOptions = {}) {
    if (options.baseColor) vec4.copy(this.baseColor, options.baseColor);
    this.texture = options.texture ?? null;
    this.sampler = options.sampler ?? null;
  }

  setBaseColor(r: number, g: number, b: number, a = 1): this {
    vec4.set(this.baseColor, r, g, b, a);
    return this;
  }

  /**
   * Defines selecting the shader variant for this material
   */
  defines(): string[] {
    return this.texture ? ['TEXTURED'] : [];
  }

  uniformData(): Float32Array {
    return this.uniforms.reset().vec4(this.baseColor).build();
  }
}
