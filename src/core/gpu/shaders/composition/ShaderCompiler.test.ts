import { describe, it, expect } from 'vitest';
import { WgslShaderCompiler } from './ShaderCompiler';
import { shaderErrorKind } from '../../test/helpers';

const SOURCE = `
struct Params {
  scale: f32,
}

@group(0) @binding(1) var<uniform> params: Params;
@group(0) @binding(0) var<storage, read> values: array<f32>;
@group(1) @binding(1) var color_sampler: sampler;
@group(1) @binding(0) var color_texture: texture_2d<f32>;

@fragment
fn fs_main() -> @location(0) vec4f {
  let c = textureSample(color_texture, color_sampler, vec2f(0.5, 0.5));
  return c * params.scale * values[0];
}
`;

describe('WgslShaderCompiler', () => {
  const compiler = new WgslShaderCompiler();

  it('should reflect every global resource sorted by location', () => {
    const { bindings } = compiler.compile(SOURCE, 'wgsl', 'test');

    expect(bindings).toEqual([
      { name: 'values', group: 0, binding: 0, kind: 'storage-buffer' },
      { name: 'params', group: 0, binding: 1, kind: 'uniform-buffer' },
      { name: 'color_texture', group: 1, binding: 0, kind: 'texture' },
      { name: 'color_sampler', group: 1, binding: 1, kind: 'sampler' },
    ]);
  });

  it('should reflect nothing for a shader without resources', () => {
    expect(compiler.compile('fn helper() -> f32 { return 1.0; }', 'wgsl', 'test').bindings).toEqual([]);
  });

  it('should reject non-WGSL sources', () => {
    expect(shaderErrorKind(() => compiler.compile('void main() {}', 'glsl', 'test'))).toBe('ValidationError');
  });
});
