import { describe, it, expect } from 'vitest';
import {
  ShaderRef,
  joinInclude,
  parentDirectory,
  referenceKey,
  referenceLanguage,
  referencesEqual,
} from './ShaderReference';
import { captureShaderError, shaderErrorKind } from '../../test/helpers';

describe('ShaderReference', () => {
  describe('referenceKey', () => {
    it('should render a canonical key per kind', () => {
      expect(referenceKey(ShaderRef.default('vertex'))).toBe('default:vertex');
      expect(referenceKey(ShaderRef.path('shaders\\pbr\\main.wgsl'))).toBe('path:shaders/pbr/main.wgsl');
      expect(referenceKey(ShaderRef.module('core/camera.wgsl'))).toBe('module:core/camera.wgsl');
    });

    it('should compare references by key', () => {
      expect(referencesEqual(ShaderRef.path('a/./b.wgsl'), ShaderRef.path('a/b.wgsl'))).toBe(true);
      expect(referencesEqual(ShaderRef.path('a.wgsl'), ShaderRef.module('a.wgsl'))).toBe(false);
    });
  });

  describe('paths', () => {
    it('should expose the directory of path references only', () => {
      expect(parentDirectory(ShaderRef.path('shaders/pbr/main.wgsl'))).toBe('shaders/pbr');
      expect(parentDirectory(ShaderRef.module('core/camera.wgsl'))).toBeUndefined();
      expect(parentDirectory(ShaderRef.default('fragment'))).toBeUndefined();
    });

    it('should join quoted includes with the parent directory', () => {
      expect(joinInclude('../common.wgsl', 'shaders/pbr')).toEqual(ShaderRef.path('shaders/common.wgsl'));
      expect(joinInclude('common.wgsl', '.')).toEqual(ShaderRef.path('common.wgsl'));
      expect(joinInclude('common.wgsl', undefined)).toEqual(ShaderRef.path('common.wgsl'));
    });
  });

  describe('referenceLanguage', () => {
    it('should map extensions to languages', () => {
      expect(referenceLanguage(ShaderRef.path('main.wgsl'))).toBe('wgsl');
      expect(referenceLanguage(ShaderRef.path('main.glsl'))).toBe('glsl');
      expect(referenceLanguage(ShaderRef.path('main.vert'))).toBe('glsl');
      expect(referenceLanguage(ShaderRef.path('main.frag'))).toBe('glsl');
      expect(referenceLanguage(ShaderRef.module('lib/noise.comp'))).toBe('glsl');
    });

    it('should treat built-in shaders as WGSL', () => {
      expect(referenceLanguage(ShaderRef.default('vertex'))).toBe('wgsl');
    });

    it('should fail without an extension', () => {
      expect(shaderErrorKind(() => referenceLanguage(ShaderRef.path('shaders/main')))).toBe('NoExtension');
    });

    it('should fail on an unknown extension', () => {
      const error = captureShaderError(() => referenceLanguage(ShaderRef.path('main.hlsl')));
      expect(error.kind).toBe('UnknownExtension');
      expect(error.message).toBe('Unknown shader extension "hlsl"');
    });
  });
});
