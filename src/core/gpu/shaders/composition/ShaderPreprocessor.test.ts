import { describe, it, expect } from 'vitest';
import { ShaderPreprocessor } from './ShaderPreprocessor';
import { DefineSet } from './DefineSet';
import { ShaderRef, referenceKey } from './ShaderReference';
import { shaderErrorKind } from '../../test/helpers';

describe('ShaderPreprocessor', () => {
  const preprocessor = new ShaderPreprocessor();

  describe('stripComments', () => {
    it('should strip line comments and keep the line break', () => {
      expect(preprocessor.stripComments('a // note\nb')).toBe('a \nb');
      expect(preprocessor.stripComments('a // trailing')).toBe('a ');
    });

    it('should strip block comments', () => {
      expect(preprocessor.stripComments('a /* x\ny */b')).toBe('a b');
    });

    it('should handle whichever comment starts first', () => {
      expect(preprocessor.stripComments('x /* // */ y')).toBe('x  y');
      expect(preprocessor.stripComments('x // /* \ny')).toBe('x \ny');
    });

    it('should fail on an unterminated block comment', () => {
      expect(shaderErrorKind(() => preprocessor.stripComments('a /* b'))).toBe('UnclosedComment');
    });
  });

  describe('processDefines', () => {
    it('should keep #ifdef blocks only when the flag is set', () => {
      const source = '#ifdef A\nX\n#endif\nY';
      expect(preprocessor.processDefines(source, DefineSet.of('A'))).toBe('\nX\n\nY');
      expect(preprocessor.processDefines(source, DefineSet.EMPTY)).toBe('\nY');
    });

    it('should keep #ifndef blocks only when the flag is absent', () => {
      const source = '#ifndef A\nX\n#endif';
      expect(preprocessor.processDefines(source, DefineSet.EMPTY)).toBe('\nX\n');
      expect(preprocessor.processDefines(source, DefineSet.of('A'))).toBe('');
    });

    it('should evaluate nested blocks', () => {
      const source = '#ifdef A #ifdef B X #endif #endif';
      expect(preprocessor.processDefines(source, DefineSet.of('A'))).toBe('  ');
      expect(preprocessor.processDefines(source, DefineSet.of('A', 'B'))).toBe('  X  ');
      expect(preprocessor.processDefines(source, DefineSet.of('B'))).toBe('');
    });

    it('should skip nested blocks inside an inactive block', () => {
      const source = '#ifdef A\n#ifndef B\nX\n#endif\nY\n#endif\nZ';
      expect(preprocessor.processDefines(source, DefineSet.EMPTY)).toBe('\nZ');
    });

    it('should accept identifiers with digits and underscores', () => {
      expect(preprocessor.processDefines('#ifdef  MAX_LIGHTS_4\nX\n#endif', DefineSet.of('MAX_LIGHTS_4'))).toBe(
        '\nX\n',
      );
    });

    it('should fail on a missing identifier', () => {
      expect(shaderErrorKind(() => preprocessor.processDefines('#ifdef (A)\n#endif', DefineSet.EMPTY))).toBe(
        'InvalidDefine',
      );
    });

    it('should fail on a missing #endif', () => {
      expect(shaderErrorKind(() => preprocessor.processDefines('#ifdef A\nX', DefineSet.EMPTY))).toBe(
        'UnclosedDirective',
      );
    });
  });

  describe('parse', () => {
    it('should resolve quoted includes against the parent directory', () => {
      const fragment = preprocessor.parse('#include "common.wgsl"\nfn main() {}\n', 'shaders', DefineSet.EMPTY);

      expect(fragment.source).toBe('fn main() {}\n');
      expect(fragment.includes).toEqual([ShaderRef.path('shaders/common.wgsl')]);
    });

    it('should resolve angle includes as modules', () => {
      const fragment = preprocessor.parse('#include <core/camera.wgsl>\nX', undefined, DefineSet.EMPTY);

      expect(fragment.source).toBe('X');
      expect(fragment.includes).toEqual([ShaderRef.module('core/camera.wgsl')]);
    });

    it('should list each include once in first-seen order', () => {
      const fragment = preprocessor.parse(
        '#include <b>\n#include <a>\n#include <b>\nX',
        undefined,
        DefineSet.EMPTY,
      );

      expect(fragment.includes.map(referenceKey)).toEqual(['module:b', 'module:a']);
      expect(fragment.source).toBe('X');
    });

    it('should leave the rest of a line around an inline include', () => {
      const fragment = preprocessor.parse('let a = 1; #include <m> let b = 2;', undefined, DefineSet.EMPTY);
      expect(fragment.source).toBe('let a = 1;  let b = 2;');
    });

    it('should ignore includes in comments and inactive blocks', () => {
      const source = '// #include <a>\n/* #include <b> */#ifdef C\n#include <c>\n#endif\nX';
      const fragment = preprocessor.parse(source, undefined, DefineSet.EMPTY);

      expect(fragment.includes).toEqual([]);
      expect(fragment.source).toBe('\n\nX');
    });

    it('should take includes from active blocks', () => {
      const fragment = preprocessor.parse('#ifdef C\n#include <c>\n#endif\nX', undefined, DefineSet.of('C'));
      expect(fragment.includes).toEqual([ShaderRef.module('c')]);
    });

    it('should fail on malformed includes', () => {
      expect(shaderErrorKind(() => preprocessor.parse('#include common.wgsl', undefined, DefineSet.EMPTY))).toBe(
        'InvalidInclude',
      );
      expect(shaderErrorKind(() => preprocessor.parse('#include "common.wgsl', undefined, DefineSet.EMPTY))).toBe(
        'InvalidInclude',
      );
      expect(shaderErrorKind(() => preprocessor.parse('#include <>', undefined, DefineSet.EMPTY))).toBe(
        'InvalidInclude',
      );
    });
  });
});
