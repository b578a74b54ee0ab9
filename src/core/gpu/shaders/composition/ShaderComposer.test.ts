import { describe, it, expect } from 'vitest';
import { ShaderComposer } from './ShaderComposer';
import { ShaderFragmentCache } from './ShaderFragmentCache';
import { ShaderModuleRegistry } from './ShaderModuleRegistry';
import { MemoryShaderIO } from './ShaderIO';
import { DefineSet } from './DefineSet';
import { ShaderRef, referenceKey } from './ShaderReference';
import { captureShaderError, shaderErrorKind } from '../../test/helpers';

function createComposer(files: Record<string, string>, modules: Record<string, string> = {}) {
  const io = new MemoryShaderIO(files);
  const registry = new ShaderModuleRegistry();
  for (const [name, source] of Object.entries(modules)) {
    registry.register(name, source);
  }
  const fragments = new ShaderFragmentCache({ io, registry });
  return { io, fragments, composer: new ShaderComposer(fragments) };
}

describe('ShaderComposer', () => {
  it('should emit an included module before the including text', () => {
    const { composer } = createComposer({ 'main.wgsl': 'A\n#include <m>\nB\n' }, { m: 'M' });

    const composed = composer.compose(ShaderRef.path('main.wgsl'), DefineSet.EMPTY);

    expect(composed.source).toBe('M\nA\nB\n');
    expect(composed.language).toBe('wgsl');
    expect(composed.includes.map(referenceKey)).toEqual(['module:m', 'path:main.wgsl']);
  });

  it('should emit a shared dependency exactly once', () => {
    const { composer } = createComposer(
      {
        'main.wgsl': '#include "left.wgsl"\n#include "right.wgsl"\nM',
        'left.wgsl': '#include <shared>\nL',
        'right.wgsl': '#include <shared>\nR',
      },
      { shared: 'S' },
    );

    const composed = composer.compose(ShaderRef.path('main.wgsl'), DefineSet.EMPTY);

    expect(composed.source).toBe('S\nR\nL\nM');
    expect(composed.includes.map(referenceKey)).toEqual([
      'module:shared',
      'path:right.wgsl',
      'path:left.wgsl',
      'path:main.wgsl',
    ]);
  });

  it('should resolve relative includes from the including file', () => {
    const { composer } = createComposer({
      'shaders/main.wgsl': '#include "lib/util.wgsl"\nmain',
      'shaders/lib/util.wgsl': '#include "../common.wgsl"\nutil\n',
      'shaders/common.wgsl': 'common\n',
    });

    const composed = composer.compose(ShaderRef.path('shaders/main.wgsl'), DefineSet.EMPTY);
    expect(composed.source).toBe('common\nutil\nmain');
  });

  it('should only follow includes of active blocks', () => {
    const { composer } = createComposer(
      { 'main.wgsl': '#ifdef SHADOWS\n#include <shadows>\n#endif\nmain' },
      { shadows: 'shadows\n' },
    );

    const root = ShaderRef.path('main.wgsl');
    expect(composer.compose(root, DefineSet.EMPTY).source).toBe('\nmain');
    expect(composer.compose(root, DefineSet.of('SHADOWS')).source).toBe('shadows\n\n\nmain');
  });

  it('should fail on a file including itself', () => {
    const { composer } = createComposer({ 'main.wgsl': '#include "main.wgsl"\nX' });

    const error = captureShaderError(() => composer.compose(ShaderRef.path('main.wgsl'), DefineSet.EMPTY));
    expect(error.kind).toBe('CircularInclude');
    expect(error.reference).toEqual(ShaderRef.path('main.wgsl'));
  });

  it('should fail on an include cycle between files', () => {
    const { composer } = createComposer({
      'a.wgsl': '#include "b.wgsl"\nA',
      'b.wgsl': '#include "a.wgsl"\nB',
    });

    const error = captureShaderError(() => composer.compose(ShaderRef.path('a.wgsl'), DefineSet.EMPTY));
    expect(error.kind).toBe('CircularInclude');
    expect(error.reference).toEqual(ShaderRef.path('a.wgsl'));
  });

  it('should determine the language from the root', () => {
    const { composer } = createComposer({ 'main': 'X', 'main.frag': 'X', 'main.txt': 'X' });

    expect(composer.compose(ShaderRef.path('main.frag'), DefineSet.EMPTY).language).toBe('glsl');
    expect(shaderErrorKind(() => composer.compose(ShaderRef.path('main'), DefineSet.EMPTY))).toBe('NoExtension');
    expect(shaderErrorKind(() => composer.compose(ShaderRef.path('main.txt'), DefineSet.EMPTY))).toBe(
      'UnknownExtension',
    );
  });

  it('should fail on an unregistered module', () => {
    const { composer } = createComposer({ 'main.wgsl': '#include <missing>\nX' });
    expect(shaderErrorKind(() => composer.compose(ShaderRef.path('main.wgsl'), DefineSet.EMPTY))).toBe(
      'InvalidModule',
    );
  });

  it('should wrap read failures with their cause', () => {
    const { composer } = createComposer({ 'main.wgsl': '#include "missing.wgsl"\nX' });

    const error = captureShaderError(() => composer.compose(ShaderRef.path('main.wgsl'), DefineSet.EMPTY));
    expect(error.kind).toBe('IoError');
    expect(error.cause).toBeInstanceOf(Error);
    expect(error.message).toBe('Failed to read "missing.wgsl": [MemoryShaderIO] No such shader: missing.wgsl');
  });
});
