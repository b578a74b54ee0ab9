import { describe, it, expect, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { FileShaderIO, MemoryShaderIO } from './ShaderIO';

function createTempShaders(files: Record<string, string>): string {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'shader-io-test-'));
  for (const [filePath, content] of Object.entries(files)) {
    const fullPath = path.join(tmpDir, filePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content);
  }
  return tmpDir;
}

describe('FileShaderIO', () => {
  let tmpDir = '';

  afterEach(() => {
    if (tmpDir.includes('shader-io-test-')) {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
    vi.restoreAllMocks();
  });

  it('should read files relative to the root', () => {
    tmpDir = createTempShaders({ 'lib/util.wgsl': 'fn util() {}' });
    const io = new FileShaderIO(tmpDir);

    expect(io.read('lib/util.wgsl')).toBe('fn util() {}');
    expect(io.resolve('lib/util.wgsl')).toBe(path.join(tmpDir, 'lib', 'util.wgsl'));
  });

  it('should report modification times', () => {
    tmpDir = createTempShaders({ 'a.wgsl': 'a' });
    const io = new FileShaderIO(tmpDir);

    expect(io.lastModified('a.wgsl')).toBe(fs.statSync(path.join(tmpDir, 'a.wgsl')).mtimeMs);
  });

  it('should warn and return undefined for missing files', () => {
    tmpDir = createTempShaders({});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const io = new FileShaderIO(tmpDir);

    expect(io.lastModified('missing.wgsl')).toBeUndefined();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(() => io.read('missing.wgsl')).toThrow();
  });
});

describe('MemoryShaderIO', () => {
  it('should bump the modification stamp on every write', () => {
    const io = new MemoryShaderIO({ 'a.wgsl': 'a' });
    const before = io.lastModified('a.wgsl');

    io.write('a.wgsl', 'b');

    expect(io.lastModified('a.wgsl')).toBe(2);
    expect(before).toBe(1);
    expect(io.read('a.wgsl')).toBe('b');
  });

  it('should count reads per path', () => {
    const io = new MemoryShaderIO({ 'a.wgsl': 'a', 'b.wgsl': 'b' });
    io.read('a.wgsl');
    io.read('a.wgsl');
    io.read('b.wgsl');

    expect(io.getReadCount('a.wgsl')).toBe(2);
    expect(io.getReadCount()).toBe(3);
  });

  it('should fail on deleted paths', () => {
    const io = new MemoryShaderIO({ 'a.wgsl': 'a' });
    expect(io.delete('a.wgsl')).toBe(true);
    expect(() => io.read('a.wgsl')).toThrow('[MemoryShaderIO] No such shader: a.wgsl');
    expect(io.lastModified('a.wgsl')).toBeUndefined();
  });
});
