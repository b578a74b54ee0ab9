import { ShaderError } from '../shaders/composition/errors';
import type { ShaderErrorKind } from '../shaders/composition/errors';

/**
 * Run `fn` and return the ShaderError it throws; fails if it throws nothing or something else
 */
export function captureShaderError(fn: () => unknown): ShaderError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ShaderError) return err;
    throw err;
  }
  throw new Error('Expected a ShaderError to be thrown');
}

export function shaderErrorKind(fn: () => unknown): ShaderErrorKind {
  return captureShaderError(fn).kind;
}
