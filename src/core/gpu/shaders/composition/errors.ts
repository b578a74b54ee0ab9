import type { ShaderReference } from './ShaderReference';
import { describeReference } from './ShaderReference';

export type ShaderErrorKind =
  | 'NoExtension'
  | 'UnknownExtension'
  | 'InvalidInclude'
  | 'UnclosedComment'
  | 'InvalidDefine'
  | 'UnclosedDirective'
  | 'InvalidModule'
  | 'CircularInclude'
  | 'BindingMismatch'
  | 'ValidationError'
  | 'IoError';

export interface ShaderErrorOptions {
  /** Shader source the error refers to */
  reference?: ShaderReference;
  /** Underlying collaborator error (IO, validator) */
  cause?: unknown;
}

/**
 * Failure while composing, compiling or reflecting one shader.
 * Aborts the requested shader only; cached state stays valid.
 */
export class ShaderError extends Error {
  readonly kind: ShaderErrorKind;
  readonly reference?: ShaderReference;

  constructor(kind: ShaderErrorKind, message: string, options: ShaderErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ShaderError';
    this.kind = kind;
    this.reference = options.reference;
  }

  static noExtension(path: string): ShaderError {
    return new ShaderError('NoExtension', `No extension found for path "${path}"`);
  }

  static unknownExtension(extension: string): ShaderError {
    return new ShaderError('UnknownExtension', `Unknown shader extension "${extension}"`);
  }

  static invalidInclude(near: string): ShaderError {
    return new ShaderError('InvalidInclude', `Invalid include near "${snippet(near)}"`);
  }

  static unclosedComment(): ShaderError {
    return new ShaderError('UnclosedComment', 'Unclosed comment');
  }

  static invalidDefine(near: string): ShaderError {
    return new ShaderError('InvalidDefine', `Missing define name near "${snippet(near)}"`);
  }

  static unclosedDirective(define: string): ShaderError {
    return new ShaderError('UnclosedDirective', `No matching #endif for "${define}"`);
  }

  static invalidModule(name: string): ShaderError {
    return new ShaderError('InvalidModule', `Invalid module "${name}"`);
  }

  static circularInclude(reference: ShaderReference): ShaderError {
    return new ShaderError('CircularInclude', `Circular include ${describeReference(reference)}`, {
      reference,
    });
  }

  static bindingMismatch(name: string, first: string, second: string): ShaderError {
    return new ShaderError(
      'BindingMismatch',
      `Binding "${name}" is declared at ${first} and at ${second}`,
    );
  }

  static validation(message: string, cause?: unknown): ShaderError {
    return new ShaderError('ValidationError', message, { cause });
  }

  static io(path: string, cause: unknown): ShaderError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ShaderError('IoError', `Failed to read "${path}": ${reason}`, { cause });
  }
}

/**
 * Programmer error in binding usage, e.g. drawing with a binding that was never set.
 */
export class BindingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BindingError';
  }
}

function snippet(source: string): string {
  const line = source.trimStart().split('\n', 1)[0] ?? '';
  return line.length > 40 ? `${line.slice(0, 40)}...` : line;
}
