import type { CachedFragment } from './types';
import type { DefineSet } from './DefineSet';
import type { ShaderReference } from './ShaderReference';
import { ShaderRef, joinInclude, referenceKey } from './ShaderReference';
import { ShaderError } from './errors';

const INCLUDE_DIRECTIVE = '#include';
const IFDEF_DIRECTIVE = '#ifdef';
const IFNDEF_DIRECTIVE = '#ifndef';
const ENDIF_DIRECTIVE = '#endif';

const IDENTIFIER = /^[A-Za-z0-9_]*/;

interface DefineDirective {
  index: number;
  isIfdef: boolean;
}

/**
 * ShaderPreprocessor turns raw shader text into a CachedFragment.
 *
 * Pipeline:
 * 1. Strip `//` and `/* *\/` comments so directives inside them are inert
 * 2. Evaluate `#ifdef` / `#ifndef` ... `#endif` blocks against the define set
 * 3. Collect `#include "path"` / `#include <module>` targets and remove the directives
 *
 * Directive keywords are matched as literal substrings.
 */
export class ShaderPreprocessor {
  /**
   * Parse one unit of shader source.
   *
   * @param source - Raw shader text
   * @param parentDir - Directory that quoted includes are joined with
   * @param defines - Active flags
   */
  parse(source: string, parentDir: string | undefined, defines: DefineSet): CachedFragment {
    const uncommented = this.stripComments(source);
    const filtered = this.processDefines(uncommented, defines);
    return this.extractIncludes(filtered, parentDir);
  }

  // ===================== Comments =====================

  stripComments(source: string): string {
    let result = '';
    let rest = source;

    for (;;) {
      const line = rest.indexOf('//');
      const block = rest.indexOf('/*');

      if (line === -1 && block === -1) break;

      if (block === -1 || (line !== -1 && line < block)) {
        result += rest.slice(0, line);
        const newline = rest.indexOf('\n', line + 2);
        if (newline === -1) {
          rest = '';
          break;
        }
        // The line break itself stays
        rest = rest.slice(newline);
        continue;
      }

      result += rest.slice(0, block);
      const close = rest.indexOf('*/', block + 2);
      if (close === -1) {
        throw ShaderError.unclosedComment();
      }
      rest = rest.slice(close + 2);
    }

    return result + rest;
  }

  // ===================== Conditional compilation =====================

  processDefines(source: string, defines: DefineSet): string {
    let result = '';
    let rest = source;

    for (;;) {
      const directive = findDefineDirective(rest, 0);
      if (!directive) {
        result += rest;
        break;
      }

      result += rest.slice(0, directive.index);
      rest = rest
        .slice(directive.index + (directive.isIfdef ? IFDEF_DIRECTIVE.length : IFNDEF_DIRECTIVE.length))
        .trimStart();

      const name = IDENTIFIER.exec(rest)?.[0] ?? '';
      if (name === '') {
        throw ShaderError.invalidDefine(rest);
      }
      rest = rest.slice(name.length);

      const end = findMatchingEndif(rest);
      if (end === -1) {
        throw ShaderError.unclosedDirective(name);
      }

      if (defines.has(name) === directive.isIfdef) {
        result += this.processDefines(rest.slice(0, end), defines);
      }

      rest = rest.slice(end + ENDIF_DIRECTIVE.length);
    }

    return result;
  }

  // ===================== Includes =====================

  private extractIncludes(source: string, parentDir: string | undefined): CachedFragment {
    const includes: ShaderReference[] = [];
    const seen = new Set<string>();

    let result = '';
    let rest = source;

    for (;;) {
      const index = rest.indexOf(INCLUDE_DIRECTIVE);
      if (index === -1) {
        result += rest;
        break;
      }

      result += rest.slice(0, index);
      rest = rest.slice(index + INCLUDE_DIRECTIVE.length);

      const parsed = parseIncludeTarget(rest, parentDir);
      rest = parsed.rest;

      const key = referenceKey(parsed.reference);
      if (!seen.has(key)) {
        seen.add(key);
        includes.push(parsed.reference);
      }

      // A directive alone on its line takes the whole line with it
      const lineStart = result.lastIndexOf('\n') + 1;
      const lineEnd = rest.indexOf('\n');
      const before = result.slice(lineStart);
      const after = lineEnd === -1 ? rest : rest.slice(0, lineEnd);
      if (before.trim() === '' && after.trim() === '') {
        result = result.slice(0, lineStart);
        rest = lineEnd === -1 ? '' : rest.slice(lineEnd + 1);
      }
    }

    return { source: result, includes };
  }
}

function findDefineDirective(source: string, from: number): DefineDirective | null {
  const ifdef = source.indexOf(IFDEF_DIRECTIVE, from);
  const ifndef = source.indexOf(IFNDEF_DIRECTIVE, from);

  if (ifdef === -1 && ifndef === -1) return null;
  if (ifndef === -1 || (ifdef !== -1 && ifdef < ifndef)) {
    return { index: ifdef, isIfdef: true };
  }
  return { index: ifndef, isIfdef: false };
}

/**
 * Index of the `#endif` closing the block whose body starts at `source[0]`,
 * skipping over nested blocks. -1 when unbalanced.
 */
function findMatchingEndif(source: string): number {
  let depth = 0;
  let cursor = 0;

  for (;;) {
    const end = source.indexOf(ENDIF_DIRECTIVE, cursor);
    if (end === -1) return -1;

    const open = findDefineDirective(source, cursor);
    if (open && open.index < end) {
      depth++;
      cursor = open.index + (open.isIfdef ? IFDEF_DIRECTIVE.length : IFNDEF_DIRECTIVE.length);
      continue;
    }

    if (depth === 0) return end;
    depth--;
    cursor = end + ENDIF_DIRECTIVE.length;
  }
}

function parseIncludeTarget(
  source: string,
  parentDir: string | undefined,
): { reference: ShaderReference; rest: string } {
  const trimmed = source.trimStart();
  const open = trimmed.charAt(0);
  const close = open === '"' ? '"' : open === '<' ? '>' : '';

  if (close === '') {
    throw ShaderError.invalidInclude(trimmed);
  }

  const end = trimmed.indexOf(close, 1);
  if (end === -1) {
    throw ShaderError.invalidInclude(trimmed);
  }

  const target = trimmed.slice(1, end).trim();
  if (target === '') {
    throw ShaderError.invalidInclude(trimmed);
  }

  const reference = open === '"' ? joinInclude(target, parentDir) : ShaderRef.module(target);
  return { reference, rest: trimmed.slice(end + 1) };
}
