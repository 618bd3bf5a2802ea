/**
 * Variable matcher
 *
 * Member and namespace-scope variables: `[specifiers] type name [= value];`.
 * Anything that looks like a call, a body or a type declaration is left to
 * the other matchers or passed through.
 *
 * @since 2026-10-19
 */

import type { MatchResult, VariableDescriptor } from './types.js';
import { collapseWhitespace, isCommentStart, joinUntil, leadingWhitespace } from './text-utils.js';

const SKIP_PREFIXES = [
  'class ', 'struct ', 'enum ', 'union ', 'namespace ', 'using ', 'typedef ',
  'template', 'friend ', 'public:', 'private:', 'protected:', 'return ',
  'static_assert', 'case ', 'default:', 'goto ', 'delete ', 'throw ', '#',
];

const SPECIFIERS = /\b(?:static|constexpr|constinit|mutable|inline|extern|thread_local)\b/g;

const VARIABLE_PATTERN = new RegExp(
  '^((?:(?:static|constexpr|constinit|mutable|inline|extern|thread_local)\\s+)*)' +
  '(.+?)\\s*?' +
  '(\\s[*&]*|[*&]+)' +
  '([A-Za-z_]\\w*)' +
  '\\s*((?:\\[[^\\]]*\\])*)' +
  '\\s*(?:\\{[^{}]*\\})?' +
  '\\s*(?:=[\\s\\S]*)?$'
);

const ACCESS_MARKER = /^(?:public|private|protected)\s*:/;

const NON_VARIABLE_NAMES = new Set(['return', 'delete', 'throw', 'goto', 'else', 'break', 'continue', 'const']);

function hasSkipPrefix(text: string): boolean {
  return SKIP_PREFIXES.some(prefix => text.startsWith(prefix));
}

/**
 * Braces and parentheses exclude a line unless it also has ';' but no '='
 */
function looksLikeCode(text: string): boolean {
  return /[{}()]/.test(text) && !(text.includes(';') && !text.includes('='));
}

function abortContinuation(trimmed: string): boolean {
  return /[{}]/.test(trimmed) || ACCESS_MARKER.test(trimmed) || trimmed.startsWith('#') || isCommentStart(trimmed);
}

export function matchVariable(lines: readonly string[], startIndex: number): MatchResult<VariableDescriptor> | undefined {
  const line = lines[startIndex];
  const trimmed = line.trim();
  if (!trimmed || looksLikeCode(trimmed) || hasSkipPrefix(trimmed) || isCommentStart(trimmed)) return undefined;

  const joined = joinUntil(lines, startIndex, [';'], abortContinuation);
  if (!joined) return undefined;

  const decl = joined.text.slice(0, joined.text.indexOf(';')).trim();
  if (!decl || hasSkipPrefix(decl) || /[()]/.test(decl)) return undefined;

  const match = VARIABLE_PATTERN.exec(decl);
  if (!match) return undefined;

  const [, specifiers, typePart, pointer, name, arraySuffix] = match;
  if (NON_VARIABLE_NAMES.has(name) || typePart.endsWith(',') || /[="]/.test(typePart) || /^(?:return|else)\b/.test(typePart)) {
    return undefined;
  }

  const qualifiers = `${specifiers} ${typePart}`;
  const type = collapseWhitespace(`${typePart.replace(SPECIFIERS, ' ')}${pointer.trim()}${arraySuffix}`);
  if (!type) return undefined;

  return {
    descriptor: {
      kind: 'variable',
      name,
      indentation: leadingWhitespace(line),
      type,
      isStatic: /\bstatic\b/.test(qualifiers),
      isConstexpr: /\bconstexpr\b/.test(qualifiers),
      isMutable: /\bmutable\b/.test(qualifiers),
    },
    endIndex: joined.endIndex,
  };
}
