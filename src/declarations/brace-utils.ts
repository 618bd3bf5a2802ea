/**
 * Brace accounting
 *
 * Nesting is approximated by counting '{' and '}' characters per line.
 * Braces inside string/char literals and comments are counted too; callers
 * only go through these helpers.
 *
 * @since 2026-10-19
 */

export interface BraceCount {
  open: number;
  close: number;
}

export function countBraces(text: string): BraceCount {
  let open = 0;
  let close = 0;
  for (const ch of text) {
    if (ch === '{') open++;
    else if (ch === '}') close++;
  }
  return { open, close };
}

/**
 * Opening minus closing braces
 */
export function netBraces(text: string): number {
  const { open, close } = countBraces(text);
  return open - close;
}

/**
 * Net braces over an inclusive line range
 */
export function netBracesInRange(lines: readonly string[], start: number, end: number): number {
  let depth = 0;
  for (let i = start; i <= end && i < lines.length; i++) {
    depth += netBraces(lines[i]);
  }
  return depth;
}

/**
 * First line at or after `startIndex` containing '{'
 */
export function findOpeningLine(lines: readonly string[], startIndex: number): number | undefined {
  for (let i = startIndex; i < lines.length; i++) {
    if (lines[i].includes('{')) return i;
  }
  return undefined;
}

/**
 * Given the line holding an opening brace, find the line where the running
 * count returns to zero. Returns undefined for an unterminated block.
 */
export function findMatchingClose(lines: readonly string[], openIndex: number): number | undefined {
  let depth = 0;
  for (let i = openIndex; i < lines.length; i++) {
    depth += netBraces(lines[i]);
    if (depth <= 0) return i;
  }
  return undefined;
}

/**
 * Index of the ')' closing the '(' at `openIndex` within a single string,
 * or -1 when unbalanced
 */
export function findMatchingParen(text: string, openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < text.length; i++) {
    const ch = text[i];
    if (ch === '(') depth++;
    else if (ch === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Split on a separator that is not nested inside parentheses. Angle brackets
 * are not tracked, so template argument lists split as well.
 */
export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';
  for (const ch of text) {
    if (ch === '(') depth++;
    else if (ch === ')') depth = Math.max(0, depth - 1);

    if (ch === separator && depth === 0) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
}
