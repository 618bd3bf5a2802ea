/**
 * Line helpers shared by the matchers and the scanner
 *
 * @since 2026-10-19
 */

export interface JoinedDeclaration {
  /** Trimmed physical lines joined with single spaces */
  text: string;

  /** Index of the line on which a terminator was found */
  endIndex: number;
}

/**
 * Leading spaces/tabs of a raw line
 */
export function leadingWhitespace(line: string): string {
  const match = /^[ \t]*/.exec(line);
  return match ? match[0] : '';
}

/**
 * Join trimmed lines from `startIndex` until the text contains one of the
 * terminators. `abort` may reject a continuation line (never the first one).
 */
export function joinUntil(
  lines: readonly string[],
  startIndex: number,
  terminators: readonly string[],
  abort?: (trimmed: string) => boolean
): JoinedDeclaration | undefined {
  let text = '';
  for (let i = startIndex; i < lines.length; i++) {
    const trimmed = lines[i].trim();
    if (i > startIndex && abort?.(trimmed)) return undefined;
    text = text ? `${text} ${trimmed}` : trimmed;
    if (terminators.some(t => trimmed.includes(t))) {
      return { text, endIndex: i };
    }
  }
  return undefined;
}

/**
 * Position of the earliest terminator, or -1
 */
export function firstIndexOf(text: string, terminators: readonly string[]): number {
  let first = -1;
  for (const t of terminators) {
    const index = text.indexOf(t);
    if (index !== -1 && (first === -1 || index < first)) first = index;
  }
  return first;
}

/**
 * Doc comment openers. Trailing member docs (`///<`, `/**<`) are not
 * included: they describe the previous declaration.
 */
export function isDocCommentStart(trimmed: string): boolean {
  if (isTrailingDocComment(trimmed)) return false;
  return trimmed.startsWith('/**') || trimmed.startsWith('///') || trimmed.startsWith('/*!') || trimmed.startsWith('//!');
}

export function isTrailingDocComment(trimmed: string): boolean {
  return trimmed.startsWith('///<') || trimmed.startsWith('/**<') || trimmed.startsWith('//!<') || trimmed.startsWith('/*!<');
}

export function isCommentStart(trimmed: string): boolean {
  return trimmed.startsWith('//') || trimmed.startsWith('/*');
}

/**
 * Remove a leading `template <...>` clause, honouring nested angle brackets
 */
export function stripTemplatePrefix(text: string): string {
  const match = /^template\s*</.exec(text);
  if (!match) return text;

  let depth = 0;
  for (let i = match[0].length - 1; i < text.length; i++) {
    const ch = text[i];
    if (ch === '<') depth++;
    else if (ch === '>') {
      depth--;
      if (depth === 0) return text.slice(i + 1).trim();
    }
  }
  return text;
}

/**
 * A line holding nothing but a template parameter clause
 */
export function isTemplateHeaderLine(trimmed: string): boolean {
  return /^template\s*</.test(trimmed) && stripTemplatePrefix(trimmed) === '';
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
