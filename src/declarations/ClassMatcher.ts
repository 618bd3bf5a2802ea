/**
 * Class/struct opener matcher
 *
 * Recognizes `class Name ... {` and `struct Name ... {`, following base
 * lists across lines. Forward declarations produce no match.
 *
 * @since 2026-10-19
 */

import type { ClassDescriptor, MatchResult } from './types.js';
import { collapseWhitespace, isCommentStart, leadingWhitespace, stripTemplatePrefix } from './text-utils.js';

const CLASS_OPENER = /^(class|struct)\s+(?:(?:alignas\s*\([^)]*\)|\[\[[^\]]*\]\])\s+)*([A-Za-z_]\w*)(.*)$/;

type Scan = { kind: 'open'; text: string } | { kind: 'semicolon' } | { kind: 'none'; text: string };

/**
 * Classify one line of an opener: did we reach '{', a ';' first, or neither?
 */
function scanLine(text: string): Scan {
  const brace = text.indexOf('{');
  const semi = text.indexOf(';');
  if (semi !== -1 && (brace === -1 || semi < brace)) return { kind: 'semicolon' };
  if (brace !== -1) return { kind: 'open', text: text.slice(0, brace) };
  return { kind: 'none', text };
}

export function matchClass(lines: readonly string[], startIndex: number): MatchResult<ClassDescriptor> | undefined {
  const line = lines[startIndex];
  const trimmed = stripTemplatePrefix(line.trim());
  const match = CLASS_OPENER.exec(trimmed);
  if (!match) return undefined;

  const [, keyword, name, rest] = match;
  const classKind = keyword === 'struct' ? 'struct' : 'class';

  let header = '';
  let endIndex = startIndex;
  let scan = scanLine(rest);

  if (scan.kind === 'semicolon') return undefined;

  if (scan.kind === 'none') {
    header = scan.text;
    let found = false;
    for (let i = startIndex + 1; i < lines.length; i++) {
      const next = lines[i].trim();
      if (isCommentStart(next)) return undefined;

      scan = scanLine(next);
      if (scan.kind === 'semicolon') return undefined;
      header = `${header} ${scan.text}`;
      if (scan.kind === 'open') {
        endIndex = i;
        found = true;
        break;
      }
    }
    if (!found) return undefined;
  } else {
    header = scan.text;
  }

  // `struct Point p = {...}` and `struct tm *now(...)` are not definitions
  if (/[=()]/.test(header.replace(/alignas\s*\([^)]*\)/g, ''))) return undefined;

  const colon = header.search(/(?<!:):(?!:)/);
  const bases = colon === -1 ? '' : collapseWhitespace(header.slice(colon + 1).replace(/\\/g, ' '));

  return {
    descriptor: {
      kind: 'class',
      name,
      indentation: leadingWhitespace(line),
      classKind,
      bases,
    },
    endIndex,
  };
}
