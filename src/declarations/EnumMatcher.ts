/**
 * Enum matcher
 *
 * `enum [class|struct] Name [: underlying] {`. Anonymous and opaque enums
 * produce no match.
 *
 * @since 2026-10-19
 */

import type { EnumDescriptor, MatchResult } from './types.js';
import { collapseWhitespace, firstIndexOf, joinUntil, leadingWhitespace } from './text-utils.js';

const ENUM_KEYWORD = /^(?:typedef\s+)?enum\b/;
const NAMED_ENUM = /^(?:typedef\s+)?enum\s+(class\s+|struct\s+)?(?:\[\[[^\]]*\]\]\s+)?([A-Za-z_]\w*)\s*(?::\s*([^{]+?))?\s*\{/;

export function isEnumOpener(trimmed: string): boolean {
  return ENUM_KEYWORD.test(trimmed);
}

export function matchEnum(lines: readonly string[], startIndex: number): MatchResult<EnumDescriptor> | undefined {
  const line = lines[startIndex];
  if (!isEnumOpener(line.trim())) return undefined;

  const joined = joinUntil(lines, startIndex, ['{', ';']);
  if (!joined) return undefined;

  // `enum class Color : int;` is an opaque declaration
  const terminator = firstIndexOf(joined.text, ['{', ';']);
  if (joined.text[terminator] !== '{') return undefined;

  const match = NAMED_ENUM.exec(joined.text);
  if (!match) return undefined;

  const [, scopedKeyword, name, underlying] = match;
  if (name === 'class' || name === 'struct') return undefined;

  return {
    descriptor: {
      kind: 'enum',
      name,
      indentation: leadingWhitespace(line),
      isScoped: scopedKeyword !== undefined,
      underlyingType: underlying ? collapseWhitespace(underlying) : undefined,
    },
    endIndex: joined.endIndex,
  };
}
