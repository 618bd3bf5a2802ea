/**
 * Function matcher
 *
 * Recognizes free functions, methods, constructors, destructors, operator
 * overloads and out-of-class definitions (`Scope::name`). The signature is
 * joined across lines until ';' or '{' and then analysed as one string.
 *
 * Classification of special members depends on the enclosing class passed
 * in the match context, or on the definition's own qualifier.
 *
 * @since 2026-10-19
 */

import type {
  FunctionDefinition,
  FunctionDescriptor,
  MatchContext,
  MatchResult,
  ParameterDecl,
} from './types.js';
import { findMatchingParen, splitTopLevel } from './brace-utils.js';
import {
  collapseWhitespace,
  escapeRegExp,
  firstIndexOf,
  isCommentStart,
  joinUntil,
  leadingWhitespace,
  stripTemplatePrefix,
} from './text-utils.js';

// ============================================================================
// Patterns
// ============================================================================

/**
 * Name followed by '('. Operators come first so `operator()` is not read as
 * a plain identifier named "operator".
 */
const NAME_PATTERN = new RegExp(
  '(?:^|[\\s*&])' +
  '(' +
    '(?:[A-Za-z_]\\w*(?:<[^<>()]*>)?::)*' +
    '(?:operator\\s*(?:\\(\\)|\\[\\]|(?:new|delete)(?:\\s*\\[\\])?|[^\\s\\w()]+|\\s+[A-Za-z_][\\w:<>]*(?:\\s*[*&]+)?)' +
    '|~?[A-Za-z_]\\w*)' +
  ')' +
  '\\s*\\('
);

const QUALIFIER_PATTERN = /^((?:[A-Za-z_]\w*(?:<[^<>()]*>)?::)*)(.*)$/;

const ASSIGNMENT_OPERATOR = /\boperator\s*=(?!=)/;

/**
 * Storage and qualifier keywords removed from return types
 */
const RETURN_TYPE_NOISE =
  /\b(?:virtual|inline|explicit|constexpr|consteval|static|friend|mutable|volatile|register|extern|thread_local|auto|typename|override|final)\b/g;

const ACCESS_PREFIX = /^(?:public|private|protected)\s*:\s*/;

/**
 * Identifiers followed by '(' that never name a function
 */
const NON_FUNCTION_NAMES = new Set([
  'if', 'for', 'while', 'switch', 'catch', 'return', 'sizeof', 'alignof',
  'alignas', 'decltype', 'static_assert', 'typeid', 'new', 'delete', 'throw',
  'else', 'do', 'case', 'defined', 'noexcept', 'requires', 'co_return',
  'co_await', 'co_yield', 'goto', 'static_cast', 'dynamic_cast',
  'const_cast', 'reinterpret_cast',
]);

/**
 * Leading words of statements and non-function declarations
 */
const STATEMENT_START = /^(?:return|else|case|goto|throw|delete|using|typedef|namespace|public|private|protected)\b/;

/**
 * Words that can end a parameter type, so a parameter ending in one of
 * them is unnamed
 */
const TYPE_WORDS = new Set([
  'int', 'char', 'short', 'long', 'float', 'double', 'bool', 'void',
  'unsigned', 'signed', 'const', 'volatile', 'auto', 'wchar_t', 'char8_t',
  'char16_t', 'char32_t',
]);

const NAMED_PARAMETER = /^(.*[\s*&])([A-Za-z_]\w*)((?:\s*\[[^\]]*\])*)$/;

// ============================================================================
// Parameters
// ============================================================================

export function parseParameter(raw: string): ParameterDecl | undefined {
  const text = collapseWhitespace(raw.replace(/\s*=[\s\S]*$/, ''));
  if (!text || text === 'void' || text === '...') return undefined;

  const match = NAMED_PARAMETER.exec(text);
  if (!match) return { type: text, name: '' };

  const [, typePart, name, arraySuffix] = match;
  const type = typePart.trim();
  if (!type || TYPE_WORDS.has(name) || type.endsWith('::') || type.endsWith(',')) {
    return { type: text, name: '' };
  }

  return { type: `${type}${arraySuffix.replace(/\s+/g, '')}`, name };
}

export function parseParameterList(text: string): ParameterDecl[] {
  if (!text.trim()) return [];

  const parameters: ParameterDecl[] = [];
  for (const part of splitTopLevel(text, ',')) {
    const parameter = parseParameter(part);
    if (parameter) parameters.push(parameter);
  }
  return parameters;
}

// ============================================================================
// Special members
// ============================================================================

const TEMPLATE_ARGS = '(?:\\s*<[^<>]*>)?';

function isCopyParameter(type: string, className: string): boolean {
  const cls = escapeRegExp(className) + TEMPLATE_ARGS;
  return new RegExp(`^(?:const\\s+${cls}|${cls}\\s+const)\\s*&$`).test(collapseWhitespace(type));
}

function isMoveParameter(type: string, className: string): boolean {
  const cls = escapeRegExp(className) + TEMPLATE_ARGS;
  return new RegExp(`^${cls}\\s*&&$`).test(collapseWhitespace(type));
}

type AssignmentKind = 'copy' | 'move';

/**
 * Only copy and move assignment of the owning class are accepted; any
 * other `operator=` is left undocumented.
 */
function classifyAssignment(decl: string, className: string | undefined): AssignmentKind | undefined {
  if (!className) return undefined;

  const cls = escapeRegExp(className) + TEMPLATE_ARGS;
  const copy = new RegExp(`operator\\s*=\\s*\\(\\s*(?:const\\s+${cls}|${cls}\\s+const)\\s*&(?!&)`);
  const move = new RegExp(`operator\\s*=\\s*\\(\\s*${cls}\\s*&&`);

  if (copy.test(decl)) return 'copy';
  if (move.test(decl)) return 'move';
  return undefined;
}

// ============================================================================
// Trailing qualifiers
// ============================================================================

interface TrailingQualifiers {
  isConst: boolean;
  isNoexcept: boolean;
  throwSpec?: string[];
  trailingReturn?: string;
}

function parseQualifiers(tail: string): TrailingQualifiers {
  // Drop a constructor's member initializer list
  const initializer = tail.search(/(?<!:):(?!:)/);
  let qualifiers = initializer === -1 ? tail : tail.slice(0, initializer);

  let trailingReturn: string | undefined;
  const arrow = qualifiers.indexOf('->');
  if (arrow !== -1) {
    trailingReturn = collapseWhitespace(qualifiers.slice(arrow + 2).replace(/=\s*(?:0|default|delete)\s*$/, ''));
    qualifiers = qualifiers.slice(0, arrow);
  }

  const throwMatch = /\bthrow\s*\(([^)]*)\)/.exec(qualifiers);
  const throwSpec = throwMatch
    ? throwMatch[1].split(',').map(entry => entry.trim()).filter(entry => entry.length > 0)
    : undefined;

  return {
    isConst: /\bconst\b/.test(qualifiers),
    isNoexcept: /\bnoexcept\b(?!\s*\(\s*false\s*\))/.test(qualifiers),
    throwSpec,
    trailingReturn: trailingReturn || undefined,
  };
}

function classifyDefinition(terminator: string, tail: string): FunctionDefinition {
  if (terminator === '{') return 'body';
  if (/=\s*0\s*$/.test(tail)) return 'pure';
  if (/=\s*default\s*$/.test(tail)) return 'defaulted';
  if (/=\s*delete\s*$/.test(tail)) return 'deleted';
  return 'declaration';
}

function cleanReturnType(prefix: string): string {
  return collapseWhitespace(prefix.replace(RETURN_TYPE_NOISE, ' '));
}

/**
 * Continuation lines that end a signature search: comments, preprocessor
 * lines and access markers never belong to a declaration above them
 */
function abortContinuation(trimmed: string): boolean {
  return isCommentStart(trimmed) || trimmed.startsWith('#') || ACCESS_PREFIX.test(trimmed);
}

function containsComment(text: string): boolean {
  return text.includes('/*') || text.includes('//');
}

// ============================================================================
// Matcher
// ============================================================================

export function matchFunction(
  lines: readonly string[],
  startIndex: number,
  context: MatchContext = {}
): MatchResult<FunctionDescriptor> | undefined {
  const line = lines[startIndex];
  const joined = joinUntil(lines, startIndex, [';', '{'], abortContinuation);
  if (!joined) return undefined;

  const cut = firstIndexOf(joined.text, [';', '{']);
  const terminator = joined.text[cut];
  let decl = joined.text.slice(0, cut).trim().replace(ACCESS_PREFIX, '');
  decl = stripTemplatePrefix(decl).replace(/\[\[[^\]]*\]\]\s*/g, '').trim();
  if (!decl || STATEMENT_START.test(decl) || decl.startsWith('#')) return undefined;

  const nameMatch = NAME_PATTERN.exec(decl);
  if (!nameMatch) return undefined;

  const qualified = nameMatch[1];
  const nameStart = nameMatch[0].startsWith(qualified) ? nameMatch.index : nameMatch.index + 1;
  const openParen = nameMatch.index + nameMatch[0].length - 1;
  const closeParen = findMatchingParen(decl, openParen);
  if (closeParen === -1) return undefined;

  const qualifierMatch = QUALIFIER_PATTERN.exec(qualified);
  const scopePath = qualifierMatch ? qualifierMatch[1].replace(/::$/, '') : '';
  const name = collapseWhitespace(qualifierMatch ? qualifierMatch[2] : qualified);
  if (NON_FUNCTION_NAMES.has(name)) return undefined;

  const prefix = decl.slice(0, nameStart).trim();
  if (/[=(){}"'.]|->/.test(prefix) || STATEMENT_START.test(prefix) || containsComment(prefix)) return undefined;

  const scopeClass = scopePath ? scopePath.split('::').pop()?.replace(/<.*$/, '') : undefined;
  const ownerClass = context.currentClass ?? scopeClass;

  let assignment: AssignmentKind | undefined;
  if (ASSIGNMENT_OPERATOR.test(decl)) {
    assignment = classifyAssignment(decl, ownerClass);
    if (!assignment) return undefined;
  }

  const isDestructor = ownerClass !== undefined && name === `~${ownerClass}`;
  const isConstructor = ownerClass !== undefined && name === ownerClass;
  const isConversion = /^operator\s+\w/.test(name);

  const tail = decl.slice(closeParen + 1);
  const qualifiers = parseQualifiers(tail);

  let returnType = cleanReturnType(prefix);
  if (!returnType && qualifiers.trailingReturn) {
    returnType = qualifiers.trailingReturn;
  }
  if (containsComment(returnType)) return undefined;
  // A bare call such as `DECLARE_THING(Foo)` has no return type
  if (!returnType && !isConstructor && !isDestructor && !isConversion) return undefined;

  const parameters = parseParameterList(decl.slice(openParen + 1, closeParen));
  const single = parameters.length === 1 ? parameters[0] : undefined;

  return {
    descriptor: {
      kind: 'function',
      name,
      indentation: leadingWhitespace(line),
      returnType,
      parameters,
      scope: scopePath || undefined,
      ownerClass,
      definition: classifyDefinition(terminator, tail.trim()),
      isConst: qualifiers.isConst,
      isStatic: /\bstatic\b/.test(prefix),
      isNoexcept: qualifiers.isNoexcept,
      throwSpec: qualifiers.throwSpec,
      isConstructor,
      isDestructor,
      isCopyConstructor: isConstructor && single !== undefined && ownerClass !== undefined && isCopyParameter(single.type, ownerClass),
      isMoveConstructor: isConstructor && single !== undefined && ownerClass !== undefined && isMoveParameter(single.type, ownerClass),
      isCopyAssignment: assignment === 'copy',
      isMoveAssignment: assignment === 'move',
    },
    endIndex: joined.endIndex,
  };
}
