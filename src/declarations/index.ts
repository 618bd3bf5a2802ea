/**
 * Declaration Matchers
 *
 * Line-oriented recognizers for C++ declarations.
 *
 * @since 2026-10-19
 */

export { matchClass } from './ClassMatcher.js';
export { matchEnum, isEnumOpener } from './EnumMatcher.js';
export { matchFunction, parseParameter, parseParameterList } from './FunctionMatcher.js';
export { matchVariable } from './VariableMatcher.js';
export {
  countBraces,
  netBraces,
  netBracesInRange,
  findOpeningLine,
  findMatchingClose,
  findMatchingParen,
  splitTopLevel,
} from './brace-utils.js';
export type { BraceCount } from './brace-utils.js';
export {
  leadingWhitespace,
  joinUntil,
  firstIndexOf,
  isDocCommentStart,
  isTrailingDocComment,
  isCommentStart,
  isTemplateHeaderLine,
  stripTemplatePrefix,
  collapseWhitespace,
  escapeRegExp,
} from './text-utils.js';
export type { JoinedDeclaration } from './text-utils.js';
export type {
  DeclarationKind,
  TestDialectTag,
  ClassDescriptor,
  ParameterDecl,
  FunctionDefinition,
  FunctionDescriptor,
  EnumDescriptor,
  VariableDescriptor,
  TestCaseDescriptor,
  DeclarationDescriptor,
  MatchResult,
  MatchContext,
} from './types.js';
