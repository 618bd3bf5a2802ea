/**
 * Structural Scanner
 *
 * Walks a file line by line, tries the declaration matchers in priority
 * order and splices a synthesized comment above every declaration that has
 * none. Lines that are not recognized pass through untouched.
 *
 * Two walks share the line handling:
 * - regular files: top-level loop plus a class-body sub-loop that recurses
 *   for nested classes; function and enum bodies pass through verbatim
 * - test files: only test cases are documented, suites are tracked for the
 *   grouping line of each comment
 *
 * @since 2026-10-19
 */

import type { DeclarationDescriptor, TestDialectTag } from '../declarations/types.js';
import { matchClass } from '../declarations/ClassMatcher.js';
import { isEnumOpener, matchEnum } from '../declarations/EnumMatcher.js';
import { matchFunction } from '../declarations/FunctionMatcher.js';
import { matchVariable } from '../declarations/VariableMatcher.js';
import { findMatchingClose, netBraces, netBracesInRange } from '../declarations/brace-utils.js';
import { isDocCommentStart, leadingWhitespace, stripTemplatePrefix } from '../declarations/text-utils.js';
import { synthesizeComment, DEFAULT_BASE_EXCEPTION } from '../comments/CommentSynthesizer.js';
import { defaultTestFrameworkAnalyzer } from '../testing/TestFrameworkAnalyzer.js';
import type { TestFrameworkAnalyzer } from '../testing/TestFrameworkAnalyzer.js';
import { DEFAULT_MAX_COVERAGE_POINTS } from '../testing/descriptions.js';
import { createScanState } from './ScanState.js';
import type { ScanState } from './ScanState.js';
import { detectLineEnding, splitSourceLines } from './source-lines.js';
import type { CapturedComment, InsertedComment, ScanOptions, ScanResult } from './types.js';

const ACCESS_MARKER = /^(?:public|private|protected)\s*:\s*$/;
const NAMESPACE_OPENER = /^(?:inline\s+)?namespace\s*([A-Za-z_][\w:]*)?\s*\{/;
const NAMESPACE_HEAD = /^(?:inline\s+)?namespace\s*([A-Za-z_][\w:]*)?\s*$/;
const LINKAGE_OPENER = /^extern\s+"C(?:\+\+)?"\s*\{/;
const TEMPLATE_START = /^template\s*</;

/** Lines a template parameter clause may span */
const MAX_TEMPLATE_HEADER_LINES = 8;

export function resolveScanOptions(options: ScanOptions = {}): Required<ScanOptions> {
  return {
    enhanceExisting: options.enhanceExisting ?? false,
    detectTestFrameworks: options.detectTestFrameworks ?? true,
    baseException: options.baseException ?? DEFAULT_BASE_EXCEPTION,
    maxCoveragePoints: options.maxCoveragePoints ?? DEFAULT_MAX_COVERAGE_POINTS,
  };
}

function withIndentation<T extends DeclarationDescriptor>(descriptor: T, indentation: string): T {
  return descriptor.indentation === indentation ? descriptor : { ...descriptor, indentation };
}

/**
 * Index of the declaration line following a template parameter clause
 * that starts at `startIndex` and ends on its own line. Returns
 * `startIndex` when the line is not such a clause.
 */
function skipTemplateHeader(lines: readonly string[], startIndex: number): number {
  let index = startIndex;

  while (index < lines.length && TEMPLATE_START.test(lines[index].trim())) {
    let depth = 0;
    let end: number | undefined;
    let rest = '';

    for (let i = index; i < lines.length && i < index + MAX_TEMPLATE_HEADER_LINES && end === undefined; i++) {
      const text = lines[i];
      for (let c = 0; c < text.length; c++) {
        if (text[c] === '<') depth++;
        else if (text[c] === '>') {
          depth--;
          if (depth === 0) {
            end = i;
            rest = text.slice(c + 1).trim();
            break;
          }
        }
      }
    }

    // Declaration on the same line as the clause: the matchers strip it
    if (end === undefined || rest !== '') return index;
    index = end + 1;
  }

  return index;
}

// ============================================================================
// One pass
// ============================================================================

/**
 * Per-file pass. Holds the output accumulator and a fresh ScanState.
 */
class ScanPass {
  private readonly out: string[] = [];
  private readonly state: ScanState = createScanState();
  private readonly comments: InsertedComment[] = [];
  private readonly captured: CapturedComment[] = [];
  private readonly eol: string;

  constructor(
    private readonly lines: readonly string[],
    private readonly options: Required<ScanOptions>,
    private readonly analyzer: TestFrameworkAnalyzer
  ) {
    this.eol = detectLineEnding(lines);
  }

  run(): ScanResult {
    const testFramework = this.options.detectTestFrameworks ? this.analyzer.detect(this.lines) : undefined;

    let i = 0;
    while (i < this.lines.length) {
      i = testFramework ? this.testStep(i, testFramework) : this.topLevelStep(i);
    }

    return {
      lines: this.finish(),
      comments: this.comments,
      capturedComments: this.captured,
      isTestFile: testFramework !== undefined,
      testFramework,
    };
  }

  // ==========================================================================
  // Emission
  // ==========================================================================

  /**
   * Emit an input line and account for its braces
   */
  private emitSource(index: number): void {
    this.flushAccessMarker();
    this.out.push(this.lines[index]);
    this.state.braceDepth += netBraces(this.lines[index]);
  }

  /**
   * Emit a comment or preprocessor line; its braces are not counted
   */
  private emitRaw(index: number): void {
    this.flushAccessMarker();
    this.out.push(this.lines[index]);
  }

  private flushAccessMarker(): void {
    const marker = this.state.pendingAccessMarker;
    if (marker === undefined) return;
    this.state.pendingAccessMarker = undefined;
    this.out.push(this.lines[marker]);
  }

  private clearSkip(): void {
    this.state.skipNextDeclaration = false;
    this.state.pendingCapture = undefined;
  }

  private insertComment(anchor: number, descriptor: DeclarationDescriptor, separate: boolean): void {
    this.flushAccessMarker();

    if (separate) {
      const previous = this.out.length > 0 ? this.out[this.out.length - 1].trim() : '';
      if (previous !== '' && !previous.startsWith('//') && !/[{:]$/.test(previous)) {
        this.out.push(this.eol);
      }
    }

    const block = synthesizeComment(descriptor, {
      baseException: this.options.baseException,
      maxCoveragePoints: this.options.maxCoveragePoints,
      analyzer: this.analyzer,
    });

    this.comments.push({
      kind: descriptor.kind,
      name: descriptor.name,
      sourceLine: anchor,
      outputLine: this.out.length,
      lineCount: block.length,
    });
    for (const line of block) this.out.push(`${line}${this.eol}`);
  }

  /**
   * Comment (unless an existing block claims the declaration) followed by
   * the declaration's own lines
   */
  private emitDeclaration(anchor: number, descriptor: DeclarationDescriptor, endIndex: number, separate: boolean): void {
    if (this.state.skipNextDeclaration) {
      const capture = this.state.pendingCapture;
      if (capture) capture.declaration = { kind: descriptor.kind, name: descriptor.name };
      this.clearSkip();
    } else {
      this.insertComment(anchor, descriptor, separate);
    }

    for (let i = anchor; i <= endIndex; i++) this.emitSource(i);
  }

  private finish(): string[] {
    this.flushAccessMarker();

    while (this.out.length > 0 && this.out[this.out.length - 1].trim() === '') {
      this.out.pop();
    }
    if (this.out.length === 0) return [this.eol];

    const last = this.out[this.out.length - 1];
    if (!last.endsWith('\n')) this.out[this.out.length - 1] = `${last}${this.eol}`;
    return this.out;
  }

  // ==========================================================================
  // Lines shared by every loop
  // ==========================================================================

  /**
   * Blank, comment and preprocessor lines. Returns the next index, or
   * undefined when the line is none of these.
   */
  private passTrivia(index: number): number | undefined {
    const trimmed = this.lines[index].trim();

    if (!trimmed) {
      this.emitSource(index);
      return index + 1;
    }
    if (isDocCommentStart(trimmed)) return this.passExistingComment(index);
    if (trimmed.startsWith('/*')) return this.passBlockComment(index);
    if (trimmed.startsWith('//')) {
      this.emitRaw(index);
      return index + 1;
    }
    if (trimmed.startsWith('#')) {
      this.clearSkip();
      return this.passPreprocessor(index);
    }
    return undefined;
  }

  /**
   * Existing doc block: passed through, and the next declaration keeps it
   */
  private passExistingComment(index: number): number {
    const trimmed = this.lines[index].trim();
    let end = index;

    let trailingCode = false;
    if (trimmed.startsWith('///') || trimmed.startsWith('//!')) {
      while (end + 1 < this.lines.length && /^\/\/[/!]/.test(this.lines[end + 1].trim())) end++;
    } else {
      end = this.blockCommentEnd(index);
      trailingCode = this.hasCodeAfterComment(index, end);
    }

    const capture: CapturedComment = {
      startLine: index,
      endLine: end,
      text: this.lines.slice(index, end + 1).join(''),
    };
    if (this.options.enhanceExisting) this.captured.push(capture);

    // `/** doc */ int x;` documents its own line, not the next declaration
    if (trailingCode) {
      for (let i = index; i < end; i++) this.emitRaw(i);
      return this.passOpaque(end);
    }

    for (let i = index; i <= end; i++) this.emitRaw(i);

    this.state.skipNextDeclaration = true;
    this.state.pendingCapture = this.options.enhanceExisting ? capture : undefined;
    return end + 1;
  }

  private passBlockComment(index: number): number {
    const end = this.blockCommentEnd(index);
    if (this.hasCodeAfterComment(index, end)) {
      for (let i = index; i < end; i++) this.emitRaw(i);
      return this.passOpaque(end);
    }

    for (let i = index; i <= end; i++) this.emitRaw(i);
    return end + 1;
  }

  /**
   * Code (not another line comment) after the closing delimiter of a block
   * comment that opens on `start` and ends on `end`
   */
  private hasCodeAfterComment(start: number, end: number): boolean {
    const line = this.lines[end];
    const from = end === start ? line.indexOf('/*') + 2 : 0;
    const close = line.indexOf('*/', from);
    if (close === -1) return false;

    const rest = line.slice(close + 2).trim();
    return rest !== '' && !rest.startsWith('//');
  }

  /**
   * Line holding the `*` `/` that closes a block comment opened on `index`,
   * or the last line when it never closes
   */
  private blockCommentEnd(index: number): number {
    const first = this.lines[index].trim();
    if (first.slice(2).includes('*/')) return index;

    for (let i = index + 1; i < this.lines.length; i++) {
      if (this.lines[i].includes('*/')) return i;
    }
    return this.lines.length - 1;
  }

  /**
   * Directive plus its backslash continuations
   */
  private passPreprocessor(index: number): number {
    let i = index;
    this.emitRaw(i);
    while (this.lines[i].trimEnd().endsWith('\\') && i + 1 < this.lines.length) {
      i++;
      this.emitRaw(i);
    }
    return i + 1;
  }

  /**
   * Unrecognized line. A line opening a block takes the whole block with it.
   */
  private passOpaque(index: number): number {
    this.clearSkip();

    if (netBraces(this.lines[index]) > 0) {
      const close = findMatchingClose(this.lines, index);
      if (close !== undefined) {
        for (let i = index; i <= close; i++) this.emitSource(i);
        return close + 1;
      }
    }

    this.emitSource(index);
    return index + 1;
  }

  /**
   * Body line of a function or enum being passed through
   */
  private passBody(index: number): number {
    this.emitSource(index);
    this.state.inFunctionBodyDepth = Math.max(0, this.state.inFunctionBodyDepth + netBraces(this.lines[index]));
    return index + 1;
  }

  // ==========================================================================
  // Declarations
  // ==========================================================================

  /**
   * Try the matchers on the line at `index` (after any template header).
   * Returns the next index, or undefined when nothing matched.
   */
  private tryDeclaration(index: number, inClass: boolean): number | undefined {
    const declIndex = skipTemplateHeader(this.lines, index);
    if (declIndex >= this.lines.length) return undefined;

    const indentation = leadingWhitespace(this.lines[index]);
    const separate = !inClass;

    const cls = matchClass(this.lines, declIndex);
    if (cls) {
      const descriptor = withIndentation(cls.descriptor, indentation);
      this.emitDeclaration(index, descriptor, cls.endIndex, separate);

      const net = netBracesInRange(this.lines, index, cls.endIndex);
      // `class Foo { ... };` on one line: members are not documented
      if (net <= 0) return cls.endIndex + 1;
      return this.scanClassBody(cls.endIndex + 1, descriptor.name, this.state.braceDepth - net);
    }

    const trimmed = stripTemplatePrefix(this.lines[declIndex].trim());
    if (isEnumOpener(trimmed)) {
      const enumMatch = matchEnum(this.lines, declIndex);
      // Anonymous enums are left to passOpaque
      if (!enumMatch) return undefined;
      return this.emitWithBody(index, withIndentation(enumMatch.descriptor, indentation), enumMatch.endIndex, separate);
    }

    const fn = matchFunction(this.lines, declIndex, { currentClass: this.state.currentClass });
    if (fn) return this.emitWithBody(index, withIndentation(fn.descriptor, indentation), fn.endIndex, separate);

    const variable = matchVariable(this.lines, declIndex);
    if (variable) {
      this.emitDeclaration(index, withIndentation(variable.descriptor, indentation), variable.endIndex, separate);
      return variable.endIndex + 1;
    }

    return undefined;
  }

  /**
   * Emit a declaration whose last consumed line may open a body
   */
  private emitWithBody(anchor: number, descriptor: DeclarationDescriptor, endIndex: number, separate: boolean): number {
    this.emitDeclaration(anchor, descriptor, endIndex, separate);

    const net = netBracesInRange(this.lines, anchor, endIndex);
    if (net > 0) this.state.inFunctionBodyDepth = net;
    return endIndex + 1;
  }

  // ==========================================================================
  // Regular files
  // ==========================================================================

  private topLevelStep(index: number): number {
    const next = this.topLevelLine(index);
    this.popClosedScopes();
    return next;
  }

  private topLevelLine(index: number): number {
    if (this.state.inFunctionBodyDepth > 0) return this.passBody(index);

    const trivia = this.passTrivia(index);
    if (trivia !== undefined) return trivia;

    const trimmed = this.lines[index].trim();

    const namespace = NAMESPACE_OPENER.exec(trimmed);
    if (namespace) return this.openScope(index, index, 'namespace', namespace[1]);

    const head = NAMESPACE_HEAD.exec(trimmed);
    if (head && index + 1 < this.lines.length && this.lines[index + 1].trim().startsWith('{')) {
      return this.openScope(index, index + 1, 'namespace', head[1]);
    }

    if (LINKAGE_OPENER.test(trimmed)) return this.openScope(index, index, 'linkage', undefined);

    if (trimmed.startsWith('}')) return this.passOpaque(index);

    return this.tryDeclaration(index, false) ?? this.passOpaque(index);
  }

  private openScope(start: number, end: number, kind: 'namespace' | 'linkage', name: string | undefined): number {
    this.clearSkip();
    this.state.namespaceStack.push({ name, kind, openDepth: this.state.braceDepth });
    for (let i = start; i <= end; i++) this.emitSource(i);
    this.refreshNamespace();
    return end + 1;
  }

  private popClosedScopes(): void {
    const stack = this.state.namespaceStack;
    let popped = false;
    while (stack.length > 0 && stack[stack.length - 1].openDepth >= this.state.braceDepth) {
      stack.pop();
      popped = true;
    }
    if (popped) this.refreshNamespace();
  }

  private refreshNamespace(): void {
    const named = this.state.namespaceStack.filter(scope => scope.kind === 'namespace' && scope.name);
    this.state.currentNamespace = named.length > 0 ? named[named.length - 1].name : undefined;
  }

  /**
   * Class body sub-loop, until the brace depth falls back to `openDepth`
   */
  private scanClassBody(start: number, className: string, openDepth: number): number {
    const outerClass = this.state.currentClass;
    const outerDepth = this.state.classBraceDepth;
    this.state.currentClass = className;

    let i = start;
    while (i < this.lines.length && this.state.braceDepth > openDepth) {
      this.state.classBraceDepth = this.state.braceDepth - openDepth;
      i = this.classBodyLine(i);
    }

    this.state.currentClass = outerClass;
    this.state.classBraceDepth = outerDepth;
    return i;
  }

  private classBodyLine(index: number): number {
    if (this.state.inFunctionBodyDepth > 0) return this.passBody(index);

    const trivia = this.passTrivia(index);
    if (trivia !== undefined) return trivia;

    const trimmed = this.lines[index].trim();

    if (ACCESS_MARKER.test(trimmed)) {
      this.flushAccessMarker();
      this.clearSkip();
      this.state.pendingAccessMarker = index;
      return index + 1;
    }

    if (trimmed.startsWith('}')) return this.passOpaque(index);

    return this.tryDeclaration(index, true) ?? this.passOpaque(index);
  }

  // ==========================================================================
  // Test files
  // ==========================================================================

  private testStep(index: number, tag: TestDialectTag): number {
    const next = this.testLine(index, tag);
    this.settleSuites();
    return next;
  }

  private testLine(index: number, tag: TestDialectTag): number {
    const trivia = this.passTrivia(index);
    if (trivia !== undefined) return trivia;

    const trimmed = this.lines[index].trim();
    const boundary = this.analyzer.getDialect(tag)?.matchSuiteBoundary(trimmed);
    if (boundary) {
      const suites = this.state.suiteStack;
      if (boundary.type === 'open') {
        suites.push({ name: boundary.name, braced: boundary.braced, openDepth: this.state.braceDepth, entered: false });
      } else {
        const unbraced = suites.map(suite => suite.braced).lastIndexOf(false);
        if (unbraced !== -1) suites.splice(unbraced);
      }
      this.clearSkip();
      this.emitSource(index);
      return index + 1;
    }

    const suites = this.state.suiteStack;
    const suite = suites.length > 0 ? suites[suites.length - 1].name : undefined;
    const match = this.analyzer.extractCase(this.lines, index, tag, { suite });
    if (match && match.hasBody) {
      this.emitDeclaration(index, match.descriptor, match.endIndex, true);
      return match.endIndex + 1;
    }

    this.clearSkip();
    this.emitSource(index);
    return index + 1;
  }

  /**
   * Close braced suites whose brace has returned
   */
  private settleSuites(): void {
    const suites = this.state.suiteStack;
    while (suites.length > 0) {
      const top = suites[suites.length - 1];
      if (!top.braced) return;

      if (!top.entered) {
        if (this.state.braceDepth > top.openDepth) top.entered = true;
        return;
      }
      if (this.state.braceDepth > top.openDepth) return;
      suites.pop();
    }
  }
}

// ============================================================================
// Public entry points
// ============================================================================

export class StructuralScanner {
  private readonly options: Required<ScanOptions>;

  constructor(options: ScanOptions = {}, private readonly analyzer: TestFrameworkAnalyzer = defaultTestFrameworkAnalyzer) {
    this.options = resolveScanOptions(options);
  }

  /**
   * Scan lines that keep their terminators
   */
  scan(lines: readonly string[]): ScanResult {
    return new ScanPass(lines, this.options, this.analyzer).run();
  }

  scanText(content: string): ScanResult {
    return this.scan(splitSourceLines(content));
  }
}

/**
 * One-shot scan of a file's text
 */
export function scanSource(content: string, options: ScanOptions = {}): ScanResult {
  return new StructuralScanner(options).scanText(content);
}
