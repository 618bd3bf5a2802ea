/**
 * Types for the Structural Scanner
 *
 * @since 2026-10-19
 */

import type { DeclarationKind, TestDialectTag } from '../declarations/types.js';

export interface ScanOptions {
  /**
   * Capture existing doc blocks in the result instead of only skipping
   * them. Existing blocks are never rewritten. Default: false
   */
  enhanceExisting?: boolean;

  /** Detect test files and document test cases. Default: true */
  detectTestFrameworks?: boolean;

  /** Exception named by generic `@throws` lines. Default: std::exception */
  baseException?: string;

  /** Coverage bullets per test comment. Default: 5 */
  maxCoveragePoints?: number;
}

/**
 * A comment block the scanner inserted
 */
export interface InsertedComment {
  kind: DeclarationKind;
  name: string;

  /** 0-based index of the input line the comment precedes */
  sourceLine: number;

  /** 0-based index of the comment's first line in the output */
  outputLine: number;

  lineCount: number;
}

/**
 * An existing doc block seen while `enhanceExisting` is on
 */
export interface CapturedComment {
  /** 0-based, inclusive input line range */
  startLine: number;
  endLine: number;

  /** Raw block text, line endings included */
  text: string;

  /** Declaration the block documents, when one follows it */
  declaration?: {
    kind: DeclarationKind;
    name: string;
  };
}

export interface ScanResult {
  /** Transformed lines, each ending with a line terminator */
  lines: string[];

  comments: InsertedComment[];
  capturedComments: CapturedComment[];

  isTestFile: boolean;
  testFramework?: TestDialectTag;
}
