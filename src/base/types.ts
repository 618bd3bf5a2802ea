/**
 * Generator facade types
 *
 * Shared by every documentation generator and by the batch layer.
 *
 * @since 2026-10-19
 */

import type { DeclarationKind, TestDialectTag } from '../declarations/types.js';
import type { CapturedComment, ScanOptions } from '../scanner/types.js';

export type GeneratorLanguage = 'cpp';

/**
 * Headers and sources are documented the same way; the kind is reported
 */
export type FileKind = 'header' | 'source';

export type DocGeneratorOptions = ScanOptions;

export type ResolvedDocGeneratorOptions = Required<DocGeneratorOptions>;

/**
 * One inserted comment block, as reported to callers
 */
export interface GeneratedComment {
  id: string;
  kind: DeclarationKind;
  name: string;

  /** 1-based line of the documented declaration in the input */
  line: number;
}

export interface DocFileResult {
  file: string;

  /** sha256 of the input, first 16 hex digits */
  hash: string;

  fileKind: FileKind;

  /** Output lines, each with its terminator */
  lines: string[];

  /** `lines` joined */
  content: string;

  isTestFile: boolean;
  testFramework?: TestDialectTag;

  /** Display name of the detected framework ("Google Test") */
  testFrameworkName?: string;

  comments: GeneratedComment[];
  existingComments: CapturedComment[];
}
