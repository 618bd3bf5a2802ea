/**
 * Scan state
 *
 * Mutable context of one pass over one file. A new state is created for
 * every pass and never shared.
 *
 * @since 2026-10-19
 */

import type { CapturedComment } from './types.js';

export interface NamespaceScope {
  /** Undefined for anonymous namespaces and `extern "C"` blocks */
  name?: string;
  kind: 'namespace' | 'linkage';

  /** Brace depth before the scope opened */
  openDepth: number;
}

export interface SuiteScope {
  name: string;
  braced: boolean;
  openDepth: number;

  /** Set once the suite's opening brace has been seen */
  entered: boolean;
}

export interface ScanState {
  /** Innermost enclosing class or struct */
  currentClass?: string;

  /** Innermost enclosing named namespace */
  currentNamespace?: string;

  /** Depth inside the current class body, 0 outside */
  classBraceDepth: number;

  /** Depth inside a recognized function (or enum) body; body lines pass through */
  inFunctionBodyDepth: number;

  /** Index of an access marker line held back until the next output */
  pendingAccessMarker?: number;

  /** Set after an existing doc block; the next declaration keeps it */
  skipNextDeclaration: boolean;

  /** Captured block waiting for the declaration it documents */
  pendingCapture?: CapturedComment;

  /** Running brace depth of everything emitted so far */
  braceDepth: number;

  namespaceStack: NamespaceScope[];
  suiteStack: SuiteScope[];
}

export function createScanState(): ScanState {
  return {
    classBraceDepth: 0,
    inFunctionBodyDepth: 0,
    skipNextDeclaration: false,
    braceDepth: 0,
    namespaceStack: [],
    suiteStack: [],
  };
}
