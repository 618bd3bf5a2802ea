/**
 * Structural Scanner
 *
 * @since 2026-10-19
 */

export { StructuralScanner, scanSource, resolveScanOptions } from './StructuralScanner.js';
export { createScanState } from './ScanState.js';
export type { ScanState, NamespaceScope, SuiteScope } from './ScanState.js';
export { splitSourceLines, detectLineEnding } from './source-lines.js';
export type { ScanOptions, ScanResult, InsertedComment, CapturedComment } from './types.js';
