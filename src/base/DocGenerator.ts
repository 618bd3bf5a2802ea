/**
 * Doc Generator Interface
 *
 * Common interface for documentation generators. A generator owns an
 * extension allowlist and turns one file's text into documented text.
 *
 * @since 2026-10-19
 */

import type { DocFileResult, DocGeneratorOptions, GeneratorLanguage } from './types.js';

export interface DocGenerator {
  /**
   * The language this generator documents
   */
  readonly language: GeneratorLanguage;

  /**
   * File extensions this generator accepts (e.g., ['.h', '.cpp'])
   */
  readonly extensions: readonly string[];

  /**
   * Validate the generator's configuration before first use
   *
   * @throws DocGenError when the configuration is unusable
   */
  initialize(): Promise<void>;

  /**
   * Document one file
   *
   * @param filePath - Used for the extension check and reporting only
   * @param content - File content as string
   * @throws UnsupportedFileTypeError when the extension is not accepted
   */
  generateFile(filePath: string, content: string, options?: DocGeneratorOptions): Promise<DocFileResult>;

  /**
   * Check if this generator accepts a given file
   */
  canHandle(filePath: string): boolean;
}

/**
 * Lower-cased extension including the dot, or '' when there is none
 */
export function fileExtension(filePath: string): string {
  const slash = Math.max(filePath.lastIndexOf('/'), filePath.lastIndexOf('\\'));
  const dot = filePath.lastIndexOf('.');
  return dot > slash ? filePath.substring(dot).toLowerCase() : '';
}

/**
 * Abstract base class providing common functionality
 */
export abstract class BaseDocGenerator implements DocGenerator {
  abstract readonly language: GeneratorLanguage;
  abstract readonly extensions: readonly string[];

  abstract initialize(): Promise<void>;
  abstract generateFile(filePath: string, content: string, options?: DocGeneratorOptions): Promise<DocFileResult>;

  /**
   * Extension check, case-insensitive
   */
  canHandle(filePath: string): boolean {
    return this.extensions.includes(fileExtension(filePath));
  }
}
