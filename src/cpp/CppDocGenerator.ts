/**
 * CppDocGenerator
 *
 * Doxygen generator for C and C++ headers and sources. Validates the
 * extension, runs the structural scanner and reports what was inserted.
 *
 * @since 2026-10-19
 */

import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { BaseDocGenerator, fileExtension } from '../base/DocGenerator.js';
import { GeneratorRegistry } from '../base/GeneratorRegistry.js';
import { DocGenError, DocGenErrorCodes, UnsupportedFileTypeError } from '../base/errors.js';
import type {
  DocFileResult,
  DocGeneratorOptions,
  FileKind,
  GeneratedComment,
  GeneratorLanguage,
} from '../base/types.js';
import { StructuralScanner } from '../scanner/StructuralScanner.js';
import { splitSourceLines } from '../scanner/source-lines.js';
import type { ScanResult } from '../scanner/types.js';
import type { TestDialectTag } from '../declarations/types.js';
import type { TestFrameworkAnalyzer } from '../testing/TestFrameworkAnalyzer.js';
import { defaultTestFrameworkAnalyzer } from '../testing/TestFrameworkAnalyzer.js';

export const CPP_HEADER_EXTENSIONS = ['.h', '.hpp', '.hh', '.hxx'] as const;
export const CPP_SOURCE_EXTENSIONS = ['.cpp', '.cc', '.cxx', '.c++'] as const;

export class CppDocGenerator extends BaseDocGenerator {
  readonly language: GeneratorLanguage = 'cpp';
  readonly extensions: readonly string[] = [...CPP_HEADER_EXTENSIONS, ...CPP_SOURCE_EXTENSIONS];

  private initialized = false;

  constructor(
    private readonly defaults: DocGeneratorOptions = {},
    private readonly analyzer: TestFrameworkAnalyzer = defaultTestFrameworkAnalyzer
  ) {
    super();
  }

  /**
   * Check the test dialect set. Macro-signature detection falls back by
   * priority, so two dialects may not share one, and every dialect's
   * display name ends up in generated comments.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    const dialects = this.analyzer.getDialects();
    const byPriority = new Map<number, TestDialectTag>();
    for (const dialect of dialects) {
      if (!dialect.displayName.trim()) {
        throw new DocGenError(`Test dialect ${dialect.tag} has no display name`, DocGenErrorCodes.INVALID_DIALECT_SET, {
          tag: dialect.tag,
        });
      }

      const clash = byPriority.get(dialect.macroPriority);
      if (clash) {
        throw new DocGenError(
          `Test dialects ${clash} and ${dialect.tag} share macro priority ${dialect.macroPriority}`,
          DocGenErrorCodes.INVALID_DIALECT_SET,
          { tags: [clash, dialect.tag], priority: dialect.macroPriority }
        );
      }
      byPriority.set(dialect.macroPriority, dialect.tag);
    }

    this.initialized = true;
    console.log(`✅ CppDocGenerator initialized (${dialects.length} test dialects)`);
  }

  fileKind(filePath: string): FileKind {
    const ext = fileExtension(filePath);
    return CPP_HEADER_EXTENSIONS.some(header => header === ext) ? 'header' : 'source';
  }

  /**
   * Synchronous core: lines in (terminators kept), documented lines out
   */
  generateLines(lines: readonly string[], options: DocGeneratorOptions = {}): ScanResult {
    return new StructuralScanner({ ...this.defaults, ...options }, this.analyzer).scan(lines);
  }

  async generateFile(filePath: string, content: string, options: DocGeneratorOptions = {}): Promise<DocFileResult> {
    if (!this.canHandle(filePath)) {
      throw new UnsupportedFileTypeError(filePath, this.extensions);
    }
    if (!this.initialized) {
      await this.initialize();
    }

    console.log(`⏳ Documenting ${filePath}...`);
    const hash = createHash('sha256').update(content).digest('hex').slice(0, 16);
    const result = this.generateLines(splitSourceLines(content), options);

    const comments: GeneratedComment[] = result.comments.map(comment => ({
      id: uuidv4(),
      kind: comment.kind,
      name: comment.name,
      line: comment.sourceLine + 1,
    }));

    const testFrameworkName = result.testFramework ? this.analyzer.displayName(result.testFramework) : undefined;
    const framework = testFrameworkName ? `, test file (${testFrameworkName})` : '';
    console.log(`📊 Documented ${filePath}: ${comments.length} comments, ${result.capturedComments.length} existing${framework}`);

    return {
      file: filePath,
      hash,
      fileKind: this.fileKind(filePath),
      lines: result.lines,
      content: result.lines.join(''),
      isTestFile: result.isTestFile,
      testFramework: result.testFramework,
      testFrameworkName,
      comments,
      existingComments: result.capturedComments,
    };
  }
}

/**
 * Registry holding the C++ generator
 */
export function createDefaultRegistry(options: DocGeneratorOptions = {}): GeneratorRegistry {
  const registry = new GeneratorRegistry();
  registry.register(new CppDocGenerator(options));
  return registry;
}
