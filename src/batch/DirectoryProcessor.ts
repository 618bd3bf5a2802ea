/**
 * Directory Processor
 *
 * Applies a documentation generator to every C/C++ file of a directory or
 * of a conventionally laid out project. Files are processed one after the
 * other; a failing file becomes a failed outcome and the batch goes on.
 *
 * @since 2026-10-19
 */

import * as fs from 'fs/promises';
import path from 'path';
import type { DocGenerator } from '../base/DocGenerator.js';
import type { DocGeneratorOptions } from '../base/types.js';
import { SourceNotFoundError, errorMessage } from '../base/errors.js';
import { CppDocGenerator } from '../cpp/CppDocGenerator.js';
import type { TestDialectTag } from '../declarations/types.js';

/**
 * Build output and tooling directories never walked into
 */
export const SKIPPED_DIRECTORIES: ReadonlySet<string> = new Set([
  '.git', '.svn', 'build', 'cmake-build-debug', 'cmake-build-release',
  '__pycache__', '.venv', 'venv', 'node_modules',
]);

/**
 * Project subdirectories processed by processProject, in order
 */
export const PROJECT_DIRECTORIES = ['include', 'inc', 'includes', 'src', 'source', 'sources', 'test', 'tests'] as const;

export const PROCESSED_MESSAGE = 'Processed successfully';
export const DRY_RUN_MESSAGE = 'Would be processed (dry run)';

export interface BatchOptions {
  /** Walk subdirectories. Default: true */
  recursive?: boolean;

  /** Generate but write nothing. Default: false */
  dryRun?: boolean;

  /** Mirror outputs under this directory instead of writing in place */
  outputDir?: string;
}

export interface DirectoryProcessorOptions extends BatchOptions, DocGeneratorOptions {}

export interface ProcessFileOptions {
  outputPath?: string;
  dryRun?: boolean;
}

export interface FileOutcome {
  file: string;
  success: boolean;
  message: string;
  testFramework?: TestDialectTag;
}

export interface BatchReport {
  outcomes: FileOutcome[];

  /** Set when there was nothing to process */
  info?: string;
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch {
    return false;
  }
}

export class DirectoryProcessor {
  private readonly batch: Required<Omit<BatchOptions, 'outputDir'>> & Pick<BatchOptions, 'outputDir'>;
  private readonly generatorOptions: DocGeneratorOptions;

  constructor(options: DirectoryProcessorOptions = {}, private readonly generator: DocGenerator = new CppDocGenerator()) {
    this.batch = {
      recursive: options.recursive ?? true,
      dryRun: options.dryRun ?? false,
      outputDir: options.outputDir,
    };
    this.generatorOptions = {
      enhanceExisting: options.enhanceExisting,
      detectTestFrameworks: options.detectTestFrameworks,
      baseException: options.baseException,
      maxCoveragePoints: options.maxCoveragePoints,
    };
  }

  /**
   * Files the generator accepts, sorted
   */
  async findSourceFiles(directory: string, recursive = this.batch.recursive): Promise<string[]> {
    const root = path.resolve(directory);
    if (!(await isDirectory(root))) {
      throw new SourceNotFoundError(directory, 'directory');
    }

    const files: string[] = [];
    const walk = async (current: string): Promise<void> => {
      const entries = await fs.readdir(current, { withFileTypes: true });
      for (const entry of entries) {
        const fullPath = path.join(current, entry.name);
        if (entry.isDirectory()) {
          if (recursive && !SKIPPED_DIRECTORIES.has(entry.name)) await walk(fullPath);
        } else if (entry.isFile() && this.generator.canHandle(fullPath)) {
          files.push(fullPath);
        }
      }
    };

    await walk(root);
    return files.sort();
  }

  async processFile(filePath: string, options: ProcessFileOptions = {}): Promise<FileOutcome> {
    const dryRun = options.dryRun ?? this.batch.dryRun;

    try {
      if (!(await isFile(filePath))) {
        throw new SourceNotFoundError(filePath, 'file');
      }

      const content = await fs.readFile(filePath, 'utf8');
      const result = await this.generator.generateFile(filePath, content, this.generatorOptions);

      if (dryRun) {
        return { file: filePath, success: true, message: DRY_RUN_MESSAGE, testFramework: result.testFramework };
      }

      const outputPath = options.outputPath ?? filePath;
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.writeFile(outputPath, result.content, 'utf8');

      const testInfo = result.testFrameworkName ? ` (Test file: ${result.testFrameworkName})` : '';
      return { file: filePath, success: true, message: `${PROCESSED_MESSAGE}${testInfo}`, testFramework: result.testFramework };
    } catch (error) {
      const message = errorMessage(error);
      console.warn(`❌ ${filePath}: ${message}`);
      return { file: filePath, success: false, message: `Error: ${message}` };
    }
  }

  async processDirectory(directory: string, options: BatchOptions = {}): Promise<BatchReport> {
    const recursive = options.recursive ?? this.batch.recursive;
    const dryRun = options.dryRun ?? this.batch.dryRun;
    const outputDir = options.outputDir ?? this.batch.outputDir;

    const files = await this.findSourceFiles(directory, recursive);
    if (files.length === 0) {
      return { outcomes: [], info: `No C++ files found in ${directory}` };
    }

    console.log(`📊 Found ${files.length} C++ file(s) in ${directory}`);
    const root = path.resolve(directory);
    const outcomes: FileOutcome[] = [];

    for (const file of files) {
      const outputPath = outputDir ? path.join(outputDir, path.relative(root, file)) : undefined;
      outcomes.push(await this.processFile(file, { outputPath, dryRun }));
    }

    return { outcomes };
  }

  /**
   * Process the conventional source directories of a project, or the whole
   * root when it has none. Outputs mirror the layout under the root.
   */
  async processProject(projectRoot: string, options: BatchOptions = {}): Promise<BatchReport> {
    const root = path.resolve(projectRoot);
    if (!(await isDirectory(root))) {
      throw new SourceNotFoundError(projectRoot, 'directory');
    }

    const directories: string[] = [];
    for (const name of PROJECT_DIRECTORIES) {
      const candidate = path.join(root, name);
      if (await isDirectory(candidate)) directories.push(candidate);
    }

    if (directories.length === 0) {
      console.warn(`⚠️ No conventional source directories in ${projectRoot}, processing the root`);
      return this.processDirectory(projectRoot, options);
    }

    console.log(`📊 Processing project ${projectRoot}: ${directories.map(dir => path.basename(dir)).join(', ')}`);
    const outputDir = options.outputDir ?? this.batch.outputDir;
    const outcomes: FileOutcome[] = [];

    for (const directory of directories) {
      const report = await this.processDirectory(directory, {
        ...options,
        outputDir: outputDir ? path.join(outputDir, path.relative(root, directory)) : undefined,
      });
      outcomes.push(...report.outcomes);
    }

    return outcomes.length > 0 ? { outcomes } : { outcomes, info: `No C++ files found in ${projectRoot}` };
  }
}

/**
 * Printable summary of a batch
 */
export function formatReport(report: BatchReport): string[] {
  const lines: string[] = [];
  if (report.info) lines.push(`ℹ️ ${report.info}`);

  let succeeded = 0;
  for (const outcome of report.outcomes) {
    if (outcome.success) succeeded++;
    lines.push(`${outcome.success ? '✅' : '❌'} ${outcome.file}`);
    if (outcome.message !== PROCESSED_MESSAGE) lines.push(`  → ${outcome.message}`);
  }

  const failed = report.outcomes.length - succeeded;
  lines.push(`Total: ${report.outcomes.length} files, ${succeeded} succeeded, ${failed} failed`);
  return lines;
}
