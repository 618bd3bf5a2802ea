/**
 * Generator Registry
 *
 * Maps languages to documentation generators and files to the generator
 * that accepts them.
 *
 * @since 2026-10-19
 */

import type { GeneratorLanguage } from './types.js';
import type { DocGenerator } from './DocGenerator.js';
import { UnsupportedFileTypeError } from './errors.js';

export class GeneratorRegistry {
  private generators = new Map<GeneratorLanguage, DocGenerator>();

  register(generator: DocGenerator): void {
    if (this.generators.has(generator.language)) {
      console.warn(`⚠️ Generator for ${generator.language} already registered, overwriting`);
    }
    this.generators.set(generator.language, generator);
  }

  getGenerator(language: GeneratorLanguage): DocGenerator | null {
    return this.generators.get(language) ?? null;
  }

  /**
   * Generator whose extension allowlist contains the file's extension
   */
  getGeneratorForFile(filePath: string): DocGenerator | null {
    for (const generator of this.generators.values()) {
      if (generator.canHandle(filePath)) {
        return generator;
      }
    }
    return null;
  }

  /**
   * Like getGeneratorForFile, but a miss is a usage error
   */
  requireGeneratorForFile(filePath: string): DocGenerator {
    const generator = this.getGeneratorForFile(filePath);
    if (!generator) {
      throw new UnsupportedFileTypeError(filePath, this.getSupportedExtensions());
    }
    return generator;
  }

  getLanguages(): GeneratorLanguage[] {
    return Array.from(this.generators.keys());
  }

  getSupportedExtensions(): string[] {
    const extensions = new Set<string>();
    for (const generator of this.generators.values()) {
      generator.extensions.forEach(ext => extensions.add(ext));
    }
    return Array.from(extensions);
  }

  isSupported(filePath: string): boolean {
    return this.getGeneratorForFile(filePath) !== null;
  }
}
