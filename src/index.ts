/**
 * cpp-doxygen-annotator
 *
 * Inserts Doxygen comment blocks above undocumented C/C++ declarations
 *
 * ## Recommended API (use these):
 * - CppDocGenerator - Document one file (async) or a line array (sync)
 * - DirectoryProcessor - Document directories and projects
 * - GeneratorRegistry / createDefaultRegistry - Pick a generator by file
 *
 * ## Building blocks:
 * - StructuralScanner - The line-oriented pass itself
 * - matchClass, matchFunction, ... - Declaration matchers
 * - synthesizeComment - Descriptor to comment lines
 * - TestFrameworkAnalyzer - Test dialect detection and extraction
 */

// =============================================================================
// PUBLIC API - Recommended for external use
// =============================================================================

// Generator infrastructure (types, errors, registry)
export * from './base/index.js';

// C++ generator
export * from './cpp/index.js';

// Batch processing
export * from './batch/index.js';

// =============================================================================
// BUILDING BLOCKS - Exported for callers composing their own pass
// =============================================================================

export * from './scanner/index.js';
export * from './declarations/index.js';
export * from './comments/index.js';
export * from './testing/index.js';
