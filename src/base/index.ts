/**
 * Generator infrastructure
 *
 * Facade types, the generator interface, the registry and error types
 */

export * from './types.js';
export * from './errors.js';
export * from './DocGenerator.js';
export * from './GeneratorRegistry.js';
