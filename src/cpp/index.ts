export { CppDocGenerator, createDefaultRegistry, CPP_HEADER_EXTENSIONS, CPP_SOURCE_EXTENSIONS } from './CppDocGenerator.js';
