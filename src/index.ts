// Types
export * from './types/index.js';

// Core components
export * from './core/index.js';

// Compiler
export * from './compiler/index.js';

// Utils
export * from './utils/index.js';

// DSL
export { parseDeclaration, parseDeclarations, renderDeclaration, loadSchemasFromYAML, loadSchemasFromFile } from './dsl/index.js';
