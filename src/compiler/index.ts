export type { CompilationUnit, SourceCompiler } from './types.js';
export { TypeScriptCompiler, formatDiagnostic, type TypeScriptCompilerOptions, type TypeScriptLoader } from './typescript-compiler.js';
export { generateFactSource, RUNTIME_BINDING } from './source-generator.js';
export { createFactRuntime, type FactRuntime } from './fact-runtime.js';
