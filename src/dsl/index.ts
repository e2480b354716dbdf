/**
 * Text formats schemas are defined in.
 *
 * 1. **Declare blocks** - `declare Person name : String @required end`.
 * 2. **YAML/JSON** - `{ name, fields: [{ name, type }] }` documents.
 *
 * @example
 * ```typescript
 * import { parseDeclaration, loadSchemasFromYAML } from 'fact-materializer/dsl';
 *
 * const person = parseDeclaration(`
 *   declare Person
 *       name : String @required
 *       age : int
 *   end
 * `);
 * ```
 *
 * @module dsl
 */

// Declare blocks
export {
  parseDeclaration,
  parseDeclarations,
  renderDeclaration,
  mapTypeName,
  type DeclarationBlock,
  type MappedType,
} from './declare/index.js';

// YAML loader
export {
  loadSchemasFromYAML,
  loadSchemasFromFile,
  validateSchema,
  YamlLoadError,
  YamlValidationError,
} from './yaml/index.js';

// Errors
export { DslError, DeclarationParseError } from './helpers/index.js';
