export { DslError, DeclarationParseError } from './errors.js';
