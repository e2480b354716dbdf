/**
 * Error hierarchy of the DSL module.
 *
 * Every DSL error extends {@link DslError}, so callers can catch all of them
 * at once:
 *
 * ```typescript
 * try {
 *   loadSchemasFromYAML(text);
 * } catch (err) {
 *   if (err instanceof DslError) {
 *     // declaration parser, YAML loader or YAML validation
 *   }
 * }
 * ```
 */

/**
 * Common ancestor of {@link DeclarationParseError}, YamlLoadError and
 * YamlValidationError.
 */
export class DslError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DslError';
  }
}

/**
 * Syntax error in `declare ... end` text, with the 1-based line it was found
 * on and that line's text.
 */
export class DeclarationParseError extends DslError {
  readonly line: number;
  readonly source: string;

  constructor(message: string, line: number, source: string) {
    super(`Line ${line}: ${message}\n  ${source.trim()}`);
    this.name = 'DeclarationParseError';
    this.line = line;
    this.source = source;
  }
}
