/**
 * Source of a fact class plus the globals it runs against.
 */
export interface CompilationUnit {
  /** Class name, also used as the virtual file name. */
  typeName: string;
  source: string;
  /** Bindings visible to the evaluated code as globals (e.g. `__rt`). */
  globals: Record<string, unknown>;
}

/**
 * Turns generated TypeScript into a live value.
 *
 * Implementations must evaluate every unit in isolation: no state may leak
 * from one compile into the next.
 */
export interface SourceCompiler {
  readonly name: string;

  /** Whether the underlying compiler can be loaded in this environment. */
  isAvailable(): boolean;

  /**
   * Compiles and evaluates the unit, returning the completion value of the
   * script (the generated source ends with the class name).
   *
   * @throws {CompilerUnavailableError} when the compiler cannot be loaded
   * @throws {MaterializationError} on diagnostics or evaluation failures
   */
  compile(unit: CompilationUnit): unknown;
}
