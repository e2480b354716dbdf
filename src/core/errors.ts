/**
 * Error taxonomy of the materialization engine.
 *
 * Every error carries `statusCode` + `code`, so the API error handler can map
 * it to a response without a lookup table.
 *
 * @module
 */

import type { Fact } from '../types/fact.js';
import type { FieldType } from '../types/schema.js';

/** Common ancestor of every error raised by this package. */
export class FactMaterializationError extends Error {
  readonly statusCode: number = 500;
  readonly code: string = 'FACT_MATERIALIZATION_ERROR';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FactMaterializationError';
  }
}

export class SchemaNotFoundError extends FactMaterializationError {
  override readonly statusCode = 404;
  override readonly code = 'SCHEMA_NOT_FOUND';
  readonly schemaName: string | null;

  constructor(schemaName: string | null, message?: string) {
    super(message ?? `Schema '${schemaName}' not found`);
    this.name = 'SchemaNotFoundError';
    this.schemaName = schemaName;
  }

  /** Auto-detection found no usable discriminator on the input object. */
  static missingDiscriminator(key: string): SchemaNotFoundError {
    return new SchemaNotFoundError(null, `Cannot detect schema: missing "${key}" discriminator`);
  }
}

/** One or more required fields are missing. Lists all of them. */
export class ValidationError extends FactMaterializationError {
  override readonly statusCode = 422;
  override readonly code = 'VALIDATION_ERROR';
  readonly schemaName: string;
  readonly missingFields: readonly string[];

  constructor(schemaName: string, missingFields: readonly string[]) {
    super(`Missing required fields for ${schemaName}: ${missingFields.join(', ')}`);
    this.name = 'ValidationError';
    this.schemaName = schemaName;
    this.missingFields = missingFields;
  }

  get details(): { schema: string; missingFields: readonly string[] } {
    return { schema: this.schemaName, missingFields: this.missingFields };
  }
}

export class CoercionError extends FactMaterializationError {
  override readonly statusCode = 422;
  override readonly code = 'COERCION_ERROR';
  readonly field: string;
  readonly targetType: FieldType;
  readonly rawValue: unknown;

  constructor(field: string, targetType: FieldType, rawValue: unknown, reason?: string) {
    super(
      `Cannot coerce value ${formatRawValue(rawValue)} of field "${field}" to ${targetType}` +
        (reason ? `: ${reason}` : ''),
    );
    this.name = 'CoercionError';
    this.field = field;
    this.targetType = targetType;
    this.rawValue = rawValue;
  }

  get details(): { field: string; targetType: FieldType } {
    return { field: this.field, targetType: this.targetType };
  }
}

/** Diagnostic reported by a source compiler. */
export interface CompileDiagnostic {
  message: string;
  code?: number | undefined;
  /** 1-based line in the generated source. */
  line?: number | undefined;
  /** 1-based column in the generated source. */
  column?: number | undefined;
}

/** Compilation or instantiation failure of the compiled-class strategy. */
export class MaterializationError extends FactMaterializationError {
  override readonly statusCode: number = 500;
  override readonly code: string = 'MATERIALIZATION_ERROR';
  readonly typeName: string;
  readonly source: string;
  readonly diagnostics: readonly CompileDiagnostic[];
  /** Field whose name broke the generated source, when known. */
  readonly field: string | undefined;

  constructor(
    message: string,
    init: {
      typeName: string;
      source?: string;
      diagnostics?: readonly CompileDiagnostic[];
      field?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: init.cause });
    this.name = 'MaterializationError';
    this.typeName = init.typeName;
    this.source = init.source ?? '';
    this.diagnostics = init.diagnostics ?? [];
    this.field = init.field;
  }

  get details(): { typeName: string; field?: string; diagnostics: readonly CompileDiagnostic[] } {
    return this.field === undefined
      ? { typeName: this.typeName, diagnostics: this.diagnostics }
      : { typeName: this.typeName, field: this.field, diagnostics: this.diagnostics };
  }
}

/**
 * The compiler facility itself is missing from the runtime environment.
 *
 * The only error the facade recovers from (by switching to proxies).
 */
export class CompilerUnavailableError extends MaterializationError {
  override readonly statusCode = 503;
  override readonly code = 'COMPILER_UNAVAILABLE';

  constructor(typeName: string, reason: string, cause?: unknown) {
    super(`Compiled-class strategy unavailable: ${reason}`, { typeName, cause });
    this.name = 'CompilerUnavailableError';
  }
}

export class UnsupportedOperationError extends FactMaterializationError {
  override readonly statusCode = 400;
  override readonly code = 'UNSUPPORTED_OPERATION';
  readonly factType: string;
  readonly method: string;

  constructor(factType: string, method: string) {
    super(`Method not supported on ${factType}: ${method}`);
    this.name = 'UnsupportedOperationError';
    this.factType = factType;
    this.method = method;
  }
}

/** Invalid schema registration; nothing is registered when thrown. */
export class SchemaDefinitionError extends FactMaterializationError {
  override readonly statusCode = 400;
  override readonly code = 'SCHEMA_DEFINITION_ERROR';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SchemaDefinitionError';
  }
}

/** Input that is not JSON, not an object, or nested too deeply. */
export class InvalidFactInputError extends FactMaterializationError {
  override readonly statusCode = 400;
  override readonly code = 'INVALID_FACT_INPUT';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidFactInputError';
  }
}

/** Failure of a single element of a batch. */
export interface BatchFailure {
  index: number;
  error: FactMaterializationError;
}

/**
 * At least one element of a JSON array failed. Successful elements are kept
 * in `facts`; failures keep their original error instances.
 */
export class BatchMaterializationError extends FactMaterializationError {
  override readonly statusCode = 422;
  override readonly code = 'BATCH_MATERIALIZATION_ERROR';
  readonly facts: readonly Fact[];
  readonly failures: readonly BatchFailure[];

  constructor(facts: readonly Fact[], failures: readonly BatchFailure[]) {
    super(
      `${failures.length} of ${facts.length + failures.length} facts failed: ` +
        failures.map((f) => `[${f.index}] ${f.error.message}`).join('; '),
    );
    this.name = 'BatchMaterializationError';
    this.facts = facts;
    this.failures = failures;
  }

  get details(): Array<{ index: number; code: string; message: string }> {
    return this.failures.map((f) => ({ index: f.index, code: f.error.code, message: f.error.message }));
  }
}

/** Renders an arbitrary raw input value for error messages. */
export function formatRawValue(value: unknown): string {
  if (value === undefined) {
    return 'undefined';
  }
  if (typeof value === 'bigint') {
    return `${value}n`;
  }
  if (typeof value === 'function' || typeof value === 'symbol') {
    return String(value);
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
