import type { Fact, FieldValue } from '../types/fact.js';
import type { ObjectSchema } from '../types/schema.js';
import type { SourceCompiler } from '../compiler/types.js';
import { TypeScriptCompiler } from '../compiler/typescript-compiler.js';
import { ClassMaterializer } from './class-materializer.js';
import { CompiledTypeCache, type CompiledTypeCacheConfig } from './compiled-type-cache.js';
import {
  BatchMaterializationError,
  CompilerUnavailableError,
  FactMaterializationError,
  InvalidFactInputError,
  SchemaNotFoundError,
  ValidationError,
  type BatchFailure,
} from './errors.js';
import { ProxyMaterializer } from './proxy-materializer.js';
import type { SchemaChangeEvent, SchemaRegistry } from './schema-registry.js';
import { TypeCoercionEngine } from './type-coercion.js';
import { isPlainObject } from '../utils/value-semantics.js';

export type MaterializationStrategy = 'compiled' | 'proxy';

export interface FactMaterializerConfig {
  /** Prefix of log messages. */
  name?: string;
  /** Preferred strategy (default `compiled`). */
  strategy?: MaterializationStrategy;
  /** Switch to proxies when the compiler cannot be loaded (default true). */
  fallbackToProxy?: boolean;
  /** Key naming the schema of an auto-detected fact (default `_type`). */
  discriminatorKey?: string;
  /** Maximum nesting of object fields (default 32). */
  maxDepth?: number;
  cache?: CompiledTypeCacheConfig;
  compiler?: SourceCompiler;
}

export interface ResolvedMaterializerConfig {
  name: string;
  strategy: MaterializationStrategy;
  fallbackToProxy: boolean;
  discriminatorKey: string;
  maxDepth: number;
  cache: Required<CompiledTypeCacheConfig>;
  compiler: SourceCompiler;
}

export function resolveMaterializerConfig(config: FactMaterializerConfig = {}): ResolvedMaterializerConfig {
  const maxDepth = config.maxDepth ?? 32;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
  }
  const discriminatorKey = config.discriminatorKey ?? '_type';
  if (discriminatorKey.length === 0) {
    throw new RangeError('discriminatorKey cannot be empty');
  }
  return {
    name: config.name ?? 'materializer',
    strategy: config.strategy ?? 'compiled',
    fallbackToProxy: config.fallbackToProxy ?? true,
    discriminatorKey,
    maxDepth,
    cache: { maxEntries: config.cache?.maxEntries ?? 256 },
    compiler: config.compiler ?? new TypeScriptCompiler(),
  };
}

/** Result of one element of a batch, in input position. */
export type MaterializationOutcome =
  | { index: number; status: 'fulfilled'; fact: Fact }
  | { index: number; status: 'rejected'; error: FactMaterializationError };

export interface MaterializerStats {
  strategy: MaterializationStrategy;
  materialized: number;
  failed: number;
  compiled: number;
  compileFailures: number;
  cacheHits: number;
  cacheMisses: number;
  fallbacks: number;
  cacheSize: number;
}

/**
 * Turns schema-free JSON into facts of registered schemas.
 *
 * Validation and coercion happen here; the active strategy only builds the
 * fact from already coerced values.
 */
export class FactMaterializer {
  private readonly registry: SchemaRegistry;
  private readonly config: ResolvedMaterializerConfig;
  private readonly cache: CompiledTypeCache;
  private readonly coercion: TypeCoercionEngine;
  private readonly classes: ClassMaterializer;
  private readonly proxies: ProxyMaterializer;
  private readonly unsubscribe: () => void;
  private strategy: MaterializationStrategy;
  private depth = 0;
  private materialized = 0;
  private failed = 0;
  private fallbacks = 0;

  constructor(registry: SchemaRegistry, config: FactMaterializerConfig = {}) {
    this.registry = registry;
    this.config = resolveMaterializerConfig(config);
    this.strategy = this.config.strategy;
    this.cache = new CompiledTypeCache(this.config.cache);
    this.coercion = new TypeCoercionEngine({
      materializeNested: (schemaName, record) => this.materializeRecord(schemaName, record),
    });
    this.classes = new ClassMaterializer({
      compiler: this.config.compiler,
      coercion: this.coercion,
      cache: this.cache,
    });
    this.proxies = new ProxyMaterializer(this.coercion);
    this.unsubscribe = registry.subscribe((event) => this.onSchemaChange(event));
  }

  /**
   * Materializes a JSON object or array against one schema.
   *
   * @throws {InvalidFactInputError} when the text is not JSON or an element
   *   is not an object
   * @throws {BatchMaterializationError} when some elements of an array fail
   */
  fromJson(jsonText: string, schemaName: string): Fact[] {
    return this.fromParsed(this.parse(jsonText), schemaName);
  }

  /** Like {@link fromJson}, with the schema of each element taken from its discriminator. */
  fromJsonAutoDetect(jsonText: string): Fact[] {
    return this.fromParsed(this.parse(jsonText), undefined);
  }

  /**
   * Per-position outcomes instead of a batch error. Auto-detects the schema
   * when `schemaName` is omitted.
   */
  fromJsonSettled(jsonText: string, schemaName?: string): MaterializationOutcome[] {
    return this.fromValue(this.parse(jsonText), schemaName);
  }

  fromValue(value: unknown, schemaName?: string): MaterializationOutcome[] {
    const elements = Array.isArray(value) ? value : [value];
    return elements.map((element, index): MaterializationOutcome => {
      try {
        return { index, status: 'fulfilled', fact: this.materializeTopLevel(element, schemaName) };
      } catch (err) {
        if (err instanceof FactMaterializationError) {
          return { index, status: 'rejected', error: err };
        }
        throw err;
      }
    });
  }

  materialize(schemaName: string, record: Record<string, unknown>): Fact {
    return this.materializeTopLevel(record, schemaName);
  }

  materializeMany(schemaName: string, records: readonly Record<string, unknown>[]): Fact[] {
    return this.fromParsed(records, schemaName);
  }

  getStrategy(): MaterializationStrategy {
    return this.strategy;
  }

  getStats(): MaterializerStats {
    const cacheStats = this.cache.getStats();
    const classStats = this.classes.getStats();
    return {
      strategy: this.strategy,
      materialized: this.materialized,
      failed: this.failed,
      compiled: classStats.compiled,
      compileFailures: classStats.compileFailures,
      cacheHits: cacheStats.hits,
      cacheMisses: cacheStats.misses,
      fallbacks: this.fallbacks,
      cacheSize: cacheStats.size,
    };
  }

  /** Drops the compiled class of one schema, or of all schemas. */
  invalidate(schemaName?: string): void {
    if (schemaName === undefined) {
      this.cache.clear();
    } else {
      this.cache.invalidate(schemaName);
    }
  }

  dispose(): void {
    this.unsubscribe();
    this.cache.clear();
  }

  private parse(jsonText: string): unknown {
    try {
      const parsed: unknown = JSON.parse(jsonText);
      return parsed;
    } catch (err) {
      throw new InvalidFactInputError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }
  }

  private fromParsed(value: unknown, schemaName: string | undefined): Fact[] {
    if (!Array.isArray(value)) {
      return [this.materializeTopLevel(value, schemaName)];
    }

    const facts: Fact[] = [];
    const failures: BatchFailure[] = [];
    for (const outcome of this.fromValue(value, schemaName)) {
      if (outcome.status === 'fulfilled') {
        facts.push(outcome.fact);
      } else {
        failures.push({ index: outcome.index, error: outcome.error });
      }
    }
    if (failures.length > 0) {
      throw new BatchMaterializationError(facts, failures);
    }
    return facts;
  }

  private materializeTopLevel(element: unknown, schemaName: string | undefined): Fact {
    try {
      if (!isPlainObject(element)) {
        throw new InvalidFactInputError(
          `Expected a JSON object, got ${Array.isArray(element) ? 'array' : element === null ? 'null' : typeof element}`,
        );
      }
      const fact = this.materializeRecord(schemaName ?? this.detectSchema(element), element);
      this.materialized++;
      return fact;
    } catch (err) {
      this.failed++;
      throw err;
    }
  }

  private detectSchema(record: Record<string, unknown>): string {
    const key = this.config.discriminatorKey;
    const name = Object.hasOwn(record, key) ? record[key] : undefined;
    if (typeof name !== 'string' || name.trim().length === 0) {
      throw SchemaNotFoundError.missingDiscriminator(key);
    }
    return name.trim();
  }

  private materializeRecord(schemaName: string, record: Record<string, unknown>): Fact {
    if (this.depth >= this.config.maxDepth) {
      throw new InvalidFactInputError(`Facts nested deeper than ${this.config.maxDepth} levels`);
    }
    this.depth++;
    try {
      const schema = this.registry.getSchema(schemaName);
      this.checkRequired(schema, record);

      const values = new Map<string, FieldValue>();
      for (const field of schema.fields) {
        values.set(field.name, this.coercion.coerce(this.rawValue(record, field.name), field));
      }
      return this.instantiate(schema, values);
    } finally {
      this.depth--;
    }
  }

  private rawValue(record: Record<string, unknown>, field: string): unknown {
    if (field === this.config.discriminatorKey || !Object.hasOwn(record, field)) {
      return undefined;
    }
    return record[field];
  }

  private checkRequired(schema: ObjectSchema, record: Record<string, unknown>): void {
    const missing = schema.fields
      .filter((field) => {
        if (!field.required || field.defaultValue !== null) return false;
        const raw = this.rawValue(record, field.name);
        return raw === undefined || raw === null;
      })
      .map((field) => field.name);
    if (missing.length > 0) {
      throw new ValidationError(schema.name, missing);
    }
  }

  private instantiate(schema: ObjectSchema, values: Map<string, FieldValue>): Fact {
    if (this.strategy === 'proxy') {
      return this.proxies.materialize(schema, values);
    }
    try {
      return this.classes.materialize(schema, values);
    } catch (err) {
      if (err instanceof CompilerUnavailableError && this.config.fallbackToProxy) {
        this.switchToProxy(err);
        return this.proxies.materialize(schema, values);
      }
      throw err;
    }
  }

  private switchToProxy(err: CompilerUnavailableError): void {
    this.strategy = 'proxy';
    this.fallbacks++;
    console.warn(`[${this.config.name}] ${err.message}; materializing facts as proxies from now on`);
  }

  private onSchemaChange(event: SchemaChangeEvent): void {
    if (event.type === 'cleared') {
      this.cache.clear();
    } else {
      this.cache.invalidate(event.name);
    }
  }
}
