import type { Fact, FieldValue } from '../types/fact.js';
import type { ObjectSchema } from '../types/schema.js';
import type { SourceCompiler } from '../compiler/types.js';
import { createFactRuntime } from '../compiler/fact-runtime.js';
import { generateFactSource, RUNTIME_BINDING } from '../compiler/source-generator.js';
import { CompiledTypeCache, type CompiledFactType } from './compiled-type-cache.js';
import { FactMaterializationError, MaterializationError } from './errors.js';
import type { TypeCoercionEngine } from './type-coercion.js';
import { getAccessorTable, isIdentifier, setterName } from '../utils/accessors.js';
import { isFact } from '../utils/value-semantics.js';

/** Coerced field values keyed by field name. */
export type FieldValues = ReadonlyMap<string, FieldValue>;

export interface ClassMaterializerOptions {
  compiler: SourceCompiler;
  coercion: TypeCoercionEngine;
  cache?: CompiledTypeCache;
}

export interface ClassMaterializerStats {
  compiled: number;
  compileFailures: number;
}

const RESERVED_FIELD_NAMES: ReadonlySet<string> = new Set(['constructor']);

/**
 * Materializes facts as instances of a class generated and compiled at run
 * time from the schema.
 */
export class ClassMaterializer {
  private readonly compiler: SourceCompiler;
  private readonly coercion: TypeCoercionEngine;
  private readonly cache: CompiledTypeCache;
  private compiled = 0;
  private compileFailures = 0;

  constructor(options: ClassMaterializerOptions) {
    this.compiler = options.compiler;
    this.coercion = options.coercion;
    this.cache = options.cache ?? new CompiledTypeCache();
  }

  /**
   * Returns the compiled class for the schema revision, compiling it on a
   * cache miss.
   *
   * @throws {MaterializationError} on invalid names or compile failures
   * @throws {CompilerUnavailableError} when the compiler cannot be loaded
   */
  compile(schema: ObjectSchema): CompiledFactType {
    const cached = this.cache.get(schema.name, schema.fingerprint);
    if (cached) {
      return cached;
    }

    const source = generateFactSource(schema);
    try {
      this.validateNames(schema, source);
      const ctor = this.compiler.compile({
        typeName: schema.name,
        source,
        globals: { [RUNTIME_BINDING]: createFactRuntime(schema, this.coercion) },
      });
      if (typeof ctor !== 'function') {
        throw new MaterializationError(`Compiler ${this.compiler.name} returned no class for ${schema.name}`, {
          typeName: schema.name,
          source,
        });
      }

      const entry: CompiledFactType = {
        typeName: schema.name,
        fingerprint: schema.fingerprint,
        source,
        construct: () => instantiate(ctor, schema.name, source),
      };
      this.cache.set(entry);
      this.compiled++;
      return entry;
    } catch (err) {
      this.compileFailures++;
      throw err;
    }
  }

  /**
   * Creates an instance with every field at its default, then writes each
   * value through its `setX` setter.
   */
  materialize(schema: ObjectSchema, values: FieldValues): Fact {
    const type = this.compile(schema);
    const fact = type.construct();

    for (const field of schema.fields) {
      if (!values.has(field.name)) continue;
      const setter: unknown = Reflect.get(fact, setterName(field.name));
      if (typeof setter !== 'function') {
        throw new MaterializationError(`Compiled ${schema.name} has no setter for field "${field.name}"`, {
          typeName: schema.name,
          source: type.source,
          field: field.name,
        });
      }
      Reflect.apply(setter, fact, [values.get(field.name) ?? null]);
    }
    return fact;
  }

  getStats(): ClassMaterializerStats {
    return { compiled: this.compiled, compileFailures: this.compileFailures };
  }

  private validateNames(schema: ObjectSchema, source: string): void {
    if (!isIdentifier(schema.name) || schema.name === RUNTIME_BINDING) {
      throw new MaterializationError(`Schema name "${schema.name}" is not a valid class name`, {
        typeName: schema.name,
        source,
      });
    }
    for (const field of schema.fields) {
      if (!isIdentifier(field.name) || RESERVED_FIELD_NAMES.has(field.name)) {
        throw new MaterializationError(`Field "${field.name}" of ${schema.name} is not a valid member name`, {
          typeName: schema.name,
          source,
          field: field.name,
        });
      }
    }
    const [collision] = getAccessorTable(schema).collisions;
    if (collision) {
      const [first, second] = collision.fields;
      throw new MaterializationError(
        `Fields "${first}" and "${second}" of ${schema.name} both map to accessor ${collision.accessor}`,
        { typeName: schema.name, source, field: second },
      );
    }
  }
}

function instantiate(ctor: Function, typeName: string, source: string): Fact {
  let instance: unknown;
  try {
    instance = Reflect.construct(ctor, []);
  } catch (err) {
    if (err instanceof FactMaterializationError) throw err;
    throw new MaterializationError(`Instantiation of ${typeName} failed`, { typeName, source, cause: err });
  }
  if (!isFact(instance)) {
    throw new MaterializationError(`Compiled ${typeName} does not implement the fact contract`, { typeName, source });
  }
  return instance;
}
