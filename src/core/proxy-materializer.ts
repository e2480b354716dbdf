import type { Fact, FactRecord, FieldValue } from '../types/fact.js';
import type { ObjectSchema } from '../types/schema.js';
import { unknownFieldError } from '../compiler/fact-runtime.js';
import { UnsupportedOperationError } from './errors.js';
import type { TypeCoercionEngine } from './type-coercion.js';
import type { FieldValues } from './class-materializer.js';
import { ACCESSOR_NAME_RE, getAccessorTable } from '../utils/accessors.js';
import { factEquals, factHashCode, factToRecord, factToString } from '../utils/value-semantics.js';

/**
 * Fact backed by an ordered field map. Bean-style accessors are not members;
 * {@link ProxyMaterializer} resolves them through a `Proxy`.
 */
export class FieldMapFact implements Fact {
  readonly schema: ObjectSchema;
  private readonly values: Map<string, FieldValue>;
  private readonly coercion: TypeCoercionEngine;

  constructor(schema: ObjectSchema, values: FieldValues, coercion: TypeCoercionEngine) {
    this.schema = schema;
    this.coercion = coercion;
    this.values = new Map(schema.fields.map((f) => [f.name, values.has(f.name) ? (values.get(f.name) ?? null) : f.defaultValue]));
  }

  get factType(): string {
    return this.schema.name;
  }

  fieldNames(): string[] {
    return [...this.values.keys()];
  }

  get(field: string): FieldValue {
    const value = this.values.get(field);
    if (value === undefined) {
      throw unknownFieldError(this.factType, 'get', field);
    }
    return value;
  }

  set(field: string, value: unknown): void {
    const spec = this.schema.fields.find((f) => f.name === field);
    if (!spec) {
      throw unknownFieldError(this.factType, 'set', field);
    }
    this.values.set(field, this.coercion.coerce(value, spec));
  }

  has(field: string): boolean {
    return this.values.has(field);
  }

  invoke(method: string, ...args: unknown[]): unknown {
    const entry = getAccessorTable(this.schema).entries.get(method);
    if (entry) {
      if (entry.kind === 'get') {
        return this.get(entry.field.name);
      }
      this.set(entry.field.name, args[0]);
      return undefined;
    }
    switch (method) {
      case 'equals':
        return this.equals(args[0]);
      case 'hashCode':
        return this.hashCode();
      case 'toString':
        return this.toString();
      case 'toRecord':
        return this.toRecord();
      default:
        throw new UnsupportedOperationError(this.factType, method);
    }
  }

  equals(other: unknown): boolean {
    return factEquals(this, other);
  }

  hashCode(): number {
    return factHashCode(this);
  }

  toString(): string {
    return factToString(this);
  }

  toRecord(): FactRecord {
    return factToRecord(this);
  }

  toJSON(): FactRecord {
    return this.toRecord();
  }
}

function isFactMember(target: FieldMapFact, prop: string): boolean {
  return Object.hasOwn(target, prop) || Object.hasOwn(FieldMapFact.prototype, prop);
}

function createAccessorProxy(fact: FieldMapFact): Fact {
  const table = getAccessorTable(fact.schema);

  return new Proxy(fact, {
    get(target, prop, receiver) {
      if (typeof prop !== 'string' || isFactMember(target, prop)) {
        return Reflect.get(target, prop, receiver);
      }
      // Field accessors shadow Object.prototype members such as isPrototypeOf
      const entry = table.entries.get(prop);
      if (entry) {
        const field = entry.field.name;
        return entry.kind === 'get'
          ? () => target.get(field)
          : (value: unknown) => {
              target.set(field, value);
            };
      }
      if (prop in target) {
        return Reflect.get(target, prop, receiver);
      }
      if (ACCESSOR_NAME_RE.test(prop)) {
        return () => {
          throw new UnsupportedOperationError(target.factType, prop);
        };
      }
      return undefined;
    },

    has(target, prop) {
      return prop in target || (typeof prop === 'string' && table.entries.has(prop));
    },
  });
}

/**
 * Materializes facts without compiling anything: a {@link FieldMapFact}
 * wrapped in a `Proxy` that answers `getX`/`isX`/`setX`.
 */
export class ProxyMaterializer {
  private readonly coercion: TypeCoercionEngine;

  constructor(coercion: TypeCoercionEngine) {
    this.coercion = coercion;
  }

  materialize(schema: ObjectSchema, values: FieldValues): Fact {
    return createAccessorProxy(new FieldMapFact(schema, values, this.coercion));
  }
}
