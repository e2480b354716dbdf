import type { Fact, FactRecord, FieldValue } from '../types/fact.js';
import type { FieldSpec, ObjectSchema } from '../types/schema.js';
import type { TypeCoercionEngine } from '../core/type-coercion.js';
import { UnsupportedOperationError } from '../core/errors.js';
import { displayValue, factEquals, factHashCode, factToRecord, isFact } from '../utils/value-semantics.js';

/**
 * Helpers a compiled fact class calls back into (bound as `__rt`).
 *
 * Everything that creates objects or throws lives here, so values and errors
 * reaching the caller belong to the main realm, not to the `vm` context the
 * class was evaluated in.
 */
export interface FactRuntime {
  fieldNames(): string[];
  coerce(field: string, value: unknown): FieldValue;
  unknownField(operation: string, field: string): never;
  unsupported(method: string): never;
  show(value: unknown): string;
  equals(fact: unknown, other: unknown): boolean;
  hashCode(fact: unknown): number;
  toRecord(fact: unknown): FactRecord;
}

export function unknownFieldError(factType: string, operation: string, field: string): UnsupportedOperationError {
  return new UnsupportedOperationError(factType, `${operation}(${JSON.stringify(field)})`);
}

export function createFactRuntime(schema: ObjectSchema, coercion: TypeCoercionEngine): FactRuntime {
  const fields = new Map<string, FieldSpec>(schema.fields.map((field) => [field.name, field]));
  const names = schema.fields.map((field) => field.name);

  const asFact = (value: unknown): Fact => {
    if (!isFact(value)) {
      throw new TypeError(`Compiled ${schema.name} instance does not implement the fact contract`);
    }
    return value;
  };

  return {
    fieldNames: () => [...names],

    coerce(field, value) {
      const spec = fields.get(field);
      if (!spec) {
        throw unknownFieldError(schema.name, 'set', field);
      }
      return coercion.coerce(value, spec);
    },

    unknownField(operation, field) {
      throw unknownFieldError(schema.name, operation, field);
    },

    unsupported(method) {
      throw new UnsupportedOperationError(schema.name, method);
    },

    show: displayValue,
    equals: (fact, other) => factEquals(asFact(fact), other),
    hashCode: (fact) => factHashCode(asFact(fact)),
    toRecord: (fact) => factToRecord(asFact(fact)),
  };
}
