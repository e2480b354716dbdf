/**
 * Builds immutable, validated {@link ObjectSchema} instances from declarative
 * input.
 *
 * @module
 */

import { createHash } from 'node:crypto';
import type { FieldValue } from '../types/fact.js';
import {
  FIELD_TYPES,
  type FieldSpec,
  type FieldSpecInput,
  type FieldType,
  type ObjectSchema,
  type ObjectSchemaInput,
} from '../types/schema.js';
import { CoercionError, SchemaDefinitionError } from './errors.js';
import { coerceValue } from './type-coercion.js';

const FIELD_TYPE_SET: ReadonlySet<string> = new Set(FIELD_TYPES);

export function isFieldType(value: unknown): value is FieldType {
  return typeof value === 'string' && FIELD_TYPE_SET.has(value);
}

function requireName(value: unknown, what: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new SchemaDefinitionError(`${what} cannot be empty`);
  }
  return value.trim();
}

function buildDefault(input: FieldSpecInput, base: FieldSpec): FieldValue {
  const raw = input.default;
  if (raw === undefined || raw === null) {
    return null;
  }
  if (typeof raw !== 'string' && typeof raw !== 'number' && typeof raw !== 'boolean') {
    throw new SchemaDefinitionError(`Default of field "${base.name}" must be a string, number or boolean`);
  }
  if (base.type === 'object' || base.type === 'list' || base.type === 'map') {
    throw new SchemaDefinitionError(`Field "${base.name}" of type ${base.type} cannot have a default value`);
  }
  try {
    return coerceValue(raw, base);
  } catch (err) {
    if (err instanceof CoercionError) {
      throw new SchemaDefinitionError(`Invalid default for field "${base.name}": ${err.message}`, { cause: err });
    }
    throw err;
  }
}

function buildField(input: FieldSpecInput, schemaName: string): FieldSpec {
  const name = requireName(input.name, `Field name in ${schemaName}`);

  if (!isFieldType(input.type)) {
    throw new SchemaDefinitionError(
      `Field "${name}" has unknown type "${String(input.type)}" (expected one of: ${FIELD_TYPES.join(', ')})`,
    );
  }
  const type = input.type;

  if (type === 'object' && !input.ref) {
    throw new SchemaDefinitionError(`Field "${name}" of type object must reference a schema`);
  }
  if (type !== 'object' && input.ref !== undefined) {
    throw new SchemaDefinitionError(`Field "${name}" of type ${type} cannot reference a schema`);
  }
  if (input.elementType !== undefined) {
    if (type !== 'list') {
      throw new SchemaDefinitionError(`Only list fields take an element type ("${name}" is ${type})`);
    }
    if (!isFieldType(input.elementType)) {
      throw new SchemaDefinitionError(`Field "${name}" has unknown element type "${String(input.elementType)}"`);
    }
    if (input.elementType === 'object' && !input.elementRef) {
      throw new SchemaDefinitionError(`List field "${name}" of objects must reference an element schema`);
    }
  }
  if (input.elementRef !== undefined && input.elementType !== 'object') {
    throw new SchemaDefinitionError(`Field "${name}" has an element schema but no object element type`);
  }

  const base: FieldSpec = {
    name,
    type,
    required: input.required ?? false,
    defaultValue: null,
    ...(input.ref !== undefined && { ref: input.ref.trim() }),
    ...(input.elementType !== undefined && { elementType: input.elementType }),
    ...(input.elementRef !== undefined && { elementRef: input.elementRef.trim() }),
  };

  return Object.freeze({ ...base, defaultValue: buildDefault(input, base) });
}

/** Canonical JSON of a schema revision, independent of input key order. */
function canonicalForm(name: string, namespace: string | undefined, fields: readonly FieldSpec[]): string {
  return JSON.stringify({
    name,
    namespace: namespace ?? null,
    fields: fields.map((f) => [
      f.name,
      f.type,
      f.required,
      f.defaultValue,
      f.ref ?? null,
      f.elementType ?? null,
      f.elementRef ?? null,
    ]),
  });
}

export function schemaFingerprint(name: string, namespace: string | undefined, fields: readonly FieldSpec[]): string {
  return createHash('sha256').update(canonicalForm(name, namespace, fields)).digest('hex');
}

/**
 * Validates declarative input and returns a frozen schema.
 *
 * Defaults are coerced to their field type here, so a schema never carries a
 * default that would fail at materialization time.
 *
 * @throws {SchemaDefinitionError} on empty names, duplicate fields, unknown
 *   types, bad references or defaults that do not fit the field type
 */
export function buildObjectSchema(input: ObjectSchemaInput): ObjectSchema {
  const name = requireName(input.name, 'Schema name');
  const namespace =
    input.namespace !== undefined && input.namespace.trim().length > 0 ? input.namespace.trim() : undefined;

  if (!Array.isArray(input.fields)) {
    throw new SchemaDefinitionError(`Schema ${name} must declare a list of fields`);
  }

  const fields: FieldSpec[] = [];
  const seen = new Set<string>();
  for (const fieldInput of input.fields) {
    const field = buildField(fieldInput, name);
    if (seen.has(field.name)) {
      throw new SchemaDefinitionError(`Field "${field.name}" is declared twice in ${name}`);
    }
    seen.add(field.name);
    fields.push(field);
  }

  const schema: ObjectSchema = {
    name,
    ...(namespace !== undefined && { namespace }),
    fields: Object.freeze(fields),
    fingerprint: schemaFingerprint(name, namespace, fields),
  };
  return Object.freeze(schema);
}

/**
 * Schema with already validated fields appended, under a new fingerprint.
 *
 * @throws {SchemaDefinitionError} when an appended field name is taken
 */
export function appendFields(schema: ObjectSchema, extra: readonly FieldSpec[]): ObjectSchema {
  for (const field of extra) {
    if (findField(schema, field.name)) {
      throw new SchemaDefinitionError(`Field "${field.name}" is declared twice in ${schema.name}`);
    }
  }
  const fields = [...schema.fields, ...extra];
  return Object.freeze({
    name: schema.name,
    ...(schema.namespace !== undefined && { namespace: schema.namespace }),
    fields: Object.freeze(fields),
    fingerprint: schemaFingerprint(schema.name, schema.namespace, fields),
  });
}

export function findField(schema: ObjectSchema, name: string): FieldSpec | undefined {
  return schema.fields.find((field) => field.name === name);
}

/** Fully qualified name (`namespace.Name`). */
export function qualifiedName(schema: ObjectSchema): string {
  return schema.namespace ? `${schema.namespace}.${schema.name}` : schema.name;
}
