/**
 * Validation of YAML/JSON schema definitions into `ObjectSchemaInput`.
 *
 * Error messages carry the dotted path of the offending value, e.g.
 * `schemas[1].fields[0].type: must be one of string, integer, ...`.
 *
 * @module
 */

import { FIELD_TYPES, type FieldSpecInput, type FieldType, type ObjectSchemaInput } from '../../types/schema.js';
import { isFieldType } from '../../core/object-schema.js';
import { DslError } from '../helpers/errors.js';

const FIELD_TYPES_MSG = FIELD_TYPES.join(', ');

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export class YamlValidationError extends DslError {
  readonly path: string;

  constructor(message: string, path: string) {
    super(`${path}: ${message}`);
    this.name = 'YamlValidationError';
    this.path = path;
  }
}

// ---------------------------------------------------------------------------
// Primitive validators
// ---------------------------------------------------------------------------

function has(obj: Record<string, unknown>, key: string): boolean {
  return key in obj && obj[key] !== undefined && obj[key] !== null;
}

function requireField(obj: Record<string, unknown>, field: string, path: string): unknown {
  if (!has(obj, field)) {
    throw new YamlValidationError(`missing required field "${field}"`, path);
  }
  return obj[field];
}

function requireString(value: unknown, path: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new YamlValidationError(
      `must be a non-empty string, got ${value === '' ? 'empty string' : typeof value}`,
      path,
    );
  }
  return value;
}

function requireBoolean(value: unknown, path: string): boolean {
  if (typeof value !== 'boolean') {
    throw new YamlValidationError(`must be a boolean, got ${typeof value}`, path);
  }
  return value;
}

function requireArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new YamlValidationError(`must be an array, got ${typeof value}`, path);
  }
  return value;
}

export function requireObject(value: unknown, path: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new YamlValidationError(
      `must be an object, got ${Array.isArray(value) ? 'array' : value === null ? 'null' : typeof value}`,
      path,
    );
  }
  return Object.fromEntries(Object.entries(value));
}

function requireFieldType(value: unknown, path: string): FieldType {
  const name = requireString(value, path);
  if (!isFieldType(name)) {
    throw new YamlValidationError(`must be one of ${FIELD_TYPES_MSG}, got "${name}"`, path);
  }
  return name;
}

function optionalString(o: Record<string, unknown>, key: string, path: string): string | undefined {
  return has(o, key) ? requireString(o[key], `${path}.${key}`) : undefined;
}

// ---------------------------------------------------------------------------
// Schema validators
// ---------------------------------------------------------------------------

function validateField(obj: unknown, path: string): FieldSpecInput {
  const o = requireObject(obj, path);

  const name = requireString(requireField(o, 'name', path), `${path}.name`);
  const type = requireFieldType(requireField(o, 'type', path), `${path}.type`);
  const field: FieldSpecInput = { name, type };

  if (has(o, 'required')) {
    field.required = requireBoolean(o['required'], `${path}.required`);
  }
  if (has(o, 'default')) {
    const value = o['default'];
    if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
      throw new YamlValidationError(`must be a string, number or boolean, got ${typeof value}`, `${path}.default`);
    }
    field.default = value;
  }

  const ref = optionalString(o, 'ref', path);
  if (ref !== undefined) {
    field.ref = ref;
  }

  // elementType takes a field type or, as a shorthand, the name of a schema
  const elementType = optionalString(o, 'elementType', path);
  const elementRef = optionalString(o, 'elementRef', path);
  if (elementType !== undefined) {
    if (isFieldType(elementType)) {
      field.elementType = elementType;
    } else {
      field.elementType = 'object';
      field.elementRef = elementType;
    }
  }
  if (elementRef !== undefined) {
    field.elementType = 'object';
    field.elementRef = elementRef;
  }

  return field;
}

/**
 * Validates one raw schema definition.
 *
 * @param path - dotted prefix for error messages (default `"schema"`)
 * @throws {YamlValidationError} on any structural error
 */
export function validateSchema(obj: unknown, path: string = 'schema'): ObjectSchemaInput {
  const o = requireObject(obj, path);

  const name = requireString(requireField(o, 'name', path), `${path}.name`);
  const rawFields = o['fields'] ?? [];
  const fields = requireArray(rawFields, `${path}.fields`).map((f, i) => validateField(f, `${path}.fields[${i}]`));

  const schema: ObjectSchemaInput = { name, fields };
  const namespace = optionalString(o, 'namespace', path);
  if (namespace !== undefined) {
    schema.namespace = namespace;
  }
  return schema;
}
