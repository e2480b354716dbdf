/**
 * Converts loosely typed JSON values into a field's declared type.
 *
 * Rules are evaluated in a fixed precedence: `null` handling first, then the
 * declared type decides. Conversions that are not possible raise
 * {@link CoercionError}; nothing is silently dropped.
 *
 * @module
 */

import type { Fact, FieldValue } from '../types/fact.js';
import type { FieldSpec, FieldType } from '../types/schema.js';
import { CoercionError } from './errors.js';
import { isFact, isPlainObject } from '../utils/value-semantics.js';

/** Hooks the engine needs for `object` fields. */
export interface CoercionContext {
  /** Materializes a nested JSON object against the referenced schema. */
  materializeNested(schemaName: string, record: Record<string, unknown>): Fact;
}

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

/** Decimal literal, optional sign and exponent; no hex, no `Infinity`. */
const NUMERIC_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function isScalar(value: unknown): value is string | number | boolean | bigint {
  const type = typeof value;
  return type === 'string' || type === 'number' || type === 'boolean' || type === 'bigint';
}

function parseNumeric(raw: string): number | null {
  const trimmed = raw.trim();
  if (!NUMERIC_RE.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

function toNumber(raw: unknown, field: FieldSpec, target: FieldType): number {
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) {
      throw new CoercionError(field.name, target, raw, 'not a finite number');
    }
    return raw;
  }
  if (typeof raw === 'bigint') {
    return Number(raw);
  }
  if (typeof raw === 'string') {
    const parsed = parseNumeric(raw);
    if (parsed === null) {
      throw new CoercionError(field.name, target, raw, 'not a numeric string');
    }
    return parsed;
  }
  throw new CoercionError(field.name, target, raw);
}

function toWholeNumber(raw: unknown, field: FieldSpec): number {
  const target = field.type;
  // Math.trunc(-0.5) is -0; normalize so equality and display stay intuitive
  const value = Math.trunc(toNumber(raw, field, target)) || 0;

  if (target === 'integer' && (value < INT32_MIN || value > INT32_MAX)) {
    throw new CoercionError(field.name, target, raw, 'out of 32-bit integer range');
  }
  if (target === 'long' && !Number.isSafeInteger(value)) {
    throw new CoercionError(field.name, target, raw, 'out of safe integer range');
  }
  return value;
}

function toBoolean(raw: unknown, field: FieldSpec): boolean {
  if (typeof raw === 'boolean') {
    return raw;
  }
  if (typeof raw === 'string') {
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
  }
  throw new CoercionError(field.name, 'boolean', raw);
}

function toList(raw: unknown, field: FieldSpec, context: CoercionContext | undefined): FieldValue[] {
  let items: unknown[];
  if (Array.isArray(raw)) {
    items = raw;
  } else if (isScalar(raw) || isFact(raw)) {
    // Single values are promoted to a one-element list
    items = [raw];
  } else {
    throw new CoercionError(field.name, 'list', raw);
  }

  const elementType = field.elementType;
  if (elementType === undefined) {
    return items.map((item, i) => toUntypedValue(item, field, i));
  }

  return items.map((item, i) =>
    coerceValue(
      item,
      {
        name: `${field.name}[${i}]`,
        type: elementType,
        required: false,
        defaultValue: null,
        ...(field.elementRef !== undefined && { ref: field.elementRef }),
      },
      context,
    ),
  );
}

/** Copies an element of an untyped list, keeping its JSON shape. */
function toUntypedValue(item: unknown, field: FieldSpec, index: number): FieldValue {
  if (item === null || item === undefined) {
    return null;
  }
  if (typeof item === 'string' || typeof item === 'number' || typeof item === 'boolean') {
    return item;
  }
  if (typeof item === 'bigint') {
    return Number(item);
  }
  if (isFact(item)) {
    return item;
  }
  if (Array.isArray(item)) {
    return item.map((nested, i) => toUntypedValue(nested, field, i));
  }
  if (isPlainObject(item)) {
    return toMapValue(item, field);
  }
  throw new CoercionError(`${field.name}[${index}]`, 'list', item, 'unsupported element');
}

function toMapValue(raw: Record<string, unknown>, field: FieldSpec): { [key: string]: FieldValue } {
  // fromEntries keeps a "__proto__" key as an own property
  return Object.fromEntries(Object.entries(raw).map(([key, value]) => [key, toUntypedValue(value, field, 0)]));
}

function toObjectReference(raw: unknown, field: FieldSpec, context: CoercionContext | undefined): Fact {
  const ref = field.ref;
  if (ref === undefined) {
    throw new CoercionError(field.name, 'object', raw, 'field has no referenced schema');
  }
  if (isFact(raw)) {
    if (raw.factType !== ref) {
      throw new CoercionError(field.name, 'object', raw, `expected a ${ref} fact, got ${raw.factType}`);
    }
    return raw;
  }
  if (isPlainObject(raw)) {
    if (!context) {
      throw new CoercionError(field.name, 'object', raw, 'nested materialization is not available');
    }
    return context.materializeNested(ref, raw);
  }
  throw new CoercionError(field.name, 'object', raw);
}

/**
 * Coerces `raw` to the declared type of `field`.
 *
 * `null`/`undefined` resolve to the field's default (or `null`); whether a
 * missing required value is an error is decided by the caller.
 *
 * @throws {CoercionError} when the value cannot be converted
 */
export function coerceValue(raw: unknown, field: FieldSpec, context?: CoercionContext): FieldValue {
  if (raw === null || raw === undefined) {
    return field.defaultValue;
  }

  switch (field.type) {
    case 'string':
      if (!isScalar(raw)) {
        throw new CoercionError(field.name, 'string', raw, 'collections cannot be converted to text');
      }
      return String(raw);

    case 'integer':
    case 'long':
      return toWholeNumber(raw, field);

    case 'double':
      return toNumber(raw, field, 'double');

    case 'boolean':
      return toBoolean(raw, field);

    case 'list':
      return toList(raw, field, context);

    case 'map':
      if (!isPlainObject(raw)) {
        throw new CoercionError(field.name, 'map', raw, 'expected a JSON object');
      }
      return toMapValue(raw, field);

    case 'object':
      return toObjectReference(raw, field, context);
  }
}

/**
 * Stateful front of {@link coerceValue} bound to a nested-materialization
 * context.
 */
export class TypeCoercionEngine {
  private readonly context: CoercionContext | undefined;

  constructor(context?: CoercionContext) {
    this.context = context;
  }

  coerce(raw: unknown, field: FieldSpec): FieldValue {
    return coerceValue(raw, field, this.context);
  }
}
