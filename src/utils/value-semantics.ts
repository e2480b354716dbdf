/**
 * Structural equality, hashing and display of field values.
 *
 * Shared by both materialization strategies so that a compiled-class fact and
 * a proxy fact with the same schema name and field values are equal, hash
 * equal and print the same.
 */

import type { Fact, FactRecord, RecordValue } from '../types/fact.js';

const FACT_METHODS = ['fieldNames', 'get', 'set', 'has', 'equals', 'hashCode', 'toRecord', 'invoke'] as const;

/** Type guard: value implements the {@link Fact} contract. */
export function isFact(value: unknown): value is Fact {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (typeof Reflect.get(value, 'factType') !== 'string') {
    return false;
  }
  return FACT_METHODS.every((method) => typeof Reflect.get(value, method) === 'function');
}

/** Type guard: plain JSON-like object (not an array, not a fact). */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** 31-multiplier string hash; stable across runs. */
export function hashString(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0;
  }
  return hash;
}

export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) {
    return true;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return Number.isNaN(a) && Number.isNaN(b);
  }
  if (isFact(a)) {
    return a.equals(b);
  }
  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    return a.every((item, i) => valuesEqual(item, b[i]));
  }
  if (isPlainObject(a)) {
    if (!isPlainObject(b)) {
      return false;
    }
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) {
      return false;
    }
    return keys.every((key) => Object.hasOwn(b, key) && valuesEqual(a[key], b[key]));
  }
  return false;
}

export function hashValue(value: unknown): number {
  if (value === null || value === undefined) {
    return 0;
  }
  switch (typeof value) {
    case 'string':
      return hashString(value);
    case 'boolean':
      return value ? 1231 : 1237;
    case 'number':
      return Number.isInteger(value) && (value | 0) === value ? value | 0 : hashString(String(value));
    default:
      break;
  }
  if (isFact(value)) {
    return value.hashCode();
  }
  if (Array.isArray(value)) {
    let hash = 1;
    for (const item of value) {
      hash = (Math.imul(31, hash) + hashValue(item)) | 0;
    }
    return hash;
  }
  if (isPlainObject(value)) {
    return hashEntries(Object.entries(value));
  }
  return hashString(String(value));
}

/** Order-insensitive hash of key/value pairs. */
export function hashEntries(entries: Iterable<readonly [string, unknown]>): number {
  let hash = 0;
  for (const [key, value] of entries) {
    hash = (hash + (hashString(key) ^ hashValue(value))) | 0;
  }
  return hash;
}

/** Text form used by `toString()`: `[a, b]` for lists, `{k=v}` for maps. */
export function displayValue(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (isFact(value)) {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return `[${value.map(displayValue).join(', ')}]`;
  }
  if (isPlainObject(value)) {
    return `{${Object.entries(value)
      .map(([key, item]) => `${key}=${displayValue(item)}`)
      .join(', ')}}`;
  }
  return String(value);
}

/** Converts a field value into its plain JSON form (facts become records). */
export function toRecordValue(value: unknown): RecordValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (isFact(value)) {
    return value.toRecord();
  }
  if (Array.isArray(value)) {
    return value.map(toRecordValue);
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, toRecordValue(item)]));
  }
  return String(value);
}

// ---------------------------------------------------------------------------
// Fact-level helpers
// ---------------------------------------------------------------------------

export function factEquals(fact: Fact, other: unknown): boolean {
  if (fact === other) {
    return true;
  }
  if (!isFact(other) || other.factType !== fact.factType) {
    return false;
  }
  const names = fact.fieldNames();
  const otherNames = other.fieldNames();
  if (names.length !== otherNames.length) {
    return false;
  }
  return names.every((name) => other.has(name) && valuesEqual(fact.get(name), other.get(name)));
}

export function factHashCode(fact: Fact): number {
  const fields = fact.fieldNames().map((name): readonly [string, unknown] => [name, fact.get(name)]);
  return (Math.imul(31, hashString(fact.factType)) + hashEntries(fields)) | 0;
}

/** `SchemaName{field1=v1, field2=v2}` in declared field order. */
export function factToString(fact: Fact): string {
  const fields = fact.fieldNames().map((name) => `${name}=${displayValue(fact.get(name))}`);
  return `${fact.factType}{${fields.join(', ')}}`;
}

export function factToRecord(fact: Fact): FactRecord {
  return Object.fromEntries(fact.fieldNames().map((name) => [name, toRecordValue(fact.get(name))]));
}

