import { describe, it, expect } from 'vitest';
import {
  displayValue,
  factEquals,
  factHashCode,
  factToRecord,
  factToString,
  hashString,
  hashValue,
  isFact,
  isPlainObject,
  toRecordValue,
  valuesEqual,
} from '../../../src/utils/value-semantics.js';
import type { Fact, FieldValue } from '../../../src/types/fact.js';

/** Minimal map-backed fact for exercising the helpers. */
function mapFact(factType: string, fields: Record<string, FieldValue>): Fact {
  const fact: Fact = {
    factType,
    fieldNames: () => Object.keys(fields),
    get: (name) => fields[name] ?? null,
    set: (name, value) => {
      fields[name] = typeof value === 'string' ? value : null;
    },
    has: (name) => Object.hasOwn(fields, name),
    invoke: () => undefined,
    equals: (other) => factEquals(fact, other),
    hashCode: () => factHashCode(fact),
    toString: () => factToString(fact),
    toRecord: () => factToRecord(fact),
    toJSON: () => factToRecord(fact),
  };
  return fact;
}

describe('isFact', () => {
  it('accepts objects implementing the fact contract', () => {
    expect(isFact(mapFact('Person', {}))).toBe(true);
  });

  it('rejects plain objects and primitives', () => {
    expect(isFact({ factType: 'Person' })).toBe(false);
    expect(isFact(null)).toBe(false);
    expect(isFact('Person')).toBe(false);
  });
});

describe('isPlainObject', () => {
  it('accepts object literals and null-prototype objects', () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
  });

  it('rejects arrays, class instances and facts', () => {
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(new Date(0))).toBe(false);
    expect(isPlainObject(null)).toBe(false);
  });
});

describe('hashString', () => {
  it('matches the classic 31-multiplier string hash', () => {
    expect(hashString('')).toBe(0);
    expect(hashString('a')).toBe(97);
    expect(hashString('ab')).toBe(3105);
  });
});

describe('valuesEqual', () => {
  it('compares scalars by value', () => {
    expect(valuesEqual('a', 'a')).toBe(true);
    expect(valuesEqual(1, 1.0)).toBe(true);
    expect(valuesEqual(1, '1')).toBe(false);
    expect(valuesEqual(Number.NaN, Number.NaN)).toBe(true);
  });

  it('compares lists element-wise and in order', () => {
    expect(valuesEqual([1, [2]], [1, [2]])).toBe(true);
    expect(valuesEqual([1, 2], [2, 1])).toBe(false);
    expect(valuesEqual([1], [1, 2])).toBe(false);
  });

  it('compares maps independent of key order', () => {
    expect(valuesEqual({ a: 1, b: 2 }, { b: 2, a: 1 })).toBe(true);
    expect(valuesEqual({ a: 1 }, { a: 1, b: undefined })).toBe(false);
    expect(valuesEqual({ a: 1 }, [1])).toBe(false);
  });

  it('delegates to fact equality', () => {
    expect(valuesEqual(mapFact('T', { x: 'a' }), mapFact('T', { x: 'a' }))).toBe(true);
    expect(valuesEqual(mapFact('T', { x: 'a' }), mapFact('U', { x: 'a' }))).toBe(false);
  });
});

describe('hashValue', () => {
  it('hashes 32-bit integers to themselves and booleans to fixed codes', () => {
    expect(hashValue(42)).toBe(42);
    expect(hashValue(true)).toBe(1231);
    expect(hashValue(false)).toBe(1237);
    expect(hashValue(null)).toBe(0);
  });

  it('hashes lists in order', () => {
    // 31 * (31 * 1 + 1) + 2
    expect(hashValue([1, 2])).toBe(994);
    expect(hashValue([2, 1])).not.toBe(hashValue([1, 2]));
  });

  it('hashes maps independent of key order', () => {
    expect(hashValue({ a: 1, b: 2 })).toBe(hashValue({ b: 2, a: 1 }));
  });
});

describe('displayValue', () => {
  it('renders nested collections', () => {
    expect(displayValue(null)).toBe('null');
    expect(displayValue('Jane')).toBe('Jane');
    expect(displayValue([1, 'a', null])).toBe('[1, a, null]');
    expect(displayValue({ k: [true] })).toBe('{k=[true]}');
  });

  it('renders facts through their toString', () => {
    expect(displayValue(mapFact('Tag', { label: 'x' }))).toBe('Tag{label=x}');
  });
});

describe('toRecordValue', () => {
  it('turns facts inside collections into records', () => {
    expect(toRecordValue([mapFact('Tag', { label: 'x' })])).toEqual([{ label: 'x' }]);
    expect(toRecordValue(undefined)).toBeNull();
  });
});

describe('fact helpers', () => {
  it('equal field values make equal facts with equal hashes', () => {
    const a = mapFact('Person', { name: 'Jane', age: 16 });
    const b = mapFact('Person', { age: 16, name: 'Jane' });

    expect(factEquals(a, b)).toBe(true);
    expect(factHashCode(a)).toBe(factHashCode(b));
  });

  it('differing values or schema names are not equal', () => {
    const a = mapFact('Person', { name: 'Jane' });

    expect(factEquals(a, mapFact('Person', { name: 'John' }))).toBe(false);
    expect(factEquals(a, mapFact('Employee', { name: 'Jane' }))).toBe(false);
    expect(factEquals(a, mapFact('Person', { name: 'Jane', age: 1 }))).toBe(false);
    expect(factEquals(a, { name: 'Jane' })).toBe(false);
  });

  it('renders toString in field order', () => {
    expect(factToString(mapFact('Person', { name: 'Jane', age: 16, tags: ['a'] }))).toBe(
      'Person{name=Jane, age=16, tags=[a]}',
    );
  });

  it('renders nested facts as records', () => {
    const person = mapFact('Person', { address: mapFact('Address', { city: 'Brno' }) });

    expect(factToRecord(person)).toEqual({ address: { city: 'Brno' } });
  });
});
