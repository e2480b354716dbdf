import { describe, it, expect, beforeEach } from 'vitest';
import { FieldMapFact, ProxyMaterializer } from '../../../src/core/proxy-materializer.js';
import { buildObjectSchema } from '../../../src/core/object-schema.js';
import { TypeCoercionEngine } from '../../../src/core/type-coercion.js';
import { CoercionError, UnsupportedOperationError } from '../../../src/core/errors.js';
import type { Fact, FieldValue } from '../../../src/types/fact.js';

function call(fact: Fact, method: string, ...args: unknown[]): unknown {
  const fn: unknown = Reflect.get(fact, method);
  if (typeof fn !== 'function') {
    throw new TypeError(`${fact.factType} has no method ${method}`);
  }
  return Reflect.apply(fn, fact, args);
}

function values(entries: Record<string, FieldValue>): Map<string, FieldValue> {
  return new Map(Object.entries(entries));
}

const person = buildObjectSchema({
  name: 'Person',
  fields: [
    { name: 'name', type: 'string', required: true },
    { name: 'age', type: 'integer' },
    { name: 'adult', type: 'boolean', default: false },
  ],
});

describe('ProxyMaterializer', () => {
  const coercion = new TypeCoercionEngine();
  let fact: Fact;

  beforeEach(() => {
    fact = new ProxyMaterializer(coercion).materialize(person, values({ name: 'Jane', age: 16 }));
  });

  it('answers accessors for every field', () => {
    expect(call(fact, 'getName')).toBe('Jane');
    expect(call(fact, 'getAge')).toBe(16);
    expect(call(fact, 'isAdult')).toBe(false);
  });

  it('reports accessors as present', () => {
    expect('getName' in fact).toBe(true);
    expect('setAge' in fact).toBe(true);
    expect('isName' in fact).toBe(false);
    expect('getEmail' in fact).toBe(false);
  });

  it('coerces values written through setters', () => {
    call(fact, 'setAge', '25');

    expect(fact.get('age')).toBe(25);
    expect(() => call(fact, 'setAge', 'old')).toThrow(CoercionError);
  });

  it('throws for accessor-shaped names of unknown fields', () => {
    expect(() => call(fact, 'getEmail')).toThrow(UnsupportedOperationError);
    expect(() => call(fact, 'getEmail')).toThrow('Method not supported on Person: getEmail');
  });

  it('lets field accessors shadow Object.prototype members', () => {
    const flags = buildObjectSchema({ name: 'Flags', fields: [{ name: 'prototypeOf', type: 'boolean' }] });
    const flagged = new ProxyMaterializer(coercion).materialize(flags, values({ prototypeOf: true }));

    expect(call(flagged, 'isPrototypeOf')).toBe(true);
    call(flagged, 'setPrototypeOf', 'false');
    expect(call(flagged, 'getPrototypeOf')).toBe(false);
    expect(call(fact, 'isPrototypeOf', {})).toBe(false);
  });

  it('leaves other unknown properties undefined', () => {
    expect(Reflect.get(fact, 'then')).toBeUndefined();
  });

  it('implements the value methods through the proxy', () => {
    expect(fact.factType).toBe('Person');
    expect(fact.toString()).toBe('Person{name=Jane, age=16, adult=false}');
    expect(JSON.stringify(fact)).toBe('{"name":"Jane","age":16,"adult":false}');
    expect(fact.invoke('isAdult')).toBe(false);
  });
});

describe('FieldMapFact', () => {
  const coercion = new TypeCoercionEngine();

  it('fills absent values with defaults', () => {
    const fact = new FieldMapFact(person, values({ name: 'Jane' }), coercion);

    expect(fact.toRecord()).toEqual({ name: 'Jane', age: null, adult: false });
  });

  it('rejects unknown fields', () => {
    const fact = new FieldMapFact(person, values({}), coercion);

    expect(() => fact.get('email')).toThrow('Method not supported on Person: get("email")');
    expect(() => fact.set('email', 'x')).toThrow('Method not supported on Person: set("email")');
    expect(() => fact.invoke('clone')).toThrow('Method not supported on Person: clone');
  });

  it('dispatches invoke() to accessors and value methods', () => {
    const fact = new FieldMapFact(person, values({ name: 'Jane' }), coercion);

    expect(fact.invoke('setAge', 30)).toBeUndefined();
    expect(fact.invoke('getAge')).toBe(30);
    expect(fact.invoke('toRecord')).toEqual({ name: 'Jane', age: 30, adult: false });
    expect(fact.invoke('hashCode')).toBe(fact.hashCode());
  });

  it('is equal to a fact with the same schema name and values', () => {
    const a = new FieldMapFact(person, values({ name: 'Jane', age: 16 }), coercion);
    const b = new FieldMapFact(person, values({ name: 'Jane', age: 16 }), coercion);

    expect(a.equals(b)).toBe(true);
    expect(a.hashCode()).toBe(b.hashCode());
    b.set('age', 17);
    expect(a.equals(b)).toBe(false);
  });
});
