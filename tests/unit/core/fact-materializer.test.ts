import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { FactMaterializer, resolveMaterializerConfig } from '../../../src/core/fact-materializer.js';
import { SchemaRegistry } from '../../../src/core/schema-registry.js';
import type { SourceCompiler } from '../../../src/compiler/types.js';
import {
  BatchMaterializationError,
  CoercionError,
  CompilerUnavailableError,
  InvalidFactInputError,
  MaterializationError,
  SchemaNotFoundError,
  ValidationError,
} from '../../../src/core/errors.js';
import type { Fact } from '../../../src/types/fact.js';
import { isFact } from '../../../src/utils/value-semantics.js';

function call(fact: Fact, method: string, ...args: unknown[]): unknown {
  const fn: unknown = Reflect.get(fact, method);
  if (typeof fn !== 'function') {
    throw new TypeError(`${fact.factType} has no method ${method}`);
  }
  return Reflect.apply(fn, fact, args);
}

function single(facts: Fact[]): Fact {
  const [fact] = facts;
  if (fact === undefined || facts.length !== 1) {
    throw new Error(`expected one fact, got ${facts.length}`);
  }
  return fact;
}

const unavailableCompiler: SourceCompiler = {
  name: 'missing',
  isAvailable: () => false,
  compile: (unit) => {
    throw new CompilerUnavailableError(unit.typeName, 'cannot load "typescript": test');
  },
};

const DECLARATIONS = `
declare Person
    name : String @required
    age : int
    adult : boolean = false
    status : String = "active"
    scores : List<Double>
end

declare Tag label : String end
declare Address city : String end

declare Customer
    name : String
    address : Address
    tags : List<Tag>
end
`;

describe('FactMaterializer', () => {
  let registry: SchemaRegistry;
  let materializer: FactMaterializer;

  beforeEach(() => {
    registry = new SchemaRegistry();
    registry.loadDeclarations(DECLARATIONS);
    materializer = new FactMaterializer(registry);
  });

  afterEach(() => {
    materializer.dispose();
    vi.restoreAllMocks();
  });

  describe('fromJson()', () => {
    it('materializes a single object', () => {
      const fact = single(materializer.fromJson('{"name":"Jane","age":16,"adult":false}', 'Person'));

      expect(fact.factType).toBe('Person');
      expect(call(fact, 'getName')).toBe('Jane');
      expect(call(fact, 'getAge')).toBe(16);
      expect(call(fact, 'isAdult')).toBe(false);
      expect(materializer.getStrategy()).toBe('compiled');
    });

    it('coerces loosely typed values', () => {
      const fact = single(materializer.fromJson('{"name":"Jane","age":"25","scores":95}', 'Person'));

      expect(fact.get('age')).toBe(25);
      expect(fact.get('scores')).toEqual([95]);
    });

    it('applies defaults to absent fields', () => {
      const fact = single(materializer.fromJson('{"name":"Jane"}', 'Person'));

      expect(fact.toRecord()).toEqual({ name: 'Jane', age: null, adult: false, status: 'active', scores: null });
    });

    it('materializes nested objects and lists of objects', () => {
      const fact = single(
        materializer.fromJson('{"name":"Acme","address":{"city":"Brno"},"tags":[{"label":"vip"}]}', 'Customer'),
      );

      const address = fact.get('address');
      expect(isFact(address) ? address.factType : null).toBe('Address');
      expect(fact.toRecord()).toEqual({ name: 'Acme', address: { city: 'Brno' }, tags: [{ label: 'vip' }] });
      expect(fact.toString()).toBe('Customer{name=Acme, address=Address{city=Brno}, tags=[Tag{label=vip}]}');
    });

    it('lists every missing required field', () => {
      registry.register('Account', 'declare', 'declare Account id : long @required name : String @required end');

      try {
        materializer.fromJson('{"id":null}', 'Account');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationError);
        if (err instanceof ValidationError) {
          expect(err.message).toBe('Missing required fields for Account: id, name');
          expect(err.missingFields).toEqual(['id', 'name']);
        }
      }
    });

    it('throws the element error for a single object', () => {
      expect(() => materializer.fromJson('{"name":"Jane","age":"old"}', 'Person')).toThrow(CoercionError);
      expect(() => materializer.fromJson('42', 'Person')).toThrow('Expected a JSON object, got number');
      expect(() => materializer.fromJson('null', 'Person')).toThrow('Expected a JSON object, got null');
    });

    it('rejects text that is not JSON', () => {
      expect(() => materializer.fromJson('{', 'Person')).toThrow(InvalidFactInputError);
      expect(() => materializer.fromJson('{', 'Person')).toThrow(/^Invalid JSON: /);
    });

    it('rejects unknown schemas', () => {
      expect(() => materializer.fromJson('{}', 'Ghost')).toThrow(SchemaNotFoundError);
      expect(() => materializer.fromJson('{}', 'Ghost')).toThrow("Schema 'Ghost' not found");
    });

    it('isolates failures of array elements', () => {
      try {
        materializer.fromJson('[{"name":"A"},{"age":3},{"name":"C"}]', 'Person');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(BatchMaterializationError);
        if (err instanceof BatchMaterializationError) {
          expect(err.message).toBe('1 of 3 facts failed: [1] Missing required fields for Person: name');
          expect(err.facts.map((f) => f.get('name'))).toEqual(['A', 'C']);
          expect(err.failures.map((f) => f.index)).toEqual([1]);
          expect(err.failures[0]?.error).toBeInstanceOf(ValidationError);
        }
      }
    });

    it('reports non-object array elements per position', () => {
      expect(() => materializer.fromJson('[{"name":"A"},[1]]', 'Person')).toThrow(
        '1 of 2 facts failed: [1] Expected a JSON object, got array',
      );
    });

    it('returns an empty list for an empty array', () => {
      expect(materializer.fromJson('[]', 'Person')).toEqual([]);
    });
  });

  describe('fromJsonAutoDetect()', () => {
    it('reads the schema of each element from _type', () => {
      const facts = materializer.fromJsonAutoDetect(
        '[{"_type":"Person","name":"Jane"},{"_type":" Tag ","label":"vip"}]',
      );

      expect(facts.map((f) => f.factType)).toEqual(['Person', 'Tag']);
      expect(facts[1]?.toRecord()).toEqual({ label: 'vip' });
    });

    it('requires the discriminator', () => {
      expect(() => materializer.fromJsonAutoDetect('{"name":"Jane"}')).toThrow(
        'Cannot detect schema: missing "_type" discriminator',
      );
    });

    it('uses a configured discriminator key', () => {
      const custom = new FactMaterializer(registry, { discriminatorKey: 'kind' });

      expect(single(custom.fromJsonAutoDetect('{"kind":"Tag","label":"x"}')).factType).toBe('Tag');
      custom.dispose();
    });
  });

  describe('fromJsonSettled()', () => {
    it('returns one outcome per position', () => {
      const outcomes = materializer.fromJsonSettled('[{"name":"A"},{"age":3}]', 'Person');

      expect(outcomes.map((o) => [o.index, o.status])).toEqual([
        [0, 'fulfilled'],
        [1, 'rejected'],
      ]);
      const rejected = outcomes[1];
      expect(rejected?.status === 'rejected' ? rejected.error.code : null).toBe('VALIDATION_ERROR');
    });
  });

  describe('materialize()', () => {
    it('accepts an already parsed record', () => {
      expect(materializer.materialize('Tag', { label: 'x' }).toRecord()).toEqual({ label: 'x' });
    });

    it('materializeMany() accepts several records', () => {
      expect(materializer.materializeMany('Tag', [{ label: 'a' }, { label: 'b' }]).map((f) => f.get('label'))).toEqual([
        'a',
        'b',
      ]);
    });

    it('limits nesting depth', () => {
      registry.register('Node', 'declare', 'declare Node next : Node end');
      const shallow = new FactMaterializer(registry, { maxDepth: 2 });

      expect(shallow.materialize('Node', { next: {} }).toRecord()).toEqual({ next: { next: null } });
      expect(() => shallow.materialize('Node', { next: { next: {} } })).toThrow('Facts nested deeper than 2 levels');
      shallow.dispose();
    });
  });

  describe('strategies', () => {
    it('produces equal facts with either strategy', () => {
      const proxies = new FactMaterializer(registry, { strategy: 'proxy' });
      const json = '{"name":"Jane","age":16,"scores":[1.5]}';

      const compiled = single(materializer.fromJson(json, 'Person'));
      const proxied = single(proxies.fromJson(json, 'Person'));

      expect(compiled.equals(proxied)).toBe(true);
      expect(proxied.equals(compiled)).toBe(true);
      expect(compiled.hashCode()).toBe(proxied.hashCode());
      expect(compiled.toString()).toBe(proxied.toString());
      expect(call(proxied, 'getName')).toBe('Jane');
      proxies.dispose();
    });

    it('falls back to proxies once when the compiler is unavailable', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const fallback = new FactMaterializer(registry, { compiler: unavailableCompiler });

      const first = fallback.materialize('Person', { name: 'Jane' });
      const second = fallback.materialize('Person', { name: 'Joan' });

      expect(call(first, 'getName')).toBe('Jane');
      expect(second.get('name')).toBe('Joan');
      expect(fallback.getStrategy()).toBe('proxy');
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        '[materializer] Compiled-class strategy unavailable: cannot load "typescript": test; materializing facts as proxies from now on',
      );
      expect(fallback.getStats()).toMatchObject({ fallbacks: 1, compileFailures: 1, materialized: 2 });
      fallback.dispose();
    });

    it('does not fall back when disabled', () => {
      const strict = new FactMaterializer(registry, { compiler: unavailableCompiler, fallbackToProxy: false });

      expect(() => strict.materialize('Person', { name: 'Jane' })).toThrow(CompilerUnavailableError);
      expect(strict.getStrategy()).toBe('compiled');
      strict.dispose();
    });

    it('does not fall back on compile errors', () => {
      const broken = new FactMaterializer(registry, {
        compiler: {
          name: 'broken',
          isAvailable: () => true,
          compile: (unit) => {
            throw new MaterializationError(`Compilation of ${unit.typeName} failed`, { typeName: unit.typeName });
          },
        },
      });

      expect(() => broken.materialize('Person', { name: 'Jane' })).toThrow('Compilation of Person failed');
      expect(broken.getStrategy()).toBe('compiled');
      broken.dispose();
    });

    it('does not fall back on coercion errors', () => {
      expect(() => materializer.materialize('Person', { name: 'Jane', age: 'old' })).toThrow(CoercionError);
      expect(materializer.getStrategy()).toBe('compiled');
    });
  });

  describe('schema changes', () => {
    it('recompiles after a schema is replaced', () => {
      materializer.materialize('Tag', { label: 'a' });
      registry.register('Tag', 'declare', 'declare Tag label : String weight : double = 1.0 end');

      const fact = materializer.materialize('Tag', { label: 'b' });

      expect(fact.toRecord()).toEqual({ label: 'b', weight: 1 });
      expect(materializer.getStats().compiled).toBe(2);
    });

    it('drops compiled classes when the registry is cleared', () => {
      materializer.materialize('Tag', { label: 'a' });
      expect(materializer.getStats().cacheSize).toBe(1);

      registry.clear();

      expect(materializer.getStats().cacheSize).toBe(0);
    });

    it('invalidate() drops one or all compiled classes', () => {
      materializer.materialize('Tag', { label: 'a' });
      materializer.materialize('Address', { city: 'Brno' });

      materializer.invalidate('Tag');
      expect(materializer.getStats().cacheSize).toBe(1);
      materializer.invalidate();
      expect(materializer.getStats().cacheSize).toBe(0);
    });
  });

  describe('getStats()', () => {
    it('counts materialized and failed facts', () => {
      materializer.fromJsonSettled('[{"name":"A"},{"age":1},{"name":"B"}]', 'Person');

      expect(materializer.getStats()).toMatchObject({
        strategy: 'compiled',
        materialized: 2,
        failed: 1,
        compiled: 1,
        fallbacks: 0,
      });
    });
  });
});

describe('resolveMaterializerConfig', () => {
  it('applies defaults', () => {
    const config = resolveMaterializerConfig();

    expect(config).toMatchObject({
      name: 'materializer',
      strategy: 'compiled',
      fallbackToProxy: true,
      discriminatorKey: '_type',
      maxDepth: 32,
      cache: { maxEntries: 256 },
    });
    expect(config.compiler.name).toBe('typescript');
  });

  it('rejects invalid limits', () => {
    expect(() => resolveMaterializerConfig({ maxDepth: 0 })).toThrow('maxDepth must be a positive integer, got 0');
    expect(() => resolveMaterializerConfig({ discriminatorKey: '' })).toThrow('discriminatorKey cannot be empty');
  });
});
