import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SchemaRegistry, type SchemaChangeEvent } from '../../../src/core/schema-registry.js';
import { SchemaDefinitionError, SchemaNotFoundError } from '../../../src/core/errors.js';
import { DeclarationParseError } from '../../../src/dsl/helpers/errors.js';

describe('SchemaRegistry', () => {
  let registry: SchemaRegistry;

  beforeEach(() => {
    registry = new SchemaRegistry();
  });

  describe('register()', () => {
    it('parses declare definitions', () => {
      const previous = registry.register('Person', 'declare', 'declare Person name : String @required end');

      expect(previous).toBeNull();
      expect(registry.getSchema('Person').fields.map((f) => f.name)).toEqual(['name']);
      expect(registry.get('Person')).toMatchObject({
        name: 'Person',
        kind: 'declare',
        content: 'declare Person name : String @required end',
      });
    });

    it('trims names and content and lowercases the kind', () => {
      registry.register('  max ', ' GLOBAL ', '  global Integer max;\n');

      expect(registry.get('max')).toMatchObject({ kind: 'global', content: 'global Integer max;' });
      expect(registry.get('max')?.schema).toBeUndefined();
    });

    it('returns the replaced definition', () => {
      registry.register('Person', 'declare', 'declare Person name : String end');
      const previous = registry.register('Person', 'declare', 'declare Person name : String age : int end');

      expect(previous?.content).toBe('declare Person name : String end');
      expect(registry.getSchema('Person').fields).toHaveLength(2);
      expect(registry.count()).toBe(1);
    });

    it('rejects empty input', () => {
      expect(() => registry.register(' ', 'declare', 'declare A end')).toThrow('Definition name cannot be empty');
      expect(() => registry.register('A', '', 'declare A end')).toThrow('Definition kind cannot be empty');
      expect(() => registry.register('A', 'declare', '\n')).toThrow('Definition content cannot be empty');
    });

    it('wraps syntax errors and keeps the cause', () => {
      try {
        registry.register('P', 'declare', 'declare P name String end');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(SchemaDefinitionError);
        if (err instanceof SchemaDefinitionError) {
          expect(err.message).toBe('Invalid declaration: Line 1: expected ":", got "String"\n  declare P name String end');
          expect(err.cause).toBeInstanceOf(DeclarationParseError);
        }
      }
      expect(registry.has('P')).toBe(false);
    });

    it('requires the declared name to match', () => {
      expect(() => registry.register('Employee', 'declare', 'declare Person end')).toThrow(
        'Declared type Person does not match definition name Employee',
      );
    });

    it('leaves the previous definition in place when replacement fails', () => {
      registry.register('Person', 'declare', 'declare Person name : String end');

      expect(() => registry.register('Person', 'declare', 'declare Person name : String name : int end')).toThrow(
        SchemaDefinitionError,
      );
      expect(registry.get('Person')?.content).toBe('declare Person name : String end');
    });
  });

  describe('define()', () => {
    it('stores rendered declare text', () => {
      registry.define({ name: 'Tag', fields: [{ name: 'label', type: 'string', required: true }] });

      expect(registry.get('Tag')?.content).toBe('declare Tag\n    label : String @required\nend');
      expect(registry.getSchema('Tag').fields[0]?.required).toBe(true);
    });
  });

  describe('loadDeclarations()', () => {
    it('registers every block and returns the names', () => {
      const names = registry.loadDeclarations('declare A x : int end\n\ndeclare B y : String end', 'com.acme');

      expect(names).toEqual(['A', 'B']);
      expect(registry.get('B')?.content).toBe('declare B y : String end');
      expect(registry.getSchema('A').namespace).toBe('com.acme');
    });

    it('registers nothing when any block is invalid', () => {
      expect(() => registry.loadDeclarations('declare A x : int end\ndeclare B y String end')).toThrow(
        SchemaDefinitionError,
      );
      expect(registry.count()).toBe(0);
    });
  });

  describe('lookup', () => {
    beforeEach(() => {
      registry.register('Person', 'declare', 'declare Person name : String end');
      registry.register('max', 'global', 'global Integer max;');
    });

    it('getSchema() throws for unknown names and non-declare kinds', () => {
      expect(() => registry.getSchema('Missing')).toThrow(SchemaNotFoundError);
      expect(() => registry.getSchema('max')).toThrow("Schema 'max' not found");
    });

    it('findSchema() returns undefined instead', () => {
      expect(registry.findSchema('max')).toBeUndefined();
      expect(registry.findSchema('Person')?.name).toBe('Person');
    });

    it('lists by kind case-insensitively', () => {
      expect(registry.listByKind('DECLARE').map((d) => d.name)).toEqual(['Person']);
      expect(registry.names()).toEqual(['Person', 'max']);
    });

    it('summarizes per kind', () => {
      expect(registry.summary()).toEqual({ total: 2, byKind: { declare: ['Person'], global: ['max'] } });
    });

    it('trims names on lookup and removal', () => {
      expect(registry.get(' Person ')?.name).toBe('Person');
      expect(registry.has(' max')).toBe(true);
      expect(registry.getSchema('Person ').name).toBe('Person');
      expect(registry.remove(' max ')?.name).toBe('max');
      expect(registry.has('max')).toBe(false);
    });

    it('remove() returns the removed definition', () => {
      expect(registry.remove('max')?.kind).toBe('global');
      expect(registry.remove('max')).toBeNull();
      expect(registry.has('max')).toBe(false);
    });
  });

  describe('toDeclarativeText()', () => {
    it('renders fixed sections first, then other kinds', () => {
      registry.register('r1', 'rule', 'rule "r1" when then end');
      registry.register('helper', 'function', 'function int f() { return 1; }');
      registry.register('Person', 'declare', 'declare Person name : String end');
      registry.register('max', 'global', 'global Integer max;');
      registry.register('List', 'import', 'import java.util.List;');

      expect(registry.toDeclarativeText('com.acme')).toBe(
        'package com.acme;\n\n' +
          '// Imports\nimport java.util.List;\n\n' +
          '// Globals\nglobal Integer max;\n\n' +
          '// Declared Types\ndeclare Person name : String end\n\n' +
          '// Functions\nfunction int f() { return 1; }\n\n' +
          '// RULE\nrule "r1" when then end\n\n',
      );
    });

    it('returns an empty string for an empty registry', () => {
      expect(registry.toDeclarativeText()).toBe('');
    });

    it('renders only the listed definitions', () => {
      registry.register('A', 'declare', 'declare A end');
      registry.register('B', 'declare', 'declare B end');
      registry.register('max', 'global', 'global Integer max;');

      expect(registry.toDeclarativeText(undefined, ['B', ' max ', 'Missing'])).toBe(
        '// Globals\nglobal Integer max;\n\n// Declared Types\ndeclare B end\n\n',
      );
      expect(registry.toDeclarativeText(undefined, [])).toBe('');
    });
  });

  describe('registerAll()', () => {
    it('registers definitions of mixed kinds and returns the replaced ones', () => {
      registry.register('max', 'global', 'global Integer max;');

      const replaced = registry.registerAll([
        { name: 'Person', content: 'declare Person name : String end' },
        { name: 'max', kind: 'global', content: 'global Long max;' },
        { name: 'List', kind: 'import', content: 'import java.util.List;' },
      ]);

      expect([...replaced.keys()]).toEqual(['max']);
      expect(replaced.get('max')?.content).toBe('global Integer max;');
      expect(registry.names()).toEqual(['max', 'Person', 'List']);
      expect(registry.getSchema('Person').fields).toHaveLength(1);
    });

    it('registers nothing when any entry is invalid', () => {
      expect(() =>
        registry.registerAll([
          { name: 'A', content: 'declare A end' },
          { name: 'B', content: 'declare C end' },
        ]),
      ).toThrow('Declared type C does not match definition name B');
      expect(registry.count()).toBe(0);
    });

    it('reports the definition from before the batch for a repeated name', () => {
      registry.register('max', 'global', 'global Integer max;');

      const replaced = registry.registerAll([
        { name: 'max', kind: 'global', content: 'global Long max;' },
        { name: 'max', kind: 'global', content: 'global Double max;' },
      ]);

      expect(replaced.get('max')?.content).toBe('global Integer max;');
      expect(registry.get('max')?.content).toBe('global Double max;');
    });
  });

  describe('merge()', () => {
    let other: SchemaRegistry;

    beforeEach(() => {
      other = new SchemaRegistry();
    });

    it('adds missing fields to compatible declared types', () => {
      registry.loadDeclarations('declare Person name : String end');
      other.loadDeclarations('declare Person name : String age : int end\ndeclare Tag label : String end');
      other.register('max', 'global', 'global Integer max;');

      registry.merge(other);

      expect(registry.names()).toEqual(['Person', 'Tag', 'max']);
      expect(registry.getSchema('Person').fields.map((f) => f.name)).toEqual(['name', 'age']);
      expect(registry.get('Person')?.content).toBe('declare Person\n    name : String\n    age : int\nend');
    });

    it('replaces declared types whose shared fields disagree', () => {
      registry.loadDeclarations('declare Person age : String nick : String end');
      other.loadDeclarations('declare Person age : int end');

      registry.merge(other);

      expect(registry.getSchema('Person').fields.map((f) => [f.name, f.type])).toEqual([['age', 'integer']]);
    });

    it('keeps a declared type that gains nothing', () => {
      registry.loadDeclarations('declare Person name : String age : int end');
      const before = registry.get('Person');
      other.loadDeclarations('declare Person name : String end');

      registry.merge(other);

      expect(registry.get('Person')).toBe(before);
    });
  });

  describe('copy()', () => {
    it('is independent of the original', () => {
      registry.loadDeclarations('declare Person name : String end');
      const listener = vi.fn();
      registry.subscribe(listener);

      const copy = registry.copy();
      copy.register('max', 'global', 'global Integer max;');
      copy.remove('Person');

      expect(registry.names()).toEqual(['Person']);
      expect(copy.names()).toEqual(['max']);
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('change events', () => {
    let events: SchemaChangeEvent[];

    beforeEach(() => {
      events = [];
      registry.subscribe((event) => events.push(event));
    });

    it('reports registrations, replacements and removals', () => {
      registry.register('A', 'declare', 'declare A end');
      registry.register('A', 'declare', 'declare A x : int end');
      registry.remove('A');

      expect(events.map((e) => [e.type, 'name' in e ? e.name : null])).toEqual([
        ['registered', 'A'],
        ['replaced', 'A'],
        ['removed', 'A'],
      ]);
    });

    it('reports clear() once with the removed definitions', () => {
      registry.clear();
      registry.register('A', 'declare', 'declare A end');
      registry.clear();

      expect(events.map((e) => e.type)).toEqual(['registered', 'cleared']);
      const cleared = events[1];
      expect(cleared?.type === 'cleared' ? cleared.removed.map((d) => d.name) : []).toEqual(['A']);
    });

    it('does not emit for failed registrations', () => {
      expect(() => registry.register('A', 'declare', 'declare B end')).toThrow(SchemaDefinitionError);
      expect(events).toEqual([]);
    });

    it('stops notifying after unsubscribe', () => {
      const listener = vi.fn();
      const unsubscribe = registry.subscribe(listener);
      unsubscribe();

      registry.register('A', 'declare', 'declare A end');

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('listener errors', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('are logged and do not stop other listeners', () => {
      const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const failure = new Error('boom');
      const second = vi.fn();
      const named = new SchemaRegistry({
        name: 'test',
        onChange: () => {
          throw failure;
        },
      });
      named.subscribe(second);

      named.register('A', 'declare', 'declare A end');

      expect(consoleSpy).toHaveBeenCalledWith('[test] Error in schema change listener:', failure);
      expect(second).toHaveBeenCalledTimes(1);
      expect(named.has('A')).toBe(true);
    });
  });
});
