/**
 * Bean-style accessor naming (`getName`, `isAdult`, `setAge`) and the
 * per-schema dispatch table both materialization strategies route through.
 */

import type { FieldSpec, ObjectSchema } from '../types/schema.js';

export type AccessorKind = 'get' | 'set';

export interface AccessorEntry {
  kind: AccessorKind;
  field: FieldSpec;
}

/** Two fields that map to the same accessor name (e.g. `adult` and `Adult`). */
export interface AccessorCollision {
  accessor: string;
  fields: [string, string];
}

export interface AccessorTable {
  readonly entries: ReadonlyMap<string, AccessorEntry>;
  readonly collisions: readonly AccessorCollision[];
}

const IDENTIFIER_RE = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/** Matches names shaped like an accessor call, used to reject unknown ones. */
export const ACCESSOR_NAME_RE = /^(get|is|set)[A-Z_$0-9]/;

export function capitalize(name: string): string {
  return name.length === 0 ? name : name.charAt(0).toUpperCase() + name.slice(1);
}

export function getterName(field: string): string {
  return `get${capitalize(field)}`;
}

export function booleanGetterName(field: string): string {
  return `is${capitalize(field)}`;
}

export function setterName(field: string): string {
  return `set${capitalize(field)}`;
}

/** Plain JavaScript identifier (ASCII only). */
export function isIdentifier(name: string): boolean {
  return IDENTIFIER_RE.test(name);
}

/** Accessor names of a single field, getters first. */
export function accessorNamesOf(field: FieldSpec): { getters: string[]; setter: string } {
  const getters = [getterName(field.name)];
  if (field.type === 'boolean') {
    getters.push(booleanGetterName(field.name));
  }
  return { getters, setter: setterName(field.name) };
}

function buildAccessorTable(schema: ObjectSchema): AccessorTable {
  const entries = new Map<string, AccessorEntry>();
  const collisions: AccessorCollision[] = [];

  const add = (accessor: string, entry: AccessorEntry): void => {
    const existing = entries.get(accessor);
    if (existing) {
      if (existing.field.name !== entry.field.name) {
        collisions.push({ accessor, fields: [existing.field.name, entry.field.name] });
      }
      return;
    }
    entries.set(accessor, entry);
  };

  for (const field of schema.fields) {
    const { getters, setter } = accessorNamesOf(field);
    for (const getter of getters) {
      add(getter, { kind: 'get', field });
    }
    add(setter, { kind: 'set', field });
  }

  return { entries, collisions };
}

const tables = new WeakMap<ObjectSchema, AccessorTable>();

/**
 * Dispatch table of a schema. Schemas are immutable, so the table is built
 * once per schema object. On collisions the first declared field wins.
 */
export function getAccessorTable(schema: ObjectSchema): AccessorTable {
  let table = tables.get(schema);
  if (!table) {
    table = buildAccessorTable(schema);
    tables.set(schema, table);
  }
  return table;
}
