/**
 * Generates the TypeScript source of a fact class from an object schema.
 *
 * For `Person { name: string, adult: boolean }` the output reads:
 *
 * ```typescript
 * class Person {
 *   #name: string | null = null;
 *   #adult: boolean | null = false;
 *   get factType(): string { return "Person"; }
 *   getName(): string | null { return this.#name; }
 *   setName(value: unknown): void { this.#name = __rt.coerce<string | null>("name", value); }
 *   isAdult(): boolean | null { return this.#adult; }
 *   // get / set / has / invoke / equals / hashCode / toString / toRecord / toJSON
 * }
 *
 * Person;
 * ```
 *
 * The trailing expression statement makes the class the completion value of
 * the evaluated script.
 *
 * @module
 */

import type { FieldSpec, FieldType, ObjectSchema } from '../types/schema.js';
import { booleanGetterName, getterName, setterName } from '../utils/accessors.js';

/** Global the generated code calls back into. */
export const RUNTIME_BINDING = '__rt';

const TS_TYPES: Readonly<Record<FieldType, string>> = {
  string: 'string',
  integer: 'number',
  long: 'number',
  double: 'number',
  boolean: 'boolean',
  list: 'unknown[]',
  map: 'Record<string, unknown>',
  object: 'object',
};

const RUNTIME_DECLARATION = `declare const ${RUNTIME_BINDING}: {
  fieldNames(): string[];
  coerce<T>(field: string, value: unknown): T;
  unknownField(operation: string, field: string): never;
  unsupported(method: string): never;
  show(value: unknown): string;
  equals(fact: object, other: unknown): boolean;
  hashCode(fact: object): number;
  toRecord(fact: object): Record<string, unknown>;
};`;

function literal(value: unknown): string {
  return JSON.stringify(value) ?? 'null';
}

function tsType(field: FieldSpec): string {
  return `${TS_TYPES[field.type]} | null`;
}

class SourceWriter {
  private readonly lines: string[] = [];
  private depth = 0;

  line(text = ''): this {
    this.lines.push(text.length === 0 ? '' : '  '.repeat(this.depth) + text);
    return this;
  }

  open(text: string): this {
    this.line(`${text} {`);
    this.depth++;
    return this;
  }

  close(suffix = ''): this {
    this.depth--;
    return this.line(`}${suffix}`);
  }

  toString(): string {
    return this.lines.join('\n') + '\n';
  }
}

function writeAccessors(out: SourceWriter, field: FieldSpec): void {
  const type = tsType(field);
  const slot = `this.#${field.name}`;

  out.open(`${getterName(field.name)}(): ${type}`).line(`return ${slot};`).close().line();
  if (field.type === 'boolean') {
    out.open(`${booleanGetterName(field.name)}(): ${type}`).line(`return ${slot};`).close().line();
  }
  out
    .open(`${setterName(field.name)}(value: unknown): void`)
    .line(`${slot} = ${RUNTIME_BINDING}.coerce<${type}>(${literal(field.name)}, value);`)
    .close()
    .line();
}

function writeFieldSwitch(
  out: SourceWriter,
  fields: readonly FieldSpec[],
  body: (field: FieldSpec) => string,
  fallback: string,
): void {
  out.open('switch (field)');
  for (const field of fields) {
    out.line(`case ${literal(field.name)}:`).line(`  ${body(field)}`);
  }
  out.line('default:').line(`  ${fallback}`);
  out.close();
}

function writeDynamicAccess(out: SourceWriter, schema: ObjectSchema): void {
  out.open('get(field: string): unknown');
  writeFieldSwitch(
    out,
    schema.fields,
    (f) => `return this.#${f.name};`,
    `return ${RUNTIME_BINDING}.unknownField("get", field);`,
  );
  out.close().line();

  out.open('set(field: string, value: unknown): void');
  writeFieldSwitch(
    out,
    schema.fields,
    (f) => `this.${setterName(f.name)}(value); return;`,
    `${RUNTIME_BINDING}.unknownField("set", field);`,
  );
  out.close().line();

  out.open('has(field: string): boolean');
  if (schema.fields.length === 0) {
    out.line('return false;');
  } else {
    out.line(`return [${schema.fields.map((f) => literal(f.name)).join(', ')}].includes(field);`);
  }
  out.close().line();
}

function writeInvoke(out: SourceWriter, schema: ObjectSchema): void {
  out.open('invoke(method: string, ...args: unknown[]): unknown').open('switch (method)');
  for (const field of schema.fields) {
    out.line(`case ${literal(getterName(field.name))}:`);
    if (field.type === 'boolean') {
      out.line(`case ${literal(booleanGetterName(field.name))}:`);
    }
    out.line(`  return this.#${field.name};`);
    out.line(`case ${literal(setterName(field.name))}:`).line(`  return this.${setterName(field.name)}(args[0]);`);
  }
  out
    .line('case "equals":')
    .line('  return this.equals(args[0]);')
    .line('case "hashCode":')
    .line('  return this.hashCode();')
    .line('case "toString":')
    .line('  return this.toString();')
    .line('case "toRecord":')
    .line('  return this.toRecord();')
    .line('default:')
    .line(`  return ${RUNTIME_BINDING}.unsupported(method);`);
  out.close().close().line();
}

function writeValueMethods(out: SourceWriter, schema: ObjectSchema): void {
  out.open('equals(other: unknown): boolean').line(`return ${RUNTIME_BINDING}.equals(this, other);`).close().line();
  out.open('hashCode(): number').line(`return ${RUNTIME_BINDING}.hashCode(this);`).close().line();

  const parts = schema.fields.map(
    (f, i) => `${literal(`${i === 0 ? '' : ', '}${f.name}=`)} + ${RUNTIME_BINDING}.show(this.#${f.name})`,
  );
  const body = [literal(`${schema.name}{`), ...parts, literal('}')].join(' + ');
  out.open('toString(): string').line(`return ${body};`).close().line();

  out
    .open('toRecord(): Record<string, unknown>')
    .line(`return ${RUNTIME_BINDING}.toRecord(this);`)
    .close()
    .line();
  out.open('toJSON(): Record<string, unknown>').line('return this.toRecord();').close();
}

/**
 * Canonical source of the fact class for `schema`. Field and class names are
 * written as-is; callers validate them before compiling.
 */
export function generateFactSource(schema: ObjectSchema): string {
  const out = new SourceWriter();
  out.line(RUNTIME_DECLARATION).line();

  out.open(`class ${schema.name}`);
  for (const field of schema.fields) {
    out.line(`#${field.name}: ${tsType(field)} = ${literal(field.defaultValue)};`);
  }
  if (schema.fields.length > 0) out.line();

  out.open('get factType(): string').line(`return ${literal(schema.name)};`).close().line();
  out.open('fieldNames(): string[]').line(`return ${RUNTIME_BINDING}.fieldNames();`).close().line();

  for (const field of schema.fields) {
    writeAccessors(out, field);
  }
  writeDynamicAccess(out, schema);
  writeInvoke(out, schema);
  writeValueMethods(out, schema);
  out.close();

  out.line().line(`${schema.name};`);
  return out.toString();
}
