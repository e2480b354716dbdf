import type { DefinitionInput, DefinitionKind, FieldSpec, ObjectSchema, ObjectSchemaInput, SchemaDefinition } from '../types/schema.js';
import { parseDeclaration, parseDeclarations, renderDeclaration, type DeclarationBlock } from '../dsl/declare/parser.js';
import { DslError } from '../dsl/helpers/errors.js';
import { SchemaDefinitionError, SchemaNotFoundError } from './errors.js';
import { appendFields, buildObjectSchema, findField } from './object-schema.js';

/**
 * Change notification emitted after every successful mutation.
 */
export type SchemaChangeEvent =
  | { type: 'registered'; name: string; definition: SchemaDefinition }
  | { type: 'replaced'; name: string; definition: SchemaDefinition; previous: SchemaDefinition }
  | { type: 'removed'; name: string; previous: SchemaDefinition }
  | { type: 'cleared'; removed: SchemaDefinition[] };

export type SchemaChangeListener = (event: SchemaChangeEvent) => void;

export interface SchemaRegistryConfig {
  name?: string;
  onChange?: SchemaChangeListener;
}

/** Counts per kind plus the registered names of each kind. */
export interface RegistrySummary {
  total: number;
  byKind: Record<string, string[]>;
}

/** Kinds rendered first, in this order, by {@link SchemaRegistry.toDeclarativeText}. */
const SECTIONS: ReadonlyArray<{ kind: string; title: string; separator: string }> = [
  { kind: 'import', title: 'Imports', separator: '\n' },
  { kind: 'global', title: 'Globals', separator: '\n' },
  { kind: 'declare', title: 'Declared Types', separator: '\n\n' },
  { kind: 'function', title: 'Functions', separator: '\n\n' },
];

const FIXED_KINDS: ReadonlySet<string> = new Set(SECTIONS.map((s) => s.kind));

function normalizeKind(kind: string): string {
  return kind.trim().toLowerCase();
}

/**
 * `base` extended by the fields of `other` it lacks, or `null` when a field
 * both declare has different types. Returns `base` when nothing is added.
 */
function mergeSchemas(base: ObjectSchema, other: ObjectSchema): ObjectSchema | null {
  const added: FieldSpec[] = [];
  for (const field of other.fields) {
    const own = findField(base, field.name);
    if (!own) {
      added.push(field);
    } else if (own.type !== field.type) {
      return null;
    }
  }
  return added.length === 0 ? base : appendFields(base, added);
}

function requireText(value: unknown, what: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new SchemaDefinitionError(`${what} cannot be empty`);
  }
  return value.trim();
}

/**
 * In-memory registry of named definitions (declared types, imports, globals,
 * functions or any other kind), keyed by name.
 *
 * Every mutation is synchronous; a registration either fully succeeds or
 * leaves the registry untouched.
 */
export class SchemaRegistry {
  private readonly definitions: Map<string, SchemaDefinition> = new Map();
  private readonly listeners: Set<SchemaChangeListener> = new Set();
  private readonly name: string;

  constructor(config: SchemaRegistryConfig = {}) {
    this.name = config.name ?? 'schemas';
    if (config.onChange) {
      this.listeners.add(config.onChange);
    }
  }

  /**
   * Adds or replaces a definition. `declare` text is parsed, and the declared
   * type name must equal `name`.
   *
   * @returns the replaced definition, or `null` when the name was new
   * @throws {SchemaDefinitionError} on empty input or an invalid declaration
   */
  register(name: string, kind: DefinitionKind, definitionText: string): SchemaDefinition | null {
    return this.store(this.prepare(name, kind, definitionText, Date.now()));
  }

  /**
   * Adds or replaces definitions of any kinds. Every entry is validated
   * before the first is stored, so one invalid entry registers nothing.
   *
   * @returns the definitions that were replaced, by name
   */
  registerAll(inputs: readonly DefinitionInput[]): Map<string, SchemaDefinition> {
    const now = Date.now();
    const prepared = inputs.map((input) => this.prepare(input.name, input.kind ?? 'declare', input.content, now));

    const replaced = new Map<string, SchemaDefinition>();
    for (const definition of prepared) {
      const previous = this.store(definition);
      // A name given twice keeps the definition that existed before the batch
      if (previous && !replaced.has(definition.name) && !prepared.includes(previous)) {
        replaced.set(definition.name, previous);
      }
    }
    return replaced;
  }

  /**
   * Registers a schema built from a declarative object. The stored content
   * is the rendered declare text.
   */
  define(input: ObjectSchemaInput): SchemaDefinition | null {
    const schema = buildObjectSchema(input);
    return this.store({
      name: schema.name,
      kind: 'declare',
      content: renderDeclaration(schema),
      lastModified: Date.now(),
      schema,
    });
  }

  /**
   * Registers every `declare ... end` block of `text`. All blocks are parsed
   * first, so a syntax error anywhere registers nothing.
   *
   * @returns the registered names in source order
   */
  loadDeclarations(text: string, namespace?: string): string[] {
    let blocks: DeclarationBlock[];
    try {
      blocks = parseDeclarations(text, namespace);
    } catch (err) {
      throw this.wrapParseError(err);
    }

    const now = Date.now();
    for (const block of blocks) {
      this.store({
        name: block.schema.name,
        kind: 'declare',
        content: block.content.trim(),
        lastModified: now,
        schema: block.schema,
      });
    }
    return blocks.map((block) => block.schema.name);
  }

  get(name: string): SchemaDefinition | undefined {
    return this.definitions.get(name.trim());
  }

  /**
   * Parsed schema of a `declare` definition.
   *
   * @throws {SchemaNotFoundError} when there is no declared type of that name
   */
  getSchema(name: string): ObjectSchema {
    const schema = this.get(name)?.schema;
    if (!schema) {
      throw new SchemaNotFoundError(name);
    }
    return schema;
  }

  findSchema(name: string): ObjectSchema | undefined {
    return this.get(name)?.schema;
  }

  has(name: string): boolean {
    return this.definitions.has(name.trim());
  }

  remove(name: string): SchemaDefinition | null {
    const previous = this.get(name);
    if (!previous) {
      return null;
    }
    this.definitions.delete(previous.name);
    this.emit({ type: 'removed', name: previous.name, previous });
    return previous;
  }

  /**
   * Takes over every definition of `other`. A declared type both registries
   * know is extended by the fields it lacks when the shared fields agree on
   * their types, and replaced otherwise. Other kinds are replaced.
   */
  merge(other: SchemaRegistry): void {
    for (const incoming of other.list()) {
      const existing = this.definitions.get(incoming.name);
      const merged =
        existing?.schema !== undefined && incoming.schema !== undefined
          ? mergeSchemas(existing.schema, incoming.schema)
          : null;

      if (!merged) {
        this.store(incoming);
      } else if (merged !== existing?.schema) {
        this.store({
          name: incoming.name,
          kind: 'declare',
          content: renderDeclaration(merged),
          lastModified: Date.now(),
          schema: merged,
        });
      }
    }
  }

  /** Independent registry holding the same definitions, without listeners. */
  copy(config: SchemaRegistryConfig = {}): SchemaRegistry {
    const copy = new SchemaRegistry({ name: this.name, ...config });
    for (const definition of this.definitions.values()) {
      copy.definitions.set(definition.name, definition);
    }
    return copy;
  }

  /** Definitions of one kind (case-insensitive), in insertion order. */
  listByKind(kind: string): SchemaDefinition[] {
    const wanted = normalizeKind(kind);
    return this.list().filter((def) => def.kind === wanted);
  }

  list(): SchemaDefinition[] {
    return [...this.definitions.values()];
  }

  names(): string[] {
    return [...this.definitions.keys()];
  }

  count(): number {
    return this.definitions.size;
  }

  clear(): void {
    if (this.definitions.size === 0) {
      return;
    }
    const removed = this.list();
    this.definitions.clear();
    this.emit({ type: 'cleared', removed });
  }

  summary(): RegistrySummary {
    const byKind = new Map<string, string[]>();
    for (const def of this.definitions.values()) {
      const names = byKind.get(def.kind);
      if (names) {
        names.push(def.name);
      } else {
        byKind.set(def.kind, [def.name]);
      }
    }
    return { total: this.definitions.size, byKind: Object.fromEntries(byKind) };
  }

  /**
   * Renders definitions as one declarative text: imports, globals, declared
   * types and functions first, then every other kind in the order it was
   * first registered. With `names`, only the listed definitions are rendered.
   */
  toDeclarativeText(namespace?: string, names?: Iterable<string>): string {
    const wanted = names === undefined ? undefined : new Set([...names].map((name) => name.trim()));
    const selected = this.list().filter((def) => wanted === undefined || wanted.has(def.name));

    let out = '';
    if (namespace !== undefined && namespace.trim().length > 0) {
      out += `package ${namespace.trim()};\n\n`;
    }

    for (const { kind, title, separator } of SECTIONS) {
      const defs = selected.filter((def) => def.kind === kind);
      if (defs.length === 0) continue;
      out += `// ${title}\n`;
      for (const def of defs) {
        out += def.content + separator;
      }
      if (separator === '\n') out += '\n';
    }

    const otherKinds: string[] = [];
    for (const def of selected) {
      if (!FIXED_KINDS.has(def.kind) && !otherKinds.includes(def.kind)) {
        otherKinds.push(def.kind);
      }
    }
    for (const kind of otherKinds) {
      out += `// ${kind.toUpperCase()}\n`;
      for (const def of selected.filter((d) => d.kind === kind)) {
        out += `${def.content}\n\n`;
      }
    }

    return out;
  }

  /**
   * Adds a change listener.
   *
   * @returns function removing the listener again
   */
  subscribe(listener: SchemaChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private prepare(name: string, kind: DefinitionKind, definitionText: string, now: number): SchemaDefinition {
    const trimmedName = requireText(name, 'Definition name');
    const normalizedKind = normalizeKind(requireText(kind, 'Definition kind'));
    const content = requireText(definitionText, 'Definition content');

    let schema: ObjectSchema | undefined;
    if (normalizedKind === 'declare') {
      schema = this.parseSingle(content, trimmedName);
    }

    return {
      name: trimmedName,
      kind: normalizedKind,
      content,
      lastModified: now,
      ...(schema !== undefined && { schema }),
    };
  }

  private parseSingle(content: string, name: string): ObjectSchema {
    let schema: ObjectSchema;
    try {
      schema = parseDeclaration(content);
    } catch (err) {
      throw this.wrapParseError(err);
    }
    if (schema.name !== name) {
      throw new SchemaDefinitionError(`Declared type ${schema.name} does not match definition name ${name}`);
    }
    return schema;
  }

  private wrapParseError(err: unknown): unknown {
    if (err instanceof DslError) {
      return new SchemaDefinitionError(`Invalid declaration: ${err.message}`, { cause: err });
    }
    return err;
  }

  private store(definition: SchemaDefinition): SchemaDefinition | null {
    const previous = this.definitions.get(definition.name);
    this.definitions.set(definition.name, definition);
    if (previous) {
      this.emit({ type: 'replaced', name: definition.name, definition, previous });
      return previous;
    }
    this.emit({ type: 'registered', name: definition.name, definition });
    return null;
  }

  private emit(event: SchemaChangeEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error(`[${this.name}] Error in schema change listener:`, error);
      }
    }
  }
}
