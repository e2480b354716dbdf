/**
 * Parser for `declare ... end` type declarations.
 *
 * Both the multi-line and the single-line form are accepted:
 *
 * ```
 * package com.acme;
 *
 * declare Person
 *     name : String @required
 *     age : int
 *     adult : boolean = false
 * end
 *
 * declare Tag label : String weight : double = 1.0 end
 * ```
 *
 * Anything outside `declare` blocks (imports, rules, functions) is skipped,
 * except `package` which sets the namespace of the blocks that follow.
 *
 * @module
 */

import type { FieldSpecInput, FieldType, ObjectSchema } from '../../types/schema.js';
import { buildObjectSchema } from '../../core/object-schema.js';
import { DeclarationParseError } from '../helpers/errors.js';

// ---------------------------------------------------------------------------
// Tokenizer
// ---------------------------------------------------------------------------

type TokenKind = 'word' | 'string' | 'punct';

interface Token {
  kind: TokenKind;
  text: string;
  line: number;
  start: number;
  end: number;
}

const PUNCTUATION: ReadonlySet<string> = new Set([':', '=', ';']);

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

/**
 * Splits text into words, quoted strings and `:`/`=`/`;`.
 *
 * Generic arguments and annotation parameters stay in one word, so
 * `Map<String, Object>` and `@Position(1)` are single tokens.
 */
function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let line = 1;
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);

    if (ch === '\n') {
      line++;
      i++;
      continue;
    }
    if (isWhitespace(ch)) {
      i++;
      continue;
    }

    if (text.startsWith('//', i)) {
      const eol = text.indexOf('\n', i);
      i = eol === -1 ? text.length : eol;
      continue;
    }
    if (text.startsWith('/*', i)) {
      const close = text.indexOf('*/', i + 2);
      const stop = close === -1 ? text.length : close + 2;
      for (let j = i; j < stop; j++) {
        if (text.charAt(j) === '\n') line++;
      }
      i = stop;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const start = i;
      const startLine = line;
      i++;
      while (i < text.length && text.charAt(i) !== ch) {
        if (text.charAt(i) === '\\') i++;
        else if (text.charAt(i) === '\n') line++;
        i++;
      }
      if (i >= text.length) {
        throw new DeclarationParseError('unterminated string literal', startLine, lineAt(text, startLine));
      }
      i++;
      tokens.push({ kind: 'string', text: text.slice(start, i), line: startLine, start, end: i });
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      tokens.push({ kind: 'punct', text: ch, line, start: i, end: i + 1 });
      i++;
      continue;
    }

    const start = i;
    let depth = 0;
    while (i < text.length) {
      const c = text.charAt(i);
      if (c === '<' || c === '(') {
        depth++;
      } else if ((c === '>' || c === ')') && depth > 0) {
        depth--;
      } else if (depth === 0 && (isWhitespace(c) || PUNCTUATION.has(c) || text.startsWith('//', i))) {
        break;
      } else if (c === '\n') {
        line++;
      }
      i++;
    }
    tokens.push({ kind: 'word', text: text.slice(start, i).replace(/\s+/g, ''), line, start, end: i });
  }

  return tokens;
}

function lineAt(text: string, line: number): string {
  return text.split('\n')[line - 1] ?? '';
}

// ---------------------------------------------------------------------------
// Type names
// ---------------------------------------------------------------------------

/** Logical field type resolved from a declared type name. */
export interface MappedType {
  type: FieldType;
  ref?: string;
  elementType?: FieldType;
  elementRef?: string;
}

const PACKAGE_PREFIX_RE = /^(java\.lang|java\.util|java\.math|java\.time)\./;
const GENERIC_RE = /^([\w.$]+)<(.*)>$/;

const SIMPLE_TYPES: Readonly<Record<string, FieldType>> = {
  String: 'string',
  char: 'string',
  Character: 'string',
  Date: 'string',
  LocalDate: 'string',
  LocalDateTime: 'string',
  int: 'integer',
  Integer: 'integer',
  short: 'integer',
  Short: 'integer',
  byte: 'integer',
  Byte: 'integer',
  long: 'long',
  Long: 'long',
  double: 'double',
  Double: 'double',
  float: 'double',
  Float: 'double',
  Number: 'double',
  BigDecimal: 'double',
  boolean: 'boolean',
  Boolean: 'boolean',
  List: 'list',
  ArrayList: 'list',
  Collection: 'list',
  Set: 'list',
  HashSet: 'list',
  Map: 'map',
  HashMap: 'map',
  Object: 'map',
};

function lastSegment(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot === -1 ? name : name.slice(dot + 1);
}

/**
 * Maps a declared type name to a logical field type. Unknown names become
 * object references to a schema of that (unqualified) name.
 */
export function mapTypeName(raw: string): MappedType {
  const name = raw.trim().replace(PACKAGE_PREFIX_RE, '');
  const generic = GENERIC_RE.exec(name);

  if (generic) {
    const base = mapTypeName(generic[1] ?? '');
    if (base.type !== 'list') {
      return base;
    }
    const element = mapTypeName(generic[2] ?? '');
    return element.ref === undefined
      ? { type: 'list', elementType: element.type }
      : { type: 'list', elementType: 'object', elementRef: element.ref };
  }

  const simple = SIMPLE_TYPES[name];
  if (simple !== undefined) {
    return { type: simple };
  }
  return { type: 'object', ref: lastSegment(name) };
}

const TYPE_NAMES: Readonly<Record<FieldType, string>> = {
  string: 'String',
  integer: 'int',
  long: 'long',
  double: 'double',
  boolean: 'boolean',
  list: 'List',
  map: 'Map',
  object: 'Object',
};

function renderTypeName(type: FieldType, ref: string | undefined, elementType?: FieldType, elementRef?: string): string {
  if (type === 'object') {
    return ref ?? TYPE_NAMES.map;
  }
  if (type === 'list' && elementType !== undefined) {
    const element = elementType === 'object' ? (elementRef ?? 'Object') : boxed(elementType);
    return `List<${element}>`;
  }
  return TYPE_NAMES[type];
}

function boxed(type: FieldType): string {
  switch (type) {
    case 'integer':
      return 'Integer';
    case 'long':
      return 'Long';
    case 'double':
      return 'Double';
    case 'boolean':
      return 'Boolean';
    default:
      return TYPE_NAMES[type];
  }
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

const REQUIRED_ANNOTATIONS: ReadonlySet<string> = new Set(['required', 'key']);

/** One parsed block plus its exact source text. */
export interface DeclarationBlock {
  schema: ObjectSchema;
  content: string;
}

class DeclarationReader {
  private pos = 0;

  constructor(
    private readonly text: string,
    private readonly tokens: Token[],
  ) {}

  done(): boolean {
    return this.pos >= this.tokens.length;
  }

  peek(offset = 0): Token | undefined {
    return this.tokens[this.pos + offset];
  }

  next(): Token | undefined {
    const token = this.tokens[this.pos];
    this.pos++;
    return token;
  }

  error(message: string, token: Token | undefined): DeclarationParseError {
    const line = token?.line ?? this.lastLine();
    return new DeclarationParseError(message, line, lineAt(this.text, line));
  }

  expectWord(what: string): Token {
    const token = this.next();
    if (token?.kind !== 'word') {
      throw this.error(`expected ${what}${token ? `, got "${token.text}"` : ' before end of input'}`, token);
    }
    return token;
  }

  expectPunct(punct: string): Token {
    const token = this.next();
    if (token?.kind !== 'punct' || token.text !== punct) {
      throw this.error(`expected "${punct}"${token ? `, got "${token.text}"` : ' before end of input'}`, token);
    }
    return token;
  }

  skipPunct(punct: string): void {
    const token = this.peek();
    if (token?.kind === 'punct' && token.text === punct) {
      this.pos++;
    }
  }

  private lastLine(): number {
    return this.tokens[this.tokens.length - 1]?.line ?? 1;
  }
}

function isAnnotation(token: Token | undefined): boolean {
  return token?.kind === 'word' && token.text.startsWith('@');
}

function annotationName(token: Token): string {
  const paren = token.text.indexOf('(');
  return (paren === -1 ? token.text.slice(1) : token.text.slice(1, paren)).toLowerCase();
}

function parseLiteral(reader: DeclarationReader, token: Token | undefined): unknown {
  if (token === undefined) {
    throw reader.error('expected a default value before end of input', token);
  }
  if (token.kind === 'string') {
    const body = token.text.slice(1, -1);
    if (token.text.startsWith('"')) {
      try {
        const parsed: unknown = JSON.parse(token.text);
        return parsed;
      } catch {
        return body;
      }
    }
    return body.replace(/\\(.)/g, '$1');
  }
  if (token.kind === 'word') {
    if (token.text === 'true') return true;
    if (token.text === 'false') return false;
    if (token.text === 'null') return null;
    const literal = token.text.replace(/[lLdDfF]$/, '');
    const num = Number(literal);
    if (literal.length > 0 && Number.isFinite(num)) return num;
  }
  throw reader.error(`invalid default value "${token.text}"`, token);
}

function isBlockEnd(reader: DeclarationReader): boolean {
  const token = reader.peek();
  if (token?.kind !== 'word' || token.text !== 'end') {
    return false;
  }
  // `end : String` is a field called "end"
  const following = reader.peek(1);
  return !(following?.kind === 'punct' && following.text === ':');
}

function parseField(reader: DeclarationReader): FieldSpecInput {
  const nameToken = reader.expectWord('a field name');
  reader.expectPunct(':');
  const typeToken = reader.expectWord(`a type for field "${nameToken.text}"`);

  let required = false;
  while (isAnnotation(reader.peek())) {
    const annotation = reader.next();
    if (annotation && REQUIRED_ANNOTATIONS.has(annotationName(annotation))) {
      required = true;
    }
  }

  let defaultValue: unknown;
  const eq = reader.peek();
  if (eq?.kind === 'punct' && eq.text === '=') {
    reader.next();
    defaultValue = parseLiteral(reader, reader.next());
  }
  reader.skipPunct(';');

  const mapped = mapTypeName(typeToken.text);
  return {
    name: nameToken.text,
    type: mapped.type,
    required,
    ...(defaultValue !== undefined && { default: defaultValue }),
    ...(mapped.ref !== undefined && { ref: mapped.ref }),
    ...(mapped.elementType !== undefined && { elementType: mapped.elementType }),
    ...(mapped.elementRef !== undefined && { elementRef: mapped.elementRef }),
  };
}

function parseBlock(reader: DeclarationReader, text: string, namespace: string | undefined): DeclarationBlock {
  const declareToken = reader.next();
  const nameToken = reader.expectWord('a type name after "declare"');
  if (nameToken.text.startsWith('@')) {
    throw reader.error('expected a type name after "declare"', nameToken);
  }

  let name = nameToken.text;
  let ns = namespace;
  const dot = name.lastIndexOf('.');
  if (dot !== -1) {
    ns = name.slice(0, dot);
    name = name.slice(dot + 1);
  }

  while (isAnnotation(reader.peek())) {
    reader.next();
  }

  const fields: FieldSpecInput[] = [];
  while (!isBlockEnd(reader)) {
    if (reader.done()) {
      throw reader.error(`missing "end" for declaration of ${name}`, undefined);
    }
    fields.push(parseField(reader));
  }
  const endToken = reader.next();

  const start = declareToken?.start ?? 0;
  const stop = endToken?.end ?? text.length;
  return {
    schema: buildObjectSchema({ name, namespace: ns, fields }),
    content: text.slice(start, stop),
  };
}

/**
 * Parses every `declare ... end` block in `text`.
 *
 * @param namespace - namespace of blocks not preceded by a `package` line
 * @throws {DeclarationParseError} on syntax errors
 * @throws {SchemaDefinitionError} when a block is syntactically valid but
 *   not a valid schema (duplicate field, bad default)
 */
export function parseDeclarations(text: string, namespace?: string): DeclarationBlock[] {
  const reader = new DeclarationReader(text, tokenize(text));
  const blocks: DeclarationBlock[] = [];
  let currentNamespace = namespace;

  while (!reader.done()) {
    const token = reader.peek();
    if (token?.kind === 'word' && token.text === 'package') {
      reader.next();
      currentNamespace = reader.expectWord('a package name').text;
      reader.skipPunct(';');
      continue;
    }
    if (token?.kind === 'word' && token.text === 'declare') {
      blocks.push(parseBlock(reader, text, currentNamespace));
      continue;
    }
    reader.next();
  }

  return blocks;
}

/**
 * Parses text holding exactly one declaration.
 *
 * @throws {DeclarationParseError} when there is no block, more than one, or a
 *   syntax error
 */
export function parseDeclaration(text: string, namespace?: string): ObjectSchema {
  const blocks = parseDeclarations(text, namespace);
  const [first] = blocks;
  if (first === undefined) {
    throw new DeclarationParseError('no "declare" block found', 1, lineAt(text, 1));
  }
  if (blocks.length > 1) {
    throw new DeclarationParseError(`expected one declaration, found ${blocks.length}`, 1, lineAt(text, 1));
  }
  return first.schema;
}

function renderDefault(value: unknown): string {
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

/** Renders a schema as multi-line declare text that parses back to an equal schema. */
export function renderDeclaration(schema: ObjectSchema): string {
  const lines = [`declare ${schema.name}`];
  for (const field of schema.fields) {
    let line = `    ${field.name} : ${renderTypeName(field.type, field.ref, field.elementType, field.elementRef)}`;
    if (field.required) {
      line += ' @required';
    }
    if (field.defaultValue !== null) {
      line += ` = ${renderDefault(field.defaultValue)}`;
    }
    lines.push(line);
  }
  lines.push('end');
  return lines.join('\n');
}
