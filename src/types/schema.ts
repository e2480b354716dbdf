import type { FieldValue } from './fact.js';

/** Logical field types understood by the coercion engine. */
export const FIELD_TYPES = [
  'string',
  'integer',
  'long',
  'double',
  'boolean',
  'object',
  'list',
  'map',
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

/** Field types that hold a single scalar value. */
export const SCALAR_FIELD_TYPES = ['string', 'integer', 'long', 'double', 'boolean'] as const;

export type ScalarFieldType = (typeof SCALAR_FIELD_TYPES)[number];

/** Definition kinds with a fixed place in the rendered declarative text. */
export const DEFINITION_KINDS = ['import', 'global', 'declare', 'function'] as const;

export type KnownDefinitionKind = (typeof DEFINITION_KINDS)[number];

/** Known kind or any other non-empty, lower-cased kind. */
export type DefinitionKind = KnownDefinitionKind | (string & {});

/** One field of an object schema. */
export interface FieldSpec {
  readonly name: string;
  readonly type: FieldType;
  readonly required: boolean;
  /** Already coerced to `type`; `null` when the field has no default. */
  readonly defaultValue: FieldValue;
  /** Referenced schema name (only for `object` fields). */
  readonly ref?: string;
  /** Element type hint (only for `list` fields). */
  readonly elementType?: FieldType;
  /** Referenced schema name of list elements when `elementType` is `object`. */
  readonly elementRef?: string;
}

/** Named, ordered field specification a fact is materialized from. */
export interface ObjectSchema {
  readonly name: string;
  readonly namespace?: string;
  readonly fields: readonly FieldSpec[];
  /** Content hash identifying this revision of the schema. */
  readonly fingerprint: string;
}

/** Declarative input for one field. */
export interface FieldSpecInput {
  name: string;
  type: FieldType;
  required?: boolean | undefined;
  default?: unknown;
  ref?: string | undefined;
  elementType?: FieldType | undefined;
  elementRef?: string | undefined;
}

/** Declarative input for a whole schema. */
export interface ObjectSchemaInput {
  name: string;
  namespace?: string | undefined;
  fields: FieldSpecInput[];
}

/** One element of a batch registration. */
export interface DefinitionInput {
  name: string;
  /** Default `declare`. */
  kind?: DefinitionKind | undefined;
  content: string;
}

/** Registry entry: the original definition text plus its parsed schema. */
export interface SchemaDefinition {
  readonly name: string;
  readonly kind: DefinitionKind;
  readonly content: string;
  readonly lastModified: number;
  /** Present for `declare` definitions. */
  readonly schema?: ObjectSchema;
}
