/** Scalar values a fact field can hold after coercion. */
export type FieldScalar = string | number | boolean;

/** Map-typed field value (JSON object with coerced contents). */
export interface FieldMap {
  [key: string]: FieldValue;
}

/** Any value stored in a fact field. */
export type FieldValue = FieldScalar | null | Fact | FieldValue[] | FieldMap;

/** Plain, JSON-compatible rendering of a field value. */
export type RecordValue = FieldScalar | null | RecordValue[] | { [key: string]: RecordValue };

/** Plain rendering of a whole fact, keyed by field name. */
export interface FactRecord {
  [field: string]: RecordValue;
}

/**
 * Materialized fact - the object handed to the rule engine.
 *
 * Both materialization strategies produce this contract. On top of it, every
 * fact answers bean-style accessors (`getName()`, `isAdult()`, `setAge(v)`)
 * for its schema fields, either as real class members or through a proxy.
 */
export interface Fact {
  /** Name of the schema the fact was materialized from. */
  readonly factType: string;

  /** Field names in schema-declared order. */
  fieldNames(): string[];

  get(field: string): FieldValue;

  /** Stores a value after coercing it to the field's declared type. */
  set(field: string, value: unknown): void;

  has(field: string): boolean;

  /**
   * Dynamic dispatch by method name (`getX`, `isX`, `setX`, `equals`,
   * `hashCode`, `toString`, `toRecord`).
   *
   * @throws {UnsupportedOperationError} for any other method name
   */
  invoke(method: string, ...args: unknown[]): unknown;

  equals(other: unknown): boolean;
  hashCode(): number;
  toString(): string;
  toRecord(): FactRecord;
  toJSON(): FactRecord;
}
