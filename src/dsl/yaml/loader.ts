/**
 * YAML loader for schema definitions.
 *
 * Three input shapes are accepted:
 * - a single schema object
 * - a top-level sequence of schemas
 * - an object with a `schemas` key holding the sequence
 *
 * @example
 * ```typescript
 * import { loadSchemasFromYAML } from 'fact-materializer/dsl';
 *
 * const schemas = loadSchemasFromYAML(`
 *   name: Person
 *   fields:
 *     - { name: name, type: string, required: true }
 *     - { name: age, type: integer }
 *     - { name: adult, type: boolean, default: false }
 * `);
 * schemas.forEach((s) => registry.define(s));
 * ```
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import type { ObjectSchemaInput } from '../../types/schema.js';
import { requireObject, validateSchema, YamlValidationError } from './schema.js';
import { DslError } from '../helpers/errors.js';

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export class YamlLoadError extends DslError {
  constructor(message: string, readonly filePath?: string | undefined) {
    super(filePath ? `${filePath}: ${message}` : message);
    this.name = 'YamlLoadError';
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parses YAML (or JSON, which is valid YAML) and returns validated schema
 * inputs.
 *
 * @throws {YamlLoadError} on a syntax error or empty input
 * @throws {YamlValidationError} on a structural error in a schema
 */
export function loadSchemasFromYAML(yamlContent: string): ObjectSchemaInput[] {
  let parsed: unknown;
  try {
    parsed = parse(yamlContent);
  } catch (err) {
    throw new YamlLoadError(`YAML syntax error: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (parsed === null || parsed === undefined) {
    throw new YamlLoadError('YAML content is empty');
  }

  if (Array.isArray(parsed)) {
    if (parsed.length === 0) {
      throw new YamlLoadError('YAML array is empty, expected at least one schema');
    }
    return parsed.map((item: unknown, i: number) => validateSchema(item, `schemas[${i}]`));
  }

  if (typeof parsed !== 'object') {
    throw new YamlLoadError(`Expected YAML object or array, got ${typeof parsed}`);
  }

  const obj = requireObject(parsed, 'schemas');
  const schemasField = obj['schemas'];
  if (schemasField !== undefined) {
    if (!Array.isArray(schemasField)) {
      throw new YamlLoadError('"schemas" must be an array');
    }
    if (schemasField.length === 0) {
      throw new YamlLoadError('"schemas" array is empty, expected at least one schema');
    }
    return schemasField.map((item: unknown, i: number) => validateSchema(item, `schemas[${i}]`));
  }

  return [validateSchema(obj, 'schema')];
}

/**
 * Loads schema definitions from a YAML file.
 *
 * @throws {YamlLoadError} on read errors, YAML syntax errors or validation
 *   errors (prefixed with the file path)
 */
export async function loadSchemasFromFile(filePath: string): Promise<ObjectSchemaInput[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new YamlLoadError(`Failed to read file: ${err instanceof Error ? err.message : String(err)}`, filePath);
  }

  try {
    return loadSchemasFromYAML(content);
  } catch (err) {
    if (err instanceof YamlLoadError || err instanceof YamlValidationError) {
      throw new YamlLoadError(err.message, filePath);
    }
    throw err;
  }
}
