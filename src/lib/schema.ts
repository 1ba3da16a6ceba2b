/**
 * JSON Schema validation utilities using Ajv.
 */

import AjvDefault from 'ajv';
import type { ValidateFunction } from 'ajv';
import { readFile } from 'node:fs/promises';

/**
 * Result of schema validation.
 */
export type ValidationResult<T> =
  | { valid: true; data: T; errors: [] }
  | { valid: false; data: null; errors: string[] };

/**
 * Loads and parses a JSON schema file.
 *
 * @throws Error if the schema file cannot be read or parsed
 */
export async function loadSchema(schemaPath: string | URL): Promise<object> {
  try {
    const content = await readFile(schemaPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== 'object' || parsed === null) {
      throw new Error('schema is not an object');
    }
    return parsed;
  } catch (error) {
    throw new Error(
      `Failed to load schema from ${String(schemaPath)}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function compile<T>(schema: object): ValidateFunction<T> {
  // Type assertion needed due to NodeNext module resolution
  const Ajv = AjvDefault as unknown as new (options?: {
    strict?: boolean;
    allErrors?: boolean;
    allowUnionTypes?: boolean;
  }) => {
    compile: <S>(schema: object) => ValidateFunction<S>;
  };
  const ajv = new Ajv({ strict: true, allErrors: true, allowUnionTypes: true });
  return ajv.compile<T>(schema);
}

/**
 * Validates data against a JSON schema. The caller states the type the
 * schema describes; a passing check narrows the data to it.
 */
export function validateWithSchema<T>(data: unknown, schema: object): ValidationResult<T> {
  const validate = compile<T>(schema);
  if (validate(data)) {
    return { valid: true, data, errors: [] };
  }

  const errors = (validate.errors ?? []).map((error) => {
    const path = error.instancePath || error.schemaPath || '';
    return `${path ? `${path}: ` : ''}${error.message || 'Validation error'}`;
  });
  return { valid: false, data: null, errors };
}
