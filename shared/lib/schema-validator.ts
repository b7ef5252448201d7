/**
 * JSON Schema validation for Gerrit payloads and the config file.
 *
 * Schemas live in the repo's schemas/ directory and are compiled with Ajv
 * once per process.
 *
 * @module schema-validator
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';

const SCHEMA_DIR = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..', 'schemas');

export type SchemaName = 'gerrit-change' | 'gerrit-comment' | 'gerrit-config';

const ajv = new Ajv({
  allErrors: true,
  strict: false, // Allow unknown keywords in schema
});

/**
 * Create a getter that loads and compiles schemas/<name>.schema.json on
 * first use and returns the cached validator afterwards.
 */
export function createLazyValidator<T>(name: SchemaName): () => ValidateFunction<T> {
  let compiled: ValidateFunction<T> | null = null;

  return () => {
    if (compiled) {
      return compiled;
    }

    const schemaPath = resolve(SCHEMA_DIR, `${name}.schema.json`);
    if (!existsSync(schemaPath)) {
      throw new Error(
        `Schema not found at ${schemaPath}. ` +
        `Ensure ${name}.schema.json exists in the schemas directory.`
      );
    }

    compiled = ajv.compile<T>(JSON.parse(readFileSync(schemaPath, 'utf-8')));
    return compiled;
  };
}

/**
 * Format Ajv errors as "path: message" pairs joined by "; ".
 */
export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return 'unknown error';
  }

  return errors
    .map((err) => {
      const path = err.instancePath || 'root';
      const message = err.message || 'unknown error';
      return `${path}: ${message}`;
    })
    .join('; ');
}
