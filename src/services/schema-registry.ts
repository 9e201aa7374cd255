import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import Ajv2020 from 'ajv/dist/2020.js';
import addFormatsImport from 'ajv-formats';
import type { ErrorObject, ValidateFunction } from 'ajv';
import { globSync } from 'glob';
import { ClientError, type GitportError } from '../errors.js';

export interface SchemaValidationResult {
  valid: boolean;
  errors: ErrorObject[] | null | undefined;
}

type AjvInstance = {
  addSchema: (schema: object, key?: string) => void;
  getSchema: <T = unknown>(key: string) => ValidateFunction<T> | undefined;
};

const AjvCtor = Ajv2020 as unknown as new (options?: Record<string, unknown>) => AjvInstance;
const addFormats = addFormatsImport as unknown as (ajv: AjvInstance) => void;

export const BUNDLED_SCHEMA_DIR = fileURLToPath(new URL('../../schema/', import.meta.url));

/**
 * Loads every `*.schema.json` below a directory and keys it by its relative
 * path without the suffix, e.g. `providers/github/pull-request`.
 */
export class SchemaRegistry {
  private readonly ajv: AjvInstance;
  private readonly keys = new Set<string>();

  constructor(private readonly schemaDir: string = BUNDLED_SCHEMA_DIR) {
    this.ajv = new AjvCtor({
      allErrors: true,
      strict: false,
      allowUnionTypes: true,
    });
    addFormats(this.ajv);
    this.loadSchemas();
  }

  validate(schemaKey: string, data: unknown): SchemaValidationResult {
    const validator = this.validator(schemaKey);
    const valid = validator(data);
    return { valid, errors: validator.errors };
  }

  /**
   * Narrows `data` to `T`, or throws the error built by `onInvalid`
   * (a `MalformedResponse` by default). `T` must describe what the schema accepts.
   */
  parse<T>(
    schemaKey: string,
    data: unknown,
    context: string,
    onInvalid: (message: string) => GitportError = (message) => new ClientError('MalformedResponse', message),
  ): T {
    const validator = this.validator<T>(schemaKey);
    if (validator(data)) {
      return data;
    }
    throw onInvalid(`${context}: unexpected shape (${formatErrors(validator.errors)})`);
  }

  listSchemas(): string[] {
    return Array.from(this.keys).sort();
  }

  private validator<T = unknown>(schemaKey: string): ValidateFunction<T> {
    const validator = this.keys.has(schemaKey) ? this.ajv.getSchema<T>(schemaKey) : undefined;
    if (!validator) {
      throw new Error(`Unknown schema key: ${schemaKey}`);
    }
    return validator;
  }

  private loadSchemas(): void {
    const files = globSync('**/*.schema.json', { cwd: this.schemaDir, nodir: true }).sort();
    for (const relative of files) {
      const raw = fs.readFileSync(path.join(this.schemaDir, relative), 'utf8');
      let schema: unknown;
      try {
        schema = JSON.parse(raw);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to parse schema ${relative}: ${message}`);
      }
      if (typeof schema !== 'object' || schema === null) {
        throw new Error(`Schema ${relative} is not an object`);
      }
      const key = relative.replace(/\.schema\.json$/, '').replace(/\\/g, '/');
      this.ajv.addSchema(schema, key);
      this.keys.add(key);
    }
  }
}

export function formatErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return 'no details';
  return errors
    .slice(0, 3)
    .map((err) => `${err.instancePath || '/'} ${err.message ?? 'is invalid'}`)
    .join('; ');
}

let shared: SchemaRegistry | undefined;

export function getSchemaRegistry(): SchemaRegistry {
  shared ??= new SchemaRegistry();
  return shared;
}
