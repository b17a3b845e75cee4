import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Ajv, type ValidateFunction } from 'ajv';
import type { CollectionRow } from './types/index.js';

const ajv = new Ajv({ allErrors: true, strict: false });

const validatorCache = new Map<string, ValidateFunction>();

async function loadValidator (schemaPath: string): Promise<ValidateFunction> {
  const cached = validatorCache.get(schemaPath);
  if (cached) return cached;
  const schema = JSON.parse(await readFile(schemaPath, 'utf8'));
  const validator = ajv.compile(schema);
  validatorCache.set(schemaPath, validator);
  return validator;
}

function ensureArray (data: unknown, label: string): asserts data is unknown[] {
  if (!Array.isArray(data)) {
    throw new Error(`Expected ${label} to be an array.`);
  }
}

export async function validateArray (schemaPath: string, data: unknown, label: string) {
  ensureArray(data, label);
  const validator = await loadValidator(schemaPath);
  for (const [index, entry] of data.entries()) {
    if (!validator(entry)) {
      const message = ajv.errorsText(validator.errors, { dataVar: `${label}[${index}]` });
      throw new Error(message);
    }
  }
}

const defaultSchemaDir = join(process.cwd(), 'schemas');

export async function validateCollectionRows (
  rows: readonly CollectionRow[],
  schemaDir: string = defaultSchemaDir
) {
  await validateArray(join(schemaDir, 'collection_row.json'), rows, 'rows');
}
