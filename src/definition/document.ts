/**
 * Definition documents: TOML or YAML text checked against
 * `schemas/interview.schema.json`.
 *
 * @packageDocumentation
 */

import { fileURLToPath } from 'node:url';
import * as TOML from '@iarna/toml';
import Ajv from 'ajv';
import type { ErrorObject } from 'ajv';
import * as yaml from 'js-yaml';
import { safeReadTextFileSync } from '../utils/safe-fs.js';
import { DefinitionError } from './errors.js';

/**
 * Formats a definition document can be written in.
 */
export type DocumentFormat = 'toml' | 'yaml';

const SCHEMA_PATH = fileURLToPath(new URL('../../schemas/interview.schema.json', import.meta.url));

const ajv = new (Ajv as unknown as new (opts: { allErrors: boolean }) => {
  compile: (schema: Record<string, unknown>) => {
    (data: unknown): boolean;
    errors: ErrorObject[] | null;
  };
})({
  allErrors: true,
});

let validateSchema: ReturnType<typeof ajv.compile> | undefined;

function schemaValidator(): ReturnType<typeof ajv.compile> {
  if (validateSchema === undefined) {
    const schema: unknown = JSON.parse(safeReadTextFileSync(SCHEMA_PATH));
    if (!isRecord(schema)) {
      throw new Error(`Schema ${SCHEMA_PATH} is not an object`);
    }
    validateSchema = ajv.compile(schema);
  }
  return validateSchema;
}

/**
 * Checks whether a document value is a mapping.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Picks the format from a file extension.
 *
 * @returns The format, or undefined for other extensions.
 */
export function formatForPath(filePath: string): DocumentFormat | undefined {
  const lower = filePath.toLowerCase();
  if (lower.endsWith('.toml')) {
    return 'toml';
  }
  if (lower.endsWith('.yaml') || lower.endsWith('.yml')) {
    return 'yaml';
  }
  return undefined;
}

// TOML dates arrive as Date objects; definitions only use them as text. YAML
// is read with the core schema, which keeps timestamps as written.
function plain(value: unknown): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(plain);
  }
  if (isRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, plain(item)]));
  }
  return value;
}

/**
 * Reads definition document text into plain data.
 *
 * @param text - Document text.
 * @param format - `toml` or `yaml`.
 * @param source - File name used as the error location.
 * @throws DefinitionError on a syntax error.
 */
export function parseDefinitionDocument(
  text: string,
  format: DocumentFormat,
  source?: string
): unknown {
  try {
    return format === 'toml'
      ? plain(TOML.parse(text))
      : plain(yaml.load(text, { schema: yaml.CORE_SCHEMA }));
  } catch (error) {
    if (error instanceof Error) {
      throw new DefinitionError(
        `Invalid ${format.toUpperCase()} syntax: ${error.message}`,
        source,
        error
      );
    }
    throw error;
  }
}

function locate(instancePath: string): string | undefined {
  if (instancePath === '') {
    return undefined;
  }
  return instancePath
    .slice(1)
    .split('/')
    .map((segment) => segment.replaceAll('~1', '/').replaceAll('~0', '~'))
    .reduce((location, segment) => {
      if (/^\d+$/.test(segment)) {
        return `${location}[${segment}]`;
      }
      return location === '' ? segment : `${location}.${segment}`;
    }, '');
}

/**
 * Checks a parsed document against the definition schema.
 *
 * @returns The document, narrowed to a mapping.
 * @throws DefinitionError listing every schema violation.
 */
export function validateDocument(document: unknown, source?: string): Record<string, unknown> {
  const validate = schemaValidator();
  if (validate(document) && isRecord(document)) {
    return document;
  }
  const problems = (validate.errors ?? []).map((error) => {
    const location = locate(error.instancePath);
    const message = error.message ?? 'is invalid';
    return location === undefined ? message : `${location} ${message}`;
  });
  throw new DefinitionError(
    `Document does not match the interview schema: ${problems.join('; ')}`,
    source
  );
}
