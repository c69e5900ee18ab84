/**
 * TOML configuration parser for interview-engine.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_CONFIG, DEFAULT_DEFINITIONS, DEFAULT_LOGGING, DEFAULT_SESSION } from './defaults.js';
import type { Config, DefinitionsConfig, LoggingConfig, SessionConfig } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message, { cause });
    this.name = 'ConfigParseError';
  }
}

/**
 * Checks whether a parsed TOML value is a table.
 */
export function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readTable(value: unknown, fieldPath: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected table`);
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is an array of strings.
 *
 * @throws ConfigParseError if value is not an array of strings.
 */
function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected array of strings, got ${typeof value}`
    );
  }
  return value.map((item: unknown, index) =>
    validateString(item, `${fieldPath}[${String(index)}]`)
  );
}

function parseDefinitions(raw: Record<string, unknown> | undefined): DefinitionsConfig {
  const result: DefinitionsConfig = {
    ...DEFAULT_DEFINITIONS,
    paths: [...DEFAULT_DEFINITIONS.paths],
  };
  if (raw === undefined) {
    return result;
  }

  if ('paths' in raw) {
    result.paths = validateStringArray(raw.paths, 'definitions.paths');
  }
  if ('strict_paths' in raw) {
    result.strict_paths = validateBoolean(raw.strict_paths, 'definitions.strict_paths');
  }

  return result;
}

function parseSession(raw: Record<string, unknown> | undefined): SessionConfig {
  const result: SessionConfig = {
    ...DEFAULT_SESSION,
    previous_secrets: [...DEFAULT_SESSION.previous_secrets],
  };
  if (raw === undefined) {
    return result;
  }

  if ('secret' in raw) {
    result.secret = validateString(raw.secret, 'session.secret');
  }
  if ('previous_secrets' in raw) {
    result.previous_secrets = validateStringArray(
      raw.previous_secrets,
      'session.previous_secrets'
    );
  }
  if ('token_ttl_seconds' in raw) {
    result.token_ttl_seconds = validateNumber(raw.token_ttl_seconds, 'session.token_ttl_seconds');
    if (!Number.isInteger(result.token_ttl_seconds)) {
      throw new ConfigParseError(
        `Invalid value for 'session.token_ttl_seconds': must be an integer, got ${String(result.token_ttl_seconds)}`
      );
    }
  }

  return result;
}

function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [definitions]
 * paths = ["interviews", "extra/upgrade.yaml"]
 *
 * [session]
 * secret = "test-secret-0123456789"
 * `);
 * console.log(config.definitions.paths); // ["interviews", "extra/upgrade.yaml"]
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: TOML.JsonMap;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    definitions: parseDefinitions(readTable(parsed.definitions, 'definitions')),
    session: parseSession(readTable(parsed.session, 'session')),
    logging: parseLogging(readTable(parsed.logging, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    definitions: { ...DEFAULT_CONFIG.definitions, paths: [...DEFAULT_CONFIG.definitions.paths] },
    session: {
      ...DEFAULT_CONFIG.session,
      previous_secrets: [...DEFAULT_CONFIG.session.previous_secrets],
    },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}
