/**
 * Environment variable overrides for configuration.
 *
 * INTERVIEW_ENGINE_* variables override configuration values at runtime.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * How one variable lands in the partial configuration.
 */
interface EnvMapping {
  readonly description: string;
  readonly apply: (overrides: PartialConfig, raw: string, envVar: string) => void;
}

/**
 * Coerces a string value to a non-negative integer.
 *
 * @throws EnvCoercionError if the value is empty or not an integer.
 */
function coerceToInteger(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'integer', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (!Number.isInteger(num)) {
    throw new EnvCoercionError(envVar, value, 'integer');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Splits a comma-separated list, dropping blank entries.
 */
function coerceToList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  INTERVIEW_ENGINE_DEFINITIONS_PATHS: {
    description: 'Comma-separated definition files or directories',
    apply: (overrides, raw) => {
      overrides.definitions = { ...overrides.definitions, paths: coerceToList(raw) };
    },
  },
  INTERVIEW_ENGINE_DEFINITIONS_STRICT_PATHS: {
    description: 'Treat undeclared references in guards and templates as fatal',
    apply: (overrides, raw, envVar) => {
      overrides.definitions = {
        ...overrides.definitions,
        strict_paths: coerceToBoolean(raw, envVar),
      };
    },
  },
  INTERVIEW_ENGINE_SESSION_SECRET: {
    description: 'Secret new state tokens are signed with',
    apply: (overrides, raw) => {
      overrides.session = { ...overrides.session, secret: raw };
    },
  },
  INTERVIEW_ENGINE_SESSION_PREVIOUS_SECRETS: {
    description: 'Comma-separated secrets still accepted when verifying tokens',
    apply: (overrides, raw) => {
      overrides.session = { ...overrides.session, previous_secrets: coerceToList(raw) };
    },
  },
  INTERVIEW_ENGINE_SESSION_TOKEN_TTL_SECONDS: {
    description: 'State token lifetime in seconds (0 disables expiry)',
    apply: (overrides, raw, envVar) => {
      overrides.session = {
        ...overrides.session,
        token_ttl_seconds: coerceToInteger(raw, envVar),
      };
    },
  },
  INTERVIEW_ENGINE_DEBUG: {
    description: 'Enable debug logging',
    apply: (overrides, raw, envVar) => {
      overrides.logging = { ...overrides.logging, debug: coerceToBoolean(raw, envVar) };
    },
  },
};

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Empty variables are ignored.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ INTERVIEW_ENGINE_DEBUG: 'yes' });
 * console.log(result.overrides.logging?.debug); // true
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    definitions: { ...base.definitions, ...partial.definitions },
    session: { ...base.session, ...partial.session },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, string> {
  return Object.fromEntries(
    Object.entries(ENV_VAR_MAPPINGS).map(([envVar, mapping]) => [envVar, mapping.description])
  );
}
