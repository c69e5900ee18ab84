/**
 * Semantic validation for configuration values.
 *
 * Validates that configuration values are usable beyond type checking:
 * a signing secret long enough to be meaningful, a non-negative token TTL,
 * and at least one definitions path (optionally checked on disk).
 *
 * @packageDocumentation
 */

import type { Config } from './types.js';

/** Shortest accepted signing secret. */
export const MIN_SECRET_LENGTH = 16;

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

/**
 * Result of a path check operation.
 */
export interface PathCheckResult {
  /** Whether the path exists. */
  exists: boolean;
  /** Error message if the check failed. */
  errorMessage?: string;
}

/**
 * Function type for checking path existence.
 */
export type PathChecker = (path: string) => PathCheckResult;

/**
 * Options for semantic validation.
 */
export interface ValidateConfigOptions {
  /**
   * Function to check if definition paths exist.
   * If not provided, path validation is skipped.
   */
  pathChecker?: PathChecker;

  /**
   * Whether a signing secret is needed. Serving requires one; linting
   * definitions does not.
   * @defaultValue true
   */
  requireSecret?: boolean;
}

function validateSecret(value: string, field: string, errors: ValidationError[]): void {
  if (value.length < MIN_SECRET_LENGTH) {
    errors.push({
      field,
      // The secret itself is never echoed.
      value: `<${String(value.length)} characters>`,
      message: `'${field}' must be at least ${String(MIN_SECRET_LENGTH)} characters`,
    });
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @param options - Validation options.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(config);
 *
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(
  config: Config,
  options: ValidateConfigOptions = {}
): ValidationResult {
  const { pathChecker, requireSecret = true } = options;

  const errors: ValidationError[] = [];

  if (config.definitions.paths.length === 0) {
    errors.push({
      field: 'definitions.paths',
      value: config.definitions.paths,
      message: `'definitions.paths' must name at least one file or directory`,
    });
  }
  if (pathChecker !== undefined) {
    config.definitions.paths.forEach((pathValue, index) => {
      const result = pathChecker(pathValue);
      if (!result.exists) {
        errors.push({
          field: `definitions.paths[${String(index)}]`,
          value: pathValue,
          message: result.errorMessage ?? `Path does not exist: '${pathValue}'`,
        });
      }
    });
  }

  if (requireSecret) {
    validateSecret(config.session.secret, 'session.secret', errors);
  }
  config.session.previous_secrets.forEach((secret, index) => {
    validateSecret(secret, `session.previous_secrets[${String(index)}]`, errors);
  });

  const ttl = config.session.token_ttl_seconds;
  if (!Number.isInteger(ttl) || ttl < 0) {
    errors.push({
      field: 'session.token_ttl_seconds',
      value: ttl,
      message: `'session.token_ttl_seconds' must be a non-negative integer, got ${String(ttl)}`,
    });
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @param options - Validation options.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config, options: ValidateConfigOptions = {}): void {
  const result = validateConfig(config, options);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
