/**
 * Configuration module for interview-engine.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, isTable, parseConfig } from './parser.js';
export type {
  Config,
  DefinitionsConfig,
  LoggingConfig,
  PartialConfig,
  SessionConfig,
} from './types.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  DEFAULT_DEFINITIONS,
  DEFAULT_LOGGING,
  DEFAULT_SESSION,
} from './defaults.js';
export {
  ConfigValidationError,
  MIN_SECRET_LENGTH,
  assertConfigValid,
  validateConfig,
} from './validator.js';
export type {
  PathChecker,
  PathCheckResult,
  ValidationError,
  ValidationResult,
  ValidateConfigOptions,
} from './validator.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeConfig,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { loadConfig } from './loader.js';
export type { LoadConfigOptions, LoadedConfig } from './loader.js';
