/**
 * Default configuration values for interview-engine.toml.
 *
 * @packageDocumentation
 */

import type { Config, DefinitionsConfig, LoggingConfig, SessionConfig } from './types.js';

/** Default configuration file name, looked up in the working directory. */
export const DEFAULT_CONFIG_FILE = 'interview-engine.toml';

/**
 * Definitions are read from `interviews/` relative to the working directory.
 */
export const DEFAULT_DEFINITIONS: DefinitionsConfig = {
  paths: ['interviews'],
  strict_paths: false,
};

/**
 * No secret by default: serving requires one to be configured.
 */
export const DEFAULT_SESSION: SessionConfig = {
  secret: '',
  previous_secrets: [],
  token_ttl_seconds: 0,
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  definitions: DEFAULT_DEFINITIONS,
  session: DEFAULT_SESSION,
  logging: DEFAULT_LOGGING,
};
