/**
 * Loads the process configuration: file, then environment.
 *
 * @packageDocumentation
 */

import { safeExistsSync, safeReadTextFileSync } from '../utils/safe-fs.js';
import { DEFAULT_CONFIG_FILE } from './defaults.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import type { Config } from './types.js';

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /**
   * Configuration file. When given it must exist; otherwise
   * `interview-engine.toml` is used if present.
   */
  readonly file?: string;
  /** Environment to read overrides from. */
  readonly env?: EnvRecord;
}

/**
 * Result of {@link loadConfig}.
 */
export interface LoadedConfig {
  readonly config: Config;
  /** The file the configuration was read from, if any. */
  readonly source: string | undefined;
}

/**
 * Loads configuration with precedence env > file > defaults.
 *
 * @throws ConfigParseError if an explicitly named file is missing or any file is invalid.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  let source: string | undefined;
  let config: Config;

  if (options.file !== undefined) {
    if (!safeExistsSync(options.file)) {
      throw new ConfigParseError(`Configuration file not found: ${options.file}`);
    }
    source = options.file;
  } else if (safeExistsSync(DEFAULT_CONFIG_FILE)) {
    source = DEFAULT_CONFIG_FILE;
  }

  if (source === undefined) {
    config = getDefaultConfig();
  } else {
    const file = source;
    try {
      config = parseConfig(safeReadTextFileSync(file));
    } catch (error) {
      if (error instanceof ConfigParseError) {
        throw new ConfigParseError(`${file}: ${error.message}`, error);
      }
      throw error;
    }
  }

  return { config: applyEnvOverrides(config, env), source };
}
