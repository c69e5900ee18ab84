/**
 * Configuration types for interview-engine.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Where interview definitions are loaded from.
 */
export interface DefinitionsConfig {
  /** Definition files or directories, resolved against the working directory. */
  paths: string[];
  /** Treat undeclared references in guards and templates as fatal. */
  strict_paths: boolean;
}

/**
 * State token signing.
 */
export interface SessionConfig {
  /** Secret new tokens are signed with. Required to serve. */
  secret: string;
  /** Older secrets still accepted when verifying. */
  previous_secrets: string[];
  /** Token lifetime in seconds; 0 disables expiry. */
  token_ttl_seconds: number;
}

/**
 * Logging behaviour.
 */
export interface LoggingConfig {
  /** Emit debug-level entries. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from interview-engine.toml.
 */
export interface Config {
  definitions: DefinitionsConfig;
  session: SessionConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  definitions?: Partial<DefinitionsConfig>;
  session?: Partial<SessionConfig>;
  logging?: Partial<LoggingConfig>;
}
