/**
 * Structured logging utility.
 *
 * Emits one JSON line per entry on stderr, which keeps stdout free for the
 * MCP stdio transport and for CLI output.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: diagnostic detail, only emitted in debug mode
 * - `info`: normal operation
 * - `warn`: conditions that may need attention
 * - `error`: failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry as written to stderr.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;
  readonly level: LogLevel;
  /**
   * Source of the entry.
   * @example "DefinitionCatalog"
   */
  readonly component: string;
  /**
   * Snake-case event name.
   * @example "definitions_loaded"
   */
  readonly event: string;
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;
  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
  /** Clock, injectable for tests. */
  readonly now?: () => Date;
  /** Output sink. Defaults to stderr. */
  readonly write?: (line: string) => void;
}

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'InterviewService', debugMode: true });
 * logger.info('interview_started', { interview: 'new-registration' });
 * logger.warn('token_rejected', { reason: 'signature mismatch' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly now: () => Date;
  private readonly write: (line: string) => void;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.now = options.now ?? ((): Date => new Date());
    this.write =
      options.write ??
      ((line: string): void => {
        process.stderr.write(line);
      });
  }

  /**
   * Returns a logger for another component sharing this logger's settings.
   *
   * @param component - Name of the child component.
   */
  child(component: string): Logger {
    return new Logger({
      component,
      debugMode: this.debugMode,
      now: this.now,
      write: this.write,
    });
  }

  /**
   * Logs a debug-level message. A no-op unless debug mode is enabled.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: this.now().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined ? { data } : {}),
    };

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      // Circular structures and BigInt values cannot be serialized.
      line = JSON.stringify({
        timestamp: entry.timestamp,
        level,
        component: this.component,
        event,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }
    this.write(line + '\n');
  }
}

/**
 * Creates a logger that discards every entry.
 *
 * @param component - Component name, kept for `child` loggers.
 */
export function createSilentLogger(component = 'silent'): Logger {
  return new Logger({
    component,
    write: (): void => {
      // discard
    },
  });
}
