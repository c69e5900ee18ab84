/**
 * CLI types and interfaces for the interview CLI.
 */

import type { EnvRecord } from '../config/index.js';

/**
 * Interface for reading user input.
 * Abstracted for testability.
 */
export interface InputReader {
  /** Read a line of input. */
  readLine(prompt: string): Promise<string>;
  /** Close the reader. */
  close(): void;
}

/**
 * Interface for writing output.
 * Abstracted for testability.
 */
export interface OutputWriter {
  /** Write a line of text. */
  writeLine(text: string): void;
  /** Write text without newline. */
  write(text: string): void;
}

/**
 * Streams a command talks to.
 */
export interface CliIo {
  readonly out: OutputWriter;
  readonly err: OutputWriter;
  /** Opens an input reader; only interactive commands call it. */
  readonly createReader: () => Promise<InputReader>;
}

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Command-line arguments after the command name.
   */
  readonly args: readonly string[];

  readonly io: CliIo;

  /**
   * Environment for configuration overrides.
   */
  readonly env: EnvRecord;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Message written to stderr after the command finishes.
   */
  message?: string;
}
