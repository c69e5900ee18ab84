/**
 * Terminal streams for the interview CLI.
 */

import type { CliIo, InputReader, OutputWriter } from './types.js';

/**
 * Default output writer using process.stdout.
 */
export const stdoutWriter: OutputWriter = {
  writeLine(text: string): void {
    process.stdout.write(text + '\n');
  },
  write(text: string): void {
    process.stdout.write(text);
  },
};

/**
 * Output writer using process.stderr.
 */
export const stderrWriter: OutputWriter = {
  writeLine(text: string): void {
    process.stderr.write(text + '\n');
  },
  write(text: string): void {
    process.stderr.write(text);
  },
};

/**
 * Creates a readline-based input reader on stdin.
 */
export async function createReadlineReader(): Promise<InputReader> {
  // Loaded lazily so non-interactive commands never touch stdin.
  const readline = await import('node:readline');

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return {
    readLine(prompt: string): Promise<string> {
      return new Promise((resolve) => {
        rl.question(prompt, (answer) => {
          resolve(answer);
        });
      });
    },
    close(): void {
      rl.close();
    },
  };
}

/**
 * Process streams.
 */
export const defaultIo: CliIo = {
  out: stdoutWriter,
  err: stderrWriter,
  createReader: createReadlineReader,
};
