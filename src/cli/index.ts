#!/usr/bin/env node

/**
 * Interview CLI entry point.
 *
 * This is the main entry point for the 'interview' CLI command.
 */

import { runCli } from './app.js';
import { defaultIo } from './io.js';

runCli(process.argv.slice(2), defaultIo, process.env, {
  colors: process.stdout.isTTY === true,
}).then(
  (exitCode) => {
    process.exit(exitCode);
  },
  (error: unknown) => {
    process.stderr.write(
      `Unexpected error: ${error instanceof Error ? error.message : String(error)}\n`
    );
    process.exit(1);
  }
);
