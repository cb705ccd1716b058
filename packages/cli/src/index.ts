#!/usr/bin/env -S node --import tsx

/**
 * fincalc CLI - Entry Point
 */

import { runCli } from './commands/index.js';
import { CLIError } from './utils/error-handling.js';

runCli(process.argv.slice(2)).catch((error: unknown) => {
  if (error instanceof CLIError) {
    if (!error.silent) {
      console.error(error.message);
    }
    process.exitCode = error.exitCode;
    return;
  }
  console.error('CLI Error:', error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
