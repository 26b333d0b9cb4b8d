#!/usr/bin/env tsx

/**
 * Stock Warehouse CLI - Entry Point
 * Built with Gunshi for modern CLI experience
 */

import { cli } from 'gunshi';
import { mainCommand, subCommands } from './commands/index.js';
import { CLI_DESCRIPTION, CLI_NAME, CLI_VERSION } from './utils/constants.js';
import { CLIError, exitCodeFor } from './utils/error-handling.js';

async function main(): Promise<void> {
  await cli(process.argv.slice(2), mainCommand, {
    name: CLI_NAME,
    version: CLI_VERSION,
    description: CLI_DESCRIPTION,
    subCommands,
  });
}

main().catch((error: unknown) => {
  if (error instanceof CLIError) {
    if (!error.silent) {
      console.error(error.message);
    }
    process.exitCode = error.exitCode;
    return;
  }
  console.error('CLI Error:', error instanceof Error ? error.message : String(error));
  process.exitCode = exitCodeFor(error);
});
