/**
 * Error Handling Utilities
 * Common error handling patterns for CLI commands
 */

import { ConfigError, RunConflictError, UpstreamUnavailableError } from '@stock-warehouse/shared';
import chalk from 'chalk';
import { CLI_NAME, EXIT_CODES } from './constants.js';

/**
 * Base error class for CLI operations
 * Provides structured error handling with exit codes
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = EXIT_CODES.failed,
    public readonly silent: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CLIError';
  }
}

/**
 * Error thrown when input validation fails
 */
export class CLIValidationError extends CLIError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, EXIT_CODES.failed, false, options);
    this.name = 'CLIValidationError';
  }
}

/**
 * Error thrown when the user interrupts a run
 * Treated as silent exit with the failed code, since the store may be behind
 */
export class CLICancelError extends CLIError {
  constructor(message = 'Run cancelled') {
    super(message, EXIT_CODES.failed, true);
    this.name = 'CLICancelError';
  }
}

/**
 * Spinner surface used by error handling; an ora spinner satisfies it
 */
export interface CommandSpinner {
  fail(text?: string): unknown;
  stop(): unknown;
}

/**
 * Display troubleshooting tips
 */
export function displayTroubleshootingTips(tips: string[]): void {
  console.error(chalk.gray('\n💡 Troubleshooting tips:'));
  for (const tip of tips) {
    console.error(chalk.gray(`   • ${tip}`));
  }
}

/**
 * Exit code for an error that ended a command
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CLIError) return error.exitCode;
  if (error instanceof RunConflictError) return EXIT_CODES.runConflict;
  if (error instanceof UpstreamUnavailableError) return EXIT_CODES.upstreamUnavailable;
  if (error instanceof ConfigError) return EXIT_CODES.config;
  return EXIT_CODES.failed;
}

/**
 * Handle command error with consistent formatting
 */
export function handleCommandError(
  error: unknown,
  spinner: CommandSpinner,
  options: {
    failMessage: string;
    debug?: boolean;
    tips?: string[];
  }
): never {
  // Re-throw CLIError directly to preserve original exitCode/silent flags
  if (error instanceof CLIError) {
    spinner.stop();
    throw error;
  }

  spinner.fail(options.failMessage);

  const errorMessage = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`\nError: ${errorMessage}`));

  if (options.debug && error instanceof Error && error.stack) {
    console.error(chalk.gray(`\n[DEBUG] Stack trace:\n${error.stack}`));
  }

  displayTroubleshootingTips(options.tips ?? tipsFor(error));

  throw new CLIError(errorMessage, exitCodeFor(error), true, { cause: error });
}

const DEBUG_TIP = 'Try with --debug flag for more information';

function tipsFor(error: unknown): string[] {
  if (error instanceof RunConflictError) return WAREHOUSE_TIPS.runConflict;
  if (error instanceof UpstreamUnavailableError) return WAREHOUSE_TIPS.upstream;
  if (error instanceof ConfigError) return WAREHOUSE_TIPS.config;
  return [DEBUG_TIP];
}

/**
 * Warehouse troubleshooting tips
 */
export const WAREHOUSE_TIPS = {
  runConflict: [
    'Another update or sync is running; wait for it to finish',
    'A lock left by a crashed run is taken over automatically once its process is gone',
    'Set WAREHOUSE_LOCK_PATH if two warehouses share a directory',
  ],
  upstream: [
    'The price provider may be blocking this address; retry later',
    'Lower FETCH_CONCURRENCY or FETCH_REQUESTS_PER_MINUTE',
    DEBUG_TIP,
  ],
  config: [
    'Credentials come in pairs: GDRIVE_ACCESS_TOKEN with GDRIVE_FOLDER_ID, GITHUB_TOKEN with WAREHOUSE_REPOSITORY',
    'WAREHOUSE_REPOSITORY takes the form owner/repo',
  ],
  sync: [
    `Changes stay in the change log; run "${CLI_NAME} sync" to push them later`,
    'Check the backend credentials and remaining quota',
    DEBUG_TIP,
  ],
  status: ['Check WAREHOUSE_DB_PATH or WAREHOUSE_DATA_DIR', DEBUG_TIP],
};
