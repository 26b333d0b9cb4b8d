/**
 * Command Helpers
 * Argument parsing and run plumbing shared by the warehouse commands
 */

import { isMarket, MARKETS, type Market, normalizeSymbolId, type RunSummary } from '@stock-warehouse/shared';
import chalk from 'chalk';
import { CLI_NAME, EXIT_CODES } from './constants.js';
import { CLICancelError, CLIError, CLIValidationError } from './error-handling.js';

/**
 * Parse the market positional (case-insensitive)
 */
export function parseMarket(value: string | undefined): Market {
  if (!value) {
    throw new CLIValidationError(`Market is required\nUsage: ${CLI_NAME} update <${MARKETS.join('|')}>`);
  }
  const market = value.trim().toUpperCase();
  if (!isMarket(market)) {
    throw new CLIValidationError(`Unknown market "${value}". Expected one of: ${MARKETS.join(', ')}`);
  }
  return market;
}

/**
 * Parse a comma-separated symbol list; undefined means every symbol of the market
 */
export function parseSymbolList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const symbols = [...new Set(value.split(',').map(normalizeSymbolId).filter((id) => id.length > 0))];
  if (symbols.length === 0) {
    throw new CLIValidationError('--symbols needs at least one symbol id, e.g. --symbols 2330.TW,2317.TW');
  }
  return symbols;
}

/**
 * Fail the command silently when the run did not fully succeed
 */
export function assertRunSucceeded(summary: RunSummary): void {
  if (summary.status === 'ok') return;
  if (summary.cancelled) {
    throw new CLICancelError();
  }
  if (summary.status === 'partial') {
    throw new CLIError('Run finished with failures', EXIT_CODES.partial, true);
  }
  throw new CLIError(summary.fatalError ?? 'Run failed', EXIT_CODES.failed, true);
}

export interface InterruptTarget {
  on(event: 'SIGINT', listener: () => void): unknown;
  off(event: 'SIGINT', listener: () => void): unknown;
}

/**
 * Run work with an abort signal tied to Ctrl+C. The first interrupt asks the run
 * to stop between symbols; the listener is removed once the work settles.
 */
export async function withInterrupt<T>(
  work: (signal: AbortSignal) => Promise<T>,
  target: InterruptTarget = process
): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = () => {
    if (controller.signal.aborted) return;
    console.error(chalk.yellow('\n⚠ Interrupted, finishing the current symbols...'));
    controller.abort();
  };

  target.on('SIGINT', onInterrupt);
  try {
    return await work(controller.signal);
  } finally {
    target.off('SIGINT', onInterrupt);
  }
}
