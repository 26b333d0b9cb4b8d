/**
 * Display Helpers
 * Common display patterns for CLI commands
 */

import type { BackendSummary, RunStatus, RunSummary, WarehouseStatus } from '@stock-warehouse/shared';
import { formatBackend, formatDuration, MAX_LISTED_FAILURES } from '@stock-warehouse/shared/notifications';
import chalk from 'chalk';

const SEPARATOR_WIDTH = 60;

/**
 * Display a section header with separator lines
 */
export function displayHeader(title: string): void {
  console.log(`\n${chalk.bold('='.repeat(SEPARATOR_WIDTH))}`);
  console.log(chalk.bold.cyan(title));
  console.log(chalk.bold('='.repeat(SEPARATOR_WIDTH)));
}

/**
 * Display a section footer
 */
export function displayFooter(): void {
  console.log(`${chalk.bold('='.repeat(SEPARATOR_WIDTH))}\n`);
}

/**
 * Display a section title with emoji
 */
export function displaySection(emoji: string, title: string): void {
  console.log(chalk.white(`\n${emoji} ${title}:`));
}

/**
 * Display a key-value pair with optional indentation
 */
export function displayKeyValue(key: string, value: string, indent = 2): void {
  const spaces = ' '.repeat(indent);
  console.log(chalk.white(`${spaces}${key}: ${value}`));
}

/**
 * Display a list of items with bullet points
 */
export function displayList(items: string[], options?: { color?: 'red' | 'yellow' | 'gray'; maxItems?: number }): void {
  const { color = 'gray', maxItems = 10 } = options ?? {};
  const colorFn = color === 'red' ? chalk.red : color === 'yellow' ? chalk.yellow : chalk.gray;

  for (const item of items.slice(0, maxItems)) {
    console.log(colorFn(`  • ${item}`));
  }

  if (items.length > maxItems) {
    console.log(colorFn(`  ... and ${items.length - maxItems} more`));
  }
}

function statusLabel(status: RunStatus): string {
  switch (status) {
    case 'ok':
      return chalk.green('✓ OK');
    case 'partial':
      return chalk.yellow('⚠ Partial');
    case 'failed':
      return chalk.red('✗ Failed');
  }
}

function backendLine(backend: BackendSummary): string {
  const line = formatBackend(backend);
  if (backend.outcome === 'SUCCEEDED') return chalk.green(line);
  if (backend.outcome === 'DEGRADED') return chalk.yellow(line);
  return chalk.red(line);
}

/**
 * Display the summary of an update or sync run
 */
export function displayRunSummary(summary: RunSummary): void {
  displayHeader(summary.market ? `${summary.market} Update Summary` : 'Sync Summary');
  console.log(chalk.white(`Status: ${statusLabel(summary.status)}`));

  if (summary.fatalError) {
    console.log(chalk.red(`Error: ${summary.fatalError}`));
  }

  if (summary.market) {
    const { counts } = summary;
    console.log(chalk.white(`Symbols: ${chalk.yellow(counts.total.toString())}`));
    displayKeyValue('Fetched', chalk.yellow(counts.fetched.toString()));
    displayKeyValue('Updated', chalk.yellow(counts.updated.toString()), 4);
    displayKeyValue('Unchanged', chalk.yellow(counts.unchanged.toString()), 4);
    displayKeyValue('Skipped (fresh)', chalk.yellow(counts.skipped.toString()));
    if (counts.failed > 0) {
      displayKeyValue('Failed', chalk.red(counts.failed.toString()));
    }
    console.log(
      chalk.white(
        `Rows: ${chalk.yellow(counts.rowsInserted.toString())} inserted, ` +
          `${chalk.yellow(counts.rowsUpdated.toString())} updated`
      )
    );
    console.log(chalk.white(`Change-set: ${chalk.yellow(summary.changeSetSize.toString())} entries`));
  }

  if (summary.syncSkipped) {
    console.log(chalk.gray('Backends: sync skipped'));
  } else if (summary.backends.length > 0) {
    displaySection('☁️', 'Backends');
    for (const backend of summary.backends) {
      console.log(`  ${backendLine(backend)}`);
    }
  }

  if (summary.failedSymbols.length > 0) {
    displaySection('❌', 'Failed symbols');
    displayList(
      summary.failedSymbols.map((failed) => `${failed.symbolId}: ${failed.reason}`),
      { color: 'red', maxItems: MAX_LISTED_FAILURES }
    );
  }

  if (summary.cancelled) {
    console.log(chalk.yellow('\n⚠ Run was cancelled'));
  }

  console.log(chalk.white(`\nDuration: ${formatDuration(summary.durationMs)}`));
  displayFooter();
}

/**
 * Display the local store status
 */
export function displayStatus(dbPath: string, status: WarehouseStatus, lastSyncAt: string | null): void {
  displayHeader('Warehouse Status');
  displayKeyValue('Database', dbPath, 0);
  displayKeyValue('Last sync', lastSyncAt ?? 'never', 0);
  displayKeyValue('Price rows', status.priceRows.toString(), 0);
  displayKeyValue('Date range', status.minDate && status.maxDate ? `${status.minDate} → ${status.maxDate}` : 'empty', 0);
  displayKeyValue('Pending changes', status.pendingChanges.toString(), 0);

  displaySection('📈', 'Markets');
  if (status.markets.length === 0) {
    console.log(chalk.gray('  No symbols stored yet'));
  }
  for (const market of status.markets) {
    displayKeyValue(market.market, `${market.active} active / ${market.total} total`);
  }

  displaySection('☁️', 'Backend checkpoints');
  if (status.checkpoints.length === 0) {
    console.log(chalk.gray('  Never synced'));
  }
  for (const checkpoint of status.checkpoints) {
    displayKeyValue(
      checkpoint.backend,
      `${checkpoint.revision} at ${checkpoint.syncedAt.toISOString()} (change ${checkpoint.lastChangeId})`
    );
  }
  displayFooter();
}
