/**
 * Update Command
 * Fetch the stale symbols of one market, store them and replicate the warehouse
 */

import { MARKETS } from '@stock-warehouse/shared';
import chalk from 'chalk';
import { define } from 'gunshi';
import ora from 'ora';
import { assertRunSucceeded, parseMarket, parseSymbolList, withInterrupt } from '../utils/command-helpers.js';
import { CLI_NAME } from '../utils/constants.js';
import { displayRunSummary } from '../utils/display-helpers.js';
import { handleCommandError } from '../utils/error-handling.js';
import { createWarehouseContext } from '../utils/warehouse-context.js';

export const updateCommand = define({
  name: 'update',
  description: 'Fetch stale symbols of a market, store them and sync both backends',
  args: {
    market: {
      type: 'positional',
      description: `Market to update (${MARKETS.join(', ')})`,
    },
    symbols: {
      type: 'string',
      short: 's',
      description: 'Comma-separated symbol ids to restrict the run to',
    },
    force: {
      type: 'boolean',
      short: 'f',
      description: 'Fetch every selected symbol even when it is fresh',
    },
    'skip-sync': {
      type: 'boolean',
      description: 'Update the local store only; changes stay in the change log',
    },
    debug: {
      type: 'boolean',
      description: 'Enable debug logging',
    },
  },
  examples: `
# Update Taiwan equities and push the warehouse to both backends
${CLI_NAME} update TW

# Refetch two symbols regardless of staleness
${CLI_NAME} update TW --symbols 2330.TW,2317.TW --force

# Update the local store only
${CLI_NAME} update US --skip-sync
  `.trim(),
  run: async (ctx) => {
    const { symbols, force, 'skip-sync': skipSync, debug } = ctx.values;
    const market = parseMarket(ctx.values.market);
    const only = parseSymbolList(symbols);
    const spinner = ora(`Updating ${market}...`).start();

    if (debug) {
      console.log(chalk.gray(`[DEBUG] Symbols: ${only ? only.join(', ') : 'all'}`));
    }

    try {
      const warehouse = createWarehouseContext({ debug });
      try {
        const { summary } = await withInterrupt((signal) =>
          warehouse.runner.run(market, {
            signal,
            symbols: only,
            force,
            skipSync,
            onProgress: (stage, current, total, message) => {
              spinner.text = `[${stage}] ${message} (${current}/${total})`;
            },
          })
        );
        spinner.stop();
        displayRunSummary(summary);
        assertRunSucceeded(summary);
      } finally {
        warehouse.close();
      }
    } catch (error) {
      handleCommandError(error, spinner, {
        failMessage: `${market} update failed`,
        debug,
      });
    }
  },
});
