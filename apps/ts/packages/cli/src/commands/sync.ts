/**
 * Sync Command
 * Push change-log entries left by earlier runs to both backends
 */

import { define } from 'gunshi';
import ora from 'ora';
import { assertRunSucceeded, withInterrupt } from '../utils/command-helpers.js';
import { CLI_NAME } from '../utils/constants.js';
import { displayRunSummary } from '../utils/display-helpers.js';
import { CLIValidationError, handleCommandError, WAREHOUSE_TIPS } from '../utils/error-handling.js';
import { createWarehouseContext } from '../utils/warehouse-context.js';

export const syncCommand = define({
  name: 'sync',
  description: 'Replicate pending changes without fetching',
  args: {
    debug: {
      type: 'boolean',
      description: 'Enable debug logging',
    },
  },
  examples: `
# Push the warehouse after an update that ran with --skip-sync
${CLI_NAME} sync
  `.trim(),
  run: async (ctx) => {
    const { debug } = ctx.values;
    const spinner = ora('Syncing backends...').start();

    try {
      const warehouse = createWarehouseContext({ debug });
      try {
        if (warehouse.backends.length === 0) {
          throw new CLIValidationError(
            'No backend configured. Set GDRIVE_ACCESS_TOKEN/GDRIVE_FOLDER_ID or GITHUB_TOKEN/WAREHOUSE_REPOSITORY'
          );
        }
        const { summary } = await withInterrupt((signal) => warehouse.runner.syncPending({ signal }));
        spinner.stop();
        displayRunSummary(summary);
        assertRunSucceeded(summary);
      } finally {
        warehouse.close();
      }
    } catch (error) {
      handleCommandError(error, spinner, {
        failMessage: 'Sync failed',
        debug,
        tips: WAREHOUSE_TIPS.sync,
      });
    }
  },
});
