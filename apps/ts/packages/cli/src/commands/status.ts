/**
 * Status Command
 * Show what the local store holds and where each backend stands
 */

import { METADATA_KEYS } from '@stock-warehouse/shared';
import { define } from 'gunshi';
import ora from 'ora';
import { CLI_NAME } from '../utils/constants.js';
import { displayStatus } from '../utils/display-helpers.js';
import { handleCommandError, WAREHOUSE_TIPS } from '../utils/error-handling.js';
import { openDatabase } from '../utils/warehouse-context.js';

export const statusCommand = define({
  name: 'status',
  description: 'Show symbol counts, date range, pending changes and backend checkpoints',
  args: {
    json: {
      type: 'boolean',
      description: 'Print the status as JSON',
    },
    debug: {
      type: 'boolean',
      description: 'Enable debug logging',
    },
  },
  examples: `
# Show warehouse status
${CLI_NAME} status

# Machine-readable status
${CLI_NAME} status --json
  `.trim(),
  run: (ctx) => {
    const { json, debug } = ctx.values;
    const spinner = ora('Reading warehouse...').start();

    try {
      const { config, database } = openDatabase({ debug });
      try {
        const status = database.getStatus();
        const lastSyncAt = database.getMetadata(METADATA_KEYS.LAST_SYNC_AT);
        spinner.stop();

        if (json) {
          console.log(JSON.stringify({ database: config.database.path, lastSyncAt, ...status }, null, 2));
          return;
        }
        displayStatus(config.database.path, status, lastSyncAt);
      } finally {
        database.close();
      }
    } catch (error) {
      handleCommandError(error, spinner, {
        failMessage: 'Failed to read warehouse status',
        debug,
        tips: WAREHOUSE_TIPS.status,
      });
    }
  },
});
