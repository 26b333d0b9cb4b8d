/**
 * CLI Commands - Main Export
 * Lazy-loaded command registry for Gunshi
 */

import { define, lazy } from 'gunshi';
import { CLI_DESCRIPTION, CLI_NAME } from '../utils/constants.js';

// Main command (shown when no subcommand is provided)
export const mainCommand = define({
  name: CLI_NAME,
  description: CLI_DESCRIPTION,
  run: (ctx) => {
    ctx.log('Use --help to see available commands');
  },
});

// Lazy-loaded subcommands (using exported command definitions for help display)
export const subCommands = {
  update: lazy(async () => (await import('./update.js')).updateCommand, {
    name: 'update',
    description: 'Fetch stale symbols of a market, store them and sync both backends',
  }),
  sync: lazy(async () => (await import('./sync.js')).syncCommand, {
    name: 'sync',
    description: 'Replicate pending changes without fetching',
  }),
  status: lazy(async () => (await import('./status.js')).statusCommand, {
    name: 'status',
    description: 'Show symbol counts, date range, pending changes and backend checkpoints',
  }),
};
