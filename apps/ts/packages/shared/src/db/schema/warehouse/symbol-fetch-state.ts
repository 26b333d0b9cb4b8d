/**
 * Per-symbol fetch bookkeeping
 */

import { sqliteTable, text } from 'drizzle-orm/sqlite-core';
import { symbolId } from '../../columns/symbol-id';
import { symbols } from './symbols';

export const symbolFetchState = sqliteTable('symbol_fetch_state', {
  symbolId: symbolId('symbol_id')
    .primaryKey()
    .references(() => symbols.symbolId),
  lastFetchedAt: text('last_fetched_at'), // ISO timestamp
  lastDate: text('last_date'), // latest stored series date
});

export type SymbolFetchStateRow = typeof symbolFetchState.$inferSelect;
export type SymbolFetchStateInsert = typeof symbolFetchState.$inferInsert;
