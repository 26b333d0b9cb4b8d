/**
 * Symbols Schema
 *
 * One row per tradable instrument. Rows are never deleted; delisted symbols
 * keep their history and are flagged inactive.
 */

import { sql } from 'drizzle-orm';
import { index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';
import { MARKETS } from '../../../types/warehouse';
import { symbolId } from '../../columns/symbol-id';

export const symbols = sqliteTable(
  'symbols',
  {
    symbolId: symbolId('symbol_id').primaryKey(),
    market: text('market', { enum: MARKETS }).notNull(),
    name: text('name').notNull(),
    active: integer('active', { mode: 'boolean' }).notNull().default(true),
    createdAt: text('created_at').default(sql`CURRENT_TIMESTAMP`),
    updatedAt: text('updated_at').default(sql`CURRENT_TIMESTAMP`),
  },
  (table) => [index('idx_symbols_market').on(table.market)]
);

export type SymbolRow = typeof symbols.$inferSelect;
export type SymbolInsert = typeof symbols.$inferInsert;
