/**
 * Price Series Schema
 *
 * Daily OHLCV rows keyed by (symbol_id, date); date is market local
 */

import { sql } from 'drizzle-orm';
import { index, integer, primaryKey, real, sqliteTable, text } from 'drizzle-orm/sqlite-core';
import { symbolId } from '../../columns/symbol-id';
import { symbols } from './symbols';

export const priceSeries = sqliteTable(
  'price_series',
  {
    symbolId: symbolId('symbol_id')
      .notNull()
      .references(() => symbols.symbolId),
    date: text('date').notNull(),
    open: real('open').notNull(),
    high: real('high').notNull(),
    low: real('low').notNull(),
    close: real('close').notNull(),
    volume: integer('volume').notNull(),
    createdAt: text('created_at').default(sql`CURRENT_TIMESTAMP`),
  },
  (table) => [
    primaryKey({ columns: [table.symbolId, table.date] }),
    index('idx_price_series_date').on(table.date),
  ]
);

export type PriceSeriesRow = typeof priceSeries.$inferSelect;
export type PriceSeriesInsert = typeof priceSeries.$inferInsert;
