/**
 * Change Log Schema
 *
 * Commit log of change-set entries. Rows stay until every backend has
 * acknowledged them, so a failed or interrupted sync is retried next run.
 */

import { sql } from 'drizzle-orm';
import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';
import { symbolId } from '../../columns/symbol-id';

export const CHANGE_OPERATIONS = ['insert', 'update'] as const;

export const changeLog = sqliteTable('change_log', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  symbolId: symbolId('symbol_id').notNull(),
  fromDate: text('from_date').notNull(),
  toDate: text('to_date').notNull(),
  operation: text('operation', { enum: CHANGE_OPERATIONS }).notNull(),
  createdAt: text('created_at').default(sql`CURRENT_TIMESTAMP`),
});

export type ChangeLogRow = typeof changeLog.$inferSelect;
export type ChangeLogInsert = typeof changeLog.$inferInsert;
