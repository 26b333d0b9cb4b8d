/**
 * Key-value storage for schema version and run bookkeeping
 */

import { sql } from 'drizzle-orm';
import { sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const syncMetadata = sqliteTable('sync_metadata', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
  updatedAt: text('updated_at').default(sql`CURRENT_TIMESTAMP`),
});

export type SyncMetadataRow = typeof syncMetadata.$inferSelect;
export type SyncMetadataInsert = typeof syncMetadata.$inferInsert;
