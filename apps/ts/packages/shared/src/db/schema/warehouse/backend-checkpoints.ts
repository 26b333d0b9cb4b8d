/**
 * Backend Checkpoints Schema
 *
 * Last confirmed remote state per backend. Written only after the backend
 * acknowledged a write (or proved it already holds the same content).
 */

import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const backendCheckpoints = sqliteTable('backend_checkpoints', {
  backend: text('backend').primaryKey(),
  revision: text('revision').notNull(),
  contentDigest: text('content_digest'),
  lastChangeId: integer('last_change_id').notNull().default(0),
  syncedAt: text('synced_at').notNull(),
});

export type BackendCheckpointRow = typeof backendCheckpoints.$inferSelect;
export type BackendCheckpointInsert = typeof backendCheckpoints.$inferInsert;
