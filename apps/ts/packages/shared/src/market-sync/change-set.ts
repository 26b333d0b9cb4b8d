/**
 * Market Sync - change-set
 * Immutable record of the rows one update run changed, consumed once by the
 * sync reconciler.
 */

import type { ChangeLogEntry } from '../db/drizzle-warehouse-database';
import type { Market } from '../types/warehouse';

export interface ChangeSet {
  readonly market: Market;
  readonly createdAt: Date;
  readonly entries: readonly Readonly<ChangeLogEntry>[];
}

export function createChangeSet(market: Market, entries: readonly ChangeLogEntry[], createdAt = new Date()): ChangeSet {
  const frozen = [...entries].sort((a, b) => a.id - b.id).map((entry) => Object.freeze({ ...entry }));
  return Object.freeze({
    market,
    createdAt: new Date(createdAt.getTime()),
    entries: Object.freeze(frozen),
  });
}

export function changedSymbols(changeSet: ChangeSet): string[] {
  return [...new Set(changeSet.entries.map((entry) => entry.symbolId))];
}
