/**
 * Warehouse Database Drizzle Schema
 *
 * - symbols: instrument master with soft-delete flag
 * - price_series: daily OHLCV rows
 * - symbol_fetch_state: last fetch time and last stored date per symbol
 * - backend_checkpoints: last confirmed remote revision per backend
 * - change_log: change-set entries awaiting replication
 * - sync_metadata: key-value storage (schema version, run bookkeeping)
 */

/**
 * Schema version for the warehouse database; a different major refuses to open
 */
export const WAREHOUSE_SCHEMA_VERSION = '1.0.0';

/**
 * Tables that describe replication state of this copy only; they are removed
 * from uploaded snapshots
 */
export const REPLICA_LOCAL_TABLES = ['backend_checkpoints', 'change_log'] as const;

export * from './warehouse';
