/**
 * Drizzle ORM Database Module
 *
 * Warehouse store with symbol id normalization, change log and backend checkpoints.
 */

// ===== Column Types =====
export { isValidSymbolId, normalizeSymbolId, symbolId } from './columns/symbol-id';

// ===== Database Implementation =====
export type {
  BackendCheckpoint,
  ChangeLogEntry,
  SymbolReconciliation,
  WarehouseDatabaseOptions,
  WarehouseSnapshot,
  WarehouseStatus,
  WriteSeriesResult,
} from './drizzle-warehouse-database';
export { DrizzleWarehouseDatabase, lastUpdateKey, METADATA_KEYS } from './drizzle-warehouse-database';

// ===== Schema Definitions =====
export * from './schema/warehouse-schema';

// ===== Transactions =====
export { executeTransaction } from './transaction-helpers';
