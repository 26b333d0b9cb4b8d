/**
 * Transaction Helpers
 * Common transaction patterns for warehouse database operations
 */

import type Database from 'better-sqlite3';
import type { ILogger } from '../utils/logger-interface';

export interface TransactionOptions {
  logger?: ILogger;
  operationName?: string;
}

/**
 * Run an operation inside an immediate transaction, logging failures at debug level
 */
export function executeTransaction<T>(sqlite: Database.Database, operation: () => T, options?: TransactionOptions): T {
  const { logger, operationName = 'operation' } = options ?? {};

  try {
    // BEGIN IMMEDIATE: the write lock is held before the operation runs
    return sqlite.transaction(operation).immediate();
  } catch (error) {
    logger?.debug(`${operationName} transaction rolled back`, {
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}
