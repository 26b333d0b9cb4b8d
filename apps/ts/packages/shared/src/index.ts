/**
 * Stock Warehouse Shared Package - Main Entry Point
 *
 * This module provides a curated public API.
 * For specialized functionality, use subpath imports:
 * - @stock-warehouse/shared/db
 * - @stock-warehouse/shared/market-sync
 * - @stock-warehouse/shared/replication
 * - @stock-warehouse/shared/notifications
 */

// ===== CALENDAR EXPORTS =====
export {
  type HolidayTable,
  HolidayTableSchema,
  loadHolidayTable,
  MarketCalendar,
  SESSION_HOURS,
  type SessionBounds,
  type SessionHours,
  type TradingCalendar,
} from './calendar/market-calendar';
// ===== CLIENT EXPORTS =====
export { BaseHttpClient, type BaseHttpClientOptions, type HttpRequest, RateLimitQueue } from './clients/base/BaseHttpClient';
export {
  BatchExecutor,
  type BatchExecutorConfig,
  OperationCancelledError,
  RetryExhaustedError,
  type SettledOperation,
} from './clients/base/BatchExecutor';
export { HttpApiError } from './clients/base/errors';
export { type ChartResult, toPriceBars, YahooChartClient, type YahooChartClientOptions } from './clients/prices/YahooChartClient';
export { GitHubContentsClient, type GitHubContentsClientOptions } from './clients/repository/GitHubContentsClient';
export { GoogleDriveClient, type GoogleDriveClientOptions } from './clients/storage/GoogleDriveClient';
// ===== CONFIGURATION EXPORTS =====
export type {
  AppConfig,
  DatabaseConfig,
  DataFilesConfig,
  NotificationConfig,
  ObjectStorageConfig,
  RepositoryConfig,
  SyncConfig,
  UpdateConfig,
} from './config';
export { DEFAULT_CONFIG, getConfig, loadConfig, resetConfig, setConfig } from './config';
// ===== DATABASE EXPORTS =====
export {
  type BackendCheckpoint,
  type ChangeLogEntry,
  DrizzleWarehouseDatabase,
  lastUpdateKey,
  METADATA_KEYS,
  normalizeSymbolId,
  type WarehouseStatus,
} from './db';
// ===== ERROR EXPORTS =====
export * from './errors';
// ===== MARKET SYNC EXPORTS =====
export * from './market-sync';
// ===== NOTIFICATION EXPORTS =====
export {
  type BackendAlert,
  CompositeNotifier,
  createNotifier,
  NotificationError,
  type Notifier,
  renderAlert,
  renderSummary,
  ResendEmailNotifier,
  TelegramNotifier,
} from './notifications';
// ===== REPLICATION EXPORTS =====
export {
  type BackendOutcome,
  type BackendSyncReport,
  createBackends,
  ObjectStorageBackend,
  type RemoteBackend,
  RepositoryBackend,
  type Revision,
  SyncReconciler,
  type SyncReport,
} from './replication';
// ===== TYPE EXPORTS =====
export * from './types/warehouse';
// ===== UTILITY EXPORTS =====
export { getErrorMessage, toError } from './utils/error-helpers';
export { createLogger, logger } from './utils/logger';
export type { ILogger, LogContext, LogLevel } from './utils/logger-interface';
export { TimeoutError, withTimeout } from './utils/timeout-utils';
