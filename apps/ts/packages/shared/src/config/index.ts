/**
 * Application configuration with environment variable support
 *
 * Only the composition root (the CLI) reads this singleton. Core components
 * receive the relevant sub-struct through their constructors.
 */

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError } from '../errors';

export interface DatabaseConfig {
  /** SQLite warehouse file */
  path: string;
  /** Advisory run lock file */
  lockPath: string;
}

export interface UpdateConfig {
  /** Parallel symbol fetches */
  concurrency: number;
  /** Retries after the first fetch attempt */
  maxRetries: number;
  retryDelayMs: number;
  maxRetryDelayMs: number;
  /** Start date for symbols that were never fetched */
  historyStartDate: string;
  /** How far back the gap check looks for missing trading days */
  gapLookbackDays: number;
  requestTimeoutMs: number;
  requestsPerMinute: number;
}

export interface SyncConfig {
  /** Total attempts per backend, including the first */
  maxAttempts: number;
  retryDelayMs: number;
  maxRetryDelayMs: number;
  attemptTimeoutMs: number;
  /** Remote file name of the uploaded snapshot */
  remotePath: string;
}

export interface ObjectStorageConfig {
  accessToken: string;
  folderId: string;
}

export interface RepositoryConfig {
  token: string;
  owner: string;
  repo: string;
  branch: string;
  /** Directory inside the repository that receives the snapshot */
  directory: string;
}

export interface NotificationConfig {
  telegram?: { botToken: string; chatId: string };
  email?: { apiKey: string; to: string; from: string };
}

export interface DataFilesConfig {
  symbolsPath: string;
  holidaysPath: string;
}

export interface AppConfig {
  database: DatabaseConfig;
  update: UpdateConfig;
  sync: SyncConfig;
  objectStorage: ObjectStorageConfig | null;
  repository: RepositoryConfig | null;
  notifications: NotificationConfig;
  dataFiles: DataFilesConfig;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  isTest: boolean;
}

type Env = Record<string, string | undefined>;

/**
 * Holidays shipped with the shared package
 */
export const DEFAULT_HOLIDAYS_PATH = fileURLToPath(new URL('../../data/holidays.json', import.meta.url));

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: AppConfig = {
  database: {
    path: 'stock_warehouse.db',
    lockPath: 'stock_warehouse.lock',
  },
  update: {
    concurrency: 3,
    maxRetries: 3,
    retryDelayMs: 2000,
    maxRetryDelayMs: 30000,
    historyStartDate: '2020-01-01',
    gapLookbackDays: 30,
    requestTimeoutMs: 25000,
    requestsPerMinute: 60,
  },
  sync: {
    maxAttempts: 5,
    retryDelayMs: 1000,
    maxRetryDelayMs: 30000,
    attemptTimeoutMs: 120000,
    remotePath: 'stock_warehouse.db',
  },
  objectStorage: null,
  repository: null,
  notifications: {},
  dataFiles: {
    symbolsPath: 'data/symbols.json',
    holidaysPath: DEFAULT_HOLIDAYS_PATH,
  },
  logLevel: 'info',
  isTest: false,
};

/**
 * Parse numeric environment variable with fallback
 */
function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Parse log level with validation
 */
function parseLogLevel(value: string | undefined): AppConfig['logLevel'] {
  switch (value?.toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'warn':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return 'info';
  }
}

/**
 * Object storage is configured only when both token and folder are present
 */
function parseObjectStorage(env: Env): ObjectStorageConfig | null {
  const accessToken = env.GDRIVE_ACCESS_TOKEN;
  const folderId = env.GDRIVE_FOLDER_ID;
  if (!accessToken && !folderId) return null;
  if (!accessToken || !folderId) {
    throw new ConfigError('GDRIVE_ACCESS_TOKEN and GDRIVE_FOLDER_ID must be set together');
  }
  return { accessToken, folderId };
}

/**
 * Repository backend needs a token and an "owner/repo" slug
 */
function parseRepository(env: Env): RepositoryConfig | null {
  const token = env.GITHUB_TOKEN;
  const slug = env.WAREHOUSE_REPOSITORY;
  if (!token && !slug) return null;
  if (!token || !slug) {
    throw new ConfigError('GITHUB_TOKEN and WAREHOUSE_REPOSITORY must be set together');
  }

  const [owner, repo, ...rest] = slug.split('/');
  if (!owner || !repo || rest.length > 0) {
    throw new ConfigError(`WAREHOUSE_REPOSITORY must look like "owner/repo", got "${slug}"`);
  }

  return {
    token,
    owner,
    repo,
    branch: env.WAREHOUSE_BRANCH || 'main',
    directory: env.WAREHOUSE_REPOSITORY_DIR || 'backups',
  };
}

function parseNotifications(env: Env): NotificationConfig {
  const notifications: NotificationConfig = {};

  if (env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID) {
    notifications.telegram = { botToken: env.TELEGRAM_BOT_TOKEN, chatId: env.TELEGRAM_CHAT_ID };
  }

  if (env.RESEND_API_KEY && env.REPORT_EMAIL_TO) {
    notifications.email = {
      apiKey: env.RESEND_API_KEY,
      to: env.REPORT_EMAIL_TO,
      from: env.REPORT_EMAIL_FROM || 'Stock Warehouse <onboarding@resend.dev>',
    };
  }

  return notifications;
}

/**
 * Load configuration from environment variables with defaults
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const dataDir = env.WAREHOUSE_DATA_DIR;
  const dbPath =
    env.WAREHOUSE_DB_PATH || (dataDir ? path.join(dataDir, 'stock_warehouse.db') : DEFAULT_CONFIG.database.path);

  return {
    database: {
      path: dbPath,
      lockPath: env.WAREHOUSE_LOCK_PATH || `${dbPath.replace(/\.db$/, '')}.lock`,
    },
    update: {
      concurrency: parseNumber(env.FETCH_CONCURRENCY, DEFAULT_CONFIG.update.concurrency),
      maxRetries: parseNumber(env.FETCH_MAX_RETRIES, DEFAULT_CONFIG.update.maxRetries),
      retryDelayMs: parseNumber(env.FETCH_RETRY_DELAY_MS, DEFAULT_CONFIG.update.retryDelayMs),
      maxRetryDelayMs: parseNumber(env.FETCH_MAX_RETRY_DELAY_MS, DEFAULT_CONFIG.update.maxRetryDelayMs),
      historyStartDate: env.HISTORY_START_DATE || DEFAULT_CONFIG.update.historyStartDate,
      gapLookbackDays: parseNumber(env.GAP_LOOKBACK_DAYS, DEFAULT_CONFIG.update.gapLookbackDays),
      requestTimeoutMs: parseNumber(env.FETCH_TIMEOUT_MS, DEFAULT_CONFIG.update.requestTimeoutMs),
      requestsPerMinute: parseNumber(env.FETCH_REQUESTS_PER_MINUTE, DEFAULT_CONFIG.update.requestsPerMinute),
    },
    sync: {
      maxAttempts: parseNumber(env.SYNC_MAX_ATTEMPTS, DEFAULT_CONFIG.sync.maxAttempts),
      retryDelayMs: parseNumber(env.SYNC_RETRY_DELAY_MS, DEFAULT_CONFIG.sync.retryDelayMs),
      maxRetryDelayMs: parseNumber(env.SYNC_MAX_RETRY_DELAY_MS, DEFAULT_CONFIG.sync.maxRetryDelayMs),
      attemptTimeoutMs: parseNumber(env.SYNC_ATTEMPT_TIMEOUT_MS, DEFAULT_CONFIG.sync.attemptTimeoutMs),
      remotePath: env.WAREHOUSE_REMOTE_NAME || DEFAULT_CONFIG.sync.remotePath,
    },
    objectStorage: parseObjectStorage(env),
    repository: parseRepository(env),
    notifications: parseNotifications(env),
    dataFiles: {
      symbolsPath:
        env.WAREHOUSE_SYMBOLS_PATH ||
        (dataDir ? path.join(dataDir, 'symbols.json') : DEFAULT_CONFIG.dataFiles.symbolsPath),
      holidaysPath: env.WAREHOUSE_HOLIDAYS_PATH || DEFAULT_CONFIG.dataFiles.holidaysPath,
    },
    logLevel: parseLogLevel(env.LOG_LEVEL),
    isTest: env.NODE_ENV === 'test',
  };
}

/**
 * Singleton configuration instance
 */
let configInstance: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (mainly for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

/**
 * Override specific configuration values (mainly for testing)
 */
export function setConfig(overrides: Partial<AppConfig>): void {
  configInstance = {
    ...getConfig(),
    ...overrides,
  };
}
