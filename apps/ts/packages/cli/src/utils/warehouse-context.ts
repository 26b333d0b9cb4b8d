/**
 * Warehouse Context
 * Composition root: the only place that reads the configuration singleton
 */

import { mkdirSync } from 'node:fs';
import * as path from 'node:path';
import {
  type AppConfig,
  createBackends,
  createLogger,
  createNotifier,
  DrizzleWarehouseDatabase,
  getConfig,
  type ILogger,
  JsonFileSymbolSource,
  type LogLevel,
  MarketCalendar,
  type Notifier,
  type PriceFetcher,
  type RemoteBackend,
  RunLock,
  SyncReconciler,
  UpdateOrchestrator,
  WarehouseRunner,
  YahooChartClient,
} from '@stock-warehouse/shared';

const LOG_LEVELS: Record<AppConfig['logLevel'], LogLevel> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARN',
  error: 'ERROR',
};

export interface WarehouseContextOptions {
  config?: AppConfig;
  debug?: boolean;
  /** Overrides for collaborators that reach the network */
  fetcher?: PriceFetcher;
  backends?: RemoteBackend[];
  notifier?: Notifier;
  clock?: () => Date;
}

export interface WarehouseContext {
  config: AppConfig;
  logger: ILogger;
  database: DrizzleWarehouseDatabase;
  backends: RemoteBackend[];
  runner: WarehouseRunner;
  close(): void;
}

export function resolveLogLevel(config: AppConfig, debug: boolean): LogLevel {
  if (debug) return 'DEBUG';
  if (config.isTest) return 'SILENT';
  return LOG_LEVELS[config.logLevel];
}

function contextLogger(config: AppConfig, debug: boolean): ILogger {
  return createLogger(resolveLogLevel(config, debug), { app: 'stock-warehouse' });
}

function openStore(config: AppConfig, logger: ILogger): DrizzleWarehouseDatabase {
  mkdirSync(path.dirname(path.resolve(config.database.path)), { recursive: true });
  return new DrizzleWarehouseDatabase(config.database.path, { logger });
}

/**
 * Open the store alone, for commands that build no collaborators
 */
export function openDatabase(options: { config?: AppConfig; debug?: boolean } = {}): {
  config: AppConfig;
  database: DrizzleWarehouseDatabase;
} {
  const config = options.config ?? getConfig();
  return { config, database: openStore(config, contextLogger(config, options.debug ?? false)) };
}

/**
 * Build the runner and everything it depends on
 *
 * @throws ConfigError when credentials are set only in part
 */
export function createWarehouseContext(options: WarehouseContextOptions = {}): WarehouseContext {
  const config = options.config ?? getConfig();
  const logger = contextLogger(config, options.debug ?? false);
  const database = openStore(config, logger);
  const clock = options.clock;

  try {
    const calendar = MarketCalendar.fromFile(config.dataFiles.holidaysPath);
    const fetcher =
      options.fetcher ??
      new YahooChartClient({
        timeoutMs: config.update.requestTimeoutMs,
        requestsPerMinute: config.update.requestsPerMinute,
        logger,
      });
    const backends = options.backends ?? createBackends(config, logger);
    const notifier = options.notifier ?? createNotifier(config.notifications, logger);

    const orchestrator = new UpdateOrchestrator({
      database,
      fetcher,
      symbolSource: new JsonFileSymbolSource(config.dataFiles.symbolsPath),
      calendar,
      config: config.update,
      logger,
      clock,
    });
    const reconciler = new SyncReconciler({ database, config: config.sync, alerts: notifier, logger, clock });
    const runner = new WarehouseRunner({
      orchestrator,
      reconciler,
      backends,
      lock: new RunLock(config.database.lockPath, { logger, clock }),
      notifier,
      logger,
      clock,
    });

    return { config, logger, database, backends, runner, close: () => database.close() };
  } catch (error) {
    database.close();
    throw error;
  }
}
