/**
 * Market Sync - Warehouse Runner
 * One invocation: lock, update a market, replicate, report, unlock.
 */

import type { Notifier } from '../notifications/types';
import type { RemoteBackend } from '../replication/backends/types';
import type { SyncReconciler } from '../replication/sync-reconciler';
import type { SyncReport } from '../replication/sync-report';
import type { Market } from '../types/warehouse';
import { getErrorMessage } from '../utils/error-helpers';
import { logger as defaultLogger } from '../utils/logger';
import type { ILogger } from '../utils/logger-interface';
import type { RunLock } from './run-lock';
import { buildRunSummary, type RunSummary, type RunSummaryInput } from './run-summary';
import type { UpdateOptions, UpdateOrchestrator, UpdateResult } from './update-orchestrator';

export interface WarehouseRunnerDeps {
  orchestrator: UpdateOrchestrator;
  reconciler: SyncReconciler;
  backends: readonly RemoteBackend[];
  lock: RunLock;
  notifier?: Notifier;
  logger?: ILogger;
  clock?: () => Date;
}

export interface RunOptions extends UpdateOptions {
  /** Update the local store only */
  skipSync?: boolean;
}

export interface RunResult {
  summary: RunSummary;
  update: UpdateResult;
  sync: SyncReport | null;
}

export interface SyncPendingResult {
  summary: RunSummary;
  sync: SyncReport;
}

export class WarehouseRunner {
  private readonly orchestrator: UpdateOrchestrator;
  private readonly reconciler: SyncReconciler;
  private readonly backends: readonly RemoteBackend[];
  private readonly lock: RunLock;
  private readonly notifier: Notifier | undefined;
  private readonly logger: ILogger;
  private readonly clock: () => Date;

  constructor(deps: WarehouseRunnerDeps) {
    this.orchestrator = deps.orchestrator;
    this.reconciler = deps.reconciler;
    this.backends = deps.backends;
    this.lock = deps.lock;
    this.notifier = deps.notifier;
    this.logger = (deps.logger ?? defaultLogger).child({ component: 'warehouse-runner' });
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Update a market and replicate the result.
   * A run that ends on an error (an unreachable provider, a snapshot that
   * cannot be exported) is still reported before the error is rethrown.
   *
   * @throws RunConflictError when another run holds the lock
   */
  async run(market: Market, options: RunOptions = {}): Promise<RunResult> {
    return this.lock.withLock(async () => {
      const startedAt = this.clock();
      const log = this.logger.child({ market, correlationId: this.logger.createCorrelationId() });
      log.info(`Starting ${market} run`);

      let update: UpdateResult;
      try {
        update = await this.orchestrator.runUpdate(market, options);
      } catch (error) {
        log.error(`Update failed: ${getErrorMessage(error)}`);
        await this.reportFailure({ market, startedAt, update: null, syncSkipped: true }, error, log);
        throw error;
      }

      const skipSync = (options.skipSync ?? false) || this.backends.length === 0 || update.cancelled;
      if (skipSync) {
        log.info(this.backends.length === 0 ? 'No backend configured, sync skipped' : 'Sync skipped');
      }
      let sync: SyncReport | null = null;
      if (!skipSync) {
        try {
          sync = await this.reconciler.sync(update.changeSet, this.backends, options);
        } catch (error) {
          log.error(`Sync aborted: ${getErrorMessage(error)}`);
          await this.reportFailure({ market, startedAt, update }, error, log);
          throw error;
        }
      }

      const summary = buildRunSummary({
        market,
        startedAt,
        finishedAt: this.clock(),
        update,
        sync,
        syncSkipped: skipSync,
      });
      log.info(`Run finished: ${summary.status}`, {
        fetched: summary.counts.fetched,
        failed: summary.counts.failed,
        changes: summary.changeSetSize,
      });
      await this.report(summary, log);
      return { summary, update, sync };
    });
  }

  /**
   * Replicate change-log entries left by earlier runs, without fetching
   *
   * @throws RunConflictError when another run holds the lock
   */
  async syncPending(options: { signal?: AbortSignal } = {}): Promise<SyncPendingResult> {
    return this.lock.withLock(async () => {
      const startedAt = this.clock();
      let sync: SyncReport;
      try {
        sync = await this.reconciler.sync(null, this.backends, options);
      } catch (error) {
        this.logger.error(`Sync aborted: ${getErrorMessage(error)}`);
        await this.reportFailure({ market: null, startedAt, update: null }, error, this.logger);
        throw error;
      }
      const summary = buildRunSummary({ market: null, startedAt, finishedAt: this.clock(), update: null, sync });
      await this.report(summary, this.logger);
      return { summary, sync };
    });
  }

  private async reportFailure(
    input: Omit<RunSummaryInput, 'finishedAt' | 'sync' | 'fatalError'>,
    error: unknown,
    log: ILogger
  ): Promise<void> {
    await this.report(buildRunSummary({ ...input, finishedAt: this.clock(), sync: null, fatalError: error }), log);
  }

  private async report(summary: RunSummary, log: ILogger): Promise<void> {
    if (!this.notifier) return;
    try {
      await this.notifier.notify(summary);
    } catch (error) {
      log.warn(`Run report not delivered: ${getErrorMessage(error)}`);
    }
  }
}
