/**
 * Replication - Sync Reconciler
 * Pushes the warehouse snapshot to every backend independently and advances
 * a backend's checkpoint only after that backend confirmed the write.
 */

import { BatchExecutor, OperationCancelledError, RetryExhaustedError } from '../clients/base/BatchExecutor';
import type { SyncConfig } from '../config';
import type {
  BackendCheckpoint,
  DrizzleWarehouseDatabase,
  WarehouseSnapshot,
} from '../db/drizzle-warehouse-database';
import { METADATA_KEYS } from '../db/drizzle-warehouse-database';
import { SyncFailure } from '../errors';
import { type ChangeSet, changedSymbols } from '../market-sync/change-set';
import type { AlertSink } from '../notifications/types';
import { getErrorMessage, toError } from '../utils/error-helpers';
import { logger as defaultLogger } from '../utils/logger';
import type { ILogger } from '../utils/logger-interface';
import { withTimeout } from '../utils/timeout-utils';
import { toSyncFailure } from './backends/errors';
import type { RemoteBackend, Revision } from './backends/types';
import type {
  BackendOutcome,
  BackendState,
  BackendSyncError,
  BackendSyncReport,
  ConflictAudit,
  SymbolSyncStatus,
  SyncReport,
} from './sync-report';

export interface SyncReconcilerDeps {
  database: DrizzleWarehouseDatabase;
  config: SyncConfig;
  alerts?: AlertSink;
  logger?: ILogger;
  clock?: () => Date;
}

export interface SyncOptions {
  signal?: AbortSignal;
}

const TRANSITIONS: Record<BackendState, readonly BackendState[]> = {
  PENDING: ['ATTEMPTING'],
  ATTEMPTING: ['SUCCEEDED', 'DEGRADED', 'FAILED'],
  SUCCEEDED: [],
  DEGRADED: [],
  FAILED: [],
};

/**
 * State of one backend within a sync run
 */
export class BackendRun {
  private current: BackendState = 'PENDING';

  constructor(readonly backend: string) {}

  get state(): BackendState {
    return this.current;
  }

  transition(next: BackendState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid sync state transition for ${this.backend}: ${this.current} -> ${next}`);
    }
    this.current = next;
  }
}

interface AttemptResult {
  revision: Revision;
  wrote: boolean;
}

interface SyncContext {
  snapshot: WarehouseSnapshot;
  latestChangeId: number;
  changeSetSymbols: readonly string[];
  signal?: AbortSignal;
}

export class SyncReconciler {
  private readonly database: DrizzleWarehouseDatabase;
  private readonly config: SyncConfig;
  private readonly alerts: AlertSink | undefined;
  private readonly logger: ILogger;
  private readonly clock: () => Date;

  constructor(deps: SyncReconcilerDeps) {
    this.database = deps.database;
    this.config = deps.config;
    this.alerts = deps.alerts;
    this.logger = (deps.logger ?? defaultLogger).child({ component: 'sync-reconciler' });
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Replicate the store to every backend. Backend failures are reported, never thrown.
   *
   * @param changeSet - change-set of the run that triggered the sync, null to push
   *   whatever the change log still holds
   */
  async sync(
    changeSet: ChangeSet | null,
    backends: readonly RemoteBackend[],
    options: SyncOptions = {}
  ): Promise<SyncReport> {
    const startedAt = this.clock();
    if (backends.length === 0) {
      this.logger.info('No backend configured, skipping sync');
      return { startedAt, finishedAt: this.clock(), contentDigest: null, backends: [], prunedEntries: 0, cancelled: false };
    }

    const snapshot = this.database.exportSnapshot();
    const context: SyncContext = {
      snapshot,
      latestChangeId: this.database.latestChangeId(),
      changeSetSymbols: changeSet ? changedSymbols(changeSet) : [],
      signal: options.signal,
    };
    this.logger.info(`Syncing snapshot to ${backends.length} backend(s)`, {
      bytes: snapshot.bytes.byteLength,
      contentDigest: snapshot.contentDigest,
      latestChangeId: context.latestChangeId,
    });

    const reports = await Promise.all(backends.map((backend) => this.syncBackend(backend, context)));

    const prunedEntries = this.database.pruneChangeLog(backends.map((backend) => backend.name));
    if (prunedEntries > 0) {
      this.logger.debug(`Pruned ${prunedEntries} acknowledged change-log entries`);
    }

    const finishedAt = this.clock();
    if (reports.some((report) => report.outcome === 'SUCCEEDED')) {
      this.database.setMetadata(METADATA_KEYS.LAST_SYNC_AT, finishedAt.toISOString());
    }

    return {
      startedAt,
      finishedAt,
      contentDigest: snapshot.contentDigest,
      backends: reports,
      prunedEntries,
      cancelled: options.signal?.aborted ?? false,
    };
  }

  private async syncBackend(backend: RemoteBackend, context: SyncContext): Promise<BackendSyncReport> {
    const log = this.logger.child({ backend: backend.name });
    const run = new BackendRun(backend.name);
    const pending = this.database.pendingChanges(backend.name);
    const symbolIds = [...new Set([...context.changeSetSymbols, ...pending.map((entry) => entry.symbolId)])].sort();
    let audit: ConflictAudit | null = null;
    let attempts = 0;

    const executor = new BatchExecutor({
      maxRetries: Math.max(0, this.config.maxAttempts - 1),
      retryDelayMs: this.config.retryDelayMs,
      maxRetryDelayMs: this.config.maxRetryDelayMs,
      isRetryable: (error) => error instanceof SyncFailure && error.isRetryable(),
      onRetry: (error, attempt, delayMs) =>
        log.warn(`Attempt ${attempt} failed, retrying in ${Math.round(delayMs)}ms`, { error: error.message }),
    });

    const finish = (outcome: BackendOutcome, wrote: boolean, error: BackendSyncError | null): BackendSyncReport => {
      run.transition(outcome);
      const status: SymbolSyncStatus = outcome === 'SUCCEEDED' ? 'synced' : 'pending';
      return {
        backend: backend.name,
        kind: backend.kind,
        location: backend.location,
        outcome,
        attempts,
        wrote,
        checkpoint: this.database.getCheckpoint(backend.name),
        error,
        audit,
        pendingEntries: pending.length,
        symbols: Object.fromEntries(symbolIds.map((symbolId) => [symbolId, status])),
      };
    };

    run.transition('ATTEMPTING');
    try {
      const result = await executor.execute(async (attempt) => {
        attempts = attempt;
        const checkpoint = this.database.getCheckpoint(backend.name);
        const remote = await this.bounded(backend, 'head', (signal) => backend.head(signal), context.signal);

        const detected = detectConflict(checkpoint, remote, this.clock());
        if (detected) {
          audit = detected;
          log.warn(`Remote state diverged (${detected.reason}), local store wins`, {
            expected: detected.expectedRevision,
            observed: detected.observed,
          });
        }

        if (remote && remote.contentDigest === context.snapshot.contentDigest) {
          log.info('Remote already holds this snapshot, skipping write', { revision: remote.id });
          return { revision: remote, wrote: false };
        }

        const revision = await this.bounded(
          backend,
          'write',
          (signal) =>
            backend.write({
              bytes: context.snapshot.bytes,
              contentDigest: context.snapshot.contentDigest,
              expectedRevision: remote?.id ?? null,
              signal,
            }),
          context.signal
        );
        return { revision, wrote: true };
      }, context.signal);

      this.recordCheckpoint(backend.name, result, context);
      log.info(result.wrote ? `Wrote snapshot to ${backend.location}` : `${backend.location} is up to date`, {
        revision: result.revision.id,
        attempts,
      });
      return finish('SUCCEEDED', result.wrote, null);
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        log.warn('Sync cancelled');
        return finish('FAILED', false, { kind: 'cancelled', message: error.message });
      }

      const failure = toSyncFailure(error instanceof RetryExhaustedError ? error.lastError : error, backend.name);
      if (failure instanceof OperationCancelledError) {
        return finish('FAILED', false, { kind: 'cancelled', message: failure.message });
      }

      if (failure.kind === 'quota_exceeded' || failure.kind === 'unauthorized') {
        log.error(`Backend degraded: ${failure.message}`, { kind: failure.kind, location: backend.location });
        await this.escalate(backend, failure.kind, failure.message, log);
        return finish('DEGRADED', false, { kind: failure.kind, message: failure.message });
      }

      log.error(`Sync failed after ${attempts} attempt(s): ${failure.message}`, { kind: failure.kind });
      return finish('FAILED', false, { kind: failure.kind, message: failure.message });
    }
  }

  /**
   * Run one backend call under the attempt deadline
   */
  private async bounded<T>(
    backend: RemoteBackend,
    operation: string,
    call: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    try {
      return await withTimeout(call, {
        timeoutMs: this.config.attemptTimeoutMs,
        operationName: `${backend.name} ${operation}`,
        signal,
      });
    } catch (error) {
      throw toSyncFailure(error, backend.name);
    }
  }

  /**
   * Advance the checkpoint after a confirmed write (or a confirmed identical
   * remote). A rerun that changes nothing leaves the checkpoint untouched.
   */
  private recordCheckpoint(backend: string, result: AttemptResult, context: SyncContext): void {
    const previous = this.database.getCheckpoint(backend);
    const contentDigest = result.revision.contentDigest ?? context.snapshot.contentDigest;
    const unchanged =
      previous !== null &&
      previous.revision === result.revision.id &&
      previous.contentDigest === contentDigest &&
      previous.lastChangeId >= context.latestChangeId;
    if (unchanged) return;

    this.database.advanceCheckpoint({
      backend,
      revision: result.revision.id,
      contentDigest,
      lastChangeId: context.latestChangeId,
      syncedAt: this.clock(),
    });
  }

  private async escalate(
    backend: RemoteBackend,
    failure: 'quota_exceeded' | 'unauthorized',
    message: string,
    log: ILogger
  ): Promise<void> {
    if (!this.alerts) return;
    try {
      await this.alerts.escalate({
        backend: backend.name,
        kind: backend.kind,
        location: backend.location,
        failure,
        message,
        occurredAt: this.clock(),
      });
    } catch (error) {
      log.error(`Escalation failed: ${getErrorMessage(error)}`, { error: toError(error).name });
    }
  }
}

/**
 * Compare the recorded checkpoint with the observed remote head
 */
export function detectConflict(
  checkpoint: BackendCheckpoint | null,
  remote: Revision | null,
  now: Date
): ConflictAudit | null {
  if (checkpoint && !remote) {
    return { reason: 'remote_missing', expectedRevision: checkpoint.revision, observed: null, auditedAt: now };
  }
  if (checkpoint && remote && remote.id !== checkpoint.revision) {
    return { reason: 'remote_advanced', expectedRevision: checkpoint.revision, observed: remote, auditedAt: now };
  }
  if (!checkpoint && remote) {
    return { reason: 'untracked_backup', expectedRevision: null, observed: remote, auditedAt: now };
  }
  return null;
}
