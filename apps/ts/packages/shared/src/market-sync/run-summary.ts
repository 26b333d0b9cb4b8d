/**
 * Market Sync - run summary handed to notifiers
 */

import type { BackendOutcome, ConflictAuditReason, SyncReport } from '../replication/sync-report';
import type { Market } from '../types/warehouse';
import { getErrorMessage } from '../utils/error-helpers';
import type { UpdateResult } from './update-orchestrator';

export type RunStatus = 'ok' | 'partial' | 'failed';

export interface RunCounts {
  /** Active symbols considered by the run */
  total: number;
  /** Fetched successfully, changed or not */
  fetched: number;
  /** Fetched with rows inserted or updated */
  updated: number;
  unchanged: number;
  /** Not fetched: still fresh, or cancelled before their turn */
  skipped: number;
  failed: number;
  rowsInserted: number;
  rowsUpdated: number;
}

export interface FailedSymbol {
  symbolId: string;
  reason: string;
}

export interface BackendSummary {
  backend: string;
  location: string;
  outcome: BackendOutcome;
  attempts: number;
  error: string | null;
  audit: ConflictAuditReason | null;
}

export interface RunSummary {
  /** Null for a sync-only run */
  market: Market | null;
  status: RunStatus;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  counts: RunCounts;
  failedSymbols: FailedSymbol[];
  changeSetSize: number;
  backends: BackendSummary[];
  syncSkipped: boolean;
  cancelled: boolean;
  fatalError: string | null;
}

export interface RunSummaryInput {
  market: Market | null;
  startedAt: Date;
  finishedAt: Date;
  update: UpdateResult | null;
  sync: SyncReport | null;
  syncSkipped?: boolean;
  fatalError?: unknown;
}

const EMPTY_COUNTS: RunCounts = {
  total: 0,
  fetched: 0,
  updated: 0,
  unchanged: 0,
  skipped: 0,
  failed: 0,
  rowsInserted: 0,
  rowsUpdated: 0,
};

export function buildRunSummary(input: RunSummaryInput): RunSummary {
  const counts = { ...EMPTY_COUNTS };
  const failedSymbols: FailedSymbol[] = [];

  for (const outcome of input.update?.symbols ?? []) {
    counts.total++;
    counts.rowsInserted += outcome.rowsInserted;
    counts.rowsUpdated += outcome.rowsUpdated;
    switch (outcome.status) {
      case 'updated':
        counts.fetched++;
        counts.updated++;
        break;
      case 'unchanged':
        counts.fetched++;
        counts.unchanged++;
        break;
      case 'fresh':
      case 'cancelled':
        counts.skipped++;
        break;
      case 'failed':
        counts.failed++;
        failedSymbols.push({ symbolId: outcome.symbolId, reason: outcome.reason ?? 'unknown error' });
        break;
    }
  }

  const backends: BackendSummary[] = (input.sync?.backends ?? []).map((report) => ({
    backend: report.backend,
    location: report.location,
    outcome: report.outcome,
    attempts: report.attempts,
    error: report.error?.message ?? null,
    audit: report.audit?.reason ?? null,
  }));

  const cancelled = (input.update?.cancelled ?? false) || (input.sync?.cancelled ?? false);
  const fatalError = input.fatalError === undefined ? null : getErrorMessage(input.fatalError);

  return {
    market: input.market,
    status: runStatus(fatalError, counts, backends, cancelled),
    startedAt: input.startedAt,
    finishedAt: input.finishedAt,
    durationMs: input.finishedAt.getTime() - input.startedAt.getTime(),
    counts,
    failedSymbols,
    changeSetSize: input.update?.changeSet.entries.length ?? 0,
    backends,
    syncSkipped: input.syncSkipped ?? false,
    cancelled,
    fatalError,
  };
}

function runStatus(
  fatalError: string | null,
  counts: RunCounts,
  backends: readonly BackendSummary[],
  cancelled: boolean
): RunStatus {
  if (fatalError !== null) return 'failed';
  if (cancelled || counts.failed > 0 || backends.some((backend) => backend.outcome !== 'SUCCEEDED')) {
    return 'partial';
  }
  return 'ok';
}

/**
 * Share of fetched symbols among those that were attempted, null when nothing was attempted
 */
export function successRate(counts: RunCounts): number | null {
  const attempted = counts.fetched + counts.failed;
  return attempted === 0 ? null : counts.fetched / attempted;
}
