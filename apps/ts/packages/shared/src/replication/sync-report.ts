/**
 * Replication - sync report types
 */

import type { BackendCheckpoint } from '../db/drizzle-warehouse-database';
import type { SyncFailureKind } from '../errors';
import type { BackendKind, Revision } from './backends/types';

export type BackendOutcome = 'SUCCEEDED' | 'DEGRADED' | 'FAILED';

/**
 * Per-backend state within one sync run. Terminal states have no outgoing transition.
 */
export type BackendState = 'PENDING' | 'ATTEMPTING' | BackendOutcome;

export type SymbolSyncStatus = 'synced' | 'pending';

export type ConflictAuditReason =
  /** Remote head differs from the recorded checkpoint */
  | 'remote_advanced'
  /** A checkpoint exists but the remote file is gone */
  | 'remote_missing'
  /** A remote file exists but no checkpoint was ever recorded */
  | 'untracked_backup';

/**
 * Snapshot read of a remote state that diverged from the local bookkeeping.
 * The local store wins; the record is kept for the operator.
 */
export interface ConflictAudit {
  reason: ConflictAuditReason;
  /** Revision the checkpoint expected, null without checkpoint */
  expectedRevision: string | null;
  observed: Revision | null;
  auditedAt: Date;
}

export interface BackendSyncError {
  kind: SyncFailureKind | 'cancelled';
  message: string;
}

export interface BackendSyncReport {
  backend: string;
  kind: BackendKind;
  location: string;
  outcome: BackendOutcome;
  attempts: number;
  /** True when a write was confirmed in this run, false when skipped or failed */
  wrote: boolean;
  /** Checkpoint after the run (unchanged unless SUCCEEDED) */
  checkpoint: BackendCheckpoint | null;
  error: BackendSyncError | null;
  audit: ConflictAudit | null;
  /** Pending change-log entries this backend had at the start of the run */
  pendingEntries: number;
  symbols: Record<string, SymbolSyncStatus>;
}

export interface SyncReport {
  startedAt: Date;
  finishedAt: Date;
  /** Digest of the local snapshot, null when no backend was configured */
  contentDigest: string | null;
  backends: BackendSyncReport[];
  prunedEntries: number;
  cancelled: boolean;
}

export function backendReport(report: SyncReport, backend: string): BackendSyncReport | undefined {
  return report.backends.find((entry) => entry.backend === backend);
}

export function allSucceeded(report: SyncReport): boolean {
  return report.backends.every((entry) => entry.outcome === 'SUCCEEDED');
}

/**
 * Sync status of a symbol across backends: synced only once every backend holds it
 */
export function symbolSyncStatus(report: SyncReport, symbolId: string): SymbolSyncStatus {
  return report.backends.every((entry) => entry.symbols[symbolId] !== 'pending') ? 'synced' : 'pending';
}
