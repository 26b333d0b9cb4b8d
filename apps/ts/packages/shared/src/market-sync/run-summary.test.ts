import { describe, expect, it } from 'vitest';
import { UpstreamUnavailableError } from '../errors';
import type { BackendSyncReport, SyncReport } from '../replication/sync-report';
import { createChangeSet } from './change-set';
import { buildRunSummary, successRate } from './run-summary';
import type { SymbolUpdateOutcome, UpdateResult } from './update-orchestrator';

const STARTED = new Date('2025-03-03T08:00:00Z');
const FINISHED = new Date('2025-03-03T08:00:42Z');

function outcome(
  symbolId: string,
  status: SymbolUpdateOutcome['status'],
  extra: Partial<SymbolUpdateOutcome> = {}
): SymbolUpdateOutcome {
  return { symbolId, status, rowsInserted: 0, rowsUpdated: 0, attempts: 1, ...extra };
}

function updateResult(symbols: SymbolUpdateOutcome[], cancelled = false): UpdateResult {
  return {
    market: 'TW',
    startedAt: STARTED,
    finishedAt: FINISHED,
    changeSet: createChangeSet(
      'TW',
      [{ id: 1, symbolId: '2330.TW', fromDate: '2025-02-28', toDate: '2025-03-03', operation: 'insert' }],
      STARTED
    ),
    symbols,
    reconciliation: null,
    cancelled,
  };
}

function syncReport(outcomes: Array<['object-storage' | 'repository', 'SUCCEEDED' | 'DEGRADED' | 'FAILED']>): SyncReport {
  return {
    startedAt: STARTED,
    finishedAt: FINISHED,
    contentDigest: 'sha256:abc',
    prunedEntries: 0,
    cancelled: false,
    backends: outcomes.map(([backend, outcome]): BackendSyncReport => ({
      backend,
      kind: backend === 'repository' ? 'repository' : 'object_storage',
      location: `memory://${backend}`,
      outcome,
      attempts: 1,
      wrote: outcome === 'SUCCEEDED',
      checkpoint: null,
      error: outcome === 'SUCCEEDED' ? null : { kind: 'quota_exceeded', message: 'Storage quota exceeded' },
      audit: null,
      pendingEntries: 1,
      symbols: {},
    })),
  };
}

describe('buildRunSummary', () => {
  it('counts symbol outcomes and rows', () => {
    const summary = buildRunSummary({
      market: 'TW',
      startedAt: STARTED,
      finishedAt: FINISHED,
      update: updateResult([
        outcome('2330.TW', 'updated', { rowsInserted: 2 }),
        outcome('2317.TW', 'unchanged'),
        outcome('2454.TW', 'fresh', { attempts: 0 }),
        outcome('2303.TW', 'failed', { reason: 'HTTP 503', failureKind: 'transient' }),
      ]),
      sync: syncReport([
        ['object-storage', 'SUCCEEDED'],
        ['repository', 'SUCCEEDED'],
      ]),
    });

    expect(summary.counts).toEqual({
      total: 4,
      fetched: 2,
      updated: 1,
      unchanged: 1,
      skipped: 1,
      failed: 1,
      rowsInserted: 2,
      rowsUpdated: 0,
    });
    expect(summary.failedSymbols).toEqual([{ symbolId: '2303.TW', reason: 'HTTP 503' }]);
    expect(summary.changeSetSize).toBe(1);
    expect(summary.durationMs).toBe(42000);
    expect(summary.status).toBe('partial');
  });

  it('is ok when every symbol and backend succeeded', () => {
    const summary = buildRunSummary({
      market: 'TW',
      startedAt: STARTED,
      finishedAt: FINISHED,
      update: updateResult([outcome('2330.TW', 'updated', { rowsInserted: 2 })]),
      sync: syncReport([
        ['object-storage', 'SUCCEEDED'],
        ['repository', 'SUCCEEDED'],
      ]),
    });

    expect(summary.status).toBe('ok');
  });

  it('is partial when a backend degraded', () => {
    const summary = buildRunSummary({
      market: 'TW',
      startedAt: STARTED,
      finishedAt: FINISHED,
      update: updateResult([outcome('2330.TW', 'updated')]),
      sync: syncReport([
        ['object-storage', 'DEGRADED'],
        ['repository', 'SUCCEEDED'],
      ]),
    });

    expect(summary.status).toBe('partial');
    expect(summary.backends[0]).toEqual({
      backend: 'object-storage',
      location: 'memory://object-storage',
      outcome: 'DEGRADED',
      attempts: 1,
      error: 'Storage quota exceeded',
      audit: null,
    });
  });

  it('is failed with the message of a fatal error', () => {
    const summary = buildRunSummary({
      market: 'US',
      startedAt: STARTED,
      finishedAt: FINISHED,
      update: null,
      sync: null,
      fatalError: new UpstreamUnavailableError('US', ['AAPL: HTTP 503']),
    });

    expect(summary.status).toBe('failed');
    expect(summary.fatalError).toBe('Upstream unavailable for market US: 1 request(s) failed');
    expect(summary.counts.total).toBe(0);
  });

  it('marks cancelled runs as partial', () => {
    const summary = buildRunSummary({
      market: 'TW',
      startedAt: STARTED,
      finishedAt: FINISHED,
      update: updateResult([outcome('2330.TW', 'cancelled', { attempts: 0 })], true),
      sync: null,
      syncSkipped: true,
    });

    expect(summary.cancelled).toBe(true);
    expect(summary.status).toBe('partial');
    expect(summary.counts.skipped).toBe(1);
  });
});

describe('successRate', () => {
  it('relates fetched symbols to attempted ones', () => {
    expect(
      successRate({ total: 5, fetched: 3, updated: 3, unchanged: 0, skipped: 1, failed: 1, rowsInserted: 0, rowsUpdated: 0 })
    ).toBe(0.75);
  });

  it('is null when nothing was attempted', () => {
    expect(
      successRate({ total: 2, fetched: 0, updated: 0, unchanged: 0, skipped: 2, failed: 0, rowsInserted: 0, rowsUpdated: 0 })
    ).toBeNull();
  });
});
