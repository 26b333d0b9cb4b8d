import type { RunSummary } from '../market-sync/run-summary';

export const partialSummary: RunSummary = {
  market: 'TW',
  status: 'partial',
  startedAt: new Date('2025-03-03T08:00:00Z'),
  finishedAt: new Date('2025-03-03T08:00:42Z'),
  durationMs: 42000,
  counts: {
    total: 4,
    fetched: 2,
    updated: 1,
    unchanged: 1,
    skipped: 1,
    failed: 1,
    rowsInserted: 2,
    rowsUpdated: 0,
  },
  failedSymbols: [{ symbolId: '2303.TW', reason: 'HTTP 503' }],
  changeSetSize: 1,
  backends: [
    { backend: 'object-storage', location: 'gdrive://folder', outcome: 'SUCCEEDED', attempts: 1, error: null, audit: null },
    {
      backend: 'repository',
      location: 'github://acme/prices@main',
      outcome: 'DEGRADED',
      attempts: 1,
      error: 'HTTP 401: Bad credentials',
      audit: null,
    },
  ],
  syncSkipped: false,
  cancelled: false,
  fatalError: null,
};
