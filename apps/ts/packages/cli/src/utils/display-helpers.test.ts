import { partialSummary } from '@stock-warehouse/shared/test-utils/summaries';
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import { displayList, displayRunSummary, displayStatus } from './display-helpers.js';

const ANSI = new RegExp(`${String.fromCharCode(27)}\\[[0-9;]*m`, 'g');

describe('display helpers', () => {
  let logSpy: MockInstance<typeof console.log>;

  function printed(): string[] {
    return logSpy.mock.calls.map((call) => String(call[0] ?? '').replace(ANSI, ''));
  }

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('truncates long lists', () => {
    displayList(['a', 'b', 'c'], { maxItems: 2 });

    expect(printed()).toEqual(['  • a', '  • b', '  ... and 1 more']);
  });

  it('prints counts, backends and failures of a run', () => {
    displayRunSummary(partialSummary);

    const lines = printed();
    expect(lines).toContain('TW Update Summary');
    expect(lines).toContain('Status: ⚠ Partial');
    expect(lines).toContain('  Skipped (fresh): 1');
    expect(lines).toContain('  repository DEGRADED after 1 attempt: HTTP 401: Bad credentials');
    expect(lines).toContain('  • 2303.TW: HTTP 503');
    expect(lines).toContain('\nDuration: 42.0s');
  });

  it('prints the store status', () => {
    displayStatus(
      'data/stock_warehouse.db',
      {
        markets: [{ market: 'TW', total: 3, active: 2 }],
        priceRows: 120,
        minDate: '2025-01-02',
        maxDate: '2025-03-03',
        pendingChanges: 0,
        checkpoints: [
          {
            backend: 'repository',
            revision: 'sha-1',
            contentDigest: null,
            lastChangeId: 7,
            syncedAt: new Date('2025-03-03T08:05:00Z'),
          },
        ],
      },
      null
    );

    const lines = printed();
    expect(lines).toContain('Last sync: never');
    expect(lines).toContain('Date range: 2025-01-02 → 2025-03-03');
    expect(lines).toContain('  TW: 2 active / 3 total');
    expect(lines).toContain('  repository: sha-1 at 2025-03-03T08:05:00.000Z (change 7)');
  });
});
