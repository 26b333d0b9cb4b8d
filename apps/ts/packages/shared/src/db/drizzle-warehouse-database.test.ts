import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StoreWriteFailure } from '../errors';
import type { PriceBar } from '../types/warehouse';
import { DrizzleWarehouseDatabase, METADATA_KEYS } from './drizzle-warehouse-database';
import { WAREHOUSE_SCHEMA_VERSION } from './schema/warehouse-schema';

function cleanupDatabase(dbPath: string) {
  for (const suffix of ['', '-wal', '-shm']) {
    fs.rmSync(`${dbPath}${suffix}`, { force: true });
  }
}

function getTestDbPath(): string {
  return path.join(os.tmpdir(), `test-warehouse-${Date.now()}-${Math.random().toString(36).slice(2)}.db`);
}

function bar(date: string, close: number, volume = 1000): PriceBar {
  return { date, open: close - 1, high: close + 1, low: close - 2, close, volume };
}

describe('DrizzleWarehouseDatabase', () => {
  let dbPath: string;
  let db: DrizzleWarehouseDatabase | null = null;

  function openDb(): DrizzleWarehouseDatabase {
    db = new DrizzleWarehouseDatabase(dbPath);
    return db;
  }

  beforeEach(() => {
    dbPath = getTestDbPath();
    cleanupDatabase(dbPath);
  });

  afterEach(() => {
    db?.close();
    db = null;
    cleanupDatabase(dbPath);
  });

  describe('schema', () => {
    it('stores the schema version', () => {
      expect(openDb().getMetadata(METADATA_KEYS.SCHEMA_VERSION)).toBe(WAREHOUSE_SCHEMA_VERSION);
    });

    it('refuses a database written by another major version', () => {
      const raw = new Database(dbPath);
      raw.exec(`CREATE TABLE sync_metadata (key TEXT PRIMARY KEY, value TEXT NOT NULL, updated_at DATETIME);
        INSERT INTO sync_metadata (key, value) VALUES ('schema_version', '9.0.0');`);
      raw.close();

      let caught: unknown;
      try {
        new DrizzleWarehouseDatabase(dbPath);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(StoreWriteFailure);
      expect(caught instanceof StoreWriteFailure ? caught.kind : null).toBe('schema_mismatch');
    });
  });

  describe('reconcileSymbols', () => {
    it('adds, deactivates and reactivates without deleting', () => {
      const store = openDb();

      const first = store.reconcileSymbols('TW', [
        { symbolId: '2330.tw', name: 'TSMC' },
        { symbolId: '2317.TW', name: 'Hon Hai' },
      ]);
      expect(first).toEqual({ added: ['2330.TW', '2317.TW'], reactivated: [], deactivated: [] });

      const second = store.reconcileSymbols('TW', [{ symbolId: '2330.TW', name: 'TSMC' }]);
      expect(second).toEqual({ added: [], reactivated: [], deactivated: ['2317.TW'] });
      expect(store.getSymbols('TW')).toEqual([
        { symbolId: '2317.TW', market: 'TW', name: 'Hon Hai', active: false },
        { symbolId: '2330.TW', market: 'TW', name: 'TSMC', active: true },
      ]);
      expect(store.getSymbols('TW', { activeOnly: true }).map((s) => s.symbolId)).toEqual(['2330.TW']);

      const third = store.reconcileSymbols('TW', [
        { symbolId: '2330.TW', name: 'TSMC' },
        { symbolId: '2317.TW', name: 'Hon Hai Precision' },
      ]);
      expect(third).toEqual({ added: [], reactivated: ['2317.TW'], deactivated: [] });
      expect(store.getSymbols('TW', { activeOnly: true }).map((s) => s.name)).toEqual(['Hon Hai Precision', 'TSMC']);
    });

    it('keeps markets apart', () => {
      const store = openDb();
      store.reconcileSymbols('US', [{ symbolId: 'AAPL', name: 'Apple' }]);
      store.reconcileSymbols('TW', []);
      expect(store.getSymbols('US', { activeOnly: true })).toHaveLength(1);
    });
  });

  describe('writeSeries', () => {
    const fetchedAt = new Date('2025-03-03T06:00:00Z');

    it('inserts rows, records fetch state and logs the change', () => {
      const store = openDb();
      store.reconcileSymbols('TW', [{ symbolId: '2330.TW', name: 'TSMC' }]);

      const result = store.writeSeries('2330.TW', [bar('2025-03-03', 1010), bar('2025-02-27', 1000)], fetchedAt);

      expect(result.inserted).toBe(2);
      expect(result.change).toEqual({
        id: 1,
        symbolId: '2330.TW',
        fromDate: '2025-02-27',
        toDate: '2025-03-03',
        operation: 'insert',
      });
      expect(store.getFetchState('2330.TW')).toEqual({
        symbolId: '2330.TW',
        lastFetchedAt: fetchedAt,
        lastDate: '2025-03-03',
      });
      expect(store.getSeries('2330.TW').map((row) => row.date)).toEqual(['2025-02-27', '2025-03-03']);
    });

    it('logs nothing when rows are unchanged but still refreshes fetch time', () => {
      const store = openDb();
      store.reconcileSymbols('TW', [{ symbolId: '2330.TW', name: 'TSMC' }]);
      store.writeSeries('2330.TW', [bar('2025-03-03', 1010)], fetchedAt);

      const later = new Date('2025-03-04T06:00:00Z');
      const result = store.writeSeries('2330.TW', [bar('2025-03-03', 1010)], later);

      expect(result).toEqual({ inserted: 0, updated: 0, unchanged: 1, change: null });
      expect(store.getFetchState('2330.TW').lastFetchedAt).toEqual(later);
      expect(store.latestChangeId()).toBe(1);
    });

    it('marks corrected values as an update', () => {
      const store = openDb();
      store.reconcileSymbols('TW', [{ symbolId: '2330.TW', name: 'TSMC' }]);
      store.writeSeries('2330.TW', [bar('2025-03-03', 1010)], fetchedAt);

      const result = store.writeSeries('2330.TW', [bar('2025-03-03', 1015)], fetchedAt);
      expect(result.updated).toBe(1);
      expect(result.change?.operation).toBe('update');
      expect(store.getSeries('2330.TW')[0]?.close).toBe(1015);
    });

    it('rolls back the whole symbol when a row is rejected', () => {
      const store = openDb();

      expect(() => store.writeSeries('9999.TW', [bar('2025-03-03', 10)], fetchedAt)).toThrow(StoreWriteFailure);
      expect(store.getSeries('9999.TW')).toEqual([]);
      expect(store.latestChangeId()).toBe(0);
    });

    it('reports stored dates within a range', () => {
      const store = openDb();
      store.reconcileSymbols('US', [{ symbolId: 'AAPL', name: 'Apple' }]);
      store.writeSeries('AAPL', [bar('2025-03-03', 1), bar('2025-03-05', 2), bar('2025-03-10', 3)], fetchedAt);

      expect(store.getStoredDates('AAPL', '2025-03-04', '2025-03-10')).toEqual(['2025-03-05', '2025-03-10']);
    });

    it('limits the series to a range and tells whether older rows exist', () => {
      const store = openDb();
      store.reconcileSymbols('US', [{ symbolId: 'AAPL', name: 'Apple' }]);
      store.writeSeries('AAPL', [bar('2025-03-03', 1), bar('2025-03-05', 2), bar('2025-03-10', 3)], fetchedAt);

      expect(store.getSeries('aapl', { from: '2025-03-04', to: '2025-03-05' }).map((row) => row.close)).toEqual([2]);
      expect(store.hasSeriesBefore('AAPL', '2025-03-04')).toBe(true);
      expect(store.hasSeriesBefore('AAPL', '2025-03-03')).toBe(false);
    });
  });

  describe('checkpoints and change log', () => {
    function seeded(): DrizzleWarehouseDatabase {
      const store = openDb();
      store.reconcileSymbols('TW', [
        { symbolId: '2330.TW', name: 'TSMC' },
        { symbolId: '2317.TW', name: 'Hon Hai' },
      ]);
      const fetchedAt = new Date('2025-03-03T06:00:00Z');
      store.writeSeries('2330.TW', [bar('2025-03-03', 1010)], fetchedAt);
      store.writeSeries('2317.TW', [bar('2025-03-03', 150)], fetchedAt);
      return store;
    }

    it('lists entries beyond the acknowledged change id', () => {
      const store = seeded();
      expect(store.pendingChanges('repository').map((c) => c.id)).toEqual([1, 2]);

      store.advanceCheckpoint({
        backend: 'repository',
        revision: 'sha-1',
        contentDigest: 'sha256:abc',
        lastChangeId: 1,
        syncedAt: new Date('2025-03-03T07:00:00Z'),
      });
      expect(store.pendingChanges('repository').map((c) => c.symbolId)).toEqual(['2317.TW']);
    });

    it('never moves the acknowledged change id backwards', () => {
      const store = seeded();
      const syncedAt = new Date('2025-03-03T07:00:00Z');
      store.advanceCheckpoint({ backend: 'object-storage', revision: 'r2', contentDigest: null, lastChangeId: 2, syncedAt });
      store.advanceCheckpoint({ backend: 'object-storage', revision: 'r3', contentDigest: null, lastChangeId: 1, syncedAt });

      expect(store.getCheckpoint('object-storage')).toEqual({
        backend: 'object-storage',
        revision: 'r3',
        contentDigest: null,
        lastChangeId: 2,
        syncedAt,
      });
    });

    it('prunes only what every backend acknowledged', () => {
      const store = seeded();
      const syncedAt = new Date('2025-03-03T07:00:00Z');
      store.advanceCheckpoint({ backend: 'object-storage', revision: 'r1', contentDigest: null, lastChangeId: 2, syncedAt });

      expect(store.pruneChangeLog(['object-storage', 'repository'])).toBe(0);

      store.advanceCheckpoint({ backend: 'repository', revision: 'c1', contentDigest: null, lastChangeId: 1, syncedAt });
      expect(store.pruneChangeLog(['object-storage', 'repository'])).toBe(1);
      expect(store.pendingChanges('repository').map((c) => c.id)).toEqual([2]);
    });
  });

  describe('snapshots', () => {
    it('keeps the digest stable across bookkeeping-only writes', () => {
      const store = openDb();
      store.reconcileSymbols('TW', [{ symbolId: '2330.TW', name: 'TSMC' }]);
      store.writeSeries('2330.TW', [bar('2025-03-03', 1010)], new Date('2025-03-03T06:00:00Z'));
      const before = store.contentDigest();

      store.writeSeries('2330.TW', [bar('2025-03-03', 1010)], new Date('2025-03-04T06:00:00Z'));
      store.advanceCheckpoint({
        backend: 'repository',
        revision: 'c1',
        contentDigest: before,
        lastChangeId: 1,
        syncedAt: new Date(),
      });
      expect(store.contentDigest()).toBe(before);

      store.writeSeries('2330.TW', [bar('2025-03-04', 1020)], new Date('2025-03-04T06:00:00Z'));
      expect(store.contentDigest()).not.toBe(before);
    });

    it('exports a database without replica-local tables', () => {
      const store = openDb();
      store.reconcileSymbols('HK', [{ symbolId: '0700.HK', name: 'Tencent' }]);
      store.writeSeries('0700.HK', [bar('2025-03-03', 500)], new Date('2025-03-03T09:00:00Z'));

      const snapshot = store.exportSnapshot();
      expect(snapshot.contentDigest).toBe(store.contentDigest());

      const copyPath = `${dbPath}.copy`;
      fs.writeFileSync(copyPath, snapshot.bytes);
      const copy = new Database(copyPath);
      try {
        const tables = copy
          .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
          .pluck()
          .all();
        expect(tables).toEqual(['price_series', 'symbol_fetch_state', 'symbols', 'sync_metadata']);
        expect(copy.prepare('SELECT COUNT(*) FROM price_series').pluck().get()).toBe(1);
      } finally {
        copy.close();
        fs.rmSync(copyPath, { force: true });
      }
    });
  });

  describe('getStatus', () => {
    it('summarizes symbols, rows and pending changes', () => {
      const store = openDb();
      store.reconcileSymbols('TW', [
        { symbolId: '2330.TW', name: 'TSMC' },
        { symbolId: '2317.TW', name: 'Hon Hai' },
      ]);
      store.reconcileSymbols('TW', [{ symbolId: '2330.TW', name: 'TSMC' }]);
      store.writeSeries('2330.TW', [bar('2025-03-03', 1010), bar('2025-03-04', 1020)], new Date());

      expect(store.getStatus()).toEqual({
        markets: [{ market: 'TW', total: 2, active: 1 }],
        priceRows: 2,
        minDate: '2025-03-03',
        maxDate: '2025-03-04',
        pendingChanges: 1,
        checkpoints: [],
      });
    });
  });
});
