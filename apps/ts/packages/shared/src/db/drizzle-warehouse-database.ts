/**
 * Drizzle-based Warehouse Database
 *
 * Local source of truth for symbols, daily price series, fetch bookkeeping
 * and per-backend replication checkpoints.
 */

import { createHash } from 'node:crypto';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { and, asc, eq, gt, gte, lt, lte, sql } from 'drizzle-orm';
import { type BetterSQLite3Database, drizzle } from 'drizzle-orm/better-sqlite3';
import { isWarehouseError, StoreWriteFailure } from '../errors';
import type {
  ChangeSetEntry,
  DateRange,
  Market,
  PriceBar,
  SymbolFetchState,
  SymbolListing,
  SymbolRecord,
} from '../types/warehouse';
import { getErrorMessage, toError } from '../utils/error-helpers';
import { logger as defaultLogger } from '../utils/logger';
import type { ILogger } from '../utils/logger-interface';
import { normalizeSymbolId } from './columns/symbol-id';
import {
  backendCheckpoints,
  changeLog,
  priceSeries,
  REPLICA_LOCAL_TABLES,
  symbolFetchState,
  symbols,
  syncMetadata,
  WAREHOUSE_SCHEMA_VERSION,
} from './schema/warehouse-schema';
import { executeTransaction } from './transaction-helpers';

/**
 * Metadata keys for run bookkeeping
 */
export const METADATA_KEYS = {
  SCHEMA_VERSION: 'schema_version',
  LAST_SYNC_AT: 'last_sync_at',
} as const;

export function lastUpdateKey(market: Market): string {
  return `last_update_at:${market}`;
}

export interface BackendCheckpoint {
  backend: string;
  revision: string;
  contentDigest: string | null;
  lastChangeId: number;
  syncedAt: Date;
}

export interface ChangeLogEntry extends ChangeSetEntry {
  id: number;
}

export interface WriteSeriesResult {
  inserted: number;
  updated: number;
  unchanged: number;
  /** Logged change, null when every row was already stored unchanged */
  change: ChangeLogEntry | null;
}

export interface SymbolReconciliation {
  added: string[];
  reactivated: string[];
  deactivated: string[];
}

export interface WarehouseSnapshot {
  bytes: Buffer;
  contentDigest: string;
}

export interface WarehouseStatus {
  markets: Array<{ market: Market; total: number; active: number }>;
  priceRows: number;
  minDate: string | null;
  maxDate: string | null;
  pendingChanges: number;
  checkpoints: BackendCheckpoint[];
}

export interface WarehouseDatabaseOptions {
  logger?: ILogger;
}

function majorVersion(version: string): string {
  return version.split('.')[0] ?? version;
}

function sameBar(stored: PriceBar, incoming: PriceBar): boolean {
  return (
    stored.open === incoming.open &&
    stored.high === incoming.high &&
    stored.low === incoming.low &&
    stored.close === incoming.close &&
    stored.volume === incoming.volume
  );
}

export class DrizzleWarehouseDatabase {
  private sqlite: Database.Database;
  private db: BetterSQLite3Database;
  private logger: ILogger;

  constructor(
    readonly dbPath: string,
    options: WarehouseDatabaseOptions = {}
  ) {
    this.logger = (options.logger ?? defaultLogger).child({ component: 'warehouse-db' });
    this.sqlite = new Database(dbPath);
    this.db = drizzle(this.sqlite);

    try {
      this.initializeSchema();
    } catch (error) {
      this.sqlite.close();
      throw error;
    }
  }

  /**
   * Create tables, refusing to touch a database written by an incompatible schema
   */
  private initializeSchema(): void {
    this.sqlite.pragma('journal_mode = WAL');
    this.sqlite.pragma('foreign_keys = ON');

    this.sqlite.exec(`
      CREATE TABLE IF NOT EXISTS sync_metadata (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
      );
    `);

    const storedVersion = this.getMetadata(METADATA_KEYS.SCHEMA_VERSION);
    if (storedVersion && majorVersion(storedVersion) !== majorVersion(WAREHOUSE_SCHEMA_VERSION)) {
      throw new StoreWriteFailure(
        'schema_mismatch',
        `Warehouse ${this.dbPath} has schema ${storedVersion}, expected ${WAREHOUSE_SCHEMA_VERSION}`
      );
    }

    this.sqlite.exec(`
      CREATE TABLE IF NOT EXISTS symbols (
        symbol_id TEXT PRIMARY KEY,
        market TEXT NOT NULL,
        name TEXT NOT NULL,
        active INTEGER NOT NULL DEFAULT 1,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE IF NOT EXISTS price_series (
        symbol_id TEXT NOT NULL,
        date TEXT NOT NULL,
        open REAL NOT NULL,
        high REAL NOT NULL,
        low REAL NOT NULL,
        close REAL NOT NULL,
        volume INTEGER NOT NULL,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        PRIMARY KEY (symbol_id, date),
        FOREIGN KEY (symbol_id) REFERENCES symbols(symbol_id)
      );

      CREATE TABLE IF NOT EXISTS symbol_fetch_state (
        symbol_id TEXT PRIMARY KEY,
        last_fetched_at TEXT,
        last_date TEXT,
        FOREIGN KEY (symbol_id) REFERENCES symbols(symbol_id)
      );

      CREATE TABLE IF NOT EXISTS backend_checkpoints (
        backend TEXT PRIMARY KEY,
        revision TEXT NOT NULL,
        content_digest TEXT,
        last_change_id INTEGER NOT NULL DEFAULT 0,
        synced_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS change_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        symbol_id TEXT NOT NULL,
        from_date TEXT NOT NULL,
        to_date TEXT NOT NULL,
        operation TEXT NOT NULL CHECK (operation IN ('insert', 'update')),
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX IF NOT EXISTS idx_symbols_market ON symbols(market);
      CREATE INDEX IF NOT EXISTS idx_price_series_date ON price_series(date);
    `);

    if (storedVersion !== WAREHOUSE_SCHEMA_VERSION) {
      this.setMetadata(METADATA_KEYS.SCHEMA_VERSION, WAREHOUSE_SCHEMA_VERSION);
    }
  }

  // ===== METADATA MANAGEMENT =====

  getMetadata(key: string): string | null {
    const result = this.db.select().from(syncMetadata).where(eq(syncMetadata.key, key)).get();
    return result?.value ?? null;
  }

  setMetadata(key: string, value: string): void {
    this.db
      .insert(syncMetadata)
      .values({ key, value, updatedAt: sql`CURRENT_TIMESTAMP` })
      .onConflictDoUpdate({
        target: syncMetadata.key,
        set: { value, updatedAt: sql`CURRENT_TIMESTAMP` },
      })
      .run();
  }

  // ===== SYMBOLS =====

  getSymbols(market: Market, options: { activeOnly?: boolean } = {}): SymbolRecord[] {
    const condition = options.activeOnly
      ? and(eq(symbols.market, market), eq(symbols.active, true))
      : eq(symbols.market, market);

    return this.db
      .select({ symbolId: symbols.symbolId, market: symbols.market, name: symbols.name, active: symbols.active })
      .from(symbols)
      .where(condition)
      .orderBy(asc(symbols.symbolId))
      .all();
  }

  /**
   * Apply a fresh symbol listing: insert new symbols, reactivate returning
   * ones and flag missing ones inactive. History is never deleted.
   */
  reconcileSymbols(market: Market, listings: readonly SymbolListing[]): SymbolReconciliation {
    const existing = new Map(this.getSymbols(market).map((record) => [record.symbolId, record]));
    const listed = new Map<string, SymbolListing>();
    for (const listing of listings) {
      listed.set(normalizeSymbolId(listing.symbolId), listing);
    }

    const result: SymbolReconciliation = { added: [], reactivated: [], deactivated: [] };

    executeTransaction(
      this.sqlite,
      () => {
        for (const [id, listing] of listed) {
          const current = existing.get(id);
          if (!current) {
            this.db
              .insert(symbols)
              .values({ symbolId: id, market, name: listing.name, active: true })
              .onConflictDoUpdate({
                target: symbols.symbolId,
                set: { market, name: listing.name, active: true, updatedAt: sql`CURRENT_TIMESTAMP` },
              })
              .run();
            result.added.push(id);
            continue;
          }

          if (!current.active) {
            result.reactivated.push(id);
          }
          if (!current.active || current.name !== listing.name) {
            this.db
              .update(symbols)
              .set({ name: listing.name, active: true, updatedAt: sql`CURRENT_TIMESTAMP` })
              .where(eq(symbols.symbolId, id))
              .run();
          }
        }

        for (const [id, current] of existing) {
          if (current.active && !listed.has(id)) {
            this.db
              .update(symbols)
              .set({ active: false, updatedAt: sql`CURRENT_TIMESTAMP` })
              .where(eq(symbols.symbolId, id))
              .run();
            result.deactivated.push(id);
          }
        }
      },
      { logger: this.logger, operationName: `reconcileSymbols ${market}` }
    );

    return result;
  }

  // ===== PRICE SERIES =====

  getFetchState(symbolId: string): SymbolFetchState {
    const id = normalizeSymbolId(symbolId);
    const row = this.db.select().from(symbolFetchState).where(eq(symbolFetchState.symbolId, id)).get();
    return {
      symbolId: id,
      lastFetchedAt: row?.lastFetchedAt ? new Date(row.lastFetchedAt) : null,
      lastDate: row?.lastDate ?? null,
    };
  }

  /**
   * Stored series dates within an inclusive range, ascending
   */
  getStoredDates(symbolId: string, from: string, to: string): string[] {
    return this.db
      .select({ date: priceSeries.date })
      .from(priceSeries)
      .where(
        and(
          eq(priceSeries.symbolId, normalizeSymbolId(symbolId)),
          gte(priceSeries.date, from),
          lte(priceSeries.date, to)
        )
      )
      .orderBy(asc(priceSeries.date))
      .all()
      .map((row) => row.date);
  }

  /**
   * Whether the symbol has any series row dated before `date`
   */
  hasSeriesBefore(symbolId: string, date: string): boolean {
    const row = this.db
      .select({ date: priceSeries.date })
      .from(priceSeries)
      .where(and(eq(priceSeries.symbolId, normalizeSymbolId(symbolId)), lt(priceSeries.date, date)))
      .limit(1)
      .get();
    return row !== undefined;
  }

  /**
   * Stored bars, ascending; `range` limits them to an inclusive date range
   */
  getSeries(symbolId: string, range?: DateRange): PriceBar[] {
    return this.db
      .select({
        date: priceSeries.date,
        open: priceSeries.open,
        high: priceSeries.high,
        low: priceSeries.low,
        close: priceSeries.close,
        volume: priceSeries.volume,
      })
      .from(priceSeries)
      .where(
        and(
          eq(priceSeries.symbolId, normalizeSymbolId(symbolId)),
          range ? gte(priceSeries.date, range.from) : undefined,
          range ? lte(priceSeries.date, range.to) : undefined
        )
      )
      .orderBy(asc(priceSeries.date))
      .all();
  }

  /**
   * Write one symbol's fetch result atomically: series rows, fetch state and
   * (when rows changed) a change-log entry
   *
   * @throws StoreWriteFailure when the transaction cannot be committed
   */
  writeSeries(symbolId: string, bars: readonly PriceBar[], fetchedAt: Date): WriteSeriesResult {
    const id = normalizeSymbolId(symbolId);

    try {
      return executeTransaction(
        this.sqlite,
        () => {
          let inserted = 0;
          let updated = 0;
          let unchanged = 0;
          const changedDates: string[] = [];

          const sorted = [...bars].sort((a, b) => a.date.localeCompare(b.date));
          for (const bar of sorted) {
            const stored = this.db
              .select()
              .from(priceSeries)
              .where(and(eq(priceSeries.symbolId, id), eq(priceSeries.date, bar.date)))
              .get();

            if (!stored) {
              this.db
                .insert(priceSeries)
                .values({ symbolId: id, ...bar })
                .run();
              inserted++;
              changedDates.push(bar.date);
            } else if (sameBar(stored, bar)) {
              unchanged++;
            } else {
              this.db
                .update(priceSeries)
                .set({ open: bar.open, high: bar.high, low: bar.low, close: bar.close, volume: bar.volume })
                .where(and(eq(priceSeries.symbolId, id), eq(priceSeries.date, bar.date)))
                .run();
              updated++;
              changedDates.push(bar.date);
            }
          }

          const latest = this.db
            .select({ max: sql<string | null>`MAX(${priceSeries.date})` })
            .from(priceSeries)
            .where(eq(priceSeries.symbolId, id))
            .get();
          const state = { lastFetchedAt: fetchedAt.toISOString(), lastDate: latest?.max ?? null };

          this.db
            .insert(symbolFetchState)
            .values({ symbolId: id, ...state })
            .onConflictDoUpdate({ target: symbolFetchState.symbolId, set: state })
            .run();

          const fromDate = changedDates[0];
          const toDate = changedDates.at(-1);
          let change: ChangeLogEntry | null = null;
          if (fromDate && toDate) {
            const entry: ChangeSetEntry = {
              symbolId: id,
              fromDate,
              toDate,
              operation: inserted > 0 ? 'insert' : 'update',
            };
            const logged = this.db.insert(changeLog).values(entry).run();
            change = { id: Number(logged.lastInsertRowid), ...entry };
          }

          return { inserted, updated, unchanged, change };
        },
        { logger: this.logger, operationName: `writeSeries ${id}` }
      );
    } catch (error) {
      if (isWarehouseError(error)) throw error;
      throw new StoreWriteFailure(
        'transient',
        `Failed to write series for ${id}: ${getErrorMessage(error)}`,
        toError(error)
      );
    }
  }

  // ===== CHANGE LOG & CHECKPOINTS =====

  getCheckpoint(backend: string): BackendCheckpoint | null {
    const row = this.db.select().from(backendCheckpoints).where(eq(backendCheckpoints.backend, backend)).get();
    if (!row) return null;
    return { ...row, syncedAt: new Date(row.syncedAt) };
  }

  getCheckpoints(): BackendCheckpoint[] {
    return this.db
      .select()
      .from(backendCheckpoints)
      .orderBy(asc(backendCheckpoints.backend))
      .all()
      .map((row) => ({ ...row, syncedAt: new Date(row.syncedAt) }));
  }

  /**
   * Record a confirmed remote state. The acknowledged change id never moves backwards.
   */
  advanceCheckpoint(checkpoint: BackendCheckpoint): void {
    const previous = this.getCheckpoint(checkpoint.backend);
    const values = {
      revision: checkpoint.revision,
      contentDigest: checkpoint.contentDigest,
      lastChangeId: Math.max(previous?.lastChangeId ?? 0, checkpoint.lastChangeId),
      syncedAt: checkpoint.syncedAt.toISOString(),
    };

    this.db
      .insert(backendCheckpoints)
      .values({ backend: checkpoint.backend, ...values })
      .onConflictDoUpdate({ target: backendCheckpoints.backend, set: values })
      .run();
  }

  /**
   * Change-log entries the backend has not acknowledged yet, oldest first
   */
  pendingChanges(backend: string): ChangeLogEntry[] {
    const acknowledged = this.getCheckpoint(backend)?.lastChangeId ?? 0;
    return this.db
      .select({
        id: changeLog.id,
        symbolId: changeLog.symbolId,
        fromDate: changeLog.fromDate,
        toDate: changeLog.toDate,
        operation: changeLog.operation,
      })
      .from(changeLog)
      .where(gt(changeLog.id, acknowledged))
      .orderBy(asc(changeLog.id))
      .all();
  }

  latestChangeId(): number {
    const result = this.db
      .select({ max: sql<number | null>`MAX(${changeLog.id})` })
      .from(changeLog)
      .get();
    return result?.max ?? 0;
  }

  /**
   * Delete change-log entries acknowledged by every listed backend
   *
   * @returns number of deleted entries
   */
  pruneChangeLog(backends: readonly string[]): number {
    if (backends.length === 0) return 0;

    let acknowledgedByAll = Number.POSITIVE_INFINITY;
    for (const backend of backends) {
      acknowledgedByAll = Math.min(acknowledgedByAll, this.getCheckpoint(backend)?.lastChangeId ?? 0);
    }
    if (acknowledgedByAll <= 0) return 0;

    return this.db.delete(changeLog).where(lte(changeLog.id, acknowledgedByAll)).run().changes;
  }

  // ===== SNAPSHOTS =====

  /**
   * Digest of replicated content (symbols and series), independent of file
   * layout and of bookkeeping columns
   */
  contentDigest(): string {
    const hash = createHash('sha256');
    const sections: Array<[string, string]> = [
      ['symbols', 'SELECT symbol_id, market, name, active FROM symbols ORDER BY symbol_id'],
      [
        'price_series',
        'SELECT symbol_id, date, open, high, low, close, volume FROM price_series ORDER BY symbol_id, date',
      ],
    ];

    for (const [name, query] of sections) {
      hash.update(`#${name}\n`);
      for (const row of this.sqlite.prepare(query).raw().iterate()) {
        hash.update(`${JSON.stringify(row)}\n`);
      }
    }

    return `sha256:${hash.digest('hex')}`;
  }

  /**
   * Self-contained copy of the warehouse without replica-local tables
   */
  exportSnapshot(): WarehouseSnapshot {
    const dir = mkdtempSync(join(tmpdir(), 'warehouse-snapshot-'));
    const file = join(dir, 'snapshot.db');

    try {
      this.sqlite.prepare('VACUUM INTO ?').run(file);

      const copy = new Database(file);
      try {
        copy.pragma('journal_mode = DELETE');
        for (const table of REPLICA_LOCAL_TABLES) {
          copy.exec(`DROP TABLE IF EXISTS ${table}`);
        }
        copy.exec('VACUUM');
      } finally {
        copy.close();
      }

      return { bytes: readFileSync(file), contentDigest: this.contentDigest() };
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  }

  // ===== STATUS =====

  getStatus(): WarehouseStatus {
    const markets = this.db
      .select({
        market: symbols.market,
        total: sql<number>`COUNT(*)`,
        active: sql<number>`SUM(CASE WHEN ${symbols.active} = 1 THEN 1 ELSE 0 END)`,
      })
      .from(symbols)
      .groupBy(symbols.market)
      .orderBy(asc(symbols.market))
      .all();

    const range = this.db
      .select({
        count: sql<number>`COUNT(*)`,
        min: sql<string | null>`MIN(${priceSeries.date})`,
        max: sql<string | null>`MAX(${priceSeries.date})`,
      })
      .from(priceSeries)
      .get();

    const pending = this.db
      .select({ count: sql<number>`COUNT(*)` })
      .from(changeLog)
      .get();

    return {
      markets,
      priceRows: range?.count ?? 0,
      minDate: range?.min ?? null,
      maxDate: range?.max ?? null,
      pendingChanges: pending?.count ?? 0,
      checkpoints: this.getCheckpoints(),
    };
  }

  close(): void {
    this.sqlite.close();
  }
}
