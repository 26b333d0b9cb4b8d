/**
 * Market Sync - Update Orchestrator
 * Refreshes the symbol list, fetches stale symbols with bounded concurrency
 * and writes each result in its own transaction.
 */

import type { TradingCalendar } from '../calendar/market-calendar';
import { BatchExecutor, OperationCancelledError, RetryExhaustedError } from '../clients/base/BatchExecutor';
import type { UpdateConfig } from '../config';
import { normalizeSymbolId } from '../db/columns/symbol-id';
import type { ChangeLogEntry, DrizzleWarehouseDatabase, SymbolReconciliation } from '../db/drizzle-warehouse-database';
import { lastUpdateKey } from '../db/drizzle-warehouse-database';
import { FetchFailure, type FetchFailureKind, StoreWriteFailure, UpstreamUnavailableError } from '../errors';
import type { DateRange, Market, PriceBar, SymbolRecord } from '../types/warehouse';
import { addDays, eachDay, zonedDateString } from '../utils/date-helpers';
import { getErrorMessage, toError } from '../utils/error-helpers';
import { logger as defaultLogger } from '../utils/logger';
import type { ILogger } from '../utils/logger-interface';
import { type ChangeSet, createChangeSet } from './change-set';
import type { PriceFetcher, SymbolSource } from './fetcher';
import { StalenessPolicy } from './staleness-policy';

/**
 * Progress callback for update runs
 */
export type UpdateProgressCallback = (stage: string, current: number, total: number, message: string) => void;

export type SymbolUpdateStatus = 'updated' | 'unchanged' | 'fresh' | 'failed' | 'cancelled';

export interface SymbolUpdateOutcome {
  symbolId: string;
  status: SymbolUpdateStatus;
  /** Staleness reason for fresh symbols, failure message for failed ones */
  reason?: string;
  failureKind?: FetchFailureKind | 'store_write';
  range?: DateRange;
  rowsInserted: number;
  rowsUpdated: number;
  attempts: number;
}

export interface UpdateResult {
  market: Market;
  startedAt: Date;
  finishedAt: Date;
  changeSet: ChangeSet;
  symbols: SymbolUpdateOutcome[];
  /** Null when the symbol list could not be refreshed and the stored list was used */
  reconciliation: SymbolReconciliation | null;
  cancelled: boolean;
}

export interface UpdateOptions {
  signal?: AbortSignal;
  /** Restrict the run to these symbol ids */
  symbols?: readonly string[];
  /** Fetch every selected symbol regardless of staleness */
  force?: boolean;
  onProgress?: UpdateProgressCallback;
}

export interface UpdateOrchestratorDeps {
  database: DrizzleWarehouseDatabase;
  fetcher: PriceFetcher;
  symbolSource: SymbolSource;
  calendar: TradingCalendar;
  config: UpdateConfig;
  policy?: StalenessPolicy;
  logger?: ILogger;
  clock?: () => Date;
}

/** Relative close difference above price rounding noise */
const BASIS_TOLERANCE = 1e-6;

interface PlannedFetch {
  symbol: SymbolRecord;
  range: DateRange;
}

export class UpdateOrchestrator {
  private readonly database: DrizzleWarehouseDatabase;
  private readonly fetcher: PriceFetcher;
  private readonly symbolSource: SymbolSource;
  private readonly calendar: TradingCalendar;
  private readonly config: UpdateConfig;
  private readonly policy: StalenessPolicy;
  private readonly logger: ILogger;
  private readonly clock: () => Date;
  private readonly retrier: BatchExecutor;
  private readonly pool = new BatchExecutor({ maxRetries: 0 });

  constructor(deps: UpdateOrchestratorDeps) {
    this.database = deps.database;
    this.fetcher = deps.fetcher;
    this.symbolSource = deps.symbolSource;
    this.calendar = deps.calendar;
    this.config = deps.config;
    this.policy = deps.policy ?? new StalenessPolicy(deps.calendar);
    this.logger = (deps.logger ?? defaultLogger).child({ component: 'update-orchestrator' });
    this.clock = deps.clock ?? (() => new Date());
    this.retrier = new BatchExecutor({
      maxRetries: deps.config.maxRetries,
      retryDelayMs: deps.config.retryDelayMs,
      maxRetryDelayMs: deps.config.maxRetryDelayMs,
      isRetryable: (error) => !(error instanceof FetchFailure) || error.isRetryable(),
      onRetry: (error, attempt, delayMs) =>
        this.logger.warn(`Attempt ${attempt} failed, retrying in ${Math.round(delayMs)}ms`, {
          error: error.message,
        }),
    });
  }

  /**
   * Update one market
   *
   * @throws UpstreamUnavailableError when the provider is unreachable for the whole market
   */
  async runUpdate(market: Market, options: UpdateOptions = {}): Promise<UpdateResult> {
    const { signal, onProgress } = options;
    const startedAt = this.clock();
    const log = this.logger.child({ market });

    onProgress?.('symbols', 0, 1, `Refreshing ${market} symbol list...`);
    const reconciliation = await this.refreshSymbols(market, log, signal);
    onProgress?.('symbols', 1, 1, 'Symbol list ready');

    const selected = this.selectSymbols(market, options.symbols);
    const now = this.clock();
    const today = zonedDateString(now, this.calendar.timeZone(market));

    const outcomes = new Map<string, SymbolUpdateOutcome>();
    const planned: PlannedFetch[] = [];
    for (const symbol of selected) {
      const state = this.database.getFetchState(symbol.symbolId);
      const decision = this.policy.evaluate(market, now, state.lastFetchedAt);
      if (!decision.fetch && !options.force) {
        outcomes.set(symbol.symbolId, emptyOutcome(symbol.symbolId, 'fresh', decision.reason));
        continue;
      }
      planned.push({ symbol, range: this.computeFetchRange(symbol.symbolId, market, today, state.lastDate) });
    }

    log.info(`${planned.length} of ${selected.length} symbol(s) stale`);

    const changes: ChangeLogEntry[] = [];
    const settled = await this.pool.executeAll(
      planned.map((plan) => () => this.updateSymbol(plan, market, signal, changes)),
      {
        concurrency: this.config.concurrency,
        signal,
        onProgress: (completed, total) => onProgress?.('fetch', completed, total, `Fetched ${completed}/${total}`),
      }
    );

    settled.forEach((result, index) => {
      const plan = planned[index];
      if (!plan) return;
      const id = plan.symbol.symbolId;
      if (result.status === 'fulfilled') {
        outcomes.set(id, result.value);
      } else if (result.status === 'skipped') {
        outcomes.set(id, { ...emptyOutcome(id, 'cancelled'), range: plan.range });
      } else {
        outcomes.set(id, {
          ...emptyOutcome(id, 'failed', result.error.message),
          range: plan.range,
          attempts: result.attempts,
        });
      }
    });

    const ordered = selected.flatMap((symbol) => {
      const outcome = outcomes.get(symbol.symbolId);
      return outcome ? [outcome] : [];
    });
    this.assertUpstreamReachable(market, ordered);

    const finishedAt = this.clock();
    const cancelled = signal?.aborted ?? false;
    if (!cancelled) {
      this.database.setMetadata(lastUpdateKey(market), finishedAt.toISOString());
    }

    const changeSet = createChangeSet(market, changes, finishedAt);
    log.info(`Update finished: ${changeSet.entries.length} symbol(s) changed`, {
      failed: ordered.filter((o) => o.status === 'failed').length,
      cancelled,
    });

    return { market, startedAt, finishedAt, changeSet, symbols: ordered, reconciliation, cancelled };
  }

  /**
   * Fetch range for a stale symbol. It starts at the earliest missing trading
   * day inside the lookback window; without a gap it starts at the latest
   * settled bar before today, which is read again to check the price basis.
   * Missing days before the first stored bar of a symbol listed inside the
   * window are not gaps.
   */
  computeFetchRange(symbolId: string, market: Market, today: string, lastDate: string | null): DateRange {
    if (!lastDate) {
      return { from: this.config.historyStartDate, to: today };
    }

    const windowStart = maxDate(this.config.historyStartDate, addDays(today, -this.config.gapLookbackDays));
    const stored = windowStart <= lastDate ? this.database.getStoredDates(symbolId, windowStart, lastDate) : [];
    const scanFrom = this.database.hasSeriesBefore(symbolId, windowStart) ? windowStart : stored[0];

    if (scanFrom) {
      const present = new Set(stored);
      const missing = eachDay(scanFrom, lastDate).find(
        (date) => !present.has(date) && this.calendar.isTradingDay(market, date)
      );
      if (missing) return { from: minDate(missing, today), to: today };
    }

    const anchor = lastDate < today ? lastDate : stored.filter((date) => date < today).at(-1);
    return { from: minDate(anchor ?? today, today), to: today };
  }

  private async refreshSymbols(
    market: Market,
    log: ILogger,
    signal?: AbortSignal
  ): Promise<SymbolReconciliation | null> {
    try {
      const listings = await this.retrier.execute(() => this.symbolSource.listSymbols(market), signal);
      const reconciliation = this.database.reconcileSymbols(market, listings);
      log.info('Symbol list reconciled', {
        added: reconciliation.added.length,
        reactivated: reconciliation.reactivated.length,
        deactivated: reconciliation.deactivated.length,
      });
      return reconciliation;
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      const cause = error instanceof RetryExhaustedError ? error.lastError : toError(error);

      if (this.database.getSymbols(market).length === 0) {
        throw new UpstreamUnavailableError(market, [`symbol list: ${cause.message}`], cause);
      }
      log.warn('Symbol list refresh failed, continuing with stored list', { error: cause.message });
      return null;
    }
  }

  private selectSymbols(market: Market, only?: readonly string[]): SymbolRecord[] {
    const active = this.database.getSymbols(market, { activeOnly: true });
    if (!only) return active;
    const wanted = new Set(only.map(normalizeSymbolId));
    return active.filter((symbol) => wanted.has(symbol.symbolId));
  }

  /**
   * Fetch with retry, then write in one transaction. Failures settle as an
   * outcome so other symbols proceed.
   */
  private async updateSymbol(
    plan: PlannedFetch,
    market: Market,
    signal: AbortSignal | undefined,
    changes: ChangeLogEntry[]
  ): Promise<SymbolUpdateOutcome> {
    const { symbol, range } = plan;
    const log = this.logger.child({ market, symbolId: symbol.symbolId });
    let attempts = 0;

    const fetchRange = (target: DateRange) =>
      this.retrier.execute(() => {
        attempts++;
        return this.fetcher.fetch(symbol.symbolId, market, target, signal);
      }, signal);

    let fetched = range;
    try {
      let bars = await fetchRange(range);
      if (this.basisChanged(symbol.symbolId, bars, range)) {
        fetched = { from: this.config.historyStartDate, to: range.to };
        log.info('Settled prices changed since the last fetch, re-fetching history', { from: fetched.from });
        bars = await fetchRange(fetched);
      }

      const written = this.database.writeSeries(symbol.symbolId, bars, this.clock());
      if (written.change) {
        changes.push(written.change);
      }

      log.debug(`Stored ${bars.length} bar(s)`, {
        from: fetched.from,
        to: fetched.to,
        inserted: written.inserted,
        updated: written.updated,
      });

      return {
        symbolId: symbol.symbolId,
        status: written.change ? 'updated' : 'unchanged',
        range: fetched,
        rowsInserted: written.inserted,
        rowsUpdated: written.updated,
        attempts,
      };
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        return { ...emptyOutcome(symbol.symbolId, 'cancelled'), range: fetched, attempts };
      }

      const cause = error instanceof RetryExhaustedError ? error.lastError : toError(error);
      const failureKind = classifyFailure(cause);
      log.warn(`Update failed: ${getErrorMessage(cause)}`, { failureKind, attempts });

      return { ...emptyOutcome(symbol.symbolId, 'failed', cause.message), failureKind, range: fetched, attempts };
    }
  }

  /**
   * Adjusted prices are relative to the latest split or dividend. A settled
   * bar whose close differs from the stored one means every older stored row
   * is on a stale basis.
   */
  private basisChanged(symbolId: string, bars: readonly PriceBar[], range: DateRange): boolean {
    if (range.from <= this.config.historyStartDate) return false;

    const settled = bars.filter((bar) => bar.date < range.to);
    if (settled.length === 0) return false;

    const previous = this.database.getSeries(symbolId, { from: range.from, to: addDays(range.to, -1) });
    const stored = new Map(previous.map((bar) => [bar.date, bar.close]));
    return settled.some((bar) => {
      const close = stored.get(bar.date);
      return close !== undefined && Math.abs(close - bar.close) > BASIS_TOLERANCE * Math.abs(close);
    });
  }

  /**
   * Every attempted fetch failing with a retryable failure means the provider
   * itself is down. A single stale symbol among fresh ones is not enough to
   * tell an outage from a symbol failure.
   */
  private assertUpstreamReachable(market: Market, outcomes: readonly SymbolUpdateOutcome[]): void {
    const attempted = outcomes.filter((o) => o.status !== 'fresh' && o.status !== 'cancelled');
    if (attempted.length === 0) return;
    if (attempted.length === 1 && outcomes.length > 1) return;

    const unreachable = attempted.every(
      (o) => o.status === 'failed' && (o.failureKind === 'transient' || o.failureKind === 'rate_limited')
    );
    if (unreachable) {
      throw new UpstreamUnavailableError(
        market,
        attempted.map((o) => `${o.symbolId}: ${o.reason ?? 'unknown error'}`)
      );
    }
  }
}

function emptyOutcome(symbolId: string, status: SymbolUpdateStatus, reason?: string): SymbolUpdateOutcome {
  return { symbolId, status, reason, rowsInserted: 0, rowsUpdated: 0, attempts: 0 };
}

function classifyFailure(error: Error): FetchFailureKind | 'store_write' {
  if (error instanceof FetchFailure) return error.kind;
  if (error instanceof StoreWriteFailure) return 'store_write';
  return 'transient';
}

function maxDate(a: string, b: string): string {
  return a > b ? a : b;
}

function minDate(a: string, b: string): string {
  return a < b ? a : b;
}
