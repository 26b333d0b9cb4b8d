import { z } from 'zod';
import { SESSION_HOURS } from '../../calendar/market-calendar';
import { FetchFailure } from '../../errors';
import type { PriceFetcher } from '../../market-sync/fetcher';
import type { DateRange, Market, PriceBar } from '../../types/warehouse';
import { addDays, zonedDateString, zonedTimeToInstant } from '../../utils/date-helpers';
import { getErrorMessage, toError } from '../../utils/error-helpers';
import type { ILogger } from '../../utils/logger-interface';
import { BaseHttpClient } from '../base/BaseHttpClient';
import { OperationCancelledError } from '../base/BatchExecutor';
import { HttpApiError } from '../base/errors';

export const YAHOO_CHART_BASE_URL = 'https://query1.finance.yahoo.com';

const NullableSeries = z.array(z.number().nullable());

const ChartResultSchema = z.object({
  meta: z.object({ symbol: z.string() }).passthrough(),
  timestamp: z.array(z.number()).optional(),
  indicators: z.object({
    quote: z.array(
      z.object({
        open: NullableSeries.optional(),
        high: NullableSeries.optional(),
        low: NullableSeries.optional(),
        close: NullableSeries.optional(),
        volume: NullableSeries.optional(),
      })
    ),
    adjclose: z.array(z.object({ adjclose: NullableSeries.optional() })).optional(),
  }),
});

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z.array(ChartResultSchema).nullable(),
    error: z
      .object({
        code: z.string(),
        description: z.string().nullable().optional(),
      })
      .nullable(),
  }),
});

export type ChartResult = z.infer<typeof ChartResultSchema>;

export interface YahooChartClientOptions {
  baseURL?: string;
  timeoutMs?: number;
  requestsPerMinute?: number;
  logger?: ILogger;
}

const PRICE_DECIMALS = 6;

function roundPrice(value: number): number {
  const factor = 10 ** PRICE_DECIMALS;
  return Math.round(value * factor) / factor;
}

/**
 * Daily bars from the Yahoo Finance chart API (v8), split and dividend adjusted
 */
export class YahooChartClient extends BaseHttpClient implements PriceFetcher {
  constructor(options: YahooChartClientOptions = {}) {
    super({
      baseURL: options.baseURL ?? YAHOO_CHART_BASE_URL,
      timeoutMs: options.timeoutMs,
      requestsPerMinute: options.requestsPerMinute,
      logger: options.logger,
    });
  }

  protected override defaultHeaders(): Record<string, string> {
    return {
      Accept: 'application/json',
      'User-Agent': 'Mozilla/5.0 (compatible; stock-warehouse/0.1)',
    };
  }

  async fetch(symbolId: string, market: Market, range: DateRange, signal?: AbortSignal): Promise<PriceBar[]> {
    const { timeZone } = SESSION_HOURS[market];
    const period1 = Math.floor(zonedTimeToInstant(range.from, '00:00', timeZone).getTime() / 1000);
    const period2 = Math.floor(zonedTimeToInstant(addDays(range.to, 1), '00:00', timeZone).getTime() / 1000);

    let payload: z.infer<typeof ChartResponseSchema>;
    try {
      payload = await this.requestJson(
        {
          path: `v8/finance/chart/${encodeURIComponent(symbolId)}`,
          query: { period1, period2, interval: '1d', events: 'div,splits', includeAdjustedClose: true },
          signal,
        },
        ChartResponseSchema
      );
    } catch (error) {
      throw this.toFetchFailure(symbolId, error);
    }

    const { result, error } = payload.chart;
    if (error) {
      const kind = error.code === 'Not Found' ? 'not_found' : 'transient';
      throw new FetchFailure(kind, symbolId, `${error.code}: ${error.description ?? 'no description'}`);
    }

    const chart = result?.[0];
    if (!chart) {
      throw new FetchFailure('not_found', symbolId, `No chart data for ${symbolId}`);
    }

    const bars = toPriceBars(chart, timeZone).filter((bar) => bar.date >= range.from && bar.date <= range.to);
    this.logger.debug(`Fetched ${bars.length} bar(s)`, { symbolId, from: range.from, to: range.to });
    return bars;
  }

  private toFetchFailure(symbolId: string, error: unknown): Error {
    if (error instanceof OperationCancelledError) {
      return error;
    }
    if (error instanceof HttpApiError) {
      if (error.status === 404) {
        return new FetchFailure('not_found', symbolId, error.message, error);
      }
      if (error.status === 429) {
        return new FetchFailure('rate_limited', symbolId, error.message, error);
      }
      return new FetchFailure('transient', symbolId, error.message, error);
    }
    return new FetchFailure('transient', symbolId, getErrorMessage(error), toError(error));
  }
}

/**
 * Convert a chart result into bars keyed by market-local date.
 * Rows with a missing price are dropped; a repeated date keeps the last row.
 */
export function toPriceBars(chart: ChartResult, timeZone: string): PriceBar[] {
  const timestamps = chart.timestamp ?? [];
  const quote = chart.indicators.quote[0];
  const adjclose = chart.indicators.adjclose?.[0]?.adjclose;
  if (!quote) return [];

  const byDate = new Map<string, PriceBar>();
  timestamps.forEach((timestamp, i) => {
    const open = quote.open?.[i];
    const high = quote.high?.[i];
    const low = quote.low?.[i];
    const close = quote.close?.[i];
    if (open == null || high == null || low == null || close == null || close === 0) return;

    const adjusted = adjclose?.[i];
    const ratio = adjusted != null ? adjusted / close : 1;
    const date = zonedDateString(new Date(timestamp * 1000), timeZone);

    byDate.set(date, {
      date,
      open: roundPrice(open * ratio),
      high: roundPrice(high * ratio),
      low: roundPrice(low * ratio),
      close: roundPrice(close * ratio),
      volume: Math.round(quote.volume?.[i] ?? 0),
    });
  });

  return [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date));
}
