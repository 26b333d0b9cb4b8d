import { afterEach, describe, expect, it, vi } from 'vitest';
import { FetchFailure } from '../../errors';
import { createMockErrorResponse, createMockResponse, createNetworkError, requestUrl } from '../../test-utils/fetch-mock';
import { createMockLogger } from '../../test-utils/mocks';
import { type ChartResult, toPriceBars, YahooChartClient } from './YahooChartClient';

// 2025-02-28, 2025-03-03 and 2025-03-04 at 09:00 Asia/Taipei
const FEB_28 = 1740704400;
const MAR_03 = 1740963600;
const MAR_04 = 1741050000;

function chartPayload(timestamps: number[], quote: Record<string, Array<number | null>>, adjclose?: Array<number | null>) {
  return {
    chart: {
      result: [
        {
          meta: { symbol: '2330.TW', exchangeTimezoneName: 'Asia/Taipei' },
          timestamp: timestamps,
          indicators: {
            quote: [quote],
            ...(adjclose ? { adjclose: [{ adjclose }] } : {}),
          },
        },
      ],
      error: null,
    },
  };
}

const range = { from: '2025-03-03', to: '2025-03-04' };

function createClient() {
  return new YahooChartClient({ logger: createMockLogger() });
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (error: unknown) => error
  );
}

describe('YahooChartClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('requests the market-local date window as epoch seconds', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(createMockResponse(chartPayload([], {})));

    await createClient().fetch('2330.TW', 'TW', range);

    const input = fetchSpy.mock.calls[0]?.[0];
    expect(input && requestUrl(input)).toBe(
      'https://query1.finance.yahoo.com/v8/finance/chart/2330.TW?period1=1740931200&period2=1741104000&interval=1d&events=div%2Csplits&includeAdjustedClose=true'
    );
  });

  it('returns adjusted bars inside the range and drops incomplete rows', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      createMockResponse(
        chartPayload(
          [FEB_28, MAR_03, MAR_04, MAR_04 + 3600],
          {
            open: [990, 1000, 1005, null],
            high: [995, 1010, 1020, null],
            low: [985, 990, 1000, null],
            close: [992, 1000, 1015, null],
            volume: [1000, 25000000, 30000000, null],
          },
          [992, 980, 1015, null]
        )
      )
    );

    await expect(createClient().fetch('2330.TW', 'TW', range)).resolves.toEqual([
      { date: '2025-03-03', open: 980, high: 989.8, low: 970.2, close: 980, volume: 25000000 },
      { date: '2025-03-04', open: 1005, high: 1020, low: 1000, close: 1015, volume: 30000000 },
    ]);
  });

  it('maps 404 to a not_found failure', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(createMockErrorResponse('No data found', 404));

    const error = await captureError(createClient().fetch('ZZZZ.TW', 'TW', range));
    expect(error).toBeInstanceOf(FetchFailure);
    if (error instanceof FetchFailure) {
      expect(error.kind).toBe('not_found');
      expect(error.symbolId).toBe('ZZZZ.TW');
      expect(error.isRetryable()).toBe(false);
    }
  });

  it('maps 429 to a rate_limited failure', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(createMockErrorResponse('Too Many Requests', 429));

    const error = await captureError(createClient().fetch('2330.TW', 'TW', range));
    expect(error instanceof FetchFailure && error.kind).toBe('rate_limited');
  });

  it('maps server and network errors to transient failures', async () => {
    vi.spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(createMockErrorResponse('upstream down', 502))
      .mockRejectedValueOnce(createNetworkError());

    const client = createClient();
    const serverError = await captureError(client.fetch('2330.TW', 'TW', range));
    const networkError = await captureError(client.fetch('2330.TW', 'TW', range));

    expect(serverError instanceof FetchFailure && serverError.kind).toBe('transient');
    expect(networkError instanceof FetchFailure && networkError.kind).toBe('transient');
    expect(networkError instanceof FetchFailure && networkError.isRetryable()).toBe(true);
  });

  it('treats a chart error payload for an unknown symbol as not_found', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      createMockResponse({
        chart: { result: null, error: { code: 'Not Found', description: 'No data found, symbol may be delisted' } },
      })
    );

    const error = await captureError(createClient().fetch('DELISTED', 'US', range));
    expect(error instanceof FetchFailure && error.kind).toBe('not_found');
    expect(error instanceof FetchFailure && error.message).toBe('Not Found: No data found, symbol may be delisted');
  });
});

describe('toPriceBars', () => {
  it('keeps the last row for a repeated date and leaves prices unadjusted without adjclose', () => {
    const chart: ChartResult = {
      meta: { symbol: '2330.TW' },
      timestamp: [MAR_03, MAR_03 + 1800],
      indicators: { quote: [{ open: [10, 11], high: [12, 13], low: [9, 10], close: [11, 12], volume: [5, 6] }] },
    };

    const bars = toPriceBars(chart, 'Asia/Taipei');

    expect(bars).toEqual([{ date: '2025-03-03', open: 11, high: 13, low: 10, close: 12, volume: 6 }]);
  });
});
