import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { type HolidayTable, MarketCalendar } from '../calendar/market-calendar';
import type { SyncConfig, UpdateConfig } from '../config';
import type { PriceBar } from '../types/warehouse';

export function getTestDbPath(prefix = 'test-warehouse'): string {
  return path.join(os.tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}.db`);
}

export function cleanupDatabase(dbPath: string): void {
  for (const suffix of ['', '-wal', '-shm']) {
    fs.rmSync(`${dbPath}${suffix}`, { force: true });
  }
}

export function bar(date: string, close: number, volume = 1000): PriceBar {
  return { date, open: close - 1, high: close + 1, low: close - 2, close, volume };
}

export const emptyHolidayTable: HolidayTable = {
  TW: { holidays: [], earlyCloses: {} },
  US: { holidays: [], earlyCloses: {} },
  HK: { holidays: [], earlyCloses: {} },
};

export function createTestCalendar(table: HolidayTable = emptyHolidayTable): MarketCalendar {
  return new MarketCalendar(table);
}

export const testUpdateConfig: UpdateConfig = {
  concurrency: 2,
  maxRetries: 1,
  retryDelayMs: 1,
  maxRetryDelayMs: 1,
  historyStartDate: '2025-02-27',
  gapLookbackDays: 30,
  requestTimeoutMs: 1000,
  requestsPerMinute: 0,
};

export const testSyncConfig: SyncConfig = {
  maxAttempts: 5,
  retryDelayMs: 1,
  maxRetryDelayMs: 1,
  attemptTimeoutMs: 1000,
  remotePath: 'stock_warehouse.db',
};
