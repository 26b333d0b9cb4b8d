/**
 * Core warehouse domain types
 */

import { z } from 'zod';

export const MARKETS = ['TW', 'US', 'HK'] as const;

export const MarketSchema = z.enum(MARKETS);

export type Market = z.infer<typeof MarketSchema>;

export function isMarket(value: string): value is Market {
  return MarketSchema.safeParse(value).success;
}

/**
 * One tradable instrument as stored locally
 */
export interface SymbolRecord {
  symbolId: string; // exchange qualified, e.g. 2330.TW
  market: Market;
  name: string;
  active: boolean;
}

/**
 * One instrument as reported by the symbol-list source
 */
export interface SymbolListing {
  symbolId: string;
  name: string;
}

/**
 * Daily OHLCV bar, date is the market-local calendar date
 */
export interface PriceBar {
  date: string; // YYYY-MM-DD
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Inclusive calendar date range
 */
export interface DateRange {
  from: string;
  to: string;
}

export type ChangeOperation = 'insert' | 'update';

export interface ChangeSetEntry {
  symbolId: string;
  fromDate: string;
  toDate: string;
  operation: ChangeOperation;
}

/**
 * Fetch metadata kept per symbol
 */
export interface SymbolFetchState {
  symbolId: string;
  lastFetchedAt: Date | null;
  lastDate: string | null;
}
