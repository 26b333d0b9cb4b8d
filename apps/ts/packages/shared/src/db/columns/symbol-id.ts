/**
 * Custom Drizzle column type for symbol ids
 *
 * Symbol ids are exchange qualified (e.g. "2330.TW", "0700.HK", "AAPL").
 * Listings arrive with inconsistent case and stray whitespace, so the column
 * normalizes on both read and write.
 */

import { customType } from 'drizzle-orm/sqlite-core';

const SYMBOL_ID_REGEX = /^[0-9A-Z^][0-9A-Z.\-^=]*$/;

/**
 * Normalize a symbol id to its stored form
 *
 * @example
 * normalizeSymbolId(" 2330.tw ") // => "2330.TW"
 * normalizeSymbolId("brk-b")     // => "BRK-B"
 */
export function normalizeSymbolId(symbolId: string): string {
  return symbolId.trim().toUpperCase();
}

/**
 * Validate a normalized symbol id
 */
export function isValidSymbolId(symbolId: string): boolean {
  return SYMBOL_ID_REGEX.test(symbolId);
}

export const symbolId = customType<{
  data: string;
  driverData: string;
}>({
  dataType() {
    return 'text';
  },
  fromDriver(value: string): string {
    return normalizeSymbolId(value);
  },
  toDriver(value: string): string {
    return normalizeSymbolId(value);
  },
});
