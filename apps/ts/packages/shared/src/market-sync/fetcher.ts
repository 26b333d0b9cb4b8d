/**
 * Market Sync - fetch collaborators
 * Price and symbol-list sources consumed by the update orchestrator.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { isValidSymbolId, normalizeSymbolId } from '../db/columns/symbol-id';
import { ConfigError } from '../errors';
import type { DateRange, Market, PriceBar, SymbolListing } from '../types/warehouse';
import { toError } from '../utils/error-helpers';

/**
 * Upstream daily bars for one symbol.
 * Rejects with FetchFailure (transient, rate_limited or not_found).
 */
export interface PriceFetcher {
  fetch(symbolId: string, market: Market, range: DateRange, signal?: AbortSignal): Promise<PriceBar[]>;
}

/**
 * Current listing for a market
 */
export interface SymbolSource {
  listSymbols(market: Market): Promise<SymbolListing[]>;
}

const SymbolListingSchema = z.object({
  symbolId: z
    .string()
    .transform(normalizeSymbolId)
    .refine(isValidSymbolId, (value) => ({ message: `Invalid symbol id "${value}"` })),
  name: z.string().min(1),
});

export const SymbolFileSchema = z.object({
  TW: z.array(SymbolListingSchema).default([]),
  US: z.array(SymbolListingSchema).default([]),
  HK: z.array(SymbolListingSchema).default([]),
});

export type SymbolFile = z.infer<typeof SymbolFileSchema>;

/**
 * Symbol lists maintained in a JSON file keyed by market.
 * The file is re-read on every call so edits apply to the next run.
 */
export class JsonFileSymbolSource implements SymbolSource {
  constructor(private readonly filePath: string) {}

  async listSymbols(market: Market): Promise<SymbolListing[]> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(this.filePath, 'utf8'));
    } catch (error) {
      throw new ConfigError(`Cannot read symbols file ${this.filePath}`, toError(error));
    }

    const parsed = SymbolFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigError(`Invalid symbols file ${this.filePath}: ${issue?.path.join('.')} ${issue?.message}`);
    }

    const seen = new Set<string>();
    return parsed.data[market].filter((listing) => {
      if (seen.has(listing.symbolId)) return false;
      seen.add(listing.symbolId);
      return true;
    });
  }
}
