/**
 * In-memory price and symbol-list collaborators
 */

import type { PriceFetcher, SymbolSource } from '../market-sync/fetcher';
import type { DateRange, Market, PriceBar, SymbolListing } from '../types/warehouse';

export type FetchHandler = (symbolId: string, range: DateRange) => PriceBar[] | Error;

export class FakePriceFetcher implements PriceFetcher {
  readonly calls: Array<{ symbolId: string; range: DateRange }> = [];

  constructor(private handler: FetchHandler) {}

  setHandler(handler: FetchHandler): void {
    this.handler = handler;
  }

  async fetch(symbolId: string, _market: Market, range: DateRange): Promise<PriceBar[]> {
    this.calls.push({ symbolId, range });
    const result = this.handler(symbolId, range);
    if (result instanceof Error) throw result;
    return result;
  }
}

export class FakeSymbolSource implements SymbolSource {
  failure: Error | null = null;

  constructor(public listings: SymbolListing[]) {}

  async listSymbols(): Promise<SymbolListing[]> {
    if (this.failure) throw this.failure;
    return this.listings;
  }
}
