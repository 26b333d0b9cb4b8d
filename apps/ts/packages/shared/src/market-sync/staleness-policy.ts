/**
 * Market Sync - staleness policy
 * Decides per symbol whether a network fetch is justified, based on market
 * sessions rather than wall-clock age. Pure: no network, no database.
 */

import type { TradingCalendar } from '../calendar/market-calendar';
import type { Market } from '../types/warehouse';
import { addDays, zonedDateString } from '../utils/date-helpers';

export type StalenessReason =
  | 'never_fetched'
  | 'non_trading_day'
  | 'in_session_fresh'
  | 'in_session_stale'
  | 'fresh_since_close'
  | 'stale_since_close'
  | 'no_recent_close';

export interface StalenessDecision {
  fetch: boolean;
  reason: StalenessReason;
}

export interface StalenessPolicyOptions {
  /** Days searched backwards for the most recent session close */
  closeSearchDays?: number;
}

const DEFAULT_CLOSE_SEARCH_DAYS = 14;

export class StalenessPolicy {
  private readonly closeSearchDays: number;

  constructor(
    private readonly calendar: TradingCalendar,
    options: StalenessPolicyOptions = {}
  ) {
    this.closeSearchDays = options.closeSearchDays ?? DEFAULT_CLOSE_SEARCH_DAYS;
  }

  shouldFetch(_symbolId: string, market: Market, now: Date, lastFetchedAt: Date | null): boolean {
    return this.evaluate(market, now, lastFetchedAt).fetch;
  }

  evaluate(market: Market, now: Date, lastFetchedAt: Date | null): StalenessDecision {
    if (!lastFetchedAt) {
      return { fetch: true, reason: 'never_fetched' };
    }

    const today = zonedDateString(now, this.calendar.timeZone(market));
    if (!this.calendar.isTradingDay(market, today)) {
      return { fetch: false, reason: 'non_trading_day' };
    }

    const { open, close } = this.calendar.sessionBounds(market, today);
    if (open <= now && now < close) {
      const sessionLength = close.getTime() - open.getTime();
      return now.getTime() - lastFetchedAt.getTime() >= sessionLength
        ? { fetch: true, reason: 'in_session_stale' }
        : { fetch: false, reason: 'in_session_fresh' };
    }

    const mostRecentClose = this.mostRecentClose(market, today, now);
    if (!mostRecentClose) {
      return { fetch: true, reason: 'no_recent_close' };
    }
    return lastFetchedAt >= mostRecentClose
      ? { fetch: false, reason: 'fresh_since_close' }
      : { fetch: true, reason: 'stale_since_close' };
  }

  /**
   * Latest session close at or before `now`: today's close once the session
   * ended, otherwise the close of the previous trading day in the window
   */
  private mostRecentClose(market: Market, today: string, now: Date): Date | null {
    const todayClose = this.calendar.sessionBounds(market, today).close;
    if (todayClose <= now) {
      return todayClose;
    }

    for (let back = 1; back <= this.closeSearchDays; back++) {
      const date = addDays(today, -back);
      if (this.calendar.isTradingDay(market, date)) {
        return this.calendar.sessionBounds(market, date).close;
      }
    }
    return null;
  }
}
