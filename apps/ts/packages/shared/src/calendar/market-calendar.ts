/**
 * Market calendar: trading days and regular session bounds per market
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from '../errors';
import type { Market } from '../types/warehouse';
import { dayOfWeek, isISODate, zonedDateString, zonedTimeToInstant } from '../utils/date-helpers';
import { toError } from '../utils/error-helpers';

export interface SessionBounds {
  open: Date;
  close: Date;
}

/**
 * Calendar capability consumed by the staleness policy and the orchestrator
 */
export interface TradingCalendar {
  timeZone(market: Market): string;
  isTradingDay(market: Market, date: string): boolean;
  sessionBounds(market: Market, date: string): SessionBounds;
}

export interface SessionHours {
  timeZone: string;
  open: string; // HH:MM local
  close: string;
}

export const SESSION_HOURS: Record<Market, SessionHours> = {
  TW: { timeZone: 'Asia/Taipei', open: '09:00', close: '13:30' },
  US: { timeZone: 'America/New_York', open: '09:30', close: '16:00' },
  HK: { timeZone: 'Asia/Hong_Kong', open: '09:30', close: '16:00' },
};

const IsoDateSchema = z.string().refine(isISODate, 'Expected a YYYY-MM-DD calendar date');
const LocalTimeSchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:MM');

const MarketHolidaysSchema = z.object({
  holidays: z.array(IsoDateSchema),
  earlyCloses: z.record(IsoDateSchema, LocalTimeSchema).default({}),
});

export const HolidayTableSchema = z.object({
  TW: MarketHolidaysSchema,
  US: MarketHolidaysSchema,
  HK: MarketHolidaysSchema,
});

export type HolidayTable = z.infer<typeof HolidayTableSchema>;

/**
 * Read and validate a holidays file
 *
 * @throws ConfigError when the file is missing or malformed
 */
export function loadHolidayTable(filePath: string): HolidayTable {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot read holidays file ${filePath}`, toError(error));
  }

  const parsed = HolidayTableSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid holidays file ${filePath}: ${issue?.path.join('.')} ${issue?.message}`);
  }
  return parsed.data;
}

export class MarketCalendar implements TradingCalendar {
  private readonly holidays: Record<Market, Set<string>>;
  private readonly earlyCloses: Record<Market, Record<string, string>>;

  constructor(
    table: HolidayTable,
    private readonly hours: Record<Market, SessionHours> = SESSION_HOURS
  ) {
    this.holidays = {
      TW: new Set(table.TW.holidays),
      US: new Set(table.US.holidays),
      HK: new Set(table.HK.holidays),
    };
    this.earlyCloses = {
      TW: table.TW.earlyCloses,
      US: table.US.earlyCloses,
      HK: table.HK.earlyCloses,
    };
  }

  static fromFile(filePath: string): MarketCalendar {
    return new MarketCalendar(loadHolidayTable(filePath));
  }

  timeZone(market: Market): string {
    return this.hours[market].timeZone;
  }

  isTradingDay(market: Market, date: string): boolean {
    const weekday = dayOfWeek(date);
    if (weekday === 0 || weekday === 6) return false;
    return !this.holidays[market].has(date);
  }

  sessionBounds(market: Market, date: string): SessionBounds {
    const hours = this.hours[market];
    const closeTime = this.earlyCloses[market][date] ?? hours.close;
    return {
      open: zonedTimeToInstant(date, hours.open, hours.timeZone),
      close: zonedTimeToInstant(date, closeTime, hours.timeZone),
    };
  }

  /**
   * Market-local calendar date of an instant
   */
  localDate(market: Market, instant: Date): string {
    return zonedDateString(instant, this.hours[market].timeZone);
  }
}
