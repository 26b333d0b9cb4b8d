import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, describe, expect, it } from 'vitest';
import { DEFAULT_HOLIDAYS_PATH } from '../config';
import { ConfigError } from '../errors';
import { type HolidayTable, loadHolidayTable, MarketCalendar } from './market-calendar';

const table: HolidayTable = {
  TW: { holidays: ['2025-01-01'], earlyCloses: {} },
  US: { holidays: ['2025-07-04'], earlyCloses: { '2025-11-28': '13:00' } },
  HK: { holidays: [], earlyCloses: {} },
};

describe('MarketCalendar', () => {
  const calendar = new MarketCalendar(table);

  it('treats weekends and holidays as non-trading days', () => {
    expect(calendar.isTradingDay('TW', '2025-03-03')).toBe(true);
    expect(calendar.isTradingDay('TW', '2025-03-01')).toBe(false);
    expect(calendar.isTradingDay('TW', '2025-03-02')).toBe(false);
    expect(calendar.isTradingDay('TW', '2025-01-01')).toBe(false);
  });

  it('keeps holidays market specific', () => {
    expect(calendar.isTradingDay('US', '2025-07-04')).toBe(false);
    expect(calendar.isTradingDay('TW', '2025-07-04')).toBe(true);
  });

  it('computes session bounds in the market timezone', () => {
    const tw = calendar.sessionBounds('TW', '2025-03-03');
    expect(tw.open.toISOString()).toBe('2025-03-03T01:00:00.000Z');
    expect(tw.close.toISOString()).toBe('2025-03-03T05:30:00.000Z');

    const hk = calendar.sessionBounds('HK', '2025-06-02');
    expect(hk.open.toISOString()).toBe('2025-06-02T01:30:00.000Z');
    expect(hk.close.toISOString()).toBe('2025-06-02T08:00:00.000Z');
  });

  it('follows daylight saving time for US sessions', () => {
    expect(calendar.sessionBounds('US', '2025-01-06').open.toISOString()).toBe('2025-01-06T14:30:00.000Z');
    expect(calendar.sessionBounds('US', '2025-07-07').open.toISOString()).toBe('2025-07-07T13:30:00.000Z');
  });

  it('applies early closes', () => {
    expect(calendar.sessionBounds('US', '2025-11-28').close.toISOString()).toBe('2025-11-28T18:00:00.000Z');
  });

  it('reports the market-local date', () => {
    expect(calendar.localDate('TW', new Date('2025-03-03T20:00:00Z'))).toBe('2025-03-04');
    expect(calendar.localDate('US', new Date('2025-03-03T02:00:00Z'))).toBe('2025-03-02');
  });
});

describe('loadHolidayTable', () => {
  const dir = mkdtempSync(join(tmpdir(), 'calendar-test-'));

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads the bundled holidays file', () => {
    const loaded = loadHolidayTable(DEFAULT_HOLIDAYS_PATH);
    expect(loaded.US.holidays).toContain('2025-12-25');
    expect(loaded.TW.earlyCloses).toEqual({});
  });

  it('defaults missing early closes', () => {
    const file = join(dir, 'minimal.json');
    writeFileSync(file, JSON.stringify({ TW: { holidays: [] }, US: { holidays: [] }, HK: { holidays: [] } }));
    expect(loadHolidayTable(file).HK.earlyCloses).toEqual({});
  });

  it('rejects invalid dates', () => {
    const file = join(dir, 'invalid.json');
    writeFileSync(file, JSON.stringify({ TW: { holidays: ['2025-02-30'] }, US: { holidays: [] }, HK: { holidays: [] } }));
    expect(() => loadHolidayTable(file)).toThrow(ConfigError);
  });

  it('rejects a missing file', () => {
    expect(() => loadHolidayTable(join(dir, 'absent.json'))).toThrow(`Cannot read holidays file ${join(dir, 'absent.json')}`);
  });
});
