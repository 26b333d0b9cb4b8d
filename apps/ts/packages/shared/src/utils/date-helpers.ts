/**
 * Date utility functions
 *
 * Calendar dates travel through the warehouse as ISO strings (YYYY-MM-DD) in the
 * market's local timezone; instants travel as Date objects. These helpers convert
 * between the two without a timezone library, using Intl the same way for every market.
 */

const ISO_DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;
const MS_PER_DAY = 86_400_000;

/**
 * Convert a Date to ISO date string (YYYY-MM-DD format, UTC)
 *
 * @throws Error if the date is invalid
 *
 * @example
 * ```typescript
 * toISODateString(new Date('2024-01-15')); // "2024-01-15"
 * ```
 */
export function toISODateString(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new Error('Invalid date: Date object represents an invalid date');
  }

  const isoString = date.toISOString();
  const parts = isoString.split('T');

  if (!parts[0]) {
    throw new Error(`Invalid date: failed to extract date string from ISO string "${isoString}"`);
  }

  return parts[0];
}

/**
 * Check that a string is a real calendar date in YYYY-MM-DD format
 */
export function isISODate(value: string): boolean {
  if (!ISO_DATE_REGEX.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && toISODateString(parsed) === value;
}

/**
 * Shift an ISO calendar date by a number of days
 */
export function addDays(isoDate: string, days: number): string {
  const base = Date.parse(`${isoDate}T00:00:00Z`);
  if (Number.isNaN(base)) {
    throw new Error(`Invalid ISO date: "${isoDate}"`);
  }
  return toISODateString(new Date(base + days * MS_PER_DAY));
}

/**
 * Day of week for an ISO calendar date (0 = Sunday)
 */
export function dayOfWeek(isoDate: string): number {
  return new Date(`${isoDate}T00:00:00Z`).getUTCDay();
}

/**
 * Inclusive list of ISO dates between two bounds
 */
export function eachDay(from: string, to: string): string[] {
  const days: string[] = [];
  for (let current = from; current <= to; current = addDays(current, 1)) {
    days.push(current);
  }
  return days;
}

function zonedParts(instant: Date, timeZone: string): Record<string, number> {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });

  const result: Record<string, number> = {};
  for (const part of formatter.formatToParts(instant)) {
    if (part.type !== 'literal') {
      result[part.type] = Number(part.value);
    }
  }
  return result;
}

/**
 * Offset of a timezone from UTC at the given instant, in milliseconds
 */
export function timeZoneOffsetMs(instant: Date, timeZone: string): number {
  const p = zonedParts(instant, timeZone);
  const asUtc = Date.UTC(
    p.year ?? 1970,
    (p.month ?? 1) - 1,
    p.day ?? 1,
    p.hour ?? 0,
    p.minute ?? 0,
    p.second ?? 0
  );
  return asUtc - Math.floor(instant.getTime() / 1000) * 1000;
}

/**
 * Local calendar date of an instant in the given timezone
 *
 * @example
 * ```typescript
 * zonedDateString(new Date('2025-03-03T20:00:00Z'), 'Asia/Taipei'); // "2025-03-04"
 * ```
 */
export function zonedDateString(instant: Date, timeZone: string): string {
  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
  return formatter.format(instant);
}

/**
 * Instant at which a local wall-clock time occurs in the given timezone
 *
 * @param isoDate - local calendar date (YYYY-MM-DD)
 * @param time - local wall-clock time (HH:MM)
 */
export function zonedTimeToInstant(isoDate: string, time: string, timeZone: string): Date {
  const [year, month, day] = isoDate.split('-').map(Number);
  const [hour, minute] = time.split(':').map(Number);
  if (year === undefined || month === undefined || day === undefined || hour === undefined || minute === undefined) {
    throw new Error(`Invalid local time: "${isoDate} ${time}"`);
  }

  const guess = Date.UTC(year, month - 1, day, hour, minute);
  const firstOffset = timeZoneOffsetMs(new Date(guess), timeZone);
  const candidate = guess - firstOffset;

  // DST transitions can shift the offset between the guess and the answer
  const secondOffset = timeZoneOffsetMs(new Date(candidate), timeZone);
  return new Date(secondOffset === firstOffset ? candidate : guess - secondOffset);
}
