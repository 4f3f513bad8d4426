/**
 * Calendar-date helpers. Dates travel as `YYYY-MM-DD` strings and are
 * compared as UTC midnights so the host timezone never shifts a day.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Parses a `YYYY-MM-DD` string into a UTC midnight Date.
 * Returns null for malformed strings and impossible dates such as 2025-02-30.
 */
export function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE.exec(value);
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return formatIsoDate(date) === value ? date : null;
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addDays(isoDate: string, days: number): string {
  const date = parseIsoDate(isoDate);
  if (!date) {
    throw new RangeError(`Invalid date: ${isoDate}`);
  }
  return formatIsoDate(new Date(date.getTime() + days * DAY_MS));
}

export function nightsBetween(checkIn: string, checkOut: string): number {
  const start = parseIsoDate(checkIn);
  const end = parseIsoDate(checkOut);
  if (!start || !end) {
    throw new RangeError(`Invalid stay: ${checkIn} to ${checkOut}`);
  }
  return Math.round((end.getTime() - start.getTime()) / DAY_MS);
}

export function todayIso(now: Date = new Date()): string {
  return formatIsoDate(now);
}
