/**
 * Day Number Utilities
 *
 * All date arithmetic in the stats pipeline runs on integer day numbers
 * (days since 1970-01-01 UTC) so that replay never depends on local time.
 *
 * @module @trailstats/core/time/days
 */

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Integer day number of an instant
 */
export function toDayNumber(date: Date): number {
  return Math.floor(date.getTime() / MS_PER_DAY);
}

/**
 * Day number of an ISO-8601 timestamp as stored in the database
 */
export function timestampToDayNumber(timestamp: string): number {
  const ms = Date.parse(timestamp);
  if (Number.isNaN(ms)) {
    throw new RangeError(`Invalid timestamp: ${timestamp}`);
  }
  return Math.floor(ms / MS_PER_DAY);
}

/**
 * Midnight UTC of a day number
 */
export function fromDayNumber(day: number): Date {
  return new Date(day * MS_PER_DAY);
}

/**
 * YYYYMMDD, the DATE column of a time-series file
 */
export function formatCompactDate(day: number): string {
  return formatIsoDate(day).replace(/-/g, '');
}

/**
 * YYYY-MM-DD, the date stored with series data points
 */
export function formatIsoDate(day: number): string {
  return fromDayNumber(day).toISOString().slice(0, 10);
}

/**
 * Parse a YYYY-MM-DD calendar date into its day number.
 * Rejects dates that do not exist (e.g. 2024-02-30).
 */
export function parseIsoDate(input: string): number {
  const match = input.match(ISO_DATE_PATTERN);
  if (!match) {
    throw new RangeError(`Invalid date format: ${input}. Use YYYY-MM-DD`);
  }

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);

  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    throw new RangeError(`Invalid calendar date: ${input}`);
  }

  return Math.floor(ms / MS_PER_DAY);
}

/**
 * Format elapsed milliseconds as HH:MM:SS
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor(totalSeconds / 60) - hours * 60;
  const seconds = totalSeconds - minutes * 60 - hours * 3600;
  return [hours, minutes, seconds].map(n => String(n).padStart(2, '0')).join(':');
}
