/**
 * Utility functions for history timestamps and date formatting.
 * The history store keeps visit times as floating-point seconds since 2001-01-01 UTC.
 * All formatting is done in UTC.
 */

/**
 * Reference epoch of stored visit times (2001-01-01T00:00:00Z)
 */
export const REFERENCE_EPOCH = new Date(Date.UTC(2001, 0, 1, 0, 0, 0));

const REFERENCE_EPOCH_MS = REFERENCE_EPOCH.getTime();

/**
 * Convert stored epoch seconds to a Date.
 * Date holds whole milliseconds, so sub-millisecond digits are rounded to the nearest millisecond.
 * @param seconds - Seconds since the reference epoch, fractional and negative values allowed
 */
export function decodeTimestamp(seconds: number): Date {
  return new Date(Math.round(REFERENCE_EPOCH_MS + seconds * 1000));
}

/**
 * Convert a Date to stored epoch seconds
 * @returns Seconds since the reference epoch (negative before 2001)
 */
export function encodeTimestamp(date: Date): number {
  return (date.getTime() - REFERENCE_EPOCH_MS) / 1000;
}

/**
 * Parse a YYYY-MM-DD date string to UTC midnight
 * @throws Error if the input is not a valid calendar date
 */
export function parseDateInput(value: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    throw new Error(`Invalid date format (expected YYYY-MM-DD): ${value}`);
  }

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10) - 1; // JS months are 0-indexed
  const day = parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month, day));

  // Reject dates that rolled over, e.g. 2024-02-30
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month ||
    date.getUTCDate() !== day
  ) {
    throw new Error(`Invalid date: ${value}`);
  }

  return date;
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Format as YYYY-MM-DD
 */
export function formatDate(date: Date): string {
  const year = date.getUTCFullYear().toString().padStart(4, '0');
  return `${year}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/**
 * Format as YYYY-MM-DD HH:mm
 */
export function formatDateTime(date: Date): string {
  return `${formatDate(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
}

/**
 * Format as YYYY-MM-DD HH:mm:ss
 */
export function formatFull(date: Date): string {
  return `${formatDateTime(date)}:${pad(date.getUTCSeconds())}`;
}

/**
 * Format as MM/DD HH:mm
 */
export function formatShort(date: Date): string {
  return `${pad(date.getUTCMonth() + 1)}/${pad(date.getUTCDate())} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
}
