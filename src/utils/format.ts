/**
 * Formatting helpers for the values the Tunnelflight site returns.
 * All calendar dates are computed in UTC.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Format a UNIX timestamp (seconds) as YYYY-MM-DD
 * @returns null when the timestamp is outside the representable date range
 */
export function formatDate(unixSeconds: number): string | null {
  const date = new Date(unixSeconds * 1000);
  return Number.isNaN(date.getTime()) ? null : date.toISOString().slice(0, 10);
}

/**
 * Format an ISO-8601 string or UNIX timestamp as YYYY-MM-DD.
 * Values that are neither are returned as strings; empty values give null.
 */
export function formatTimestamp(value: unknown): string | null {
  if (value === null || value === undefined || value === '' || value === 0) {
    return null;
  }

  if (typeof value === 'string' && value.includes('T')) {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? value : new Date(parsed).toISOString().slice(0, 10);
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds) && String(value).trim() !== '') {
    return formatDate(Math.trunc(seconds)) ?? String(value);
  }

  return String(value);
}

/**
 * Parse an ISO-8601 string to UNIX seconds
 */
export function isoToUnixSeconds(value: string): number | null {
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : Math.trunc(parsed / 1000);
}

export interface FlightTime {
  hours: number;
  minutes: number;
}

/**
 * Parse a flight time in the site's "H:MM" form
 */
export function parseFlightTime(value: string): FlightTime | null {
  const match = /^\s*(\d+):(\d+)\s*$/.exec(value);
  if (!match) {
    return null;
  }
  return { hours: Number(match[1]), minutes: Number(match[2]) };
}

/**
 * Format a number of minutes as "H:MM"
 */
export function formatFlightTime(totalMinutes: number): string {
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${hours}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Whole days from today (UTC) until a YYYY-MM-DD date; negative once passed
 */
export function daysUntil(date: string, now: Date = new Date()): number | null {
  const target = Date.parse(`${date}T00:00:00Z`);
  if (Number.isNaN(target)) {
    return null;
  }
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  return Math.floor((target - today) / DAY_MS);
}

/**
 * Lower-case a username and drop everything but letters and digits
 */
export function normalizeUsername(username: string | undefined | null): string {
  if (!username) {
    return '';
  }
  return username.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * Lenient check that a screen name belongs to the configured username.
 * "bruceh" and "Bruce Hartley" match on their first three characters.
 */
export function usernamesLikelyMatch(fetched: string, configured: string): boolean {
  const a = normalizeUsername(fetched);
  const b = normalizeUsername(configured);
  if (!a || !b) {
    return true;
  }
  return a.startsWith(b.slice(0, 3)) || b.startsWith(a.slice(0, 3));
}

export type CurrencyStatus = 'current' | 'not_current' | 'unknown';

export function formatCurrencyStatus(status: unknown): CurrencyStatus {
  if (status === 1) {
    return 'current';
  }
  if (status === 0) {
    return 'not_current';
  }
  return 'unknown';
}
