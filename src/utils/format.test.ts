import { describe, it, expect } from 'vitest';
import {
  daysUntil,
  formatCurrencyStatus,
  formatDate,
  formatFlightTime,
  formatTimestamp,
  isoToUnixSeconds,
  normalizeUsername,
  parseFlightTime,
  usernamesLikelyMatch
} from './format.js';

describe('date formatting', () => {
  it('formats unix seconds as a UTC calendar date', () => {
    expect(formatDate(1700000000)).toBe('2023-11-14');
  });

  it('gives null for timestamps outside the date range', () => {
    expect(formatDate(1e13)).toBeNull();
    expect(formatTimestamp(1e13)).toBe('10000000000000');
  });

  it('formats ISO strings and numeric timestamps', () => {
    expect(formatTimestamp('2024-03-05T10:20:30Z')).toBe('2024-03-05');
    expect(formatTimestamp(1700000000)).toBe('2023-11-14');
    expect(formatTimestamp('1700000000')).toBe('2023-11-14');
  });

  it('returns null for empty values and passes other text through', () => {
    expect(formatTimestamp(0)).toBeNull();
    expect(formatTimestamp('')).toBeNull();
    expect(formatTimestamp(undefined)).toBeNull();
    expect(formatTimestamp('yesterday')).toBe('yesterday');
    expect(formatTimestamp('notadateT')).toBe('notadateT');
  });

  it('converts ISO strings to unix seconds', () => {
    expect(isoToUnixSeconds('2023-11-14T22:13:20Z')).toBe(1700000000);
    expect(isoToUnixSeconds('garbage')).toBeNull();
  });

  it('counts whole days until a date', () => {
    const now = new Date('2025-01-01T23:59:00Z');
    expect(daysUntil('2025-01-10', now)).toBe(9);
    expect(daysUntil('2025-01-01', now)).toBe(0);
    expect(daysUntil('2024-12-31', now)).toBe(-1);
    expect(daysUntil('garbage', now)).toBeNull();
  });
});

describe('flight time', () => {
  it('parses H:MM values', () => {
    expect(parseFlightTime('12:34')).toEqual({ hours: 12, minutes: 34 });
    expect(parseFlightTime(' 3:05 ')).toEqual({ hours: 3, minutes: 5 });
    expect(parseFlightTime('1234')).toBeNull();
  });

  it('formats minutes as H:MM', () => {
    expect(formatFlightTime(754)).toBe('12:34');
    expect(formatFlightTime(65)).toBe('1:05');
    expect(formatFlightTime(0)).toBe('0:00');
  });
});

describe('usernames', () => {
  it('normalizes to lower-case letters and digits', () => {
    expect(normalizeUsername('Bruce.Hartley_1')).toBe('brucehartley1');
    expect(normalizeUsername(undefined)).toBe('');
  });

  it('matches names sharing their first three characters', () => {
    expect(usernamesLikelyMatch('Bruce Hartley', 'bruceh')).toBe(true);
    expect(usernamesLikelyMatch('alice', 'bob')).toBe(false);
    expect(usernamesLikelyMatch('', 'bob')).toBe(true);
  });
});

describe('currency status', () => {
  it('maps numeric flags', () => {
    expect(formatCurrencyStatus(1)).toBe('current');
    expect(formatCurrencyStatus(0)).toBe('not_current');
    expect(formatCurrencyStatus('1')).toBe('unknown');
    expect(formatCurrencyStatus(undefined)).toBe('unknown');
  });
});
