/**
 * Time utilities for consistent date handling
 */

import { format, parseISO, isValid, isBefore } from 'date-fns';

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function formatUtcDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Parses a bar timestamp into a yyyy-MM-dd trading date.
 * Accepts ISO strings and epoch numbers (seconds below 1e11, otherwise ms).
 * Returns null when the value is not a usable date.
 */
export function parseBarDate(value: unknown): string | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value <= 0) return null;
    const ms = value < 1e11 ? value * 1000 : value;
    return formatUtcDate(new Date(ms));
  }
  if (value instanceof Date) {
    return isValid(value) ? formatUtcDate(value) : null;
  }
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  if (trimmed === '') return null;
  if (/^\d+$/.test(trimmed)) {
    return parseBarDate(Number(trimmed));
  }
  // Plain calendar dates keep their own day; timestamps with a zone are
  // normalized to UTC.
  const calendar = /^(\d{4}-\d{2}-\d{2})(?:[T ]00:00(?::00(?:\.0+)?)?)?$/.exec(trimmed);
  if (calendar) {
    return isValid(parseISO(calendar[1])) ? calendar[1] : null;
  }
  const parsed = parseISO(trimmed.replace(' ', 'T'));
  return isValid(parsed) ? formatUtcDate(parsed) : null;
}

export function isCacheExpired(
  cachedAt: Date,
  ttlSeconds: number,
  now: Date = new Date()
): boolean {
  const expiresAt = new Date(cachedAt.getTime() + ttlSeconds * 1000);
  return !isBefore(now, expiresAt);
}

export function hoursToSeconds(hours: number): number {
  return hours * 60 * 60;
}
