// ──────────────────────────────────────────
// Argument validation shared by the analytics domains
// ──────────────────────────────────────────

import { InvalidArgumentError } from './errors';
import { MetricName, isMetricName } from './types';

const COUNTRY_RE = /^[A-Z]{2}$/;
const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;
/** Upper bound for any day-count argument (window sizes, lookbacks). */
export const MAX_DAY_COUNT = 36_500;

export function parseCountry(raw: string): string {
  const country = raw.trim().toUpperCase();
  if (!COUNTRY_RE.test(country)) {
    throw new InvalidArgumentError(`Malformed country code: ${raw}`);
  }
  return country;
}

export function parseMetric(raw: string): MetricName {
  if (!isMetricName(raw)) {
    throw new InvalidArgumentError(`Unrecognized metric: ${raw}`);
  }
  return raw;
}

export function parsePositiveInt(raw: number | string, name: string): number {
  const n = typeof raw === 'number' ? raw : Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer, got ${raw}`);
  }
  return n;
}

/** A positive day count no larger than MAX_DAY_COUNT. */
export function parseDayCount(raw: number | string, name: string): number {
  const n = parsePositiveInt(raw, name);
  if (n > MAX_DAY_COUNT) {
    throw new InvalidArgumentError(`${name} must be at most ${MAX_DAY_COUNT}, got ${raw}`);
  }
  return n;
}

/** Accepts YYYY-MM-DD only, and rejects calendar-invalid days such as 2025-02-30. */
export function parseDate(raw: string, name = 'date'): string {
  const value = raw.trim();
  if (!DATE_RE.test(value)) {
    throw new InvalidArgumentError(`${name} must be YYYY-MM-DD, got ${raw}`);
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  if (isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== value) {
    throw new InvalidArgumentError(`${name} is not a calendar date: ${raw}`);
  }
  return value;
}

export function addDays(instant: Date, days: number): Date {
  const shifted = new Date(instant.getTime() + days * DAY_MS);
  if (isNaN(shifted.getTime())) {
    throw new InvalidArgumentError(`Shifting by ${days} days leaves the supported date range`);
  }
  return shifted;
}

export function toDateString(instant: Date): string {
  return instant.toISOString().slice(0, 10);
}
