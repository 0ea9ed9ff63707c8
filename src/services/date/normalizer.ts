/**
 * @fileoverview Relative date normalization for search filters.
 *
 * Converts the small vocabulary of relative expressions an agent or user
 * typically passes as a filter ("yesterday", "past 7 days", "last month")
 * into canonical `YYYY-MM-DD` dates. Anything it does not recognize is
 * returned verbatim so the caller can decide whether it is a literal date.
 */

import { DateTime } from 'luxon';

export type NormalizeDateOptions = {
  /** IANA timezone that defines "today" (default: system zone) */
  timezone?: string;
  /** For testing, defaults to now */
  referenceDate?: Date;
};

const CANONICAL_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Fixed expressions mapped to a number of days before today.
 * "this week" / "this month" are trailing windows, not calendar periods.
 */
const FIXED_OFFSETS = new Map<string, number>([
  ['today', 0],
  ['yesterday', 1],
  ['last week', 7],
  ['past week', 7],
  ['this week', 7],
  ['last month', 30],
  ['past month', 30],
  ['this month', 30],
]);

const RELATIVE_PATTERNS: Array<{ pattern: RegExp; daysPerUnit: number }> = [
  { pattern: /^(?:last|past)\s+(\d+)\s+days?$/, daysPerUnit: 1 },
  { pattern: /^(\d+)\s+days?\s+ago$/, daysPerUnit: 1 },
  { pattern: /^(?:last|past)\s+(\d+)\s+weeks?$/, daysPerUnit: 7 },
];

function today(options: NormalizeDateOptions): DateTime {
  const reference = options.referenceDate ?? new Date();
  const zone = options.timezone ?? 'system';
  return DateTime.fromJSDate(reference, { zone }).startOf('day');
}

function daysBack(input: string): number | null {
  const fixed = FIXED_OFFSETS.get(input);
  if (fixed !== undefined) return fixed;

  for (const { pattern, daysPerUnit } of RELATIVE_PATTERNS) {
    const match = input.match(pattern);
    if (match) {
      return parseInt(match[1], 10) * daysPerUnit;
    }
  }
  return null;
}

/**
 * Normalize a relative date expression to `YYYY-MM-DD`.
 *
 * - absent, empty or whitespace-only input → `undefined`
 * - canonical `YYYY-MM-DD` → unchanged
 * - recognized relative expression → today minus the offset
 * - anything else → the input, unchanged
 *
 * Never throws.
 */
export function normalizeRelativeDate(
  input: string | null | undefined,
  options: NormalizeDateOptions = {}
): string | undefined {
  if (input === null || input === undefined) return undefined;
  const trimmed = input.trim();
  if (!trimmed) return undefined;

  if (CANONICAL_DATE.test(trimmed)) return trimmed;

  const offset = daysBack(trimmed.toLowerCase().replace(/\s+/g, ' '));
  if (offset === null) return input;

  const base = today(options);
  if (!base.isValid) return input;

  return base.minus({ days: offset }).toISODate() ?? input;
}

/**
 * Validate an IANA timezone string.
 */
export function isValidTimezone(timezone: string): boolean {
  return DateTime.now().setZone(timezone).isValid;
}
