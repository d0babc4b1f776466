/**
 * Date Resolver
 *
 * Parses the date notations found in document rosters, computes signed
 * calendar-day deltas and formats dates back to text. All arithmetic is on
 * calendar dates; time of day never affects a result.
 */

import {
  differenceInCalendarDays,
  format,
  isValid,
  parse,
  parseISO,
  startOfDay,
} from "date-fns";

/**
 * Accepted input notations, tried in this order
 */
export const SUPPORTED_DATE_FORMATS = [
  "yyyyMMdd", // 20240101
  "yyyy-MM-dd", // 2024-01-01
  "yyyy/MM/dd", // 2024/01/01
  "dd/MM/yyyy", // 01/01/2024
  "dd-MM-yyyy", // 01-01-2024
  "yyyy'年'MM'月'dd'日'", // 2024年01月01日
] as const;

type DateFormat = (typeof SUPPORTED_DATE_FORMATS)[number];

// date-fns reads `yyyy` as one to four digits, so "01-06-26" would match
// yyyy-MM-dd as year 1. Each pattern only runs on input of its own shape.
const DATE_SHAPES: Record<DateFormat, RegExp> = {
  yyyyMMdd: /^\d{8}$/,
  "yyyy-MM-dd": /^\d{4}-\d{1,2}-\d{1,2}$/,
  "yyyy/MM/dd": /^\d{4}\/\d{1,2}\/\d{1,2}$/,
  "dd/MM/yyyy": /^\d{1,2}\/\d{1,2}\/\d{4}$/,
  "dd-MM-yyyy": /^\d{1,2}-\d{1,2}-\d{4}$/,
  "yyyy'年'MM'月'dd'日'": /^\d{4}年\d{1,2}月\d{1,2}日$/,
};

export const DISPLAY_DATE_FORMAT = "yyyy-MM-dd";
export const COMPACT_DATE_FORMAT = "yyyyMMdd";

// Reference date for date-fns parse; every supported pattern carries a full
// year, so its value never leaks into a result.
const PARSE_REFERENCE = new Date(2000, 0, 1);

/**
 * Parse a date string. Returns null for empty or unparsable input, and for
 * two-digit years.
 */
export function parseDate(value: string | null | undefined): Date | null {
  if (!value) return null;

  const trimmed = value.trim();
  if (!trimmed) return null;

  for (const pattern of SUPPORTED_DATE_FORMATS) {
    if (!DATE_SHAPES[pattern].test(trimmed)) continue;
    const parsed = parse(trimmed, pattern, PARSE_REFERENCE);
    if (isValid(parsed)) {
      return parsed;
    }
  }

  // Fallback: ISO 8601 with time or offset (2024-01-01T08:30:00)
  const iso = parseISO(trimmed);
  return isValid(iso) ? startOfDay(iso) : null;
}

export function isValidDate(value: string | null | undefined): boolean {
  return parseDate(value) !== null;
}

/**
 * Format a date, `yyyy-MM-dd` unless another date-fns pattern is given
 */
export function formatDate(date: Date, pattern: string = DISPLAY_DATE_FORMAT): string {
  return format(date, pattern);
}

/**
 * Re-format a date string into the target pattern, null when unparsable
 */
export function normalizeDateFormat(
  value: string,
  targetPattern: string = COMPACT_DATE_FORMAT
): string | null {
  const parsed = parseDate(value);
  return parsed ? formatDate(parsed, targetPattern) : null;
}

/**
 * Signed number of calendar days from `from` to `to`
 */
export function daysBetween(from: Date, to: Date): number {
  return differenceInCalendarDays(to, from);
}

/**
 * Days until expiry, negative once expired
 */
export function calculateDaysLeft(expiryDate: Date, today: Date): number {
  return daysBetween(today, expiryDate);
}

/**
 * The current local date at midnight. Read once per batch so that every
 * document of a run is measured against the same day.
 */
export function getToday(now: Date = new Date()): Date {
  return startOfDay(now);
}
