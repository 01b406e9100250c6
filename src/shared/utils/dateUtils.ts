/**
 * Date Utilities - Standardized date handling using date-fns v4.x
 *
 * Email dates arrive either as RFC 5322 `Date` header text or as values the
 * Outlook container already decoded. Everything goes through these helpers so
 * an unparsable value becomes an absent date instead of an error.
 *
 * @module shared/utils/dateUtils
 */

import { formatISO, isValid, parse, parseISO } from 'date-fns';

/**
 * Parenthesized comments allowed by the RFC 5322 date grammar, e.g. `(UTC)`
 */
const DATE_COMMENT = /\([^)]*\)/g;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}/;
const DAY_NAME = /^[A-Za-z]{3},\s*/;
const YEAR_FIELD = /^\d{1,2} [A-Za-z]{3} (\d+) /;
const ZONE_NAME = / ([A-Za-z]{1,3})$/;

// RFC 5322 section 4.3 obsolete zones
const OBSOLETE_ZONES = new Map<string, string>([
  ['UT', '+0000'],
  ['UTC', '+0000'],
  ['GMT', '+0000'],
  ['Z', '+0000'],
  ['EST', '-0500'],
  ['EDT', '-0400'],
  ['CST', '-0600'],
  ['CDT', '-0500'],
  ['MST', '-0700'],
  ['MDT', '-0600'],
  ['PST', '-0800'],
  ['PDT', '-0700'],
]);

function withNumericZone(value: string): string {
  const zone = value.match(ZONE_NAME)?.[1];
  const offset = zone ? OBSOLETE_ZONES.get(zone.toUpperCase()) : undefined;
  return zone && offset ? `${value.slice(0, -zone.length)}${offset}` : value;
}

/**
 * Parse the internet-date grammar: `[day, ] d MMM yyyy HH:mm[:ss] zone`
 */
function parseRfc5322Date(value: string): Date | undefined {
  const normalized = withNumericZone(
    value.replace(DATE_COMMENT, ' ').replace(/\s+/g, ' ').trim().replace(DAY_NAME, '')
  );
  // Two-digit years are obsolete but still seen
  const year = normalized.match(YEAR_FIELD)?.[1].length === 2 ? 'yy' : 'yyyy';
  const referenceDate = new Date();

  for (const pattern of [`d MMM ${year} HH:mm:ss xx`, `d MMM ${year} HH:mm xx`]) {
    const date = parse(normalized, pattern, referenceDate);
    if (isValid(date)) {
      return date;
    }
  }
  return undefined;
}

/**
 * Parse an email Date header
 *
 * ISO 8601 is tried first (some exporters write it), then the internet-date
 * grammar (`Tue, 27 Jan 2026 10:30:00 +0800`, obsolete zone names included).
 * Anything else is rejected.
 *
 * @param dateHeader - Date string from the email Date header
 * @returns Parsed date, or undefined if missing or unparsable
 *
 * @example
 * ```typescript
 * parseEmailDate('Tue, 27 Jan 2026 10:30:00 +0800') // 2026-01-27T02:30:00.000Z
 * parseEmailDate('not a date') // undefined
 * ```
 */
export function parseEmailDate(dateHeader: string | null | undefined): Date | undefined {
  if (!dateHeader || !dateHeader.trim()) {
    return undefined;
  }

  const value = dateHeader.trim();

  // Try parsing as ISO first (fastest path)
  if (ISO_DATE.test(value)) {
    const date = parseISO(value);
    if (isValid(date)) {
      return date;
    }
  }

  return parseRfc5322Date(value);
}

/**
 * Normalize a date value that may already be a Date
 *
 * @param value - Date object or header text
 * @returns Valid Date, or undefined
 */
export function toEmailDate(value: Date | string | null | undefined): Date | undefined {
  if (value instanceof Date) {
    return isValid(value) ? value : undefined;
  }
  return parseEmailDate(value);
}

/**
 * Format date as ISO 8601 string
 *
 * Used when records are serialized for output.
 *
 * @example
 * ```typescript
 * formatISO8601(new Date(2026, 0, 27)) // '2026-01-27T00:00:00+01:00' (local offset)
 * ```
 */
export function formatISO8601(date: Date): string {
  return formatISO(date);
}

export default {
  parseEmailDate,
  toEmailDate,
  formatISO8601,
};
