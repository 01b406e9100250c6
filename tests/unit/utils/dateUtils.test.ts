/**
 * Unit Tests: Date Utilities
 *
 * Email Date header parsing and ISO 8601 output using date-fns v4.x.
 *
 * @module tests/unit/utils/dateUtils
 */

import { describe, it, expect } from 'vitest';
import { formatISO8601, parseEmailDate, toEmailDate } from '@shared/utils/dateUtils';

describe('parseEmailDate', () => {
  it('should parse an RFC 5322 date with a numeric zone', () => {
    const result = parseEmailDate('Tue, 27 Jan 2026 10:30:00 +0800');
    expect(result?.toISOString()).toBe('2026-01-27T02:30:00.000Z');
  });

  it('should parse an ISO 8601 timestamp', () => {
    const result = parseEmailDate('2026-01-27T10:30:00Z');
    expect(result?.toISOString()).toBe('2026-01-27T10:30:00.000Z');
  });

  it('should ignore a trailing zone comment', () => {
    const result = parseEmailDate('Mon, 2 Mar 2026 08:00:00 +0000 (UTC)');
    expect(result?.toISOString()).toBe('2026-03-02T08:00:00.000Z');
  });

  it('should accept obsolete zone names', () => {
    const result = parseEmailDate('Mon, 2 Mar 2026 08:00:00 GMT');
    expect(result?.toISOString()).toBe('2026-03-02T08:00:00.000Z');
  });

  it('should convert North American zone names to offsets', () => {
    expect(parseEmailDate('Mon, 2 Mar 2026 08:00:00 EST')?.toISOString()).toBe('2026-03-02T13:00:00.000Z');
  });

  it('should accept a date without day name or seconds', () => {
    expect(parseEmailDate('2 Mar 2026 08:00 -0130')?.toISOString()).toBe('2026-03-02T09:30:00.000Z');
  });

  it('should accept a two-digit year', () => {
    expect(parseEmailDate('2 Mar 26 08:00:00 +0000')?.toISOString()).toBe('2026-03-02T08:00:00.000Z');
  });

  it('should return undefined for garbage', () => {
    expect(parseEmailDate('not a date')).toBeUndefined();
  });

  it('should reject text the lenient Date constructor would accept', () => {
    expect(parseEmailDate('Week 5')).toBeUndefined();
    expect(parseEmailDate('1')).toBeUndefined();
    expect(parseEmailDate('12')).toBeUndefined();
    expect(parseEmailDate('March 2')).toBeUndefined();
  });

  it('should reject a date with trailing text', () => {
    expect(parseEmailDate('2 Mar 2026 08:00:00 +0000 later')).toBeUndefined();
  });

  it('should reject an impossible day of month', () => {
    expect(parseEmailDate('31 Feb 2026 08:00:00 +0000')).toBeUndefined();
  });

  it('should return undefined for missing values', () => {
    expect(parseEmailDate(undefined)).toBeUndefined();
    expect(parseEmailDate(null)).toBeUndefined();
    expect(parseEmailDate('   ')).toBeUndefined();
  });
});

describe('toEmailDate', () => {
  it('should pass valid Date objects through', () => {
    const date = new Date(Date.UTC(2026, 0, 27, 10, 30));
    expect(toEmailDate(date)).toBe(date);
  });

  it('should drop invalid Date objects', () => {
    expect(toEmailDate(new Date('invalid'))).toBeUndefined();
  });

  it('should parse header text', () => {
    expect(toEmailDate('Tue, 27 Jan 2026 10:30:00 +0000')?.toISOString()).toBe('2026-01-27T10:30:00.000Z');
  });
});

describe('formatISO8601', () => {
  it('should produce a string that parses back to the same instant', () => {
    const date = new Date(Date.UTC(2026, 0, 27, 10, 30, 15));
    const formatted = formatISO8601(date);

    expect(formatted).toMatch(/^2026-01-2\dT\d{2}:\d{2}:15(Z|[+-]\d{2}:\d{2})$/);
    expect(new Date(formatted).getTime()).toBe(date.getTime());
  });
});
