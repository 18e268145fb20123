import { describe, it, expect } from 'vitest';
import { parseDate, isIsoDate, parseInstant, parseClockTime } from '../../src/parsers/date-parser.js';

describe('parseDate', () => {
  const fixed = '2026-02-08'; // Sunday

  it('returns null for empty/null/undefined', () => {
    expect(parseDate(null, fixed)).toBeNull();
    expect(parseDate(undefined, fixed)).toBeNull();
    expect(parseDate('', fixed)).toBeNull();
    expect(parseDate('  ', fixed)).toBeNull();
  });

  it('returns null when today is not a date', () => {
    expect(parseDate('today', 'someday')).toBeNull();
  });

  // --- Named dates ---

  it('parses "today"', () => {
    expect(parseDate('today', fixed)).toBe('2026-02-08');
  });

  it('parses "tomorrow"', () => {
    expect(parseDate('tomorrow', fixed)).toBe('2026-02-09');
  });

  it('parses "yesterday"', () => {
    expect(parseDate('yesterday', fixed)).toBe('2026-02-07');
  });

  it('is case-insensitive', () => {
    expect(parseDate('TODAY', fixed)).toBe('2026-02-08');
    expect(parseDate('Tomorrow', fixed)).toBe('2026-02-09');
  });

  it('crosses month and year boundaries', () => {
    expect(parseDate('tomorrow', '2025-12-31')).toBe('2026-01-01');
    expect(parseDate('yesterday', '2026-03-01')).toBe('2026-02-28');
  });

  // --- Relative dates ---

  it('parses +Nd for days', () => {
    expect(parseDate('+3d', fixed)).toBe('2026-02-11');
    expect(parseDate('+1d', fixed)).toBe('2026-02-09');
  });

  it('parses +Nw for weeks', () => {
    expect(parseDate('+2w', fixed)).toBe('2026-02-22');
    expect(parseDate('+1w', fixed)).toBe('2026-02-15');
  });

  it('parses +Nm for months, clamping to the month end', () => {
    expect(parseDate('+1m', fixed)).toBe('2026-03-08');
    expect(parseDate('+1m', '2026-01-31')).toBe('2026-02-28');
  });

  // --- Day of week ---

  it('parses weekday names as the next such day', () => {
    expect(parseDate('monday', fixed)).toBe('2026-02-09');
    expect(parseDate('fri', fixed)).toBe('2026-02-13');
  });

  it('treats today\'s weekday as next week', () => {
    expect(parseDate('sunday', fixed)).toBe('2026-02-15');
  });

  // --- Month + day ---

  it('parses month-day in the current year', () => {
    expect(parseDate('mar1', fixed)).toBe('2026-03-01');
    expect(parseDate('feb8', fixed)).toBe('2026-02-08');
  });

  it('rolls month-day in the past to next year', () => {
    expect(parseDate('jan15', fixed)).toBe('2027-01-15');
  });

  it('rejects impossible month-days', () => {
    expect(parseDate('feb30', fixed)).toBeNull();
  });

  // --- ISO ---

  it('accepts ISO dates as-is', () => {
    expect(parseDate('2026-03-01', fixed)).toBe('2026-03-01');
    expect(parseDate(' 2026-03-01 ', fixed)).toBe('2026-03-01');
  });

  it('rejects unknown input', () => {
    expect(parseDate('someday', fixed)).toBeNull();
    expect(parseDate('2026-02-30', fixed)).toBeNull();
  });
});

describe('isIsoDate', () => {
  it('accepts real calendar dates', () => {
    expect(isIsoDate('2024-02-29')).toBe(true);
    expect(isIsoDate('2025-09-09')).toBe(true);
  });

  it('rejects impossible or malformed dates', () => {
    expect(isIsoDate('2025-02-29')).toBe(false);
    expect(isIsoDate('2025-9-9')).toBe(false);
    expect(isIsoDate('2025-09-09T00:00:00Z')).toBe(false);
  });
});

describe('parseInstant', () => {
  it('normalises to UTC', () => {
    expect(parseInstant('2025-09-09T14:00:00-04:00')).toBe('2025-09-09T18:00:00.000Z');
    expect(parseInstant('2025-09-09T14:00:00Z')).toBe('2025-09-09T14:00:00.000Z');
  });

  it('requires a zone designator', () => {
    expect(parseInstant('2025-09-09T14:00:00')).toBeNull();
    expect(parseInstant('2025-09-09')).toBeNull();
  });

  it('rejects garbage', () => {
    expect(parseInstant('not a timeZ')).toBeNull();
  });
});

describe('parseClockTime', () => {
  it('parses 24-hour clock times', () => {
    expect(parseClockTime('09:30')).toEqual({ hours: 9, minutes: 30 });
    expect(parseClockTime('7:05')).toEqual({ hours: 7, minutes: 5 });
    expect(parseClockTime('23:59')).toEqual({ hours: 23, minutes: 59 });
  });

  it('rejects out-of-range values', () => {
    expect(parseClockTime('24:00')).toBeNull();
    expect(parseClockTime('12:60')).toBeNull();
    expect(parseClockTime('noon')).toBeNull();
  });
});
