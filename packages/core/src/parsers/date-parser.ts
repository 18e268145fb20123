/**
 * Parses human-friendly date strings into yyyy-MM-dd format.
 * Supports: today, tomorrow, yesterday, relative (+3d/+2w/+1m),
 * day-of-week names (mon-sunday), month+day (jan15), and ISO format.
 *
 * Relative forms are resolved against a caller-supplied "today" so the
 * owner's timezone, not the server's, decides what tomorrow is.
 */

import { addDays, addMonths, format, getDay, isValid, parseISO, setYear } from 'date-fns';

const RELATIVE_RE = /^\+(\d+)([dwm])$/;
const MONTH_DAY_RE = /^(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)(\d{1,2})$/;
/** yyyy-MM-dd pattern */
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
/** HH:mm, 24-hour */
const CLOCK_RE = /^([01]?\d|2[0-3]):([0-5]\d)$/;

const DAY_MAP: Record<string, number> = {
  sun: 0, sunday: 0,
  mon: 1, monday: 1,
  tue: 2, tuesday: 2,
  wed: 3, wednesday: 3,
  thu: 4, thursday: 4,
  fri: 5, friday: 5,
  sat: 6, saturday: 6,
};

const MONTH_MAP: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3,
  may: 4, jun: 5, jul: 6, aug: 7,
  sep: 8, oct: 9, nov: 10, dec: 11,
};

/** Format a Date as yyyy-MM-dd */
export function formatDate(d: Date): string {
  return format(d, 'yyyy-MM-dd');
}

/** True for a real calendar date in yyyy-MM-dd form (rejects 2026-02-30) */
export function isIsoDate(input: string): boolean {
  if (!ISO_DATE_RE.test(input)) return false;
  const d = parseISO(input);
  return isValid(d) && formatDate(d) === input;
}

/**
 * Parse an ISO-8601 instant and normalise it to UTC `toISOString()` form.
 * A zone designator is required so the instant is unambiguous.
 */
export function parseInstant(input: string): string | null {
  const trimmed = input.trim();
  if (!/(Z|[+-]\d{2}:?\d{2})$/i.test(trimmed)) return null;
  const d = parseISO(trimmed);
  return isValid(d) ? d.toISOString() : null;
}

/** Parse HH:mm into hours and minutes */
export function parseClockTime(input: string): { hours: number; minutes: number } | null {
  const m = CLOCK_RE.exec(input.trim());
  if (!m) return null;
  return { hours: Number(m[1]), minutes: Number(m[2]) };
}

function tryParseRelative(input: string, today: Date): string | null {
  const m = RELATIVE_RE.exec(input);
  if (!m) return null;

  const count = Number(m[1]);
  switch (m[2]) {
    case 'd': return formatDate(addDays(today, count));
    case 'w': return formatDate(addDays(today, count * 7));
    case 'm': return formatDate(addMonths(today, count));
    default: return null;
  }
}

function tryParseDayOfWeek(input: string, today: Date): string | null {
  const target = DAY_MAP[input];
  if (target === undefined) return null;

  let daysUntil = (target - getDay(today) + 7) % 7;
  if (daysUntil === 0) daysUntil = 7; // Next week if today
  return formatDate(addDays(today, daysUntil));
}

function tryParseMonthDay(input: string, today: Date): string | null {
  const m = MONTH_DAY_RE.exec(input);
  if (!m || m[1] === undefined) return null;

  const month = MONTH_MAP[m[1]];
  if (month === undefined) return null;
  const day = Number(m[2]);

  const candidate = `${today.getFullYear()}-${String(month + 1).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
  if (!isIsoDate(candidate)) return null; // e.g. feb30

  // If the date is in the past, use next year
  if (candidate < formatDate(today)) {
    return formatDate(setYear(parseISO(candidate), today.getFullYear() + 1));
  }
  return candidate;
}

/**
 * Parse a human-friendly date string into yyyy-MM-dd format.
 * Returns null if the input can't be parsed.
 *
 * @param input - Date string (e.g. "today", "+3d", "friday", "jan15", "2026-03-01")
 * @param todayStr - The caller's current date as yyyy-MM-dd
 */
export function parseDate(input: string | null | undefined, todayStr: string): string | null {
  if (!input?.trim()) return null;
  if (!isIsoDate(todayStr)) return null;

  const today = parseISO(todayStr);
  const normalized = input.trim().toLowerCase();

  switch (normalized) {
    case 'today': return todayStr;
    case 'tomorrow': return formatDate(addDays(today, 1));
    case 'yesterday': return formatDate(addDays(today, -1));
    default:
      return tryParseRelative(normalized, today)
        ?? tryParseDayOfWeek(normalized, today)
        ?? tryParseMonthDay(normalized, today)
        ?? (isIsoDate(input.trim()) ? input.trim() : null);
  }
}
