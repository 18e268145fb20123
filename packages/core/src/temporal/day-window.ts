/**
 * Wall-clock day boundaries in the owner's timezone.
 * "Today" is always the owner's day, never the server's.
 */

import { TZDate } from '@date-fns/tz';
import { addDays, format, startOfDay } from 'date-fns';
import type { DataResult } from '../types/results.js';
import { invalidArgument } from '../types/results.js';

export const DEFAULT_TIMEZONE = 'UTC';

export interface DayWindow {
  readonly timezone: string;
  /** yyyy-MM-dd of the owner's current day */
  readonly today: string;
  /** Inclusive start of the owner's day */
  readonly start: Date;
  /** Exclusive end of the owner's day (next local midnight) */
  readonly end: Date;
}

export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/** Absent or blank zones fall back to UTC; unknown zones are rejected */
export function resolveTimezone(timezone: string | null | undefined): DataResult<string> {
  const tz = timezone?.trim();
  if (!tz) return { type: 'success', data: DEFAULT_TIMEZONE, message: 'Using default timezone' };
  if (!isValidTimezone(tz)) return invalidArgument(`Unknown timezone "${tz}"`);
  return { type: 'success', data: tz, message: `Using timezone ${tz}` };
}

export function dayWindow(now: Date, timezone: string): DayWindow {
  const local = new TZDate(now.getTime(), timezone);
  const start = startOfDay(local);
  // addDays on a TZDate lands on the next local midnight, so DST days are 23h or 25h
  const end = addDays(start, 1);
  return {
    timezone,
    today: format(local, 'yyyy-MM-dd'),
    start: new Date(start.getTime()),
    end: new Date(end.getTime()),
  };
}

/** Calendar date of an instant in the given zone */
export function localDate(instant: Date, timezone: string): string {
  return format(new TZDate(instant.getTime(), timezone), 'yyyy-MM-dd');
}

/** The instant at which a local date and HH:mm occur in the given zone */
export function localInstant(date: string, hours: number, minutes: number, timezone: string): Date {
  const [y, m, d] = date.split('-').map(Number);
  const local = new TZDate(0, timezone);
  local.setFullYear(y ?? 1970, (m ?? 1) - 1, d ?? 1);
  local.setHours(hours, minutes, 0, 0);
  return new Date(local.getTime());
}

export function isWithin(instant: Date, window: DayWindow): boolean {
  const t = instant.getTime();
  return t >= window.start.getTime() && t < window.end.getTime();
}
