import { describe, it, expect } from 'vitest';
import {
  dayWindow, resolveTimezone, isValidTimezone, localDate, localInstant, isWithin,
} from '../../src/temporal/day-window.js';

describe('dayWindow', () => {
  it('uses the owner\'s calendar day, not the server\'s', () => {
    // 22:00 on the 9th in New York is already the 10th in UTC
    const w = dayWindow(new Date('2025-09-10T02:00:00Z'), 'America/New_York');
    expect(w.today).toBe('2025-09-09');
    expect(w.start.toISOString()).toBe('2025-09-09T04:00:00.000Z');
    expect(w.end.toISOString()).toBe('2025-09-10T04:00:00.000Z');
  });

  it('is the UTC day for UTC', () => {
    const w = dayWindow(new Date('2025-09-10T02:00:00Z'), 'UTC');
    expect(w.today).toBe('2025-09-10');
    expect(w.start.toISOString()).toBe('2025-09-10T00:00:00.000Z');
    expect(w.end.toISOString()).toBe('2025-09-11T00:00:00.000Z');
  });

  it('spans 25 hours on the day clocks fall back', () => {
    const w = dayWindow(new Date('2025-11-02T12:00:00Z'), 'America/New_York');
    expect(w.today).toBe('2025-11-02');
    expect(w.start.toISOString()).toBe('2025-11-02T04:00:00.000Z');
    expect(w.end.toISOString()).toBe('2025-11-03T05:00:00.000Z');
  });
});

describe('resolveTimezone', () => {
  it('defaults absent or blank zones to UTC', () => {
    expect(resolveTimezone(undefined)).toMatchObject({ type: 'success', data: 'UTC' });
    expect(resolveTimezone('  ')).toMatchObject({ type: 'success', data: 'UTC' });
  });

  it('accepts IANA names', () => {
    expect(resolveTimezone('Asia/Tokyo')).toMatchObject({ type: 'success', data: 'Asia/Tokyo' });
    expect(isValidTimezone('Europe/Berlin')).toBe(true);
  });

  it('rejects unknown zones', () => {
    expect(resolveTimezone('Mars/Olympus')).toEqual({
      type: 'invalid-argument',
      message: 'Unknown timezone "Mars/Olympus"',
    });
  });
});

describe('localDate and localInstant', () => {
  it('dates an instant in the given zone', () => {
    expect(localDate(new Date('2025-09-10T02:00:00Z'), 'America/New_York')).toBe('2025-09-09');
    expect(localDate(new Date('2025-09-10T02:00:00Z'), 'Asia/Tokyo')).toBe('2025-09-10');
  });

  it('turns a wall-clock time into an instant', () => {
    expect(localInstant('2025-09-09', 14, 0, 'America/New_York').toISOString()).toBe('2025-09-09T18:00:00.000Z');
    expect(localInstant('2025-01-15', 9, 30, 'UTC').toISOString()).toBe('2025-01-15T09:30:00.000Z');
  });
});

describe('isWithin', () => {
  const w = dayWindow(new Date('2025-09-10T02:00:00Z'), 'America/New_York');

  it('includes the start and excludes the end', () => {
    expect(isWithin(new Date('2025-09-09T04:00:00Z'), w)).toBe(true);
    expect(isWithin(new Date('2025-09-10T03:59:59Z'), w)).toBe(true);
    expect(isWithin(new Date('2025-09-10T04:00:00Z'), w)).toBe(false);
    expect(isWithin(new Date('2025-09-09T03:59:59Z'), w)).toBe(false);
  });
});
