import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createTestDb, setSetting, Priority } from '@taskline/core';
import type { TasklineDb, RequestContext } from '@taskline/core';
import {
  resolveRequestContext,
  resolveDbPath,
  parsePriorityArg,
  collect,
  buildDueInput,
  buildPositionHint,
  buildMoveRequest,
  parseVersion,
  parseIntegerArg,
  $try,
  DEFAULT_USER,
} from '../src/helpers.js';

describe('resolveRequestContext', () => {
  let db: TasklineDb;
  const env = { TASKLINE_USER: 'dave', TASKLINE_TZ: 'Asia/Tokyo' };

  beforeEach(() => {
    db = createTestDb();
  });

  it('prefers the flags', () => {
    setSetting(db, 'default_user', 'carol');
    expect(resolveRequestContext(db, { user: 'erin', tz: 'Europe/Berlin' }, env)).toEqual({
      ownerId: 'erin',
      timezone: 'Europe/Berlin',
    });
  });

  it('falls back to the config table', () => {
    setSetting(db, 'default_user', 'carol');
    setSetting(db, 'timezone', 'America/New_York');
    expect(resolveRequestContext(db, {}, env)).toEqual({ ownerId: 'carol', timezone: 'America/New_York' });
  });

  it('falls back to the environment', () => {
    expect(resolveRequestContext(db, {}, env)).toEqual({ ownerId: 'dave', timezone: 'Asia/Tokyo' });
  });

  it('ends at the built-in defaults', () => {
    expect(resolveRequestContext(db, {}, {})).toEqual({ ownerId: DEFAULT_USER, timezone: undefined });
  });

  it('passes an injected clock through', () => {
    const now = new Date('2025-09-10T02:00:00Z');
    expect(resolveRequestContext(db, { user: 'erin' }, {}, now).now).toBe(now);
  });
});

describe('resolveDbPath', () => {
  it('prefers --db, then TASKLINE_DB', () => {
    expect(resolveDbPath({ db: '/tmp/a.db' }, { TASKLINE_DB: '/tmp/b.db' })).toBe('/tmp/a.db');
    expect(resolveDbPath({}, { TASKLINE_DB: '/tmp/b.db' })).toBe('/tmp/b.db');
  });

  it('ends at the platform default', () => {
    expect(resolveDbPath({}, {})).toMatch(/taskline\.db$/);
  });
});

describe('parsePriorityArg', () => {
  it('parses names, numbers and p-prefixed numbers', () => {
    expect(parsePriorityArg('high')).toBe(Priority.High);
    expect(parsePriorityArg('HIGH')).toBe(Priority.High);
    expect(parsePriorityArg('2')).toBe(Priority.Medium);
    expect(parsePriorityArg('p3')).toBe(Priority.Low);
  });

  it('returns null for anything else', () => {
    expect(parsePriorityArg('urgent')).toBeNull();
  });
});

describe('collect', () => {
  it('accumulates repeated values', () => {
    expect(collect('b', collect('a'))).toEqual(['a', 'b']);
  });
});

describe('buildDueInput', () => {
  const ny: RequestContext = { ownerId: 'alice', timezone: 'America/New_York', now: new Date('2025-09-10T02:00:00Z') };

  it('resolves relative dates on the owner\'s calendar', () => {
    expect(buildDueInput('today', undefined, ny)).toMatchObject({ type: 'success', data: { date: '2025-09-09', time: null } });
  });

  it('reads the clock time on the owner\'s clock', () => {
    expect(buildDueInput('tomorrow', '09:30', ny)).toMatchObject({
      type: 'success',
      data: { date: '2025-09-10', time: '2025-09-10T13:30:00.000Z' },
    });
  });

  it('rejects unparseable input', () => {
    expect(buildDueInput('later', undefined, ny)).toEqual({ type: 'invalid-argument', message: 'Could not parse date: later' });
    expect(buildDueInput('today', '25:00', ny)).toEqual({
      type: 'invalid-argument',
      message: 'Could not parse time: 25:00. Use HH:mm',
    });
  });

  it('rejects an unknown timezone', () => {
    expect(buildDueInput('today', undefined, { ownerId: 'alice', timezone: 'Nowhere/City' })).toEqual({
      type: 'invalid-argument',
      message: 'Unknown timezone "Nowhere/City"',
    });
  });
});

describe('buildPositionHint', () => {
  it('maps each flag to a hint', () => {
    expect(buildPositionHint({ top: true })).toMatchObject({ data: { insertAtTop: true } });
    expect(buildPositionHint({ after: 'abc' })).toMatchObject({ data: { insertAfter: 'abc' } });
    expect(buildPositionHint({ position: '250' })).toMatchObject({ data: { position: 250 } });
    expect(buildPositionHint({})).toMatchObject({ type: 'success', data: undefined });
  });

  it('rejects combined flags and bad numbers', () => {
    expect(buildPositionHint({ top: true, after: 'abc' })).toEqual({
      type: 'invalid-argument',
      message: 'Use only one of --top, --after and --position',
    });
    expect(buildPositionHint({ position: '1.5' })).toEqual({ type: 'invalid-argument', message: 'Invalid position: 1.5' });
  });
});

describe('buildMoveRequest', () => {
  it('maps the flags to a move request', () => {
    expect(buildMoveRequest({ after: 'abc', overdue: true })).toMatchObject({
      type: 'success',
      data: { insertAfter: 'abc', scope: 'overdue' },
    });
    expect(buildMoveRequest({ top: true, expectVersion: '4' })).toMatchObject({
      data: { moveToTop: true, expectedVersion: 4 },
    });
  });

  it('rejects a bad version', () => {
    expect(buildMoveRequest({ top: true, expectVersion: 'x' })).toEqual({ type: 'invalid-argument', message: 'Invalid version: x' });
    expect(parseVersion('0').type).toBe('invalid-argument');
  });
});

describe('parseIntegerArg', () => {
  it('accepts whole numbers and leaves the range to the core', () => {
    expect(parseIntegerArg('3', 'page')).toMatchObject({ type: 'success', data: 3 });
    expect(parseIntegerArg('-1', 'page')).toMatchObject({ type: 'success', data: -1 });
  });

  it('names the option it could not parse', () => {
    expect(parseIntegerArg('two', 'size')).toEqual({ type: 'invalid-argument', message: 'Invalid size: two' });
    expect(parseIntegerArg('', 'page')).toEqual({ type: 'invalid-argument', message: 'Invalid page: ' });
    expect(parseIntegerArg('1.5', 'page').type).toBe('invalid-argument');
  });
});

describe('$try', () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  it('calls the wrapped function', async () => {
    const fn = vi.fn();
    await $try(fn);
    expect(fn).toHaveBeenCalledOnce();
  });

  it('catches errors and logs them', async () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    await $try(() => {
      throw new Error('test error');
    });
    expect(consoleSpy).toHaveBeenCalledOnce();
    expect(process.exitCode).toBe(1);
    consoleSpy.mockRestore();
  });

  it('catches rejected promises', async () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    await $try(async () => {
      throw new Error('async error');
    });
    expect(consoleSpy).toHaveBeenCalledOnce();
    consoleSpy.mockRestore();
  });
});
