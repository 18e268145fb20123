/**
 * CLI helpers: context resolution, argument parsing, error handling.
 */

import type { Command } from 'commander';
import type {
  TasklineDb, RequestContext, DueByInput, PositionHint, MoveRequest, DataResult,
  Priority as PriorityType,
} from '@taskline/core';
import {
  Priority, getDefaultUser, getDefaultTimezone, getDefaultDbPath, createDb,
  dayWindow, resolveTimezone, localInstant, parseDate, parseClockTime, invalidArgument,
} from '@taskline/core';
import * as out from './output.js';

export const DEFAULT_USER = 'local';

/** Options every command inherits from the program */
export type GlobalOptions = {
  user?: string;
  tz?: string;
  db?: string;
  verbose?: boolean;
};

export type Env = Record<string, string | undefined>;

/** An open database and the caller it acts for */
export interface Session {
  db: TasklineDb;
  context: RequestContext;
}

/**
 * Resolve the database path.
 * Priority: --db > TASKLINE_DB > platform default.
 */
export function resolveDbPath(opts: GlobalOptions, env: Env = process.env): string {
  return opts.db ?? env['TASKLINE_DB'] ?? getDefaultDbPath();
}

/**
 * Resolve who is asking and in which timezone.
 * Priority: flag > config table > environment > built-in default.
 */
export function resolveRequestContext(
  db: TasklineDb,
  opts: GlobalOptions,
  env: Env = process.env,
  now?: Date,
): RequestContext {
  const ownerId = opts.user ?? getDefaultUser(db) ?? env['TASKLINE_USER'] ?? DEFAULT_USER;
  const timezone = opts.tz ?? getDefaultTimezone(db) ?? env['TASKLINE_TZ'];
  return now ? { ownerId, timezone, now } : { ownerId, timezone };
}

export type SessionFactory = (cmd: Command) => Session;

/** Opens one connection per database path for the life of the process */
export function createSessionFactory(env: Env = process.env): SessionFactory {
  const open = new Map<string, TasklineDb>();
  return (cmd: Command) => {
    const g = cmd.optsWithGlobals<GlobalOptions>();
    out.setVerbose(g.verbose ?? false);

    const path = resolveDbPath(g, env);
    let db = open.get(path);
    if (!db) {
      out.debug(`Opening database ${path}`);
      db = createDb(path);
      open.set(path, db);
    }

    const context = resolveRequestContext(db, g, env);
    out.debug(`Acting as ${context.ownerId} (${context.timezone ?? 'UTC'})`);
    return { db, context };
  };
}

/**
 * Parse a priority string into a Priority value, or null if unrecognised.
 */
export function parsePriorityArg(level: string): PriorityType | null {
  switch (level.toLowerCase()) {
    case 'high': case '1': case 'p1': return Priority.High;
    case 'medium': case '2': case 'p2': return Priority.Medium;
    case 'low': case '3': case 'p3': return Priority.Low;
    default: return null;
  }
}

/** Commander accumulator for repeatable options */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/** The owner's today, for resolving relative dates */
export function todayFor(context: RequestContext): DataResult<string> {
  const tz = resolveTimezone(context.timezone);
  if (tz.type !== 'success') return tz;
  const today = dayWindow(context.now ?? new Date(), tz.data).today;
  return { type: 'success', data: today, message: today };
}

/**
 * Turn a date argument and an optional HH:mm into a due descriptor.
 * The clock time is read on the owner's clock and stored as a UTC instant.
 */
export function buildDueInput(
  dateArg: string,
  at: string | undefined,
  context: RequestContext,
): DataResult<DueByInput> {
  const today = todayFor(context);
  if (today.type !== 'success') return today;

  const date = parseDate(dateArg, today.data);
  if (!date) return invalidArgument(`Could not parse date: ${dateArg}`);
  if (at === undefined) return { type: 'success', data: { date, time: null }, message: date };

  const clock = parseClockTime(at);
  if (!clock) return invalidArgument(`Could not parse time: ${at}. Use HH:mm`);

  const tz = resolveTimezone(context.timezone);
  if (tz.type !== 'success') return tz;
  const time = localInstant(date, clock.hours, clock.minutes, tz.data).toISOString();
  return { type: 'success', data: { date, time }, message: `${date} ${at}` };
}

export interface PlacementOptions {
  top?: boolean;
  after?: string;
  position?: string;
}

/** Placement flags of `add` as a position hint; undefined means the bucket's end */
export function buildPositionHint(opts: PlacementOptions): DataResult<PositionHint | undefined> {
  const given = [opts.top === true, opts.after !== undefined, opts.position !== undefined].filter(Boolean).length;
  if (given > 1) return invalidArgument('Use only one of --top, --after and --position');

  if (opts.top) return { type: 'success', data: { insertAtTop: true }, message: 'top' };
  if (opts.after !== undefined) return { type: 'success', data: { insertAfter: opts.after }, message: 'after' };
  if (opts.position !== undefined) {
    const position = Number(opts.position);
    if (!Number.isSafeInteger(position)) return invalidArgument(`Invalid position: ${opts.position}`);
    return { type: 'success', data: { position }, message: 'position' };
  }
  return { type: 'success', data: undefined, message: 'end of bucket' };
}

export interface MoveOptions {
  after?: string;
  before?: string;
  top?: boolean;
  bottom?: boolean;
  overdue?: boolean;
  expectVersion?: string;
}

/** Flags of `move` as a move request; validation of the strategy count is left to the core */
export function buildMoveRequest(opts: MoveOptions): DataResult<MoveRequest> {
  const request: MoveRequest = {
    insertAfter: opts.after,
    insertBefore: opts.before,
    moveToTop: opts.top,
    moveToBottom: opts.bottom,
    scope: opts.overdue ? 'overdue' : undefined,
  };
  if (opts.expectVersion === undefined) return { type: 'success', data: request, message: 'move' };

  const expectedVersion = parseVersion(opts.expectVersion);
  if (expectedVersion.type !== 'success') return expectedVersion;
  return { type: 'success', data: { ...request, expectedVersion: expectedVersion.data }, message: 'move' };
}

/** Whole-number option such as --page; range checks are left to the core */
export function parseIntegerArg(value: string, label: string): DataResult<number> {
  const n = Number(value);
  if (value.trim() === '' || !Number.isSafeInteger(n)) return invalidArgument(`Invalid ${label}: ${value}`);
  return { type: 'success', data: n, message: value };
}

export function parseVersion(value: string): DataResult<number> {
  const version = Number(value);
  if (!Number.isSafeInteger(version) || version < 1) return invalidArgument(`Invalid version: ${value}`);
  return { type: 'success', data: version, message: value };
}

/**
 * Run a command body, printing any thrown error instead of a stack trace.
 */
export async function $try(fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
