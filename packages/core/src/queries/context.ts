import type { OwnerId, RequestContext } from '../types/task.js';
import type { DataResult } from '../types/results.js';
import { invalidArgument } from '../types/results.js';
import type { DayWindow } from '../temporal/day-window.js';
import { dayWindow, resolveTimezone } from '../temporal/day-window.js';

export interface ResolvedContext {
  readonly ownerId: OwnerId;
  readonly timezone: string;
  readonly now: Date;
  readonly window: DayWindow;
}

/** Validate the caller's identity and timezone and fix "now" for the operation */
export function resolveContext(ctx: RequestContext): DataResult<ResolvedContext> {
  const ownerId = ctx.ownerId.trim();
  if (!ownerId) return invalidArgument('An owner id is required');

  const tz = resolveTimezone(ctx.timezone);
  if (tz.type !== 'success') return tz;

  const now = ctx.now ?? new Date();
  return {
    type: 'success',
    data: { ownerId, timezone: tz.data, now, window: dayWindow(now, tz.data) },
    message: `Resolved context for ${ownerId}`,
  };
}
