import { eq, and, or, gt, gte, lt, lte, isNull, isNotNull, desc } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { TasklineDb } from '../db.js';
import type { Task, OwnerId, RequestContext } from '../types/task.js';
import type { Priority } from '../types/priority.js';
import type { View } from '../types/view.js';
import { VIEW_NAMES } from '../types/view.js';
import type { DataResult } from '../types/results.js';
import { invalidArgument } from '../types/results.js';
import type { DayWindow } from '../temporal/day-window.js';
import { classifyTask, isCompletedToday } from '../temporal/classifier.js';
import { assignOverduePositions } from '../ordering/overdue-assigner.js';
import { tasks } from '../schema/tasks.js';
import { toTask, compareCreation } from './task-helpers.js';
import { resolveContext } from './context.js';
import type { ResolvedContext } from './context.js';
import { transact } from './transaction.js';
import { getOverdueCandidates } from './task-store.js';

export interface ListOptions {
  view?: View;
  /** Completion state to list; ignored by the today view */
  completed?: boolean;
  /** Only honoured without a view */
  priority?: Priority;
  /** Only honoured without a view */
  tag?: string;
  /** 0-based page of the ordered list */
  page?: number;
  size?: number;
}

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export interface TaskPage {
  readonly tasks: Task[];
  /** Matching tasks across all pages */
  readonly total: number;
  readonly page: number;
  readonly size: number;
}

export function validatePaging(page = 0, size = DEFAULT_PAGE_SIZE): DataResult<{ page: number; size: number }> {
  if (!Number.isSafeInteger(page) || page < 0) {
    return invalidArgument(`Page must be a non-negative integer, got ${page}`);
  }
  if (!Number.isSafeInteger(size) || size < 1 || size > MAX_PAGE_SIZE) {
    return invalidArgument(`Size must be an integer between 1 and ${MAX_PAGE_SIZE}, got ${size}`);
  }
  return { type: 'success', data: { page, size }, message: `Page ${page} of size ${size}` };
}

/** Map a view name from the outside world to a view; absent means `all` */
export function parseView(name: string | null | undefined): DataResult<View> {
  if (name == null) return { type: 'success', data: { kind: 'all' }, message: 'View all' };
  switch (name) {
    case 'inbox':
    case 'today':
    case 'upcoming':
      return { type: 'success', data: { kind: name }, message: `View ${name}` };
    default:
      return invalidArgument(`Invalid view "${name}". Valid values: ${VIEW_NAMES.join(', ')}`);
  }
}

function completedFlag(completed: boolean) {
  return eq(tasks.completed, completed ? 1 : 0);
}

function completedWithin(window: DayWindow) {
  return and(
    eq(tasks.completed, 1),
    gte(tasks.completedOnTime, window.start.toISOString()),
    lt(tasks.completedOnTime, window.end.toISOString()),
  );
}

/**
 * SQL predicate selecting a view's candidate rows.
 * Instant comparisons rely on ISO-8601 UTC strings sorting chronologically.
 */
export function buildViewFilter(
  view: View,
  ownerId: OwnerId,
  window: DayWindow,
  completed: boolean,
): SQL | undefined {
  const owner = eq(tasks.ownerId, ownerId);

  switch (view.kind) {
    case 'all':
      return and(owner, completedFlag(completed));
    case 'inbox':
      return and(
        owner,
        isNull(tasks.dueDate),
        isNull(tasks.projectId),
        or(completedFlag(completed), completedWithin(window)),
      );
    case 'today':
      return and(
        owner,
        or(
          lte(tasks.dueDate, window.today),
          and(isNotNull(tasks.dueTime), lt(tasks.dueTime, window.end.toISOString())),
          completedWithin(window),
        ),
      );
    case 'upcoming':
      return and(
        owner,
        completedFlag(completed),
        or(
          gt(tasks.dueDate, window.today),
          and(isNotNull(tasks.dueTime), gte(tasks.dueTime, window.end.toISOString())),
        ),
      );
  }
}

function byPosition(a: Task, b: Task): number {
  return a.position - b.position || compareCreation(a, b);
}

function byOverduePosition(a: Task, b: Task): number {
  const pa = a.overduePosition ?? Number.MAX_SAFE_INTEGER;
  const pb = b.overduePosition ?? Number.MAX_SAFE_INTEGER;
  return pa - pb || compareCreation(a, b);
}

function byDueInstant(a: Task, b: Task): number {
  const da = a.dueBy?.date ?? '';
  const db = b.dueBy?.date ?? '';
  if (da !== db) return da.localeCompare(db);
  const ta = a.dueBy?.time ?? null;
  const tb = b.dueBy?.time ?? null;
  if (ta !== tb) {
    if (ta === null) return -1;
    if (tb === null) return 1;
    return ta.localeCompare(tb);
  }
  return byPosition(a, b);
}

function newestFirst(a: Task, b: Task): number {
  return b.createdAt.localeCompare(a.createdAt) || a.id.localeCompare(b.id);
}

/** Overdue tasks with positions assigned, in overdue order */
function overdueInOrder(db: TasklineDb, ctx: ResolvedContext): DataResult<Task[]> {
  const assigned = assignOverduePositions(db, getOverdueCandidates(db, ctx.ownerId, ctx.window), ctx.now);
  if (assigned.type !== 'success') return assigned;
  return { type: 'success', data: [...assigned.data].sort(byOverduePosition), message: `${assigned.data.length} overdue task(s)` };
}

function listToday(db: TasklineDb, ctx: ResolvedContext, candidates: Task[]): DataResult<Task[]> {
  const overdue = overdueInOrder(db, ctx);
  if (overdue.type !== 'success') return overdue;

  const rest = candidates
    .filter(t => classifyTask(t, ctx.window) === 'due-today' || isCompletedToday(t, ctx.window))
    .sort(byPosition);

  const list = [...overdue.data, ...rest];
  return { type: 'success', data: list, message: `Found ${list.length} task(s) for today` };
}

/** The whole ordered list of a view; runs inside the caller's transaction */
function orderedList(db: TasklineDb, ctx: ResolvedContext, options: ListOptions): DataResult<Task[]> {
  const view: View = options.view ?? { kind: 'all' };
  const completed = options.completed ?? false;

  let where = buildViewFilter(view, ctx.ownerId, ctx.window, completed);
  if (view.kind === 'all' && options.priority) {
    where = and(where, eq(tasks.priority, options.priority));
  }
  const candidates = db.select().from(tasks).where(where).orderBy(desc(tasks.createdAt)).all().map(toTask);

  if (view.kind === 'today') return listToday(db, ctx, candidates);
  const list = refine(view, ctx, candidates, completed, options.tag);
  return { type: 'success', data: list, message: `Found ${list.length} task(s)` };
}

/**
 * One page of a view's ordered list.
 * The page is cut after ordering, and after the overdue assigner has run
 * for the today view, so every overdue task gets a position.
 */
export function listPage(db: TasklineDb, context: RequestContext, options: ListOptions = {}): DataResult<TaskPage> {
  const resolved = resolveContext(context);
  if (resolved.type !== 'success') return resolved;
  const ctx = resolved.data;

  const paging = validatePaging(options.page, options.size);
  if (paging.type !== 'success') return paging;
  const { page, size } = paging.data;

  return transact<TaskPage>(db, () => {
    const ordered = orderedList(db, ctx, options);
    if (ordered.type !== 'success') return ordered;
    const total = ordered.data.length;
    const pageTasks = ordered.data.slice(page * size, (page + 1) * size);
    return {
      type: 'success',
      data: { tasks: pageTasks, total, page, size },
      message: `Showing ${pageTasks.length} of ${total} task(s)`,
    };
  });
}

/** List an owner's tasks through one of the views, one page at a time */
export function listByView(db: TasklineDb, context: RequestContext, options: ListOptions = {}): DataResult<Task[]> {
  const listed = listPage(db, context, options);
  if (listed.type !== 'success') return listed;
  return { type: 'success', data: listed.data.tasks, message: listed.message };
}

function refine(
  view: Exclude<View, { kind: 'today' }>,
  ctx: ResolvedContext,
  candidates: Task[],
  completed: boolean,
  tag: string | undefined,
): Task[] {
  switch (view.kind) {
    case 'all': {
      const wanted = tag?.trim();
      const list = wanted ? candidates.filter(t => t.tags.includes(wanted)) : [...candidates];
      return list.sort(newestFirst);
    }
    case 'inbox':
      return candidates
        .filter(t => classifyTask(t, ctx.window) === 'inbox')
        .filter(t => t.completed === completed || isCompletedToday(t, ctx.window))
        .sort(byPosition);
    case 'upcoming':
      return candidates
        .filter(t => classifyTask(t, ctx.window) === 'upcoming')
        .sort(byDueInstant);
  }
}

/** The owner's overdue tasks alone, in overdue order */
export function listOverdue(db: TasklineDb, context: RequestContext): DataResult<Task[]> {
  const resolved = resolveContext(context);
  if (resolved.type !== 'success') return resolved;
  const ctx = resolved.data;
  return transact(db, () => overdueInOrder(db, ctx));
}
