/**
 * Task CRUD scoped to an owner.
 * Every operation resolves the caller's context, runs in one immediate
 * transaction and touches exactly one task record.
 */

import { eq } from 'drizzle-orm';
import type { TasklineDb } from '../db.js';
import type { Task, TaskId, DueBy, TimeMode, RequestContext, ProjectId } from '../types/task.js';
import type { Priority } from '../types/priority.js';
import { isPriority } from '../types/priority.js';
import type { DataResult, TaskResult } from '../types/results.js';
import { invalidArgument, conflict } from '../types/results.js';
import { tasks } from '../schema/tasks.js';
import { allocatePosition } from '../ordering/position-allocator.js';
import type { Placement } from '../ordering/position-allocator.js';
import { bucketOf, bucketKey, sameBucket } from '../ordering/buckets.js';
import { classifyTask, isCompletedToday } from '../temporal/classifier.js';
import { isIsoDate, parseInstant } from '../parsers/date-parser.js';
import { resolveContext } from './context.js';
import type { ResolvedContext } from './context.js';
import { transact } from './transaction.js';
import {
  requireOwnedTask, insertTask, saveTask, nextTaskId, deleteTaskRow, getBucketEntries,
} from './task-store.js';
import { toTask, normalizeTags, stampCompletion } from './task-helpers.js';

export const MAX_TITLE_LENGTH = 255;
export const MAX_DESCRIPTION_LENGTH = 2000;

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

/** Due descriptor as supplied by a caller; mode defaults to fixed */
export interface DueByInput {
  date: string;
  time?: string | null;
  mode?: TimeMode;
}

/** Where a created or re-bucketed task lands; the default is the bucket's end */
export type PositionHint =
  | { position: number }
  | { insertAfter: TaskId }
  | { insertAtTop: true };

export interface CreateTaskInput {
  title: string;
  description?: string | null;
  priority?: Priority;
  tags?: string[];
  projectId?: ProjectId | null;
  dueBy?: DueByInput | null;
  positionHint?: PositionHint;
}

export interface UpdateTaskInput {
  title?: string;
  description?: string | null;
  priority?: Priority;
  tags?: string[];
  /** null moves the task out of its project */
  projectId?: ProjectId | null;
  /** null clears the due date */
  dueBy?: DueByInput | null;
  completed?: boolean;
  positionHint?: PositionHint;
  /** Reject the update with a conflict if the stored version differs */
  expectedVersion?: number;
}

export interface TaskStats {
  total: number;
  completed: number;
  pending: number;
  overdue: number;
  dueToday: number;
  completedToday: number;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateTitle(title: string): DataResult<string> {
  const trimmed = title.trim();
  if (!trimmed) return invalidArgument('Title is required');
  if (trimmed.length > MAX_TITLE_LENGTH) {
    return invalidArgument(`Title must be at most ${MAX_TITLE_LENGTH} characters`);
  }
  return { type: 'success', data: trimmed, message: 'Valid title' };
}

function validateDescription(description: string | null | undefined): DataResult<string | null> {
  const value = description && description.trim() ? description : null;
  if (value && value.length > MAX_DESCRIPTION_LENGTH) {
    return invalidArgument(`Description must be at most ${MAX_DESCRIPTION_LENGTH} characters`);
  }
  return { type: 'success', data: value, message: 'Valid description' };
}

function validatePriority(priority: string): DataResult<Priority> {
  if (!isPriority(priority)) return invalidArgument(`Invalid priority "${priority}". Valid values: LOW, MEDIUM, HIGH`);
  return { type: 'success', data: priority, message: 'Valid priority' };
}

/** Validate a due descriptor; floating time is reserved and rejected */
export function validateDueBy(input: DueByInput): DataResult<DueBy> {
  if (!isIsoDate(input.date)) {
    return invalidArgument(`Malformed due date "${input.date}". Expected yyyy-MM-dd`);
  }
  const mode = input.mode ?? 'fixed';
  if (mode !== 'fixed') {
    return invalidArgument(`Time mode "${mode}" is not supported yet. Use "fixed"`);
  }
  let time: string | null = null;
  if (input.time != null) {
    time = parseInstant(input.time);
    if (!time) return invalidArgument(`Malformed due time "${input.time}". Expected an ISO-8601 instant`);
  }
  return { type: 'success', data: { date: input.date, time, mode }, message: 'Valid due date' };
}

function sameDue(a: DueBy | null, b: DueBy | null): boolean {
  if (!a || !b) return a === b;
  return a.date === b.date && a.time === b.time && a.mode === b.mode;
}

// ---------------------------------------------------------------------------
// Placement
// ---------------------------------------------------------------------------

/**
 * Position for a task in its (new) bucket according to a hint.
 * An insertAfter reference must already sit in the same bucket.
 */
function placeByHint(
  db: TasklineDb,
  ctx: ResolvedContext,
  task: Task,
  hint: PositionHint | undefined,
): DataResult<number> {
  const bucket = bucketOf(task);
  const entries = getBucketEntries(db, ctx.ownerId, bucket, ctx.window, task.id);
  let placement: Placement = { type: 'bottom' };

  if (hint && 'position' in hint) {
    if (!Number.isSafeInteger(hint.position)) {
      return invalidArgument(`Position must be an integer, got ${hint.position}`);
    }
    return { type: 'success', data: hint.position, message: 'Exact position' };
  }
  if (hint && 'insertAtTop' in hint) {
    placement = { type: 'top' };
  }
  if (hint && 'insertAfter' in hint) {
    if (hint.insertAfter === task.id) return invalidArgument('A task cannot be placed relative to itself');
    const ref = requireOwnedTask(db, ctx.ownerId, hint.insertAfter);
    if (ref.type !== 'success') return ref;
    if (!sameBucket(bucket, bucketOf(ref.data))) {
      return invalidArgument(
        `Bucket mismatch: task would be in ${bucketKey(bucket)} but reference task ${ref.data.id} is in ${bucketKey(bucketOf(ref.data))}`,
      );
    }
    placement = { type: 'after', ref: { id: ref.data.id, position: ref.data.position } };
  }

  const position = allocatePosition(entries, placement);
  return { type: 'success', data: position, message: `Placed at ${position} in ${bucketKey(bucket)}` };
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

/** Create a task for the caller; appended to its bucket unless a hint says otherwise */
export function createTask(db: TasklineDb, context: RequestContext, input: CreateTaskInput): DataResult<Task> {
  const resolved = resolveContext(context);
  if (resolved.type !== 'success') return resolved;
  const ctx = resolved.data;

  const title = validateTitle(input.title);
  if (title.type !== 'success') return title;
  const description = validateDescription(input.description);
  if (description.type !== 'success') return description;
  const priority = validatePriority(input.priority ?? 'MEDIUM');
  if (priority.type !== 'success') return priority;
  let dueBy: DueBy | null = null;
  if (input.dueBy) {
    const due = validateDueBy(input.dueBy);
    if (due.type !== 'success') return due;
    dueBy = due.data;
  }

  return transact(db, () => {
    const nowIso = ctx.now.toISOString();
    const draft: Task = {
      id: nextTaskId(db),
      ownerId: ctx.ownerId,
      title: title.data,
      description: description.data,
      priority: priority.data,
      projectId: input.projectId?.trim() || null,
      tags: normalizeTags(input.tags ?? []),
      completed: false,
      dueBy,
      position: 0,
      overduePosition: null,
      completedOn: null,
      version: 1,
      createdAt: nowIso,
      updatedAt: nowIso,
    };

    const position = placeByHint(db, ctx, draft, input.positionHint);
    if (position.type !== 'success') return position;

    const task: Task = { ...draft, position: position.data };
    insertTask(db, task);
    return { type: 'success', data: task, message: `Task ${task.id} saved to ${bucketKey(bucketOf(task))}` };
  });
}

/**
 * Update a task's fields.
 * Completing stamps completedOn in the caller's timezone; reopening clears it.
 * A bucket change appends to the new bucket unless a hint is given.
 */
export function updateTask(
  db: TasklineDb,
  context: RequestContext,
  taskId: TaskId,
  input: UpdateTaskInput,
): DataResult<Task> {
  const resolved = resolveContext(context);
  if (resolved.type !== 'success') return resolved;
  const ctx = resolved.data;

  return transact(db, () => {
    const loaded = requireOwnedTask(db, ctx.ownerId, taskId);
    if (loaded.type !== 'success') return loaded;
    const task = loaded.data;

    if (input.expectedVersion != null && input.expectedVersion !== task.version) {
      return conflict(taskId, `Task ${taskId} is at version ${task.version}, not ${input.expectedVersion}; reload it and retry`);
    }

    let next: Task = { ...task };

    if (input.title !== undefined) {
      const title = validateTitle(input.title);
      if (title.type !== 'success') return title;
      next = { ...next, title: title.data };
    }
    if (input.description !== undefined) {
      const description = validateDescription(input.description);
      if (description.type !== 'success') return description;
      next = { ...next, description: description.data };
    }
    if (input.priority !== undefined) {
      const priority = validatePriority(input.priority);
      if (priority.type !== 'success') return priority;
      next = { ...next, priority: priority.data };
    }
    if (input.tags !== undefined) {
      next = { ...next, tags: normalizeTags(input.tags) };
    }
    if (input.projectId !== undefined) {
      next = { ...next, projectId: input.projectId?.trim() || null };
    }
    if (input.dueBy !== undefined) {
      let dueBy: DueBy | null = null;
      if (input.dueBy) {
        const due = validateDueBy(input.dueBy);
        if (due.type !== 'success') return due;
        dueBy = due.data;
      }
      next = { ...next, dueBy };
    }

    if (input.completed === true && !task.completed) {
      next = { ...next, completed: true, completedOn: stampCompletion(ctx.now, ctx.timezone) };
    } else if (input.completed === false && task.completed) {
      next = { ...next, completed: false, completedOn: null };
    }

    // A stale overdue position would resurface if the task became overdue again
    if (next.completed || !sameDue(task.dueBy, next.dueBy)) {
      next = { ...next, overduePosition: null };
    }

    const movedBucket = !sameBucket(bucketOf(task), bucketOf(next));
    if (input.positionHint || movedBucket) {
      const position = placeByHint(db, ctx, next, input.positionHint);
      if (position.type !== 'success') return position;
      next = { ...next, position: position.data };
    }

    const saved = saveTask(db, next, ctx.now);
    if (saved.type !== 'success') return saved;
    return { type: 'success', data: saved.data, message: `Updated task ${taskId}` };
  });
}

/** Mark a task complete */
export function completeTask(db: TasklineDb, context: RequestContext, taskId: TaskId): DataResult<Task> {
  return updateTask(db, context, taskId, { completed: true });
}

/** Mark a task incomplete */
export function reopenTask(db: TasklineDb, context: RequestContext, taskId: TaskId): DataResult<Task> {
  return updateTask(db, context, taskId, { completed: false });
}

/** Get one of the caller's tasks */
export function getTask(db: TasklineDb, context: RequestContext, taskId: TaskId): DataResult<Task> {
  const resolved = resolveContext(context);
  if (resolved.type !== 'success') return resolved;
  return requireOwnedTask(db, resolved.data.ownerId, taskId);
}

/** Delete one of the caller's tasks permanently */
export function deleteTask(db: TasklineDb, context: RequestContext, taskId: TaskId): TaskResult {
  const resolved = resolveContext(context);
  if (resolved.type !== 'success') return resolved;
  const ctx = resolved.data;

  const result = transact(db, () => {
    const loaded = requireOwnedTask(db, ctx.ownerId, taskId);
    if (loaded.type !== 'success') return loaded;
    deleteTaskRow(db, taskId);
    return { type: 'success', data: taskId, message: `Deleted task ${taskId}` };
  });
  return result.type === 'success' ? { type: 'success', message: result.message } : result;
}

/** Counts over the caller's tasks, classified against their current day */
export function getStats(db: TasklineDb, context: RequestContext): DataResult<TaskStats> {
  const resolved = resolveContext(context);
  if (resolved.type !== 'success') return resolved;
  const ctx = resolved.data;

  const owned = db.select().from(tasks).where(eq(tasks.ownerId, ctx.ownerId)).all().map(toTask);
  const stats: TaskStats = {
    total: owned.length, completed: 0, pending: 0, overdue: 0, dueToday: 0, completedToday: 0,
  };
  for (const t of owned) {
    if (t.completed) stats.completed++;
    else stats.pending++;
    const cls = classifyTask(t, ctx.window);
    if (cls === 'overdue') stats.overdue++;
    if (cls === 'due-today') stats.dueToday++;
    if (isCompletedToday(t, ctx.window)) stats.completedToday++;
  }
  return { type: 'success', data: stats, message: `${stats.total} task(s)` };
}
