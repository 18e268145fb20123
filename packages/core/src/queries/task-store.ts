/**
 * Row-level reads and writes shared by the task operations.
 * Every write is a compare-and-swap on `version`.
 */

import { eq, and, ne, lt, isNull, isNotNull } from 'drizzle-orm';
import type { TasklineDb } from '../db.js';
import type { Task, TaskId, OwnerId } from '../types/task.js';
import type { Bucket } from '../types/view.js';
import type { DataResult } from '../types/results.js';
import { notFound, forbidden, conflict } from '../types/results.js';
import type { PositionEntry } from '../ordering/position-allocator.js';
import type { DayWindow } from '../temporal/day-window.js';
import { tasks } from '../schema/tasks.js';
import { toTask, toColumns, generateId } from './task-helpers.js';

/** Get a single task by ID regardless of owner */
export function findTask(db: TasklineDb, taskId: TaskId): Task | null {
  const row = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  return row ? toTask(row) : null;
}

/** Load a task the caller owns: not-found if absent, forbidden if someone else's */
export function requireOwnedTask(db: TasklineDb, ownerId: OwnerId, taskId: TaskId): DataResult<Task> {
  const task = findTask(db, taskId);
  if (!task) return notFound(taskId);
  if (task.ownerId !== ownerId) return forbidden(taskId);
  return { type: 'success', data: task, message: `Loaded task ${taskId}` };
}

/** A task ID not yet used in the table */
export function nextTaskId(db: TasklineDb): TaskId {
  let id = generateId();
  while (findTask(db, id)) id = generateId();
  return id;
}

/** Insert a task into the database */
export function insertTask(db: TasklineDb, task: Task): void {
  db.insert(tasks).values({ id: task.id, ...toColumns(task) }).run();
}

/**
 * Persist a modified task if nobody wrote it since it was read.
 * Returns the stored task with its bumped version.
 */
export function saveTask(db: TasklineDb, task: Task, now: Date): DataResult<Task> {
  const next: Task = { ...task, version: task.version + 1, updatedAt: now.toISOString() };
  const result = db.update(tasks).set(toColumns(next)).where(
    and(eq(tasks.id, task.id), eq(tasks.version, task.version)),
  ).run();
  if (result.changes === 0) {
    return conflict(task.id, `Task ${task.id} was modified by another request; reload it and retry`);
  }
  return { type: 'success', data: next, message: `Saved task ${task.id}` };
}

/** Delete a task permanently */
export function deleteTaskRow(db: TasklineDb, taskId: TaskId): void {
  db.delete(tasks).where(eq(tasks.id, taskId)).run();
}

/** Incomplete tasks of the owner dated before today, i.e. the overdue set */
export function getOverdueCandidates(db: TasklineDb, ownerId: OwnerId, window: DayWindow): Task[] {
  const rows = db.select().from(tasks).where(and(
    eq(tasks.ownerId, ownerId),
    eq(tasks.completed, 0),
    isNotNull(tasks.dueDate),
    lt(tasks.dueDate, window.today),
  )).all();
  return rows.map(toTask);
}

/** SQL predicate for membership of a storage bucket */
function membershipOf(bucket: Exclude<Bucket, { kind: 'overdue' }>) {
  switch (bucket.kind) {
    case 'inbox': return and(isNull(tasks.dueDate), isNull(tasks.projectId));
    case 'date': return eq(tasks.dueDate, bucket.date);
    case 'project': return and(isNull(tasks.dueDate), eq(tasks.projectId, bucket.projectId));
  }
}

/**
 * Positions of a bucket's members, excluding one task (the one being placed).
 * The overdue bucket reports `overduePosition` and skips members without one.
 */
export function getBucketEntries(
  db: TasklineDb,
  ownerId: OwnerId,
  bucket: Bucket,
  window: DayWindow,
  excludeId?: TaskId,
): PositionEntry[] {
  const notSelf = excludeId ? ne(tasks.id, excludeId) : undefined;

  if (bucket.kind === 'overdue') {
    return getOverdueCandidates(db, ownerId, window)
      .filter(t => t.id !== excludeId)
      .flatMap(t => t.overduePosition == null ? [] : [{ id: t.id, position: t.overduePosition }]);
  }

  return db.select({ id: tasks.id, position: tasks.position }).from(tasks)
    .where(and(eq(tasks.ownerId, ownerId), membershipOf(bucket), notSelf))
    .all();
}
