/**
 * Reordering a task within its bucket.
 *
 * One call makes one transition:
 *   received -> validated -> positioned -> persisted
 *   received -> rejected
 * A move never changes a task's date or project; only `position` (or
 * `overduePosition` in the overdue bucket) is rewritten.
 */

import type { TasklineDb } from '../db.js';
import type { Task, TaskId, RequestContext } from '../types/task.js';
import type { Bucket } from '../types/view.js';
import type { DataResult } from '../types/results.js';
import { invalidArgument, conflict } from '../types/results.js';
import { allocatePosition } from '../ordering/position-allocator.js';
import type { Placement, PositionEntry } from '../ordering/position-allocator.js';
import { bucketOf, bucketKey, resolveSharedBucket } from '../ordering/buckets.js';
import { assignOverduePositions } from '../ordering/overdue-assigner.js';
import { isOverdue } from '../temporal/classifier.js';
import { resolveContext } from './context.js';
import type { ResolvedContext } from './context.js';
import { transact } from './transaction.js';
import { requireOwnedTask, saveTask, getBucketEntries, getOverdueCandidates } from './task-store.js';

export interface MoveRequest {
  insertAfter?: TaskId;
  insertBefore?: TaskId;
  moveToTop?: boolean;
  moveToBottom?: boolean;
  /**
   * Require the move to happen among overdue tasks. An overdue task is
   * always ordered there; the scope turns a task or reference that is not
   * overdue into an error instead of a date-bucket move.
   */
  scope?: 'overdue';
  /** Reject the move with a conflict if the stored version differs */
  expectedVersion?: number;
}

export type MoveStrategy =
  | { readonly type: 'top' }
  | { readonly type: 'bottom' }
  | { readonly type: 'after'; readonly refId: TaskId }
  | { readonly type: 'before'; readonly refId: TaskId };

/** Outcome of a persisted move: the task and the bucket it was ordered in */
export interface MoveResult {
  readonly task: Task;
  readonly bucket: Bucket;
}

/** received -> validated: exactly one placement strategy */
export function validateMoveRequest(request: MoveRequest): DataResult<MoveStrategy> {
  const given: MoveStrategy[] = [];
  const names: string[] = [];
  if (request.insertAfter != null) { given.push({ type: 'after', refId: request.insertAfter }); names.push('insertAfter'); }
  if (request.insertBefore != null) { given.push({ type: 'before', refId: request.insertBefore }); names.push('insertBefore'); }
  if (request.moveToTop === true) { given.push({ type: 'top' }); names.push('moveToTop'); }
  if (request.moveToBottom === true) { given.push({ type: 'bottom' }); names.push('moveToBottom'); }

  const [strategy] = given;
  if (!strategy) {
    return invalidArgument('Exactly one placement strategy is required: insertAfter, insertBefore, moveToTop or moveToBottom');
  }
  if (given.length > 1) {
    return invalidArgument(`Exactly one placement strategy is allowed, got ${names.join(', ')}`);
  }
  return { type: 'success', data: strategy, message: `Strategy ${strategy.type}` };
}

/** The bucket the move is ordered in, given the task, its reference and the scope */
function resolveMoveBucket(
  ctx: ResolvedContext,
  task: Task,
  ref: Task | null,
  scope: MoveRequest['scope'],
): DataResult<Bucket> {
  const overdue = isOverdue(task, ctx.window);
  if (scope === 'overdue') {
    if (!overdue) return invalidArgument(`Task ${task.id} is not overdue`);
    if (ref && !isOverdue(ref, ctx.window)) {
      return invalidArgument(`Bucket mismatch: task ${task.id} is overdue but reference task ${ref.id} is not`);
    }
  }
  if (!ref) {
    if (overdue) return { type: 'success', data: { kind: 'overdue' }, message: 'Overdue bucket' };
    const own = bucketOf(task);
    return { type: 'success', data: own, message: `Own bucket ${bucketKey(own)}` };
  }
  return resolveSharedBucket(task, ref, ctx.window);
}

function toPlacement(strategy: MoveStrategy, ref: PositionEntry | null): DataResult<Placement> {
  switch (strategy.type) {
    case 'top':
    case 'bottom':
      return { type: 'success', data: { type: strategy.type }, message: strategy.type };
    case 'after':
    case 'before':
      if (!ref) return invalidArgument(`Reference task ${strategy.refId} has no position in this bucket`);
      return { type: 'success', data: { type: strategy.type, ref }, message: strategy.type };
  }
}

/** Move a task to a new place within its bucket */
export function moveTask(
  db: TasklineDb,
  context: RequestContext,
  taskId: TaskId,
  request: MoveRequest,
): DataResult<MoveResult> {
  const validated = validateMoveRequest(request);
  if (validated.type !== 'success') return validated;
  const strategy = validated.data;

  const resolved = resolveContext(context);
  if (resolved.type !== 'success') return resolved;
  const ctx = resolved.data;

  return transact(db, () => {
    const loaded = requireOwnedTask(db, ctx.ownerId, taskId);
    if (loaded.type !== 'success') return loaded;
    let task = loaded.data;

    if (request.expectedVersion != null && request.expectedVersion !== task.version) {
      return conflict(taskId, `Task ${taskId} is at version ${task.version}, not ${request.expectedVersion}; reload it and retry`);
    }

    let ref: Task | null = null;
    if (strategy.type === 'after' || strategy.type === 'before') {
      if (strategy.refId === taskId) return invalidArgument('A task cannot be moved relative to itself');
      const loadedRef = requireOwnedTask(db, ctx.ownerId, strategy.refId);
      if (loadedRef.type !== 'success') return loadedRef;
      ref = loadedRef.data;
    }

    const bucket = resolveMoveBucket(ctx, task, ref, request.scope);
    if (bucket.type !== 'success') return bucket;

    // validated -> positioned
    let refEntry: PositionEntry | null = ref ? { id: ref.id, position: ref.position } : null;

    if (bucket.data.kind === 'overdue') {
      // Every overdue member needs a value before it can be ordered against
      const assigned = assignOverduePositions(db, getOverdueCandidates(db, ctx.ownerId, ctx.window), ctx.now);
      if (assigned.type !== 'success') return assigned;
      const ownId = task.id;
      const refId = ref?.id;
      task = assigned.data.find(t => t.id === ownId) ?? task;
      const refMember = assigned.data.find(t => t.id === refId);
      refEntry = refMember?.overduePosition != null
        ? { id: refMember.id, position: refMember.overduePosition }
        : null;
    }

    const entries = getBucketEntries(db, ctx.ownerId, bucket.data, ctx.window, task.id);
    const placement = toPlacement(strategy, refEntry);
    if (placement.type !== 'success') return placement;
    const position = allocatePosition(entries, placement.data);

    // positioned -> persisted
    const moved: Task = bucket.data.kind === 'overdue'
      ? { ...task, overduePosition: position }
      : { ...task, position };
    const saved = saveTask(db, moved, ctx.now);
    if (saved.type !== 'success') return saved;

    return {
      type: 'success',
      data: { task: saved.data, bucket: bucket.data },
      message: `Moved task ${taskId} to position ${position} in ${bucketKey(bucket.data)}`,
    };
  });
}
