/**
 * Lazy overdue positions.
 *
 * A task gets an `overduePosition` the first time it is observed overdue.
 * Tasks that already have one keep it; newcomers are appended after them in
 * urgency order. Running the assignment again on the same set writes nothing.
 */

import type { TasklineDb } from '../db.js';
import type { Task, TaskId } from '../types/task.js';
import type { DataResult } from '../types/results.js';
import { PriorityRank } from '../types/priority.js';
import { saveTask } from '../queries/task-store.js';
import { GAP } from './position-allocator.js';

export interface OverdueAssignment {
  readonly id: TaskId;
  readonly overduePosition: number;
}

type Positioned = Task & { readonly overduePosition: number };

function hasOverduePosition(task: Task): task is Positioned {
  return task.overduePosition != null;
}

/** Priority descending, then due date, then bucket position */
function compareOverdueArrival(a: Task, b: Task): number {
  return PriorityRank[b.priority] - PriorityRank[a.priority]
    || (a.dueBy?.date ?? '').localeCompare(b.dueBy?.date ?? '')
    || a.position - b.position
    || a.id.localeCompare(b.id);
}

/** Work out positions for the members of an overdue set that have none */
export function planOverduePositions(overdue: readonly Task[]): OverdueAssignment[] {
  const positioned = overdue.filter(hasOverduePosition);
  const unpositioned = overdue.filter(t => !hasOverduePosition(t)).sort(compareOverdueArrival);
  if (unpositioned.length === 0) return [];

  const base = positioned.length > 0 ? Math.max(...positioned.map(t => t.overduePosition)) : 0;
  return unpositioned.map((t, i) => ({ id: t.id, overduePosition: base + (i + 1) * GAP }));
}

/**
 * Persist overdue positions for an overdue set.
 * Returns the whole set with the newly assigned values applied.
 */
export function assignOverduePositions(db: TasklineDb, overdue: readonly Task[], now: Date): DataResult<Task[]> {
  const plan = new Map(planOverduePositions(overdue).map(a => [a.id, a.overduePosition]));
  const result: Task[] = [];

  for (const task of overdue) {
    const overduePosition = plan.get(task.id);
    if (overduePosition === undefined) {
      result.push(task);
      continue;
    }
    const saved = saveTask(db, { ...task, overduePosition }, now);
    if (saved.type !== 'success') return saved;
    result.push(saved.data);
  }

  return { type: 'success', data: result, message: `Assigned ${plan.size} overdue position(s)` };
}
