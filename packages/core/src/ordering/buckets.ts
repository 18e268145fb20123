import type { Task } from '../types/task.js';
import type { Bucket } from '../types/view.js';
import type { DataResult } from '../types/results.js';
import { invalidArgument } from '../types/results.js';
import type { DayWindow } from '../temporal/day-window.js';
import { isOverdue } from '../temporal/classifier.js';

type Bucketable = Pick<Task, 'dueBy' | 'projectId'>;

/** The storage bucket a task's `position` is relative to */
export function bucketOf(task: Bucketable): Bucket {
  if (task.dueBy) return { kind: 'date', date: task.dueBy.date };
  if (task.projectId != null) return { kind: 'project', projectId: task.projectId };
  return { kind: 'inbox' };
}

export function bucketKey(bucket: Bucket): string {
  switch (bucket.kind) {
    case 'inbox': return 'inbox';
    case 'date': return `date:${bucket.date}`;
    case 'project': return `project:${bucket.projectId}`;
    case 'overdue': return 'overdue';
  }
}

export function sameBucket(a: Bucket, b: Bucket): boolean {
  return bucketKey(a) === bucketKey(b);
}

/**
 * The bucket two tasks can be ordered against each other in.
 * Two overdue tasks are always ordered among the overdue tasks, whatever
 * their due dates.
 */
export function resolveSharedBucket(
  task: Task,
  ref: Task,
  window: DayWindow,
): DataResult<Bucket> {
  if (isOverdue(task, window) && isOverdue(ref, window)) {
    return { type: 'success', data: { kind: 'overdue' }, message: 'Shared bucket overdue' };
  }
  const own = bucketOf(task);
  const other = bucketOf(ref);
  if (sameBucket(own, other)) {
    return { type: 'success', data: own, message: `Shared bucket ${bucketKey(own)}` };
  }
  return invalidArgument(
    `Bucket mismatch: task ${task.id} is in ${bucketKey(own)} but reference task ${ref.id} is in ${bucketKey(other)}`,
  );
}
