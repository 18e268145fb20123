/**
 * Temporal classification of a task against the owner's current day.
 * Pure: the result depends only on the task and the day window.
 */

import type { Task } from '../types/task.js';
import type { Classification } from '../types/view.js';
import type { DayWindow } from './day-window.js';
import { isWithin } from './day-window.js';

type Classifiable = Pick<Task, 'dueBy' | 'projectId' | 'completed'>;

export function classifyTask(task: Classifiable, window: DayWindow): Classification {
  const { dueBy } = task;
  if (!dueBy) return task.projectId == null ? 'inbox' : 'unscheduled';

  // Date wins for lateness, even when a precise instant is carried
  if (dueBy.date < window.today) return task.completed ? 'past' : 'overdue';

  if (dueBy.time != null) {
    const instant = new Date(dueBy.time);
    if (isWithin(instant, window)) return 'due-today';
    if (instant.getTime() >= window.end.getTime()) return 'upcoming';
    // Instant before today's start with a date that isn't: trust the date
  }

  return dueBy.date === window.today ? 'due-today' : 'upcoming';
}

export function isOverdue(task: Classifiable, window: DayWindow): boolean {
  return classifyTask(task, window) === 'overdue';
}

/** Completed tasks whose completion instant falls inside the owner's today */
export function isCompletedToday(task: Pick<Task, 'completed' | 'completedOn'>, window: DayWindow): boolean {
  if (!task.completed || !task.completedOn) return false;
  return isWithin(new Date(task.completedOn.time), window);
}
