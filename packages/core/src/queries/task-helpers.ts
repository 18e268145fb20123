import type { TaskId, Task, CompletedOn } from '../types/task.js';
import type { tasks } from '../schema/tasks.js';
import { localDate } from '../temporal/day-window.js';

type TaskRow = typeof tasks.$inferSelect;
type TaskColumns = Omit<typeof tasks.$inferInsert, 'id'>;

const ID_CHARS = '0123456789abcdefghijklmnopqrstuvwxyz';
const ID_LENGTH = 8;

/** Generate a random 8-character task ID */
export function generateId(): TaskId {
  let id = '';
  for (let i = 0; i < ID_LENGTH; i++) {
    id += ID_CHARS.charAt(Math.floor(Math.random() * ID_CHARS.length));
  }
  return id;
}

/** Map a Drizzle row to a Task object */
export function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    ownerId: row.ownerId,
    title: row.title,
    description: row.description,
    priority: row.priority,
    projectId: row.projectId,
    tags: deserializeTags(row.tags),
    completed: row.completed === 1,
    dueBy: row.dueDate
      ? { date: row.dueDate, time: row.dueTime, mode: row.dueMode ?? 'fixed' }
      : null,
    position: row.position,
    overduePosition: row.overduePosition,
    completedOn: row.completedOnDate && row.completedOnTime
      ? { date: row.completedOnDate, time: row.completedOnTime, mode: 'fixed' }
      : null,
    version: row.version,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/** Map a Task to its column values (everything but the primary key) */
export function toColumns(task: Task): TaskColumns {
  return {
    ownerId: task.ownerId,
    title: task.title,
    description: task.description,
    priority: task.priority,
    projectId: task.projectId,
    tags: serializeTags(task.tags),
    completed: task.completed ? 1 : 0,
    dueDate: task.dueBy?.date ?? null,
    dueTime: task.dueBy?.time ?? null,
    dueMode: task.dueBy?.mode ?? null,
    position: task.position,
    overduePosition: task.overduePosition,
    completedOnDate: task.completedOn?.date ?? null,
    completedOnTime: task.completedOn?.time ?? null,
    completedOnMode: task.completedOn?.mode ?? null,
    version: task.version,
    createdAt: task.createdAt,
    updatedAt: task.updatedAt,
  };
}

/** Completion record for "now", dated in the owner's timezone */
export function stampCompletion(now: Date, timezone: string): CompletedOn {
  return { date: localDate(now, timezone), time: now.toISOString(), mode: 'fixed' };
}

/** Trim, drop empties and de-duplicate, keeping first-seen order */
export function normalizeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const tag of tags) {
    const t = tag.trim();
    if (t) seen.add(t);
  }
  return [...seen];
}

/** Serialize tags array to JSON for storage, or null if empty */
export function serializeTags(tags: readonly string[]): string | null {
  if (tags.length === 0) return null;
  return JSON.stringify(tags);
}

/** Deserialize tags from JSON string; empty for null or malformed input */
export function deserializeTags(json: string | null): string[] {
  if (!json) return [];
  try {
    const arr = JSON.parse(json) as unknown;
    if (!Array.isArray(arr)) return [];
    return arr.filter((t): t is string => typeof t === 'string');
  } catch {
    return [];
  }
}

/** Stable tie-break for tasks sharing a position */
export function compareCreation(a: Task, b: Task): number {
  return a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id);
}
