import type { Priority } from './priority.js';

export type TaskId = string;
export type OwnerId = string;
export type ProjectId = string;

/**
 * How a due instant behaves across timezones.
 * `fixed` is an absolute moment; `floating` (local wall-clock time that travels
 * with the owner) is reserved and rejected on input.
 */
export type TimeMode = 'fixed' | 'floating';

export interface DueBy {
  readonly date: string; // yyyy-MM-dd
  readonly time: string | null; // ISO instant, null for all-day tasks
  readonly mode: TimeMode;
}

/** Stamped once at completion, dated in the owner's timezone at that moment */
export interface CompletedOn {
  readonly date: string; // yyyy-MM-dd
  readonly time: string; // ISO instant
  readonly mode: 'fixed';
}

export interface Task {
  readonly id: TaskId;
  readonly ownerId: OwnerId;
  readonly title: string;
  readonly description: string | null;
  readonly priority: Priority;
  readonly projectId: ProjectId | null;
  readonly tags: string[];
  readonly completed: boolean;
  readonly dueBy: DueBy | null;
  /** Only comparable with tasks of the same bucket */
  readonly position: number;
  /** Only comparable with other currently-overdue tasks */
  readonly overduePosition: number | null;
  readonly completedOn: CompletedOn | null;
  readonly version: number;
  readonly createdAt: string; // ISO string
  readonly updatedAt: string; // ISO string
}

/** Who is asking, in which timezone, and when */
export interface RequestContext {
  readonly ownerId: OwnerId;
  readonly timezone?: string;
  /** Override "now" for tests. Defaults to the current instant. */
  readonly now?: Date;
}
