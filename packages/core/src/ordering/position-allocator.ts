/**
 * Integer-gap position allocation within a single bucket.
 *
 * New positions are spaced GAP apart so most inserts land between two
 * neighbours without touching them. When the gap between neighbours is
 * exhausted the insert falls back to the bucket's end; nothing is rebalanced.
 */

import type { TaskId } from '../types/task.js';

export const GAP = 1000;
export const MIN_GAP = 10;

export interface PositionEntry {
  readonly id: TaskId;
  readonly position: number;
}

export type Placement =
  | { readonly type: 'top' }
  | { readonly type: 'bottom' }
  | { readonly type: 'after'; readonly ref: PositionEntry }
  | { readonly type: 'before'; readonly ref: PositionEntry };

function bottomOf(entries: readonly PositionEntry[]): number {
  if (entries.length === 0) return GAP;
  return Math.max(...entries.map(e => e.position)) + GAP;
}

function topOf(entries: readonly PositionEntry[]): number {
  if (entries.length === 0) return GAP;
  return Math.min(...entries.map(e => e.position)) - GAP;
}

/** Entry with the smallest position strictly greater than `position` */
function successorOf(entries: readonly PositionEntry[], position: number): PositionEntry | null {
  let next: PositionEntry | null = null;
  for (const e of entries) {
    if (e.position > position && (next === null || e.position < next.position)) next = e;
  }
  return next;
}

/** Entry with the greatest position strictly less than `position` */
function predecessorOf(entries: readonly PositionEntry[], position: number): PositionEntry | null {
  let prev: PositionEntry | null = null;
  for (const e of entries) {
    if (e.position < position && (prev === null || e.position > prev.position)) prev = e;
  }
  return prev;
}

/**
 * Compute the position for a task placed into a bucket.
 *
 * @param entries - The bucket's current members, excluding the task being placed
 */
export function allocatePosition(entries: readonly PositionEntry[], placement: Placement): number {
  switch (placement.type) {
    case 'bottom':
      return bottomOf(entries);
    case 'top':
      return topOf(entries);
    case 'after': {
      const { ref } = placement;
      const next = successorOf(entries, ref.position);
      if (!next) return bottomOf(entries);
      const candidate = Math.floor((ref.position + next.position) / 2);
      return candidate - ref.position < MIN_GAP ? bottomOf(entries) : candidate;
    }
    case 'before': {
      const { ref } = placement;
      const prev = predecessorOf(entries, ref.position);
      if (!prev) return topOf(entries);
      const candidate = Math.floor((prev.position + ref.position) / 2);
      return ref.position - candidate < MIN_GAP ? topOf(entries) : candidate;
    }
  }
}
