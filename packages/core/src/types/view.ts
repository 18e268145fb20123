/** The list views a caller can ask for; `all` is the absence of a view */
export type View =
  | { readonly kind: 'all' }
  | { readonly kind: 'inbox' }
  | { readonly kind: 'today' }
  | { readonly kind: 'upcoming' };

export type ViewName = Exclude<View['kind'], 'all'>;

export const VIEW_NAMES: readonly ViewName[] = ['inbox', 'today', 'upcoming'];

/**
 * Where a task sits relative to the owner's current day.
 * `unscheduled` (project task without a date) and `past` (completed, due
 * before today) cover the states that belong to no time-windowed view.
 */
export type Classification =
  | 'inbox'
  | 'due-today'
  | 'overdue'
  | 'upcoming'
  | 'unscheduled'
  | 'past';

/** An ordering scope. Positions are only compared within one bucket. */
export type Bucket =
  | { readonly kind: 'inbox' }
  | { readonly kind: 'date'; readonly date: string }
  | { readonly kind: 'project'; readonly projectId: string }
  | { readonly kind: 'overdue' };
