import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, type TasklineDb } from '../../src/db.js';
import { createTask, completeTask, getTask } from '../../src/queries/task-queries.js';
import type { CreateTaskInput } from '../../src/queries/task-queries.js';
import { parseView, listByView, listOverdue, listPage, validatePaging } from '../../src/queries/view-queries.js';
import type { Task, RequestContext } from '../../src/types/task.js';
import { Priority } from '../../src/types/priority.js';
import { unwrap } from '../fixtures.js';

let db: TasklineDb;

const TZ = 'America/New_York';
// 22:00 on 2025-09-09 in New York, already the 10th in UTC
const NOW = new Date('2025-09-10T02:00:00Z');
const ny: RequestContext = { ownerId: 'alice', timezone: TZ, now: NOW };

function at(iso: string, ownerId = 'alice'): RequestContext {
  return { ownerId, timezone: TZ, now: new Date(iso) };
}

function add(input: CreateTaskInput, ctx: RequestContext = ny): Task {
  return unwrap(createTask(db, ctx, input));
}

const titles = (tasks: Task[]) => tasks.map(t => t.title);

beforeEach(() => {
  db = createTestDb();
});

describe('parseView', () => {
  it('maps absent names to all', () => {
    expect(parseView(undefined)).toMatchObject({ type: 'success', data: { kind: 'all' } });
    expect(parseView(null)).toMatchObject({ type: 'success', data: { kind: 'all' } });
  });

  it('maps the view names', () => {
    expect(parseView('inbox')).toMatchObject({ data: { kind: 'inbox' } });
    expect(parseView('today')).toMatchObject({ data: { kind: 'today' } });
    expect(parseView('upcoming')).toMatchObject({ data: { kind: 'upcoming' } });
  });

  it('rejects anything else', () => {
    expect(parseView('someday')).toEqual({
      type: 'invalid-argument',
      message: 'Invalid view "someday". Valid values: inbox, today, upcoming',
    });
  });
});

describe('inbox view', () => {
  it('lists open inbox tasks plus those completed today, by position', () => {
    add({ title: 'a' }, at('2025-09-09T10:00:00Z'));
    add({ title: 'b' }, at('2025-09-09T10:01:00Z'));
    const yesterday = add({ title: 'done yesterday' }, at('2025-09-09T10:02:00Z'));
    const today = add({ title: 'done today' }, at('2025-09-09T10:03:00Z'));
    add({ title: 'dated', dueBy: { date: '2025-09-12' } });
    add({ title: 'in a project', projectId: 'home' });

    unwrap(completeTask(db, at('2025-09-08T15:00:00Z'), yesterday.id));
    unwrap(completeTask(db, at('2025-09-09T20:00:00Z'), today.id));

    const list = unwrap(listByView(db, ny, { view: { kind: 'inbox' } }));
    expect(titles(list)).toEqual(['a', 'b', 'done today']);
  });

  it('lists completed inbox tasks when asked', () => {
    add({ title: 'open' });
    const done = add({ title: 'done' });
    unwrap(completeTask(db, at('2025-09-01T12:00:00Z'), done.id));

    const list = unwrap(listByView(db, ny, { view: { kind: 'inbox' }, completed: true }));
    expect(titles(list)).toEqual(['done']);
  });
});

describe('today view', () => {
  it('puts overdue tasks first, then today\'s tasks by position', () => {
    add({ title: 'due today', dueBy: { date: '2025-09-09' } }, at('2025-09-09T10:00:00Z'));
    add({ title: 'late low', priority: Priority.Low, dueBy: { date: '2025-09-08' } });
    add({ title: 'late high', priority: Priority.High, dueBy: { date: '2025-09-07' } });
    add({ title: 'tomorrow', dueBy: { date: '2025-09-10' } });
    const finished = add({ title: 'finished' }, at('2025-09-09T11:00:00Z'));
    unwrap(completeTask(db, at('2025-09-09T20:00:00Z'), finished.id));

    const list = unwrap(listByView(db, ny, { view: { kind: 'today' } }));
    expect(titles(list)).toEqual(['late high', 'late low', 'due today', 'finished']);
    expect(list.slice(0, 2).map(t => t.overduePosition)).toEqual([1000, 2000]);
  });

  it('treats a date-only task due today as due today at any hour', () => {
    add({ title: 'all day', dueBy: { date: '2025-09-09' } });
    const early = unwrap(listByView(db, at('2025-09-09T04:30:00Z'), { view: { kind: 'today' } }));
    const late = unwrap(listByView(db, at('2025-09-10T03:59:00Z'), { view: { kind: 'today' } }));
    expect(titles(early)).toEqual(['all day']);
    expect(titles(late)).toEqual(['all day']);
  });

  it('includes a task whose due instant falls inside the owner\'s day', () => {
    add({ title: 'tonight', dueBy: { date: '2025-09-10', time: '2025-09-10T03:00:00Z' } });
    expect(titles(unwrap(listByView(db, ny, { view: { kind: 'today' } })))).toEqual(['tonight']);
  });

  it('ignores the completed filter', () => {
    add({ title: 'open', dueBy: { date: '2025-09-09' } });
    const done = add({ title: 'done', dueBy: { date: '2025-09-09' } });
    unwrap(completeTask(db, ny, done.id));

    const open = unwrap(listByView(db, ny, { view: { kind: 'today' }, completed: false }));
    const closed = unwrap(listByView(db, ny, { view: { kind: 'today' }, completed: true }));
    expect(titles(open)).toEqual(['open', 'done']);
    expect(titles(closed)).toEqual(['open', 'done']);
  });

  it('persists overdue positions and keeps them on later calls', () => {
    const first = add({ title: 'first', dueBy: { date: '2025-09-08' } });
    unwrap(listByView(db, ny, { view: { kind: 'today' } }));
    const second = add({ title: 'second', priority: Priority.High, dueBy: { date: '2025-09-08' } });

    const list = unwrap(listByView(db, ny, { view: { kind: 'today' } }));
    expect(titles(list)).toEqual(['first', 'second']);
    expect(unwrap(getTask(db, ny, first.id)).overduePosition).toBe(1000);
    expect(unwrap(getTask(db, ny, second.id)).overduePosition).toBe(2000);
  });

  it('hides other owners\' tasks', () => {
    add({ title: 'theirs', dueBy: { date: '2025-09-09' } }, at('2025-09-10T02:00:00Z', 'bob'));
    expect(unwrap(listByView(db, ny, { view: { kind: 'today' } }))).toEqual([]);
  });
});

describe('upcoming view', () => {
  it('sorts by date, then due instant with date-only first', () => {
    add({ title: 'sep 12', dueBy: { date: '2025-09-12' } });
    add({ title: 'sep 11 at 15', dueBy: { date: '2025-09-11', time: '2025-09-11T15:00:00Z' } });
    add({ title: 'sep 11', dueBy: { date: '2025-09-11' } });
    add({ title: 'sep 11 at 13', dueBy: { date: '2025-09-11', time: '2025-09-11T13:00:00Z' } });
    add({ title: 'today', dueBy: { date: '2025-09-09' } });
    add({ title: 'tonight', dueBy: { date: '2025-09-10', time: '2025-09-10T03:00:00Z' } });

    const list = unwrap(listByView(db, ny, { view: { kind: 'upcoming' } }));
    expect(titles(list)).toEqual(['sep 11', 'sep 11 at 13', 'sep 11 at 15', 'sep 12']);
  });

  it('honours the completed filter', () => {
    add({ title: 'open', dueBy: { date: '2025-09-12' } });
    const done = add({ title: 'done', dueBy: { date: '2025-09-12' } });
    unwrap(completeTask(db, ny, done.id));

    expect(titles(unwrap(listByView(db, ny, { view: { kind: 'upcoming' } })))).toEqual(['open']);
    expect(titles(unwrap(listByView(db, ny, { view: { kind: 'upcoming' }, completed: true })))).toEqual(['done']);
  });
});

describe('all tasks', () => {
  it('lists newest first and filters by priority and tag', () => {
    add({ title: 'old high', priority: Priority.High, tags: ['work'] }, at('2025-09-01T10:00:00Z'));
    add({ title: 'mid low', priority: Priority.Low, tags: ['home'] }, at('2025-09-02T10:00:00Z'));
    add({ title: 'new high', priority: Priority.High }, at('2025-09-03T10:00:00Z'));

    expect(titles(unwrap(listByView(db, ny)))).toEqual(['new high', 'mid low', 'old high']);
    expect(titles(unwrap(listByView(db, ny, { priority: Priority.High })))).toEqual(['new high', 'old high']);
    expect(titles(unwrap(listByView(db, ny, { tag: 'work' })))).toEqual(['old high']);
  });

  it('lists completed tasks only when asked', () => {
    add({ title: 'open' });
    const done = add({ title: 'done' });
    unwrap(completeTask(db, ny, done.id));

    expect(titles(unwrap(listByView(db, ny)))).toEqual(['open']);
    expect(titles(unwrap(listByView(db, ny, { completed: true })))).toEqual(['done']);
  });
});

describe('listOverdue', () => {
  it('returns only overdue tasks in overdue order', () => {
    add({ title: 'b', dueBy: { date: '2025-09-08' } });
    add({ title: 'a', priority: Priority.High, dueBy: { date: '2025-09-08' } });
    add({ title: 'today', dueBy: { date: '2025-09-09' } });
    const done = add({ title: 'late but done', dueBy: { date: '2025-09-01' } });
    unwrap(completeTask(db, ny, done.id));

    const list = unwrap(listOverdue(db, ny));
    expect(titles(list)).toEqual(['a', 'b']);
  });

  it('rejects an unknown timezone', () => {
    expect(listOverdue(db, { ownerId: 'alice', timezone: 'Nowhere/City' })).toEqual({
      type: 'invalid-argument',
      message: 'Unknown timezone "Nowhere/City"',
    });
  });
});

describe('paging', () => {
  it('defaults to the first page of twenty', () => {
    expect(validatePaging()).toMatchObject({ type: 'success', data: { page: 0, size: 20 } });
  });

  it('rejects a negative page and an out-of-range size', () => {
    expect(validatePaging(-1, 20)).toEqual({
      type: 'invalid-argument',
      message: 'Page must be a non-negative integer, got -1',
    });
    expect(validatePaging(0, 101)).toEqual({
      type: 'invalid-argument',
      message: 'Size must be an integer between 1 and 100, got 101',
    });
    expect(validatePaging(0, 0).type).toBe('invalid-argument');
    expect(listPage(db, ny, { size: 101 }).type).toBe('invalid-argument');
  });

  it('cuts pages from the ordered list', () => {
    for (const title of ['t0', 't1', 't2', 't3', 't4']) add({ title });

    const second = unwrap(listPage(db, ny, { view: { kind: 'inbox' }, page: 1, size: 2 }));
    expect(titles(second.tasks)).toEqual(['t2', 't3']);
    expect(second).toMatchObject({ total: 5, page: 1, size: 2 });

    expect(titles(unwrap(listByView(db, ny, { view: { kind: 'inbox' }, page: 2, size: 2 })))).toEqual(['t4']);
    expect(unwrap(listByView(db, ny, { view: { kind: 'inbox' }, page: 3, size: 2 }))).toEqual([]);
  });

  it('returns twenty tasks when no size is given', () => {
    for (let i = 0; i < 25; i++) add({ title: `t${i}` });
    expect(unwrap(listByView(db, ny, { view: { kind: 'inbox' } }))).toHaveLength(20);
    expect(unwrap(listPage(db, ny, { view: { kind: 'inbox' } })).total).toBe(25);
  });

  it('assigns overdue positions beyond the requested page of the today view', () => {
    add({ title: 'o1', dueBy: { date: '2025-09-05' } });
    add({ title: 'o2', dueBy: { date: '2025-09-05' } });
    const o3 = add({ title: 'o3', dueBy: { date: '2025-09-05' } });

    const first = unwrap(listPage(db, ny, { view: { kind: 'today' }, size: 1 }));
    expect(titles(first.tasks)).toEqual(['o1']);
    expect(first.total).toBe(3);
    expect(unwrap(getTask(db, ny, o3.id)).overduePosition).toBe(3000);

    expect(titles(unwrap(listByView(db, ny, { view: { kind: 'today' }, page: 1, size: 1 })))).toEqual(['o2']);
  });
});
