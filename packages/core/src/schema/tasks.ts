import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { Priority } from '../types/priority.js';
import type { TimeMode } from '../types/task.js';

export const tasks = sqliteTable('tasks', {
  id: text('id').primaryKey(),
  ownerId: text('owner_id').notNull(),
  title: text('title').notNull(),
  description: text('description'),
  priority: text('priority').$type<Priority>().notNull().default('MEDIUM'),
  /** Grouping id; tasks without one and without a due date form the inbox */
  projectId: text('project_id'),
  /** JSON array of strings, stored as TEXT */
  tags: text('tags'),
  completed: integer('completed').notNull().default(0),
  dueDate: text('due_date'),
  dueTime: text('due_time'),
  dueMode: text('due_mode').$type<TimeMode>(),
  /** Ascending within a bucket. Display uses ORDER BY position ASC */
  position: integer('position').notNull().default(0),
  overduePosition: integer('overdue_position'),
  completedOnDate: text('completed_on_date'),
  completedOnTime: text('completed_on_time'),
  completedOnMode: text('completed_on_mode').$type<'fixed'>(),
  /** Bumped on every write; checked by compare-and-swap updates */
  version: integer('version').notNull().default(1),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
}, (table) => [
  index('idx_tasks_owner_due').on(table.ownerId, table.dueDate),
  index('idx_tasks_owner_project').on(table.ownerId, table.projectId),
  index('idx_tasks_owner_completed').on(table.ownerId, table.completed),
]);
