/**
 * chalk-based output formatting for the terminal.
 */

import chalk from 'chalk';
import { TZDate } from '@date-fns/tz';
import { differenceInCalendarDays, format, parseISO } from 'date-fns';
import { Priority, isError, describeError } from '@taskline/core';
import type { Task, TaskResult, DataResult, DayWindow } from '@taskline/core';

// --- Tag colors (deterministic from tag name) ---

const TAG_COLORS = [
  chalk.cyan, chalk.magenta, chalk.blue, chalk.yellow,
  chalk.green, chalk.red, chalk.white, chalk.gray,
];

function tagColor(tag: string): (s: string) => string {
  let hash = 0;
  for (let i = 0; i < tag.length; i++) {
    hash = ((hash << 5) - hash + tag.charCodeAt(i)) | 0;
  }
  return TAG_COLORS[Math.abs(hash) % TAG_COLORS.length] ?? chalk.white;
}

// --- Verbosity ---

let verbose = process.env['TASKLINE_DEBUG'] === '1';

export function setVerbose(on: boolean): void {
  verbose = verbose || on;
}

export function isVerbose(): boolean {
  return verbose;
}

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case Priority.High: return chalk.red.bold('>>>');
    case Priority.Medium: return chalk.yellow('>> ');
    case Priority.Low: return chalk.blue('>  ');
  }
}

/** HH:mm of an instant on the owner's clock */
export function formatClock(instant: string, timezone: string): string {
  return format(new TZDate(new Date(instant).getTime(), timezone), 'HH:mm');
}

/** Plain due label relative to the owner's today, without colour */
export function dueLabel(task: Pick<Task, 'dueBy' | 'completed'>, window: DayWindow): string {
  if (!task.dueBy) return '';
  const due = parseISO(task.dueBy.date);
  const diff = differenceInCalendarDays(due, parseISO(window.today));
  const at = task.dueBy.time ? ` ${formatClock(task.dueBy.time, window.timezone)}` : '';

  if (diff < 0 && !task.completed) return `OVERDUE (${-diff}d)`;
  if (diff === 0) return `Due: Today${at}`;
  if (diff === 1) return `Due: Tomorrow${at}`;
  if (diff > 1 && diff < 7) return `Due: ${format(due, 'EEEE')}${at}`;
  return `Due: ${format(due, 'MMM d')}${at}`;
}

export function formatDueLabel(task: Pick<Task, 'dueBy' | 'completed'>, window: DayWindow): string {
  const label = dueLabel(task, window);
  if (!label) return '';
  if (label.startsWith('OVERDUE')) return chalk.red(`  ${label}`);
  if (label.startsWith('Due: Today') && !task.completed) return chalk.yellow(`  ${label}`);
  return chalk.dim(`  ${label}`);
}

export function formatTags(tags: readonly string[]): string {
  if (tags.length === 0) return '';
  const formatted = tags.map(t => tagColor(t)(`#${t}`));
  return '  ' + formatted.join(' ');
}

export function formatPositions(task: Pick<Task, 'position' | 'overduePosition'>): string {
  const overdue = task.overduePosition != null ? ` od:${task.overduePosition}` : '';
  return chalk.dim(`  [pos:${task.position}${overdue}]`);
}

/** One line per task: id, priority, checkbox, title, due label, positions, tags */
export function formatTask(task: Task, window: DayWindow): string {
  const title = task.completed ? chalk.dim.strikethrough(task.title) : chalk.bold(task.title);
  return `${chalk.dim(`(${task.id})`)} ${formatPriority(task.priority)} ${formatCheckbox(task.completed)} ${title}`
    + formatDueLabel(task, window)
    + (isVerbose() ? formatPositions(task) : '')
    + formatTags(task.tags);
}

// --- Result output ---

export function printResult<T>(result: TaskResult | DataResult<T>): void {
  if (isError(result)) {
    error(describeError(result));
    process.exitCode = 1;
    return;
  }
  success(result.message);
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

export function debug(message: string): void {
  if (verbose) console.log(chalk.dim(`[debug] ${message}`));
}

// --- Utilities ---

export function truncate(s: string, maxLen: number): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen - 1) + '…';
}
