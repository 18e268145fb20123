import { Command } from 'commander';
import chalk from 'chalk';
import type { Task, DayWindow } from '@taskline/core';
import { PriorityName, getTask, resolveContext, classifyTask, bucketOf, bucketKey } from '@taskline/core';
import * as out from '../output.js';
import type { SessionFactory } from '../helpers.js';
import { $try } from '../helpers.js';

export function createGetCommand(session: SessionFactory): Command {
  return new Command('get')
    .description('Get detailed information about a task')
    .argument('<taskId>', 'The task ID to retrieve')
    .option('--json', 'Output in JSON format')
    .action((taskId: string, opts: { json?: boolean }, cmd: Command) => $try(() => {
      const { db, context } = session(cmd);
      const resolved = resolveContext(context);
      if (resolved.type !== 'success') return out.printResult(resolved);

      const result = getTask(db, context, taskId);
      if (result.type !== 'success') return out.printResult(result);

      if (opts.json) {
        outputJson(result.data, resolved.data.window);
      } else {
        outputHumanReadable(result.data, resolved.data.window);
      }
    }));
}

function outputJson(task: Task, window: DayWindow): void {
  const obj = {
    ...task,
    priority: PriorityName[task.priority].toLowerCase(),
    bucket: bucketKey(bucketOf(task)),
    classification: classifyTask(task, window),
  };
  console.log(JSON.stringify(obj, null, 2));
}

function outputHumanReadable(task: Task, window: DayWindow): void {
  const checkbox = task.completed ? '[x]' : '[ ]';
  const due = task.dueBy
    ? `${task.dueBy.date}${task.dueBy.time ? ` ${out.formatClock(task.dueBy.time, window.timezone)}` : ''}`
    : '-';
  const tags = task.tags.length ? task.tags.map(t => `#${t}`).join(' ') : '-';

  console.log(`${chalk.bold('ID:')}          ${task.id}`);
  console.log(`${chalk.bold('Title:')}       ${task.title}`);
  console.log(`${chalk.bold('Status:')}      ${checkbox} ${classifyTask(task, window)}`);
  console.log(`${chalk.bold('Priority:')}    ${PriorityName[task.priority]}`);
  console.log(`${chalk.bold('Due:')}         ${due}`);
  console.log(`${chalk.bold('Project:')}     ${task.projectId ?? '-'}`);
  console.log(`${chalk.bold('Tags:')}        ${tags}`);
  console.log(`${chalk.bold('Bucket:')}      ${bucketKey(bucketOf(task))}`);
  console.log(`${chalk.bold('Position:')}    ${task.position}${task.overduePosition != null ? ` (overdue ${task.overduePosition})` : ''}`);
  console.log(`${chalk.bold('Version:')}     ${task.version}`);
  console.log(`${chalk.bold('Created:')}     ${task.createdAt.replace('T', ' ').slice(0, 16)}`);
  if (task.completedOn) {
    console.log(`${chalk.bold('Completed:')}   ${task.completedOn.date} ${out.formatClock(task.completedOn.time, window.timezone)}`);
  }
  if (task.description) {
    console.log(`${chalk.bold('Description:')}`);
    console.log(task.description);
  }
}
