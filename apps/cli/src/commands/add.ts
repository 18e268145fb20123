import { Command } from 'commander';
import { createTask, withRetry } from '@taskline/core';
import type { CreateTaskInput } from '@taskline/core';
import * as out from '../output.js';
import type { SessionFactory, PlacementOptions } from '../helpers.js';
import { $try, collect, parsePriorityArg, buildDueInput, buildPositionHint } from '../helpers.js';

type AddOptions = PlacementOptions & {
  due?: string;
  at?: string;
  priority?: string;
  tag?: string[];
  project?: string;
  description?: string;
};

export function createAddCommand(session: SessionFactory): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title')
    .option('-d, --due <date>', 'Due date (today, tomorrow, friday, jan15, +3d, 2025-09-09)')
    .option('--at <time>', 'Due time on your clock (HH:mm); needs --due')
    .option('-p, --priority <level>', 'Priority (high, medium, low)')
    .option('-t, --tag <tag>', 'Tag the task (repeatable)', collect)
    .option('--project <id>', 'Project the task belongs to')
    .option('--description <text>', 'Longer description')
    .option('--top', 'Place the task at the top of its bucket')
    .option('--after <taskId>', 'Place the task after another task of the same bucket')
    .option('--position <n>', 'Place the task at an exact position')
    .action((title: string, opts: AddOptions, cmd: Command) => $try(async () => {
      const { db, context } = session(cmd);
      const input: CreateTaskInput = { title, description: opts.description, tags: opts.tag ?? [], projectId: opts.project ?? null };

      if (opts.priority !== undefined) {
        const priority = parsePriorityArg(opts.priority);
        if (!priority) {
          out.error(`Invalid priority: ${opts.priority}. Use high, medium or low`);
          process.exitCode = 1;
          return;
        }
        input.priority = priority;
      }

      if (opts.at !== undefined && opts.due === undefined) {
        out.error('--at needs a date; pass --due as well');
        process.exitCode = 1;
        return;
      }
      if (opts.due !== undefined) {
        const due = buildDueInput(opts.due, opts.at, context);
        if (due.type !== 'success') return out.printResult(due);
        input.dueBy = due.data;
      }

      const hint = buildPositionHint(opts);
      if (hint.type !== 'success') return out.printResult(hint);
      input.positionHint = hint.data;

      const result = await withRetry(() => createTask(db, context, input));
      if (result.type !== 'success') return out.printResult(result);
      out.success(`Task ${result.data.id} saved at position ${result.data.position}. Use the list command to see your tasks`);
    }));
}
