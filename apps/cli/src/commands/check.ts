import { Command } from 'commander';
import { completeTask, reopenTask, withRetry } from '@taskline/core';
import * as out from '../output.js';
import type { SessionFactory } from '../helpers.js';
import { $try } from '../helpers.js';

export function createCheckCommand(session: SessionFactory): Command {
  return new Command('check')
    .description('Mark a task as completed')
    .argument('<taskId>', 'The id of the task to check')
    .action((taskId: string, _opts: unknown, cmd: Command) => $try(async () => {
      const { db, context } = session(cmd);
      out.printResult(await withRetry(() => completeTask(db, context, taskId)));
    }));
}

export function createUncheckCommand(session: SessionFactory): Command {
  return new Command('uncheck')
    .description('Mark a task as not completed')
    .argument('<taskId>', 'The id of the task to uncheck')
    .action((taskId: string, _opts: unknown, cmd: Command) => $try(async () => {
      const { db, context } = session(cmd);
      out.printResult(await withRetry(() => reopenTask(db, context, taskId)));
    }));
}
