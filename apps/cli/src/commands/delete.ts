import { Command } from 'commander';
import { deleteTask, withRetry } from '@taskline/core';
import * as out from '../output.js';
import type { SessionFactory } from '../helpers.js';
import { $try } from '../helpers.js';

export function createDeleteCommand(session: SessionFactory): Command {
  return new Command('delete')
    .description('Delete a task permanently')
    .argument('<taskId>', 'The id of the task to delete')
    .action((taskId: string, _opts: unknown, cmd: Command) => $try(async () => {
      const { db, context } = session(cmd);
      out.printResult(await withRetry(() => deleteTask(db, context, taskId)));
    }));
}
