import { Command } from 'commander';
import { updateTask, withRetry } from '@taskline/core';
import type { DueByInput } from '@taskline/core';
import * as out from '../output.js';
import type { SessionFactory } from '../helpers.js';
import { $try, buildDueInput } from '../helpers.js';

export function createDueCommand(session: SessionFactory): Command {
  return new Command('due')
    .description("Set or clear a task's due date")
    .argument('<taskId>', 'The task ID')
    .argument('<date>', "Due date (today, tomorrow, friday, jan15, +3d, or 'clear')")
    .option('--at <time>', 'Due time on your clock (HH:mm)')
    .action((taskId: string, dateStr: string, opts: { at?: string }, cmd: Command) => $try(async () => {
      const { db, context } = session(cmd);

      let dueBy: DueByInput | null;
      if (dateStr.toLowerCase() === 'clear') {
        dueBy = null;
      } else {
        const parsed = buildDueInput(dateStr, opts.at, context);
        if (parsed.type !== 'success') return out.printResult(parsed);
        dueBy = parsed.data;
      }

      const result = await withRetry(() => updateTask(db, context, taskId, { dueBy }));
      if (result.type !== 'success') return out.printResult(result);
      out.success(dueBy ? `Task ${taskId} is due ${result.data.dueBy?.date ?? dueBy.date}` : `Cleared due date of task ${taskId}`);
    }));
}
