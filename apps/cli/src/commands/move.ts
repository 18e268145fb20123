import { Command } from 'commander';
import { moveTask, bucketKey, withRetry } from '@taskline/core';
import * as out from '../output.js';
import type { SessionFactory, MoveOptions } from '../helpers.js';
import { $try, buildMoveRequest } from '../helpers.js';

export function createMoveCommand(session: SessionFactory): Command {
  return new Command('move')
    .description('Reorder a task within its bucket')
    .argument('<taskId>', 'The task ID to move')
    .option('--after <taskId>', 'Place the task right after this task')
    .option('--before <taskId>', 'Place the task right before this task')
    .option('--top', 'Place the task first')
    .option('--bottom', 'Place the task last')
    .option('--overdue', 'Fail unless the task (and reference) are overdue')
    .option('--expect-version <n>', 'Fail if the task changed since this version')
    .action((taskId: string, opts: MoveOptions, cmd: Command) => $try(async () => {
      const { db, context } = session(cmd);
      const request = buildMoveRequest(opts);
      if (request.type !== 'success') return out.printResult(request);

      const result = await withRetry(() => moveTask(db, context, taskId, request.data));
      if (result.type !== 'success') return out.printResult(result);
      const { task, bucket } = result.data;
      const position = bucket.kind === 'overdue' ? task.overduePosition : task.position;
      out.success(`Moved task ${task.id} to position ${position ?? '-'} in ${bucketKey(bucket)}`);
      out.debug(`Task ${task.id} is now at version ${task.version}`);
    }));
}
