import { Command } from 'commander';
import { updateTask, withRetry } from '@taskline/core';
import type { UpdateTaskInput } from '@taskline/core';
import * as out from '../output.js';
import type { SessionFactory } from '../helpers.js';
import { $try, collect, parsePriorityArg, parseVersion } from '../helpers.js';

type EditOptions = {
  title?: string;
  description?: string;
  priority?: string;
  project?: string;
  tag?: string[];
  clearTags?: boolean;
  expectVersion?: string;
};

export function createEditCommand(session: SessionFactory): Command {
  return new Command('edit')
    .description("Change a task's fields")
    .argument('<taskId>', 'The task ID')
    .option('--title <title>', 'New title')
    .option('--description <text>', "New description ('' clears it)")
    .option('-p, --priority <level>', 'New priority (high, medium, low)')
    .option('--project <id>', "Move the task to a project ('none' removes it)")
    .option('-t, --tag <tag>', 'Replace the tags (repeatable)', collect)
    .option('--clear-tags', 'Remove all tags')
    .option('--expect-version <n>', 'Fail if the task changed since this version')
    .action((taskId: string, opts: EditOptions, cmd: Command) => $try(async () => {
      const { db, context } = session(cmd);
      const input: UpdateTaskInput = {};

      if (opts.title !== undefined) input.title = opts.title;
      if (opts.description !== undefined) input.description = opts.description;
      if (opts.priority !== undefined) {
        const priority = parsePriorityArg(opts.priority);
        if (!priority) {
          out.error(`Invalid priority: ${opts.priority}. Use high, medium or low`);
          process.exitCode = 1;
          return;
        }
        input.priority = priority;
      }
      if (opts.project !== undefined) input.projectId = opts.project.toLowerCase() === 'none' ? null : opts.project;
      if (opts.clearTags) input.tags = [];
      else if (opts.tag) input.tags = opts.tag;
      if (opts.expectVersion !== undefined) {
        const version = parseVersion(opts.expectVersion);
        if (version.type !== 'success') return out.printResult(version);
        input.expectedVersion = version.data;
      }

      if (Object.keys(input).filter(k => k !== 'expectedVersion').length === 0) {
        out.warning('Nothing to change. Pass at least one of --title, --description, --priority, --project, --tag');
        return;
      }

      out.printResult(await withRetry(() => updateTask(db, context, taskId, input)));
    }));
}
