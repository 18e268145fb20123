import { Command } from 'commander';
import chalk from 'chalk';
import type { Task, TaskPage, DayWindow, View } from '@taskline/core';
import { listPage, parseView, resolveContext, classifyTask, withRetry, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '@taskline/core';
import * as out from '../output.js';
import type { SessionFactory } from '../helpers.js';
import { $try, parsePriorityArg, parseIntegerArg } from '../helpers.js';

type ListOptions = {
  completed?: boolean;
  priority?: string;
  tag?: string;
  page?: string;
  size?: string;
};

export function createListCommand(session: SessionFactory): Command {
  return new Command('list')
    .description('List tasks, optionally through a view (inbox, today, upcoming)')
    .argument('[view]', 'inbox, today or upcoming; all tasks when omitted')
    .option('-c, --completed', 'Show completed tasks instead of open ones')
    .option('-p, --priority <level>', 'Filter by priority (high, medium, low); all tasks only')
    .option('-t, --tag <tag>', 'Filter by tag; all tasks only')
    .option('--page <n>', 'Page to show, starting at 0', '0')
    .option('--size <n>', `Tasks per page (max ${MAX_PAGE_SIZE})`, String(DEFAULT_PAGE_SIZE))
    .action((viewName: string | undefined, opts: ListOptions, cmd: Command) => $try(async () => {
      const { db, context } = session(cmd);

      const view = parseView(viewName);
      if (view.type !== 'success') return out.printResult(view);

      const priority = opts.priority !== undefined ? parsePriorityArg(opts.priority) : null;
      if (opts.priority !== undefined && !priority) {
        out.error(`Invalid priority: ${opts.priority}. Use high, medium or low`);
        process.exitCode = 1;
        return;
      }
      if (view.data.kind !== 'all' && (priority || opts.tag)) {
        out.warning('--priority and --tag only apply when listing all tasks');
      }

      const page = parseIntegerArg(opts.page ?? '0', 'page');
      if (page.type !== 'success') return out.printResult(page);
      const size = parseIntegerArg(opts.size ?? String(DEFAULT_PAGE_SIZE), 'size');
      if (size.type !== 'success') return out.printResult(size);

      const resolved = resolveContext(context);
      if (resolved.type !== 'success') return out.printResult(resolved);

      // The today view may assign overdue positions, so it counts as a write
      const result = await withRetry(() => listPage(db, context, {
        view: view.data,
        completed: opts.completed ?? false,
        priority: priority ?? undefined,
        tag: opts.tag,
        page: page.data,
        size: size.data,
      }));
      if (result.type !== 'success') return out.printResult(result);

      displayTasks(result.data.tasks, view.data, resolved.data.window, opts.completed ?? false);
      const footer = pageFooter(result.data.tasks.length, result.data);
      if (footer) out.info(chalk.dim(footer));
    }));
}

/** Where the page sits in the whole list; empty when everything fits on one page */
export function pageFooter(shown: number, { total, page, size }: Omit<TaskPage, 'tasks'>): string {
  if (page === 0 && total <= size) return '';
  const pages = Math.max(1, Math.ceil(total / size));
  if (shown === 0) return `Page ${page + 1} is past the end (${pages} page(s), ${total} task(s))`;
  const first = page * size + 1;
  return `Page ${page + 1} of ${pages}: tasks ${first}-${first + shown - 1} of ${total}`;
}

function emptyMessage(view: View, completed: boolean): string {
  switch (view.kind) {
    case 'inbox': return 'Inbox is empty';
    case 'today': return 'Nothing due today';
    case 'upcoming': return 'Nothing upcoming';
    case 'all': return completed
      ? 'No completed tasks found'
      : 'No tasks saved yet... use the add command to create one';
  }
}

function displayTasks(tasks: Task[], view: View, window: DayWindow, completed: boolean): void {
  if (view.kind !== 'all') {
    console.log(chalk.bold.underline(`${view.kind[0]?.toUpperCase() ?? ''}${view.kind.slice(1)} (${window.today}, ${window.timezone})`));
  }
  if (tasks.length === 0) {
    out.info(emptyMessage(view, completed));
    return;
  }

  let overdueHeader = false;
  let restHeader = false;
  for (const task of tasks) {
    if (view.kind === 'today') {
      const overdue = classifyTask(task, window) === 'overdue';
      if (overdue && !overdueHeader) {
        console.log(chalk.red.bold('Overdue'));
        overdueHeader = true;
      }
      if (!overdue && overdueHeader && !restHeader) {
        console.log(chalk.bold('Today'));
        restHeader = true;
      }
    }
    console.log(out.formatTask(task, window));
    if (task.description) console.log(`           ${chalk.dim(out.truncate(task.description.split('\n')[0] ?? '', 60))}`);
  }
}
