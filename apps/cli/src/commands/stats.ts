import { Command } from 'commander';
import chalk from 'chalk';
import { getStats } from '@taskline/core';
import * as out from '../output.js';
import type { SessionFactory } from '../helpers.js';
import { $try } from '../helpers.js';

export function createStatsCommand(session: SessionFactory): Command {
  return new Command('stats')
    .description("Show counts over your tasks for today")
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const { db, context } = session(cmd);
      const result = getStats(db, context);
      if (result.type !== 'success') return out.printResult(result);
      const stats = result.data;

      const overdueLabel = stats.overdue > 0 ? chalk.red(`${stats.overdue} overdue`) : chalk.dim('0 overdue');
      const todayLabel = stats.dueToday > 0 ? chalk.yellow(`${stats.dueToday} due today`) : chalk.dim('0 due today');
      const doneLabel = stats.completedToday > 0 ? chalk.green(`${stats.completedToday} done today`) : chalk.dim('0 done today');

      console.log(chalk.bold.underline(`Tasks of ${context.ownerId}`));
      console.log();
      console.log(`  Total: ${chalk.bold(String(stats.total))} (${chalk.gray(`${stats.pending} pending`)}, ${chalk.green(`${stats.completed} completed`)})`);
      console.log(`  Today: ${overdueLabel}, ${todayLabel}, ${doneLabel}`);
    }));
}
