#!/usr/bin/env node

import { Command } from 'commander';

import { createSessionFactory } from './helpers.js';
import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createGetCommand } from './commands/get.js';
import { createCheckCommand, createUncheckCommand } from './commands/check.js';
import { createDeleteCommand } from './commands/delete.js';
import { createEditCommand } from './commands/edit.js';
import { createMoveCommand } from './commands/move.js';
import { createDueCommand } from './commands/due.js';
import { createStatsCommand } from './commands/stats.js';
import { createConfigCommand } from './commands/config.js';

// The database is opened on first use, once --db is known
const session = createSessionFactory();

// Build the CLI program
const program = new Command()
  .name('taskline')
  .description('Task manager with inbox, today and upcoming views')
  .version('1.0.0')
  .option('-u, --user <id>', 'Act as this user (default: config default_user, TASKLINE_USER, "local")')
  .option('--tz <zone>', 'IANA timezone for "today" (default: config timezone, TASKLINE_TZ, UTC)')
  .option('--db <path>', 'Database file (default: TASKLINE_DB or the platform data directory)')
  .option('-v, --verbose', 'Print debug output');

// Register commands
program.addCommand(createAddCommand(session));
program.addCommand(createListCommand(session));
program.addCommand(createGetCommand(session));
program.addCommand(createCheckCommand(session));
program.addCommand(createUncheckCommand(session));
program.addCommand(createEditCommand(session));
program.addCommand(createDueCommand(session));
program.addCommand(createMoveCommand(session));
program.addCommand(createDeleteCommand(session));
program.addCommand(createStatsCommand(session));
program.addCommand(createConfigCommand(session));

await program.parseAsync();
