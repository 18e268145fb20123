import { Command } from 'commander';
import { getConfig, setSetting, isConfigKey, CONFIG_KEYS, withRetry } from '@taskline/core';
import * as out from '../output.js';
import type { SessionFactory } from '../helpers.js';
import { $try } from '../helpers.js';

export function createConfigCommand(session: SessionFactory): Command {
  const configCommand = new Command('config')
    .description(`Read or change settings (${CONFIG_KEYS.join(', ')})`);

  configCommand.addCommand(
    new Command('get')
      .description('Print a setting')
      .argument('<key>', CONFIG_KEYS.join(' | '))
      .action((key: string, _opts: unknown, cmd: Command) => $try(() => {
        if (!isConfigKey(key)) {
          out.error(`Unknown config key "${key}". Valid keys: ${CONFIG_KEYS.join(', ')}`);
          process.exitCode = 1;
          return;
        }
        const { db } = session(cmd);
        out.info(getConfig(db, key) ?? '(not set)');
      })),
  );

  configCommand.addCommand(
    new Command('set')
      .description('Change a setting')
      .argument('<key>', CONFIG_KEYS.join(' | '))
      .argument('<value>', 'New value')
      .action((key: string, value: string, _opts: unknown, cmd: Command) => $try(async () => {
        const { db } = session(cmd);
        out.printResult(await withRetry(() => setSetting(db, key, value)));
      })),
  );

  return configCommand;
}
