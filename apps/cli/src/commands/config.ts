import { Command } from 'commander';
import chalk from 'chalk';
import { CONFIG_KEYS, getConfigPath, isConfigKey, loadConfig, saveConfig, setConfigValue, ValidationError } from '@tinytask/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createConfigCommand(ctx: CliContext): Command {
  return new Command('config')
    .description('Show or change settings')
    .argument('[key]', `Setting name: ${CONFIG_KEYS.join(', ')}`)
    .argument('[value]', 'New value')
    .action((key: string | undefined, value: string | undefined) => $try(() => {
      const config = loadConfig(ctx.dataDir);

      if (key === undefined) {
        for (const k of CONFIG_KEYS) {
          console.log(`${chalk.bold(k)} = ${String(config[k])}`);
        }
        out.info(chalk.dim(getConfigPath(ctx.dataDir)));
        return;
      }

      if (value === undefined) {
        if (!isConfigKey(key)) {
          throw new ValidationError(`Unknown config key '${key}'. Use: ${CONFIG_KEYS.join(', ')}`, key);
        }
        console.log(String(config[key]));
        return;
      }

      const updated = setConfigValue(config, key, value);
      saveConfig(ctx.dataDir, updated);
      out.success(`Set ${key} = ${value}`);
    }));
}
