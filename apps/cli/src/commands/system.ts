import { Command } from 'commander';
import chalk from 'chalk';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';
import { disable, enable, isDisabled, uninstall } from '../lifecycle.js';

export function createDisableCommand(ctx: CliContext): Command {
  return new Command('disable')
    .description('Disable tinytask until it is enabled again')
    .argument('[reason]', 'Why it is being disabled')
    .action((reason: string | undefined) => $try(() => {
      const info = disable(ctx.dataDir, reason);
      out.warning(`tinytask disabled: ${info.reason}`);
      out.info(chalk.dim('Run the enable command to turn it back on'));
    }));
}

export function createEnableCommand(ctx: CliContext): Command {
  return new Command('enable')
    .description('Re-enable tinytask after it was disabled')
    .action(() => $try(() => {
      if (enable(ctx.dataDir)) {
        out.success('tinytask enabled');
      } else {
        out.info('tinytask is already enabled');
      }
    }));
}

export function createUninstallCommand(ctx: CliContext): Command {
  return new Command('uninstall')
    .description('Delete all tinytask data (tasks, archive, config)')
    .option('-y, --yes', 'Confirm deletion')
    .action((opts: { yes?: boolean }) => $try(() => {
      if (!opts.yes) {
        out.warning(`This permanently deletes ${ctx.dataDir}. Pass --yes to confirm`);
        process.exitCode = 1;
        return;
      }

      if (uninstall(ctx.dataDir)) {
        out.success(`Removed ${ctx.dataDir}`);
      } else {
        out.info(`Nothing to remove at ${ctx.dataDir}`);
      }
    }));
}

/** Commands that still run while the disabled marker is present */
export const UNGATED_COMMANDS: readonly string[] = ['enable', 'uninstall', 'config'];

export function gateMessage(ctx: CliContext): string | null {
  return isDisabled(ctx.dataDir)
    ? 'tinytask is disabled. Run the enable command to turn it back on'
    : null;
}
