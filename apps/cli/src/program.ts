import { Command } from 'commander';
import type { CliContext } from './context.js';

import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createShowCommand } from './commands/show.js';
import { createEditCommand } from './commands/edit.js';
import { createDoneCommand, createUndoneCommand } from './commands/check.js';
import { createTagCommand } from './commands/tag.js';
import { createDeleteCommand, createClearCommand } from './commands/delete.js';
import { createSearchCommand } from './commands/search.js';
import { createStatsCommand } from './commands/stats.js';
import { createArchiveCommand } from './commands/archive.js';
import { createExportCommand } from './commands/export.js';
import { createConfigCommand } from './commands/config.js';
import {
  createDisableCommand, createEnableCommand, createUninstallCommand,
  UNGATED_COMMANDS, gateMessage,
} from './commands/system.js';

export const VERSION = '1.0.0';

export function createProgram(ctx: CliContext): Command {
  const program = new Command()
    .name('tinytask')
    .description('Tiny local task manager')
    .version(VERSION);

  program.addCommand(createAddCommand(ctx));
  program.addCommand(createListCommand(ctx));
  program.addCommand(createShowCommand(ctx));
  program.addCommand(createEditCommand(ctx));
  program.addCommand(createDoneCommand(ctx));
  program.addCommand(createUndoneCommand(ctx));
  program.addCommand(createTagCommand(ctx));
  program.addCommand(createDeleteCommand(ctx));
  program.addCommand(createClearCommand(ctx));
  program.addCommand(createSearchCommand(ctx));
  program.addCommand(createStatsCommand(ctx));
  program.addCommand(createArchiveCommand(ctx));
  program.addCommand(createExportCommand(ctx));
  program.addCommand(createConfigCommand(ctx));
  program.addCommand(createDisableCommand(ctx));
  program.addCommand(createEnableCommand(ctx));
  program.addCommand(createUninstallCommand(ctx));

  // While disabled, only the lifecycle commands and config run
  program.hook('preAction', (_thisCommand, actionCommand) => {
    if (UNGATED_COMMANDS.includes(actionCommand.name())) return;
    const message = gateMessage(ctx);
    if (message) program.error(message, { exitCode: 1, code: 'tinytask.disabled' });
  });

  // Default action (no command): show task list
  program.action((_opts: unknown, cmd: Command) => {
    cmd.commands.find(c => c.name() === 'list')?.parse([], { from: 'user' });
  });

  return program;
}
