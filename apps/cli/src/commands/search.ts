import { Command } from 'commander';
import chalk from 'chalk';
import { searchTasks } from '@tinytask/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createSearchCommand(ctx: CliContext): Command {
  return new Command('search')
    .description('Search task titles and notes (case-insensitive)')
    .argument('<keyword>', 'Text to look for')
    .option('-a, --all', 'Include completed tasks')
    .action((keyword: string, opts: { all?: boolean }) => $try(() => {
      const results = searchTasks(ctx.store.load(), keyword, opts.all ?? false);
      if (results.length === 0) {
        out.info(`No tasks matching '${keyword}'`);
        return;
      }

      for (const task of results) {
        console.log(out.formatTaskLine(task));
        if (task.note) console.log(`          ${chalk.dim(out.truncate(task.note.split('\n')[0] ?? '', 60))}`);
      }
      out.info(chalk.dim(`${results.length} match(es)`));
    }));
}
