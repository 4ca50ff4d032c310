import { Command } from 'commander';
import chalk from 'chalk';
import { filterTasks, loadConfig } from '@tinytask/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

interface ListOptions {
  all?: boolean;
  tag?: string;
  priority?: string;
  due?: string;
}

export function createListCommand(ctx: CliContext): Command {
  return new Command('list')
    .description('List tasks')
    .option('-a, --all', 'Include completed tasks')
    .option('-t, --tag <tag>', 'Only tasks with this tag')
    .option('-p, --priority <level>', 'Only tasks with this priority (low, medium, high)')
    .option('--due <window>', 'Only tasks due: overdue, today, upcoming, none')
    .action((opts: ListOptions) => $try(() => {
      const config = loadConfig(ctx.dataDir);
      const tasks = filterTasks(ctx.store.load(), {
        tag: opts.tag,
        priority: opts.priority,
        due: opts.due,
        includeDone: opts.all ?? false,
        upcomingDays: config.upcomingDays,
      });

      if (tasks.length === 0) {
        out.info('No tasks found');
        if (!opts.all) out.info(chalk.dim('Tip: use --all to see completed tasks'));
        return;
      }

      out.printTasks(tasks);

      if (opts.all) {
        const done = tasks.filter(t => t.done).length;
        console.log();
        out.info(chalk.dim(`Total: ${tasks.length} | Done: ${done} | Pending: ${tasks.length - done}`));
      }
    }));
}
