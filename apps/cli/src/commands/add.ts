import { Command } from 'commander';
import { addTask } from '@tinytask/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try, collect, splitTags } from '../helpers.js';

interface AddOptions {
  tag: string[];
  priority: string;
  due?: string;
  note?: string;
}

export function createAddCommand(ctx: CliContext): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title')
    .option('-t, --tag <tag>', 'Tag the task (repeatable or comma-separated)', collect, [])
    .option('-p, --priority <level>', 'Priority: low, medium, high', 'medium')
    .option('-d, --due <date>', 'Due date: yyyy-MM-dd, today, tomorrow, +3d, friday, jan15')
    .option('-n, --note <text>', 'Longer note')
    .action((title: string, opts: AddOptions) => $try(() => {
      const { tasks, task } = addTask(ctx.store.load(), {
        title,
        tags: splitTags(opts.tag),
        priority: opts.priority,
        dueDate: opts.due ?? null,
        note: opts.note ?? null,
      });
      ctx.store.save(tasks);

      out.success(`Task added with id ${task.id}`);
      console.log(out.formatTaskLine(task));
    }));
}
