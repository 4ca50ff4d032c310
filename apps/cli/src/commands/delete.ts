import { Command } from 'commander';
import { clearTasks, deleteTask, parseTaskId } from '@tinytask/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createDeleteCommand(ctx: CliContext): Command {
  return new Command('delete')
    .description('Delete a task permanently')
    .argument('<id>', 'The task id')
    .action((id: string) => $try(() => {
      const taskId = parseTaskId(id);
      ctx.store.save(deleteTask(ctx.store.load(), taskId));
      out.success(`Task ${taskId} deleted`);
    }));
}

export function createClearCommand(ctx: CliContext): Command {
  return new Command('clear')
    .description('Delete completed tasks, or every task with --force')
    .option('-d, --done', 'Delete only completed tasks')
    .option('-f, --force', 'Delete every task, pending ones included')
    .action((opts: { done?: boolean; force?: boolean }) => $try(() => {
      const doneOnly = opts.done ?? false;
      const what = doneOnly ? 'completed task(s)' : 'task(s)';

      if (!doneOnly && !opts.force) {
        out.warning('This deletes ALL tasks. Pass --force to confirm, or --done to delete only completed tasks');
        process.exitCode = 1;
        return;
      }

      const tasks = ctx.store.load();
      const remaining = clearTasks(tasks, doneOnly);
      const count = tasks.length - remaining.length;
      if (count === 0) {
        out.info(`No ${what} to clear`);
        return;
      }

      ctx.store.save(remaining);
      out.success(`Cleared ${count} ${what}`);
    }));
}
