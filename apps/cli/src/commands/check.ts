import { Command } from 'commander';
import { parseTaskId, setDone } from '@tinytask/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

function createSetDoneCommand(ctx: CliContext, name: string, done: boolean, description: string): Command {
  return new Command(name)
    .description(description)
    .argument('<id>', 'The task id')
    .action((id: string) => $try(() => {
      const taskId = parseTaskId(id);
      const tasks = ctx.store.load();
      const updated = setDone(tasks, taskId, done);

      if (updated === tasks) {
        out.info(`Task ${taskId} is already ${done ? 'done' : 'pending'}`);
        return;
      }

      ctx.store.save(updated);
      out.success(done ? `Task ${taskId} marked as done` : `Task ${taskId} marked as not done`);
    }));
}

export function createDoneCommand(ctx: CliContext): Command {
  return createSetDoneCommand(ctx, 'done', true, 'Mark a task as completed');
}

export function createUndoneCommand(ctx: CliContext): Command {
  return createSetDoneCommand(ctx, 'undone', false, 'Reopen a completed task');
}
