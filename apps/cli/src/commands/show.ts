import { Command } from 'commander';
import { NotFoundError, getTaskById, parseTaskId, toRecord } from '@tinytask/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createShowCommand(ctx: CliContext): Command {
  return new Command('show')
    .description('Show detailed information about a task')
    .argument('<id>', 'The task id')
    .option('--json', 'Output in JSON format')
    .action((id: string, opts: { json?: boolean }) => $try(() => {
      const taskId = parseTaskId(id);
      const task = getTaskById(ctx.store.load(), taskId);
      if (!task) throw new NotFoundError(taskId);

      if (opts.json) {
        console.log(JSON.stringify(toRecord(task), null, 2));
      } else {
        out.printTaskDetails(task);
      }
    }));
}
