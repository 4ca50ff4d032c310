import { Command } from 'commander';
import { getTaskById, parseTaskId, setTags } from '@tinytask/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try, splitTags } from '../helpers.js';

export function createTagCommand(ctx: CliContext): Command {
  return new Command('tag')
    .description("Replace a task's tags (no tags clears them)")
    .argument('<id>', 'The task id')
    .argument('[tags...]', 'The new tags')
    .action((id: string, tags: string[]) => $try(() => {
      const taskId = parseTaskId(id);
      const updated = setTags(ctx.store.load(), taskId, splitTags(tags));
      ctx.store.save(updated);

      const task = getTaskById(updated, taskId);
      if (!task || task.tags.length === 0) {
        out.success(`Tags cleared for task ${taskId}`);
      } else {
        out.success(`Tags updated for task ${taskId}:${out.formatTags(task.tags)}`);
      }
    }));
}
