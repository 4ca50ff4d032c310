import { Command } from 'commander';
import { ValidationError, editTask, getTaskById, parseTaskId } from '@tinytask/core';
import type { TaskPatch } from '@tinytask/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try, collect, splitTags } from '../helpers.js';

interface EditOptions {
  title?: string;
  tag?: string[];
  priority?: string;
  due?: string;
  note?: string;
  clearDue?: boolean;
  clearNote?: boolean;
}

/** Translate command-line flags into an explicit patch */
export function toPatch(opts: EditOptions): TaskPatch {
  if (opts.due !== undefined && opts.clearDue) {
    throw new ValidationError('Use either --due or --clear-due, not both', 'dueDate');
  }
  if (opts.note !== undefined && opts.clearNote) {
    throw new ValidationError('Use either --note or --clear-note, not both', 'note');
  }

  const patch: TaskPatch = {};
  if (opts.title !== undefined) patch.title = opts.title;
  if (opts.tag !== undefined) patch.tags = splitTags(opts.tag);
  if (opts.priority !== undefined) patch.priority = opts.priority;
  if (opts.clearDue) patch.dueDate = null;
  else if (opts.due !== undefined) patch.dueDate = opts.due;
  if (opts.clearNote) patch.note = null;
  else if (opts.note !== undefined) patch.note = opts.note;
  return patch;
}

export function createEditCommand(ctx: CliContext): Command {
  return new Command('edit')
    .description("Edit a task's title, tags, priority, due date or note")
    .argument('<id>', 'The task id')
    .option('--title <title>', 'New title')
    .option('-t, --tag <tag>', 'Replace the tags (repeatable or comma-separated)', collect)
    .option('-p, --priority <level>', 'New priority: low, medium, high')
    .option('-d, --due <date>', 'New due date')
    .option('-n, --note <text>', 'New note')
    .option('--clear-due', 'Remove the due date')
    .option('--clear-note', 'Remove the note')
    .action((id: string, opts: EditOptions) => $try(() => {
      const taskId = parseTaskId(id);
      const patch = toPatch(opts);
      if (Object.keys(patch).length === 0) {
        out.warning('Nothing to change. See --help for the fields you can edit');
        return;
      }

      const tasks = editTask(ctx.store.load(), taskId, patch);
      ctx.store.save(tasks);

      out.success(`Task ${taskId} updated`);
      const task = getTaskById(tasks, taskId);
      if (task) console.log(out.formatTaskLine(task));
    }));
}
