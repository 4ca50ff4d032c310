import { Command } from 'commander';
import chalk from 'chalk';
import { archiveDone } from '@tinytask/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createArchiveCommand(ctx: CliContext): Command {
  return new Command('archive')
    .description('Move completed tasks to the archive')
    .option('-l, --list', 'Show archived tasks instead')
    .action((opts: { list?: boolean }) => $try(() => {
      if (opts.list) {
        const archive = ctx.store.loadArchive();
        if (archive.length === 0) {
          out.info('Archive is empty');
          return;
        }
        for (const task of archive) {
          const archivedAt = task.archivedAt ? chalk.dim(`  archived ${out.formatTimestamp(task.archivedAt)}`) : '';
          console.log(`${out.formatTaskLine(task)}${archivedAt}`);
        }
        out.info(chalk.dim(`${archive.length} archived task(s)`));
        return;
      }

      const { tasks, archived } = archiveDone(ctx.store.load());
      if (archived.length === 0) {
        out.info('No completed tasks to archive');
        return;
      }

      // Archive first: an interrupted run leaves a duplicate, never a lost task
      ctx.store.appendArchive(archived);
      ctx.store.save(tasks);
      out.success(`Archived ${archived.length} completed task(s)`);
    }));
}
