import { Command } from 'commander';
import { resolve } from 'node:path';
import {
  defaultExportFileName, exportTasks, filterTasks, loadConfig,
  parseExportFormat, writeFileAtomic,
} from '@tinytask/core';
import type { Task } from '@tinytask/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

interface ExportOptions {
  format: string;
  output?: string;
  stdout?: boolean;
  all?: boolean;
  archived?: boolean;
  tag?: string;
  priority?: string;
  due?: string;
}

export function createExportCommand(ctx: CliContext): Command {
  return new Command('export')
    .description('Export tasks to a JSON or CSV file')
    .option('-f, --format <format>', 'Output format: json, csv', 'json')
    .option('-o, --output <file>', 'Output file (default: tasks_<timestamp>.<format>)')
    .option('--stdout', 'Write to standard output instead of a file')
    .option('-a, --all', 'Include completed tasks')
    .option('--archived', 'Export the archive instead of the active tasks')
    .option('-t, --tag <tag>', 'Only tasks with this tag')
    .option('-p, --priority <level>', 'Only tasks with this priority')
    .option('--due <window>', 'Only tasks due: overdue, today, upcoming, none')
    .action((opts: ExportOptions) => $try(() => {
      const format = parseExportFormat(opts.format);
      const config = loadConfig(ctx.dataDir);

      const source: readonly Task[] = opts.archived ? ctx.store.loadArchive() : ctx.store.load();
      const tasks = filterTasks(source, {
        tag: opts.tag,
        priority: opts.priority,
        due: opts.due,
        includeDone: (opts.all ?? false) || (opts.archived ?? false),
        upcomingDays: config.upcomingDays,
      });

      const content = exportTasks(tasks, format, { tagDelimiter: config.tagDelimiter });
      if (opts.stdout) {
        process.stdout.write(content);
        return;
      }

      const target = resolve(opts.output ?? defaultExportFileName(format));
      writeFileAtomic(target, content);
      out.success(`Exported ${tasks.length} task(s) to ${target}`);
    }));
}
