import { Command } from 'commander';
import { getStats, loadConfig } from '@tinytask/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createStatsCommand(ctx: CliContext): Command {
  return new Command('stats')
    .description('Show task statistics')
    .option('--json', 'Output in JSON format')
    .action((opts: { json?: boolean }) => $try(() => {
      const config = loadConfig(ctx.dataDir);
      const stats = getStats(ctx.store.load(), { upcomingDays: config.upcomingDays });

      if (opts.json) {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }
      if (stats.total === 0) {
        out.info('No tasks yet... use the add command to create one');
        return;
      }
      out.printStats(stats);
    }));
}
