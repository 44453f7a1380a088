import { Command } from 'commander';
import { createDb, closeDb, TaskService } from '@todo-list/core';
import { loadConfig } from '../config.js';
import * as out from '../output.js';
import { withErrorHandling } from '../helpers.js';

interface StatsOptions {
  db?: string;
}

export function createStatsCommand(): Command {
  return new Command('stats')
    .description('Show task counts by status')
    .option('--db <path>', 'SQLite database file (env DATABASE_PATH)')
    .action(withErrorHandling((options: StatsOptions) => {
      const config = loadConfig(process.env, { DATABASE_PATH: options.db });
      const db = createDb(config.dbPath);
      try {
        const stats = new TaskService(db).stats();
        if (stats.total === 0) {
          out.info('No tasks found');
          return;
        }
        for (const line of out.formatStats(stats)) out.info(line);
      } finally {
        closeDb(db);
      }
    }));
}
