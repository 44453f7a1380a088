import { configure, getConsoleSink, getLogger, type Logger } from '@logtape/logtape';
import type { LogLevelName } from './config.js';

/** Root category shared by the core library and the app */
export const LOG_CATEGORY = 'todo-list';

export async function configureLogger(lowestLevel: LogLevelName): Promise<Logger> {
  await configure({
    reset: true,
    sinks: { console: getConsoleSink() },
    loggers: [
      {
        category: [LOG_CATEGORY],
        lowestLevel,
        sinks: ['console'],
      },
      {
        category: ['logtape', 'meta'],
        lowestLevel: 'warning',
        sinks: ['console'],
      },
    ],
  });

  const logger = getLogger([LOG_CATEGORY]);
  logger.debug`Logger configured`;
  return logger;
}
