/**
 * Structured logging with Pino
 */

import pino, { type Logger } from 'pino';
import * as dotenv from 'dotenv';

dotenv.config();

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const LOG_PRETTY = process.env.LOG_PRETTY === 'true';

/**
 * Create Pino logger instance
 */
export const logger = pino({
  level: LOG_LEVEL,
  transport: LOG_PRETTY
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type { Logger };

/**
 * Child logger bound to one worker of a crawl run
 */
export function workerLogger(parent: Logger, kind: 'fetch' | 'index', workerId: number): Logger {
  return parent.child({ worker: workerId, kind });
}

/**
 * Log crawl statistics
 */
export function logCrawlStats(
  log: Logger,
  stats: {
    runId: string;
    pagesIndexed: number;
    linksDiscovered: number;
    fetchFailures: number;
    durationMs?: number;
  }
) {
  log.info(
    {
      stats,
      durationSec: Math.round((stats.durationMs ?? 0) / 1000),
    },
    'Crawl completed'
  );
}
