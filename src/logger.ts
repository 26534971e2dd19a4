import path from 'node:path';

import pino from 'pino';

import { LOG_DIR, LOG_LEVEL } from './config.js';

function logFileName(now: Date = new Date()): string {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, '0');
  const d = String(now.getDate()).padStart(2, '0');
  return `weekly-lists-${y}${m}${d}.log`;
}

export const logger = pino({
  level: LOG_LEVEL,
  transport: {
    targets: [
      { target: 'pino-pretty', level: LOG_LEVEL, options: { colorize: true } },
      {
        target: 'pino/file',
        level: LOG_LEVEL,
        options: { destination: path.join(LOG_DIR, logFileName()), mkdir: true },
      },
    ],
  },
});

// Route uncaught errors through pino so they get timestamps in the log file too
process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
});
