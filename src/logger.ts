import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

const logger = pino(
  {
    name: 'vexel',
    level: process.env.VEXEL_LOG_LEVEL || 'warn',
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination({ dest: 2, sync: true })
);

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

export default logger;
