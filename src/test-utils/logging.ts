import { pino } from 'pino';
import type { Logger } from 'pino';

export interface CapturedLog {
  logger: Logger;
  /** `msg` of every record written, in order */
  messages: string[];
}

/**
 * Logger at debug level that keeps each record's message in memory
 */
export function captureLogger(): CapturedLog {
  const messages: string[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(line: string) {
        const record: unknown = JSON.parse(line);
        if (typeof record === 'object' && record !== null && 'msg' in record) {
          messages.push(String(record.msg));
        }
      }
    }
  );
  return { logger, messages };
}
