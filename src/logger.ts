import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

const SERVICE_NAME = 'register-search';

/**
 * Logs go to stderr: stdout carries the MCP protocol when the server runs
 * over stdio.
 */
export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): Logger {
  return pino(
    {
      level,
      base: { service: SERVICE_NAME },
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    pino.destination(2),
  );
}

export const logger = createLogger();
