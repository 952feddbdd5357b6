import process from 'node:process';
import { pino } from 'pino';
import type { Logger } from 'pino';

/**
 * Package logger. Level comes from LOG_LEVEL, default 'info'
 */
export const logger: Logger = pino({
  name: 'cache-lock',
  level: process.env['LOG_LEVEL'] ?? 'info',
});

export type { Logger };
