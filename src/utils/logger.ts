/**
 * Logging configuration using Pino.
 */

import pino from 'pino';
import { env } from '../config.js';

const isTest = env.NODE_ENV === 'test' || env.VITEST !== undefined;

/**
 * Global logger instance configured with environment settings.
 */
export const logger = pino({
  level: isTest ? 'silent' : env.LOG_LEVEL.toLowerCase(),
  transport:
    env.NODE_ENV !== 'production' && !isTest
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});
