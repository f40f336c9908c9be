/**
 * Logging configuration using Pino.
 */

import pino, { type LoggerOptions } from 'pino';
import { config } from '../config.js';

/**
 * Pino options shared by the standalone logger and Fastify's request logger.
 */
export const loggerConfig: LoggerOptions = {
  level: config.LOG_LEVEL.toLowerCase(),
  transport:
    process.env.NODE_ENV !== 'production'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
};

/**
 * Global logger instance configured with environment settings.
 */
export const logger = pino(loggerConfig);
