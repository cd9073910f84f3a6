/**
 * Logging configuration using Pino.
 */

import pino, { type LoggerOptions } from 'pino';
import { config } from '../config.js';

const env = process.env.NODE_ENV;

/**
 * Pino options shared by the module logger and the Fastify server.
 */
export const loggerConfig: LoggerOptions = {
  level: config.LOG_LEVEL.toLowerCase(),
  enabled: env !== 'test',
  transport:
    env !== 'production' && env !== 'test'
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
