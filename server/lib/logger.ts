/**
 * Shared pino logger. Pretty output in development, JSON lines elsewhere,
 * and whatever LOG_LEVEL says (tests run with "silent").
 */
import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { getEnv } from '../config/env';

const env = getEnv();

/** Also handed to Fastify so request logs share level and format */
export const loggerOptions: LoggerOptions = {
  level: env.LOG_LEVEL,
  ...(env.NODE_ENV === 'development'
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }
    : {}),
};

const logger: Logger = pino(loggerOptions);

export const dbLogger: Logger = logger.child({ module: 'db' });
export const salesLogger: Logger = logger.child({ module: 'sales' });
export const purchaseLogger: Logger = logger.child({ module: 'purchases' });
export const inventoryLogger: Logger = logger.child({ module: 'inventory' });
export const unitOfWorkLogger: Logger = logger.child({ module: 'unit-of-work' });

export default logger;
