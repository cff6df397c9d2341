/**
 * Application logger based on pino.
 * Structured JSON logs; pretty-printed in development.
 * Validation failures log at debug, misconfigured declarations and crashes at error.
 */
import pino from 'pino';
import type { Logger as PinoLogger } from 'pino';
import { config } from '../config/Config';

export type AppLogger = PinoLogger;

const level = process.env.LOG_LEVEL || (config.env === 'production' ? 'info' : 'debug');

export const logger: AppLogger = pino({
  level,
  base: {
    service: config.serviceName,
    version: config.serviceVersion,
    env: config.env,
  },
  transport:
    config.env === 'development'
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

/**
 * Logger bound to one request, so every line carries its correlationId.
 */
export function requestLogger(correlationId: string | undefined): AppLogger {
  return correlationId === undefined ? logger : logger.child({ correlationId });
}
