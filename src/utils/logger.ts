/**
 * Structured logger with pino
 */
import pino, { Logger } from 'pino';
import config from '../config/index';

export const logger: Logger = pino({
  level: config.env === 'test' ? 'silent' : config.logLevel,
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
  base: {
    service: 'sleep-support-backend',
    env: config.env,
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export const createComponentLogger = (component: string): Logger => logger.child({ component });

export type { Logger };
