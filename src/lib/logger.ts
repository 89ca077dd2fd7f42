import { pino } from 'pino';
import type { DestinationStream, LevelWithSilent, Logger, LoggerOptions } from 'pino';

import { env } from '../config/index.js';

const redactPaths: string[] = [
  'key',
  'mask',
  'plaintext',
  '*.key',
  '*.mask',
  '*.plaintext'
];

export interface CreateLoggerOptions {
  /** Default: LOG_LEVEL */
  level?: LevelWithSilent;
  /** Write JSON lines here instead of stdout (disables pino-pretty) */
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions: LoggerOptions = {
    level: options.level ?? env.LOG_LEVEL,
    base: {
      app: 'asset-shield',
      env: env.NODE_ENV
    },
    redact: {
      paths: redactPaths,
      remove: true
    }
  };

  if (options.destination) {
    return pino(loggerOptions, options.destination);
  }

  return pino({
    ...loggerOptions,
    transport: env.isDevelopment
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            singleLine: true
          }
        }
      : undefined
  });
}

export const logger = createLogger();

export type { Logger } from 'pino';
