/**
 * pino logging for the API and worker processes.
 *
 * Development pretty-prints through pino-pretty; everything else writes JSON
 * lines. Tests stay silent unless LOG_LEVEL asks otherwise.
 */

import pino, { type LoggerOptions } from 'pino';
import { config } from './config';

export type Logger = pino.Logger;

export type LogModule = 'ledger' | 'credibility' | 'task-review' | 'badges' | 'worker' | 'outbox' | 'db' | 'api';

const REDACTED_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'token',
  '*.token',
  'jwtSecret',
  'auth.jwtSecret',
];

export function loggerOptions(app: Pick<typeof config.app, 'env' | 'isDevelopment' | 'isTest'> = config.app): LoggerOptions {
  const pretty = app.isDevelopment && !app.isTest;
  const level = process.env.LOG_LEVEL || (app.isTest ? 'silent' : pretty ? 'debug' : 'info');

  return {
    level,
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
    base: { service: 'household-xp', env: app.env },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'HH:MM:ss.l', ignore: 'pid,hostname,service,env' },
          },
        }
      : {}),
  };
}

export const logger: Logger = pino(loggerOptions());

export function moduleLogger(module: LogModule): Logger {
  return logger.child({ module });
}

export const ledgerLogger = moduleLogger('ledger');
export const credibilityLogger = moduleLogger('credibility');
export const taskLogger = moduleLogger('task-review');
export const badgeLogger = moduleLogger('badges');
export const workerLogger = moduleLogger('worker');
export const outboxLogger = moduleLogger('outbox');
export const dbLogger = moduleLogger('db');
export const apiLogger = moduleLogger('api');
