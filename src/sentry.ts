/**
 * Sentry error tracking for the API and worker processes.
 *
 * Entry points call initSentry() before building the runtime. Without a DSN
 * nothing is initialized and captureException stays a no-op.
 */

import * as Sentry from '@sentry/node';
import { config, type AppConfig } from './config';
import { logger } from './logger';
import type { Actor } from './types';

export type ProcessRole = 'api' | 'workers';

const SCRUBBED_HEADERS = ['authorization', 'cookie'];

export function initSentry(role: ProcessRole, cfg: AppConfig = config): boolean {
  if (!cfg.sentry.dsn) {
    logger.debug({ role }, 'Sentry DSN not configured, error tracking disabled');
    return false;
  }

  Sentry.init({
    dsn: cfg.sentry.dsn,
    environment: cfg.sentry.environment,
    release: `household-xp-backend@${process.env.npm_package_version || '1.0.0'}`,
    tracesSampleRate: cfg.sentry.tracesSampleRate,
    sendDefaultPii: false,
    initialScope: { tags: { role } },

    beforeSend(event) {
      const headers = event.request?.headers;
      if (headers) {
        for (const name of SCRUBBED_HEADERS) {
          delete headers[name];
        }
      }
      return event;
    },

    ignoreErrors: ['ECONNRESET', 'EPIPE'],
  });

  logger.info({ role, environment: cfg.sentry.environment }, 'Sentry error tracking initialized');
  return true;
}

/** Tag later events with the acting household member; null clears it. */
export function setSentryActor(actor: Actor | null): void {
  Sentry.setUser(actor ? { id: actor.userId, role: actor.role } : null);
}
