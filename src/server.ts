/**
 * Household XP Backend Server v1.0.0
 *
 * - Hono for HTTP handling
 * - tRPC for the economy API under /trpc/*
 * - Bearer JWT actors (child | guardian)
 * - Neon PostgreSQL behind the repository layer
 */

import 'dotenv/config';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { bodyLimit } from 'hono/body-limit';
import { trpcServer } from '@hono/trpc-server';
import { serve } from '@hono/node-server';
import { appRouter } from './routers';
import { createContextFactory, type AuthOptions } from './trpc';
import { config, validateConfig } from './config';
import { apiLogger, outboxLogger } from './logger';
import { createHonoErrorHandler } from './lib/errors/error-handler';
import { GracefulShutdown } from './lib/shutdown';
import { requestContext, type RequestVariables } from './middleware/request-context';
import { createRuntime } from './runtime';
import { initSentry } from './sentry';
import type { Economy } from './services';
import { logEconomyEvents } from './services/EconomyEvents';

export interface AppDependencies {
  economy: Economy;
  auth: AuthOptions;
  healthCheck: () => Promise<{ connected: boolean; latencyMs: number }>;
  allowedOrigins?: readonly string[];
}

export function createApp(deps: AppDependencies): Hono<{ Variables: RequestVariables }> {
  const app = new Hono<{ Variables: RequestVariables }>();

  // ==========================================================================
  // MIDDLEWARE
  // ==========================================================================

  app.use('*', bodyLimit({
    maxSize: 1024 * 1024,
    onError: (c) => c.json({ error: 'Request body too large', maxSize: '1MB' }, 413),
  }));

  app.use('*', requestContext(apiLogger));

  const allowedOrigins = deps.allowedOrigins ?? [];
  app.use('*', cors({
    origin: (requestOrigin) => (allowedOrigins.includes(requestOrigin) ? requestOrigin : null),
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization'],
    credentials: true,
    maxAge: 3600,
  }));

  // ==========================================================================
  // HEALTH CHECK
  // ==========================================================================

  app.get('/health', async (c) => {
    const database = await deps.healthCheck();
    return c.json(
      {
        status: database.connected ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        database,
      },
      database.connected ? 200 : 503
    );
  });

  // ==========================================================================
  // tRPC
  // ==========================================================================

  app.use('/trpc/*', trpcServer({
    endpoint: '/trpc',
    router: appRouter,
    createContext: createContextFactory(deps.economy, deps.auth),
  }));

  app.notFound((c) => c.json({ error: { code: 'NOT_FOUND', message: 'Route not found', statusCode: 404 } }, 404));
  app.onError(createHonoErrorHandler());

  return app;
}

// ============================================================================
// ENTRY POINT
// ============================================================================

function main(): void {
  const { valid, errors } = validateConfig();
  if (!valid) {
    throw new Error(`Invalid configuration: ${errors.join(', ')}`);
  }
  initSentry('api');

  const { db, economy } = createRuntime();
  // The API process is the outbox consumer; the worker process has no subscribers
  logEconomyEvents(economy.events, outboxLogger);
  const app = createApp({
    economy,
    auth: config.auth,
    healthCheck: db.healthCheck,
    allowedOrigins: config.app.allowedOrigins,
  });

  const server = serve({ fetch: app.fetch, port: config.app.port }, (info) => {
    apiLogger.info({ port: info.port, env: config.app.env }, 'Household XP API listening');
  });

  const shutdown = new GracefulShutdown();
  shutdown.register('ingress', 'http', () => new Promise<void>((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
  }));
  shutdown.register('connections', 'database', () => db.close());
  shutdown.listen();
}

if (require.main === module) {
  main();
}
