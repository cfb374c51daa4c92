/**
 * Household XP Backend Configuration v1.0.0
 *
 * Centralized configuration for all backend services.
 * Economy rules (caps, tiers, penalties) are not configuration; they live in constants/.
 */

export const config = {
  // Database (PostgreSQL)
  database: {
    url: process.env.DATABASE_URL || '',
    maxConnections: parseInt(process.env.DATABASE_MAX_CONNECTIONS || '10', 10),
  },

  // Redis (BullMQ maintenance queue)
  redis: {
    url: process.env.REDIS_URL || '',
  },

  // Bearer tokens issued by the household/profile service
  auth: {
    jwtSecret: process.env.AUTH_JWT_SECRET || '',
    issuer: process.env.AUTH_JWT_ISSUER || 'household-accounts',
  },

  // Error tracking
  sentry: {
    dsn: process.env.SENTRY_DSN || '',
    environment: process.env.SENTRY_ENVIRONMENT || process.env.NODE_ENV || 'development',
    tracesSampleRate: parseFloat(process.env.SENTRY_TRACES_SAMPLE_RATE || '0.1'),
  },

  // Periodic sweeps (BullMQ repeatable job patterns)
  jobs: {
    decaySweepPattern: process.env.DECAY_SWEEP_CRON || '0 3 * * *',     // daily 03:00
    expirySweepPattern: process.env.EXPIRY_SWEEP_CRON || '0 * * * *',   // hourly
    outboxDispatchEveryMs: parseInt(process.env.OUTBOX_DISPATCH_EVERY_MS || '60000', 10),
  },

  // Application
  app: {
    port: parseInt(process.env.PORT || '3000', 10),
    env: process.env.NODE_ENV || 'development',
    isDevelopment: process.env.NODE_ENV !== 'production',
    isProduction: process.env.NODE_ENV === 'production',
    isTest: process.env.NODE_ENV === 'test' || process.env.VITEST === 'true',
    allowedOrigins: (process.env.ALLOWED_ORIGINS || '')
      .split(',')
      .map(origin => origin.trim())
      .filter(Boolean),
  },
} as const;

export type AppConfig = typeof config;

/**
 * Validate required configuration for production
 */
export function validateConfig(cfg: AppConfig = config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  // Always required
  if (!cfg.database.url) {
    errors.push('DATABASE_URL is required');
  }

  // Required in production
  if (cfg.app.isProduction) {
    if (!cfg.redis.url) {
      errors.push('REDIS_URL is required for the maintenance queue');
    }
    if (!cfg.auth.jwtSecret) {
      errors.push('AUTH_JWT_SECRET is required');
    }
  }

  return { valid: errors.length === 0, errors };
}

export default config;
