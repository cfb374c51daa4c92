import type { ErrorHandler } from 'hono';
import { TRPCError } from '@trpc/server';
import * as Sentry from '@sentry/node';
import { logger } from '../../logger';
import { AppError, type ErrorBody, type ErrorKind } from './index';

const TRPC_CODES: Record<ErrorKind, TRPCError['code']> = {
  validation: 'BAD_REQUEST',
  authentication: 'UNAUTHORIZED',
  authorization: 'FORBIDDEN',
  not_found: 'NOT_FOUND',
  state_conflict: 'CONFLICT',
  persistence: 'INTERNAL_SERVER_ERROR',
};

const INTERNAL: ErrorBody = { code: 'INTERNAL_SERVER_ERROR', message: 'Internal Server Error', statusCode: 500 };

export function toTRPCCode(error: AppError): TRPCError['code'] {
  return TRPC_CODES[error.kind];
}

/**
 * Log at a level matching the fault and forward server faults to Sentry.
 * Returns true when the caller should see the masked internal body.
 */
function record(error: unknown, surface: 'http' | 'trpc'): boolean {
  const serverFault = !(error instanceof AppError) || !error.isOperational;
  if (error instanceof AppError) {
    const level = serverFault ? 'error' : 'warn';
    logger[level]({ err: error, statusCode: error.statusCode, surface }, `AppError: ${error.code}`);
  } else {
    logger.error({ err: error, surface }, 'Unhandled error');
  }

  if (serverFault) {
    try {
      Sentry.captureException(error, { tags: { surface } });
    } catch (sentryError) {
      logger.debug({ err: sentryError }, 'Sentry unavailable');
    }
  }
  return serverFault;
}

export function createHonoErrorHandler(): ErrorHandler {
  return (err, c) => {
    if (record(err, 'http') || !(err instanceof AppError)) {
      return c.json({ error: INTERNAL }, 500);
    }
    return c.json({ error: err.toJSON() }, err.statusCode);
  };
}

export function createTRPCErrorFormatter(): (error: unknown) => TRPCError {
  return (error) => {
    if (error instanceof TRPCError) {
      return error;
    }

    const masked = record(error, 'trpc');
    if (masked || !(error instanceof AppError)) {
      return new TRPCError({
        code: 'INTERNAL_SERVER_ERROR',
        message: INTERNAL.message,
        cause: error instanceof Error ? error : undefined,
      });
    }
    return new TRPCError({ code: toTRPCCode(error), message: error.message, cause: error });
  };
}
