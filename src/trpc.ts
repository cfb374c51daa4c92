/**
 * Household XP tRPC setup v1.0.0
 *
 * Actor identity comes from a bearer JWT (HS256) carrying `sub` and `role`.
 * Services reach procedures through the context; nothing is a module singleton.
 */

import { initTRPC, TRPCError } from '@trpc/server';
import { jwtVerify } from 'jose';
import { z } from 'zod';
import type { Economy } from './services';
import type { Actor } from './types';
import { AppError } from './lib/errors';
import { createTRPCErrorFormatter } from './lib/errors/error-handler';
import { apiLogger } from './logger';
import { setSentryActor } from './sentry';

const log = apiLogger.child({ component: 'trpc' });

// ============================================================================
// CONTEXT
// ============================================================================

export interface Context extends Record<string, unknown> {
  actor: Actor | null;
  economy: Economy;
}

export interface AuthOptions {
  jwtSecret: string;
  issuer: string;
}

const claimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(['child', 'guardian']),
});

export async function verifyActor(token: string, auth: AuthOptions): Promise<Actor | null> {
  if (!auth.jwtSecret) {
    return null;
  }

  try {
    const { payload } = await jwtVerify(token, new TextEncoder().encode(auth.jwtSecret), {
      issuer: auth.issuer,
      algorithms: ['HS256'],
    });
    const claims = claimsSchema.safeParse(payload);
    if (!claims.success) {
      log.warn({ issues: claims.error.issues.length }, 'Token claims rejected');
      return null;
    }
    return { userId: claims.data.sub, role: claims.data.role };
  } catch (error) {
    log.warn({ err: error instanceof Error ? error.message : String(error) }, 'Token verification failed');
    return null;
  }
}

export function createContextFactory(economy: Economy, auth: AuthOptions) {
  return async (opts: { req: Request }): Promise<Context> => {
    // @hono/trpc-server passes a Web API Request: use headers.get()
    const authHeader = opts.req.headers.get('authorization');
    if (!authHeader?.startsWith('Bearer ')) {
      return { actor: null, economy };
    }
    const actor = await verifyActor(authHeader.slice(7), auth);
    setSentryActor(actor);
    return { actor, economy };
  };
}

// ============================================================================
// TRPC INITIALIZATION
// ============================================================================

const t = initTRPC.context<Context>().create({
  errorFormatter: ({ shape }) => ({
    ...shape,
    data: {
      ...shape.data,
      // Strip stack traces to prevent information leakage
      stack: undefined,
    },
  }),
});

const toTRPCError = createTRPCErrorFormatter();

// Service errors arrive as the cause of tRPC's INTERNAL_SERVER_ERROR wrapper
const mapServiceErrors = t.middleware(async ({ next }) => {
  const result = await next();
  if (!result.ok) {
    const cause = result.error.cause;
    if (cause instanceof AppError || (result.error.code === 'INTERNAL_SERVER_ERROR' && cause)) {
      throw toTRPCError(cause);
    }
  }
  return result;
});

export const router = t.router;
export const createCallerFactory = t.createCallerFactory;
export const publicProcedure = t.procedure.use(mapServiceErrors);

const isAuthenticated = t.middleware(async ({ ctx, next }) => {
  if (!ctx.actor) {
    throw new TRPCError({
      code: 'UNAUTHORIZED',
      message: 'Authentication required',
    });
  }
  return next({ ctx: { ...ctx, actor: ctx.actor } });
});

export const protectedProcedure = publicProcedure.use(isAuthenticated);

export const childProcedure = protectedProcedure.use(async ({ ctx, next }) => {
  if (ctx.actor.role !== 'child') {
    throw new TRPCError({ code: 'FORBIDDEN', message: 'Child account required' });
  }
  return next();
});

export const guardianProcedure = protectedProcedure.use(async ({ ctx, next }) => {
  if (ctx.actor.role !== 'guardian') {
    throw new TRPCError({ code: 'FORBIDDEN', message: 'Guardian account required' });
  }
  return next();
});

// ============================================================================
// SUBJECT RESOLUTION
// ============================================================================

/**
 * Which child a read targets: a child reads itself; a guardian names a child
 * in their household.
 */
export async function resolveChild(ctx: { actor: Actor; economy: Economy }, childId?: string): Promise<string> {
  if (ctx.actor.role === 'child') {
    if (childId !== undefined && childId !== ctx.actor.userId) {
      throw new TRPCError({ code: 'FORBIDDEN', message: 'Children can only read their own data' });
    }
    return ctx.actor.userId;
  }

  if (childId === undefined) {
    throw new TRPCError({ code: 'BAD_REQUEST', message: 'childId is required for guardians' });
  }
  await assertGuardianOf(ctx, childId);
  return childId;
}

export async function assertGuardianOf(ctx: { actor: Actor; economy: Economy }, childId: string): Promise<void> {
  if (!(await ctx.economy.tasks.canReview(ctx.actor.userId, childId))) {
    throw new TRPCError({ code: 'FORBIDDEN', message: 'Not a guardian of this child' });
  }
}
