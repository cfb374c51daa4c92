/**
 * Ledger Router v1.0.0
 *
 * Balance reads for a child (or a guardian's child), screen-time redemption
 * by the child, discretionary grants by a guardian.
 */

import { TRPCError } from '@trpc/server';
import { router, protectedProcedure, childProcedure, guardianProcedure, resolveChild, assertGuardianOf } from '../trpc';
import { balanceQuerySchema, grantSchema, redeemSchema, transactionsQuerySchema } from '../lib/validators';

export const ledgerRouter = router({
  getBalance: protectedProcedure
    .input(balanceQuerySchema)
    .query(async ({ input, ctx }) => {
      const childId = await resolveChild(ctx, input.userId);
      return ctx.economy.ledger.getBalance(childId);
    }),

  getTransactions: protectedProcedure
    .input(transactionsQuerySchema)
    .query(async ({ input, ctx }) => {
      const childId = await resolveChild(ctx, input.userId);
      return ctx.economy.ledger.getTransactions(childId, input.limit);
    }),

  getDailyStats: protectedProcedure
    .input(balanceQuerySchema)
    .query(async ({ input, ctx }) => {
      const childId = await resolveChild(ctx, input.userId);
      return ctx.economy.ledger.getDailyStats(childId);
    }),

  /**
   * Spend XP for screen-time minutes. Failures return no mutation.
   */
  redeem: childProcedure
    .input(redeemSchema)
    .mutation(async ({ input, ctx }) => {
      const result = await ctx.economy.ledger.redeem(ctx.actor.userId, input.amount);

      if (!result.success) {
        throw new TRPCError({
          code: 'BAD_REQUEST',
          message: result.error.message,
        });
      }

      return result.data;
    }),

  grant: guardianProcedure
    .input(grantSchema)
    .mutation(async ({ input, ctx }) => {
      await assertGuardianOf(ctx, input.childId);
      const { balance, transaction } = await ctx.economy.ledger.grant(input.childId, input.amount, input.reason);
      return { balance, transaction };
    }),
});
