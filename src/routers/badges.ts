/**
 * Badges Router v1.0.0
 */

import { router, protectedProcedure, resolveChild } from '../trpc';
import { badgeTypeSchema, childQuerySchema } from '../lib/validators';

export const badgesRouter = router({
  list: protectedProcedure
    .input(childQuerySchema)
    .query(async ({ input, ctx }) => {
      const childId = await resolveChild(ctx, input.childId);
      const [earned, countByTier] = await Promise.all([
        ctx.economy.badges.getEarnedBadges(childId),
        ctx.economy.badges.getBadgeCountByTier(childId),
      ]);
      return { earned, countByTier };
    }),

  progress: protectedProcedure
    .input(childQuerySchema.extend({ badgeType: badgeTypeSchema.optional() }))
    .query(async ({ input, ctx }) => {
      const childId = await resolveChild(ctx, input.childId);
      if (input.badgeType) {
        return [await ctx.economy.badges.getBadgeProgress(childId, input.badgeType)];
      }
      return ctx.economy.badges.getAllProgress(childId);
    }),

  /** Re-run evaluation; awards nothing without new progress. */
  evaluate: protectedProcedure
    .input(childQuerySchema)
    .mutation(async ({ input, ctx }) => {
      const childId = await resolveChild(ctx, input.childId);
      return ctx.economy.badges.evaluateBadges(childId);
    }),
});
