/**
 * Credibility Router v1.0.0
 *
 * Approvals are terminal, so only a decline can be retracted here.
 */

import { z } from 'zod';
import { router, protectedProcedure, guardianProcedure, resolveChild, assertGuardianOf } from '../trpc';
import { undoDecisionSchema, userIdSchema } from '../lib/validators';

export const credibilityRouter = router({
  getStatus: protectedProcedure
    .input(z.object({ childId: userIdSchema.optional() }))
    .query(async ({ input, ctx }) => {
      const childId = await resolveChild(ctx, input.childId);
      return ctx.economy.credibility.getCredibilityStatus(childId);
    }),

  /** Guardian retracts a decline they issued in error. */
  undoDecline: guardianProcedure
    .input(undoDecisionSchema)
    .mutation(async ({ input, ctx }) => {
      await assertGuardianOf(ctx, input.childId);
      const { credibility } = await ctx.economy.tasks.retractDecline(ctx.actor.userId, input.taskId, input.childId);
      return credibility;
    }),
});
