/**
 * Tasks Router v1.0.0
 *
 * Verification workflow commands. Actor checks beyond the role gate
 * (claiming child, reviewing guardian) live in TaskReviewService.
 */

import {
  router,
  protectedProcedure,
  childProcedure,
  guardianProcedure,
  resolveChild,
} from '../trpc';
import {
  appealTaskSchema,
  approveTaskSchema,
  assignmentIdSchema,
  assignTaskSchema,
  claimTaskSchema,
  declineTaskSchema,
  listForChildSchema,
  submitTaskSchema,
} from '../lib/validators';

export const tasksRouter = router({
  // --------------------------------------------------------------------------
  // CHILD
  // --------------------------------------------------------------------------

  claim: childProcedure
    .input(claimTaskSchema)
    .mutation(async ({ input, ctx }) => {
      return ctx.economy.tasks.claim(ctx.actor.userId, input.templateId, input.level);
    }),

  start: childProcedure
    .input(assignmentIdSchema)
    .mutation(async ({ input, ctx }) => {
      return ctx.economy.tasks.start(ctx.actor.userId, input.assignmentId);
    }),

  submit: childProcedure
    .input(submitTaskSchema)
    .mutation(async ({ input, ctx }) => {
      return ctx.economy.tasks.submit(ctx.actor.userId, input.assignmentId, {
        photoURL: input.photoURL,
        notes: input.notes,
        minutesTaken: input.minutesTaken,
      });
    }),

  appeal: childProcedure
    .input(appealTaskSchema)
    .mutation(async ({ input, ctx }) => {
      return ctx.economy.tasks.appeal(ctx.actor.userId, input.assignmentId, input.childNotes);
    }),

  // --------------------------------------------------------------------------
  // GUARDIAN
  // --------------------------------------------------------------------------

  assign: guardianProcedure
    .input(assignTaskSchema)
    .mutation(async ({ input, ctx }) => {
      return ctx.economy.tasks.assign(
        ctx.actor.userId,
        input.childId,
        input.templateId,
        input.level,
        input.dueDate ? new Date(input.dueDate) : undefined
      );
    }),

  approve: guardianProcedure
    .input(approveTaskSchema)
    .mutation(async ({ input, ctx }) => {
      return ctx.economy.tasks.approve(ctx.actor.userId, input.assignmentId, {
        notes: input.notes,
        levelOverride: input.levelOverride,
      });
    }),

  decline: guardianProcedure
    .input(declineTaskSchema)
    .mutation(async ({ input, ctx }) => {
      return ctx.economy.tasks.decline(ctx.actor.userId, input.assignmentId, input.reason);
    }),

  getPendingReviews: guardianProcedure
    .query(async ({ ctx }) => {
      return ctx.economy.tasks.getPendingReviews(ctx.actor.userId);
    }),

  // --------------------------------------------------------------------------
  // READS
  // --------------------------------------------------------------------------

  get: protectedProcedure
    .input(assignmentIdSchema)
    .query(async ({ input, ctx }) => {
      const assignment = await ctx.economy.tasks.getAssignment(input.assignmentId);
      await resolveChild(ctx, assignment.childId);
      return assignment;
    }),

  listForChild: protectedProcedure
    .input(listForChildSchema)
    .query(async ({ input, ctx }) => {
      const childId = await resolveChild(ctx, input.childId);
      return ctx.economy.tasks.listForChild(childId, input.status);
    }),
});
