import { z } from 'zod';
import { LEDGER } from '../constants';

const nonBlank = (max: number) =>
  z.string().max(max).refine((val) => val.trim().length > 0, { message: 'Must not be blank' });

export const idSchema = z.string().uuid();
export const userIdSchema = z.string().min(1).max(128);
export const templateIdSchema = z.string().min(1).max(128);

export const taskLevelSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
]);

export const assignmentStatusSchema = z.enum([
  'assigned',
  'in_progress',
  'pending_review',
  'approved',
  'declined',
  'appealed',
  'expired',
]);

export const paginationSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(LEDGER.DEFAULT_HISTORY_LIMIT),
});

// ---------------------------------------------------------------------------
// Ledger
// ---------------------------------------------------------------------------

export const balanceQuerySchema = z.object({
  userId: userIdSchema.optional(),
});

export const transactionsQuerySchema = balanceQuerySchema.merge(paginationSchema);

export const redeemSchema = z.object({
  amount: z.number().int().positive(),
});

export const grantSchema = z.object({
  childId: userIdSchema,
  amount: z.number().int().min(LEDGER.GRANT_MIN).max(LEDGER.GRANT_MAX),
  reason: nonBlank(500),
});

// ---------------------------------------------------------------------------
// Trust Engine
// ---------------------------------------------------------------------------

export const undoDecisionSchema = z.object({
  childId: userIdSchema,
  taskId: idSchema,
});

// ---------------------------------------------------------------------------
// Verification Workflow
// ---------------------------------------------------------------------------

export const claimTaskSchema = z.object({
  templateId: templateIdSchema,
  level: taskLevelSchema,
});

export const assignTaskSchema = z.object({
  childId: userIdSchema,
  templateId: templateIdSchema,
  level: taskLevelSchema,
  dueDate: z.string().datetime().optional(),
});

export const assignmentIdSchema = z.object({
  assignmentId: idSchema,
});

export const submitTaskSchema = z.object({
  assignmentId: idSchema,
  photoURL: nonBlank(2048),
  notes: z.string().max(1000).optional(),
  minutesTaken: z.number().int().min(0).max(24 * 60).optional(),
});

export const approveTaskSchema = z.object({
  assignmentId: idSchema,
  notes: z.string().max(1000).optional(),
  levelOverride: taskLevelSchema.optional(),
});

export const declineTaskSchema = z.object({
  assignmentId: idSchema,
  reason: nonBlank(1000),
});

export const appealTaskSchema = z.object({
  assignmentId: idSchema,
  childNotes: z.string().max(1000),
});

export const listForChildSchema = z.object({
  childId: userIdSchema.optional(),
  status: assignmentStatusSchema.optional(),
});

// ---------------------------------------------------------------------------
// Achievements
// ---------------------------------------------------------------------------

export const badgeTypeSchema = z.enum([
  'first_task_complete',
  'tasks_novice',
  'tasks_apprentice',
  'tasks_expert',
  'tasks_master',
  'xp_beginner',
  'xp_intermediate',
  'xp_advanced',
  'xp_master',
  'streak_3',
  'streak_7',
  'streak_30',
  'streak_100',
]);

export const childQuerySchema = z.object({
  childId: userIdSchema.optional(),
});

