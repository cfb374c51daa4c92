/**
 * Household XP Type Definitions v1.0.0
 *
 * These types MUST match migrations/001_household_economy.sql.
 * Repositories map snake_case rows to these camelCase shapes.
 */

// ============================================================================
// ENUMS (Match CHECK constraints in the migration)
// ============================================================================

export type XPTransactionType = 'earned' | 'redeemed' | 'granted';

export type CredibilityEventType =
  | 'approved_task'
  | 'streak_bonus'
  | 'downvote'
  | 'downvote_undone'
  | 'approval_undone'
  | 'time_decay_recovery'
  | 'redemption_bonus_activated'
  | 'redemption_bonus_expired';

/** 0 = active, 1 = half restored (30 days), 2 = fully restored and archived (60 days) */
export type DecayStage = 0 | 1 | 2;

export type CredibilityTierName = 'excellent' | 'good' | 'fair' | 'poor' | 'very_poor';

export type TaskLevel = 1 | 2 | 3 | 4 | 5;

export type AssignmentStatus =
  | 'assigned'
  | 'in_progress'
  | 'pending_review'
  | 'approved'       // TERMINAL
  | 'declined'       // appealable until appeal_deadline
  | 'appealed'
  | 'expired';       // TERMINAL

export type ReviewDecision = 'approved' | 'approved_edited' | 'declined';

export type BadgeCategory = 'tasks' | 'xp' | 'streaks';

export type BadgeTier = 'bronze' | 'silver' | 'gold' | 'platinum';

export type BadgeMetric = 'approved_tasks' | 'lifetime_xp' | 'streak';

export type BadgeType =
  | 'first_task_complete'
  | 'tasks_novice'
  | 'tasks_apprentice'
  | 'tasks_expert'
  | 'tasks_master'
  | 'xp_beginner'
  | 'xp_intermediate'
  | 'xp_advanced'
  | 'xp_master'
  | 'streak_3'
  | 'streak_7'
  | 'streak_30'
  | 'streak_100';

export type ActorRole = 'child' | 'guardian';

// ============================================================================
// LEDGER
// ============================================================================

export interface XPBalance {
  userId: string;
  currentXP: number;
  lifetimeEarned: number;
  lifetimeSpent: number;
  createdAt: Date;
  lastUpdated: Date;
}

export interface XPTransaction {
  id: string;
  userId: string;
  type: XPTransactionType;
  amount: number;
  timestamp: Date;
  relatedTaskId: string | null;
  credibilityAtTime: number | null;
  notes: string | null;
}

// ============================================================================
// TRUST ENGINE
// ============================================================================

export interface CredibilityState {
  userId: string;
  score: number;
  consecutiveApprovedTasks: number;
  hasRedemptionBonus: boolean;
  redemptionBonusExpiry: Date | null;
  updatedAt: Date;
}

/**
 * One append-only history row. `amount` is the nominal rule amount,
 * `appliedDelta` the score change after clamping. Decay only moves
 * `decayStage` / `archivedAt`.
 */
export interface CredibilityEvent {
  id: string;
  userId: string;
  event: CredibilityEventType;
  amount: number;
  appliedDelta: number;
  occurredAt: Date;
  taskId: string | null;
  reviewerId: string | null;
  notes: string | null;
  newScore: number;
  streakCount: number | null;
  decayStage: DecayStage;
  archivedAt: Date | null;
}

export interface CredibilityTier {
  name: CredibilityTierName;
  displayName: string;
  minScore: number;
  maxScore: number;
  multiplier: number;
  color: string;
  description: string;
}

// ============================================================================
// VERIFICATION WORKFLOW
// ============================================================================

export interface TaskAssignment {
  id: string;
  templateId: string;
  childId: string;
  /** null = self-claimed by the child */
  assignedBy: string | null;
  title: string;
  description: string;
  category: string;
  assignedLevel: TaskLevel;
  adjustedLevel: TaskLevel | null;
  status: AssignmentStatus;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  reviewedAt: Date | null;
  dueDate: Date | null;
  // Evidence
  photoURL: string | null;
  childNotes: string | null;
  completionTimeMinutes: number | null;
  // Review
  reviewedBy: string | null;
  parentNotes: string | null;
  reviewDecision: ReviewDecision | null;
  xpAwarded: number;
  appealDeadline: Date | null;
  appealedAt: Date | null;
  appealNotes: string | null;
}

// ============================================================================
// ACHIEVEMENTS
// ============================================================================

export interface BadgeDefinition {
  type: BadgeType;
  displayName: string;
  description: string;
  category: BadgeCategory;
  tier: BadgeTier;
  metric: BadgeMetric;
  threshold: number;
  bonusXP: number;
}

export interface EarnedBadge {
  id: string;
  childId: string;
  badgeType: BadgeType;
  earnedAt: Date;
  bonusXPAwarded: number;
}

export interface BadgeProgress {
  badgeType: BadgeType;
  current: number;
  target: number;
  isEarned: boolean;
  percentage: number;
}

// ============================================================================
// OUTBOX
// ============================================================================

export type OutboxStatus = 'pending' | 'dispatched' | 'failed';

export interface OutboxEvent {
  id: string;
  eventType: string;
  aggregateId: string;
  payload: Record<string, unknown>;
  status: OutboxStatus;
  attempts: number;
  lastError: string | null;
  createdAt: Date;
  dispatchedAt: Date | null;
}

// ============================================================================
// EXTERNAL COLLABORATORS
// ============================================================================

export interface TaskTemplate {
  id: string;
  title: string;
  description: string;
  category: string;
  /** Per-level payout; missing levels fall back to the default level table. */
  baseXPByLevel: Partial<Record<TaskLevel, number>>;
  estimatedMinutes: number;
}

/** Read-only lookup into the static task catalog. */
export interface TaskCatalog {
  getTemplate(templateId: string): Promise<TaskTemplate | null>;
}

/** Household membership, owned by the account service. */
export interface HouseholdDirectory {
  canReview(reviewerId: string, childId: string): Promise<boolean>;
  childrenOf(reviewerId: string): Promise<string[]>;
}

export interface Actor {
  userId: string;
  role: ActorRole;
}

// ============================================================================
// SERVICE RESULT TYPES
// ============================================================================

export type ServiceResult<T> =
  | { success: true; data: T }
  | { success: false; error: ServiceError };

export interface ServiceError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// ERROR CODES CATALOG
// ============================================================================

/** Codes carried by a failed ServiceResult; thrown errors use AppError codes. */
export const ErrorCodes = {
  INVALID_AMOUNT: 'INVALID_AMOUNT',
  INSUFFICIENT_XP: 'INSUFFICIENT_XP',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];
