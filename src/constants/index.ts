// ============================================================================
// Household XP economy rules. Fixed in code, not environment-tunable.
// ============================================================================

import type { BadgeDefinition, CredibilityTier, TaskLevel } from '../types';

// ============================================================================
// LEDGER
// ============================================================================
export const LEDGER = {
  SOFT_CAP: 1000,
  SOFT_CAP_RATE: 0.5,
  MIN_EARN: 1,
  GRANT_MIN: 1,
  GRANT_MAX: 500,
  DEFAULT_HISTORY_LIMIT: 20,
} as const;

// ============================================================================
// TRUST ENGINE
// ============================================================================
export const CREDIBILITY = {
  MIN_SCORE: 0,
  MAX_SCORE: 100,
  DEFAULT_SCORE: 100,
  APPROVAL_POINTS: 2,
  STREAK_BONUS_POINTS: 5,
  STREAK_BONUS_INTERVAL: 10,
  DOWNVOTE_PENALTY: -10,
  STACKED_DOWNVOTE_PENALTY: -15,
  STACKING_WINDOW_DAYS: 7,
  PARTIAL_DECAY_DAYS: 30,
  FULL_DECAY_DAYS: 60,
  REDEMPTION_FROM_BELOW: 60,
  REDEMPTION_THRESHOLD: 95,
  REDEMPTION_BONUS_MULTIPLIER: 1.3,
  REDEMPTION_BONUS_DAYS: 7,
} as const;

export const DAY_MS = 24 * 60 * 60 * 1000;

/** Highest tier first; lookups walk this in order. */
export const CREDIBILITY_TIERS: readonly CredibilityTier[] = [
  {
    name: 'excellent',
    displayName: 'Excellent',
    minScore: 90,
    maxScore: 100,
    multiplier: 1.2,
    color: 'green',
    description: 'Outstanding credibility! Maximum conversion rate.',
  },
  {
    name: 'good',
    displayName: 'Good',
    minScore: 75,
    maxScore: 89,
    multiplier: 1.0,
    color: 'green',
    description: 'Good standing. Standard conversion rate.',
  },
  {
    name: 'fair',
    displayName: 'Fair',
    minScore: 60,
    maxScore: 74,
    multiplier: 0.8,
    color: 'yellow',
    description: 'Fair standing. Reduced conversion rate.',
  },
  {
    name: 'poor',
    displayName: 'Poor',
    minScore: 40,
    maxScore: 59,
    multiplier: 0.5,
    color: 'red',
    description: 'Poor standing. Significantly reduced rate.',
  },
  {
    name: 'very_poor',
    displayName: 'Very Poor',
    minScore: 0,
    maxScore: 39,
    multiplier: 0.3,
    color: 'red',
    description: 'Very poor standing. Minimum conversion rate.',
  },
];

// ============================================================================
// VERIFICATION WORKFLOW
// ============================================================================
export const WORKFLOW = {
  APPEAL_WINDOW_HOURS: 24,
} as const;

export const LEVEL_BASE_XP: Readonly<Record<TaskLevel, number>> = {
  1: 5,
  2: 15,
  3: 30,
  4: 45,
  5: 60,
};

// ============================================================================
// ACHIEVEMENTS (catalog order = award order)
// ============================================================================
export const BADGE_CATALOG: readonly BadgeDefinition[] = [
  { type: 'first_task_complete', displayName: 'First Steps', description: 'Completed your first task', category: 'tasks', tier: 'bronze', metric: 'approved_tasks', threshold: 1, bonusXP: 25 },
  { type: 'tasks_novice', displayName: 'Task Novice', description: 'Completed 5 tasks', category: 'tasks', tier: 'bronze', metric: 'approved_tasks', threshold: 5, bonusXP: 50 },
  { type: 'tasks_apprentice', displayName: 'Task Apprentice', description: 'Completed 25 tasks', category: 'tasks', tier: 'silver', metric: 'approved_tasks', threshold: 25, bonusXP: 100 },
  { type: 'tasks_expert', displayName: 'Task Expert', description: 'Completed 100 tasks', category: 'tasks', tier: 'gold', metric: 'approved_tasks', threshold: 100, bonusXP: 250 },
  { type: 'tasks_master', displayName: 'Task Master', description: 'Completed 500 tasks', category: 'tasks', tier: 'platinum', metric: 'approved_tasks', threshold: 500, bonusXP: 500 },
  { type: 'xp_beginner', displayName: 'XP Beginner', description: 'Earned 100 XP', category: 'xp', tier: 'bronze', metric: 'lifetime_xp', threshold: 100, bonusXP: 25 },
  { type: 'xp_intermediate', displayName: 'XP Intermediate', description: 'Earned 1,000 XP', category: 'xp', tier: 'silver', metric: 'lifetime_xp', threshold: 1000, bonusXP: 100 },
  { type: 'xp_advanced', displayName: 'XP Advanced', description: 'Earned 10,000 XP', category: 'xp', tier: 'gold', metric: 'lifetime_xp', threshold: 10000, bonusXP: 250 },
  { type: 'xp_master', displayName: 'XP Master', description: 'Earned 100,000 XP', category: 'xp', tier: 'platinum', metric: 'lifetime_xp', threshold: 100000, bonusXP: 500 },
  { type: 'streak_3', displayName: '3-Day Streak', description: 'Approved 3 tasks in a row', category: 'streaks', tier: 'bronze', metric: 'streak', threshold: 3, bonusXP: 50 },
  { type: 'streak_7', displayName: 'Week Warrior', description: 'Approved 7 tasks in a row', category: 'streaks', tier: 'silver', metric: 'streak', threshold: 7, bonusXP: 100 },
  { type: 'streak_30', displayName: 'Month Master', description: 'Approved 30 tasks in a row', category: 'streaks', tier: 'gold', metric: 'streak', threshold: 30, bonusXP: 250 },
  { type: 'streak_100', displayName: 'Streak Legend', description: 'Approved 100 tasks in a row', category: 'streaks', tier: 'platinum', metric: 'streak', threshold: 100, bonusXP: 500 },
];

// ============================================================================
// JOBS
// ============================================================================
export const JOBS = {
  OUTBOX_BATCH_SIZE: 100,
  TRANSACTION_MAX_RETRIES: 3,
} as const;
