/**
 * CredibilityService v1.0.0 (Trust Engine)
 *
 * Owns each user's 0–100 credibility score, its append-only event history,
 * the approval streak, the decay sweep and the redemption bonus.
 *
 * Every mutation locks the credibility_states row for the user, so
 * concurrent decisions for one child are serialized. History rows record
 * both the nominal rule amount and the clamped delta actually applied;
 * undo always reverses the applied delta.
 */

import { randomUUID } from 'crypto';
import type {
  CredibilityEvent,
  CredibilityEventType,
  CredibilityState,
  CredibilityTier,
} from '../types';
import { CREDIBILITY, DAY_MS } from '../constants';
import { NotFoundError } from '../lib/errors';
import { credibilityLogger, type Logger } from '../logger';
import type { Repositories } from '../repositories';
import { writeToOutbox } from '../jobs/outbox-helpers';
import type { EconomyStore, Tx } from './EconomyStore';
import { CredibilityCalculator } from './CredibilityCalculator';
import { getTier, nextTier } from './CredibilityTiers';

// ============================================================================
// TYPES
// ============================================================================

export interface MutationOptions {
  reviewerId?: string;
  tx?: Tx;
}

export interface ApprovalOutcome {
  previousScore: number;
  newScore: number;
  streak: number;
  streakBonusApplied: boolean;
  redemptionBonusActivated: boolean;
}

export interface DeclineOutcome {
  previousScore: number;
  newScore: number;
  /** Nominal penalty: −10, or −15 when stacked. */
  penalty: number;
  appliedDelta: number;
  stacked: boolean;
  redemptionBonusRevoked: boolean;
}

export interface UndoOutcome {
  previousScore: number;
  newScore: number;
  appliedDelta: number;
  redemptionBonusActivated: boolean;
}

export interface DecaySweepResult {
  usersProcessed: number;
  entriesDecayed: number;
  pointsRestored: number;
  bonusesExpired: number;
}

export interface CredibilityStatus {
  score: number;
  tier: CredibilityTier;
  earningMultiplier: number;
  conversionRate: number;
  streak: number;
  redemptionBonus: { active: boolean; expiresAt: Date | null };
  history: CredibilityEvent[];
  recoveryPath: string | null;
}

function defaultState(userId: string, now: Date): CredibilityState {
  return {
    userId,
    score: CREDIBILITY.DEFAULT_SCORE,
    consecutiveApprovedTasks: 0,
    hasRedemptionBonus: false,
    redemptionBonusExpiry: null,
    updatedAt: now,
  };
}

interface EventInput {
  event: CredibilityEventType;
  amount: number;
  appliedDelta: number;
  newScore: number;
  taskId?: string | null;
  reviewerId?: string | null;
  notes?: string | null;
  streakCount?: number | null;
}

// ============================================================================
// SERVICE
// ============================================================================

export class CredibilityService {
  constructor(
    private readonly store: EconomyStore,
    private readonly calculator: CredibilityCalculator = new CredibilityCalculator(),
    private readonly log: Logger = credibilityLogger
  ) {}

  /**
   * +2 and streak+1; every 10th consecutive approval adds a separate +5 row.
   */
  async applyApproval(userId: string, taskId: string, options: MutationOptions = {}): Promise<ApprovalOutcome> {
    return this.store.run(options.tx, async ({ repos }) => {
      const now = new Date();
      const state = await repos.credibility.lockOrCreate(userId, now);
      const previousScore = state.score;
      const streak = state.consecutiveApprovedTasks + 1;

      const afterApproval = this.calculator.clamp(previousScore + CREDIBILITY.APPROVAL_POINTS);
      await this.appendEvent(repos, userId, now, {
        event: 'approved_task',
        amount: CREDIBILITY.APPROVAL_POINTS,
        appliedDelta: afterApproval - previousScore,
        newScore: afterApproval,
        taskId,
        reviewerId: options.reviewerId,
        streakCount: streak,
      });

      let newScore = afterApproval;
      const streakBonusApplied = this.calculator.shouldAwardStreakBonus(streak);
      if (streakBonusApplied) {
        newScore = this.calculator.clamp(afterApproval + CREDIBILITY.STREAK_BONUS_POINTS);
        await this.appendEvent(repos, userId, now, {
          event: 'streak_bonus',
          amount: CREDIBILITY.STREAK_BONUS_POINTS,
          appliedDelta: newScore - afterApproval,
          newScore,
          taskId,
          reviewerId: options.reviewerId,
          streakCount: streak,
          notes: `${streak} approved tasks in a row`,
        });
      }

      const updated: CredibilityState = {
        ...state,
        score: newScore,
        consecutiveApprovedTasks: streak,
        updatedAt: now,
      };
      const redemptionBonusActivated = await this.maybeActivateRedemptionBonus(repos, updated, previousScore, now);
      await repos.credibility.save(updated);

      this.log.info(
        { userId, taskId, before: previousScore, after: newScore, streak, streakBonusApplied },
        'Credibility approval applied'
      );

      return { previousScore, newScore, streak, streakBonusApplied, redemptionBonusActivated };
    });
  }

  /**
   * Resets the streak and applies −10, or −15 when the previous active
   * downvote is 7 days old or less.
   */
  async applyDecline(
    userId: string,
    taskId: string,
    reason: string,
    options: MutationOptions = {}
  ): Promise<DeclineOutcome> {
    return this.store.run(options.tx, async ({ repos }) => {
      const now = new Date();
      const state = await repos.credibility.lockOrCreate(userId, now);
      const previousScore = state.score;

      const downvotes = await repos.credibility.listActiveDownvotes(userId);
      const penalty = this.calculator.downvotePenalty(downvotes, now);
      const newScore = this.calculator.clamp(previousScore + penalty);

      await this.appendEvent(repos, userId, now, {
        event: 'downvote',
        amount: penalty,
        appliedDelta: newScore - previousScore,
        newScore,
        taskId,
        reviewerId: options.reviewerId,
        notes: reason,
        streakCount: 0,
      });

      const updated: CredibilityState = {
        ...state,
        score: newScore,
        consecutiveApprovedTasks: 0,
        updatedAt: now,
      };

      let redemptionBonusRevoked = false;
      if (this.calculator.isRedemptionBonusActive(state, now) && newScore < CREDIBILITY.REDEMPTION_THRESHOLD) {
        await this.expireRedemptionBonus(repos, updated, now, 'Score fell below redemption threshold');
        redemptionBonusRevoked = true;
      }

      await repos.credibility.save(updated);

      this.log.info(
        { userId, taskId, before: previousScore, after: newScore, penalty, stacked: penalty === CREDIBILITY.STACKED_DOWNVOTE_PENALTY },
        'Credibility decline applied'
      );

      return {
        previousScore,
        newScore,
        penalty,
        appliedDelta: newScore - previousScore,
        stacked: penalty === CREDIBILITY.STACKED_DOWNVOTE_PENALTY,
        redemptionBonusRevoked,
      };
    });
  }

  async hasActiveDecline(userId: string, taskId: string, tx?: Tx): Promise<boolean> {
    return this.store.run(tx, async ({ repos }) => {
      const events = await repos.credibility.listTaskEvents(userId, taskId);
      return events.some(e => e.event === 'downvote' && e.archivedAt === null);
    });
  }

  /**
   * Retract a decline: returns the points the downvote actually took, minus
   * whatever decay already gave back, and archives it. The streak stays reset.
   */
  async undoDecline(userId: string, taskId: string, options: MutationOptions = {}): Promise<UndoOutcome> {
    return this.store.run(options.tx, async ({ repos }) => {
      const now = new Date();
      const state = await repos.credibility.lockOrCreate(userId, now);
      const events = await repos.credibility.listTaskEvents(userId, taskId);
      const downvote = [...events].reverse().find(e => e.event === 'downvote' && e.archivedAt === null);

      if (!downvote) {
        throw new NotFoundError(`No active decline for task '${taskId}'`);
      }

      const previousScore = state.score;
      const restore = Math.max(0, Math.abs(downvote.appliedDelta) - this.calculator.restoredByDecay(downvote));
      const newScore = this.calculator.clamp(previousScore + restore);

      await repos.credibility.updateEventDecay({ ...downvote, archivedAt: now });
      await this.appendEvent(repos, userId, now, {
        event: 'downvote_undone',
        amount: restore,
        appliedDelta: newScore - previousScore,
        newScore,
        taskId,
        reviewerId: options.reviewerId,
      });

      const updated: CredibilityState = { ...state, score: newScore, updatedAt: now };
      const redemptionBonusActivated = await this.maybeActivateRedemptionBonus(repos, updated, previousScore, now);
      await repos.credibility.save(updated);

      this.log.info({ userId, taskId, before: previousScore, after: newScore, restore }, 'Credibility decline undone');

      return { previousScore, newScore, appliedDelta: newScore - previousScore, redemptionBonusActivated };
    });
  }

  /**
   * Retract an approval: removes the applied deltas of that task's approval
   * and streak-bonus rows and steps the streak back by one.
   */
  async undoApproval(userId: string, taskId: string, options: MutationOptions = {}): Promise<UndoOutcome> {
    return this.store.run(options.tx, async ({ repos }) => {
      const now = new Date();
      const state = await repos.credibility.lockOrCreate(userId, now);
      const events = await repos.credibility.listTaskEvents(userId, taskId);

      let lastUndo = -1;
      events.forEach((e, index) => {
        if (e.event === 'approval_undone') lastUndo = index;
      });
      const live = events.slice(lastUndo + 1);

      if (!live.some(e => e.event === 'approved_task')) {
        throw new NotFoundError(`No active approval for task '${taskId}'`);
      }

      const removed = live
        .filter(e => e.event === 'approved_task' || e.event === 'streak_bonus')
        .reduce((sum, e) => sum + e.appliedDelta, 0);

      const previousScore = state.score;
      const newScore = this.calculator.clamp(previousScore - removed);
      const streak = Math.max(0, state.consecutiveApprovedTasks - 1);

      await this.appendEvent(repos, userId, now, {
        event: 'approval_undone',
        amount: -removed,
        appliedDelta: newScore - previousScore,
        newScore,
        taskId,
        reviewerId: options.reviewerId,
        streakCount: streak,
      });

      const updated: CredibilityState = {
        ...state,
        score: newScore,
        consecutiveApprovedTasks: streak,
        updatedAt: now,
      };
      const redemptionBonusActivated = await this.maybeActivateRedemptionBonus(repos, updated, previousScore, now);
      await repos.credibility.save(updated);

      this.log.info({ userId, taskId, before: previousScore, after: newScore, streak }, 'Credibility approval undone');

      return { previousScore, newScore, appliedDelta: newScore - previousScore, redemptionBonusActivated };
    });
  }

  /**
   * Periodic sweep. Each user is decayed in its own transaction; an entry
   * moves through at most two decay stages and never repeats one.
   * Also clears stored redemption bonuses whose expiry has passed.
   */
  async applyDecay(): Promise<DecaySweepResult> {
    const now = new Date();
    const cutoff = new Date(now.getTime() - CREDIBILITY.PARTIAL_DECAY_DAYS * DAY_MS);
    const result: DecaySweepResult = { usersProcessed: 0, entriesDecayed: 0, pointsRestored: 0, bonusesExpired: 0 };

    const users = await this.store.repos.credibility.listUsersWithDecayableDownvotes(cutoff);
    for (const userId of users) {
      const { entries, points } = await this.store.run(undefined, ({ repos }) => this.decayUser(repos, userId, now));
      result.usersProcessed++;
      result.entriesDecayed += entries;
      result.pointsRestored += points;
    }

    const expired = await this.store.repos.credibility.listUsersWithExpiredBonus(now);
    for (const userId of expired) {
      const cleared = await this.store.run(undefined, async ({ repos }) => {
        const state = await repos.credibility.lockOrCreate(userId, now);
        if (!state.hasRedemptionBonus || this.calculator.isRedemptionBonusActive(state, now)) {
          return false;
        }
        const updated: CredibilityState = { ...state, updatedAt: now };
        await this.expireRedemptionBonus(repos, updated, now, 'Redemption bonus period ended');
        await repos.credibility.save(updated);
        return true;
      });
      if (cleared) result.bonusesExpired++;
    }

    this.log.info({ ...result }, 'Credibility decay sweep complete');
    return result;
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  async getState(userId: string): Promise<CredibilityState> {
    const state = await this.store.repos.credibility.find(userId);
    return state ?? defaultState(userId, new Date());
  }

  async getEarningMultiplier(userId: string): Promise<number> {
    const state = await this.getState(userId);
    return this.calculator.earningMultiplier(state.score);
  }

  /** Tier multiplier, times 1.3 while a redemption bonus is unexpired. */
  async getConversionRate(userId: string): Promise<number> {
    const state = await this.getState(userId);
    return this.calculator.conversionRate(state.score, this.calculator.isRedemptionBonusActive(state, new Date()));
  }

  async minutesForXP(userId: string, xp: number): Promise<number> {
    const rate = await this.getConversionRate(userId);
    return Math.round(xp * rate);
  }

  async getCredibilityStatus(userId: string): Promise<CredibilityStatus> {
    const now = new Date();
    const [state, history] = await Promise.all([
      this.getState(userId),
      this.store.repos.credibility.listEvents(userId),
    ]);
    const tier = getTier(state.score);
    const bonusActive = this.calculator.isRedemptionBonusActive(state, now);

    return {
      score: state.score,
      tier,
      earningMultiplier: tier.multiplier,
      conversionRate: this.calculator.conversionRate(state.score, bonusActive),
      streak: state.consecutiveApprovedTasks,
      redemptionBonus: {
        active: bonusActive,
        expiresAt: bonusActive ? state.redemptionBonusExpiry : null,
      },
      history,
      recoveryPath: this.recoveryPath(state.score),
    };
  }

  recoveryPath(score: number): string | null {
    const target = nextTier(score);
    if (!target) {
      return null;
    }
    const tasksNeeded = Math.ceil((target.minScore - score) / CREDIBILITY.APPROVAL_POINTS);
    return `Complete ${tasksNeeded} approved tasks to reach ${target.displayName} status`;
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private async decayUser(repos: Repositories, userId: string, now: Date): Promise<{ entries: number; points: number }> {
    const state = await repos.credibility.lockOrCreate(userId, now);
    const downvotes = await repos.credibility.listActiveDownvotes(userId);

    let entries = 0;
    let points = 0;
    for (const downvote of downvotes) {
      const step = this.calculator.decayStep(downvote, now);
      if (!step) continue;
      await repos.credibility.updateEventDecay({
        ...downvote,
        decayStage: step.nextStage,
        archivedAt: step.archive ? now : null,
      });
      entries++;
      points += step.restore;
    }

    if (entries === 0) {
      return { entries, points };
    }

    const previousScore = state.score;
    const newScore = this.calculator.clamp(previousScore + points);
    await this.appendEvent(repos, userId, now, {
      event: 'time_decay_recovery',
      amount: points,
      appliedDelta: newScore - previousScore,
      newScore,
      notes: `Recovered ${points} points from ${entries} aging penalties`,
    });

    const updated: CredibilityState = { ...state, score: newScore, updatedAt: now };
    await this.maybeActivateRedemptionBonus(repos, updated, previousScore, now);
    await repos.credibility.save(updated);

    this.log.info({ userId, before: previousScore, after: newScore, entries, points }, 'Credibility decay applied');
    return { entries, points };
  }

  /** Mutates `state` in place when the bonus activates. */
  private async maybeActivateRedemptionBonus(
    repos: Repositories,
    state: CredibilityState,
    startScore: number,
    now: Date
  ): Promise<boolean> {
    if (
      !this.calculator.crossesRedemptionThreshold(startScore, state.score) ||
      this.calculator.isRedemptionBonusActive(state, now)
    ) {
      return false;
    }

    const expiresAt = new Date(now.getTime() + CREDIBILITY.REDEMPTION_BONUS_DAYS * DAY_MS);
    state.hasRedemptionBonus = true;
    state.redemptionBonusExpiry = expiresAt;

    await this.appendEvent(repos, state.userId, now, {
      event: 'redemption_bonus_activated',
      amount: 0,
      appliedDelta: 0,
      newScore: state.score,
      notes: `Conversion bonus active until ${expiresAt.toISOString()}`,
    });
    await writeToOutbox(repos.outbox, 'redemption_bonus.activated', state.userId, {
      userId: state.userId,
      expiresAt: expiresAt.toISOString(),
    }, now);

    this.log.info({ userId: state.userId, from: startScore, to: state.score, expiresAt }, 'Redemption bonus activated');
    return true;
  }

  /** Mutates `state` in place. */
  private async expireRedemptionBonus(
    repos: Repositories,
    state: CredibilityState,
    now: Date,
    notes: string
  ): Promise<void> {
    state.hasRedemptionBonus = false;
    state.redemptionBonusExpiry = null;

    await this.appendEvent(repos, state.userId, now, {
      event: 'redemption_bonus_expired',
      amount: 0,
      appliedDelta: 0,
      newScore: state.score,
      notes,
    });
    await writeToOutbox(repos.outbox, 'redemption_bonus.expired', state.userId, { userId: state.userId }, now);

    this.log.info({ userId: state.userId }, 'Redemption bonus expired');
  }

  private async appendEvent(repos: Repositories, userId: string, now: Date, input: EventInput): Promise<CredibilityEvent> {
    const event: CredibilityEvent = {
      id: randomUUID(),
      userId,
      event: input.event,
      amount: input.amount,
      appliedDelta: input.appliedDelta,
      occurredAt: now,
      taskId: input.taskId ?? null,
      reviewerId: input.reviewerId ?? null,
      notes: input.notes ?? null,
      newScore: input.newScore,
      streakCount: input.streakCount ?? null,
      decayStage: 0,
      archivedAt: null,
    };
    await repos.credibility.appendEvent(event);
    return event;
  }
}
