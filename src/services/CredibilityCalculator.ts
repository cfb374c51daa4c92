/**
 * CredibilityCalculator
 *
 * Pure scoring rules: stacking penalties, streak bonuses, decay stages,
 * conversion rates and the redemption bonus trigger. No I/O.
 */

import type { CredibilityEvent, CredibilityState, DecayStage } from '../types';
import { CREDIBILITY, DAY_MS } from '../constants';
import { clampScore, getTier } from './CredibilityTiers';

export interface DecayStep {
  restore: number;
  nextStage: DecayStage;
  archive: boolean;
}

export class CredibilityCalculator {
  wholeDaysBetween(from: Date, to: Date): number {
    return Math.floor((to.getTime() - from.getTime()) / DAY_MS);
  }

  /**
   * −15 when the most recent active, undecayed downvote is at most 7 whole
   * days old, otherwise −10.
   */
  downvotePenalty(activeDownvotes: readonly CredibilityEvent[], now: Date): number {
    let latest: Date | null = null;
    for (const downvote of activeDownvotes) {
      if (downvote.event !== 'downvote' || downvote.archivedAt !== null || downvote.decayStage !== 0) {
        continue;
      }
      if (!latest || downvote.occurredAt > latest) {
        latest = downvote.occurredAt;
      }
    }

    if (latest && this.wholeDaysBetween(latest, now) <= CREDIBILITY.STACKING_WINDOW_DAYS) {
      return CREDIBILITY.STACKED_DOWNVOTE_PENALTY;
    }
    return CREDIBILITY.DOWNVOTE_PENALTY;
  }

  shouldAwardStreakBonus(streak: number): boolean {
    return streak > 0 && streak % CREDIBILITY.STREAK_BONUS_INTERVAL === 0;
  }

  /**
   * Next decay step for a downvote, or null when nothing is due.
   * Stage 0 → 1 at 30 days returns floor(|amount| / 2); reaching 60 days
   * returns whatever is left and archives the entry.
   */
  decayStep(downvote: CredibilityEvent, now: Date): DecayStep | null {
    if (downvote.event !== 'downvote' || downvote.archivedAt !== null || downvote.decayStage === 2) {
      return null;
    }

    const magnitude = Math.abs(downvote.amount);
    const half = Math.floor(magnitude / 2);
    const days = this.wholeDaysBetween(downvote.occurredAt, now);

    if (days >= CREDIBILITY.FULL_DECAY_DAYS) {
      const restore = downvote.decayStage === 1 ? magnitude - half : magnitude;
      return { restore, nextStage: 2, archive: true };
    }
    if (days >= CREDIBILITY.PARTIAL_DECAY_DAYS && downvote.decayStage === 0) {
      return { restore: half, nextStage: 1, archive: false };
    }
    return null;
  }

  /** Points decay has already handed back for this downvote. */
  restoredByDecay(downvote: CredibilityEvent): number {
    const magnitude = Math.abs(downvote.amount);
    if (downvote.decayStage === 2) return magnitude;
    if (downvote.decayStage === 1) return Math.floor(magnitude / 2);
    return 0;
  }

  clamp(score: number): number {
    return clampScore(score);
  }

  isRedemptionBonusActive(
    state: Pick<CredibilityState, 'hasRedemptionBonus' | 'redemptionBonusExpiry'>,
    now: Date
  ): boolean {
    return state.hasRedemptionBonus && state.redemptionBonusExpiry !== null && state.redemptionBonusExpiry > now;
  }

  /** A recovery from below 60 to 95 or more within one operation. */
  crossesRedemptionThreshold(startScore: number, endScore: number): boolean {
    return startScore < CREDIBILITY.REDEMPTION_FROM_BELOW && endScore >= CREDIBILITY.REDEMPTION_THRESHOLD;
  }

  earningMultiplier(score: number): number {
    return getTier(score).multiplier;
  }

  conversionRate(score: number, redemptionBonusActive: boolean): number {
    const rate = getTier(score).multiplier * (redemptionBonusActive ? CREDIBILITY.REDEMPTION_BONUS_MULTIPLIER : 1);
    return Math.round(rate * 100) / 100;
  }
}
