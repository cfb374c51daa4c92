/**
 * Credibility rules: tiers, stacking, decay stages, conversion rates.
 */
import { describe, it, expect } from 'vitest';
import { CredibilityCalculator } from '../../src/services/CredibilityCalculator';
import { allTiers, getTier, nextTier } from '../../src/services/CredibilityTiers';
import type { CredibilityEvent, DecayStage } from '../../src/types';

const DAY = 24 * 60 * 60 * 1000;
const NOW = new Date('2026-03-01T12:00:00.000Z');

function downvote(daysAgo: number, overrides: Partial<CredibilityEvent> = {}): CredibilityEvent {
  return {
    id: `dv-${daysAgo}`,
    userId: 'child-1',
    event: 'downvote',
    amount: -10,
    appliedDelta: -10,
    occurredAt: new Date(NOW.getTime() - daysAgo * DAY),
    taskId: null,
    reviewerId: null,
    notes: null,
    newScore: 90,
    streakCount: 0,
    decayStage: 0,
    archivedAt: null,
    ...overrides,
  };
}

const calc = new CredibilityCalculator();

describe('tiers', () => {
  it.each<[number, string, number]>([
    [100, 'excellent', 1.2],
    [90, 'excellent', 1.2],
    [89, 'good', 1.0],
    [75, 'good', 1.0],
    [74, 'fair', 0.8],
    [60, 'fair', 0.8],
    [59, 'poor', 0.5],
    [40, 'poor', 0.5],
    [39, 'very_poor', 0.3],
    [0, 'very_poor', 0.3],
  ])('score %i is %s (×%f)', (score, name, multiplier) => {
    const tier = getTier(score);
    expect(tier.name).toBe(name);
    expect(tier.multiplier).toBe(multiplier);
  });

  it('covers 0..100 without gaps, highest first', () => {
    const tiers = allTiers();
    expect(tiers[0]?.maxScore).toBe(100);
    expect(tiers[tiers.length - 1]?.minScore).toBe(0);
    for (let i = 1; i < tiers.length; i++) {
      expect(tiers[i]?.maxScore).toBe((tiers[i - 1]?.minScore ?? 0) - 1);
    }
  });

  it('finds the next tier up', () => {
    expect(nextTier(55)?.name).toBe('fair');
    expect(nextTier(95)).toBeNull();
  });
});

describe('downvotePenalty', () => {
  it('is -10 with no prior downvote', () => {
    expect(calc.downvotePenalty([], NOW)).toBe(-10);
  });

  it('stacks to -15 when the latest downvote is 7 whole days old or less', () => {
    expect(calc.downvotePenalty([downvote(7)], NOW)).toBe(-15);
    expect(calc.downvotePenalty([downvote(0)], NOW)).toBe(-15);
  });

  it('does not stack after 8 days', () => {
    expect(calc.downvotePenalty([downvote(8)], NOW)).toBe(-10);
  });

  it('ignores decayed and archived downvotes', () => {
    expect(calc.downvotePenalty([downvote(3, { decayStage: 1 })], NOW)).toBe(-10);
    expect(calc.downvotePenalty([downvote(3, { archivedAt: NOW })], NOW)).toBe(-10);
  });

  it('looks at the most recent eligible downvote', () => {
    expect(calc.downvotePenalty([downvote(20), downvote(5)], NOW)).toBe(-15);
  });
});

describe('decayStep', () => {
  it('does nothing before 30 days', () => {
    expect(calc.decayStep(downvote(29), NOW)).toBeNull();
  });

  it('restores half at 30 days and moves to stage 1', () => {
    expect(calc.decayStep(downvote(30, { amount: -15 }), NOW)).toEqual({ restore: 7, nextStage: 1, archive: false });
  });

  it('does not repeat the partial stage', () => {
    expect(calc.decayStep(downvote(45, { decayStage: 1 }), NOW)).toBeNull();
  });

  it('restores the remainder at 60 days and archives', () => {
    expect(calc.decayStep(downvote(60, { amount: -15, decayStage: 1 }), NOW)).toEqual({
      restore: 8,
      nextStage: 2,
      archive: true,
    });
  });

  it('restores everything at once when first swept after 60 days', () => {
    expect(calc.decayStep(downvote(90), NOW)).toEqual({ restore: 10, nextStage: 2, archive: true });
  });

  it.each<[DecayStage, number]>([
    [0, 0],
    [1, 7],
    [2, 15],
  ])('stage %i has returned %i of a -15 downvote', (stage, restored) => {
    expect(calc.restoredByDecay(downvote(0, { amount: -15, decayStage: stage }))).toBe(restored);
  });
});

describe('conversion and bonuses', () => {
  it('applies ×1.3 while the redemption bonus is active', () => {
    expect(calc.conversionRate(95, false)).toBe(1.2);
    expect(calc.conversionRate(95, true)).toBe(1.56);
    expect(calc.conversionRate(80, true)).toBe(1.3);
  });

  it('treats a passed expiry as inactive', () => {
    const state = { hasRedemptionBonus: true, redemptionBonusExpiry: new Date(NOW.getTime() - 1) };
    expect(calc.isRedemptionBonusActive(state, NOW)).toBe(false);
  });

  it('triggers only from below 60 to 95 or more', () => {
    expect(calc.crossesRedemptionThreshold(59, 95)).toBe(true);
    expect(calc.crossesRedemptionThreshold(60, 100)).toBe(false);
    expect(calc.crossesRedemptionThreshold(50, 94)).toBe(false);
  });

  it('awards a streak bonus on every 10th approval', () => {
    expect(calc.shouldAwardStreakBonus(10)).toBe(true);
    expect(calc.shouldAwardStreakBonus(20)).toBe(true);
    expect(calc.shouldAwardStreakBonus(9)).toBe(false);
    expect(calc.shouldAwardStreakBonus(0)).toBe(false);
  });
});
