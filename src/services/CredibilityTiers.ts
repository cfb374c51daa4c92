/**
 * Credibility tier lookup. Tiers are derived from the score, never stored.
 */

import type { CredibilityTier } from '../types';
import { CREDIBILITY, CREDIBILITY_TIERS } from '../constants';

export function clampScore(score: number): number {
  return Math.max(CREDIBILITY.MIN_SCORE, Math.min(CREDIBILITY.MAX_SCORE, score));
}

export function getTier(score: number): CredibilityTier {
  const clamped = clampScore(score);
  const tier = CREDIBILITY_TIERS.find(t => clamped >= t.minScore && clamped <= t.maxScore);
  if (!tier) {
    throw new Error(`No credibility tier covers score ${clamped}`);
  }
  return tier;
}

/** Highest tier first. */
export function allTiers(): readonly CredibilityTier[] {
  return CREDIBILITY_TIERS;
}

/** The tier directly above the score's tier, or null at the top. */
export function nextTier(score: number): CredibilityTier | null {
  const index = CREDIBILITY_TIERS.indexOf(getTier(score));
  return index > 0 ? CREDIBILITY_TIERS[index - 1] ?? null : null;
}
