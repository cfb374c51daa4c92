/**
 * BadgeService v1.0.0 (Achievement Tracker)
 *
 * Awards one-time badges when a child's cumulative counters cross catalog
 * thresholds, and credits each badge's bonus through LedgerService.grant.
 *
 * Counters are read once at the start of an evaluation, so bonus XP granted
 * during a pass never unlocks another badge in that same pass.
 */

import { randomUUID } from 'crypto';
import type { BadgeDefinition, BadgeMetric, BadgeProgress, BadgeTier, BadgeType, EarnedBadge } from '../types';
import { BADGE_CATALOG } from '../constants';
import { NotFoundError } from '../lib/errors';
import { badgeLogger, type Logger } from '../logger';
import type { Repositories } from '../repositories';
import { writeToOutbox } from '../jobs/outbox-helpers';
import type { EconomyStore, Tx } from './EconomyStore';
import type { LedgerService } from './LedgerService';

export type BadgeCounters = Record<BadgeMetric, number>;

export function getBadgeDefinition(type: BadgeType): BadgeDefinition {
  const definition = BADGE_CATALOG.find(d => d.type === type);
  if (!definition) {
    throw new NotFoundError(`Unknown badge type '${type}'`);
  }
  return definition;
}

function toProgress(definition: BadgeDefinition, counters: BadgeCounters, held: boolean): BadgeProgress {
  const current = Math.min(counters[definition.metric], definition.threshold);
  return {
    badgeType: definition.type,
    current,
    target: definition.threshold,
    isEarned: held,
    percentage: held ? 100 : Math.min((current / definition.threshold) * 100, 100),
  };
}

export class BadgeService {
  constructor(
    private readonly store: EconomyStore,
    private readonly ledger: LedgerService,
    private readonly log: Logger = badgeLogger
  ) {}

  /**
   * Award every not-yet-held badge whose threshold is met, in catalog order.
   * Re-running without new progress awards nothing.
   */
  async evaluateBadges(childId: string, tx?: Tx): Promise<EarnedBadge[]> {
    return this.store.run(tx, async (unit) => {
      const { repos } = unit;
      const now = new Date();
      const counters = await this.readCounters(repos, childId);
      const held = new Set((await repos.badges.listByChild(childId)).map(b => b.badgeType));
      const awarded: EarnedBadge[] = [];

      for (const definition of BADGE_CATALOG) {
        if (held.has(definition.type) || counters[definition.metric] < definition.threshold) {
          continue;
        }

        const badge: EarnedBadge = {
          id: randomUUID(),
          childId,
          badgeType: definition.type,
          earnedAt: now,
          bonusXPAwarded: definition.bonusXP,
        };
        if (!(await repos.badges.insert(badge))) {
          continue;
        }

        await this.ledger.grant(childId, definition.bonusXP, `Badge: ${definition.displayName}`, unit);
        await writeToOutbox(repos.outbox, 'badge.earned', childId, {
          childId,
          badgeType: definition.type,
          displayName: definition.displayName,
          bonusXP: definition.bonusXP,
          earnedAt: now.toISOString(),
        }, now);

        held.add(definition.type);
        awarded.push(badge);
        this.log.info({ childId, badgeType: definition.type, bonusXP: definition.bonusXP }, 'Badge earned');
      }

      return awarded;
    });
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  async getEarnedBadges(childId: string): Promise<EarnedBadge[]> {
    return this.store.repos.badges.listByChild(childId);
  }

  async hasBadge(childId: string, type: BadgeType): Promise<boolean> {
    return this.store.repos.badges.has(childId, type);
  }

  async getBadgeProgress(childId: string, type: BadgeType): Promise<BadgeProgress> {
    const definition = getBadgeDefinition(type);
    const [counters, held] = await Promise.all([
      this.readCounters(this.store.repos, childId),
      this.store.repos.badges.has(childId, type),
    ]);
    return toProgress(definition, counters, held);
  }

  async getAllProgress(childId: string): Promise<BadgeProgress[]> {
    const [counters, earned] = await Promise.all([
      this.readCounters(this.store.repos, childId),
      this.store.repos.badges.listByChild(childId),
    ]);
    const held = new Set(earned.map(b => b.badgeType));
    return BADGE_CATALOG.map(definition => toProgress(definition, counters, held.has(definition.type)));
  }

  async getBadgeCountByTier(childId: string): Promise<Record<BadgeTier, number>> {
    const counts: Record<BadgeTier, number> = { bronze: 0, silver: 0, gold: 0, platinum: 0 };
    for (const badge of await this.store.repos.badges.listByChild(childId)) {
      counts[getBadgeDefinition(badge.badgeType).tier]++;
    }
    return counts;
  }

  private async readCounters(repos: Repositories, childId: string): Promise<BadgeCounters> {
    const [approvedTasks, balance, credibility] = await Promise.all([
      repos.assignments.countApproved(childId),
      repos.balances.find(childId),
      repos.credibility.find(childId),
    ]);
    return {
      approved_tasks: approvedTasks,
      lifetime_xp: balance?.lifetimeEarned ?? 0,
      streak: credibility?.consecutiveApprovedTasks ?? 0,
    };
  }
}
