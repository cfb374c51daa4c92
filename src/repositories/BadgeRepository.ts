/**
 * Badge Repository
 *
 * earned_badges is write-once; the (child_id, badge_type) constraint makes a
 * second award a no-op.
 */

import { BaseRepository } from './BaseRepository';
import type { BadgeRepository } from './contracts';
import type { BadgeType, EarnedBadge } from '../types';

interface EarnedBadgeRow {
  id: string;
  child_id: string;
  badge_type: BadgeType;
  earned_at: Date;
  bonus_xp_awarded: number;
}

export class PgBadgeRepository
  extends BaseRepository<EarnedBadgeRow, EarnedBadge>
  implements BadgeRepository
{
  protected readonly tableName = 'earned_badges';

  protected toEntity(row: EarnedBadgeRow): EarnedBadge {
    return {
      id: row.id,
      childId: row.child_id,
      badgeType: row.badge_type,
      earnedAt: row.earned_at,
      bonusXPAwarded: row.bonus_xp_awarded,
    };
  }

  async listByChild(childId: string): Promise<EarnedBadge[]> {
    return this.many(
      `SELECT * FROM ${this.tableName} WHERE child_id = $1 ORDER BY earned_at ASC, id ASC`,
      [childId]
    );
  }

  async has(childId: string, badgeType: BadgeType): Promise<boolean> {
    return this.exists('child_id = $1 AND badge_type = $2', [childId, badgeType]);
  }

  async insert(badge: EarnedBadge): Promise<boolean> {
    const inserted = await this.execute(
      `INSERT INTO ${this.tableName} (id, child_id, badge_type, earned_at, bonus_xp_awarded)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (child_id, badge_type) DO NOTHING`,
      [badge.id, badge.childId, badge.badgeType, badge.earnedAt, badge.bonusXPAwarded]
    );
    return inserted > 0;
  }
}
