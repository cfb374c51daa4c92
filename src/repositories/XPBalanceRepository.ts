/**
 * XP Balance Repository
 *
 * One row per user in xp_balances, created lazily on first write.
 */

import { BaseRepository } from './BaseRepository';
import type { XPBalanceRepository } from './contracts';
import type { XPBalance } from '../types';

interface XPBalanceRow {
  user_id: string;
  current_xp: number;
  lifetime_earned: number;
  lifetime_spent: number;
  created_at: Date;
  last_updated: Date;
}

export class PgXPBalanceRepository
  extends BaseRepository<XPBalanceRow, XPBalance>
  implements XPBalanceRepository
{
  protected readonly tableName = 'xp_balances';

  protected toEntity(row: XPBalanceRow): XPBalance {
    return {
      userId: row.user_id,
      currentXP: row.current_xp,
      lifetimeEarned: row.lifetime_earned,
      lifetimeSpent: row.lifetime_spent,
      createdAt: row.created_at,
      lastUpdated: row.last_updated,
    };
  }

  async find(userId: string): Promise<XPBalance | null> {
    return this.byKey('user_id', userId);
  }

  async lockOrCreate(userId: string, now: Date): Promise<XPBalance> {
    await this.query(
      `INSERT INTO ${this.tableName} (user_id, current_xp, lifetime_earned, lifetime_spent, created_at, last_updated)
       VALUES ($1, 0, 0, 0, $2, $2)
       ON CONFLICT (user_id) DO NOTHING`,
      [userId, now]
    );
    const balance = await this.byKey('user_id', userId, true);
    if (!balance) {
      throw new Error(`xp_balances row for ${userId} vanished after upsert`);
    }
    return balance;
  }

  async save(balance: XPBalance): Promise<void> {
    await this.query(
      `UPDATE ${this.tableName}
       SET current_xp = $2, lifetime_earned = $3, lifetime_spent = $4, last_updated = $5
       WHERE user_id = $1`,
      [balance.userId, balance.currentXP, balance.lifetimeEarned, balance.lifetimeSpent, balance.lastUpdated]
    );
  }
}
