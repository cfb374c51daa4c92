/**
 * XP Transaction Repository
 *
 * Append-only. The table rejects UPDATE and DELETE at the trigger level.
 */

import { BaseRepository } from './BaseRepository';
import type { XPTransactionRepository } from './contracts';
import type { XPTransaction, XPTransactionType } from '../types';

interface XPTransactionRow {
  id: string;
  user_id: string;
  type: XPTransactionType;
  amount: number;
  occurred_at: Date;
  related_task_id: string | null;
  credibility_at_time: number | null;
  notes: string | null;
}

export class PgXPTransactionRepository
  extends BaseRepository<XPTransactionRow, XPTransaction>
  implements XPTransactionRepository
{
  protected readonly tableName = 'xp_transactions';

  protected toEntity(row: XPTransactionRow): XPTransaction {
    return {
      id: row.id,
      userId: row.user_id,
      type: row.type,
      amount: row.amount,
      timestamp: row.occurred_at,
      relatedTaskId: row.related_task_id,
      credibilityAtTime: row.credibility_at_time,
      notes: row.notes,
    };
  }

  async append(tx: XPTransaction): Promise<void> {
    await this.query(
      `INSERT INTO ${this.tableName}
         (id, user_id, type, amount, occurred_at, related_task_id, credibility_at_time, notes)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [tx.id, tx.userId, tx.type, tx.amount, tx.timestamp, tx.relatedTaskId, tx.credibilityAtTime, tx.notes]
    );
  }

  async listByUser(userId: string, limit: number): Promise<XPTransaction[]> {
    return this.many(
      `SELECT * FROM ${this.tableName} WHERE user_id = $1 ORDER BY occurred_at DESC, seq DESC LIMIT $2`,
      [userId, limit]
    );
  }

  async sumByTypeSince(userId: string, type: XPTransactionType, since: Date): Promise<number> {
    const result = await this.query<{ total: number }>(
      `SELECT COALESCE(SUM(amount), 0)::int AS total
       FROM ${this.tableName}
       WHERE user_id = $1 AND type = $2 AND occurred_at >= $3`,
      [userId, type, since]
    );
    return result.rows[0]?.total ?? 0;
  }
}
