/**
 * Credibility Repository
 *
 * credibility_states holds the score and streak; credibility_events is the
 * append-only history, keyed by user and indexed by time. Decay moves only
 * decay_stage and archived_at (enforced by trigger).
 */

import { BaseRepository } from './BaseRepository';
import type { CredibilityRepository } from './contracts';
import type {
  CredibilityEvent,
  CredibilityEventType,
  CredibilityState,
  DecayStage,
} from '../types';
import { CREDIBILITY } from '../constants';

interface CredibilityStateRow {
  user_id: string;
  score: number;
  consecutive_approved_tasks: number;
  has_redemption_bonus: boolean;
  redemption_bonus_expiry: Date | null;
  updated_at: Date;
}

interface CredibilityEventRow {
  id: string;
  user_id: string;
  event: CredibilityEventType;
  amount: number;
  applied_delta: number;
  occurred_at: Date;
  task_id: string | null;
  reviewer_id: string | null;
  notes: string | null;
  new_score: number;
  streak_count: number | null;
  decay_stage: DecayStage;
  archived_at: Date | null;
}

const EVENTS_TABLE = 'credibility_events';

function toEvent(row: CredibilityEventRow): CredibilityEvent {
  return {
    id: row.id,
    userId: row.user_id,
    event: row.event,
    amount: row.amount,
    appliedDelta: row.applied_delta,
    occurredAt: row.occurred_at,
    taskId: row.task_id,
    reviewerId: row.reviewer_id,
    notes: row.notes,
    newScore: row.new_score,
    streakCount: row.streak_count,
    decayStage: row.decay_stage,
    archivedAt: row.archived_at,
  };
}

export class PgCredibilityRepository
  extends BaseRepository<CredibilityStateRow, CredibilityState>
  implements CredibilityRepository
{
  protected readonly tableName = 'credibility_states';

  protected toEntity(row: CredibilityStateRow): CredibilityState {
    return {
      userId: row.user_id,
      score: row.score,
      consecutiveApprovedTasks: row.consecutive_approved_tasks,
      hasRedemptionBonus: row.has_redemption_bonus,
      redemptionBonusExpiry: row.redemption_bonus_expiry,
      updatedAt: row.updated_at,
    };
  }

  async find(userId: string): Promise<CredibilityState | null> {
    return this.byKey('user_id', userId);
  }

  async lockOrCreate(userId: string, now: Date): Promise<CredibilityState> {
    await this.query(
      `INSERT INTO ${this.tableName} (user_id, score, consecutive_approved_tasks, has_redemption_bonus, updated_at)
       VALUES ($1, $2, 0, FALSE, $3)
       ON CONFLICT (user_id) DO NOTHING`,
      [userId, CREDIBILITY.DEFAULT_SCORE, now]
    );
    const state = await this.byKey('user_id', userId, true);
    if (!state) {
      throw new Error(`credibility_states row for ${userId} vanished after upsert`);
    }
    return state;
  }

  async save(state: CredibilityState): Promise<void> {
    await this.query(
      `UPDATE ${this.tableName}
       SET score = $2, consecutive_approved_tasks = $3, has_redemption_bonus = $4,
           redemption_bonus_expiry = $5, updated_at = $6
       WHERE user_id = $1`,
      [
        state.userId,
        state.score,
        state.consecutiveApprovedTasks,
        state.hasRedemptionBonus,
        state.redemptionBonusExpiry,
        state.updatedAt,
      ]
    );
  }

  async appendEvent(e: CredibilityEvent): Promise<void> {
    await this.query(
      `INSERT INTO ${EVENTS_TABLE}
         (id, user_id, event, amount, applied_delta, occurred_at, task_id, reviewer_id,
          notes, new_score, streak_count, decay_stage, archived_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)`,
      [
        e.id, e.userId, e.event, e.amount, e.appliedDelta, e.occurredAt, e.taskId, e.reviewerId,
        e.notes, e.newScore, e.streakCount, e.decayStage, e.archivedAt,
      ]
    );
  }

  async updateEventDecay(e: CredibilityEvent): Promise<void> {
    await this.query(
      `UPDATE ${EVENTS_TABLE} SET decay_stage = $2, archived_at = $3 WHERE id = $1`,
      [e.id, e.decayStage, e.archivedAt]
    );
  }

  async listEvents(userId: string, options: { includeArchived?: boolean } = {}): Promise<CredibilityEvent[]> {
    const archivedFilter = options.includeArchived ? '' : ' AND archived_at IS NULL';
    const result = await this.query<CredibilityEventRow>(
      `SELECT * FROM ${EVENTS_TABLE} WHERE user_id = $1${archivedFilter} ORDER BY occurred_at ASC, seq ASC`,
      [userId]
    );
    return result.rows.map(toEvent);
  }

  async listActiveDownvotes(userId: string): Promise<CredibilityEvent[]> {
    const result = await this.query<CredibilityEventRow>(
      `SELECT * FROM ${EVENTS_TABLE}
       WHERE user_id = $1 AND event = 'downvote' AND archived_at IS NULL
       ORDER BY occurred_at ASC, seq ASC`,
      [userId]
    );
    return result.rows.map(toEvent);
  }

  async listTaskEvents(userId: string, taskId: string): Promise<CredibilityEvent[]> {
    const result = await this.query<CredibilityEventRow>(
      `SELECT * FROM ${EVENTS_TABLE} WHERE user_id = $1 AND task_id = $2 ORDER BY occurred_at ASC, seq ASC`,
      [userId, taskId]
    );
    return result.rows.map(toEvent);
  }

  async listUsersWithDecayableDownvotes(cutoff: Date): Promise<string[]> {
    const result = await this.query<{ user_id: string }>(
      `SELECT DISTINCT user_id FROM ${EVENTS_TABLE}
       WHERE event = 'downvote' AND archived_at IS NULL AND occurred_at <= $1
       ORDER BY user_id`,
      [cutoff]
    );
    return result.rows.map(row => row.user_id);
  }

  async listUsersWithExpiredBonus(now: Date): Promise<string[]> {
    const result = await this.query<{ user_id: string }>(
      `SELECT user_id FROM ${this.tableName}
       WHERE has_redemption_bonus = TRUE AND redemption_bonus_expiry <= $1
       ORDER BY user_id`,
      [now]
    );
    return result.rows.map(row => row.user_id);
  }
}
