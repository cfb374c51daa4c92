/**
 * Outbox Repository
 *
 * Rows are written in the same transaction as the state change they
 * describe, then delivered after commit by the OutboxDispatcher.
 */

import { BaseRepository } from './BaseRepository';
import type { OutboxRepository } from './contracts';
import type { OutboxEvent, OutboxStatus } from '../types';

interface OutboxEventRow {
  id: string;
  event_type: string;
  aggregate_id: string;
  payload: Record<string, unknown>;
  status: OutboxStatus;
  attempts: number;
  last_error: string | null;
  created_at: Date;
  dispatched_at: Date | null;
}

export class PgOutboxRepository
  extends BaseRepository<OutboxEventRow, OutboxEvent>
  implements OutboxRepository
{
  protected readonly tableName = 'outbox_events';

  protected toEntity(row: OutboxEventRow): OutboxEvent {
    return {
      id: row.id,
      eventType: row.event_type,
      aggregateId: row.aggregate_id,
      payload: row.payload,
      status: row.status,
      attempts: row.attempts,
      lastError: row.last_error,
      createdAt: row.created_at,
      dispatchedAt: row.dispatched_at,
    };
  }

  async append(event: OutboxEvent): Promise<void> {
    await this.query(
      `INSERT INTO ${this.tableName}
         (id, event_type, aggregate_id, payload, status, attempts, last_error, created_at, dispatched_at)
       VALUES ($1, $2, $3, $4::jsonb, $5, $6, $7, $8, $9)`,
      [
        event.id,
        event.eventType,
        event.aggregateId,
        JSON.stringify(event.payload),
        event.status,
        event.attempts,
        event.lastError,
        event.createdAt,
        event.dispatchedAt,
      ]
    );
  }

  async listUndelivered(limit: number, maxAttempts: number): Promise<OutboxEvent[]> {
    return this.many(
      `SELECT * FROM ${this.tableName}
       WHERE status = 'pending' OR (status = 'failed' AND attempts < $2)
       ORDER BY created_at ASC, id ASC
       LIMIT $1`,
      [limit, maxAttempts]
    );
  }

  async markDispatched(id: string, at: Date): Promise<void> {
    await this.query(
      `UPDATE ${this.tableName}
       SET status = 'dispatched', dispatched_at = $2, attempts = attempts + 1, last_error = NULL
       WHERE id = $1`,
      [id, at]
    );
  }

  async markFailed(id: string, error: string): Promise<void> {
    await this.query(
      `UPDATE ${this.tableName} SET status = 'failed', attempts = attempts + 1, last_error = $2 WHERE id = $1`,
      [id, error]
    );
  }
}
