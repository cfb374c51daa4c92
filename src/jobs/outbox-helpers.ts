/**
 * Economy events are written to outbox_events inside the transaction that
 * makes the change, and published to EconomyEvents only after commit.
 */

import { randomUUID } from 'crypto';
import type { OutboxRepository } from '../repositories';
import type { OutboxEvent } from '../types';
import type { EconomyEventName, EconomyEventPayload } from '../services/EconomyEvents';

export async function writeToOutbox<K extends EconomyEventName>(
  outbox: OutboxRepository,
  eventType: K,
  aggregateId: string,
  payload: EconomyEventPayload<K>,
  now: Date = new Date()
): Promise<OutboxEvent> {
  const event: OutboxEvent = {
    id: randomUUID(),
    eventType,
    aggregateId,
    payload: { ...payload },
    status: 'pending',
    attempts: 0,
    lastError: null,
    createdAt: now,
    dispatchedAt: null,
  };
  await outbox.append(event);
  return event;
}
