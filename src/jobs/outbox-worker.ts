/**
 * Outbox Worker v1.0.0
 *
 * Reads undelivered outbox_events → publishes them to the in-process
 * EconomyEvents bus → marks them dispatched (or failed, kept for retry).
 *
 * Delivery is at-least-once: a row whose handlers partly failed is
 * re-published in full on the next pass. A process whose bus has no
 * subscribers leaves every row pending.
 */

import type { DataStore } from '../repositories';
import type { EconomyEvents } from '../services/EconomyEvents';
import { JOBS } from '../constants';
import { outboxLogger } from '../logger';

const log = outboxLogger;

const MAX_ATTEMPTS = 5;

export interface OutboxDispatchResult {
  processed: number;
  failed: number;
  /** Rows left pending because this process has no subscribers at all. */
  unrouted: number;
  errors: Array<{ eventId: string; error: string }>;
}

export class OutboxDispatcher {
  // Serializes passes inside this process so a row is not published twice concurrently
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly store: DataStore,
    private readonly events: EconomyEvents,
    private readonly batchSize: number = JOBS.OUTBOX_BATCH_SIZE
  ) {}

  dispatchPending(): Promise<OutboxDispatchResult> {
    const run = this.tail.then(() => this.dispatchBatch());
    this.tail = run.catch((error: unknown) => {
      log.error({ err: error }, 'Outbox dispatch pass failed');
    });
    return run;
  }

  private async dispatchBatch(): Promise<OutboxDispatchResult> {
    const errors: Array<{ eventId: string; error: string }> = [];
    let processed = 0;
    let failed = 0;

    const pending = await this.store.repos.outbox.listUndelivered(this.batchSize, MAX_ATTEMPTS);

    // A bus nobody listens on is not a consumer: the rows wait for a process that subscribes
    if (this.events.handlerCount === 0) {
      if (pending.length > 0) {
        log.debug({ pending: pending.length }, 'No subscribers in this process; outbox rows left pending');
      }
      return { processed: 0, failed: 0, unrouted: pending.length, errors };
    }

    for (const event of pending) {
      const outcome = await this.events.emitRaw(event.eventType, event.payload);

      if (outcome.failures.length === 0) {
        await this.store.repos.outbox.markDispatched(event.id, new Date());
        processed++;
        continue;
      }

      failed++;
      const errorMessage = outcome.failures.map(err => err.message).join('; ');
      errors.push({ eventId: event.id, error: errorMessage });
      log.warn(
        { eventId: event.id, eventType: event.eventType, attempts: event.attempts + 1, error: errorMessage },
        'Outbox event delivery failed'
      );
      await this.store.repos.outbox.markFailed(event.id, errorMessage);
    }

    if (processed > 0 || failed > 0) {
      log.debug({ processed, failed }, 'Outbox pass complete');
    }

    return { processed, failed, unrouted: 0, errors };
  }
}
