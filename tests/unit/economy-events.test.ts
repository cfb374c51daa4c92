/**
 * EconomyEvents bus and the outbox dispatcher that feeds it.
 */
import { describe, it, expect, vi } from 'vitest';
import { EconomyEvents, logEconomyEvents } from '../../src/services/EconomyEvents';
import { OutboxDispatcher } from '../../src/jobs/outbox-worker';
import { writeToOutbox } from '../../src/jobs/outbox-helpers';
import { InMemoryDataStore } from '../mocks/InMemoryDataStore';

const EXPIRED = {
  assignmentId: 'a-1',
  childId: 'child-1',
  dueDate: '2026-01-01T00:00:00.000Z',
};

describe('EconomyEvents', () => {
  it('delivers to handlers in registration order', async () => {
    const events = new EconomyEvents();
    const seen: string[] = [];
    events.on('task.expired', () => { seen.push('first'); });
    events.on('task.expired', () => { seen.push('second'); });

    const outcome = await events.emit('task.expired', EXPIRED);

    expect(seen).toEqual(['first', 'second']);
    expect(outcome).toEqual({ delivered: 2, failures: [] });
  });

  it('keeps delivering after a handler throws', async () => {
    const events = new EconomyEvents();
    const after = vi.fn();
    events.on('task.expired', () => { throw new Error('push service down'); });
    events.on('task.expired', after);

    const outcome = await events.emit('task.expired', EXPIRED);

    expect(after).toHaveBeenCalledWith(EXPIRED);
    expect(outcome.delivered).toBe(1);
    expect(outcome.failures.map(e => e.message)).toEqual(['push service down']);
  });

  it('stops delivering after unsubscribe', async () => {
    const events = new EconomyEvents();
    const handler = vi.fn();
    const unsubscribe = events.on('task.expired', handler);

    unsubscribe();
    await events.emit('task.expired', EXPIRED);

    expect(handler).not.toHaveBeenCalled();
    expect(events.handlerCount).toBe(0);
  });

  it('rejects unknown names and malformed payloads from raw rows', async () => {
    const events = new EconomyEvents();

    const unknown = await events.emitRaw('task.deleted', {});
    const malformed = await events.emitRaw('task.expired', { assignmentId: 'a-1' });

    expect(unknown.failures[0]?.message).toBe('Unknown economy event: task.deleted');
    expect(malformed.failures[0]?.message).toMatch(/^Invalid task\.expired payload/);
  });
});

describe('logEconomyEvents', () => {
  it('writes one line per event until unsubscribed', async () => {
    const events = new EconomyEvents();
    const log = { info: vi.fn() };

    const stop = logEconomyEvents(events, log);
    expect(events.handlerCount).toBe(7);
    await events.emit('task.expired', EXPIRED);
    stop();
    await events.emit('task.expired', EXPIRED);

    expect(log.info).toHaveBeenCalledTimes(1);
    expect(log.info).toHaveBeenCalledWith({ event: 'task.expired', payload: EXPIRED }, 'Economy event');
    expect(events.handlerCount).toBe(0);
  });

  it('gives the dispatcher a consumer so rows are delivered', async () => {
    const store = new InMemoryDataStore();
    const events = new EconomyEvents();
    logEconomyEvents(events, { info: vi.fn() });
    await writeToOutbox(store.repos.outbox, 'task.expired', 'child-1', EXPIRED);

    const result = await new OutboxDispatcher(store, events).dispatchPending();

    expect(result).toEqual({ processed: 1, failed: 0, unrouted: 0, errors: [] });
    expect(store.data.outbox[0]?.status).toBe('dispatched');
  });
});

describe('OutboxDispatcher', () => {
  it('marks delivered rows dispatched', async () => {
    const store = new InMemoryDataStore();
    const events = new EconomyEvents();
    const handler = vi.fn();
    events.on('task.expired', handler);
    await writeToOutbox(store.repos.outbox, 'task.expired', 'child-1', EXPIRED);

    const result = await new OutboxDispatcher(store, events).dispatchPending();

    expect(result).toEqual({ processed: 1, failed: 0, unrouted: 0, errors: [] });
    expect(handler).toHaveBeenCalledTimes(1);
    expect(store.data.outbox[0]).toMatchObject({ status: 'dispatched', attempts: 1, lastError: null });
  });

  it('leaves rows pending in a process with no subscribers', async () => {
    const store = new InMemoryDataStore();
    await writeToOutbox(store.repos.outbox, 'task.expired', 'child-1', EXPIRED);

    const idle = await new OutboxDispatcher(store, new EconomyEvents()).dispatchPending();

    expect(idle).toEqual({ processed: 0, failed: 0, unrouted: 1, errors: [] });
    expect(store.data.outbox[0]).toMatchObject({ status: 'pending', attempts: 0 });

    const events = new EconomyEvents();
    const handler = vi.fn();
    events.on('task.expired', handler);
    const delivered = await new OutboxDispatcher(store, events).dispatchPending();

    expect(delivered.processed).toBe(1);
    expect(handler).toHaveBeenCalledWith(EXPIRED);
    expect(store.data.outbox[0]?.status).toBe('dispatched');
  });

  it('keeps failed rows for the next pass', async () => {
    const store = new InMemoryDataStore();
    const events = new EconomyEvents();
    const handler = vi.fn()
      .mockRejectedValueOnce(new Error('push service down'))
      .mockResolvedValueOnce(undefined);
    events.on('task.expired', handler);
    await writeToOutbox(store.repos.outbox, 'task.expired', 'child-1', EXPIRED);
    const dispatcher = new OutboxDispatcher(store, events);

    const first = await dispatcher.dispatchPending();
    expect(first.failed).toBe(1);
    expect(store.data.outbox[0]).toMatchObject({ status: 'failed', attempts: 1, lastError: 'push service down' });

    const second = await dispatcher.dispatchPending();
    expect(second.processed).toBe(1);
    expect(store.data.outbox[0]?.status).toBe('dispatched');
  });

  it('gives up on a row after five attempts', async () => {
    const store = new InMemoryDataStore();
    const events = new EconomyEvents();
    events.on('task.expired', () => { throw new Error('always down'); });
    await writeToOutbox(store.repos.outbox, 'task.expired', 'child-1', EXPIRED);
    const dispatcher = new OutboxDispatcher(store, events);

    for (let i = 0; i < 5; i++) {
      await dispatcher.dispatchPending();
    }
    const sixth = await dispatcher.dispatchPending();

    expect(sixth).toEqual({ processed: 0, failed: 0, unrouted: 0, errors: [] });
    expect(store.data.outbox[0]?.attempts).toBe(5);
  });
});
