/**
 * EconomyStore unit-of-work: joining, retrying and rolling back.
 */
import { describe, it, expect, vi } from 'vitest';
import { EconomyStore } from '../../src/services/EconomyStore';
import { NotFoundError, PersistenceError } from '../../src/lib/errors';
import { InMemoryDataStore, serializationFailure } from '../mocks/InMemoryDataStore';

const NOW = new Date('2026-01-15T00:00:00.000Z');

describe('EconomyStore', () => {
  it('joins a transaction it is handed', async () => {
    const dataStore = new InMemoryDataStore();
    const store = new EconomyStore(dataStore);

    await store.run(undefined, async (tx) => {
      await store.run(tx, ({ repos }) => repos.balances.lockOrCreate('child-1', NOW));
    });

    expect(dataStore.transactionCount).toBe(1);
  });

  it('gives up after four serialization failures', async () => {
    const dataStore = new InMemoryDataStore();
    const store = new EconomyStore(dataStore, { retryBaseDelayMs: 1 });
    dataStore.failCommits(serializationFailure(), 4);

    await expect(store.run(undefined, async () => 'done')).rejects.toThrow(PersistenceError);
    expect(dataStore.transactionCount).toBe(4);
    expect(dataStore.rollbackCount).toBe(4);
  });

  it('passes domain errors through untouched and does not retry them', async () => {
    const dataStore = new InMemoryDataStore();
    const store = new EconomyStore(dataStore, { retryBaseDelayMs: 1 });

    await expect(
      store.run(undefined, async () => {
        throw new NotFoundError('Assignment not found');
      })
    ).rejects.toThrow(NotFoundError);
    expect(dataStore.transactionCount).toBe(1);
  });

  it('runs the after-commit hook only on commit and tolerates its failure', async () => {
    const dataStore = new InMemoryDataStore();
    const afterCommit = vi.fn().mockRejectedValue(new Error('bus offline'));
    const store = new EconomyStore(dataStore, { afterCommit });

    await expect(store.run(undefined, async () => 42)).resolves.toBe(42);
    expect(afterCommit).toHaveBeenCalledTimes(1);

    dataStore.failCommits(new Error('disk full'));
    await expect(store.run(undefined, async () => 43)).rejects.toThrow(PersistenceError);
    expect(afterCommit).toHaveBeenCalledTimes(1);
  });
});
