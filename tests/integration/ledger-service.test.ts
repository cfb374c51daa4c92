/**
 * LedgerService over the in-memory store.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CHILD, DAY, createTestEconomy, type TestEconomy } from '../mocks/factories';
import { serializationFailure } from '../mocks/InMemoryDataStore';
import { PersistenceError, ValidationError } from '../../src/lib/errors';
import type { XPBalance } from '../../src/types';

const NOW = new Date('2026-03-10T15:00:00.000Z');

function seedBalance(economy: TestEconomy, currentXP: number): void {
  const balance: XPBalance = {
    userId: CHILD,
    currentXP,
    lifetimeEarned: currentXP,
    lifetimeSpent: 0,
    createdAt: NOW,
    lastUpdated: NOW,
  };
  economy.dataStore.data.balances.set(CHILD, balance);
}

describe('LedgerService', () => {
  let economy: TestEconomy;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(NOW);
    economy = createTestEconomy();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('earn', () => {
    it('credits ceil(base × multiplier) with task and credibility references', async () => {
      const result = await economy.ledger.earn(CHILD, 30, 1.2, { taskId: 'task-1', credibilityAtTime: 100 });

      expect(result.rawXP).toBe(36);
      expect(result.credited).toBe(36);
      expect(result.balance.currentXP).toBe(36);
      expect(result.balance.lifetimeEarned).toBe(36);
      expect(result.transaction).toMatchObject({
        userId: CHILD,
        type: 'earned',
        amount: 36,
        relatedTaskId: 'task-1',
        credibilityAtTime: 100,
        notes: 'Earned 36 XP (30 base × 1.2)',
      });
    });

    it('halves the portion above the soft cap', async () => {
      seedBalance(economy, 999);

      const result = await economy.ledger.earn(CHILD, 10, 1);

      expect(result.credited).toBe(5);
      expect(result.balance.currentXP).toBe(1004);
    });

    it('writes nothing when the soft cap absorbs the whole earn', async () => {
      seedBalance(economy, 1500);

      const result = await economy.ledger.earn(CHILD, 1, 0.3);

      expect(result.credited).toBe(0);
      expect(result.transaction).toBeNull();
      expect(economy.dataStore.data.transactions).toHaveLength(0);
      expect((await economy.ledger.getBalance(CHILD)).currentXP).toBe(1500);
    });

    it('treats a non-positive base as a no-op', async () => {
      const result = await economy.ledger.earn(CHILD, 0, 1.2);

      expect(result.credited).toBe(0);
      expect(economy.dataStore.data.balances.size).toBe(0);
    });
  });

  describe('redeem', () => {
    beforeEach(() => seedBalance(economy, 100));

    it('rejects a non-positive amount without mutation', async () => {
      const result = await economy.ledger.redeem(CHILD, 0);

      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.code).toBe('INVALID_AMOUNT');
      expect(economy.dataStore.transactionCount).toBe(0);
    });

    it('rejects overdraft and leaves the balance untouched', async () => {
      const result = await economy.ledger.redeem(CHILD, 150);

      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.code).toBe('INSUFFICIENT_XP');
      expect((await economy.ledger.getBalance(CHILD)).currentXP).toBe(100);
      expect(economy.dataStore.data.transactions).toHaveLength(0);
    });

    it('spends XP one-for-one as minutes', async () => {
      const result = await economy.ledger.redeem(CHILD, 40);

      expect(result).toEqual({ success: true, data: { xpSpent: 40, minutesGranted: 40, newBalance: 60 } });
      const balance = await economy.ledger.getBalance(CHILD);
      expect(balance.lifetimeSpent).toBe(40);
      expect(balance.currentXP).toBe(balance.lifetimeEarned - balance.lifetimeSpent);
      expect(economy.dataStore.data.transactions[0]?.notes).toBe('Redeemed 40 XP for 40 minutes');
    });
  });

  describe('grant', () => {
    it.each([0, 501, 2.5])('rejects amount %s', async (amount) => {
      await expect(economy.ledger.grant(CHILD, amount, 'Helped out')).rejects.toThrow(ValidationError);
    });

    it('rejects a blank reason', async () => {
      await expect(economy.ledger.grant(CHILD, 10, '   ')).rejects.toThrow('A reason is required for a grant');
    });

    it('credits past the soft cap with the trimmed reason as notes', async () => {
      seedBalance(economy, 1200);

      const { balance, transaction } = await economy.ledger.grant(CHILD, 25, '  Helped grandma  ');

      expect(balance.currentXP).toBe(1225);
      expect(balance.lifetimeEarned).toBe(1225);
      expect(transaction.type).toBe('granted');
      expect(transaction.relatedTaskId).toBeNull();
      expect(transaction.notes).toBe('Helped grandma');
    });
  });

  describe('queries', () => {
    it('returns an unpersisted zero balance for unknown users', async () => {
      const balance = await economy.ledger.getBalance('nobody');

      expect(balance.currentXP).toBe(0);
      expect(economy.dataStore.data.balances.size).toBe(0);
    });

    it('lists transactions newest first', async () => {
      await economy.ledger.earn(CHILD, 20, 1);
      vi.setSystemTime(new Date(NOW.getTime() + 1000));
      await economy.ledger.redeem(CHILD, 5);

      const history = await economy.ledger.getTransactions(CHILD);

      expect(history.map(t => t.type)).toEqual(['redeemed', 'earned']);
      expect(await economy.ledger.getTransactions(CHILD, 1)).toHaveLength(1);
    });

    it('sums only what happened today', async () => {
      economy.dataStore.data.transactions.push({
        id: 'old',
        userId: CHILD,
        type: 'earned',
        amount: 500,
        timestamp: new Date(NOW.getTime() - 2 * DAY),
        relatedTaskId: null,
        credibilityAtTime: null,
        notes: null,
      });
      await economy.ledger.earn(CHILD, 30, 1.2);
      await economy.ledger.redeem(CHILD, 10);

      const stats = await economy.ledger.getDailyStats(CHILD);

      expect(stats).toMatchObject({ earnedToday: 36, redeemedToday: 10, currentXP: 26, isAtSoftCap: false });
      expect(stats.softCapPercentage).toBeCloseTo(2.6);
    });
  });

  describe('atomicity', () => {
    it('retries serialization failures as a whole unit', async () => {
      economy.dataStore.failCommits(serializationFailure(), 2);

      const result = await economy.ledger.earn(CHILD, 10, 1);

      expect(result.credited).toBe(10);
      expect(economy.dataStore.transactionCount).toBe(3);
      expect(economy.dataStore.data.transactions).toHaveLength(1);
    });

    it('rolls back and reports a persistence error on store failure', async () => {
      economy.dataStore.failCommits(new Error('disk full'));

      await expect(economy.ledger.earn(CHILD, 10, 1)).rejects.toThrow(PersistenceError);
      expect(economy.dataStore.data.balances.size).toBe(0);
      expect(economy.dataStore.data.transactions).toHaveLength(0);
    });
  });
});
