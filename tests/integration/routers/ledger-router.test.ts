/**
 * Ledger, credibility and badge routers.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { appRouter } from '../../../src/routers';
import { credibilityRouter } from '../../../src/routers/credibility';
import { createCallerFactory, type Context } from '../../../src/trpc';
import type { Actor } from '../../../src/types';
import { CHILD, GUARDIAN, OTHER_GUARDIAN, createTestEconomy, type TestEconomy } from '../../mocks/factories';

const createCaller = createCallerFactory(appRouter);

const child: Actor = { userId: CHILD, role: 'child' };
const guardian: Actor = { userId: GUARDIAN, role: 'guardian' };

describe('ledger router', () => {
  let economy: TestEconomy;

  function callerFor(actor: Actor) {
    const ctx: Context = { actor, economy };
    return createCaller(ctx);
  }

  beforeEach(() => {
    economy = createTestEconomy();
  });

  it('grants and redeems', async () => {
    const granted = await callerFor(guardian).ledger.grant({ childId: CHILD, amount: 50, reason: 'Helped a neighbour' });
    expect(granted.balance.currentXP).toBe(50);

    const redeemed = await callerFor(child).ledger.redeem({ amount: 20 });
    expect(redeemed).toEqual({ xpSpent: 20, minutesGranted: 20, newBalance: 30 });
  });

  it('reports an overdraft as a bad request', async () => {
    await expect(callerFor(child).ledger.redeem({ amount: 10 })).rejects.toMatchObject({
      code: 'BAD_REQUEST',
      message: 'Cannot redeem 10 XP with a balance of 0',
    });
  });

  it('only lets a linked guardian grant', async () => {
    await expect(
      callerFor({ userId: OTHER_GUARDIAN, role: 'guardian' }).ledger.grant({ childId: CHILD, amount: 5, reason: 'Nice' })
    ).rejects.toMatchObject({ code: 'FORBIDDEN', message: 'Not a guardian of this child' });
  });

  it('keeps a child to its own balance', async () => {
    await expect(callerFor(child).ledger.getBalance({ userId: 'child-ben' })).rejects.toMatchObject({
      code: 'FORBIDDEN',
    });
    expect((await callerFor(guardian).ledger.getTransactions({ userId: CHILD })).length).toBe(0);
  });
});

describe('credibility router', () => {
  let economy: TestEconomy;

  beforeEach(() => {
    economy = createTestEconomy();
  });

  it('exposes no undo for approvals, which are terminal', () => {
    expect(Object.keys(credibilityRouter._def.procedures).sort()).toEqual(['getStatus', 'undoDecline']);
  });

  it('reports status and maps a missing decline to NOT_FOUND', async () => {
    const ctx: Context = { actor: guardian, economy };
    const caller = createCaller(ctx);

    const status = await caller.credibility.getStatus({ childId: CHILD });
    expect(status.score).toBe(100);

    await expect(
      caller.credibility.undoDecline({ childId: CHILD, taskId: '3f2b8a4e-1c9d-4e7a-9b1f-2a6c5d8e0f13' })
    ).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });
});

describe('badges router', () => {
  it('lists earned badges with tier counts', async () => {
    const economy = createTestEconomy();
    const ctx: Context = { actor: child, economy };
    const caller = createCaller(ctx);

    const listed = await caller.badges.list({});
    const progress = await caller.badges.progress({ badgeType: 'streak_3' });

    expect(listed).toEqual({ earned: [], countByTier: { bronze: 0, silver: 0, gold: 0, platinum: 0 } });
    expect(progress).toEqual([{ badgeType: 'streak_3', current: 0, target: 3, isEarned: false, percentage: 0 }]);
  });
});
