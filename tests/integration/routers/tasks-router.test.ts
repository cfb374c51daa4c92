/**
 * Tasks router: role gates, household checks and service error mapping.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { appRouter } from '../../../src/routers';
import { createCallerFactory, type Context } from '../../../src/trpc';
import type { Actor } from '../../../src/types';
import {
  CHILD,
  GUARDIAN,
  OTHER_GUARDIAN,
  SIBLING,
  createTestEconomy,
  type TestEconomy,
} from '../../mocks/factories';

const createCaller = createCallerFactory(appRouter);

const NOW = new Date('2026-04-20T16:00:00.000Z');
const child: Actor = { userId: CHILD, role: 'child' };
const guardian: Actor = { userId: GUARDIAN, role: 'guardian' };

describe('tasks router', () => {
  let economy: TestEconomy;

  function callerFor(actor: Actor | null) {
    const ctx: Context = { actor, economy };
    return createCaller(ctx);
  }

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(NOW);
    economy = createTestEconomy();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs a task from claim to approval', async () => {
    const kid = callerFor(child);
    const parent = callerFor(guardian);

    const claimed = await kid.tasks.claim({ templateId: 'tidy-room', level: 3 });
    await kid.tasks.start({ assignmentId: claimed.id });
    await kid.tasks.submit({ assignmentId: claimed.id, photoURL: 'https://photos.test/room.jpg' });

    const pending = await parent.tasks.getPendingReviews();
    expect(pending.map(a => a.id)).toEqual([claimed.id]);

    const result = await parent.tasks.approve({ assignmentId: claimed.id });
    expect(result.xpAwarded).toBe(36);
    expect((await kid.ledger.getBalance({})).currentXP).toBe(61);
  });

  it('approves an appeal after the guardian retracted the decline', async () => {
    const kid = callerFor(child);
    const parent = callerFor(guardian);
    const claimed = await kid.tasks.claim({ templateId: 'tidy-room', level: 3 });
    await kid.tasks.start({ assignmentId: claimed.id });
    await kid.tasks.submit({ assignmentId: claimed.id, photoURL: 'https://photos.test/room.jpg' });
    await parent.tasks.decline({ assignmentId: claimed.id, reason: 'Bed not made' });

    const retracted = await parent.credibility.undoDecline({ childId: CHILD, taskId: claimed.id });
    expect(retracted).toMatchObject({ previousScore: 90, newScore: 100, appliedDelta: 10 });

    await kid.tasks.appeal({ assignmentId: claimed.id, childNotes: 'It was made' });
    const result = await parent.tasks.approve({ assignmentId: claimed.id });

    expect(result.xpAwarded).toBe(36);
    expect(result.assignment.status).toBe('approved');
    expect((await kid.credibility.getStatus({})).score).toBe(100);
  });

  it('requires authentication', async () => {
    await expect(callerFor(null).tasks.claim({ templateId: 'tidy-room', level: 1 })).rejects.toMatchObject({
      code: 'UNAUTHORIZED',
      message: 'Authentication required',
    });
  });

  it('keeps guardians out of child commands and children out of reviews', async () => {
    await expect(callerFor(guardian).tasks.claim({ templateId: 'tidy-room', level: 1 })).rejects.toMatchObject({
      code: 'FORBIDDEN',
      message: 'Child account required',
    });
    await expect(callerFor(child).tasks.getPendingReviews()).rejects.toMatchObject({
      code: 'FORBIDDEN',
      message: 'Guardian account required',
    });
  });

  it('maps service errors to tRPC codes', async () => {
    const kid = callerFor(child);
    const claimed = await kid.tasks.claim({ templateId: 'tidy-room', level: 1 });

    await expect(callerFor(guardian).tasks.approve({ assignmentId: claimed.id })).rejects.toMatchObject({
      code: 'CONFLICT',
    });
    await expect(callerFor({ userId: OTHER_GUARDIAN, role: 'guardian' }).tasks.decline({
      assignmentId: claimed.id,
      reason: 'No',
    })).rejects.toMatchObject({ code: 'FORBIDDEN' });
    await expect(kid.tasks.claim({ templateId: 'walk-dog', level: 1 })).rejects.toMatchObject({
      code: 'NOT_FOUND',
      message: "Task template with id 'walk-dog' not found",
    });
  });

  it('rejects malformed input before the service runs', async () => {
    await expect(
      callerFor(child).tasks.submit({ assignmentId: 'not-a-uuid', photoURL: 'https://photos.test/a.jpg' })
    ).rejects.toMatchObject({ code: 'BAD_REQUEST' });
  });

  it('turns an ISO due date into a Date', async () => {
    const assigned = await callerFor(guardian).tasks.assign({
      childId: SIBLING,
      templateId: 'wash-car',
      level: 3,
      dueDate: '2026-04-21T16:00:00.000Z',
    });

    expect(assigned.dueDate).toEqual(new Date('2026-04-21T16:00:00.000Z'));
    expect(assigned.assignedBy).toBe(GUARDIAN);
  });

  it('lets a child read only its own assignments', async () => {
    const claimed = await callerFor({ userId: SIBLING, role: 'child' }).tasks.claim({ templateId: 'tidy-room', level: 1 });

    await expect(callerFor(child).tasks.get({ assignmentId: claimed.id })).rejects.toMatchObject({
      code: 'FORBIDDEN',
      message: 'Children can only read their own data',
    });
    expect(await callerFor(guardian).tasks.listForChild({ childId: SIBLING })).toHaveLength(1);
  });

  it('requires a childId from guardians', async () => {
    await expect(callerFor(guardian).tasks.listForChild({})).rejects.toMatchObject({
      code: 'BAD_REQUEST',
      message: 'childId is required for guardians',
    });
  });
});
