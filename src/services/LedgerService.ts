/**
 * LedgerService v1.0.0
 *
 * Owns XP balances and the append-only transaction log. Pure arithmetic:
 * no knowledge of tasks or credibility beyond the numbers it is handed.
 *
 * Always: currentXP == lifetimeEarned − lifetimeSpent.
 * Grants raise currentXP and lifetimeEarned together without a task reference.
 */

import { randomUUID } from 'crypto';
import type { ServiceResult, XPBalance, XPTransaction, XPTransactionType } from '../types';
import { ErrorCodes } from '../types';
import { LEDGER } from '../constants';
import { ValidationError } from '../lib/errors';
import { ledgerLogger, type Logger } from '../logger';
import type { EconomyStore, Tx } from './EconomyStore';

// ============================================================================
// TYPES
// ============================================================================

export interface EarnOptions {
  taskId?: string;
  credibilityAtTime?: number;
  tx?: Tx;
}

export interface EarnResult {
  rawXP: number;
  credited: number;
  balance: XPBalance;
  transaction: XPTransaction | null;
}

export interface RedeemResult {
  xpSpent: number;
  minutesGranted: number;
  newBalance: number;
}

export interface GrantResult {
  balance: XPBalance;
  transaction: XPTransaction;
}

export interface DailyStats {
  earnedToday: number;
  redeemedToday: number;
  currentXP: number;
  softCapPercentage: number;
  isAtSoftCap: boolean;
}

// ============================================================================
// XP MATH
// ============================================================================

/**
 * ceil(baseXP × multiplier), never below 1.
 */
export function computeRawXP(baseXP: number, multiplier: number): number {
  return Math.max(LEDGER.MIN_EARN, Math.ceil(baseXP * multiplier));
}

/**
 * Soft cap: full credit below the cap, half (integer division) above it.
 */
export function applySoftCap(currentXP: number, amount: number): number {
  if (currentXP >= LEDGER.SOFT_CAP) {
    return Math.floor(amount / 2);
  }
  if (currentXP + amount > LEDGER.SOFT_CAP) {
    const belowCap = LEDGER.SOFT_CAP - currentXP;
    const aboveCap = Math.floor((amount - belowCap) / 2);
    return belowCap + aboveCap;
  }
  return amount;
}

export function isAtSoftCap(balance: Pick<XPBalance, 'currentXP'>): boolean {
  return balance.currentXP >= LEDGER.SOFT_CAP;
}

export function softCapPercentage(balance: Pick<XPBalance, 'currentXP'>): number {
  return Math.min((balance.currentXP / LEDGER.SOFT_CAP) * 100, 100);
}

function emptyBalance(userId: string, now: Date): XPBalance {
  return {
    userId,
    currentXP: 0,
    lifetimeEarned: 0,
    lifetimeSpent: 0,
    createdAt: now,
    lastUpdated: now,
  };
}

function startOfLocalDay(now: Date): Date {
  const start = new Date(now);
  start.setHours(0, 0, 0, 0);
  return start;
}

// ============================================================================
// SERVICE
// ============================================================================

export class LedgerService {
  constructor(
    private readonly store: EconomyStore,
    private readonly log: Logger = ledgerLogger
  ) {}

  /**
   * Credit task XP. A non-positive baseXP is a no-op (credited 0, nothing written).
   */
  async earn(userId: string, baseXP: number, multiplier: number, options: EarnOptions = {}): Promise<EarnResult> {
    return this.store.run(options.tx, async ({ repos }) => {
      const now = new Date();

      if (baseXP <= 0) {
        const existing = await repos.balances.find(userId);
        return { rawXP: 0, credited: 0, balance: existing ?? emptyBalance(userId, now), transaction: null };
      }

      const rawXP = computeRawXP(baseXP, multiplier);
      const balance = await repos.balances.lockOrCreate(userId, now);
      const credited = applySoftCap(balance.currentXP, rawXP);

      if (credited === 0) {
        this.log.info({ userId, taskId: options.taskId, rawXP }, 'Earn fully absorbed by soft cap');
        return { rawXP, credited, balance, transaction: null };
      }

      const updated: XPBalance = {
        ...balance,
        currentXP: balance.currentXP + credited,
        lifetimeEarned: balance.lifetimeEarned + credited,
        lastUpdated: now,
      };

      const transaction = this.buildTransaction(userId, 'earned', credited, now, {
        relatedTaskId: options.taskId ?? null,
        credibilityAtTime: options.credibilityAtTime ?? null,
        notes: `Earned ${credited} XP (${baseXP} base × ${multiplier})`,
      });

      await repos.balances.save(updated);
      await repos.transactions.append(transaction);

      this.log.info(
        {
          userId,
          taskId: options.taskId,
          rawXP,
          credited,
          before: balance.currentXP,
          after: updated.currentXP,
        },
        'XP earned'
      );

      return { rawXP, credited, balance: updated, transaction };
    });
  }

  /**
   * Spend XP for screen time (1 XP = 1 minute). Fails without mutation on a
   * non-positive amount or insufficient balance.
   */
  async redeem(userId: string, amount: number, tx?: Tx): Promise<ServiceResult<RedeemResult>> {
    if (!Number.isInteger(amount) || amount <= 0) {
      return {
        success: false,
        error: { code: ErrorCodes.INVALID_AMOUNT, message: 'Redeem amount must be a positive whole number' },
      };
    }

    return this.store.run(tx, async ({ repos }): Promise<ServiceResult<RedeemResult>> => {
      const now = new Date();
      const balance = await repos.balances.lockOrCreate(userId, now);

      if (balance.currentXP < amount) {
        return {
          success: false,
          error: {
            code: ErrorCodes.INSUFFICIENT_XP,
            message: `Cannot redeem ${amount} XP with a balance of ${balance.currentXP}`,
            details: { requested: amount, available: balance.currentXP },
          },
        };
      }

      const updated: XPBalance = {
        ...balance,
        currentXP: balance.currentXP - amount,
        lifetimeSpent: balance.lifetimeSpent + amount,
        lastUpdated: now,
      };

      await repos.balances.save(updated);
      await repos.transactions.append(
        this.buildTransaction(userId, 'redeemed', amount, now, {
          notes: `Redeemed ${amount} XP for ${amount} minutes`,
        })
      );

      this.log.info({ userId, amount, before: balance.currentXP, after: updated.currentXP }, 'XP redeemed');

      return {
        success: true,
        data: { xpSpent: amount, minutesGranted: amount, newBalance: updated.currentXP },
      };
    });
  }

  /**
   * Out-of-band credit. Bypasses the soft cap entirely.
   */
  async grant(userId: string, amount: number, reason: string, tx?: Tx): Promise<GrantResult> {
    if (!Number.isInteger(amount) || amount < LEDGER.GRANT_MIN || amount > LEDGER.GRANT_MAX) {
      throw new ValidationError(`Grant amount must be between ${LEDGER.GRANT_MIN} and ${LEDGER.GRANT_MAX}`);
    }
    const trimmedReason = reason.trim();
    if (!trimmedReason) {
      throw new ValidationError('A reason is required for a grant');
    }

    return this.store.run(tx, async ({ repos }) => {
      const now = new Date();
      const balance = await repos.balances.lockOrCreate(userId, now);

      const updated: XPBalance = {
        ...balance,
        currentXP: balance.currentXP + amount,
        lifetimeEarned: balance.lifetimeEarned + amount,
        lastUpdated: now,
      };
      const transaction = this.buildTransaction(userId, 'granted', amount, now, { notes: trimmedReason });

      await repos.balances.save(updated);
      await repos.transactions.append(transaction);

      this.log.info(
        { userId, amount, reason: trimmedReason, before: balance.currentXP, after: updated.currentXP },
        'XP granted'
      );

      return { balance: updated, transaction };
    });
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  /** Snapshot; unknown users read as an unpersisted zero balance. */
  async getBalance(userId: string): Promise<XPBalance> {
    const balance = await this.store.repos.balances.find(userId);
    return balance ?? emptyBalance(userId, new Date());
  }

  async getTransactions(userId: string, limit: number = LEDGER.DEFAULT_HISTORY_LIMIT): Promise<XPTransaction[]> {
    return this.store.repos.transactions.listByUser(userId, limit);
  }

  async getDailyStats(userId: string): Promise<DailyStats> {
    const since = startOfLocalDay(new Date());
    const [balance, earnedToday, redeemedToday] = await Promise.all([
      this.getBalance(userId),
      this.store.repos.transactions.sumByTypeSince(userId, 'earned', since),
      this.store.repos.transactions.sumByTypeSince(userId, 'redeemed', since),
    ]);

    return {
      earnedToday,
      redeemedToday,
      currentXP: balance.currentXP,
      softCapPercentage: softCapPercentage(balance),
      isAtSoftCap: isAtSoftCap(balance),
    };
  }

  private buildTransaction(
    userId: string,
    type: XPTransactionType,
    amount: number,
    now: Date,
    extra: { relatedTaskId?: string | null; credibilityAtTime?: number | null; notes?: string | null }
  ): XPTransaction {
    return {
      id: randomUUID(),
      userId,
      type,
      amount,
      timestamp: now,
      relatedTaskId: extra.relatedTaskId ?? null,
      credibilityAtTime: extra.credibilityAtTime ?? null,
      notes: extra.notes ?? null,
    };
  }
}
