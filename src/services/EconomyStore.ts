/**
 * EconomyStore: the unit-of-work runner shared by every economy service.
 *
 * A service method either joins the caller's transaction (when handed a Tx)
 * or opens its own. One reviewer decision therefore commits trust, ledger,
 * badge and outbox writes together, or none of them.
 */

import type { DataStore, Repositories } from '../repositories';
import { AppError, PersistenceError } from '../lib/errors';
import { withRetry } from '../lib/db/retry';
import { JOBS } from '../constants';
import { dbLogger } from '../logger';

export interface Tx {
  readonly repos: Repositories;
}

export interface EconomyStoreOptions {
  /** Runs after every top-level commit (outbox flush). */
  afterCommit?: () => Promise<unknown>;
  maxRetries?: number;
  retryBaseDelayMs?: number;
}

export class EconomyStore {
  private afterCommit?: () => Promise<unknown>;

  constructor(
    private readonly dataStore: DataStore,
    private readonly options: EconomyStoreOptions = {}
  ) {
    this.afterCommit = options.afterCommit;
  }

  /** Autocommit repositories for plain reads. */
  get repos(): Repositories {
    return this.dataStore.repos;
  }

  setAfterCommit(hook: () => Promise<unknown>): void {
    this.afterCommit = hook;
  }

  async run<T>(tx: Tx | undefined, fn: (tx: Tx) => Promise<T>): Promise<T> {
    if (tx) {
      return fn(tx);
    }

    let result: T;
    try {
      result = await withRetry(
        () => this.dataStore.transaction(repos => fn({ repos })),
        {
          attempts: (this.options.maxRetries ?? JOBS.TRANSACTION_MAX_RETRIES) + 1,
          ...(this.options.retryBaseDelayMs !== undefined ? { baseDelayMs: this.options.retryBaseDelayMs } : {}),
        }
      );
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      dbLogger.error({ err: error }, 'Economy transaction rolled back');
      throw new PersistenceError('Store failure; the operation was rolled back', error);
    }

    if (this.afterCommit) {
      try {
        await this.afterCommit();
      } catch (error) {
        // Rows stay pending; the outbox_dispatch job delivers them later
        dbLogger.warn({ err: error }, 'Post-commit hook failed');
      }
    }

    return result;
  }
}
