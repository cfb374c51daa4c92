/**
 * Postgres DataStore
 *
 * Binds every repository to one QueryFn. `transaction` runs under
 * SERIALIZABLE isolation; callers retry serialization failures as a whole.
 */

import type { Database, QueryFn } from '../db';
import type { DataStore, Repositories } from './contracts';
import { PgXPBalanceRepository } from './XPBalanceRepository';
import { PgXPTransactionRepository } from './XPTransactionRepository';
import { PgCredibilityRepository } from './CredibilityRepository';
import { PgTaskAssignmentRepository } from './TaskAssignmentRepository';
import { PgBadgeRepository } from './BadgeRepository';
import { PgOutboxRepository } from './OutboxRepository';

export function createPgRepositories(query: QueryFn): Repositories {
  return {
    balances: new PgXPBalanceRepository(query),
    transactions: new PgXPTransactionRepository(query),
    credibility: new PgCredibilityRepository(query),
    assignments: new PgTaskAssignmentRepository(query),
    badges: new PgBadgeRepository(query),
    outbox: new PgOutboxRepository(query),
  };
}

export function createPgDataStore(db: Database): DataStore {
  return {
    repos: createPgRepositories(db.query),
    transaction: <T>(fn: (repos: Repositories) => Promise<T>) =>
      db.serializableTransaction(query => fn(createPgRepositories(query))),
  };
}
