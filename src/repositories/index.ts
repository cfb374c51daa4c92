export type {
  XPBalanceRepository,
  XPTransactionRepository,
  CredibilityRepository,
  TaskAssignmentRepository,
  BadgeRepository,
  OutboxRepository,
  Repositories,
  DataStore,
} from './contracts';
export { BaseRepository } from './BaseRepository';
export { PgXPBalanceRepository } from './XPBalanceRepository';
export { PgXPTransactionRepository } from './XPTransactionRepository';
export { PgCredibilityRepository } from './CredibilityRepository';
export { PgTaskAssignmentRepository } from './TaskAssignmentRepository';
export { PgBadgeRepository } from './BadgeRepository';
export { PgOutboxRepository } from './OutboxRepository';
export { createPgDataStore, createPgRepositories } from './PgDataStore';
export { PgHouseholdDirectory } from './HouseholdRepository';
