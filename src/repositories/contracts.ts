/**
 * Repository contracts.
 *
 * Services only see these interfaces. Every method on a transaction-bound
 * bundle runs inside that transaction; `lock*` methods take a row lock that
 * is held until commit.
 *
 * Lock order inside one transaction: assignment → credibility → balance.
 */

import type {
  AssignmentStatus,
  BadgeType,
  CredibilityEvent,
  CredibilityState,
  EarnedBadge,
  OutboxEvent,
  TaskAssignment,
  XPBalance,
  XPTransaction,
  XPTransactionType,
} from '../types';

export interface XPBalanceRepository {
  find(userId: string): Promise<XPBalance | null>;
  /** Create the zero balance on first reference, then lock it. */
  lockOrCreate(userId: string, now: Date): Promise<XPBalance>;
  save(balance: XPBalance): Promise<void>;
}

export interface XPTransactionRepository {
  append(transaction: XPTransaction): Promise<void>;
  /** Newest first. */
  listByUser(userId: string, limit: number): Promise<XPTransaction[]>;
  sumByTypeSince(userId: string, type: XPTransactionType, since: Date): Promise<number>;
}

export interface CredibilityRepository {
  find(userId: string): Promise<CredibilityState | null>;
  lockOrCreate(userId: string, now: Date): Promise<CredibilityState>;
  save(state: CredibilityState): Promise<void>;

  appendEvent(event: CredibilityEvent): Promise<void>;
  /** Persists decayStage and archivedAt only. */
  updateEventDecay(event: CredibilityEvent): Promise<void>;
  /** Oldest first. Archived rows are included only when asked for. */
  listEvents(userId: string, options?: { includeArchived?: boolean }): Promise<CredibilityEvent[]>;
  /** Non-archived downvotes, oldest first. */
  listActiveDownvotes(userId: string): Promise<CredibilityEvent[]>;
  /** All rows (archived included) that reference a task, oldest first. */
  listTaskEvents(userId: string, taskId: string): Promise<CredibilityEvent[]>;

  /** Users holding a non-archived downvote at or before `cutoff`. */
  listUsersWithDecayableDownvotes(cutoff: Date): Promise<string[]>;
  /** Users whose stored bonus flag is still set past its expiry. */
  listUsersWithExpiredBonus(now: Date): Promise<string[]>;
}

export interface TaskAssignmentRepository {
  insert(assignment: TaskAssignment): Promise<void>;
  findById(id: string): Promise<TaskAssignment | null>;
  lockById(id: string): Promise<TaskAssignment | null>;
  save(assignment: TaskAssignment): Promise<void>;
  /** Newest first. */
  listByChild(childId: string, status?: AssignmentStatus): Promise<TaskAssignment[]>;
  /** Oldest completion first. */
  listByChildren(childIds: string[], statuses: AssignmentStatus[]): Promise<TaskAssignment[]>;
  /** Open (assigned / in progress) assignments whose due date is before `now`. */
  listOverdue(now: Date): Promise<TaskAssignment[]>;
  countApproved(childId: string): Promise<number>;
}

export interface BadgeRepository {
  listByChild(childId: string): Promise<EarnedBadge[]>;
  has(childId: string, badgeType: BadgeType): Promise<boolean>;
  /** Returns false when the badge was already held. */
  insert(badge: EarnedBadge): Promise<boolean>;
}

export interface OutboxRepository {
  append(event: OutboxEvent): Promise<void>;
  /** Pending and retryable failed rows, oldest first. */
  listUndelivered(limit: number, maxAttempts: number): Promise<OutboxEvent[]>;
  markDispatched(id: string, at: Date): Promise<void>;
  markFailed(id: string, error: string): Promise<void>;
}

export interface Repositories {
  balances: XPBalanceRepository;
  transactions: XPTransactionRepository;
  credibility: CredibilityRepository;
  assignments: TaskAssignmentRepository;
  badges: BadgeRepository;
  outbox: OutboxRepository;
}

export interface DataStore {
  /** Autocommit repositories for reads and outbox bookkeeping. */
  readonly repos: Repositories;
  /** Runs fn in one serializable transaction; throws roll everything back. */
  transaction<T>(fn: (repos: Repositories) => Promise<T>): Promise<T>;
}
