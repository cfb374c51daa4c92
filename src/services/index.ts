/**
 * Household XP Services Index v1.0.0
 *
 * createEconomy() is the composition root: one EconomyStore shared by every
 * service, with the outbox flushed to the in-process event bus after each
 * top-level commit.
 */

import type { DataStore } from '../repositories';
import type { HouseholdDirectory, TaskCatalog } from '../types';
import { OutboxDispatcher } from '../jobs/outbox-worker';
import { EconomyStore, type EconomyStoreOptions } from './EconomyStore';
import { EconomyEvents } from './EconomyEvents';
import { LedgerService } from './LedgerService';
import { CredibilityService } from './CredibilityService';
import { CredibilityCalculator } from './CredibilityCalculator';
import { BadgeService } from './BadgeService';
import { TaskReviewService } from './TaskReviewService';

export { EconomyStore, type Tx } from './EconomyStore';
export { EconomyEvents } from './EconomyEvents';
export { LedgerService } from './LedgerService';
export { CredibilityService } from './CredibilityService';
export { CredibilityCalculator } from './CredibilityCalculator';
export { BadgeService } from './BadgeService';
export { TaskReviewService } from './TaskReviewService';
export { StaticTaskCatalog } from './TaskCatalogService';

export interface EconomyDependencies {
  dataStore: DataStore;
  catalog: TaskCatalog;
  household: HouseholdDirectory;
  events?: EconomyEvents;
  /** Deliver outbox rows right after commit. Off leaves delivery to the outbox_dispatch job. */
  dispatchAfterCommit?: boolean;
  store?: Omit<EconomyStoreOptions, 'afterCommit'>;
}

export interface Economy {
  store: EconomyStore;
  events: EconomyEvents;
  outbox: OutboxDispatcher;
  ledger: LedgerService;
  credibility: CredibilityService;
  badges: BadgeService;
  tasks: TaskReviewService;
}

export function createEconomy(deps: EconomyDependencies): Economy {
  const events = deps.events ?? new EconomyEvents();
  const outbox = new OutboxDispatcher(deps.dataStore, events);
  const store = new EconomyStore(deps.dataStore, deps.store);

  if (deps.dispatchAfterCommit ?? true) {
    store.setAfterCommit(() => outbox.dispatchPending());
  }

  const ledger = new LedgerService(store);
  const credibility = new CredibilityService(store, new CredibilityCalculator());
  const badges = new BadgeService(store, ledger);
  const tasks = new TaskReviewService(store, ledger, credibility, badges, deps.catalog, deps.household);

  return { store, events, outbox, ledger, credibility, badges, tasks };
}
