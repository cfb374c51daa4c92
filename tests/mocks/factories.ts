/**
 * Test fixtures: catalog, household and a fully wired economy over the
 * in-memory store.
 */

import { createEconomy, StaticTaskCatalog, type Economy } from '../../src/services';
import type { HouseholdDirectory, TaskTemplate } from '../../src/types';
import { InMemoryDataStore } from './InMemoryDataStore';

export const CHILD = 'child-ava';
export const SIBLING = 'child-ben';
export const GUARDIAN = 'guardian-pat';
export const OTHER_GUARDIAN = 'guardian-lee';

export const TEMPLATES: TaskTemplate[] = [
  {
    id: 'tidy-room',
    title: 'Tidy your room',
    description: 'Put toys away and make the bed.',
    category: 'bedroom',
    baseXPByLevel: {},
    estimatedMinutes: 15,
  },
  {
    id: 'wash-car',
    title: 'Wash the car',
    description: 'Soap, rinse and dry.',
    category: 'outdoor',
    baseXPByLevel: { 3: 40 },
    estimatedMinutes: 45,
  },
];

export class FakeHousehold implements HouseholdDirectory {
  constructor(private readonly links: Record<string, string[]> = { [GUARDIAN]: [CHILD, SIBLING] }) {}

  async canReview(reviewerId: string, childId: string): Promise<boolean> {
    return (this.links[reviewerId] ?? []).includes(childId);
  }

  async childrenOf(reviewerId: string): Promise<string[]> {
    return this.links[reviewerId] ?? [];
  }
}

export interface TestEconomy extends Economy {
  dataStore: InMemoryDataStore;
}

export function createTestEconomy(options: { dispatchAfterCommit?: boolean } = {}): TestEconomy {
  const dataStore = new InMemoryDataStore();
  const economy = createEconomy({
    dataStore,
    catalog: new StaticTaskCatalog(TEMPLATES),
    household: new FakeHousehold(),
    dispatchAfterCommit: options.dispatchAfterCommit,
    store: { retryBaseDelayMs: 1 },
  });
  return { ...economy, dataStore };
}

export const DAY = 24 * 60 * 60 * 1000;
