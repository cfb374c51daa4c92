/**
 * Process wiring shared by the API server and the worker process.
 */

import { config } from './config';
import { createDatabase, type Database } from './db';
import { createPgDataStore, PgHouseholdDirectory } from './repositories';
import { createEconomy, StaticTaskCatalog, type Economy } from './services';

export interface Runtime {
  db: Database;
  economy: Economy;
}

export function createRuntime(options: { dispatchAfterCommit?: boolean } = {}): Runtime {
  const db = createDatabase(config.database.url, { maxConnections: config.database.maxConnections });
  const economy = createEconomy({
    dataStore: createPgDataStore(db),
    catalog: StaticTaskCatalog.fromFile(),
    household: new PgHouseholdDirectory(db.query),
    dispatchAfterCommit: options.dispatchAfterCommit,
  });
  return { db, economy };
}
