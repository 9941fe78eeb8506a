import { loadSettings } from 'backend/config/settings';
import { getDb } from 'backend/db/db';
import { DatabaseIncidentStorage } from './database-storage';
import { InMemoryIncidentStorage, type IIncidentStorage } from './storage';

export { InMemoryIncidentStorage, type IIncidentStorage, type StoredIncident } from './storage';
export { DatabaseIncidentStorage, fromRow, toInsertRow, validateInsertRow } from './database-storage';

/**
 * Postgres when DATABASE_URL is set, otherwise an in-process store.
 */
export function createIncidentStorage(databaseUrl = loadSettings().databaseUrl): IIncidentStorage {
  return databaseUrl ? new DatabaseIncidentStorage(getDb(databaseUrl)) : new InMemoryIncidentStorage();
}
