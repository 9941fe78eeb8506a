import { desc, eq, gte } from 'drizzle-orm';
import { executeQuery, getDb, type Database } from 'backend/db/db';
import { StorageError, toError } from 'backend/services/error-logging/errors';
import type { Decision, Incident, IncidentStatus } from 'backend/services/threat-analysis/types';
import { log } from 'backend/utils/log';
import {
  incidents,
  insertIncidentSchema,
  type IncidentRow,
  type InsertIncident,
} from '@shared/db/schema/incidents';
import type { IIncidentStorage, StoredIncident } from './storage';

const DEFAULT_LIST_LIMIT = 500;

export function toInsertRow(incident: Incident, decision?: Decision): InsertIncident {
  return {
    id: incident.id,
    title: incident.title,
    description: incident.description,
    keywords: [...incident.keywords],
    severity: incident.severity,
    status: incident.status,
    confidenceScore: incident.confidenceScore,
    riskScore: incident.riskScore,
    sentimentScore: incident.sentimentScore,
    sourceUrls: [...incident.sourceUrls],
    entities: { ...incident.entities },
    incidentMetadata: { ...incident.metadata },
    ...(decision && {
      confirmed: decision.confirmed,
      confirmationScore: decision.score,
      explanation: decision.explanation,
    }),
    createdAt: incident.createdAt,
    updatedAt: incident.updatedAt,
  };
}

export function fromRow(row: IncidentRow): StoredIncident {
  return Object.freeze({
    id: row.id,
    title: row.title,
    description: row.description,
    keywords: row.keywords,
    severity: row.severity,
    status: row.status,
    confidenceScore: row.confidenceScore,
    riskScore: row.riskScore,
    sentimentScore: row.sentimentScore,
    sourceUrls: row.sourceUrls,
    entities: row.entities,
    metadata: row.incidentMetadata,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    confirmed: row.confirmed,
    confirmationScore: row.confirmationScore,
    explanation: row.explanation,
  });
}

/**
 * Reject rows the table constraints or score ranges would not accept.
 */
export function validateInsertRow(values: InsertIncident): void {
  const checked = insertIncidentSchema.safeParse(values);
  if (!checked.success) {
    throw new StorageError(
      `Incident ${values.id} failed validation`,
      checked.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
}

/**
 * Postgres-backed incident store over drizzle.
 */
export class DatabaseIncidentStorage implements IIncidentStorage {
  constructor(private readonly db: Database = getDb()) {}

  async saveIncident(incident: Incident, decision?: Decision): Promise<StoredIncident> {
    const values = toInsertRow(incident, decision);
    validateInsertRow(values);
    const { id: _id, createdAt: _createdAt, ...changes } = values;

    const [row] = await this.run(`save incident ${incident.id}`, async () =>
      this.db
        .insert(incidents)
        .values(values)
        .onConflictDoUpdate({ target: incidents.id, set: changes })
        .returning(),
    );

    if (!row) {
      throw new StorageError(`Incident ${incident.id} was not written`);
    }
    return fromRow(row);
  }

  async updateStatus(id: string, status: IncidentStatus, at: Date = new Date()): Promise<StoredIncident | undefined> {
    const [row] = await this.run(`update status of ${id}`, async () =>
      this.db
        .update(incidents)
        .set({ status, updatedAt: at })
        .where(eq(incidents.id, id))
        .returning(),
    );

    return row ? fromRow(row) : undefined;
  }

  async getIncident(id: string): Promise<StoredIncident | undefined> {
    const [row] = await this.run(`load incident ${id}`, async () =>
      this.db.select().from(incidents).where(eq(incidents.id, id)).limit(1),
    );

    return row ? fromRow(row) : undefined;
  }

  async listRecent(since: Date, limit = DEFAULT_LIST_LIMIT): Promise<StoredIncident[]> {
    const rows = await this.run('list recent incidents', async () =>
      this.db
        .select()
        .from(incidents)
        .where(gte(incidents.createdAt, since))
        .orderBy(desc(incidents.createdAt))
        .limit(limit),
    );

    return rows.map(fromRow);
  }

  private async run<T>(action: string, query: () => Promise<T>): Promise<T> {
    try {
      return await executeQuery(query);
    } catch (error) {
      const cause = toError(error);
      log(`Failed to ${action}: ${cause.message}`, 'storage', 'error');
      throw new StorageError(`Failed to ${action}`, [cause.message], { cause });
    }
  }
}
