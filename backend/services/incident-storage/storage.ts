import type { Decision, Incident, IncidentStatus } from 'backend/services/threat-analysis/types';

/**
 * An incident as persisted, with the confirmation decision it last received.
 */
export interface StoredIncident extends Incident {
  readonly confirmed: boolean;
  readonly confirmationScore: number;
  readonly explanation: string;
}

export interface IIncidentStorage {
  // Inserts, or updates an incident with the same id. Without a decision the stored one is kept.
  saveIncident(incident: Incident, decision?: Decision): Promise<StoredIncident>;

  updateStatus(id: string, status: IncidentStatus, at?: Date): Promise<StoredIncident | undefined>;

  getIncident(id: string): Promise<StoredIncident | undefined>;

  // Newest first
  listRecent(since: Date, limit?: number): Promise<StoredIncident[]>;
}

const DEFAULT_LIST_LIMIT = 500;

export class InMemoryIncidentStorage implements IIncidentStorage {
  private readonly incidents = new Map<string, StoredIncident>();

  async saveIncident(incident: Incident, decision?: Decision): Promise<StoredIncident> {
    const previous = this.incidents.get(incident.id);
    const stored: StoredIncident = {
      ...incident,
      confirmed: decision ? decision.confirmed : previous?.confirmed ?? false,
      confirmationScore: decision ? decision.score : previous?.confirmationScore ?? 0,
      explanation: decision ? decision.explanation : previous?.explanation ?? '',
    };

    this.incidents.set(incident.id, Object.freeze(stored));
    return stored;
  }

  async updateStatus(id: string, status: IncidentStatus, at: Date = new Date()): Promise<StoredIncident | undefined> {
    const current = this.incidents.get(id);
    if (!current) {
      return undefined;
    }

    const updated: StoredIncident = { ...current, status, updatedAt: at };
    this.incidents.set(id, Object.freeze(updated));
    return updated;
  }

  async getIncident(id: string): Promise<StoredIncident | undefined> {
    return this.incidents.get(id);
  }

  async listRecent(since: Date, limit = DEFAULT_LIST_LIMIT): Promise<StoredIncident[]> {
    return [...this.incidents.values()]
      .filter((incident) => incident.createdAt >= since)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit);
  }
}
