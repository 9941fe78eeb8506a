import { log } from 'backend/utils/log';
import type { Incident, IncidentCandidate, IncidentStatus } from './types';

export const DEFAULT_ACTIVE_WINDOW_MS = 24 * 60 * 60 * 1000;
const TITLE_SIMILARITY_THRESHOLD = 0.8;
const SHARED_KEYWORD_THRESHOLD = 2;

// Terminal states have no outgoing edges
const TRANSITIONS: Record<IncidentStatus, readonly IncidentStatus[]> = {
  detected: ['analyzing'],
  analyzing: ['pending', 'confirmed', 'dismissed'],
  pending: ['investigating', 'confirmed', 'dismissed'],
  investigating: ['pending', 'confirmed', 'dismissed'],
  confirmed: [],
  dismissed: [],
};

export type AddResult =
  | { accepted: true; incident: Incident }
  | { accepted: false; duplicateOf: string };

export type TransitionResult =
  | { ok: true; incident: Incident }
  | { ok: false; reason: string };

export interface IncidentAggregatorOptions {
  windowMs?: number;
  now?: () => Date;
}

function titleTokens(title: string): Set<string> {
  return new Set(title.toLowerCase().split(/\s+/).filter(Boolean));
}

/**
 * Token-set Jaccard similarity of two titles. Empty titles score 0.
 */
export function titleSimilarity(a: string, b: string): number {
  const left = titleTokens(a);
  const right = titleTokens(b);
  if (left.size === 0 || right.size === 0) {
    return 0;
  }

  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared++;
  }
  return shared / (left.size + right.size - shared);
}

export function sharedKeywordCount(a: readonly string[], b: readonly string[]): number {
  const right = new Set(b.map((keyword) => keyword.toLowerCase()));
  return new Set(a.map((keyword) => keyword.toLowerCase()).filter((keyword) => right.has(keyword))).size;
}

export function canTransition(from: IncidentStatus, to: IncidentStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * In-memory set of active incidents. Drops duplicates on arrival, evicts
 * incidents older than the active window, and owns the status machine.
 * Eviction only bounds memory; persisted records are untouched.
 */
export class IncidentAggregator {
  private readonly incidents = new Map<string, Incident>();
  private readonly windowMs: number;
  private readonly now: () => Date;

  constructor(options: IncidentAggregatorOptions = {}) {
    this.windowMs = options.windowMs ?? DEFAULT_ACTIVE_WINDOW_MS;
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.incidents.size;
  }

  findDuplicate(candidate: IncidentCandidate): Incident | undefined {
    for (const existing of this.incidents.values()) {
      if (
        titleSimilarity(candidate.title, existing.title) > TITLE_SIMILARITY_THRESHOLD ||
        sharedKeywordCount(candidate.keywords, existing.keywords) >= SHARED_KEYWORD_THRESHOLD
      ) {
        return existing;
      }
    }
    return undefined;
  }

  add(candidate: IncidentCandidate): AddResult {
    const duplicate = this.findDuplicate(candidate);
    if (duplicate) {
      log(`Dropped duplicate "${candidate.title}" (matches ${duplicate.id})`, 'threat-analysis', 'debug');
      return { accepted: false, duplicateOf: duplicate.id };
    }

    const incident: Incident = { ...candidate, status: 'detected', updatedAt: candidate.createdAt };
    this.incidents.set(incident.id, Object.freeze(incident));

    return { accepted: true, incident };
  }

  /**
   * Evict incidents created before `now - window`. Returns the evicted ids.
   */
  expire(now: Date = this.now()): string[] {
    const cutoff = now.getTime() - this.windowMs;
    const expired: string[] = [];

    for (const [id, incident] of this.incidents) {
      if (incident.createdAt.getTime() < cutoff) {
        expired.push(id);
      }
    }
    for (const id of expired) {
      this.incidents.delete(id);
    }

    if (expired.length > 0) {
      log(`Expired ${expired.length} incidents from the active window`, 'threat-analysis', 'debug');
    }
    return expired;
  }

  active(): Incident[] {
    return [...this.incidents.values()];
  }

  get(id: string): Incident | undefined {
    return this.incidents.get(id);
  }

  transition(id: string, status: IncidentStatus, at: Date = this.now()): TransitionResult {
    const current = this.incidents.get(id);
    if (!current) {
      return { ok: false, reason: `Unknown incident: ${id}` };
    }
    if (!canTransition(current.status, status)) {
      return { ok: false, reason: `Cannot move incident ${id} from ${current.status} to ${status}` };
    }

    const updated: Incident = { ...current, status, updatedAt: at };
    this.incidents.set(id, Object.freeze(updated));

    return { ok: true, incident: updated };
  }
}
