import type { SourceType } from 'backend/services/scraping/types';

export const SEVERITY_LEVELS = ['critical', 'high', 'medium', 'low', 'info'] as const;
export type SeverityLevel = (typeof SEVERITY_LEVELS)[number];

export type RiskLevel = 'critical' | 'high' | 'medium' | 'low' | 'minimal';

export const IOC_KINDS = ['ip_addresses', 'domains', 'urls', 'file_hashes', 'cve_ids'] as const;

export const ENTITY_KINDS = [
  'ip_addresses',
  'domains',
  'urls',
  'email_addresses',
  'file_hashes',
  'cve_ids',
  'bitcoin_addresses',
  'threat_keywords',
  'organizations',
] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

// Kinds with no matches are absent, never empty
export type EntityBag = Partial<Record<EntityKind, string[]>>;

export interface EntitySummary {
  total: number;
  typeCount: number;
  countsByType: Partial<Record<EntityKind, number>>;
  hasIocs: boolean;
  hasThreatKeywords: boolean;
}

export interface RiskFactors {
  severity: string;
  confidence: number;
  sentiment: number;
  sourceType: string;
}

export interface IncidentMetadata {
  sourceType: SourceType;
  sourceName: string;
  scrapedAt: string;
  contentLength: number;
  reliabilityWeight: number;
}

export interface IncidentCandidate {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly keywords: readonly string[];
  readonly severity: SeverityLevel;
  readonly confidenceScore: number;
  /** 0-10 */
  readonly riskScore: number;
  readonly sentimentScore: number;
  readonly sourceUrls: readonly string[];
  readonly entities: Readonly<EntityBag>;
  readonly createdAt: Date;
  readonly metadata: Readonly<IncidentMetadata>;
}

export const INCIDENT_STATUSES = ['detected', 'analyzing', 'pending', 'investigating', 'confirmed', 'dismissed'] as const;
export type IncidentStatus = (typeof INCIDENT_STATUSES)[number];

export interface Incident extends IncidentCandidate {
  readonly status: IncidentStatus;
  readonly updatedAt: Date;
}

/**
 * The parts of a past incident the historical-pattern factor reads.
 */
export type HistoricalIncident = Pick<IncidentCandidate, 'keywords' | 'riskScore' | 'createdAt'>;

export type TrendDirection = 'escalating' | 'stable' | 'declining';

export interface RiskAssessment {
  incidentId: string;
  /** 0-10 */
  businessImpact: number;
  /** 0-10 */
  urgency: number;
  /** 0-1 */
  likelihood: number;
  trendDirection: TrendDirection;
  recommendedActions: string[];
}

export interface ConfirmationCriteria {
  readonly minRiskScore: number;
  readonly minConfidenceScore: number;
  readonly maxNegativeSentiment: number;
  readonly minSourceReliability: number;
  readonly minKeywordMatches: number;
  readonly recentIncidentWindowHours: number;
  readonly escalationFactor: number;
  readonly sourceTypeWeights: Readonly<Record<SourceType, number>>;
}

export interface ConfirmationFactors {
  baseRiskScore: number;
  confidenceFactor: number;
  sentimentFactor: number;
  sourceFactor: number;
  keywordFactor: number;
  patternFactor: number;
  assessmentFactor: number;
  finalScore: number;
}

export interface Decision {
  confirmed: boolean;
  score: number;
  explanation: string;
  // null when evaluation failed
  factors: ConfirmationFactors | null;
}
