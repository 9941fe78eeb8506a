import { z } from 'zod';
import { ConfigurationError, ScoringError, toError } from 'backend/services/error-logging/errors';
import { SOURCE_TYPES, type SourceType } from 'backend/services/scraping/types';
import { log } from 'backend/utils/log';
import type {
  ConfirmationCriteria,
  ConfirmationFactors,
  Decision,
  HistoricalIncident,
  IncidentCandidate,
  RiskAssessment,
  SeverityLevel,
} from './types';

export const DEFAULT_CONFIRMATION_CRITERIA: ConfirmationCriteria = Object.freeze({
  minRiskScore: 6.0,
  minConfidenceScore: 0.7,
  maxNegativeSentiment: -0.3,
  minSourceReliability: 0.8,
  minKeywordMatches: 2,
  recentIncidentWindowHours: 24,
  escalationFactor: 1.2,
  sourceTypeWeights: Object.freeze({
    government: 1.0,
    news: 0.9,
    blog: 0.8,
    social: 0.6,
    other: 0.4,
  }),
});

export type CriteriaUpdate = Partial<Omit<ConfirmationCriteria, 'sourceTypeWeights'>> & {
  sourceTypeWeights?: Partial<Record<SourceType, number>>;
};

export interface ConfirmationStats {
  totalEvaluated: number;
  totalConfirmations: number;
  averageRiskScore: number;
  severityDistribution: Partial<Record<SeverityLevel, number>>;
  confirmationRate: number;
}

export interface BatchDecision {
  candidate: IncidentCandidate;
  decision: Decision;
}

const FACTOR_WEIGHTS = {
  baseRiskScore: 0.3,
  confidenceFactor: 0.15,
  sentimentFactor: 0.15,
  sourceFactor: 0.15,
  keywordFactor: 0.1,
  patternFactor: 0.1,
  assessmentFactor: 0.05,
} as const;

const NEUTRAL_FACTOR = 5.0;
const HOUR_MS = 60 * 60 * 1000;
const MAX_TRACKED_CONFIRMATIONS = 500;

const weight = z.number().min(0).max(1);

const criteriaSchema = z.object({
  minRiskScore: z.number().min(0).max(10),
  minConfidenceScore: z.number().min(0).max(1),
  maxNegativeSentiment: z.number().min(-1).max(1),
  minSourceReliability: z.number().min(0).max(1),
  minKeywordMatches: z.number().int().nonnegative(),
  recentIncidentWindowHours: z.number().positive(),
  escalationFactor: z.number().positive(),
  sourceTypeWeights: z.object({
    government: weight,
    news: weight,
    blog: weight,
    social: weight,
    other: weight,
  }),
});

// The fields the factors read; anything else on the candidate is ignored
const scorableCandidateSchema = z.object({
  title: z.string(),
  riskScore: z.number().min(0).max(10),
  confidenceScore: z.number().min(0).max(1),
  sentimentScore: z.number().min(-1).max(1),
  keywords: z.array(z.string()),
  sourceUrls: z.array(z.string()),
  metadata: z.object({
    sourceType: z.enum(SOURCE_TYPES),
    reliabilityWeight: z.number(),
  }),
});

const assessmentSchema = z.object({
  businessImpact: z.number().min(0).max(10),
  urgency: z.number().min(0).max(10),
  likelihood: z.number().min(0).max(1),
});

const candidateIdSchema = z.object({ id: z.string() });

function issueList(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

function candidateId(value: unknown): string {
  const parsed = candidateIdSchema.safeParse(value);
  return parsed.success ? parsed.data.id : 'unknown';
}

function roundScore(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

function lowerSet(values: readonly string[]): Set<string> {
  return new Set(values.map((value) => value.toLowerCase()));
}

/**
 * Decides whether a built incident candidate is a confirmed threat.
 *
 * Seven factors, each on a 0-10 scale, are combined with fixed weights:
 * base risk 0.30, confidence 0.15, sentiment 0.15, source 0.15,
 * keywords 0.10, historical pattern 0.10 and qualitative assessment 0.05.
 * The candidate is confirmed when the weighted score reaches
 * `criteria.minRiskScore` (inclusive).
 *
 * `evaluate` never throws. Malformed input yields an unconfirmed zero-score
 * decision whose explanation carries the error.
 */
export class ThreatConfirmer {
  private criteria: ConfirmationCriteria;
  private readonly now: () => Date;
  private evaluatedCount = 0;
  private recentConfirmations: IncidentCandidate[] = [];

  constructor(criteria: CriteriaUpdate = {}, now: () => Date = () => new Date()) {
    this.criteria = this.mergeCriteria(DEFAULT_CONFIRMATION_CRITERIA, criteria);
    this.now = now;
  }

  getCriteria(): ConfirmationCriteria {
    return this.criteria;
  }

  /**
   * Replace the criteria with a validated copy. Invalid values throw
   * ConfigurationError and leave the current criteria in place.
   */
  updateCriteria(update: CriteriaUpdate): ConfirmationCriteria {
    this.criteria = this.mergeCriteria(this.criteria, update);
    log('Threat confirmation criteria updated', 'threat-analysis');
    return this.criteria;
  }

  evaluate(
    candidate: IncidentCandidate,
    assessment?: RiskAssessment,
    historical?: readonly HistoricalIncident[],
    now: Date = this.now(),
  ): Decision {
    this.evaluatedCount++;

    try {
      const factors = this.calculateFactors(candidate, assessment, historical, now);
      const score = factors.finalScore;
      const confirmed = score >= this.criteria.minRiskScore;

      if (confirmed) {
        this.trackConfirmation(candidate);
      }

      log(
        `Threat evaluation for '${candidate.title.slice(0, 50)}': score=${score.toFixed(2)}, confirmed=${confirmed}`,
        'threat-analysis',
        'debug',
      );

      return {
        confirmed,
        score,
        explanation: this.explain(candidate, factors, confirmed),
        factors,
      };
    } catch (error) {
      const err = toError(error);
      log(`Error evaluating incident ${candidateId(candidate)}: ${err.message}`, 'threat-analysis', 'error');
      return {
        confirmed: false,
        score: 0,
        explanation: `Evaluation error: ${err.message}`,
        factors: null,
      };
    }
  }

  evaluateBatch(
    candidates: readonly IncidentCandidate[],
    historical?: readonly HistoricalIncident[],
    now: Date = this.now(),
  ): BatchDecision[] {
    return candidates.map((candidate) => ({
      candidate,
      decision: this.evaluate(candidate, undefined, historical, now),
    }));
  }

  getConfirmationStats(): ConfirmationStats {
    const confirmed = this.recentConfirmations;
    const severityDistribution: ConfirmationStats['severityDistribution'] = {};
    for (const candidate of confirmed) {
      severityDistribution[candidate.severity] = (severityDistribution[candidate.severity] ?? 0) + 1;
    }

    return {
      totalEvaluated: this.evaluatedCount,
      totalConfirmations: confirmed.length,
      averageRiskScore: confirmed.length > 0
        ? confirmed.reduce((sum, candidate) => sum + candidate.riskScore, 0) / confirmed.length
        : 0,
      severityDistribution,
      confirmationRate: this.evaluatedCount > 0 ? confirmed.length / this.evaluatedCount : 0,
    };
  }

  private mergeCriteria(base: ConfirmationCriteria, update: CriteriaUpdate): ConfirmationCriteria {
    const parsed = criteriaSchema.safeParse({
      ...base,
      ...update,
      sourceTypeWeights: { ...base.sourceTypeWeights, ...update.sourceTypeWeights },
    });

    if (!parsed.success) {
      throw new ConfigurationError(
        'Invalid confirmation criteria',
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      );
    }

    return Object.freeze({
      ...parsed.data,
      sourceTypeWeights: Object.freeze(parsed.data.sourceTypeWeights),
    });
  }

  private calculateFactors(
    candidate: IncidentCandidate,
    assessment: RiskAssessment | undefined,
    historical: readonly HistoricalIncident[] | undefined,
    now: Date,
  ): ConfirmationFactors {
    const parsed = scorableCandidateSchema.safeParse(candidate);
    if (!parsed.success) {
      throw new ScoringError(`Malformed candidate (${issueList(parsed.error)})`);
    }
    if (assessment) {
      const checked = assessmentSchema.safeParse(assessment);
      if (!checked.success) {
        throw new ScoringError(`Malformed assessment (${issueList(checked.error)})`);
      }
    }

    const factors = {
      baseRiskScore: candidate.riskScore,
      confidenceFactor: this.confidenceFactor(candidate.confidenceScore),
      sentimentFactor: this.sentimentFactor(candidate.sentimentScore),
      sourceFactor: this.sourceFactor(candidate),
      keywordFactor: this.keywordFactor(candidate.keywords.length),
      patternFactor: this.patternFactor(candidate, historical, now),
      assessmentFactor: this.assessmentFactor(assessment),
    };

    const weighted =
      factors.baseRiskScore * FACTOR_WEIGHTS.baseRiskScore +
      factors.confidenceFactor * FACTOR_WEIGHTS.confidenceFactor +
      factors.sentimentFactor * FACTOR_WEIGHTS.sentimentFactor +
      factors.sourceFactor * FACTOR_WEIGHTS.sourceFactor +
      factors.keywordFactor * FACTOR_WEIGHTS.keywordFactor +
      factors.patternFactor * FACTOR_WEIGHTS.patternFactor +
      factors.assessmentFactor * FACTOR_WEIGHTS.assessmentFactor;

    // Six decimals strips float noise before the inclusive threshold check
    return { ...factors, finalScore: roundScore(weighted) };
  }

  private confidenceFactor(confidence: number): number {
    if (confidence >= this.criteria.minConfidenceScore) {
      return confidence * 10;
    }
    return confidence * 5;
  }

  private sentimentFactor(sentiment: number): number {
    if (sentiment <= this.criteria.maxNegativeSentiment) {
      return Math.abs(sentiment) * 8;
    }
    if (sentiment < 0) {
      return Math.abs(sentiment) * 5;
    }
    if (sentiment < 0.3) {
      return 3.0;
    }
    return Math.max(1.0, 3.0 - sentiment * 2);
  }

  private sourceFactor(candidate: IncidentCandidate): number {
    let reliability = this.criteria.sourceTypeWeights[candidate.metadata.sourceType] * 10;

    // Corroborated by more than one URL
    if (candidate.sourceUrls.length > 1) {
      reliability *= 1.2;
    }

    return Math.min(10, reliability);
  }

  private keywordFactor(keywordCount: number): number {
    if (keywordCount >= this.criteria.minKeywordMatches) {
      return Math.min(10, keywordCount * 2);
    }
    return keywordCount * 1.5;
  }

  private patternFactor(
    candidate: IncidentCandidate,
    historical: readonly HistoricalIncident[] | undefined,
    now: Date,
  ): number {
    if (!historical || historical.length === 0) {
      return NEUTRAL_FACTOR;
    }

    const cutoff = now.getTime() - this.criteria.recentIncidentWindowHours * HOUR_MS;
    const keywords = lowerSet(candidate.keywords);

    const similar = historical.filter((incident) =>
      incident.createdAt.getTime() >= cutoff &&
      incident.keywords.some((keyword) => keywords.has(keyword.toLowerCase())));

    if (similar.length === 0) {
      return NEUTRAL_FACTOR;
    }

    const averageRisk = similar.reduce((sum, incident) => sum + incident.riskScore, 0) / similar.length;
    return Math.min(10, averageRisk * this.criteria.escalationFactor);
  }

  private assessmentFactor(assessment: RiskAssessment | undefined): number {
    if (!assessment) {
      return NEUTRAL_FACTOR;
    }
    const factor = (assessment.businessImpact * 0.6 + assessment.urgency * 0.4) * assessment.likelihood;
    return Math.min(10, Math.max(0, factor));
  }

  private explain(candidate: IncidentCandidate, factors: ConfirmationFactors, confirmed: boolean): string {
    const score = factors.finalScore.toFixed(1);
    const lines = confirmed
      ? [`THREAT CONFIRMED (Score: ${score}/10)`, '', 'Contributing factors:']
      : [`Threat not confirmed (Score: ${score}/10)`, '', 'Limiting factors:'];

    if (factors.confidenceFactor >= 7) {
      lines.push(`✓ High confidence (${candidate.confidenceScore.toFixed(2)})`);
    } else if (factors.confidenceFactor < 5) {
      lines.push(`⚠ Low confidence (${candidate.confidenceScore.toFixed(2)})`);
    }

    if (factors.sentimentFactor >= 6) {
      lines.push(`✓ Negative sentiment indicates threat (${candidate.sentimentScore.toFixed(2)})`);
    } else if (factors.sentimentFactor < 4) {
      lines.push(`⚠ Positive/neutral sentiment (${candidate.sentimentScore.toFixed(2)})`);
    }

    if (factors.sourceFactor >= 7) {
      lines.push('✓ Reliable source type');
    } else if (factors.sourceFactor < 5) {
      lines.push('⚠ Lower reliability source');
    }

    const reliabilityWeight = candidate.metadata.reliabilityWeight;
    if (reliabilityWeight < this.criteria.minSourceReliability) {
      lines.push(`⚠ Source reliability ${reliabilityWeight.toFixed(2)} below ${this.criteria.minSourceReliability.toFixed(2)}`);
    }

    const keywordCount = candidate.keywords.length;
    if (factors.keywordFactor >= 6) {
      lines.push(`✓ Strong keyword matches (${keywordCount} keywords)`);
    } else if (factors.keywordFactor < 4) {
      lines.push(`⚠ Limited keyword matches (${keywordCount} keywords)`);
    }

    if (factors.patternFactor >= 7) {
      lines.push('✓ Similar recent incidents detected (escalating pattern)');
    } else if (factors.patternFactor < 4) {
      lines.push('⚠ No recent similar incidents');
    }

    lines.push('', `Severity: ${candidate.severity.toUpperCase()}`, `Keywords: ${candidate.keywords.join(', ')}`);

    return lines.join('\n');
  }

  private trackConfirmation(candidate: IncidentCandidate) {
    this.recentConfirmations.push(candidate);
    if (this.recentConfirmations.length > MAX_TRACKED_CONFIRMATIONS) {
      this.recentConfirmations = this.recentConfirmations.slice(-MAX_TRACKED_CONFIRMATIONS);
    }
  }
}
