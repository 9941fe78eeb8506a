import { clamp, riskLevel } from './risk-scorer';
import type { IncidentCandidate, RiskLevel, SeverityLevel } from './types';

const SEVERITY_WEIGHTS: Record<SeverityLevel, number> = {
  critical: 1.0,
  high: 0.8,
  medium: 0.5,
  low: 0.2,
  info: 0.1,
};

const SOURCE_RELIABILITY = new Map<string, number>([
  ['government', 0.9],
  ['news', 0.7],
  ['blog', 0.5],
  ['social', 0.4],
]);
const DEFAULT_SOURCE_RELIABILITY = 0.5;

export interface CandidateAssessment {
  incidentId: string;
  riskScore: number;
  riskCategory: RiskLevel;
  factors: {
    severity: SeverityLevel;
    confidence: number;
    sentiment: number;
    sourceType: string;
  };
}

export interface AssessmentSummary {
  totalIncidents: number;
  riskDistribution: Partial<Record<RiskLevel, number>>;
  averageRisk: number;
  highestRisk: number;
}

/**
 * Quick [0, 1] assessment of a built candidate, used for dashboard rollups.
 * Independent of the confirmation decision.
 */
export class RiskAssessor {
  assess(candidate: IncidentCandidate): number {
    const severity = SEVERITY_WEIGHTS[candidate.severity];
    const sentiment = Math.max(0, 0.5 - candidate.sentimentScore);
    const source = SOURCE_RELIABILITY.get(candidate.metadata.sourceType) ?? DEFAULT_SOURCE_RELIABILITY;

    const score = severity * 0.4 + candidate.confidenceScore * 0.3 + sentiment * 0.2 + source * 0.1;

    return clamp(score, 0, 1);
  }

  categorize(score: number): RiskLevel {
    return riskLevel(score);
  }

  assessBatch(candidates: readonly IncidentCandidate[]): CandidateAssessment[] {
    return candidates.map((candidate) => {
      const riskScore = this.assess(candidate);
      return {
        incidentId: candidate.id,
        riskScore,
        riskCategory: this.categorize(riskScore),
        factors: {
          severity: candidate.severity,
          confidence: candidate.confidenceScore,
          sentiment: candidate.sentimentScore,
          sourceType: candidate.metadata.sourceType,
        },
      };
    });
  }

  summarize(candidates: readonly IncidentCandidate[]): AssessmentSummary {
    if (candidates.length === 0) {
      return { totalIncidents: 0, riskDistribution: {}, averageRisk: 0, highestRisk: 0 };
    }

    const scores = candidates.map((candidate) => this.assess(candidate));
    const riskDistribution: AssessmentSummary['riskDistribution'] = {};
    for (const score of scores) {
      const category = this.categorize(score);
      riskDistribution[category] = (riskDistribution[category] ?? 0) + 1;
    }

    return {
      totalIncidents: candidates.length,
      riskDistribution,
      averageRisk: scores.reduce((sum, score) => sum + score, 0) / scores.length,
      highestRisk: Math.max(...scores),
    };
  }
}
