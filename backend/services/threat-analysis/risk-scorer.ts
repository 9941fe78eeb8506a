import { z } from 'zod';
import { ScoringError } from 'backend/services/error-logging/errors';
import { log } from 'backend/utils/log';
import type { RiskFactors, RiskLevel } from './types';

export interface RiskWeights {
  severity: number;
  confidence: number;
  sentiment: number;
  sourceReliability: number;
}

export type WeightUpdateResult =
  | { updated: true; weights: Readonly<RiskWeights> }
  | { updated: false; reason: string; weights: Readonly<RiskWeights> };

export interface ScoredRisk {
  riskScore: number;
  riskLevel: RiskLevel;
  components: RiskFactors;
}

export const DEFAULT_RISK_WEIGHTS: Readonly<RiskWeights> = Object.freeze({
  severity: 0.35,
  confidence: 0.25,
  sentiment: 0.2,
  sourceReliability: 0.2,
});

const WEIGHT_SUM_TOLERANCE = 0.01;

const SEVERITY_SCORES = new Map<string, number>([
  ['critical', 1.0],
  ['high', 0.8],
  ['medium', 0.5],
  ['low', 0.2],
  ['info', 0.1],
]);
const UNKNOWN_SEVERITY_SCORE = 0.5;

const SOURCE_SCORES = new Map<string, number>([
  ['government', 0.9],
  ['news', 0.7],
  ['blog', 0.5],
  ['social', 0.4],
  ['other', 0.3],
]);
const UNKNOWN_SOURCE_SCORE = 0.3;

const weightsSchema = z.object({
  severity: z.number().nonnegative(),
  confidence: z.number().nonnegative(),
  sentiment: z.number().nonnegative(),
  sourceReliability: z.number().nonnegative(),
});

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function riskLevel(score: number): RiskLevel {
  if (score >= 0.8) return 'critical';
  if (score >= 0.6) return 'high';
  if (score >= 0.4) return 'medium';
  if (score >= 0.2) return 'low';
  return 'minimal';
}

function requireFinite(name: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw new ScoringError(`${name} must be a finite number, got ${value}`);
  }
  return value;
}

/**
 * Weighted risk on [0, 1] from severity, confidence, sentiment and source type.
 * Negative sentiment raises the score.
 */
export class RiskScorer {
  private weights: Readonly<RiskWeights> = DEFAULT_RISK_WEIGHTS;

  getWeights(): Readonly<RiskWeights> {
    return this.weights;
  }

  score(severity: string, confidence: number, sentiment: number, sourceType = 'unknown'): number {
    const severityComponent = SEVERITY_SCORES.get(severity.toLowerCase()) ?? UNKNOWN_SEVERITY_SCORE;
    const confidenceComponent = requireFinite('confidence', confidence);
    const sentimentComponent = Math.max(0, (1 - requireFinite('sentiment', sentiment)) / 2);
    const sourceComponent = SOURCE_SCORES.get(sourceType.toLowerCase()) ?? UNKNOWN_SOURCE_SCORE;

    const score =
      severityComponent * this.weights.severity +
      confidenceComponent * this.weights.confidence +
      sentimentComponent * this.weights.sentiment +
      sourceComponent * this.weights.sourceReliability;

    return clamp(score, 0, 1);
  }

  level(score: number): RiskLevel {
    return riskLevel(score);
  }

  scoreBatch(inputs: readonly Partial<RiskFactors>[]): ScoredRisk[] {
    return inputs.map((input) => {
      const components: RiskFactors = {
        severity: input.severity ?? 'medium',
        confidence: input.confidence ?? 0.5,
        sentiment: input.sentiment ?? 0,
        sourceType: input.sourceType ?? 'unknown',
      };
      const riskScore = this.score(components.severity, components.confidence, components.sentiment, components.sourceType);

      return { riskScore, riskLevel: riskLevel(riskScore), components };
    });
  }

  /**
   * Merge new weights over the current ones. The merge is applied only when
   * every weight is non-negative and they sum to 1.0 (within 0.01).
   */
  updateWeights(update: Partial<RiskWeights>): WeightUpdateResult {
    const parsed = weightsSchema.safeParse({ ...this.weights, ...update });

    if (!parsed.success) {
      const reason = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      log(`Rejected risk weights: ${reason}`, 'threat-analysis', 'warn');
      return { updated: false, reason, weights: this.weights };
    }

    const merged = parsed.data;
    const total = merged.severity + merged.confidence + merged.sentiment + merged.sourceReliability;
    if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
      const reason = `Weights sum to ${Number(total.toFixed(4))}, not 1.0`;
      log(`Rejected risk weights: ${reason}`, 'threat-analysis', 'warn');
      return { updated: false, reason, weights: this.weights };
    }

    this.weights = Object.freeze(merged);
    log(`Updated risk weights: ${JSON.stringify(this.weights)}`, 'threat-analysis');
    return { updated: true, weights: this.weights };
  }
}
