import { v4 as uuidv4 } from 'uuid';
import type { ContentItem } from 'backend/services/scraping/types';
import { EntityExtractor } from './entity-extractor';
import { RiskScorer, clamp } from './risk-scorer';
import { SentimentScorer } from './sentiment-scorer';
import type { IncidentCandidate, RiskLevel, SeverityLevel } from './types';

const DESCRIPTION_MAX_CHARS = 1000;

const LEVEL_TO_SEVERITY: Record<RiskLevel, SeverityLevel> = {
  critical: 'critical',
  high: 'high',
  medium: 'medium',
  low: 'low',
  minimal: 'info',
};

const ADVISORY_SEVERITY: Record<'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW', SeverityLevel> = {
  CRITICAL: 'critical',
  HIGH: 'high',
  MEDIUM: 'medium',
  LOW: 'low',
};

export interface CandidateBuilderOptions {
  entityExtractor?: EntityExtractor;
  sentimentScorer?: SentimentScorer;
  riskScorer?: RiskScorer;
  now?: () => Date;
  generateId?: () => string;
}

/**
 * Keywords carried by the item, then monitoring keywords found in its text.
 * Case-insensitive, first spelling wins.
 */
export function matchKeywords(item: ContentItem, monitoringKeywords: readonly string[]): string[] {
  const text = `${item.title} ${item.body}`.toLowerCase();
  const seen = new Set<string>();
  const matched: string[] = [];

  const candidates = [
    ...item.matchedKeywords,
    ...monitoringKeywords.filter((keyword) => text.includes(keyword.toLowerCase())),
  ];
  for (const keyword of candidates) {
    const key = keyword.toLowerCase();
    if (key && !seen.has(key)) {
      seen.add(key);
      matched.push(keyword);
    }
  }

  return matched;
}

/**
 * Content quality confidence: 0.5 base, +0.3 for a highly reliable source,
 * +0.1 past 500 and again past 1000 body characters, -0.2 for social posts.
 */
export function estimateConfidence(item: ContentItem): number {
  let confidence = 0.5;

  if (item.reliabilityWeight >= 0.9) confidence += 0.3;
  if (item.body.length > 500) confidence += 0.1;
  if (item.body.length > 1000) confidence += 0.1;
  if (item.sourceType === 'social') confidence -= 0.2;

  return clamp(Math.round(confidence * 100) / 100, 0, 1);
}

/**
 * Turns a scraped content item into a scored incident candidate.
 */
export class CandidateBuilder {
  private readonly entities: EntityExtractor;
  private readonly sentiment: SentimentScorer;
  private readonly risk: RiskScorer;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: CandidateBuilderOptions = {}) {
    this.entities = options.entityExtractor ?? new EntityExtractor();
    this.sentiment = options.sentimentScorer ?? new SentimentScorer();
    this.risk = options.riskScorer ?? new RiskScorer();
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? uuidv4;
  }

  /**
   * Returns null for items with an empty title or body, or with no matched keyword.
   */
  build(item: ContentItem, monitoringKeywords: readonly string[] = []): IncidentCandidate | null {
    const title = item.title.trim();
    const body = item.body.trim();
    if (!title || !body) {
      return null;
    }

    const keywords = matchKeywords(item, monitoringKeywords);
    if (keywords.length === 0) {
      return null;
    }

    const text = `${title} ${body}`;
    const sentimentScore = this.sentiment.score(text);
    const confidenceScore = estimateConfidence(item);
    const severity = this.severityFor(item, confidenceScore, sentimentScore);
    const riskScore = clamp(this.risk.score(severity, confidenceScore, sentimentScore, item.sourceType) * 10, 0, 10);

    const candidate: IncidentCandidate = {
      id: this.generateId(),
      title,
      description: body.slice(0, DESCRIPTION_MAX_CHARS),
      keywords: Object.freeze(keywords),
      severity,
      confidenceScore,
      riskScore,
      sentimentScore,
      sourceUrls: Object.freeze([item.url]),
      entities: Object.freeze(this.entities.validate(this.entities.extract(text))),
      createdAt: this.now(),
      metadata: Object.freeze({
        sourceType: item.sourceType,
        sourceName: item.sourceName,
        scrapedAt: item.extractedAt.toISOString(),
        contentLength: body.length,
        reliabilityWeight: item.reliabilityWeight,
      }),
    };

    return Object.freeze(candidate);
  }

  // Advisory pages carry their own severity; everything else is derived
  // from a preliminary medium-severity score.
  private severityFor(item: ContentItem, confidence: number, sentiment: number): SeverityLevel {
    if (item.metadata.articleType === 'security_advisory') {
      return ADVISORY_SEVERITY[item.metadata.severity];
    }

    const preliminary = this.risk.score('medium', confidence, sentiment, item.sourceType);
    return LEVEL_TO_SEVERITY[this.risk.level(preliminary)];
  }
}
