/**
 * Keyword-density sentiment heuristic. Counts how many distinct negative
 * keywords occur in the text and maps the count onto four fixed bands.
 * It carries no linguistic model: negation, irony and context are ignored.
 */

const NEGATIVE_KEYWORDS = [
  'threat', 'attack', 'breach', 'hack', 'malware', 'virus',
  'exploit', 'vulnerability', 'compromise', 'incident',
  'dangerous', 'critical', 'severe', 'emergency',
];

export const SENTIMENT_BANDS = [0.1, -0.3, -0.6, -0.9] as const;
export type SentimentScore = (typeof SENTIMENT_BANDS)[number];

export interface SentimentSummary {
  label: 'positive' | 'neutral' | 'negative';
  confidence: 'high' | 'medium' | 'low';
  score: number;
}

export class SentimentScorer {
  /** Number of distinct negative keywords found as substrings. */
  countNegativeKeywords(text: string): number {
    const lowered = text.toLowerCase();
    return NEGATIVE_KEYWORDS.filter((keyword) => lowered.includes(keyword)).length;
  }

  score(text: string): SentimentScore {
    const count = this.countNegativeKeywords(text);

    if (count === 0) return 0.1;
    if (count <= 2) return -0.3;
    if (count <= 4) return -0.6;
    return -0.9;
  }

  scoreBatch(texts: readonly string[]): SentimentScore[] {
    return texts.map((text) => this.score(text));
  }

  summarize(score: number): SentimentSummary {
    if (score >= 0.5) return { label: 'positive', confidence: 'high', score };
    if (score >= 0.1) return { label: 'positive', confidence: 'low', score };
    if (score >= -0.1) return { label: 'neutral', confidence: 'medium', score };
    if (score >= -0.5) return { label: 'negative', confidence: 'low', score };
    return { label: 'negative', confidence: 'high', score };
  }
}
