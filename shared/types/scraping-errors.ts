// Error log entries recorded while scraping and analysing sources

export type ErrorType =
  | 'network'
  | 'timeout'
  | 'parsing'
  | 'extraction'
  | 'scoring'
  | 'task'
  | 'configuration'
  | 'unknown';

export type ExtractionStep =
  | 'source-scraping'
  | 'article-scraping'
  | 'content-extraction'
  | 'analysis';

export interface ScrapingErrorLog {
  id: string;
  sourceName?: string;
  sourceUrl: string;
  articleUrl?: string;
  errorType: ErrorType;
  errorMessage: string;
  errorDetails: Record<string, unknown>;
  extractionStep: ExtractionStep;
  retryCount: number;
  timestamp: Date;
}

export type InsertScrapingErrorLog = Omit<ScrapingErrorLog, 'id' | 'timestamp'>;
