import { describe, expect, it } from 'vitest';
import { ErrorLogger } from './error-logger';
import {
  ConfigurationError,
  CoordinatorTaskFailure,
  ExtractionError,
  FetchError,
  ScoringError,
} from './errors';
import { inferErrorType, logArticleScrapingError } from './scraping-integration';
import { InMemoryErrorLoggingStorage } from './storage';

describe('inferErrorType', () => {
  it('maps typed errors directly', () => {
    expect(inferErrorType(new FetchError('timeout', 'https://a.example.com', 'slow'))).toBe('timeout');
    expect(inferErrorType(new FetchError('parse', 'https://a.example.com', 'bad body'))).toBe('parsing');
    expect(inferErrorType(new ExtractionError('Feed', 'title', 'Missing title'))).toBe('extraction');
    expect(inferErrorType(new ScoringError('NaN'))).toBe('scoring');
    expect(inferErrorType(new ConfigurationError('bad'))).toBe('configuration');
    expect(inferErrorType(new CoordinatorTaskFailure('Feed', 'slow', { timedOut: true }))).toBe('timeout');
    expect(inferErrorType(new CoordinatorTaskFailure('Feed', 'boom'))).toBe('task');
  });

  it('falls back to the message', () => {
    expect(inferErrorType(new Error('connect ECONNREFUSED 127.0.0.1:443'))).toBe('network');
    expect(inferErrorType(new Error('Unexpected token in JSON: syntax'))).toBe('parsing');
    expect(inferErrorType(new Error('something odd'))).toBe('unknown');
  });
});

describe('logArticleScrapingError', () => {
  it('records the article url and step', async () => {
    const storage = new InMemoryErrorLoggingStorage();
    const logger = new ErrorLogger(storage);

    await logArticleScrapingError(
      new ExtractionError('Feed', 'title', 'Missing title'),
      { sourceName: 'Feed', sourceUrl: 'https://feed.example.com/' },
      'https://feed.example.com/post',
      'content-extraction',
      undefined,
      logger,
    );

    const [logged] = await storage.getErrorLogs();
    expect(logged).toMatchObject({
      sourceName: 'Feed',
      articleUrl: 'https://feed.example.com/post',
      errorType: 'extraction',
      errorMessage: 'Missing title',
      extractionStep: 'content-extraction',
      retryCount: 0,
    });
  });
});
