import { beforeEach, describe, expect, it } from 'vitest';
import { ErrorLogger } from 'backend/services/error-logging/error-logger';
import { CoordinatorTaskFailure } from 'backend/services/error-logging/errors';
import { InMemoryErrorLoggingStorage } from 'backend/services/error-logging/storage';
import type { FetchImpl } from '../core/fetch-client';
import { parseSourceDescriptor } from '../source-descriptor';
import type { ExtractionStrategy } from '../strategies/extraction-strategy.interface';
import { StrategyLoader } from '../strategies/strategy-loader';
import { ScrapingCoordinator } from './scraping-coordinator';

const RUN_TIME = new Date('2024-05-01T12:00:00Z');

const NEWS_PAGE = `
<html><body>
  <article>
    <h2><a href="/breach">Data breach exposes customer records</a></h2>
    <p>The retailer confirmed that attackers accessed its order database last week.</p>
  </article>
</body></html>`;

const workingSource = parseSourceDescriptor({ name: 'Working Feed', type: 'news', url: 'https://news.example.com/' });
const brokenSource = parseSourceDescriptor({ name: 'Broken Feed', type: 'news', url: 'https://broken.example.com/' });

const fetchImpl: FetchImpl = async (url) => {
  if (url.startsWith('https://broken.example.com')) {
    throw new TypeError('fetch failed');
  }
  return new Response(NEWS_PAGE);
};

describe('ScrapingCoordinator', () => {
  let storage: InMemoryErrorLoggingStorage;
  let logger: ErrorLogger;

  beforeEach(() => {
    storage = new InMemoryErrorLoggingStorage();
    logger = new ErrorLogger(storage);
  });

  it('isolates a failing source and keeps the items of the working one', async () => {
    const coordinator = new ScrapingCoordinator({ fetchImpl, logger, now: () => RUN_TIME });

    const result = await coordinator.run([brokenSource, workingSource]);

    expect(result.status).toBe('completed');
    expect(result.sourcesCount).toBe(2);
    expect(result.successful).toBe(1);
    expect(result.failed).toBe(1);
    expect(result.itemsScraped).toBe(1);
    expect(result.results.map((item) => item.url)).toEqual(['https://news.example.com/breach']);
    expect(result.errors).toEqual(['Failed to scrape Broken Feed: Request failed: fetch failed']);
    expect(result.failures[0]).toBeInstanceOf(CoordinatorTaskFailure);
    expect(result.failures[0].sourceName).toBe('Broken Feed');
    expect(result.countsByType).toEqual({ news: 2 });

    const logs = await storage.getErrorLogs();
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({
      sourceName: 'Broken Feed',
      errorType: 'network',
      extractionStep: 'source-scraping',
    });
  });

  it('accumulates counters across runs', async () => {
    const coordinator = new ScrapingCoordinator({ fetchImpl, logger, now: () => RUN_TIME });

    await coordinator.run([brokenSource, workingSource]);
    await coordinator.run([workingSource]);

    expect(coordinator.status()).toMatchObject({
      status: 'idle',
      activeTasks: 0,
      stats: {
        totalSourcesAttempted: 3,
        successfulScrapes: 2,
        failedScrapes: 1,
        totalItemsScraped: 2,
        sourcesByType: { news: 3 },
        lastScrapeTime: RUN_TIME,
      },
    });
  });

  it('returns an empty completed result when nothing is enabled', async () => {
    const coordinator = new ScrapingCoordinator({ fetchImpl, logger });
    const disabled = parseSourceDescriptor({ name: 'Off', type: 'blog', url: 'https://off.example.com/', enabled: false });

    const result = await coordinator.run([disabled]);

    expect(result).toMatchObject({
      status: 'completed',
      sourcesCount: 0,
      itemsScraped: 0,
      successful: 0,
      failed: 0,
      results: [],
      errors: [],
      message: 'No enabled sources found',
    });
    expect(coordinator.status().stats.totalSourcesAttempted).toBe(0);
  });

  it('counts an exception thrown by a strategy as a task failure', async () => {
    class ExplodingLoader extends StrategyLoader {
      override getStrategy(): ExtractionStrategy {
        return {
          sourceType: 'news',
          extract: async () => {
            throw new Error('unexpected markup');
          },
        };
      }
    }
    const coordinator = new ScrapingCoordinator({ fetchImpl, logger, strategies: new ExplodingLoader(logger) });

    const result = await coordinator.run([workingSource]);

    expect(result.successful).toBe(0);
    expect(result.failed).toBe(1);
    expect(result.errors).toEqual(['Failed to scrape Working Feed: unexpected markup']);
    expect(result.failures[0].timedOut).toBe(false);
  });

  it('fails a source task that outlives its timeout', async () => {
    const slowFetch: FetchImpl = () => new Promise((resolve) => {
      setTimeout(() => resolve(new Response('<html></html>')), 200);
    });
    const slowSource = parseSourceDescriptor({ name: 'Slow Feed', type: 'news', url: 'https://slow.example.com/' });
    const coordinator = new ScrapingCoordinator({ fetchImpl: slowFetch, logger, taskTimeoutMs: 20 });

    const result = await coordinator.run([slowSource]);

    expect(result.failed).toBe(1);
    expect(result.errors).toEqual(['Failed to scrape Slow Feed: Source task timed out after 20ms']);
    expect(result.failures[0].timedOut).toBe(true);

    const logs = await storage.getErrorLogs();
    expect(logs[0].errorType).toBe('timeout');
  });

  it('runs no more sources at once than the pool width', async () => {
    let inFlight = 0;
    let peak = 0;
    const countingFetch: FetchImpl = async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 10));
      inFlight--;
      return new Response('<html><body></body></html>');
    };
    const sources = ['a', 'b', 'c', 'd'].map((name) =>
      parseSourceDescriptor({ name: `Feed ${name}`, type: 'blog', url: `https://${name}.example.com/` }));
    const coordinator = new ScrapingCoordinator({ fetchImpl: countingFetch, logger, maxWorkers: 2 });

    const result = await coordinator.run(sources);

    expect(result.successful).toBe(4);
    expect(peak).toBe(2);
  });

  it('stop() clears task bookkeeping without cancelling the run', async () => {
    const coordinator = new ScrapingCoordinator({ fetchImpl, logger, now: () => RUN_TIME });

    const pending = coordinator.run([workingSource]);
    expect(coordinator.status().status).toBe('running');

    expect(coordinator.stop()).toEqual({ status: 'stopped', stoppedAt: RUN_TIME });
    expect(coordinator.status()).toMatchObject({ status: 'idle', activeTasks: 0 });

    const result = await pending;
    expect(result.successful).toBe(1);
    expect(result.itemsScraped).toBe(1);
  });

  it('exposes supported types and descriptor validation', () => {
    const coordinator = new ScrapingCoordinator({ logger });

    expect(coordinator.supportedSourceTypes()).toEqual(['news', 'government', 'social', 'blog', 'other']);
    expect(coordinator.validateSource({ name: 'Feed', type: 'podcast', url: 'ftp://feed.example.com' })).toEqual({
      valid: false,
      errors: ['Unsupported source type: podcast', 'url: URL must start with http:// or https://'],
      warnings: [],
    });
    expect(coordinator.validateSource({ name: 'Feed', type: 'news', url: 'https://feed.example.com' })).toEqual({
      valid: true,
      errors: [],
      warnings: ['No keywords specified - will scrape all content'],
    });
  });
});
