import { log } from 'backend/utils/log';
import { Mutex } from 'backend/utils/lock';
import { ErrorLogger } from 'backend/services/error-logging/error-logger';
import { InMemoryErrorLoggingStorage } from 'backend/services/error-logging/storage';
import { CoordinatorTaskFailure, toError } from 'backend/services/error-logging/errors';
import { logSourceScrapingError } from 'backend/services/error-logging/scraping-integration';
import { FetchClient, type FetchImpl } from '../core/fetch-client';
import { freezeDescriptor, validateSource, type SourceValidationResult } from '../source-descriptor';
import { StrategyLoader } from '../strategies/strategy-loader';
import type { ContentItem, SourceDescriptor, SourceType } from '../types';
import { WorkerPool, withTimeout, type WorkerPoolStats } from './worker-pool';

export interface ScrapingCoordinatorOptions {
  maxWorkers?: number;
  taskTimeoutMs?: number;
  fetchTimeoutMs?: number;
  fetchImpl?: FetchImpl;
  logger?: ErrorLogger;
  strategies?: StrategyLoader;
  createClient?: (descriptor: SourceDescriptor) => FetchClient;
  now?: () => Date;
}

export type SourceTypeCounts = Partial<Record<SourceType, number>>;

export interface RunResult {
  status: 'completed';
  sourcesCount: number;
  itemsScraped: number;
  successful: number;
  failed: number;
  results: ContentItem[];
  errors: string[];
  failures: CoordinatorTaskFailure[];
  skippedItems: number;
  countsByType: SourceTypeCounts;
  startedAt: Date;
  completedAt: Date;
  message?: string;
}

export interface CoordinatorStats {
  totalSourcesAttempted: number;
  successfulScrapes: number;
  failedScrapes: number;
  totalItemsScraped: number;
  sourcesByType: SourceTypeCounts;
  lastScrapeTime: Date | null;
}

export interface ActiveTask {
  sourceName: string;
  sourceType: SourceType;
  startedAt: Date;
}

export interface CoordinatorStatus {
  status: 'idle' | 'running';
  activeTasks: number;
  pool: WorkerPoolStats;
  stats: CoordinatorStats;
}

interface SourceOutcome {
  items: ContentItem[];
  skipped: number;
}

/**
 * Fans enabled sources out over a bounded worker pool, one task per source.
 * A failing or slow source is counted and reported; it never aborts the run.
 */
export class ScrapingCoordinator {
  private readonly pool: WorkerPool;
  private readonly taskTimeoutMs: number;
  private readonly fetchTimeoutMs: number;
  private readonly fetchImpl?: FetchImpl;
  private readonly logger: ErrorLogger;
  private readonly strategies: StrategyLoader;
  private readonly createClient: (descriptor: SourceDescriptor) => FetchClient;
  private readonly now: () => Date;

  private readonly statsLock = new Mutex();
  private readonly activeTasks = new Map<string, ActiveTask>();
  private stats: CoordinatorStats = {
    totalSourcesAttempted: 0,
    successfulScrapes: 0,
    failedScrapes: 0,
    totalItemsScraped: 0,
    sourcesByType: {},
    lastScrapeTime: null,
  };
  private taskSequence = 0;

  constructor(options: ScrapingCoordinatorOptions = {}) {
    this.pool = new WorkerPool(options.maxWorkers ?? 5);
    this.taskTimeoutMs = options.taskTimeoutMs ?? 120000;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? 30000;
    this.fetchImpl = options.fetchImpl;
    this.logger = options.logger ?? new ErrorLogger(new InMemoryErrorLoggingStorage());
    this.strategies = options.strategies ?? new StrategyLoader(this.logger);
    this.now = options.now ?? (() => new Date());
    this.createClient = options.createClient ?? ((descriptor) => new FetchClient({
      rateLimitPerMinute: descriptor.rateLimitPerMinute,
      identifier: descriptor.name,
      defaultTimeoutMs: this.fetchTimeoutMs,
      fetchImpl: this.fetchImpl,
    }));
  }

  async run(sources: readonly SourceDescriptor[]): Promise<RunResult> {
    const startedAt = this.now();
    log(`[ScrapingCoordinator] Starting scraping for ${sources.length} sources`, "scraper");

    const enabledSources = sources.filter((source) => source.enabled).map(freezeDescriptor);
    log(`[ScrapingCoordinator] Found ${enabledSources.length} enabled sources`, "scraper");

    if (enabledSources.length === 0) {
      return {
        status: 'completed',
        sourcesCount: 0,
        itemsScraped: 0,
        successful: 0,
        failed: 0,
        results: [],
        errors: [],
        failures: [],
        skippedItems: 0,
        countsByType: {},
        startedAt,
        completedAt: this.now(),
        message: 'No enabled sources found',
      };
    }

    const results: ContentItem[] = [];
    const errors: string[] = [];
    const failures: CoordinatorTaskFailure[] = [];
    let successful = 0;
    let failed = 0;
    let skippedItems = 0;

    await Promise.all(enabledSources.map(async (descriptor) => {
      const taskId = `${descriptor.name}_${startedAt.getTime()}_${++this.taskSequence}`;

      try {
        const outcome = await this.pool.enqueue(taskId, () => withTimeout(
          this.scrapeSource(descriptor, taskId),
          this.taskTimeoutMs,
          () => new CoordinatorTaskFailure(descriptor.name, `Source task timed out after ${this.taskTimeoutMs}ms`, { timedOut: true }),
        ));

        await this.statsLock.runExclusive(() => {
          results.push(...outcome.items);
          successful++;
          skippedItems += outcome.skipped;
          this.stats.successfulScrapes++;
          this.stats.totalItemsScraped += outcome.items.length;
        });

        log(`[ScrapingCoordinator] Successfully scraped ${outcome.items.length} items from ${descriptor.name}`, "scraper");
      } catch (error) {
        const cause = toError(error);
        const failure = cause instanceof CoordinatorTaskFailure
          ? cause
          : new CoordinatorTaskFailure(descriptor.name, cause.message, { cause });

        await this.statsLock.runExclusive(() => {
          errors.push(`Failed to scrape ${descriptor.name}: ${cause.message}`);
          failures.push(failure);
          failed++;
          this.stats.failedScrapes++;
        });

        await logSourceScrapingError(
          cause,
          { sourceName: descriptor.name, sourceUrl: descriptor.url },
          { taskId, timedOut: failure.timedOut },
          this.logger,
        );
      }
    }));

    const completedAt = this.now();
    const countsByType: SourceTypeCounts = {};
    for (const descriptor of enabledSources) {
      countsByType[descriptor.type] = (countsByType[descriptor.type] ?? 0) + 1;
    }

    await this.statsLock.runExclusive(() => {
      this.stats.totalSourcesAttempted += enabledSources.length;
      this.stats.lastScrapeTime = completedAt;
      for (const descriptor of enabledSources) {
        this.stats.sourcesByType[descriptor.type] = (this.stats.sourcesByType[descriptor.type] ?? 0) + 1;
      }
    });

    log(`[ScrapingCoordinator] Scraping completed: ${results.length} total items from ${enabledSources.length} sources (${successful} ok, ${failed} failed)`, "scraper");

    return {
      status: 'completed',
      sourcesCount: enabledSources.length,
      itemsScraped: results.length,
      successful,
      failed,
      results,
      errors,
      failures,
      skippedItems,
      countsByType,
      startedAt,
      completedAt,
    };
  }

  /**
   * One source: fetch the listing page, then hand it to the type's strategy.
   * A listing page that cannot be fetched fails the task.
   */
  private async scrapeSource(descriptor: SourceDescriptor, taskId: string): Promise<SourceOutcome> {
    log(`[ScrapingCoordinator] Scraping source: ${descriptor.name} (type: ${descriptor.type})`, "scraper");

    const client = this.createClient(descriptor);
    this.activeTasks.set(taskId, {
      sourceName: descriptor.name,
      sourceType: descriptor.type,
      startedAt: this.now(),
    });

    try {
      const page = await client.fetch(descriptor.url, this.fetchTimeoutMs);
      if (!page.ok) {
        throw page.error;
      }

      const strategy = this.strategies.getStrategy(descriptor.type);
      const { items, skipped } = await strategy.extract(page.document, descriptor, client);

      const clientStats = client.stats();
      log(`[ScrapingCoordinator] ${descriptor.name}: ${clientStats.requests} requests, ${clientStats.failures} failures, ${clientStats.urlsSeen} URLs seen, ${skipped.length} items skipped`, "scraper", 'debug');

      return { items, skipped: skipped.length };
    } finally {
      this.activeTasks.delete(taskId);
    }
  }

  status(): CoordinatorStatus {
    return {
      status: this.activeTasks.size > 0 ? 'running' : 'idle',
      activeTasks: this.activeTasks.size,
      pool: this.pool.getStats(),
      stats: {
        ...this.stats,
        sourcesByType: { ...this.stats.sourcesByType },
      },
    };
  }

  /**
   * Forget in-flight tasks for status reporting. Tasks already running
   * are not interrupted and still report into their run.
   */
  stop(): { status: 'stopped'; stoppedAt: Date } {
    log(`[ScrapingCoordinator] Stopping all scraping operations (${this.activeTasks.size} active)`, "scraper");
    this.activeTasks.clear();
    return { status: 'stopped', stoppedAt: this.now() };
  }

  supportedSourceTypes(): SourceType[] {
    return this.strategies.supportedSourceTypes();
  }

  validateSource(descriptor: unknown): SourceValidationResult {
    return validateSource(descriptor);
  }
}
