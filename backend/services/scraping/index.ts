export { ScrapingCoordinator } from './coordinator/scraping-coordinator';
export type {
  ActiveTask,
  CoordinatorStats,
  CoordinatorStatus,
  RunResult,
  ScrapingCoordinatorOptions,
  SourceTypeCounts,
} from './coordinator/scraping-coordinator';
export { WorkerPool, withTimeout, type WorkerPoolStats } from './coordinator/worker-pool';
export { FetchClient, type FetchClientOptions, type FetchClientStats, type FetchImpl, type FetchResult } from './core/fetch-client';
export { TokenBucketRateLimiter } from './core/rate-limiter';
export { StrategyLoader } from './strategies/strategy-loader';
export type { ExtractionResult, ExtractionStrategy } from './strategies/extraction-strategy.interface';
export { NewsStrategy } from './strategies/news-strategy';
export { GovernmentStrategy } from './strategies/government-strategy';
export { SocialStrategy } from './strategies/social-strategy';
export { BlogStrategy } from './strategies/blog-strategy';
export { GenericStrategy } from './strategies/generic-strategy';
export {
  freezeDescriptor,
  parseSourceDescriptor,
  sourceDescriptorSchema,
  validateSource,
  type SourceDescriptorInput,
  type SourceValidationResult,
} from './source-descriptor';
export * from './types';
