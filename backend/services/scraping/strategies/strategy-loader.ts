import type { ErrorLogger } from 'backend/services/error-logging/error-logger';
import { log } from 'backend/utils/log';
import type { SourceType } from '../types';
import type { ExtractionStrategy } from './extraction-strategy.interface';
import { NewsStrategy } from './news-strategy';
import { GovernmentStrategy } from './government-strategy';
import { SocialStrategy } from './social-strategy';
import { BlogStrategy } from './blog-strategy';
import { GenericStrategy } from './generic-strategy';

/**
 * Source type → extraction strategy lookup. Unknown types get the generic strategy.
 */
export class StrategyLoader {
  private readonly strategies: Map<string, ExtractionStrategy>;
  private readonly fallback: ExtractionStrategy;

  constructor(logger: ErrorLogger) {
    this.fallback = new GenericStrategy(logger);
    this.strategies = new Map<string, ExtractionStrategy>([
      ['news', new NewsStrategy(logger)],
      ['government', new GovernmentStrategy(logger)],
      ['social', new SocialStrategy(logger)],
      ['blog', new BlogStrategy(logger)],
      ['other', this.fallback],
    ]);
  }

  getStrategy(sourceType: string): ExtractionStrategy {
    const strategy = this.strategies.get(sourceType);
    if (strategy) return strategy;

    log(`[StrategyLoader] No strategy for source type "${sourceType}", using generic`, "scraper", 'warn');
    return this.fallback;
  }

  supportedSourceTypes(): SourceType[] {
    return Array.from(this.strategies.values(), (strategy) => strategy.sourceType);
  }
}
