import type { CheerioAPI } from 'cheerio';
import type { ErrorLogger } from 'backend/services/error-logging/error-logger';
import { log } from 'backend/utils/log';
import type { FetchClient } from '../core/fetch-client';
import type { SourceDescriptor } from '../types';
import type { ExtractionResult, ExtractionStrategy } from './extraction-strategy.interface';
import {
  acceptItem,
  collectDescription,
  extractEach,
  extractItemUrl,
  extractTitle,
  selectAll,
  selectorFor,
} from './extraction-helpers';

/**
 * Fallback for source types without a dedicated strategy. Reads the
 * listing page only; item links are never followed.
 */
export class GenericStrategy implements ExtractionStrategy {
  readonly sourceType = 'other' as const;

  constructor(private readonly logger: ErrorLogger) {}

  async extract(document: CheerioAPI, descriptor: SourceDescriptor, client: FetchClient): Promise<ExtractionResult> {
    const itemSelector = selectorFor(descriptor, 'item', 'article, .post, .item, .entry');
    const titleSelector = selectorFor(descriptor, 'title', 'h1, h2, h3, h4, .title');
    const contentSelector = selectorFor(descriptor, 'content', 'p, .summary, .description');
    const linkSelector = selectorFor(descriptor, 'link', 'a');

    const containers = selectAll(document.root(), itemSelector, descriptor, 'item');

    const result = await extractEach(containers, 15, descriptor, this.logger, async (container) => {
      const title = extractTitle(container, titleSelector, 8, descriptor);
      if (!title) return null;

      const url = extractItemUrl(container, linkSelector, descriptor);
      if (client.hasSeen(url)) return null;

      const body = collectDescription(selectAll(container, contentSelector, descriptor, 'content'), {
        maxParts: 3,
        minLength: 20,
        maxChars: 500,
      });

      return acceptItem(client, descriptor, {
        title,
        body,
        url,
        metadata: { articleType: 'generic' },
      });
    });

    log(`[GenericStrategy] Scraped ${result.items.length} items from ${descriptor.name}`, "scraper");
    return result;
  }
}
