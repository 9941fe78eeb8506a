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
  fetchDetailBody,
  firstDate,
  firstText,
  selectAll,
  selectorFor,
} from './extraction-helpers';

const MAX_ARTICLES = 20;
const MIN_TITLE_LENGTH = 10;

const DATE_SELECTORS = ['time', '.date', '.published', '.timestamp', '[datetime]'];
const AUTHOR_SELECTORS = ['.author', '.byline', '.writer', '[rel="author"]'];
const DETAIL_SELECTORS = [
  'div.article-content',
  'div.story-body',
  'div.entry-content',
  'div.post-content',
  'main p',
  'article p',
];

/**
 * News sites: article cards with a headline, a teaser and a link to the story
 */
export class NewsStrategy implements ExtractionStrategy {
  readonly sourceType = 'news' as const;

  constructor(private readonly logger: ErrorLogger) {}

  async extract(document: CheerioAPI, descriptor: SourceDescriptor, client: FetchClient): Promise<ExtractionResult> {
    const itemSelector = selectorFor(descriptor, 'item', 'article');
    const titleSelector = selectorFor(descriptor, 'title', 'h1, h2, h3');
    const contentSelector = selectorFor(descriptor, 'content', 'p');
    const linkSelector = selectorFor(descriptor, 'link', 'a');

    const containers = selectAll(document.root(), itemSelector, descriptor, 'item');
    log(`[NewsStrategy] Found ${containers.length} article elements on ${descriptor.name}`, "scraper");

    const result = await extractEach(containers, MAX_ARTICLES, descriptor, this.logger, async (container) => {
      const title = extractTitle(container, titleSelector, MIN_TITLE_LENGTH, descriptor);
      if (!title) return null;

      const url = extractItemUrl(container, linkSelector, descriptor);
      if (client.hasSeen(url)) return null;

      let body = collectDescription(selectAll(container, contentSelector, descriptor, 'content'), {
        maxParts: 3,
        minLength: 20,
        maxChars: 500,
      });

      if (!body && url !== descriptor.url) {
        body = await fetchDetailBody(
          client,
          url,
          [descriptor.fieldSelectors.content ?? '', ...DETAIL_SELECTORS],
          { maxParts: 5, minLength: 20, maxChars: 800 },
          descriptor,
          this.logger,
        );
      }

      return acceptItem(client, descriptor, {
        title,
        body,
        url,
        metadata: {
          articleType: 'news',
          author: firstText(container, AUTHOR_SELECTORS),
          publishedDate: firstDate(container, DATE_SELECTORS),
        },
      });
    });

    log(`[NewsStrategy] Scraped ${result.items.length} articles from ${descriptor.name}`, "scraper");
    return result;
  }
}
