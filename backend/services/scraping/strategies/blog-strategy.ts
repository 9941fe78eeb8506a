import type { CheerioAPI } from 'cheerio';
import type { ErrorLogger } from 'backend/services/error-logging/error-logger';
import { log } from 'backend/utils/log';
import { countWords, extractText } from '../extractors/content-extraction/content-cleaner';
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
  type Selection,
} from './extraction-helpers';

const DATE_SELECTORS = ['time', '.date', '.published', '.post-date', '.entry-date', '.meta-date'];
const AUTHOR_SELECTORS = ['.author', '.byline', '.post-author', '.entry-author', '[rel="author"]'];
const TAG_SELECTORS = ['.tags a', '.post-tags a', '.entry-tags a', '.tag-links a'];
const CATEGORY_SELECTORS = ['.category', '.post-category', '.entry-category', '.cat-links a'];
const DETAIL_SELECTORS = ['.entry-content', '.post-content', '.article-content', '.content', 'main p', 'article p'];

function extractTags(container: Selection): string[] {
  const tags: string[] = [];
  for (const selector of TAG_SELECTORS) {
    const elements = container.find(selector);
    for (let index = 0; index < elements.length; index++) {
      const tag = extractText(elements.eq(index));
      if (tag.length > 1 && !tags.includes(tag)) {
        tags.push(tag);
      }
    }
  }
  return tags;
}

/**
 * Security blogs and vendor research pages
 */
export class BlogStrategy implements ExtractionStrategy {
  readonly sourceType = 'blog' as const;

  constructor(private readonly logger: ErrorLogger) {}

  async extract(document: CheerioAPI, descriptor: SourceDescriptor, client: FetchClient): Promise<ExtractionResult> {
    const itemSelector = selectorFor(descriptor, 'item', 'article, .post, .entry');
    const titleSelector = selectorFor(descriptor, 'title', 'h1, h2, h3, .title');
    const contentSelector = selectorFor(descriptor, 'content', '.content, .excerpt, p');
    const linkSelector = selectorFor(descriptor, 'link', 'a');

    const containers = selectAll(document.root(), itemSelector, descriptor, 'item');
    log(`[BlogStrategy] Found ${containers.length} blog article elements on ${descriptor.name}`, "scraper");

    const result = await extractEach(containers, 15, descriptor, this.logger, async (container) => {
      const title = extractTitle(container, titleSelector, 10, descriptor);
      if (!title) return null;

      const url = extractItemUrl(container, linkSelector, descriptor);
      if (client.hasSeen(url)) return null;

      let body = collectDescription(selectAll(container, contentSelector, descriptor, 'content'), {
        maxParts: 3,
        minLength: 20,
        maxChars: 600,
      });

      if (!body && url !== descriptor.url) {
        body = await fetchDetailBody(
          client,
          url,
          DETAIL_SELECTORS,
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
          articleType: 'blog_post',
          author: firstText(container, AUTHOR_SELECTORS),
          publishedDate: firstDate(container, DATE_SELECTORS),
          tags: extractTags(container),
          category: firstText(container, CATEGORY_SELECTORS),
          wordCount: countWords(body),
        },
      });
    });

    log(`[BlogStrategy] Scraped ${result.items.length} articles from ${descriptor.name}`, "scraper");
    return result;
  }
}
