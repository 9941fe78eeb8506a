import type { CheerioAPI } from 'cheerio';
import type { ErrorLogger } from 'backend/services/error-logging/error-logger';
import { log } from 'backend/utils/log';
import { extractText } from '../extractors/content-extraction/content-cleaner';
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
  type Selection,
} from './extraction-helpers';

export type SocialPlatform = 'reddit' | 'twitter' | 'forum';

const UPVOTE_SELECTORS = ['[data-testid="upvote-button"]', '.upvotes', '.score'];
const COMMENT_SELECTORS = ['[data-testid="comment-button"]', '.comments', '.comment-count'];

export function detectPlatform(url: string): SocialPlatform {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return 'forum';
  }

  const onDomain = (domain: string) => host === domain || host.endsWith(`.${domain}`);
  if (onDomain('reddit.com')) return 'reddit';
  if (onDomain('twitter.com') || onDomain('x.com')) return 'twitter';
  return 'forum';
}

/**
 * First integer in the text of the first selector that has one
 */
function firstCount(container: Selection, selectors: readonly string[]): number {
  for (const selector of selectors) {
    const element = container.find(selector).first();
    if (element.length === 0) continue;

    const digits = extractText(element).match(/\d+/);
    if (digits) return parseInt(digits[0], 10);
  }
  return 0;
}

export function extractSubreddit(url: string): string {
  const match = url.match(/\/r\/([^/]+)/);
  return match ? match[1] : "";
}

/**
 * Reddit listings, X timelines and generic forums. The platform is
 * picked from the source URL.
 */
export class SocialStrategy implements ExtractionStrategy {
  readonly sourceType = 'social' as const;

  constructor(private readonly logger: ErrorLogger) {}

  async extract(document: CheerioAPI, descriptor: SourceDescriptor, client: FetchClient): Promise<ExtractionResult> {
    const platform = detectPlatform(descriptor.url);

    let result: ExtractionResult;
    switch (platform) {
      case 'reddit':
        result = await this.extractReddit(document, descriptor, client);
        break;
      case 'twitter':
        result = await this.extractTweets(document, descriptor, client);
        break;
      default:
        result = await this.extractForum(document, descriptor, client);
    }

    log(`[SocialStrategy] Scraped ${result.items.length} ${platform} posts from ${descriptor.name}`, "scraper");
    return result;
  }

  private extractReddit(document: CheerioAPI, descriptor: SourceDescriptor, client: FetchClient): Promise<ExtractionResult> {
    const itemSelector = selectorFor(descriptor, 'item', '[data-testid="post-container"]');
    const titleSelector = selectorFor(descriptor, 'title', 'h3');
    const contentSelector = selectorFor(descriptor, 'content', '[data-testid="post-content"]');
    const linkSelector = selectorFor(descriptor, 'link', 'a[href*="/comments/"]');

    const containers = selectAll(document.root(), itemSelector, descriptor, 'item');
    log(`[SocialStrategy] Found ${containers.length} Reddit post elements`, "scraper");

    return extractEach(containers, 10, descriptor, this.logger, async (container) => {
      const title = extractTitle(container, titleSelector, 5, descriptor);
      if (!title) return null;

      const body = extractText(selectAll(container, contentSelector, descriptor, 'content').first()).slice(0, 500);

      const url = extractItemUrl(container, linkSelector, descriptor);
      if (client.hasSeen(url)) return null;

      const upvotes = firstCount(container, UPVOTE_SELECTORS);
      const commentsCount = firstCount(container, COMMENT_SELECTORS);

      return acceptItem(client, descriptor, {
        title,
        body,
        url,
        metadata: {
          articleType: 'reddit_post',
          platform: 'reddit',
          subreddit: extractSubreddit(url),
          upvotes,
          commentsCount,
          engagementScore: upvotes + commentsCount * 2,
        },
      });
    });
  }

  private extractTweets(document: CheerioAPI, descriptor: SourceDescriptor, client: FetchClient): Promise<ExtractionResult> {
    const itemSelector = selectorFor(descriptor, 'item', '[data-testid="tweet"]');
    const textSelector = selectorFor(descriptor, 'content', '[data-testid="tweetText"]');

    const containers = selectAll(document.root(), itemSelector, descriptor, 'item');
    log(`[SocialStrategy] Found ${containers.length} tweet elements`, "scraper");

    // Tweets carry no permalink in the listing, so every item points at the
    // source URL and the seen-set is left alone.
    return extractEach(containers, 5, descriptor, this.logger, async (container) => {
      const text = extractTitle(container, textSelector, 10, descriptor);
      if (!text) return null;

      return acceptItem(client, descriptor, {
        title: text.length > 100 ? `${text.slice(0, 100)}...` : text,
        body: text,
        url: descriptor.url,
        metadata: {
          articleType: 'tweet',
          platform: 'twitter',
          characterCount: text.length,
        },
      }, { trackUrl: false });
    });
  }

  private extractForum(document: CheerioAPI, descriptor: SourceDescriptor, client: FetchClient): Promise<ExtractionResult> {
    const itemSelector = selectorFor(descriptor, 'item', '.post, .topic, .thread');
    const titleSelector = selectorFor(descriptor, 'title', 'h2, h3, .title');
    const contentSelector = selectorFor(descriptor, 'content', '.content, .message, p');
    const linkSelector = selectorFor(descriptor, 'link', 'a');

    const containers = selectAll(document.root(), itemSelector, descriptor, 'item');
    log(`[SocialStrategy] Found ${containers.length} forum post elements`, "scraper");

    return extractEach(containers, 15, descriptor, this.logger, async (container) => {
      const title = extractTitle(container, titleSelector, 5, descriptor);
      if (!title) return null;

      const body = collectDescription(selectAll(container, contentSelector, descriptor, 'content'), {
        maxParts: 2,
        minLength: 10,
        maxChars: 400,
      });

      const url = extractItemUrl(container, linkSelector, descriptor);
      if (client.hasSeen(url)) return null;

      return acceptItem(client, descriptor, {
        title,
        body,
        url,
        metadata: { articleType: 'forum_post', platform: 'forum' },
      });
    });
  }
}
