import type { Cheerio } from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import { ExtractionError, toError } from 'backend/services/error-logging/errors';
import type { ErrorLogger } from 'backend/services/error-logging/error-logger';
import { logArticleScrapingError } from 'backend/services/error-logging/scraping-integration';
import { extractText, joinAndTruncate } from '../extractors/content-extraction/content-cleaner';
import { resolveItemUrl } from '../extractors/link-extraction/url-normalizer';
import type { FetchClient } from '../core/fetch-client';
import type { ContentItem, ContentMetadata, FieldSelectors, SourceDescriptor } from '../types';
import type { ExtractionResult } from './extraction-strategy.interface';

export type Selection = Cheerio<Element>;

export interface TextLimits {
  maxParts: number;   // elements read, in document order
  minLength: number;  // parts of this length or shorter are dropped
  maxChars: number;
}

export interface ItemFields {
  title: string;
  body: string;
  url: string;
  metadata: ContentMetadata;
}

export function selectorFor(descriptor: SourceDescriptor, field: keyof FieldSelectors, fallback: string): string {
  return descriptor.fieldSelectors[field] ?? fallback;
}

/**
 * Descendants of `scope` matching `selector`. A selector the engine cannot
 * parse becomes an ExtractionError for the field it was meant to fill.
 */
export function selectAll<T extends AnyNode>(
  scope: Cheerio<T>,
  selector: string,
  descriptor: SourceDescriptor,
  field: string,
): Selection {
  try {
    return scope.find(selector);
  } catch (error) {
    throw new ExtractionError(descriptor.name, field, `Invalid ${field} selector "${selector}": ${toError(error).message}`);
  }
}

/**
 * Text of the first `maxParts` matches that is longer than `minLength`
 */
export function collectTexts(selection: Selection, maxParts: number, minLength: number): string[] {
  const parts: string[] = [];
  const count = Math.min(selection.length, maxParts);
  for (let index = 0; index < count; index++) {
    const text = extractText(selection.eq(index));
    if (text && text.length > minLength) {
      parts.push(text);
    }
  }
  return parts;
}

export function collectDescription(selection: Selection, limits: TextLimits): string {
  return joinAndTruncate(collectTexts(selection, limits.maxParts, limits.minLength), limits.maxChars);
}

/**
 * First non-empty text among a list of fallback selectors
 */
export function firstText(container: Selection, selectors: readonly string[]): string {
  for (const selector of selectors) {
    const text = extractText(container.find(selector).first());
    if (text) return text;
  }
  return "";
}

/**
 * Like firstText, but a `datetime` attribute wins over the element text
 */
export function firstDate(container: Selection, selectors: readonly string[]): string {
  for (const selector of selectors) {
    const element = container.find(selector).first();
    if (element.length === 0) continue;

    const datetime = element.attr('datetime');
    if (datetime) return datetime;

    const text = extractText(element);
    if (text) return text;
  }
  return "";
}

/**
 * Title text of the container. Missing element is an extraction error,
 * a short title is not: it returns null and the item is silently dropped.
 */
export function extractTitle(
  container: Selection,
  selector: string,
  minLength: number,
  descriptor: SourceDescriptor,
): string | null {
  const element = selectAll(container, selector, descriptor, 'title').first();
  if (element.length === 0) {
    throw new ExtractionError(descriptor.name, 'title', `No element matched title selector "${selector}"`);
  }

  const title = extractText(element);
  return title.length >= minLength ? title : null;
}

export function extractItemUrl(container: Selection, selector: string, descriptor: SourceDescriptor): string {
  const href = selectAll(container, selector, descriptor, 'link').first().attr('href');
  return resolveItemUrl(href, descriptor.url);
}

export function keywordMatches(keywords: readonly string[], text: string): string[] {
  const lowerText = text.toLowerCase();
  return keywords.filter((keyword) => lowerText.includes(keyword.toLowerCase()));
}

/**
 * Case-insensitive substring filter. A source without keywords matches everything.
 */
export function matchesKeywords(keywords: readonly string[], text: string): boolean {
  return keywords.length === 0 || keywordMatches(keywords, text).length > 0;
}

export function createContentItem(
  descriptor: SourceDescriptor,
  fields: ItemFields,
  extractedAt: Date = new Date(),
): ContentItem {
  const title = fields.title.trim();
  const body = fields.body.trim();

  return Object.freeze({
    title,
    body,
    url: fields.url,
    sourceName: descriptor.name,
    sourceType: descriptor.type,
    matchedKeywords: Object.freeze(keywordMatches(descriptor.keywords, `${title} ${body}`)),
    extractedAt,
    reliabilityWeight: descriptor.reliabilityWeight,
    metadata: Object.freeze(fields.metadata),
  });
}

/**
 * Keyword filter, then record the URL as seen and build the item
 */
export function acceptItem(
  client: FetchClient,
  descriptor: SourceDescriptor,
  fields: ItemFields,
  options: { trackUrl?: boolean } = {},
): ContentItem | null {
  if (!matchesKeywords(descriptor.keywords, `${fields.title} ${fields.body}`)) {
    return null;
  }

  if (options.trackUrl ?? true) {
    client.markSeen(fields.url);
  }
  return createContentItem(descriptor, fields);
}

/**
 * Follow an item link and read its body from the first selector that
 * yields text. A failed fetch is logged and reads as an empty body.
 */
export async function fetchDetailBody(
  client: FetchClient,
  url: string,
  selectors: readonly string[],
  limits: TextLimits,
  descriptor: SourceDescriptor,
  logger: ErrorLogger,
): Promise<string> {
  const result = await client.fetch(url);
  if (!result.ok) {
    await logArticleScrapingError(
      result.error,
      { sourceName: descriptor.name, sourceUrl: descriptor.url },
      url,
      'article-scraping',
      { status: result.error.status },
      logger,
    );
    return "";
  }

  const root = result.document.root();
  for (const selector of selectors) {
    if (!selector) continue;

    const parts = collectTexts(selectAll(root, selector, descriptor, 'content'), limits.maxParts, limits.minLength);
    if (parts.length > 0) {
      return joinAndTruncate(parts, limits.maxChars);
    }
  }

  return "";
}

/**
 * Run `handler` over the first `limit` containers in document order.
 * A throwing item is recorded in `skipped` and the loop moves on.
 */
export async function extractEach(
  containers: Selection,
  limit: number,
  descriptor: SourceDescriptor,
  logger: ErrorLogger,
  handler: (container: Selection) => Promise<ContentItem | null>,
): Promise<ExtractionResult> {
  const items: ContentItem[] = [];
  const skipped: ExtractionError[] = [];
  const count = Math.min(containers.length, limit);

  for (let index = 0; index < count; index++) {
    try {
      const item = await handler(containers.eq(index));
      if (item) items.push(item);
    } catch (error) {
      const extractionError = error instanceof ExtractionError
        ? error
        : new ExtractionError(descriptor.name, 'item', toError(error).message);
      skipped.push(extractionError);

      await logArticleScrapingError(
        extractionError,
        { sourceName: descriptor.name, sourceUrl: descriptor.url },
        extractionError.itemUrl,
        'content-extraction',
        { field: extractionError.field, index },
        logger,
      );
    }
  }

  return { items, skipped };
}
