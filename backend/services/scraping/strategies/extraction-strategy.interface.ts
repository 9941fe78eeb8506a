import type { CheerioAPI } from 'cheerio';
import type { ExtractionError } from 'backend/services/error-logging/errors';
import type { FetchClient } from '../core/fetch-client';
import type { ContentItem, SourceDescriptor, SourceType } from '../types';

export interface ExtractionResult {
  items: ContentItem[];
  // Items dropped because a required field or selector failed
  skipped: ExtractionError[];
}

/**
 * Turns a fetched listing page into content items for one source type.
 * The client is used for detail-page follow-ups and the seen-URL set.
 */
export interface ExtractionStrategy {
  readonly sourceType: SourceType;
  extract(document: CheerioAPI, descriptor: SourceDescriptor, client: FetchClient): Promise<ExtractionResult>;
}
