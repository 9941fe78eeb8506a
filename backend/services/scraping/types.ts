/**
 * Shared types and interfaces for the scraping system
 */

export const SOURCE_TYPES = ['news', 'government', 'social', 'blog', 'other'] as const;

export type SourceType = (typeof SOURCE_TYPES)[number];

/**
 * Selector overrides a source may carry. Missing keys fall back to the
 * defaults of the source type's extraction strategy.
 */
export interface FieldSelectors {
  item?: string;
  title?: string;
  content?: string;
  link?: string;
}

export interface SourceDescriptor {
  readonly name: string;
  readonly type: SourceType;
  readonly url: string;
  readonly keywords: readonly string[];
  readonly fieldSelectors: Readonly<FieldSelectors>;
  readonly rateLimitPerMinute: number;
  readonly reliabilityWeight: number;
  readonly enabled: boolean;
  readonly category?: string;
}

export type AdvisorySeverity = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW';

export interface NewsMetadata {
  articleType: 'news';
  author: string;
  publishedDate: string;
}

export interface AdvisoryMetadata {
  articleType: 'security_advisory';
  advisoryId: string;
  severity: AdvisorySeverity;
  publishedDate: string;
  cveIds: string[];
  affectedProducts: string[];
}

export interface RedditPostMetadata {
  articleType: 'reddit_post';
  platform: 'reddit';
  subreddit: string;
  upvotes: number;
  commentsCount: number;
  engagementScore: number;
}

export interface TweetMetadata {
  articleType: 'tweet';
  platform: 'twitter';
  characterCount: number;
}

export interface ForumPostMetadata {
  articleType: 'forum_post';
  platform: 'forum';
}

export interface BlogMetadata {
  articleType: 'blog_post';
  author: string;
  publishedDate: string;
  tags: string[];
  category: string;
  wordCount: number;
}

export interface GenericMetadata {
  articleType: 'generic';
}

export type ContentMetadata =
  | NewsMetadata
  | AdvisoryMetadata
  | RedditPostMetadata
  | TweetMetadata
  | ForumPostMetadata
  | BlogMetadata
  | GenericMetadata;

export interface ContentItem {
  readonly title: string;
  readonly body: string;
  readonly url: string;
  readonly sourceName: string;
  readonly sourceType: SourceType;
  readonly matchedKeywords: readonly string[];
  readonly extractedAt: Date;
  readonly reliabilityWeight: number;
  readonly metadata: Readonly<ContentMetadata>;
}
