import { describe, expect, it } from 'vitest';
import * as cheerio from 'cheerio';
import { ErrorLogger } from 'backend/services/error-logging/error-logger';
import { InMemoryErrorLoggingStorage } from 'backend/services/error-logging/storage';
import { FetchClient } from '../core/fetch-client';
import { parseSourceDescriptor } from '../source-descriptor';
import { BlogStrategy } from './blog-strategy';
import { GenericStrategy } from './generic-strategy';
import { GovernmentStrategy } from './government-strategy';
import { NewsStrategy } from './news-strategy';
import { SocialStrategy } from './social-strategy';
import { StrategyLoader } from './strategy-loader';

describe('StrategyLoader', () => {
  const loader = new StrategyLoader(new ErrorLogger(new InMemoryErrorLoggingStorage()));

  it('maps each source type to its strategy', () => {
    expect(loader.getStrategy('news')).toBeInstanceOf(NewsStrategy);
    expect(loader.getStrategy('government')).toBeInstanceOf(GovernmentStrategy);
    expect(loader.getStrategy('social')).toBeInstanceOf(SocialStrategy);
    expect(loader.getStrategy('blog')).toBeInstanceOf(BlogStrategy);
    expect(loader.getStrategy('other')).toBeInstanceOf(GenericStrategy);
  });

  it('falls back to the generic strategy for unknown types', () => {
    expect(loader.getStrategy('podcast')).toBeInstanceOf(GenericStrategy);
  });

  it('lists the supported source types', () => {
    expect(loader.supportedSourceTypes()).toEqual(['news', 'government', 'social', 'blog', 'other']);
  });
});

describe('GenericStrategy', () => {
  it('reads titled items from the listing page only', async () => {
    const html = `
      <div class="item">
        <h4><a href="/botnet-takedown">Botnet takedown announced</a></h4>
        <p class="summary">Law enforcement seized command servers this week.</p>
      </div>
      <div class="item"><h4>Tiny</h4></div>`;
    const source = parseSourceDescriptor({
      name: 'Example Portal',
      type: 'other',
      url: 'https://portal.example.net/feed',
      rateLimitPerMinute: 6000,
    });
    const client = new FetchClient({ rateLimitPerMinute: 6000, fetchImpl: async () => new Response('', { status: 404 }) });
    const strategy = new GenericStrategy(new ErrorLogger(new InMemoryErrorLoggingStorage()));

    const { items, skipped } = await strategy.extract(cheerio.load(html), source, client);

    expect(skipped).toEqual([]);
    expect(items).toHaveLength(1);
    expect(items[0]).toMatchObject({
      title: 'Botnet takedown announced',
      body: 'Law enforcement seized command servers this week.',
      url: 'https://portal.example.net/botnet-takedown',
      sourceType: 'other',
      metadata: { articleType: 'generic' },
    });
    expect(client.stats().requests).toBe(0);
  });
});
