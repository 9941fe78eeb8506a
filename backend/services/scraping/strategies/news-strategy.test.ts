import { beforeEach, describe, expect, it, vi } from 'vitest';
import * as cheerio from 'cheerio';
import { ErrorLogger } from 'backend/services/error-logging/error-logger';
import { ExtractionError } from 'backend/services/error-logging/errors';
import { InMemoryErrorLoggingStorage } from 'backend/services/error-logging/storage';
import { FetchClient, type FetchImpl } from '../core/fetch-client';
import { parseSourceDescriptor, type SourceDescriptorInput } from '../source-descriptor';
import { NewsStrategy } from './news-strategy';

function newsSource(overrides: Partial<SourceDescriptorInput> = {}) {
  return parseSourceDescriptor({
    name: 'Example News',
    type: 'news',
    url: 'https://news.example.com/security',
    keywords: ['ransomware'],
    rateLimitPerMinute: 6000,
    ...overrides,
  });
}

function fakeSite(pages: Record<string, string>) {
  const fetchImpl = vi.fn<FetchImpl>(async (url) => {
    const page = pages[url];
    return page === undefined ? new Response('', { status: 404 }) : new Response(page);
  });
  return { fetchImpl, client: new FetchClient({ rateLimitPerMinute: 6000, fetchImpl }) };
}

const LISTING = `
<html><body>
  <article>
    <h2><a href="/2024/05/ransomware-hits-hospital">Ransomware hits regional hospital network</a></h2>
    <p>Attackers encrypted patient systems across three facilities on Monday morning.</p>
    <span class="author">Jane Reporter</span>
    <time datetime="2024-05-06T08:00:00Z">May 6</time>
  </article>
  <article>
    <h2><a href="https://other.example.com/story">Local bakery wins award</a></h2>
    <p>The bakery on Main Street took home first prize for its sourdough loaf.</p>
  </article>
  <article><h2>Short</h2></article>
  <article><p>No headline here at all in this container.</p></article>
</body></html>`;

describe('NewsStrategy', () => {
  let storage: InMemoryErrorLoggingStorage;
  let strategy: NewsStrategy;

  beforeEach(() => {
    storage = new InMemoryErrorLoggingStorage();
    strategy = new NewsStrategy(new ErrorLogger(storage));
  });

  it('extracts matching articles with news metadata', async () => {
    const { client, fetchImpl } = fakeSite({});

    const { items } = await strategy.extract(cheerio.load(LISTING), newsSource(), client);

    expect(items).toHaveLength(1);
    expect(items[0]).toMatchObject({
      title: 'Ransomware hits regional hospital network',
      body: 'Attackers encrypted patient systems across three facilities on Monday morning.',
      url: 'https://news.example.com/2024/05/ransomware-hits-hospital',
      sourceName: 'Example News',
      sourceType: 'news',
      matchedKeywords: ['ransomware'],
      reliabilityWeight: 0.5,
      metadata: {
        articleType: 'news',
        author: 'Jane Reporter',
        publishedDate: '2024-05-06T08:00:00Z',
      },
    });
    expect(Object.isFrozen(items[0])).toBe(true);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('marks accepted URLs as seen and leaves filtered ones alone', async () => {
    const { client } = fakeSite({});

    await strategy.extract(cheerio.load(LISTING), newsSource(), client);

    expect(client.hasSeen('https://news.example.com/2024/05/ransomware-hits-hospital')).toBe(true);
    expect(client.hasSeen('https://other.example.com/story')).toBe(false);
  });

  it('records a container without a headline as skipped and keeps going', async () => {
    const { client } = fakeSite({});

    const { items, skipped } = await strategy.extract(cheerio.load(LISTING), newsSource(), client);

    expect(items).toHaveLength(1);
    expect(skipped).toHaveLength(1);
    expect(skipped[0]).toBeInstanceOf(ExtractionError);
    expect(skipped[0].field).toBe('title');
    expect(skipped[0].message).toBe('No element matched title selector "h1, h2, h3"');

    const logs = await storage.getErrorLogs();
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({
      sourceName: 'Example News',
      errorType: 'extraction',
      extractionStep: 'content-extraction',
    });
  });

  it('follows the item link when the listing has no excerpt', async () => {
    const listing = `<article><h3><a href="/story/zero-day">Zero-day exploited in VPN appliances</a></h3></article>`;
    const { client, fetchImpl } = fakeSite({
      'https://news.example.com/story/zero-day':
        '<html><body><div class="article-content">Vendors confirmed active exploitation of the flaw in edge devices.</div></body></html>',
    });

    const { items } = await strategy.extract(cheerio.load(listing), newsSource({ keywords: [] }), client);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0][0]).toBe('https://news.example.com/story/zero-day');
    expect(items).toHaveLength(1);
    expect(items[0].body).toBe('Vendors confirmed active exploitation of the flaw in edge devices.');
  });

  it('keeps the item with an empty body when the detail page fails', async () => {
    const listing = `<article><h3><a href="/story/gone">Breach disclosure page removed</a></h3></article>`;
    const { client } = fakeSite({});

    const { items, skipped } = await strategy.extract(cheerio.load(listing), newsSource({ keywords: [] }), client);

    expect(skipped).toEqual([]);
    expect(items).toHaveLength(1);
    expect(items[0].body).toBe('');

    const logs = await storage.getErrorLogs();
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({
      errorType: 'network',
      extractionStep: 'article-scraping',
      articleUrl: 'https://news.example.com/story/gone',
    });
  });

  it('skips an article whose URL was already seen', async () => {
    const listing = `
      <article><h2><a href="/a">Ransomware gang leaks stolen data</a></h2><p>The group published archives on its leak site overnight.</p></article>
      <article><h2><a href="/a">Ransomware gang leaks stolen data again</a></h2><p>A second copy of the same story, syndicated elsewhere.</p></article>`;
    const { client } = fakeSite({});

    const { items } = await strategy.extract(cheerio.load(listing), newsSource(), client);

    expect(items.map((item) => item.title)).toEqual(['Ransomware gang leaks stolen data']);
  });

  it('uses the selectors configured on the source', async () => {
    const listing = `
      <div class="story">
        <span class="headline">Phishing campaign impersonates payroll provider</span>
        <div class="teaser">Employees received convincing emails asking them to confirm bank details.</div>
        <a class="share" href="https://social.example.com/share">share</a>
        <a class="more" href="/phishing-payroll">Read more</a>
      </div>`;
    const { client } = fakeSite({});
    const source = newsSource({
      keywords: ['phishing'],
      fieldSelectors: { item: '.story', title: '.headline', content: '.teaser', link: 'a.more' },
    });

    const { items } = await strategy.extract(cheerio.load(listing), source, client);

    expect(items).toHaveLength(1);
    expect(items[0].url).toBe('https://news.example.com/phishing-payroll');
    expect(items[0].body).toBe('Employees received convincing emails asking them to confirm bank details.');
  });

  it('rejects an item selector the engine cannot parse', async () => {
    const { client } = fakeSite({});

    await expect(
      strategy.extract(cheerio.load(LISTING), newsSource({ fieldSelectors: { item: 'div[' } }), client),
    ).rejects.toBeInstanceOf(ExtractionError);
  });
});
