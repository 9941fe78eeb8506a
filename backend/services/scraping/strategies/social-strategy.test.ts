import { describe, expect, it } from 'vitest';
import * as cheerio from 'cheerio';
import { ErrorLogger } from 'backend/services/error-logging/error-logger';
import { InMemoryErrorLoggingStorage } from 'backend/services/error-logging/storage';
import { FetchClient } from '../core/fetch-client';
import { parseSourceDescriptor } from '../source-descriptor';
import { SocialStrategy, detectPlatform, extractSubreddit } from './social-strategy';

function socialSource(url: string, keywords: string[]) {
  return parseSourceDescriptor({ name: 'Example Social', type: 'social', url, keywords, rateLimitPerMinute: 6000 });
}

function newClient() {
  return new FetchClient({ rateLimitPerMinute: 6000, fetchImpl: async () => new Response('', { status: 404 }) });
}

const strategy = new SocialStrategy(new ErrorLogger(new InMemoryErrorLoggingStorage()));

describe('SocialStrategy', () => {
  it('reads Reddit posts with engagement metadata', async () => {
    const html = `
      <div data-testid="post-container">
        <h3>New exploit chain for mail servers</h3>
        <div data-testid="post-content">Proof of concept released today.</div>
        <a href="/r/netsec/comments/abc123/new_exploit_chain/">comments</a>
        <span class="score">345 points</span>
        <span class="comment-count">12 comments</span>
      </div>
      <div data-testid="post-container">
        <h3>Weekly career thread</h3>
        <a href="/r/netsec/comments/def456/weekly/">comments</a>
      </div>`;
    const client = newClient();

    const { items } = await strategy.extract(cheerio.load(html), socialSource('https://www.reddit.com/r/netsec/', ['exploit']), client);

    expect(items).toHaveLength(1);
    expect(items[0]).toMatchObject({
      title: 'New exploit chain for mail servers',
      body: 'Proof of concept released today.',
      url: 'https://www.reddit.com/r/netsec/comments/abc123/new_exploit_chain/',
      metadata: {
        articleType: 'reddit_post',
        platform: 'reddit',
        subreddit: 'netsec',
        upvotes: 345,
        commentsCount: 12,
        engagementScore: 369,
      },
    });
    expect(client.hasSeen(items[0].url)).toBe(true);
  });

  it('reads tweets against the source URL without tracking it', async () => {
    const text = 'New ransomware strain spotted targeting hypervisors at scale, samples shared with vendors for analysis and detection work.';
    const html = `
      <article data-testid="tweet"><div data-testid="tweetText">${text}</div></article>
      <article data-testid="tweet"><div data-testid="tweetText">gm</div></article>`;
    const client = newClient();

    const { items } = await strategy.extract(cheerio.load(html), socialSource('https://x.com/someresearcher', ['ransomware']), client);

    expect(items).toHaveLength(1);
    expect(items[0].title).toBe(`${text.slice(0, 100)}...`);
    expect(items[0].body).toBe(text);
    expect(items[0].url).toBe('https://x.com/someresearcher');
    expect(items[0].metadata).toEqual({ articleType: 'tweet', platform: 'twitter', characterCount: text.length });
    expect(client.hasSeen('https://x.com/someresearcher')).toBe(false);
  });

  it('reads generic forum threads', async () => {
    const html = `
      <div class="thread">
        <h2><a href="/t/credential-dump">Credential dump shared</a></h2>
        <p class="message">A large credential dump was posted overnight.</p>
      </div>`;

    const { items } = await strategy.extract(cheerio.load(html), socialSource('https://forum.example.org/security', []), newClient());

    expect(items).toHaveLength(1);
    expect(items[0]).toMatchObject({
      title: 'Credential dump shared',
      body: 'A large credential dump was posted overnight.',
      url: 'https://forum.example.org/t/credential-dump',
      metadata: { articleType: 'forum_post', platform: 'forum' },
    });
  });

  it('caps X timelines at five posts', async () => {
    const tweets = Array.from({ length: 8 }, (_, index) =>
      `<article data-testid="tweet"><div data-testid="tweetText">Phishing kit sighting number ${index + 1}</div></article>`).join('');

    const { items } = await strategy.extract(cheerio.load(tweets), socialSource('https://twitter.com/feed', []), newClient());

    expect(items.map((item) => item.body)).toEqual([
      'Phishing kit sighting number 1',
      'Phishing kit sighting number 2',
      'Phishing kit sighting number 3',
      'Phishing kit sighting number 4',
      'Phishing kit sighting number 5',
    ]);
  });
});

describe('detectPlatform', () => {
  it('picks the platform from the source host', () => {
    expect(detectPlatform('https://old.reddit.com/r/malware')).toBe('reddit');
    expect(detectPlatform('https://twitter.com/someone')).toBe('twitter');
    expect(detectPlatform('https://x.com/someone')).toBe('twitter');
    expect(detectPlatform('https://inbox.com/threads')).toBe('forum');
    expect(detectPlatform('not a url')).toBe('forum');
  });
});

describe('extractSubreddit', () => {
  it('reads the subreddit from a post URL', () => {
    expect(extractSubreddit('https://www.reddit.com/r/cybersecurity/comments/x1/title/')).toBe('cybersecurity');
    expect(extractSubreddit('https://www.reddit.com/')).toBe('');
  });
});
