import { describe, expect, it, vi } from 'vitest';
import { FetchClient, type FetchImpl } from './fetch-client';
import { UserAgentRotator, generateHeaders } from './request-headers';

function htmlResponse(body: string, init: ResponseInit = {}): Response {
  return new Response(body, { status: 200, headers: { 'Content-Type': 'text/html' }, ...init });
}

describe('FetchClient', () => {
  it('returns the parsed document for a 2xx response', async () => {
    const fetchImpl = vi.fn<FetchImpl>(async () => htmlResponse('<html><body><h1>Advisory feed</h1></body></html>'));
    const client = new FetchClient({ rateLimitPerMinute: 6000, fetchImpl });

    const result = await client.fetch('https://feeds.example.com/advisories');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.status).toBe(200);
      expect(result.url).toBe('https://feeds.example.com/advisories');
      expect(result.document('h1').text()).toBe('Advisory feed');
    }
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('classifies a non-2xx status as a network error carrying the status', async () => {
    const client = new FetchClient({
      rateLimitPerMinute: 6000,
      fetchImpl: async () => htmlResponse('down', { status: 503, statusText: 'Service Unavailable' }),
    });

    const result = await client.fetch('https://feeds.example.com/advisories');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('network');
      expect(result.error.status).toBe(503);
      expect(result.error.message).toBe('HTTP 503 Service Unavailable');
      expect(result.error.url).toBe('https://feeds.example.com/advisories');
    }
  });

  it('classifies a transport failure as a network error', async () => {
    const client = new FetchClient({
      rateLimitPerMinute: 6000,
      fetchImpl: async () => {
        throw new TypeError('fetch failed');
      },
    });

    const result = await client.fetch('https://feeds.example.com/advisories');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('network');
      expect(result.error.message).toBe('Request failed: fetch failed');
    }
  });

  it('aborts a slow request and classifies it as a timeout', async () => {
    const fetchImpl: FetchImpl = (_url, init) => new Promise((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
    });
    const client = new FetchClient({ rateLimitPerMinute: 6000, fetchImpl });

    const result = await client.fetch('https://slow.example.com/', 10);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('timeout');
      expect(result.error.message).toBe('Request timed out after 10ms');
    }
  });

  it('classifies an unreadable body as a parse error', async () => {
    class UnreadableResponse extends Response {
      override async text(): Promise<string> {
        throw new Error('body stream already read');
      }
    }
    const client = new FetchClient({
      rateLimitPerMinute: 6000,
      fetchImpl: async () => new UnreadableResponse('<p>ignored</p>', { status: 200 }),
    });

    const result = await client.fetch('https://feeds.example.com/broken');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('parse');
      expect(result.error.message).toBe('Failed to read response body: body stream already read');
    }
  });

  it('rotates the user agent on every request', async () => {
    const agents: Array<string | null> = [];
    const client = new FetchClient({
      rateLimitPerMinute: 6000,
      userAgents: new UserAgentRotator(['agent-a', 'agent-b']),
      fetchImpl: async (_url, init) => {
        agents.push(new Headers(init?.headers).get('User-Agent'));
        return htmlResponse('<p>ok</p>');
      },
    });

    await client.fetch('https://a.example.com/');
    await client.fetch('https://a.example.com/');
    await client.fetch('https://a.example.com/');

    expect(agents).toEqual(['agent-a', 'agent-b', 'agent-a']);
  });

  it('tracks seen URLs and request counters per instance', async () => {
    let calls = 0;
    const client = new FetchClient({
      rateLimitPerMinute: 120,
      identifier: 'Example Feed',
      fetchImpl: async () => (++calls === 1 ? htmlResponse('<p>ok</p>') : htmlResponse('', { status: 404 })),
    });
    const other = new FetchClient({ rateLimitPerMinute: 120, fetchImpl: async () => htmlResponse('') });

    await client.fetch('https://a.example.com/one');
    await client.fetch('https://a.example.com/two');
    client.markSeen('https://a.example.com/one');

    expect(client.hasSeen('https://a.example.com/one')).toBe(true);
    expect(client.hasSeen('https://a.example.com/two')).toBe(false);
    expect(other.hasSeen('https://a.example.com/one')).toBe(false);
    expect(client.stats()).toEqual({
      identifier: 'Example Feed',
      requests: 2,
      failures: 1,
      urlsSeen: 1,
      rateLimitPerMinute: 120,
    });
  });
});

describe('generateHeaders', () => {
  it('lets custom headers override the browser defaults', () => {
    const headers = generateHeaders('agent-a', { 'Accept-Language': 'de-DE' });

    expect(headers['User-Agent']).toBe('agent-a');
    expect(headers['Accept-Language']).toBe('de-DE');
    expect(headers.DNT).toBe('1');
  });
});
