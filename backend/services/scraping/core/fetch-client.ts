import * as cheerio from 'cheerio';
import { log } from "backend/utils/log";
import { FetchError } from "backend/services/error-logging/errors";
import { TokenBucketRateLimiter } from "./rate-limiter";
import { UserAgentRotator, generateHeaders } from "./request-headers";

export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchClientOptions {
  rateLimitPerMinute: number;
  identifier?: string;
  defaultTimeoutMs?: number;
  customHeaders?: Record<string, string>;
  fetchImpl?: FetchImpl;
  rateLimiter?: TokenBucketRateLimiter;
  userAgents?: UserAgentRotator;
}

export type FetchResult =
  | { ok: true; url: string; status: number; html: string; document: cheerio.CheerioAPI }
  | { ok: false; error: FetchError };

export interface FetchClientStats {
  identifier: string;
  requests: number;
  failures: number;
  urlsSeen: number;
  rateLimitPerMinute: number;
}

/**
 * Rate-limited fetch + parse for one source. Every failure comes back as a
 * classified FetchError; nothing is thrown to the caller.
 */
export class FetchClient {
  private readonly identifier: string;
  private readonly rateLimitPerMinute: number;
  private readonly defaultTimeoutMs: number;
  private readonly customHeaders?: Record<string, string>;
  private readonly fetchImpl: FetchImpl;
  private readonly rateLimiter: TokenBucketRateLimiter;
  private readonly userAgents: UserAgentRotator;

  private readonly seenUrls = new Set<string>();
  private requests = 0;
  private failures = 0;

  constructor(options: FetchClientOptions) {
    this.identifier = options.identifier ?? 'source';
    this.rateLimitPerMinute = options.rateLimitPerMinute;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 30000;
    this.customHeaders = options.customHeaders;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.rateLimiter = options.rateLimiter ?? new TokenBucketRateLimiter({
      requestsPerMinute: options.rateLimitPerMinute,
      identifier: this.identifier,
    });
    this.userAgents = options.userAgents ?? new UserAgentRotator();
  }

  hasSeen(url: string): boolean {
    return this.seenUrls.has(url);
  }

  markSeen(url: string) {
    this.seenUrls.add(url);
  }

  async fetch(url: string, timeoutMs: number = this.defaultTimeoutMs): Promise<FetchResult> {
    await this.rateLimiter.acquire();
    this.requests++;

    log(`[FetchClient] Fetching: ${url}`, "scraper", 'debug');

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          headers: generateHeaders(this.userAgents.next(), this.customHeaders),
          signal: controller.signal,
          redirect: "follow",
        });
      } catch (error) {
        const kind = controller.signal.aborted ? 'timeout' : 'network';
        return this.fail(new FetchError(
          kind,
          url,
          kind === 'timeout'
            ? `Request timed out after ${timeoutMs}ms`
            : `Request failed: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error },
        ));
      }

      if (!response.ok) {
        return this.fail(new FetchError(
          'network',
          url,
          `HTTP ${response.status} ${response.statusText}`.trim(),
          { status: response.status },
        ));
      }

      let html: string;
      try {
        html = await response.text();
      } catch (error) {
        const kind = controller.signal.aborted ? 'timeout' : 'parse';
        return this.fail(new FetchError(kind, url, `Failed to read response body: ${error instanceof Error ? error.message : String(error)}`, {
          status: response.status,
          cause: error,
        }));
      }

      try {
        const document = cheerio.load(html);
        return { ok: true, url, status: response.status, html, document };
      } catch (error) {
        return this.fail(new FetchError('parse', url, `Failed to parse HTML: ${error instanceof Error ? error.message : String(error)}`, {
          status: response.status,
          cause: error,
        }));
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private fail(error: FetchError): FetchResult {
    this.failures++;
    log(`[FetchClient] Failed to fetch ${error.url} (${error.kind}): ${error.message}`, "scraper", 'warn');
    return { ok: false, error };
  }

  stats(): FetchClientStats {
    return {
      identifier: this.identifier,
      requests: this.requests,
      failures: this.failures,
      urlsSeen: this.seenUrls.size,
      rateLimitPerMinute: this.rateLimitPerMinute,
    };
  }
}
