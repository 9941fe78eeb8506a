const USER_AGENTS = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 14_2) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15",
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36 Edg/120.0.0.0",
] as const;

/**
 * Round-robin over a fixed set of browser identities.
 * Each FetchClient owns its own rotator.
 */
export class UserAgentRotator {
  private index: number;

  constructor(private readonly agents: readonly string[] = USER_AGENTS, start = 0) {
    if (agents.length === 0) {
      throw new RangeError("UserAgentRotator needs at least one user agent");
    }
    this.index = start % agents.length;
  }

  next(): string {
    const agent = this.agents[this.index];
    this.index = (this.index + 1) % this.agents.length;
    return agent;
  }
}

/**
 * Browser-like request headers for a listing or article page
 */
export function generateHeaders(
  userAgent: string,
  customHeaders?: Record<string, string>,
): Record<string, string> {
  const defaultHeaders: Record<string, string> = {
    "User-Agent": userAgent,
    Accept:
      "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    "Accept-Language": "en-US,en;q=0.5",
    "Accept-Encoding": "gzip, deflate",
    "Upgrade-Insecure-Requests": "1",
    DNT: "1",
  };

  return customHeaders
    ? { ...defaultHeaders, ...customHeaders }
    : defaultHeaders;
}
