import type { CheerioAPI } from 'cheerio';
import type { ErrorLogger } from 'backend/services/error-logging/error-logger';
import { log } from 'backend/utils/log';
import type { FetchClient } from '../core/fetch-client';
import type { AdvisorySeverity, SourceDescriptor } from '../types';
import type { ExtractionResult, ExtractionStrategy } from './extraction-strategy.interface';
import {
  acceptItem,
  collectDescription,
  extractEach,
  extractItemUrl,
  extractTitle,
  fetchDetailBody,
  firstDate,
  selectAll,
  selectorFor,
} from './extraction-helpers';

const MAX_ADVISORIES = 15;
const MIN_TITLE_LENGTH = 5;

const DATE_SELECTORS = ['time', '.date', '.published', '.release-date', '.field-date'];
const DETAIL_SELECTORS = [
  '.field-content',
  '.advisory-content',
  '.alert-content',
  'main .content',
  '.page-content p',
  'article p',
];

const SEVERITY_KEYWORDS: ReadonlyArray<[AdvisorySeverity, readonly string[]]> = [
  ['CRITICAL', ['critical', 'emergency', 'urgent']],
  ['HIGH', ['high', 'important', 'severe']],
  ['MEDIUM', ['medium', 'moderate']],
  ['LOW', ['low', 'minor']],
];

const ADVISORY_ID_PATTERNS = [
  /(CVE-\d{4}-\d+)/i,
  /(CISA-\d{4}-\d+)/i,
  /(AA\d{2}-\d+)/i,
  /(ICS-CERT-\d+)/i,
  /(VU#\d+)/i,
];

const PRODUCT_KEYWORDS = [
  'microsoft', 'windows', 'office', 'exchange',
  'cisco', 'juniper', 'vmware', 'apache',
  'oracle', 'adobe', 'google', 'chrome',
  'firefox', 'safari', 'linux', 'ubuntu',
];

/**
 * Severity from advisory wording, then from a CVSS score, else MEDIUM
 */
export function classifySeverity(text: string): AdvisorySeverity {
  const lowerText = text.toLowerCase();

  for (const [severity, words] of SEVERITY_KEYWORDS) {
    if (words.some((word) => lowerText.includes(word))) {
      return severity;
    }
  }

  const cvssMatch = lowerText.match(/cvss[:\s]*(\d+\.?\d*)/);
  if (cvssMatch) {
    const score = parseFloat(cvssMatch[1]);
    if (score >= 9.0) return 'CRITICAL';
    if (score >= 7.0) return 'HIGH';
    if (score >= 4.0) return 'MEDIUM';
    return 'LOW';
  }

  return 'MEDIUM';
}

export function extractAdvisoryId(title: string, url: string): string {
  const text = `${title} ${url}`;
  for (const pattern of ADVISORY_ID_PATTERNS) {
    const match = text.match(pattern);
    if (match) return match[1];
  }
  return "";
}

export function extractCveIds(text: string): string[] {
  const ids = Array.from(text.matchAll(/CVE-\d{4}-\d+/gi), (match) => match[0]);
  return [...new Set(ids)];
}

export function extractAffectedProducts(description: string): string[] {
  const lowerDescription = description.toLowerCase();
  return PRODUCT_KEYWORDS
    .filter((keyword) => lowerDescription.includes(keyword))
    .map((keyword) => keyword.charAt(0).toUpperCase() + keyword.slice(1));
}

/**
 * Government advisory feeds (CISA, CERTs): teaser rows linking to full advisories
 */
export class GovernmentStrategy implements ExtractionStrategy {
  readonly sourceType = 'government' as const;

  constructor(private readonly logger: ErrorLogger) {}

  async extract(document: CheerioAPI, descriptor: SourceDescriptor, client: FetchClient): Promise<ExtractionResult> {
    const itemSelector = selectorFor(descriptor, 'item', '.c-teaser, .views-row');
    const titleSelector = selectorFor(descriptor, 'title', 'h3 a, h2 a');
    const contentSelector = selectorFor(descriptor, 'content', '.c-teaser__summary, .field-content');
    const linkSelector = selectorFor(descriptor, 'link', 'h3 a, h2 a');

    const containers = selectAll(document.root(), itemSelector, descriptor, 'item');
    log(`[GovernmentStrategy] Found ${containers.length} advisory elements on ${descriptor.name}`, "scraper");

    const result = await extractEach(containers, MAX_ADVISORIES, descriptor, this.logger, async (container) => {
      const title = extractTitle(container, titleSelector, MIN_TITLE_LENGTH, descriptor);
      if (!title) return null;

      const url = extractItemUrl(container, linkSelector, descriptor);
      if (client.hasSeen(url)) return null;

      let body = collectDescription(selectAll(container, contentSelector, descriptor, 'content'), {
        maxParts: 2,
        minLength: 10,
        maxChars: 600,
      });

      if (!body && url !== descriptor.url) {
        body = await fetchDetailBody(
          client,
          url,
          DETAIL_SELECTORS,
          { maxParts: 4, minLength: 15, maxChars: 1000 },
          descriptor,
          this.logger,
        );
      }

      return acceptItem(client, descriptor, {
        title,
        body,
        url,
        metadata: {
          articleType: 'security_advisory',
          advisoryId: extractAdvisoryId(title, url),
          severity: classifySeverity(`${title} ${body}`),
          publishedDate: firstDate(container, DATE_SELECTORS),
          cveIds: extractCveIds(`${title} ${body}`),
          affectedProducts: extractAffectedProducts(body),
        },
      });
    });

    log(`[GovernmentStrategy] Scraped ${result.items.length} advisories from ${descriptor.name}`, "scraper");
    return result;
  }
}
