import { ENTITY_KINDS, IOC_KINDS, type EntityBag, type EntityKind, type EntitySummary } from './types';

type PatternKind = Exclude<EntityKind, 'threat_keywords' | 'organizations'>;

// Applied case-insensitively
const ENTITY_PATTERNS: Record<PatternKind, RegExp> = {
  ip_addresses: /\b(?:[0-9]{1,3}\.){3}[0-9]{1,3}\b/gi,
  domains: /\b[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*\.[a-zA-Z]{2,}\b/gi,
  urls: /https?:\/\/[^\s<>"{}|\\^`[\]]+/gi,
  email_addresses: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}\b/gi,
  file_hashes: /\b[a-fA-F0-9]{32,64}\b/gi,
  cve_ids: /CVE-\d{4}-\d{4,7}/gi,
  bitcoin_addresses: /\b[13][a-km-zA-HJ-NP-Z1-9]{25,34}\b/gi,
};

const PATTERN_KINDS: PatternKind[] = [
  'ip_addresses', 'domains', 'urls', 'email_addresses', 'file_hashes', 'cve_ids', 'bitcoin_addresses',
];

const THREAT_KEYWORDS = [
  'malware', 'ransomware', 'phishing', 'exploit', 'vulnerability',
  'breach', 'attack', 'trojan', 'virus', 'botnet', 'ddos',
  'injection', 'backdoor', 'rootkit', 'spyware', 'adware',
];

// Case-sensitive: a capitalised word before a company suffix, or a known vendor
const ORGANIZATION_PATTERNS = [
  /\b[A-Z][a-z]+ (?:Inc|Corp|LLC|Ltd|Company|Corporation|Technologies|Systems|Security)\b/g,
  /\b(?:Microsoft|Google|Apple|Amazon|Facebook|Twitter|LinkedIn|GitHub|Cisco|IBM|Oracle)\b/g,
];

function uniqueInOrder(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

function findAll(pattern: RegExp, text: string): string[] {
  return uniqueInOrder(Array.from(text.matchAll(pattern), (match) => match[0]));
}

function isValidIpv4(value: string): boolean {
  const parts = value.split('.');
  return parts.length === 4 && parts.every((part) => /^\d+$/.test(part) && Number(part) <= 255);
}

/**
 * Pattern-based entity and IOC extraction over free text.
 */
export class EntityExtractor {
  extract(text: string): EntityBag {
    if (!text.trim()) {
      return {};
    }

    const entities: EntityBag = {};

    for (const kind of PATTERN_KINDS) {
      const matches = findAll(ENTITY_PATTERNS[kind], text);
      if (matches.length > 0) {
        entities[kind] = matches;
      }
    }

    const lowered = text.toLowerCase();
    const threatKeywords = THREAT_KEYWORDS.filter((keyword) => lowered.includes(keyword));
    if (threatKeywords.length > 0) {
      entities.threat_keywords = threatKeywords;
    }

    const organizations = uniqueInOrder(ORGANIZATION_PATTERNS.flatMap((pattern) => findAll(pattern, text)));
    if (organizations.length > 0) {
      entities.organizations = organizations;
    }

    return entities;
  }

  extractIocs(text: string): EntityBag {
    const iocs: EntityBag = {};
    for (const kind of IOC_KINDS) {
      const matches = findAll(ENTITY_PATTERNS[kind], text);
      if (matches.length > 0) {
        iocs[kind] = matches;
      }
    }
    return iocs;
  }

  extractBatch(texts: readonly string[]): EntityBag[] {
    return texts.map((text) => this.extract(text));
  }

  /**
   * Re-check each kind and drop what fails. Kinds left empty are removed.
   */
  validate(entities: Readonly<EntityBag>): EntityBag {
    const validated: EntityBag = {};

    for (const [kind, values] of this.entries(entities)) {
      const cleaned: string[] = [];

      for (const raw of values) {
        const value = raw.trim();

        if (kind === 'ip_addresses') {
          if (isValidIpv4(value)) cleaned.push(value);
        } else if (kind === 'domains') {
          if (value.includes('.') && value.length >= 4 && value.length <= 253) cleaned.push(value.toLowerCase());
        } else if (kind === 'urls') {
          if (/^https?:\/\//.test(value)) cleaned.push(value);
        } else if (value) {
          cleaned.push(value);
        }
      }

      if (cleaned.length > 0) {
        validated[kind] = uniqueInOrder(cleaned);
      }
    }

    return validated;
  }

  summarize(entities: Readonly<EntityBag>): EntitySummary {
    const countsByType: EntitySummary['countsByType'] = {};
    let total = 0;

    for (const [kind, values] of this.entries(entities)) {
      countsByType[kind] = values.length;
      total += values.length;
    }

    return {
      total,
      typeCount: Object.keys(countsByType).length,
      countsByType,
      hasIocs: IOC_KINDS.some((kind) => entities[kind] !== undefined),
      hasThreatKeywords: entities.threat_keywords !== undefined,
    };
  }

  private *entries(entities: Readonly<EntityBag>): Generator<[EntityKind, readonly string[]]> {
    for (const kind of ENTITY_KINDS) {
      const values = entities[kind];
      if (values) {
        yield [kind, values];
      }
    }
  }
}
