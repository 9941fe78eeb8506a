import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterAll, describe, expect, it } from 'vitest';
import { ConfigurationError } from 'backend/services/error-logging/errors';
import { getSourceCategories, getSourcesByCategory, loadDefaultSources } from './default-sources';

const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'source-catalog-'));

function writeCatalog(name: string, catalog: unknown): string {
  const file = path.join(tempDir, name);
  fs.writeFileSync(file, JSON.stringify(catalog));
  return file;
}

afterAll(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('default source catalog', () => {
  it('loads every preconfigured source as a frozen descriptor', () => {
    const sources = loadDefaultSources();

    expect(sources).toHaveLength(10);
    expect(sources.filter((source) => source.enabled)).toHaveLength(7);
    expect(sources.every((source) => Object.isFrozen(source))).toBe(true);
    expect(sources.find((source) => source.name === 'CISA Security Advisories')).toMatchObject({
      type: 'government',
      rateLimitPerMinute: 60,
      reliabilityWeight: 0.98,
      fieldSelectors: { item: 'div.c-teaser', title: 'h3 a' },
    });
  });

  it('groups sources by category', () => {
    const categories = getSourceCategories();

    expect(Object.keys(categories)).toEqual(['news', 'government', 'social', 'blogs']);
    expect(categories.government).toEqual({
      label: 'Government Sources',
      description: 'Official government security advisories',
      sources: ['CISA Security Advisories', 'US-CERT Alerts'],
    });
  });

  it('filters by category and returns nothing for an unknown one', () => {
    expect(getSourcesByCategory('blogs').map((source) => source.name)).toEqual(['Krebs on Security']);
    expect(getSourcesByCategory('podcasts')).toEqual([]);
  });

  it('rejects a catalog with an invalid source', () => {
    const file = writeCatalog('invalid.json', {
      categories: { news: { label: 'News', description: '' } },
      sources: [{ name: 'Bad', type: 'news', url: 'ftp://bad.example.com', category: 'news' }],
    });

    expect(() => loadDefaultSources(file)).toThrow(ConfigurationError);
  });

  it('rejects a source pointing at an undeclared category', () => {
    const file = writeCatalog('orphan.json', {
      categories: {},
      sources: [{ name: 'Orphan', type: 'blog', url: 'https://orphan.example.com', category: 'misc' }],
    });

    try {
      loadDefaultSources(file);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ issues: ['sources.0.category: Unknown category "misc"'] });
    }
  });

  it('reads a custom catalog', () => {
    const file = writeCatalog('custom.json', {
      categories: { research: { label: 'Research', description: 'Lab blogs' } },
      sources: [{ name: 'Lab Notes', type: 'blog', url: 'https://lab.example.com', category: 'research' }],
    });

    expect(loadDefaultSources(file)).toEqual([
      {
        name: 'Lab Notes',
        type: 'blog',
        url: 'https://lab.example.com',
        keywords: [],
        fieldSelectors: {},
        rateLimitPerMinute: 60,
        reliabilityWeight: 0.5,
        enabled: true,
        category: 'research',
      },
    ]);
    expect(getSourceCategories(file)).toEqual({
      research: { label: 'Research', description: 'Lab blogs', sources: ['Lab Notes'] },
    });
  });
});
