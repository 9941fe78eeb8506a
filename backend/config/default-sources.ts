import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError, toError } from 'backend/services/error-logging/errors';
import { freezeDescriptor, sourceDescriptorSchema } from 'backend/services/scraping/source-descriptor';
import type { SourceDescriptor } from 'backend/services/scraping/types';
import { log } from 'backend/utils/log';

const here = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_CATALOG_PATH = path.resolve(here, 'default-sources.json');

const catalogSchema = z
  .object({
    categories: z.record(
      z.object({
        label: z.string().min(1),
        description: z.string(),
      }),
    ),
    sources: z.array(sourceDescriptorSchema),
  })
  .superRefine((catalog, ctx) => {
    catalog.sources.forEach((source, index) => {
      if (source.category && !(source.category in catalog.categories)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sources', index, 'category'],
          message: `Unknown category "${source.category}"`,
        });
      }
    });
  });

export interface SourceCategory {
  label: string;
  description: string;
  sources: string[];
}

interface SourceCatalog {
  categories: Record<string, { label: string; description: string }>;
  sources: readonly SourceDescriptor[];
}

const catalogs = new Map<string, SourceCatalog>();

function readCatalog(catalogPath: string): SourceCatalog {
  const cached = catalogs.get(catalogPath);
  if (cached) {
    return cached;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(catalogPath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read source catalog ${catalogPath}`, [toError(error).message]);
  }

  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid source catalog',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const catalog: SourceCatalog = {
    categories: parsed.data.categories,
    sources: Object.freeze(parsed.data.sources.map(freezeDescriptor)),
  };
  catalogs.set(catalogPath, catalog);
  log(`Loaded ${catalog.sources.length} sources from ${path.basename(catalogPath)}`, 'config');

  return catalog;
}

/**
 * The preconfigured sources, enabled or not. Descriptors are frozen.
 */
export function loadDefaultSources(catalogPath = DEFAULT_CATALOG_PATH): SourceDescriptor[] {
  return [...readCatalog(catalogPath).sources];
}

export function getSourceCategories(catalogPath = DEFAULT_CATALOG_PATH): Record<string, SourceCategory> {
  const { categories, sources } = readCatalog(catalogPath);

  return Object.fromEntries(
    Object.entries(categories).map(([key, category]) => [
      key,
      {
        ...category,
        sources: sources.filter((source) => source.category === key).map((source) => source.name),
      },
    ]),
  );
}

export function getSourcesByCategory(category: string, catalogPath = DEFAULT_CATALOG_PATH): SourceDescriptor[] {
  return readCatalog(catalogPath).sources.filter((source) => source.category === category);
}
