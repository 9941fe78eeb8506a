import { z } from 'zod';
import { ConfigurationError } from 'backend/services/error-logging/errors';
import { SOURCE_TYPES, type SourceDescriptor } from './types';

const fieldSelectorsSchema = z.object({
  item: z.string().trim().min(1).optional(),
  title: z.string().trim().min(1).optional(),
  content: z.string().trim().min(1).optional(),
  link: z.string().trim().min(1).optional(),
});

export const sourceDescriptorSchema = z.object({
  name: z.string().trim().min(1, 'Missing required field: name'),
  type: z.enum(SOURCE_TYPES),
  url: z
    .string()
    .trim()
    .min(1, 'Missing required field: url')
    .refine((value) => /^https?:\/\/[^\s/]+/i.test(value), {
      message: 'URL must start with http:// or https://',
    }),
  keywords: z.array(z.string().trim().min(1)).default([]),
  fieldSelectors: fieldSelectorsSchema.default({}),
  rateLimitPerMinute: z.number().int().positive().max(6000).default(60),
  reliabilityWeight: z.number().min(0).max(1).default(0.5),
  enabled: z.boolean().default(true),
  category: z.string().trim().min(1).optional(),
});

export type SourceDescriptorInput = z.input<typeof sourceDescriptorSchema>;

export interface SourceValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

function formatIssue(issue: z.ZodIssue): string {
  const field = issue.path.join('.') || 'descriptor';

  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return `Missing required field: ${field}`;
  }
  if (issue.code === 'invalid_enum_value') {
    return `Unsupported source type: ${String(issue.received)}`;
  }

  return `${field}: ${issue.message}`;
}

/**
 * Freeze a descriptor and the collections it owns so a dispatched
 * snapshot cannot change under a running worker.
 */
export function freezeDescriptor(descriptor: SourceDescriptor): SourceDescriptor {
  return Object.freeze({
    ...descriptor,
    keywords: Object.freeze([...descriptor.keywords]),
    fieldSelectors: Object.freeze({ ...descriptor.fieldSelectors }),
  });
}

export function parseSourceDescriptor(input: unknown): SourceDescriptor {
  const parsed = sourceDescriptorSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid source descriptor', parsed.error.issues.map(formatIssue));
  }
  return freezeDescriptor(parsed.data);
}

/**
 * Check a descriptor without throwing. Warnings do not make it invalid.
 */
export function validateSource(input: unknown): SourceValidationResult {
  const parsed = sourceDescriptorSchema.safeParse(input);

  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map(formatIssue),
      warnings: [],
    };
  }

  const warnings: string[] = [];
  if (parsed.data.keywords.length === 0) {
    warnings.push('No keywords specified - will scrape all content');
  }
  if (parsed.data.reliabilityWeight < 0.3) {
    warnings.push(`Low reliability weight (${parsed.data.reliabilityWeight})`);
  }

  return { valid: true, errors: [], warnings };
}
