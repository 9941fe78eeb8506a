import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from 'backend/services/error-logging/errors';
import dotenvConfig from 'backend/utils/dotenv-config';

const intFromEnv = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const settingsSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  SCRAPER_MAX_WORKERS: intFromEnv(5, 1),
  SCRAPER_TASK_TIMEOUT_MS: intFromEnv(120_000, 1),
  FETCH_TIMEOUT_MS: intFromEnv(30_000, 1),
  MONITORING_INTERVAL_MS: intFromEnv(300_000, 1_000),
  RISK_ALERT_THRESHOLD: z.coerce.number().min(0).max(10).default(5),
  ALERT_COOLDOWN_MS: intFromEnv(3_600_000, 0),
  MONITORING_KEYWORDS: z
    .string()
    .default('')
    .transform((value) => value.split(',').map((keyword) => keyword.trim()).filter(Boolean)),
  DATABASE_URL: z.string().url().optional(),
});

export interface AppSettings {
  readonly nodeEnv: 'development' | 'test' | 'production';
  readonly scraperMaxWorkers: number;
  readonly scraperTaskTimeoutMs: number;
  readonly fetchTimeoutMs: number;
  readonly monitoringIntervalMs: number;
  readonly riskAlertThreshold: number;
  readonly alertCooldownMs: number;
  readonly monitoringKeywords: readonly string[];
  readonly databaseUrl?: string;
}

type EnvSource = Record<string, string | undefined>;

/**
 * Parse settings from an environment map. Blank values count as unset.
 */
export function parseSettings(env: EnvSource): AppSettings {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const parsed = settingsSchema.safeParse(present);

  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid environment settings',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  return Object.freeze({
    nodeEnv: values.NODE_ENV,
    scraperMaxWorkers: values.SCRAPER_MAX_WORKERS,
    scraperTaskTimeoutMs: values.SCRAPER_TASK_TIMEOUT_MS,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    monitoringIntervalMs: values.MONITORING_INTERVAL_MS,
    riskAlertThreshold: values.RISK_ALERT_THRESHOLD,
    alertCooldownMs: values.ALERT_COOLDOWN_MS,
    monitoringKeywords: Object.freeze(values.MONITORING_KEYWORDS),
    databaseUrl: values.DATABASE_URL,
  });
}

let cached: AppSettings | null = null;

/**
 * Load `.env.local` (when present) into process.env, then parse it once.
 */
export function loadSettings(): AppSettings {
  if (!cached) {
    dotenvConfig(dotenv);
    cached = parseSettings(process.env);
  }
  return cached;
}
