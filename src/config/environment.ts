/**
 * Environment configuration for the scraper pipeline
 * Loads and validates environment variables once; the result is passed into
 * the fetcher, gateway and notifier constructors.
 */

import { z } from 'zod';
import { ConfigError } from '../utils/errors';

export type DispatchMode = 'wait' | 'fire-and-forget';

export interface EnvironmentConfig {
  supabase: {
    url: string;
    key: string;
    noticesTable: string;
    sourcesTable: string;
    categoriesTable: string;
  };
  slack: {
    botToken?: string;
    channelId?: string;
  };
  pipeline: {
    recencyWindowDays: number;
    windowOverrides: Readonly<Record<string, number>>;
    snapshotLookbackDays: number;
    disabledSources: readonly string[];
  };
  fetch: {
    timeoutMs: number;
    maxBytes: number;
    retries: number;
    browserWaitMs: number;
    browserSettleMs: number;
    browserExecutablePath?: string;
  };
  dispatch: {
    batchSize: number;
    mode: DispatchMode;
  };
  isProd: boolean;
  logging: {
    level: 'debug' | 'info' | 'warn' | 'error';
  };
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  SUPABASE_URL: z.string().url(),
  SUPABASE_KEY: z.string().min(1),
  NOTICES_TABLE: z.string().default('notices'),
  SOURCES_TABLE: z.string().default('sources'),
  CATEGORIES_TABLE: z.string().default('categories'),
  SLACK_BOT_TOKEN: z.string().optional(),
  SLACK_CHANNEL_ID: z.string().optional(),
  RECENCY_WINDOW_DAYS: positiveInt(30),
  RECENCY_WINDOW_OVERRIDES: z.string().default(''),
  SNAPSHOT_LOOKBACK_DAYS: positiveInt(90),
  FETCH_TIMEOUT_MS: positiveInt(30_000),
  FETCH_MAX_BYTES: positiveInt(5 * 1024 * 1024),
  FETCH_RETRIES: z.coerce.number().int().min(0).default(2),
  BROWSER_WAIT_MS: positiveInt(10_000),
  BROWSER_SETTLE_MS: z.coerce.number().int().min(0).default(2_000),
  BROWSER_EXECUTABLE_PATH: z.string().optional(),
  DISPATCH_BATCH_SIZE: positiveInt(10),
  DISPATCH_MODE: z.enum(['wait', 'fire-and-forget']).default('wait'),
  IS_PROD: booleanFlag,
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  DISABLED_SOURCES: z.string().default(''),
});

/**
 * Parse `source_id=days,...` pairs into a per-source window map
 */
export function parseWindowOverrides(raw: string): Record<string, number> {
  const overrides: Record<string, number> = {};
  for (const entry of raw.split(',').map(part => part.trim()).filter(Boolean)) {
    const [sourceId, days] = entry.split('=').map(part => part.trim());
    const parsed = Number(days);
    if (!sourceId || !Number.isInteger(parsed) || parsed <= 0) {
      throw new ConfigError(`Invalid RECENCY_WINDOW_OVERRIDES entry: "${entry}"`);
    }
    overrides[sourceId] = parsed;
  }
  return overrides;
}

export function parseSourceList(raw: string): string[] {
  return raw.split(',').map(part => part.trim()).filter(Boolean);
}

/**
 * Load and validate environment configuration
 * @throws ConfigError if required variables are missing or malformed
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  // Blank values in .env files count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')} (${issue.message})`);
    throw new ConfigError(`Invalid environment configuration: ${problems.join(', ')}`);
  }
  const vars = parsed.data;

  return Object.freeze({
    supabase: {
      url: vars.SUPABASE_URL,
      key: vars.SUPABASE_KEY,
      noticesTable: vars.NOTICES_TABLE,
      sourcesTable: vars.SOURCES_TABLE,
      categoriesTable: vars.CATEGORIES_TABLE,
    },
    slack: {
      botToken: vars.SLACK_BOT_TOKEN,
      channelId: vars.SLACK_CHANNEL_ID,
    },
    pipeline: {
      recencyWindowDays: vars.RECENCY_WINDOW_DAYS,
      windowOverrides: Object.freeze(parseWindowOverrides(vars.RECENCY_WINDOW_OVERRIDES)),
      snapshotLookbackDays: vars.SNAPSHOT_LOOKBACK_DAYS,
      disabledSources: Object.freeze(parseSourceList(vars.DISABLED_SOURCES)),
    },
    fetch: {
      timeoutMs: vars.FETCH_TIMEOUT_MS,
      maxBytes: vars.FETCH_MAX_BYTES,
      retries: vars.FETCH_RETRIES,
      browserWaitMs: vars.BROWSER_WAIT_MS,
      browserSettleMs: vars.BROWSER_SETTLE_MS,
      browserExecutablePath: vars.BROWSER_EXECUTABLE_PATH,
    },
    dispatch: {
      batchSize: vars.DISPATCH_BATCH_SIZE,
      mode: vars.DISPATCH_MODE,
    },
    isProd: vars.IS_PROD,
    logging: {
      level: vars.LOG_LEVEL,
    },
  });
}
