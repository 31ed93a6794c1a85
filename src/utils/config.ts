import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';

dotenvConfig();

function getEnvVar(key: string, fallback = ''): string {
  const value = process.env[key];
  return value ? value.trim() : fallback;
}

function getNumberEnvVar(key: string, fallback: number): number {
  const raw = getEnvVar(key);
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`Environment variable ${key} must be a non-negative number, got "${raw}"`);
  }
  return value;
}

export interface AppConfig {
  app: {
    logLevel: string;
    outputDir: string;
  };
  store: {
    baseUrl: string;
    requestTimeoutMs: number;
  };
  browser: {
    wsEndpoint?: string;
    executablePath?: string;
  };
  sentry: {
    dsn: string;
  };
}

export const config: AppConfig = {
  app: {
    logLevel: getEnvVar('LOG_LEVEL', 'info'),
    outputDir: getEnvVar('OUTPUT_DIR', 'scraped-sites'),
  },
  store: {
    baseUrl: getEnvVar('STORE_BASE_URL', 'https://www.ebay.co.uk').replace(/\/+$/, ''),
    requestTimeoutMs: getNumberEnvVar('REQUEST_TIMEOUT_MS', 30000),
  },
  browser: {
    wsEndpoint: getEnvVar('BROWSER_WS_ENDPOINT') || undefined,
    executablePath: getEnvVar('CHROME_EXECUTABLE_PATH') || undefined,
  },
  sentry: {
    dsn: getEnvVar('SENTRY_DSN'),
  },
};

/**
 * Per-run options. Both schemas are strict so an option that belongs to the
 * other mode (e.g. `resume` on a link crawl) is rejected instead of ignored.
 */
export const catalogRunSchema = z
  .object({
    mode: z.literal('catalog'),
    store: z.string().trim().min(1, 'store name is required'),
    maxItems: z.number().int().min(0).default(0),
    pageSize: z.number().int().positive().default(72),
    delayMs: z.number().min(0).default(3000),
    listingDelayMs: z.number().min(0).default(3000),
    compatMode: z.enum(['skip', 'sampled', 'exhaustive']).default('sampled'),
    resume: z.boolean().default(false),
    checkpointEvery: z.number().int().positive().default(5),
    vendor: z.string().trim().default(''),
  })
  .strict();

export const FOLLOW_SCOPES = ['product', 'category', 'blog', 'all', 'fullmonty'] as const;

export const linkRunSchema = z
  .object({
    mode: z.literal('links'),
    domain: z
      .string()
      .trim()
      .min(1, 'domain is required')
      .transform((value) => value.replace(/^https?:\/\//, '').replace(/\/+$/, '')),
    maxPages: z.number().int().min(0).default(0),
    delayMs: z.number().min(0).default(1000),
    concurrency: z.number().int().positive().default(2),
    follow: z.enum(FOLLOW_SCOPES).default('all'),
    seedUrls: z.array(z.string()).default([]),
    knownProductUrls: z.array(z.string()).default([]),
    knownCategoryUrls: z.array(z.string()).default([]),
  })
  .strict();

export const runConfigSchema = z.discriminatedUnion('mode', [catalogRunSchema, linkRunSchema]);

export type CatalogRunConfig = z.infer<typeof catalogRunSchema>;
export type LinkRunConfig = z.infer<typeof linkRunSchema>;
export type RunConfig = z.infer<typeof runConfigSchema>;
export type FollowScope = LinkRunConfig['follow'];

/**
 * Validate raw run options, throwing a ConfigError listing every problem
 */
export function resolveRunConfig(input: unknown): RunConfig {
  const parsed = runConfigSchema.safeParse(input);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ConfigError(`Invalid run configuration: ${problems}`);
  }
  return parsed.data;
}
