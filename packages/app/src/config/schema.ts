/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'production']).default('development'),
      dryRun: z.boolean().default(false),
      verbose: z.boolean().default(false),
      name: z.string().default('levelscope'),
      version: z.string().default('0.1.0'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  provider: z
    .object({
      type: z.enum(['yahoo', 'fixture']).default('yahoo'),
      baseUrl: z.string().url().optional(),
      timeout: z.number().int().positive().default(10000),
      retries: z.number().int().min(0).default(2),
      retryDelayMs: z.number().int().min(0).default(1000),
      fixturePath: z.string().min(1).optional(),
    })
    .default({}),

  analysis: z
    .object({
      defaultSymbol: z.string().min(1).default('AAPL'),
      lookbackDays: z.number().int().positive().default(60),
      windowSize: z.number().int().positive().default(14),
      significanceMultiplier: z.number().positive().finite().default(1.2),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Partial configuration, one level deep, as supplied by CLI flags
 */
export type ConfigOverrides = { [Section in keyof Config]?: Partial<Config[Section]> };

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  DRY_RUN: 'app.dryRun',
  VERBOSE: 'app.verbose',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  PROVIDER_TYPE: 'provider.type',
  YAHOO_BASE_URL: 'provider.baseUrl',
  PROVIDER_TIMEOUT: 'provider.timeout',
  PROVIDER_RETRIES: 'provider.retries',
  PROVIDER_RETRY_DELAY: 'provider.retryDelayMs',
  FIXTURE_PATH: 'provider.fixturePath',
  DEFAULT_SYMBOL: 'analysis.defaultSymbol',
  LOOKBACK_DAYS: 'analysis.lookbackDays',
  ATR_WINDOW: 'analysis.windowSize',
  SIGNIFICANCE_MULTIPLIER: 'analysis.significanceMultiplier',
};

/**
 * Config paths read from the environment as numbers or booleans; every other path keeps the raw string
 */
export const numericEnvPaths: ReadonlySet<string> = new Set([
  'provider.timeout',
  'provider.retries',
  'provider.retryDelayMs',
  'analysis.lookbackDays',
  'analysis.windowSize',
  'analysis.significanceMultiplier',
]);

export const booleanEnvPaths: ReadonlySet<string> = new Set(['app.dryRun', 'app.verbose']);
