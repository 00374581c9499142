/**
 * Configuration loading and management
 */

import {
  booleanEnvPaths,
  configSchema,
  envMapping,
  numericEnvPaths,
  type Config,
  type ConfigOverrides,
} from './schema.js';
import type { Logger } from '@levelscope/logger';

type RawConfig = Record<string, Record<string, unknown>>;

export interface LoadConfigOptions {
  /** Environment to read @default process.env */
  env?: Record<string, string | undefined>;

  /** Values that win over the environment (CLI flags) */
  overrides?: ConfigOverrides;

  logger?: Logger;
}

/**
 * Load configuration from defaults, environment variables and overrides, in that order of precedence
 *
 * @throws Error listing every invalid path
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const { env = process.env, overrides = {}, logger } = options;
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value, configPath));
    }
  }

  for (const [section, values] of Object.entries(overrides)) {
    if (!values) continue;
    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        setNestedProperty(rawConfig, `${section}.${key}`, value);
      }
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  logger?.debug('Configuration loaded', getConfigSummary(result.data));

  return result.data;
}

/**
 * Set a section.key property, creating the section when missing
 */
function setNestedProperty(raw: RawConfig, path: string, value: unknown): void {
  const [section, key] = path.split('.');
  if (!section || !key) return;

  raw[section] = { ...raw[section], [key]: value };
}

/**
 * Parse an environment value as the type of the config path it maps to.
 * Unparseable values stay strings so the schema reports them against their path.
 */
function parseEnvValue(value: string, configPath: string): string | number | boolean {
  if (booleanEnvPaths.has(configPath)) {
    if (value === 'true') return true;
    if (value === 'false') return false;
    return value;
  }

  if (numericEnvPaths.has(configPath)) {
    const num = Number(value);
    return !isNaN(num) && value.trim() !== '' ? num : value;
  }

  return value;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    dryRun: config.app.dryRun,
    provider: config.app.dryRun ? 'fixture' : config.provider.type,
    analysis: {
      defaultSymbol: config.analysis.defaultSymbol,
      lookbackDays: config.analysis.lookbackDays,
      windowSize: config.analysis.windowSize,
      significanceMultiplier: config.analysis.significanceMultiplier,
    },
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
  };
}

export type { Config, ConfigOverrides } from './schema.js';
export { configSchema, envMapping } from './schema.js';
