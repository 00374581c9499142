/**
 * Main exports for @levelscope/app package
 */

// Configuration exports
export { loadConfig, getConfigSummary, configSchema, envMapping } from './config/index.js';
export type { Config, ConfigOverrides, LoadConfigOptions } from './config/index.js';

// Loader exports
export { FixtureProvider, DEFAULT_FIXTURE_PATH, fixtureFileSchema } from './services/providers/fixture-provider.js';
export type { FixtureProviderConfig } from './services/providers/fixture-provider.js';

// Command exports
export { LevelsCommand } from './commands/levels.command.js';
export type { LevelsCommandConfig, LevelsDefaults } from './commands/levels.command.js';
export type { Command, CommandOptions, CommandResult } from './commands/types.js';

// Formatter exports
export { LevelsFormatter, OUTPUT_FORMATS } from './formatters/levels-formatter.js';
export type { LevelsReport, OutputFormat, FormatOptions } from './formatters/levels-formatter.js';

// CLI exports
export { run, buildProgram, createLoader, toConfigOverrides } from './start.js';
export type { CliIO, CliOptions } from './start.js';

export { sanitizeError } from './utils/error-sanitizer.js';
