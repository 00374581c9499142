/**
 * Application entry point
 * Parses the command line, wires config, logger and loader together and runs the levels command
 */

import 'dotenv/config';

import { Command as Program, CommanderError, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import {
  attachGlobalHandlers,
  createLogger,
  startTimer,
  withRequestContext,
  type Logger,
} from '@levelscope/logger';
import type { DailyBarsLoader } from '@levelscope/contracts';
import { YahooProvider } from '@levelscope/provider-yahoo';
import { loadConfig, getConfigSummary, type Config, type ConfigOverrides } from './config/index.js';
import { FixtureProvider } from './services/providers/fixture-provider.js';
import { LevelsCommand } from './commands/levels.command.js';
import { OUTPUT_FORMATS, type OutputFormat } from './formatters/levels-formatter.js';

export type CliOptions = {
  window?: number;
  multiplier?: number;
  lookback?: number;
  format: OutputFormat;
  showData: boolean;
  dryRun: boolean;
  fixture?: string;
  verbose: boolean;
};

/**
 * Where the CLI writes and what it reads
 */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env?: Record<string, string | undefined>;

  /** Send log entries here instead of the console */
  logStream?: NodeJS.WritableStream;

  /** Install process-wide uncaught exception handlers */
  installGlobalHandlers?: boolean;

  /** Clock used when no date argument is given */
  now?: () => Date;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  installGlobalHandlers: true,
};

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return parsed;
}

/**
 * Build the commander program
 */
export function buildProgram(): Program {
  return new Program()
    .name('levelscope')
    .description('Find significant daily candles and the support/resistance levels they leave unbroken')
    .version('0.1.0')
    .argument('[symbol]', 'Ticker symbol (default from DEFAULT_SYMBOL, else AAPL)')
    .argument('[date]', 'Last day of the analysis window, YYYY-MM-DD (default today, UTC)')
    .option('-w, --window <bars>', 'ATR window in bars', parsePositiveInteger)
    .option('-m, --multiplier <value>', 'Significance multiplier (TR > value × ATR)', parsePositiveNumber)
    .option('-l, --lookback <days>', 'Calendar days of history before the date', parsePositiveInteger)
    .addOption(new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS).default('text'))
    .option('--show-data', 'Include every bar that has an ATR', false)
    .option('-d, --dry-run', 'Use bundled fixture data instead of Yahoo Finance', false)
    .option('--fixture <path>', 'Fixture file to load in place of the bundled one')
    .option('-v, --verbose', 'Debug logging and stack traces', false);
}

/**
 * Map CLI flags onto configuration overrides
 */
export function toConfigOverrides(options: CliOptions): ConfigOverrides {
  return {
    app: {
      ...(options.dryRun ? { dryRun: true } : {}),
      ...(options.verbose ? { verbose: true } : {}),
    },
    logging: options.verbose ? { level: 'debug' } : {},
    provider: options.fixture ? { type: 'fixture', fixturePath: options.fixture } : {},
    analysis: {
      windowSize: options.window,
      significanceMultiplier: options.multiplier,
      lookbackDays: options.lookback,
    },
  };
}

/**
 * Pick the series loader: fixtures for dry runs, Yahoo Finance otherwise
 */
export function createLoader(config: Config, logger: Logger): DailyBarsLoader {
  if (config.app.dryRun || config.provider.type === 'fixture') {
    return new FixtureProvider({ fixturePath: config.provider.fixturePath, logger });
  }

  return new YahooProvider({
    baseUrl: config.provider.baseUrl,
    timeout: config.provider.timeout,
    retries: config.provider.retries,
    retryDelayMs: config.provider.retryDelayMs,
    logger,
  });
}

/**
 * Run the CLI once
 *
 * @param argv - Arguments after the executable and script
 * @returns Process exit code
 */
export async function run(argv: string[], io: CliIO = processIO): Promise<number> {
  const program = buildProgram()
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();

  let config: Config;
  try {
    config = loadConfig({ env: io.env ?? process.env, overrides: toConfigOverrides(options) });
  } catch (error) {
    io.stderr(chalk.red(error instanceof Error ? error.message : String(error)) + '\n');
    return 1;
  }

  const logger = createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
    console: io.logStream === undefined,
    stream: io.logStream,
  });

  if (io.installGlobalHandlers) {
    attachGlobalHandlers(logger);
  }

  const command = new LevelsCommand({
    loader: createLoader(config, logger),
    logger,
    defaults: {
      symbol: config.analysis.defaultSymbol,
      lookbackDays: config.analysis.lookbackDays,
      windowSize: config.analysis.windowSize,
      significanceMultiplier: config.analysis.significanceMultiplier,
    },
    now: io.now,
  });

  const result = await withRequestContext(
    async () => {
      const timer = startTimer();
      logger.debug('Starting levelscope', { ...getConfigSummary(config), operation: 'levels' });

      const commandResult = await command.execute(program.args, {
        format: options.format,
        showData: options.showData,
        verbose: config.app.verbose,
      });

      logger.debug('Command finished', {
        operation: 'levels',
        duration_ms: timer.stop(),
        result: commandResult.success ? 'success' : 'error',
      });

      return commandResult;
    },
    undefined,
    { operation: 'levels' }
  );

  if (result.success && result.output !== null) {
    io.stdout(result.output + '\n');
    return 0;
  }

  const message = result.error?.message ?? 'Command failed';
  io.stderr(chalk.red(`Error: ${message}`) + '\n');
  if (config.app.verbose && result.error?.stack) {
    io.stderr(chalk.gray(result.error.stack) + '\n');
  }
  return 1;
}

/**
 * Run against the real process and exit with the command's code
 */
export async function main(): Promise<void> {
  try {
    process.exitCode = await run(process.argv.slice(2));
  } catch (error) {
    console.error(chalk.red('levelscope failed:'), error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}
