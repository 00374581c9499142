/**
 * Fixture-based daily-bar loader for dry runs and deterministic tests
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createChildLogger, type Logger } from '@levelscope/logger';
import type {
  DailyBar,
  DailyBarsLoader,
  GetDailyBarsParams,
  ProviderCapabilities,
} from '@levelscope/contracts';
import { InvalidParameterError, ProviderError, SymbolResolutionError } from '@levelscope/contracts';
import { isCalendarDate } from '@levelscope/analysis-kit';

/**
 * Bundled sample data: AAPL and MSFT weekdays, 2024-11-01 through 2025-03-31
 */
export const DEFAULT_FIXTURE_PATH = fileURLToPath(
  new URL('../../../__fixtures__/daily-bars.json', import.meta.url)
);

const dailyBarSchema = z.object({
  date: z.string(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number(),
});

/**
 * `{ "SYMBOL": [bars...] }`
 */
export const fixtureFileSchema = z.record(z.array(dailyBarSchema));

export interface FixtureProviderConfig {
  fixturePath?: string;
  logger?: Logger;
}

/**
 * Loader that serves bars from a JSON file instead of the network
 */
export class FixtureProvider implements DailyBarsLoader {
  readonly name = 'fixture';

  private readonly fixturePath: string;
  private readonly logger: Logger | undefined;
  private fixtures: Map<string, DailyBar[]> | null = null;

  constructor(config: FixtureProviderConfig = {}) {
    this.fixturePath = config.fixturePath ?? DEFAULT_FIXTURE_PATH;
    this.logger = config.logger
      ? createChildLogger(config.logger, { component: 'fixture-provider', provider: this.name })
      : undefined;
  }

  capabilities(): ProviderCapabilities {
    return {
      intervals: ['1d'],
      requiresAuthentication: false,
    };
  }

  /**
   * Symbols available in the fixture file
   */
  async symbols(): Promise<string[]> {
    const fixtures = await this.loadFixtures();
    return [...fixtures.keys()].sort();
  }

  async getDailyBars(params: GetDailyBarsParams): Promise<DailyBar[]> {
    if (!isCalendarDate(params.from) || !isCalendarDate(params.to)) {
      throw new InvalidParameterError('Invalid date range: from and to must be YYYY-MM-DD', {
        parameter: 'from',
        value: params.from,
        to: params.to,
      });
    }

    const fixtures = await this.loadFixtures();
    const symbol = params.symbol.trim().toUpperCase();
    const bars = fixtures.get(symbol);

    if (!bars) {
      const available = await this.symbols();
      throw new SymbolResolutionError(
        `No fixture data for symbol: ${symbol} (available: ${available.join(', ')})`,
        { symbol, provider: this.name, available }
      );
    }

    const result = bars.filter((bar) => bar.date >= params.from && bar.date <= params.to);

    this.logger?.debug('Fixture provider returning bars', {
      symbol,
      from: params.from,
      to: params.to,
      count: result.length,
    });

    return result;
  }

  private async loadFixtures(): Promise<Map<string, DailyBar[]>> {
    if (this.fixtures) {
      return this.fixtures;
    }

    let content: string;
    try {
      content = await readFile(this.fixturePath, 'utf-8');
    } catch (error) {
      throw new ProviderError(`Failed to read fixture file: ${this.fixturePath}`, {
        provider: this.name,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new ProviderError(`Fixture file is not valid JSON: ${this.fixturePath}`, {
        provider: this.name,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = fixtureFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderError(`Fixture file has an unexpected shape: ${this.fixturePath}`, {
        provider: this.name,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    this.fixtures = new Map(
      Object.entries(parsed.data).map(([symbol, bars]) => [symbol.toUpperCase(), bars])
    );
    this.logger?.debug('Fixtures loaded', { path: this.fixturePath, count: this.fixtures.size });

    return this.fixtures;
  }
}
