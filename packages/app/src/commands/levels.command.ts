/**
 * Levels analysis command implementation
 */

import type { Command, CommandOptions, CommandResult } from './types.js';
import {
  createChildLogger,
  measureAsync,
  measureSync,
  setRequestContext,
  type Logger,
} from '@levelscope/logger';
import type { AnalysisWindow, DailyBarsLoader, GetDailyBarsParams } from '@levelscope/contracts';
import { EmptyInputError, ProviderError } from '@levelscope/contracts';
import {
  analyzeSeries,
  assertCalendarDate,
  assertSignificanceMultiplier,
  assertWindowSize,
  resolveAnalysisWindow,
  toCalendarDate,
} from '@levelscope/analysis-kit';
import { LevelsFormatter, type LevelsReport } from '../formatters/levels-formatter.js';
import { sanitizeError } from '../utils/error-sanitizer.js';

export interface LevelsDefaults {
  symbol: string;
  lookbackDays: number;
  windowSize: number;
  significanceMultiplier: number;
}

export interface LevelsCommandConfig {
  loader: DailyBarsLoader;
  logger: Logger;
  defaults: LevelsDefaults;

  /** Clock used when no date is given @default () => new Date() */
  now?: () => Date;
}

/**
 * levels command - loads a daily series and reports significant candles and unbroken levels
 *
 * Arguments: `[symbol] [date]`, where date (YYYY-MM-DD) is the last day of the window
 * and defaults to today in UTC.
 */
export class LevelsCommand implements Command {
  name = 'levels';
  description = 'Find significant candles and unbroken support/resistance levels';

  private loader: DailyBarsLoader;
  private logger: Logger;
  private defaults: LevelsDefaults;
  private now: () => Date;
  private formatter: LevelsFormatter;

  constructor(config: LevelsCommandConfig) {
    this.loader = config.loader;
    this.logger = createChildLogger(config.logger, { component: 'levels-command' });
    this.defaults = config.defaults;
    this.now = config.now ?? (() => new Date());
    this.formatter = new LevelsFormatter();
  }

  async execute(args: string[], options: CommandOptions): Promise<CommandResult> {
    const startTime = Date.now();

    try {
      const symbol = (args[0]?.trim() || this.defaults.symbol).toUpperCase();
      const selectedDate = args[1]?.trim() || toCalendarDate(this.now());
      const windowSize = options.windowSize ?? this.defaults.windowSize;
      const significanceMultiplier =
        options.significanceMultiplier ?? this.defaults.significanceMultiplier;
      const lookbackDays = options.lookbackDays ?? this.defaults.lookbackDays;
      const format = options.format ?? 'text';

      assertCalendarDate(selectedDate, 'date');
      assertWindowSize(windowSize);
      assertSignificanceMultiplier(significanceMultiplier);

      const window = resolveAnalysisWindow(selectedDate, lookbackDays);

      setRequestContext({ symbol, provider: this.loader.name });

      this.logger.info('Executing levels command', {
        from: window.start,
        to: window.end,
        windowSize,
        significanceMultiplier,
        format,
      });

      const request = this.buildRequest(symbol, window);
      const loaded = request ? await measureAsync(() => this.loader.getDailyBars(request)) : null;
      const bars = loaded?.result ?? [];

      if (bars.length === 0) {
        throw new EmptyInputError(`No data found for ${symbol} between ${window.start} and ${window.end}`, {
          symbol,
          from: window.start,
          to: window.end,
        });
      }

      const { result, duration_ms } = measureSync(() =>
        analyzeSeries(bars, {
          symbol,
          windowSize,
          significanceMultiplier,
          endDate: window.end,
        })
      );

      this.logger.info('Levels analysis complete', {
        bars: result.bars.length,
        significant: result.significantBars.length,
        resistance: result.levels.resistance.length,
        support: result.levels.support.length,
        load_ms: loaded?.duration_ms,
        duration_ms,
      });

      const report: LevelsReport = {
        symbol,
        window,
        provider: this.loader.name,
        result,
      };

      return {
        success: true,
        output: this.formatter.format(report, format, { showData: options.showData }),
        duration: Date.now() - startTime,
        metadata: {
          symbol,
          from: window.start,
          to: window.end,
          barsAnalyzed: result.bars.length,
          significantBars: result.significantBars.length,
          provider: this.loader.name,
        },
      };
    } catch (error) {
      this.logger.error('Levels command failed', { error: sanitizeError(error, options.verbose) });

      return {
        success: false,
        output: null,
        error: error instanceof Error ? error : new Error(String(error)),
        duration: Date.now() - startTime,
      };
    }
  }

  /**
   * Loader request for the window, honouring the loader's capabilities.
   * Returns null when the window ends before the loader's history starts.
   */
  private buildRequest(symbol: string, window: AnalysisWindow): GetDailyBarsParams | null {
    const capabilities = this.loader.capabilities?.();
    if (!capabilities) {
      return { symbol, from: window.start, to: window.end };
    }

    if (!capabilities.intervals.includes('1d')) {
      throw new ProviderError(`Loader ${this.loader.name} does not serve daily bars`, {
        provider: this.loader.name,
      });
    }

    const earliest = capabilities.historicalDataFrom;
    if (earliest === undefined || earliest <= window.start) {
      return { symbol, from: window.start, to: window.end };
    }

    if (earliest > window.end) {
      this.logger.debug('Window ends before the loader history starts', { earliest });
      return null;
    }

    return { symbol, from: earliest, to: window.end };
  }
}
