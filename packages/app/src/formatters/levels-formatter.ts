/**
 * Levels report formatter
 * Renders an analysis result as text, JSON, box-drawn tables or markdown
 */

import type { AnalysisResult, AnalysisWindow, AnnotatedBar, Level } from '@levelscope/contracts';

export type OutputFormat = 'text' | 'json' | 'table' | 'markdown';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'table', 'markdown'];

export interface LevelsReport {
  symbol: string;

  /** Requested calendar window; the data may start later */
  window: AnalysisWindow;

  /** Loader the bars came from */
  provider: string;

  result: AnalysisResult;
}

export interface FormatOptions {
  /** Append the annotated bars (those with an ATR) */
  showData?: boolean;
}

export const NO_SIGNIFICANT_CANDLES = 'No significant candles found in this period.';
export const NO_RESISTANCE_LEVELS = 'No unbroken resistance levels found.';
export const NO_SUPPORT_LEVELS = 'No unbroken support levels found.';

/**
 * Formatter for levels reports.
 * Prices, true ranges and ATRs are shown with two decimals; JSON output is unrounded.
 */
export class LevelsFormatter {
  format(report: LevelsReport, format: OutputFormat = 'text', options: FormatOptions = {}): string {
    switch (format) {
      case 'json':
        return this.formatAsJSON(report);
      case 'table':
        return this.formatAsTable(report, options);
      case 'markdown':
        return this.formatAsMarkdown(report, options);
      case 'text':
      default:
        return this.formatAsText(report, options);
    }
  }

  private formatAsText(report: LevelsReport, options: FormatOptions): string {
    const { result } = report;
    const lines: string[] = [];

    lines.push(`Levels Analysis: ${report.symbol}`);
    lines.push(
      `Window: ${report.window.start} to ${report.window.end} (${result.bars.length} bars, ${report.provider})`
    );
    lines.push(
      `ATR window: ${result.parameters.windowSize}, multiplier: ${result.parameters.significanceMultiplier}`
    );
    lines.push('='.repeat(50));
    lines.push('');

    lines.push(this.significantHeading(report));
    if (result.significantBars.length === 0) {
      lines.push(`  ${NO_SIGNIFICANT_CANDLES}`);
    } else {
      for (const bar of result.significantBars) {
        lines.push(`  ${this.describeBar(bar)}`);
      }
    }
    lines.push('');

    lines.push('Unbroken Resistance Levels');
    lines.push(...this.levelLines(result.levels.resistance, NO_RESISTANCE_LEVELS).map((line) => `  ${line}`));
    lines.push('');

    lines.push('Unbroken Support Levels');
    lines.push(...this.levelLines(result.levels.support, NO_SUPPORT_LEVELS).map((line) => `  ${line}`));

    if (options.showData) {
      lines.push('');
      lines.push('Data (bars with ATR)');
      for (const bar of this.barsWithAtr(result)) {
        lines.push(`  ${this.describeBar(bar)}${bar.isSignificant ? ' *' : ''}`);
      }
    }

    return lines.join('\n');
  }

  private formatAsJSON(report: LevelsReport): string {
    return JSON.stringify(report, null, 2);
  }

  private formatAsTable(report: LevelsReport, options: FormatOptions): string {
    const { result } = report;
    const lines: string[] = [];

    lines.push('┌────────────────┬──────────────────────────┐');
    lines.push('│ Metric         │ Value                    │');
    lines.push('├────────────────┼──────────────────────────┤');
    lines.push(`│ Symbol         │ ${this.padRight(report.symbol, 24)} │`);
    lines.push(`│ Window         │ ${this.padRight(`${report.window.start}..${report.window.end}`, 24)} │`);
    lines.push(`│ Bars           │ ${this.padRight(String(result.bars.length), 24)} │`);
    lines.push(`│ ATR Window     │ ${this.padRight(String(result.parameters.windowSize), 24)} │`);
    lines.push(`│ Multiplier     │ ${this.padRight(String(result.parameters.significanceMultiplier), 24)} │`);
    lines.push(`│ Provider       │ ${this.padRight(report.provider, 24)} │`);
    lines.push('└────────────────┴──────────────────────────┘');
    lines.push('');

    lines.push(this.significantHeading(report));
    if (result.significantBars.length === 0) {
      lines.push(NO_SIGNIFICANT_CANDLES);
    } else {
      lines.push(...this.barTable(result.significantBars));
    }
    lines.push('');

    const levels = [...result.levels.resistance, ...result.levels.support];
    if (levels.length === 0) {
      lines.push('Unbroken Levels');
      lines.push(NO_RESISTANCE_LEVELS);
      lines.push(NO_SUPPORT_LEVELS);
    } else {
      lines.push('┌────────────┬────────────┬────────────┐');
      lines.push('│ Kind       │ Date       │ Level      │');
      lines.push('├────────────┼────────────┼────────────┤');
      for (const level of levels) {
        lines.push(
          `│ ${this.padRight(level.kind, 10)} │ ${level.originDate} │ ${this.padLeft(this.formatPrice(level.price), 10)} │`
        );
      }
      lines.push('└────────────┴────────────┴────────────┘');
    }

    if (options.showData) {
      lines.push('');
      lines.push('Data (bars with ATR)');
      lines.push(...this.barTable(this.barsWithAtr(result)));
    }

    return lines.join('\n');
  }

  private formatAsMarkdown(report: LevelsReport, options: FormatOptions): string {
    const { result } = report;
    const lines: string[] = [];

    lines.push(`# Levels Analysis: ${report.symbol}`);
    lines.push('');
    lines.push(`- **Window**: ${report.window.start} to ${report.window.end}`);
    lines.push(`- **Bars**: ${result.bars.length}`);
    lines.push(`- **ATR Window**: ${result.parameters.windowSize}`);
    lines.push(`- **Multiplier**: ${result.parameters.significanceMultiplier}`);
    lines.push(`- **Provider**: ${report.provider}`);
    lines.push('');

    lines.push(`## ${this.significantHeading(report)}`);
    lines.push('');
    if (result.significantBars.length === 0) {
      lines.push(NO_SIGNIFICANT_CANDLES);
    } else {
      lines.push(...this.markdownBarTable(result.significantBars));
    }
    lines.push('');

    lines.push('## Unbroken Resistance Levels');
    lines.push('');
    lines.push(...this.levelLines(result.levels.resistance, NO_RESISTANCE_LEVELS).map((line) => `- ${line}`));
    lines.push('');

    lines.push('## Unbroken Support Levels');
    lines.push('');
    lines.push(...this.levelLines(result.levels.support, NO_SUPPORT_LEVELS).map((line) => `- ${line}`));

    if (options.showData) {
      lines.push('');
      lines.push('## Data (bars with ATR)');
      lines.push('');
      lines.push(...this.markdownBarTable(this.barsWithAtr(result)));
    }

    return lines.join('\n');
  }

  private significantHeading(report: LevelsReport): string {
    return `Significant Candles (TR > ${report.result.parameters.significanceMultiplier} × ATR)`;
  }

  private levelLines(levels: readonly Level[], emptyMessage: string): string[] {
    if (levels.length === 0) {
      return [emptyMessage];
    }
    return levels.map((level) => `Date: ${level.originDate}, Level: ${this.formatPrice(level.price)}`);
  }

  private describeBar(bar: AnnotatedBar): string {
    return [
      bar.date,
      `O ${this.formatPrice(bar.open)}`,
      `H ${this.formatPrice(bar.high)}`,
      `L ${this.formatPrice(bar.low)}`,
      `C ${this.formatPrice(bar.close)}`,
      `TR ${this.formatPrice(bar.trueRange)}`,
      `ATR ${this.formatOptionalPrice(bar.averageTrueRange)}`,
    ].join('  ');
  }

  private barTable(bars: readonly AnnotatedBar[]): string[] {
    const border = (left: string, mid: string, right: string) =>
      `${left}${'─'.repeat(12)}${`${mid}${'─'.repeat(10)}`.repeat(6)}${right}`;
    const cells = (values: string[]) =>
      `│ ${values[0] ?? ''} │ ${values.slice(1).map((value) => this.padLeft(value, 8)).join(' │ ')} │`;

    return [
      border('┌', '┬', '┐'),
      `│ Date       │ ${['Open', 'High', 'Low', 'Close', 'TR', 'ATR'].map((h) => this.padRight(h, 8)).join(' │ ')} │`,
      border('├', '┼', '┤'),
      ...bars.map((bar) =>
        cells([
          bar.date,
          this.formatPrice(bar.open),
          this.formatPrice(bar.high),
          this.formatPrice(bar.low),
          this.formatPrice(bar.close),
          this.formatPrice(bar.trueRange),
          this.formatOptionalPrice(bar.averageTrueRange),
        ])
      ),
      border('└', '┴', '┘'),
    ];
  }

  private markdownBarTable(bars: readonly AnnotatedBar[]): string[] {
    return [
      '| Date | Open | High | Low | Close | TR | ATR |',
      '|------|-----:|-----:|----:|------:|---:|----:|',
      ...bars.map(
        (bar) =>
          `| ${bar.date} | ${this.formatPrice(bar.open)} | ${this.formatPrice(bar.high)} | ${this.formatPrice(bar.low)} | ${this.formatPrice(bar.close)} | ${this.formatPrice(bar.trueRange)} | ${this.formatOptionalPrice(bar.averageTrueRange)} |`
      ),
    ];
  }

  private barsWithAtr(result: AnalysisResult): AnnotatedBar[] {
    return result.bars.filter((bar) => bar.averageTrueRange !== null);
  }

  private formatPrice(value: number): string {
    return value.toFixed(2);
  }

  private formatOptionalPrice(value: number | null): string {
    return value === null ? 'N/A' : value.toFixed(2);
  }

  private padRight(str: string, length: number): string {
    return str.padEnd(length);
  }

  private padLeft(str: string, length: number): string {
    return str.padStart(length);
  }
}
