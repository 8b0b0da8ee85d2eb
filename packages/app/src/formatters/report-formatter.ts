/**
 * Analysis report formatter
 * Plain text for terminals, JSON for scripts
 */

import { getIntervalLabel, isIntradayInterval, signalToAction } from '@marketlens/contracts';
import type { Interval } from '@marketlens/contracts';
import type { AnalysisReport, ScreenResult } from '../services/analysis-service.js';

export type OutputFormat = 'text' | 'json';

const SIGNAL_NAME_WIDTH = 17;
const ACTION_WIDTH = 6;

/**
 * Formatter for analysis reports and screen results
 */
export class ReportFormatter {
  format(report: AnalysisReport, format: OutputFormat = 'text'): string {
    return format === 'json' ? JSON.stringify(report, null, 2) : this.formatAsText(report);
  }

  formatScreen(results: readonly ScreenResult[], format: OutputFormat = 'text'): string {
    return format === 'json' ? JSON.stringify(results, null, 2) : this.formatScreenAsText(results);
  }

  private formatAsText(report: AnalysisReport): string {
    const { consensus, context } = report;
    const lines: string[] = [];

    lines.push(`Analysis: ${report.symbol} - ${report.period} / ${getIntervalLabel(report.interval)}`);
    lines.push('='.repeat(50));
    lines.push('');

    lines.push(
      `Consensus: ${consensus.action.toUpperCase()} (confidence ${consensus.confidence.toFixed(2)})`
    );
    lines.push(`  Buy Score: ${consensus.buyScore.toFixed(2)}`);
    lines.push(`  Sell Score: ${consensus.sellScore.toFixed(2)}`);
    lines.push(
      `  Votes: ${consensus.buyCount} buy, ${consensus.sellCount} sell, ${consensus.holdCount} hold`
    );
    lines.push('');

    lines.push('Signals:');
    for (const [name, signal] of Object.entries(report.signals)) {
      const action = signalToAction(signal).toUpperCase();
      lines.push(
        `  ${name.padEnd(SIGNAL_NAME_WIDTH)}${action.padEnd(ACTION_WIDTH)}${signal.strength.toFixed(2)}`
      );
    }
    lines.push('');

    lines.push('Market:');
    const change =
      context.changePercent === undefined ? '' : ` (${this.formatPercent(context.changePercent)})`;
    lines.push(`  Close: ${this.formatPrice(context.close)}${change}`);
    lines.push(`  Volume: ${context.volume.toLocaleString('en-US')}`);

    if (!report.indicatorsAvailable) {
      lines.push('  Indicators: unavailable');
    } else {
      if (context.macd !== undefined) {
        const signalLine =
          context.signalLine === undefined ? '' : ` (signal ${context.signalLine.toFixed(4)})`;
        lines.push(`  MACD: ${context.macd.toFixed(4)}${signalLine}`);
      }
      if (context.rsi !== undefined) {
        lines.push(`  RSI: ${context.rsi.toFixed(2)}`);
      }
      if (context.bandPosition !== undefined) {
        lines.push(`  Bollinger: ${context.bandPosition.replace('_', ' ')}`);
      }
    }
    lines.push('');

    if (report.resistanceLevels.length > 0) {
      lines.push('Resistance:');
      for (const level of report.resistanceLevels) {
        lines.push(`  ${this.formatPrice(level.price)} (strength ${level.strength.toFixed(2)})`);
      }
      lines.push('');
    }

    lines.push('Statistics:');
    lines.push(`  Bars Analyzed: ${report.barCount}`);
    lines.push(`  As Of: ${this.formatAsOf(report.asOf, report.interval)}`);

    return lines.join('\n');
  }

  private formatScreenAsText(results: readonly ScreenResult[]): string {
    if (results.length === 0) {
      return 'No symbols screened';
    }

    const lines: string[] = [];
    lines.push(
      `${this.padRight('Symbol', 8)}${this.padRight('Action', 8)}${this.padRight('Confidence', 12)}${this.padRight('Close', 12)}Bars`
    );
    lines.push('-'.repeat(44));

    for (const result of results) {
      if (result.status === 'ok') {
        const { report } = result;
        lines.push(
          this.padRight(result.symbol, 8) +
            this.padRight(report.consensus.action.toUpperCase(), 8) +
            this.padRight(report.consensus.confidence.toFixed(2), 12) +
            this.padRight(this.formatPrice(report.context.close), 12) +
            String(report.barCount)
        );
      } else {
        lines.push(
          `${this.padRight(result.symbol, 8)}${this.padRight('ERROR', 8)}${result.error.code}: ${result.error.message}`
        );
      }
    }

    const ok = results.filter((r) => r.status === 'ok').length;
    lines.push('');
    lines.push(`${ok} of ${results.length} symbols analyzed`);

    return lines.join('\n');
  }

  /** Daily and longer bars show the date only */
  private formatAsOf(timestamp: string, interval: Interval): string {
    return isIntradayInterval(interval) ? timestamp : timestamp.slice(0, 10);
  }

  private formatPrice(price: number): string {
    return price.toFixed(2);
  }

  private formatPercent(value: number): string {
    return `${value >= 0 ? '+' : ''}${value.toFixed(2)}%`;
  }

  private padRight(text: string, width: number): string {
    return text.padEnd(width);
  }
}

const defaultFormatter = new ReportFormatter();

export function formatReport(report: AnalysisReport, format: OutputFormat = 'text'): string {
  return defaultFormatter.format(report, format);
}

export function formatScreenResults(
  results: readonly ScreenResult[],
  format: OutputFormat = 'text'
): string {
  return defaultFormatter.formatScreen(results, format);
}
