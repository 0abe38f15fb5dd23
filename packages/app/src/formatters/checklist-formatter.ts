/**
 * Checklist report formatter
 * Renders an analysis response (or the uniform failure state) as text or JSON
 */

import chalk, { Chalk, type ChalkInstance, type ColorSupportLevel } from 'chalk';
import { getTimeframeLabel, isNoResult } from '@signalcheck/contracts';
import type { AnalysisResponse, NoResult, Verdict } from '@signalcheck/contracts';
import { buildChecklist, VERDICT_LABELS } from '@signalcheck/analysis-kit';

export type OutputFormat = 'text' | 'json';

export interface FormatterOptions {
  /**
   * ANSI colours in text output. Unset follows the terminal's detected
   * support; true forces at least basic colours.
   */
  color?: boolean;
}

const VERDICT_ICONS: Record<Verdict, string> = {
  strong: '✅',
  neutral: '⚠️',
  avoid: '❌',
};

export const FAILURE_HINTS: readonly string[] = [
  'Symbol format (e.g. TCS.NS, AAPL)',
  'Internet connection',
  'Try different timeframe',
];

/**
 * Formatter for checklist analysis output
 */
export class ChecklistFormatter {
  private readonly chalk: ChalkInstance;

  constructor(options: FormatterOptions = {}) {
    this.chalk = new Chalk({ level: colorLevel(options.color) });
  }

  format(response: AnalysisResponse | NoResult, format: OutputFormat = 'text'): string {
    if (isNoResult(response)) {
      return format === 'json' ? JSON.stringify(response, null, 2) : this.formatFailure();
    }

    switch (format) {
      case 'json':
        return this.formatAsJSON(response);
      case 'text':
      default:
        return this.formatAsText(response);
    }
  }

  /**
   * The failure message never mentions the cause; that goes to the logs.
   */
  private formatFailure(): string {
    const lines = [this.chalk.red('❌ Analysis failed. Check:')];
    for (const hint of FAILURE_HINTS) {
      lines.push(`- ${hint}`);
    }
    return lines.join('\n');
  }

  private formatAsText(response: AnalysisResponse): string {
    const { chalk } = this;
    const lines: string[] = [];

    // Header
    lines.push(chalk.bold(`Analysis: ${response.symbol} - ${getTimeframeLabel(response.timeframe)}`));
    lines.push('='.repeat(50));
    lines.push('');

    lines.push(`Results (${response.passingCount}/6 criteria met)`);
    lines.push(this.colorVerdict(response.verdict, `${VERDICT_ICONS[response.verdict]} ${VERDICT_LABELS[response.verdict]}`));
    lines.push('');

    // Checklist
    for (const entry of buildChecklist(response.signals)) {
      lines.push(entry.passed ? chalk.green(`✅ ${entry.label}`) : chalk.red(`❌ ${entry.label}`));
    }
    lines.push('');

    // Risk
    lines.push(`Stop Loss: ${response.stopLoss.toFixed(2)}`);
    lines.push(`Target: ${response.target.toFixed(2)}`);
    lines.push(`R/R Ratio: ${response.rrRatio.toFixed(2)}`);
    lines.push(`EMA: ${response.emaLast.toFixed(2)}`);
    lines.push(`ATR: ${response.atr.toFixed(2)}`);
    lines.push('');

    // Levels
    lines.push(`Support: ${formatLevels(response.levels.support)}`);
    lines.push(`Resistance: ${formatLevels(response.levels.resistance)}`);
    lines.push('');

    lines.push(`As of: ${response.asOf}`);

    return lines.join('\n');
  }

  private formatAsJSON(response: AnalysisResponse): string {
    return JSON.stringify(response, null, 2);
  }

  private colorVerdict(verdict: Verdict, text: string): string {
    switch (verdict) {
      case 'strong':
        return this.chalk.green.bold(text);
      case 'neutral':
        return this.chalk.yellow.bold(text);
      case 'avoid':
        return this.chalk.red.bold(text);
    }
  }
}

function colorLevel(color: boolean | undefined): ColorSupportLevel {
  if (color === false) return 0;
  if (color === true && chalk.level === 0) return 1;
  return chalk.level;
}

function formatLevels(levels: readonly number[]): string {
  return levels.length === 0 ? 'none' : levels.map((level) => level.toFixed(2)).join(', ');
}
