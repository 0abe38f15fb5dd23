/**
 * Analyze command implementation
 */

import { isNoResult, type Timeframe } from '@signalcheck/contracts';
import type { Logger } from '@signalcheck/logger';
import type { AnalysisService } from '../services/analysis.service.js';
import { ChecklistFormatter } from '../formatters/checklist-formatter.js';
import type { Command, CommandOptions, CommandResult } from './types.js';

export interface AnalyzeCommandConfig {
  service: AnalysisService;
  logger: Logger;
}

export interface AnalyzeArgs {
  symbol: string;
  timeframe: Timeframe;
  signal?: AbortSignal;
}

/**
 * `analyze` command - runs the checklist for one symbol and timeframe
 */
export class AnalyzeCommand implements Command<AnalyzeArgs> {
  name = 'analyze';
  description = 'Run the technical checklist for a symbol';

  private service: AnalysisService;
  private logger: Logger;

  constructor(config: AnalyzeCommandConfig) {
    this.service = config.service;
    this.logger = config.logger.child({ component: 'analyze-command' });
  }

  async execute(args: AnalyzeArgs, options: CommandOptions): Promise<CommandResult> {
    const startTime = Date.now();
    const format = options.format ?? 'text';

    this.logger.debug('Executing analyze command', {
      symbol: args.symbol,
      timeframe: args.timeframe,
      format,
    });

    const response = await this.service.analyze(args.symbol, args.timeframe, { signal: args.signal });
    const formatter = new ChecklistFormatter({ color: options.color });
    const output = formatter.format(response, format);

    if (isNoResult(response)) {
      return {
        success: false,
        output,
        duration: Date.now() - startTime,
        metadata: { symbol: response.symbol, timeframe: response.timeframe, code: response.code },
      };
    }

    return {
      success: true,
      output,
      duration: Date.now() - startTime,
      metadata: {
        symbol: response.symbol,
        timeframe: response.timeframe,
        verdict: response.verdict,
        passingCount: response.passingCount,
      },
    };
  }
}
