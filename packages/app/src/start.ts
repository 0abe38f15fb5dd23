/**
 * Application wiring and CLI program
 */

// Load environment variables from .env file
import 'dotenv/config';

import { Command as Program, CommanderError, Option } from 'commander';
import {
  getAllTimeframes,
  parseTimeframe,
  type MarketDataSource,
} from '@signalcheck/contracts';
import { SeriesCache } from '@signalcheck/bars-cache';
import { YahooProvider } from '@signalcheck/provider-yahoo';
import { createLogger, attachGlobalHandlers, type Logger } from '@signalcheck/logger';
import { loadConfig, getConfigSummary, getAnalysisOptions, type Config } from './config/index.js';
import { AnalysisService } from './services/analysis.service.js';
import { AnalyzeCommand } from './commands/analyze.command.js';
import type { OutputFormat } from './formatters/checklist-formatter.js';

export const VERSION = '0.1.0';

export interface App {
  config: Config;
  logger: Logger;
  service: AnalysisService;
  analyzeCommand: AnalyzeCommand;
}

export interface ProgramIO {
  write(text: string): void;
  writeError(text: string): void;
  setExitCode(code: number): void;
}

interface AnalyzeFlags {
  timeframe: string;
  format: string;
  color: boolean;
}

/**
 * Wire the data source, cache and service from configuration.
 * Pass `source` to replace the Yahoo provider.
 */
export function createApp(config: Config, logger: Logger, source?: MarketDataSource): App {
  const dataSource =
    source ??
    new YahooProvider({
      baseUrl: config.provider.baseUrl,
      timeoutMs: config.provider.timeoutMs,
      session: {
        timezone: config.exchange.timezone,
        open: config.exchange.sessionOpen,
        close: config.exchange.sessionClose,
      },
      logger,
    });

  const cache = config.cache.enabled
    ? new SeriesCache({ ttlMs: config.cache.ttlMs, maxEntries: config.cache.maxEntries, logger })
    : undefined;

  const service = new AnalysisService({
    source: dataSource,
    logger,
    cache,
    options: getAnalysisOptions(config),
  });

  return {
    config,
    logger,
    service,
    analyzeCommand: new AnalyzeCommand({ service, logger }),
  };
}

function parseFormat(value: string): OutputFormat {
  return value === 'json' ? 'json' : 'text';
}

/**
 * Build the commander program. Commander errors are thrown, not turned into
 * process exits.
 */
export function createProgram(app: App, io: ProgramIO): Program {
  const program = new Program();

  program
    .name('signalcheck')
    .description('Technical checklist for equity tickers')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.write(text),
      writeErr: (text) => io.writeError(text),
    });

  program
    .command('analyze')
    .description(app.analyzeCommand.description)
    .argument('<symbol>', 'ticker, e.g. TCS.NS or AAPL')
    .addOption(
      new Option('-t, --timeframe <timeframe>', 'chart timeframe').choices(getAllTimeframes()).default('1d')
    )
    .addOption(new Option('-f, --format <format>', 'output format').choices(['text', 'json']).default('text'))
    .option('--no-color', 'plain text output')
    .action(async (symbol: string, flags: AnalyzeFlags) => {
      // Without --no-color the terminal's detected support decides
      const color = flags.color ? undefined : false;
      const result = await app.analyzeCommand.execute(
        { symbol, timeframe: parseTimeframe(flags.timeframe) },
        { format: parseFormat(flags.format), color }
      );
      io.write(`${result.output}\n`);
      io.setExitCode(result.success ? 0 : 1);
    });

  return program;
}

class ProcessIO implements ProgramIO {
  exitCode = 0;

  write(text: string): void {
    process.stdout.write(text);
  }

  writeError(text: string): void {
    process.stderr.write(text);
  }

  setExitCode(code: number): void {
    this.exitCode = code;
  }
}

/**
 * Main startup function
 *
 * @returns the process exit code
 */
export async function start(argv: string[], env: Record<string, string | undefined> = process.env): Promise<number> {
  let config: Config;
  try {
    config = loadConfig(env);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`${message}\n`);
    return 1;
  }

  const logger = createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
    stderr: true,
  });

  attachGlobalHandlers(logger);
  logger.debug('Configuration loaded', { ...getConfigSummary(config), operation: 'app_startup' });

  const io = new ProcessIO();

  try {
    const app = createApp(config, logger);
    await createProgram(app, io).parseAsync(argv);
    return io.exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    logger.error('Application startup failed', { error });
    return 1;
  }
}
