/**
 * @signalcheck/app
 * Request boundary, configuration and CLI
 */

export { AnalysisService } from './services/analysis.service.js';
export type { AnalysisServiceConfig, AnalyzeRequestOptions } from './services/analysis.service.js';

export { ChecklistFormatter, FAILURE_HINTS } from './formatters/checklist-formatter.js';
export type { OutputFormat, FormatterOptions } from './formatters/checklist-formatter.js';

export { AnalyzeCommand } from './commands/analyze.command.js';
export type { AnalyzeArgs, AnalyzeCommandConfig } from './commands/analyze.command.js';
export type { Command, CommandOptions, CommandResult } from './commands/types.js';

export { loadConfig, getConfigSummary, getAnalysisOptions, configSchema, envMapping } from './config/index.js';
export type { Config } from './config/index.js';

export { createApp, createProgram, start, VERSION } from './start.js';
export type { App, ProgramIO } from './start.js';
