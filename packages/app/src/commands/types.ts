/**
 * Command types and interfaces
 */

import type { OutputFormat } from '../formatters/checklist-formatter.js';

/**
 * Base command interface
 */
export interface Command<TArgs> {
  name: string;
  description: string;
  execute(args: TArgs, options: CommandOptions): Promise<CommandResult>;
}

/**
 * Command execution options
 */
export interface CommandOptions {
  format?: OutputFormat;
  color?: boolean;
}

/**
 * Command execution result
 */
export interface CommandResult {
  success: boolean;
  output: string;
  duration?: number;
  metadata?: Record<string, unknown>;
}
