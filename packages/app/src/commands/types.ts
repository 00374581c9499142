/**
 * Command types and interfaces
 */

import type { OutputFormat } from '../formatters/levels-formatter.js';

/**
 * Base command interface
 */
export interface Command {
  name: string;
  description: string;
  execute(args: string[], options: CommandOptions): Promise<CommandResult>;
}

/**
 * Command execution options
 */
export interface CommandOptions {
  verbose?: boolean;
  format?: OutputFormat;
  showData?: boolean;
  windowSize?: number;
  significanceMultiplier?: number;
  lookbackDays?: number;
}

/**
 * Command execution result
 */
export interface CommandResult {
  success: boolean;
  output: string | null;
  error?: Error;
  duration: number;
  metadata?: Record<string, unknown>;
}
