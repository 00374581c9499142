/**
 * @fileoverview Type definitions for the levelscope logger
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity of messages that will be logged.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env['NODE_ENV'] === 'production',
 *   filePath: './logs/levelscope.log',
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Machine-readable JSON lines instead of the coloured single-line format.
   * @default true when NODE_ENV is 'production'
   */
  json?: boolean;

  /**
   * Also append every entry to this file.
   */
  filePath?: string;

  /**
   * Console output. Console entries go to stderr so stdout only carries command output.
   * @default true
   */
  console?: boolean;

  /**
   * Extra destination stream, written in the same format as the console.
   */
  stream?: NodeJS.WritableStream;
}

/**
 * Fields the application attaches to log entries.
 * Anything else may be added through the index signature.
 */
export interface LogFields {
  /** Component or module name (usually set through a child logger) */
  component?: string;

  /** Ticker under analysis */
  symbol?: string;

  /** Series loader name ("yahoo", "fixture") */
  provider?: string;

  /** Correlation ID of the current command run */
  request_id?: string;

  /** Operation name */
  operation?: string;

  /** Operation duration in milliseconds */
  duration_ms?: number;

  /** Operation outcome ("success", "error") */
  result?: string;

  /** Error code when result is "error" */
  error_code?: string;

  /** Number of items processed */
  count?: number;

  [key: string]: unknown;
}

/**
 * Winston's Logger, re-exported so consumers never import winston directly.
 */
export type Logger = WinstonLogger;
