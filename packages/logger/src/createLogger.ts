/**
 * @fileoverview Logger factory
 * Creates configured Winston loggers with structured fields, PII redaction
 * and console/file/stream transports.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, LogFields, Logger, LogLevel } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

const ALL_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Creates a configured logger instance.
 *
 * The format chain redacts sensitive fields first, then adds the timestamp, error stacks
 * and the current request_id, then renders JSON or the pretty single-line form.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Analysis complete', { symbol: 'AAPL', count: 3 });
 * ```
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', json: false, filePath: './logs/levelscope.log' });
 * const providerLogger = logger.child({ component: 'provider-yahoo' });
 * providerLogger.debug('Fetching chart', { symbol: 'MSFT' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stream,
  } = config;

  // Order matters: redaction must run before anything renders the entry
  const logFormat = format.combine(redactPII(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
        stderrLevels: ALL_LEVELS,
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        // Files never get colour codes
        format: format.combine(redactPII(), standardFields, format.json()),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (stream) {
    transports.push(new winston.transports.Stream({ stream, level, format: logFormat }));
  }

  return winston.createLogger({
    level,
    transports,
    // Uncaught errors are handled by attachGlobalHandlers
    exitOnError: false,
    // Winston warns about a logger without transports; console: false with no file is allowed
    silent: transports.length === 0,
  });
}

/**
 * Creates a child logger whose entries always carry the given fields.
 *
 * @example
 * ```typescript
 * const commandLogger = createChildLogger(logger, { component: 'levels-command' });
 * commandLogger.info('Running'); // includes component=levels-command
 * ```
 */
export function createChildLogger(logger: Logger, context: LogFields): Logger {
  return logger.child(context);
}
