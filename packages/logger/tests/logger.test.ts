/**
 * @fileoverview Tests for logger creation, formats and child loggers
 */

import { describe, it, expect } from 'vitest';
import { createLogger, createChildLogger } from '../src/createLogger.js';
import { setRequestContext, withRequestContext } from '../src/request-context.js';
import type { LoggerConfig } from '../src/types.js';
import { captureLogs, flush } from './capture.js';

describe('createLogger', () => {
  it('should create a logger at every level', () => {
    const levels: LoggerConfig['level'][] = ['error', 'warn', 'info', 'debug'];

    for (const level of levels) {
      expect(createLogger({ level, console: false }).level).toBe(level);
    }
  });

  it('should write JSON entries with message, fields and timestamp', async () => {
    const capture = captureLogs();
    const logger = createLogger({ level: 'info', json: true, console: false, stream: capture.stream });

    logger.info('Analysis complete', { symbol: 'AAPL', count: 3 });
    await flush();

    const [entry] = capture.entries();
    expect(entry?.['message']).toBe('Analysis complete');
    expect(entry?.['level']).toBe('info');
    expect(entry?.['symbol']).toBe('AAPL');
    expect(entry?.['count']).toBe(3);
    expect(typeof entry?.['timestamp']).toBe('string');
  });

  it('should filter entries below the configured level', async () => {
    const capture = captureLogs();
    const logger = createLogger({ level: 'warn', json: true, console: false, stream: capture.stream });

    logger.info('hidden');
    logger.debug('hidden');
    logger.warn('shown');
    await flush();

    expect(capture.entries().map((entry) => entry['message'])).toEqual(['shown']);
  });

  it('should include child logger context in every entry', async () => {
    const capture = captureLogs();
    const logger = createLogger({ level: 'info', json: true, console: false, stream: capture.stream });

    const child = createChildLogger(logger, { component: 'levels-command' });
    child.info('first');
    child.info('second');
    await flush();

    expect(capture.entries().map((entry) => entry['component'])).toEqual([
      'levels-command',
      'levels-command',
    ]);
  });

  it('should inject request_id from the active request context', async () => {
    const capture = captureLogs();
    const logger = createLogger({ level: 'info', json: true, console: false, stream: capture.stream });

    await withRequestContext(async () => {
      logger.info('inside');
    }, 'req-test-1');
    logger.info('outside');
    await flush();

    const [inside, outside] = capture.entries();
    expect(inside?.['request_id']).toBe('req-test-1');
    expect(outside).not.toHaveProperty('request_id');
  });

  it('should add merged context fields unless the entry sets them', async () => {
    const capture = captureLogs();
    const logger = createLogger({ level: 'info', json: true, console: false, stream: capture.stream });

    await withRequestContext(
      async () => {
        setRequestContext({ symbol: 'MSFT' });
        logger.info('loaded');
        logger.info('override', { symbol: 'AAPL' });
      },
      'req-test-4',
      { operation: 'levels' }
    );
    await flush();

    const [loaded, override] = capture.entries();
    expect(loaded?.['operation']).toBe('levels');
    expect(loaded?.['symbol']).toBe('MSFT');
    expect(override?.['symbol']).toBe('AAPL');
  });

  it('should render a pretty single line when json is off', async () => {
    const capture = captureLogs();
    const logger = createLogger({ level: 'info', json: false, console: false, stream: capture.stream });

    logger.info('Bars loaded', { component: 'provider-yahoo', symbol: 'MSFT', count: 41 });
    await flush();

    const [line] = capture.lines;
    expect(line).toMatch(/^\[.+\] .*info.*: Bars loaded component=provider-yahoo symbol=MSFT count=41$/);
  });
});
