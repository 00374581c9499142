/**
 * Tests for FixtureProvider
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  InvalidParameterError,
  ProviderError,
  SymbolResolutionError,
} from '@levelscope/contracts';
import { FixtureProvider } from '../src/services/providers/fixture-provider.js';

describe('FixtureProvider', () => {
  const provider = new FixtureProvider();

  it('should report daily capabilities without authentication', () => {
    expect(provider.name).toBe('fixture');
    expect(provider.capabilities()).toEqual({
      intervals: ['1d'],
      requiresAuthentication: false,
    });
  });

  it('should list bundled symbols', async () => {
    await expect(provider.symbols()).resolves.toEqual(['AAPL', 'MSFT']);
  });

  it('should return bars inside the inclusive range', async () => {
    const bars = await provider.getDailyBars({ symbol: 'AAPL', from: '2025-01-06', to: '2025-01-10' });

    expect(bars.map((bar) => bar.date)).toEqual([
      '2025-01-06',
      '2025-01-07',
      '2025-01-08',
      '2025-01-09',
      '2025-01-10',
    ]);
    expect(bars[0]).toEqual({
      date: '2025-01-06',
      open: 226.21,
      high: 227.2,
      low: 226.09,
      close: 226.82,
      volume: 23337795,
    });
  });

  it('should match symbols case-insensitively', async () => {
    const bars = await provider.getDailyBars({ symbol: ' aapl ', from: '2025-01-06', to: '2025-01-10' });

    expect(bars).toHaveLength(5);
  });

  it('should return an empty list for a range without bars', async () => {
    const bars = await provider.getDailyBars({ symbol: 'MSFT', from: '2025-01-04', to: '2025-01-05' });

    expect(bars).toEqual([]);
  });

  it('should reject unknown symbols', async () => {
    const request = provider.getDailyBars({ symbol: 'ZZZZ', from: '2025-01-06', to: '2025-01-10' });

    await expect(request).rejects.toBeInstanceOf(SymbolResolutionError);
    await expect(request).rejects.toThrow('No fixture data for symbol: ZZZZ (available: AAPL, MSFT)');
  });

  it('should reject malformed dates', async () => {
    await expect(
      provider.getDailyBars({ symbol: 'AAPL', from: '2025/01/06', to: '2025-01-10' })
    ).rejects.toBeInstanceOf(InvalidParameterError);
  });

  describe('custom fixture files', () => {
    let directory: string;

    beforeAll(async () => {
      directory = await mkdtemp(join(tmpdir(), 'levelscope-fixtures-'));
      await writeFile(join(directory, 'broken.json'), '{ not json');
      await writeFile(join(directory, 'wrong-shape.json'), JSON.stringify({ TEST: [{ date: '2025-01-02' }] }));
      await writeFile(
        join(directory, 'custom.json'),
        JSON.stringify({
          test: [{ date: '2025-01-02', open: 10, high: 11, low: 9, close: 10.5, volume: 100 }],
        })
      );
    });

    afterAll(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it('should load a custom file and upper-case its symbols', async () => {
      const custom = new FixtureProvider({ fixturePath: join(directory, 'custom.json') });

      await expect(custom.symbols()).resolves.toEqual(['TEST']);
      await expect(
        custom.getDailyBars({ symbol: 'test', from: '2025-01-01', to: '2025-01-31' })
      ).resolves.toEqual([{ date: '2025-01-02', open: 10, high: 11, low: 9, close: 10.5, volume: 100 }]);
    });

    it('should raise ProviderError for a missing file', async () => {
      const missing = new FixtureProvider({ fixturePath: join(directory, 'missing.json') });
      const request = missing.symbols();

      await expect(request).rejects.toBeInstanceOf(ProviderError);
      await expect(request).rejects.toThrow(/^Failed to read fixture file: /);
    });

    it('should raise ProviderError for invalid JSON', async () => {
      const broken = new FixtureProvider({ fixturePath: join(directory, 'broken.json') });

      await expect(broken.symbols()).rejects.toThrow(/^Fixture file is not valid JSON: /);
    });

    it('should raise ProviderError for an unexpected shape', async () => {
      const wrongShape = new FixtureProvider({ fixturePath: join(directory, 'wrong-shape.json') });

      await expect(wrongShape.symbols()).rejects.toThrow(/^Fixture file has an unexpected shape: /);
    });
  });
});
