import { afterEach, describe, expect, it, vi } from 'vitest';
import { configSchema } from '../../src/config/schema.js';
import { loadConfig } from '../../src/config/load.js';
import { ConfigError } from '../../src/core/errors.js';

describe('config schema', () => {
  it('applies the engine defaults', () => {
    const parsed = configSchema.parse({});
    expect(parsed.engine.minConfidence).toBe(75);
    expect(parsed.engine.maxSignalsPerDay).toBe(8);
    expect(parsed.engine.sessionUtcOffsetMinutes).toBe(330);
    expect(parsed.risk).toEqual({ minRiskReward: 2, maxRiskPerTrade: 500, maxPositionUnits: 10 });
    expect(parsed.instruments.primary).toEqual(['NIFTY', 'BANKNIFTY']);
    expect(parsed.instruments.maxStockScans).toBe(3);
  });

  it('parses instrument lists and numbers', () => {
    const parsed = configSchema.parse({
      PRIMARY_INSTRUMENTS: ' nifty, finnifty ,',
      MIN_CONFIDENCE: '80',
      MAX_SIGNALS_PER_DAY: '3',
    });
    expect(parsed.instruments.primary).toEqual(['NIFTY', 'FINNIFTY']);
    expect(parsed.engine.minConfidence).toBe(80);
    expect(parsed.engine.maxSignalsPerDay).toBe(3);
  });

  it('rejects a history lookback shorter than the slow average', () => {
    expect(configSchema.safeParse({ HISTORY_LOOKBACK: '20' }).success).toBe(false);
  });
});

describe('loadConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reads process.env by default', () => {
    vi.stubEnv('MAX_SIGNALS_PER_DAY', '3');
    expect(loadConfig().engine.maxSignalsPerDay).toBe(3);
  });

  it('validates only the env it is given', () => {
    vi.stubEnv('MAX_SIGNALS_PER_DAY', '3');
    const config = loadConfig({ MIN_CONFIDENCE: '80' });
    expect(config.engine.minConfidence).toBe(80);
    expect(config.engine.maxSignalsPerDay).toBe(8);
  });

  it('throws ConfigError listing the bad key', () => {
    const env = { MIN_CONFIDENCE: 'high' };
    expect(() => loadConfig(env)).toThrow(ConfigError);
    expect(() => loadConfig(env)).toThrow(/MIN_CONFIDENCE/);
  });
});
