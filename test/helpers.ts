/**
 * Shared test helpers: mock factories for all modules.
 */

import type { OptionChain, OptionContract, PriceBar } from '../src/core/types.js';
import type { Logger } from '../src/core/logger.js';
import type { Metrics } from '../src/core/metrics.js';
import { metricKey } from '../src/core/metrics.js';
import type { AlertService } from '../src/alerts/interface.js';
import type { IndicatorSet, OIAnalysis, TechnicalSnapshot } from '../src/strategy/types.js';
import { TechnicalAnalyzer } from '../src/strategy/technical/technicalAnalyzer.js';
import { InsufficientDataError } from '../src/core/errors.js';

// ── Mock Logger ─────────────────────────────────────────────────────

export const createMockLogger = (): Logger => {
  const logger: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => logger,
  };
  return logger;
};

// ── Mock Metrics ────────────────────────────────────────────────────

export const createMockMetrics = (): Metrics & { counters: Map<string, number> } => {
  const counters = new Map<string, number>();
  return {
    counters,
    increment(name: string, value = 1, tags?: Record<string, string>) {
      const key = metricKey(name, tags);
      counters.set(key, (counters.get(key) ?? 0) + value);
    },
    gauge() {},
  };
};

// ── Mock Alert ──────────────────────────────────────────────────────

export const createMockAlert = (): AlertService & { calls: Array<{ title: string; message: string }> } => {
  const calls: Array<{ title: string; message: string }> = [];
  return {
    calls,
    async notify(title: string, message: string) { calls.push({ title, message }); },
  };
};

// ── Bar Factory ─────────────────────────────────────────────────────

/** 2026-10-12 09:15 IST */
export const SESSION_OPEN = Date.UTC(2026, 9, 12, 3, 45);
const FIVE_MIN = 5 * 60_000;

export function makeBar(overrides: Partial<PriceBar> = {}): PriceBar {
  return {
    time: SESSION_OPEN,
    open: 100,
    high: 101,
    low: 99,
    close: 100,
    volume: 1000,
    ...overrides,
  };
}

/**
 * Five-minute bars moving `step` per bar. Each bar closes half a step past
 * its open, with a one-point wick either side.
 */
export function makeBarSeries(
  count: number,
  direction: 'up' | 'down' = 'up',
  opts: { startPrice?: number; step?: number; startTime?: number; volume?: number } = {}
): PriceBar[] {
  const startPrice = opts.startPrice ?? 1000;
  const step = (opts.step ?? 10) * (direction === 'up' ? 1 : -1);
  const startTime = opts.startTime ?? SESSION_OPEN;

  return Array.from({ length: count }, (_, i) => {
    const open = startPrice + step * i;
    const close = open + step / 2;
    return {
      time: startTime + i * FIVE_MIN,
      open,
      high: Math.max(open, close) + 1,
      low: Math.min(open, close) - 1,
      close,
      volume: opts.volume ?? 1000,
    };
  });
}

/** 20 bars: ten flat lead-in bars, then the given window. */
export function makePatternBars(window: Array<{ high: number; low: number; close: number }>): PriceBar[] {
  const lead = Array.from({ length: 20 - window.length }, (_, i) =>
    makeBar({ time: SESSION_OPEN + i * FIVE_MIN })
  );
  const tail = window.map((w, i) =>
    makeBar({ time: SESSION_OPEN + (lead.length + i) * FIVE_MIN, open: w.close, ...w })
  );
  return [...lead, ...tail];
}

// ── Option Factories ────────────────────────────────────────────────

export function makeContract(overrides: Partial<OptionContract> = {}): OptionContract {
  const strike = overrides.strike ?? 19850;
  const type = overrides.type ?? 'CALL';
  return {
    underlying: 'NIFTY',
    tradingSymbol: `NIFTY26OCT${strike}${type === 'CALL' ? 'CE' : 'PE'}`,
    strike,
    type,
    expiry: '2026-10-27',
    lastPrice: 100,
    openInterest: 1000,
    volume: 100,
    ...overrides,
  };
}

export function makeChain(contracts: OptionContract[], overrides: Partial<OptionChain> = {}): OptionChain {
  return {
    underlying: 'NIFTY',
    spotPrice: 19850,
    timestamp: SESSION_OPEN,
    contracts,
    ...overrides,
  };
}

/**
 * Call OI 1000 vs put OI 1500 (PCR 1.5). The 19900 call is the most liquid
 * out-of-the-money call and trades at 150.
 */
export function makeBullishChain(underlying = 'NIFTY'): OptionChain {
  const c = (o: Partial<OptionContract>) => makeContract({ underlying, ...o });
  return makeChain(
    [
      c({ strike: 19800, type: 'CALL', openInterest: 100, volume: 10, lastPrice: 190 }),
      c({ strike: 19850, type: 'CALL', openInterest: 200, volume: 20, lastPrice: 170 }),
      c({ strike: 19900, type: 'CALL', openInterest: 500, volume: 80, lastPrice: 150 }),
      c({ strike: 19950, type: 'CALL', openInterest: 200, volume: 30, lastPrice: 120 }),
      c({ strike: 19800, type: 'PUT', openInterest: 900, volume: 40, lastPrice: 90 }),
      c({ strike: 19850, type: 'PUT', openInterest: 600, volume: 50, lastPrice: 110 }),
    ],
    { underlying }
  );
}

// ── Analysis Factories ──────────────────────────────────────────────

/** Scores 75 and votes Bullish on all three trend inputs. */
export function makeIndicators(overrides: Partial<IndicatorSet> = {}): IndicatorSet {
  return {
    rsi: 55,
    macd: 1.2,
    macdSignal: 0.8,
    macdHistogram: 0.4,
    ema20: 101,
    sma50: 100,
    bbUpper: 103,
    bbMiddle: 101,
    bbLower: 99,
    vwap: 100,
    adx: 28,
    plusDi: 25,
    minusDi: 15,
    stochK: 60,
    stochD: 55,
    close: 100.2,
    volume: 1000,
    ...overrides,
  };
}

export function makeTechnical(
  overrides: Partial<Omit<TechnicalSnapshot, 'indicators'>> & { indicators?: Partial<IndicatorSet> } = {}
): TechnicalSnapshot {
  const { indicators, ...rest } = overrides;
  return {
    indicators: makeIndicators(indicators),
    pattern: 'Upward Breakout',
    trend: 'Bullish',
    strength: 75,
    volatility: 'Medium',
    barCount: 200,
    ...rest,
  };
}

export function makeOi(overrides: Partial<OIAnalysis> = {}): OIAnalysis {
  return {
    totalCallOi: 1000,
    totalPutOi: 1500,
    putCallRatio: 1.5,
    atmStrike: 19850,
    maxCallOiStrike: 19900,
    maxPutOiStrike: 19800,
    supportLevel: 19800,
    resistanceLevel: 19900,
    sentiment: 'Bullish',
    strength: 'Strong',
    ...overrides,
  };
}

/**
 * Returns a fixed snapshot for any history of at least 50 bars, so engine
 * tests control the technical side directly.
 */
export class FixedTechnicalAnalyzer extends TechnicalAnalyzer {
  constructor(public snapshot: TechnicalSnapshot) {
    super();
  }

  override analyze(bars: readonly PriceBar[]): TechnicalSnapshot {
    if (bars.length < 50) {
      throw new InsufficientDataError(`need 50 bars, got ${bars.length}`);
    }
    return { ...this.snapshot, barCount: bars.length };
  }
}
