import { describe, it, expect } from 'vitest';
import { IndicatorCalculator, sessionVwap } from '../../../src/strategy/technical/indicatorCalculator.js';
import { InsufficientDataError } from '../../../src/core/errors.js';
import { makeBar, makeBarSeries } from '../../helpers.js';

describe('IndicatorCalculator', () => {
  const calc = new IndicatorCalculator();

  it('needs the slow-average lookback', () => {
    expect(calc.minBars).toBe(50);
  });

  it('reports insufficient data instead of defaulting values', () => {
    const bars = makeBarSeries(49);
    expect(() => calc.compute(bars)).toThrow(InsufficientDataError);
    try {
      calc.compute(bars);
    } catch (err) {
      expect(err).toBeInstanceOf(InsufficientDataError);
      if (err instanceof InsufficientDataError) {
        expect(err.code).toBe('INSUFFICIENT_DATA');
        expect(err.details).toEqual({ required: 50, received: 49 });
      }
    }
  });

  it('rejects an empty history', () => {
    expect(() => calc.compute([])).toThrow(InsufficientDataError);
  });

  it('computes the full battery on a rising series', () => {
    const bars = makeBarSeries(60, 'up');
    const ind = calc.compute(bars);

    // closes are 1005, 1015, ... 1595
    expect(ind.close).toBe(1595);
    expect(ind.volume).toBe(1000);
    expect(ind.sma50).toBeCloseTo(1350, 6);
    expect(ind.bbMiddle).toBeCloseTo(1575, 6);
    expect(ind.bbUpper).toBeGreaterThan(ind.bbMiddle);
    expect(ind.bbLower).toBeLessThan(ind.bbMiddle);
    expect(ind.ema20).toBeGreaterThan(ind.sma50);
    expect(ind.rsi).toBeGreaterThan(70);
    expect(ind.macd).toBeGreaterThan(0);
    expect(ind.adx).toBeGreaterThan(25);
    expect(ind.plusDi).toBeGreaterThan(ind.minusDi);
    expect(ind.stochK).toBeGreaterThan(80);
    // one session, equal volume: mean typical price = mean open + 10/3
    expect(ind.vwap).toBeCloseTo(1298.3333, 3);
  });

  it('computes a bearish battery on a falling series', () => {
    const ind = calc.compute(makeBarSeries(60, 'down', { startPrice: 2000 }));
    expect(ind.ema20).toBeLessThan(ind.sma50);
    expect(ind.rsi).toBeLessThan(30);
    expect(ind.macd).toBeLessThan(0);
    expect(ind.minusDi).toBeGreaterThan(ind.plusDi);
  });

  it('every value is finite', () => {
    const ind = calc.compute(makeBarSeries(120, 'up'));
    for (const value of Object.values(ind)) {
      expect(Number.isFinite(value)).toBe(true);
    }
  });
});

describe('sessionVwap', () => {
  // 2026-10-12 09:15 and 09:20 IST
  const t0 = Date.UTC(2026, 9, 12, 3, 45);
  const t1 = Date.UTC(2026, 9, 12, 3, 50);

  it('weights typical price by volume within the session', () => {
    const bars = [
      makeBar({ time: Date.UTC(2026, 9, 11, 9, 0), high: 100, low: 100, close: 100, volume: 1000 }),
      makeBar({ time: t0, high: 12, low: 8, close: 10, volume: 100 }),
      makeBar({ time: t1, high: 22, low: 18, close: 20, volume: 300 }),
    ];
    expect(sessionVwap(bars, 330)).toBe(17.5);
  });

  it('anchors sessions to the configured UTC offset', () => {
    // 20:00 UTC on the 11th is 01:30 IST on the 12th
    const late = makeBar({ time: Date.UTC(2026, 9, 11, 20, 0), high: 40, low: 40, close: 40, volume: 100 });
    const bars = [late, makeBar({ time: t0, high: 10, low: 10, close: 10, volume: 100 })];
    expect(sessionVwap(bars, 0)).toBe(10);
    expect(sessionVwap(bars, 330)).toBe(25);
  });

  it('falls back to equal weights when the session has no volume', () => {
    const bars = [
      makeBar({ time: t0, high: 12, low: 8, close: 10, volume: 0 }),
      makeBar({ time: t1, high: 22, low: 18, close: 20, volume: 0 }),
    ];
    expect(sessionVwap(bars, 330)).toBe(15);
  });

  it('is undefined for no bars', () => {
    expect(sessionVwap([], 330)).toBeUndefined();
  });
});
