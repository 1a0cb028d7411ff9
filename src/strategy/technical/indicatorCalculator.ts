import { ADX, BollingerBands, EMA, MACD, RSI, SMA, Stochastic } from 'technicalindicators';
import type { PriceBar } from '../../core/types.js';
import { InsufficientDataError } from '../../core/errors.js';
import { last } from '../../core/validation.js';
import type { IndicatorSet } from '../types.js';

export interface IndicatorWindows {
  rsiPeriod: number;
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
  emaPeriod: number;
  smaPeriod: number;
  bbPeriod: number;
  bbStdDev: number;
  adxPeriod: number;
  stochPeriod: number;
  stochSmoothK: number;
  stochD: number;
}

export const DEFAULT_WINDOWS: IndicatorWindows = {
  rsiPeriod: 14,
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
  emaPeriod: 20,
  smaPeriod: 50,
  bbPeriod: 5,
  bbStdDev: 2,
  adxPeriod: 14,
  stochPeriod: 14,
  stochSmoothK: 3,
  stochD: 3,
};

const DAY_MS = 86_400_000;

/**
 * Volume-weighted average of typical price (H+L+C)/3, anchored to the session
 * of the last bar. A session is a calendar day shifted by `utcOffsetMinutes`.
 * When the session traded no volume (index underlyings report none) every bar
 * is weighted equally.
 */
export const sessionVwap = (bars: readonly PriceBar[], utcOffsetMinutes: number): number | undefined => {
  const latest = last(bars);
  if (!latest) return undefined;

  const offsetMs = utcOffsetMinutes * 60_000;
  const sessionOf = (t: number): number => Math.floor((t + offsetMs) / DAY_MS);
  const session = sessionOf(latest.time);

  let cumPV = 0;
  let cumVol = 0;
  let cumTp = 0;
  let count = 0;
  for (let i = bars.length - 1; i >= 0; i--) {
    const bar = bars[i]!;
    if (sessionOf(bar.time) !== session) break;
    const tp = (bar.high + bar.low + bar.close) / 3;
    cumPV += tp * bar.volume;
    cumVol += bar.volume;
    cumTp += tp;
    count++;
  }
  return cumVol > 0 ? cumPV / cumVol : cumTp / count;
};

export class IndicatorCalculator {
  private readonly windows: IndicatorWindows;

  constructor(
    windows: Partial<IndicatorWindows> = {},
    private readonly sessionUtcOffsetMinutes = 330
  ) {
    this.windows = { ...DEFAULT_WINDOWS, ...windows };
  }

  /** The longest lookback any indicator needs. */
  get minBars(): number {
    const w = this.windows;
    return Math.max(w.smaPeriod, w.emaPeriod, w.macdSlow + w.macdSignal - 1, w.adxPeriod * 2, w.rsiPeriod + 1);
  }

  compute(bars: readonly PriceBar[]): IndicatorSet {
    if (bars.length < this.minBars) {
      throw new InsufficientDataError(`need ${this.minBars} bars, got ${bars.length}`, {
        required: this.minBars,
        received: bars.length,
      });
    }

    const w = this.windows;
    const closes = bars.map((b) => b.close);
    const highs = bars.map((b) => b.high);
    const lows = bars.map((b) => b.low);

    const rsi = last(RSI.calculate({ values: closes, period: w.rsiPeriod }));

    const macd = last(
      MACD.calculate({
        values: closes,
        fastPeriod: w.macdFast,
        slowPeriod: w.macdSlow,
        signalPeriod: w.macdSignal,
        SimpleMAOscillator: false,
        SimpleMASignal: false,
      })
    );

    const ema20 = last(EMA.calculate({ values: closes, period: w.emaPeriod }));
    const sma50 = last(SMA.calculate({ values: closes, period: w.smaPeriod }));
    const bb = last(BollingerBands.calculate({ values: closes, period: w.bbPeriod, stdDev: w.bbStdDev }));
    const adx = last(ADX.calculate({ high: highs, low: lows, close: closes, period: w.adxPeriod }));

    // Slow stochastic: fast %K smoothed, then %D over the smoothed line.
    const fastK = Stochastic.calculate({
      high: highs,
      low: lows,
      close: closes,
      period: w.stochPeriod,
      signalPeriod: w.stochD,
    }).map((s) => s.k);
    const slowK = SMA.calculate({ values: fastK, period: w.stochSmoothK });
    const stochK = last(slowK);
    const stochD = last(SMA.calculate({ values: slowK, period: w.stochD }));

    const vwap = sessionVwap(bars, this.sessionUtcOffsetMinutes);
    const latest = bars[bars.length - 1]!;

    const missing: string[] = [];
    const need = (name: keyof IndicatorSet, value: number | undefined): number => {
      if (value === undefined || !Number.isFinite(value)) {
        missing.push(name);
        return Number.NaN;
      }
      return value;
    };

    const set: IndicatorSet = {
      rsi: need('rsi', rsi),
      macd: need('macd', macd?.MACD),
      macdSignal: need('macdSignal', macd?.signal),
      macdHistogram: need('macdHistogram', macd?.histogram),
      ema20: need('ema20', ema20),
      sma50: need('sma50', sma50),
      bbUpper: need('bbUpper', bb?.upper),
      bbMiddle: need('bbMiddle', bb?.middle),
      bbLower: need('bbLower', bb?.lower),
      vwap: need('vwap', vwap),
      adx: need('adx', adx?.adx),
      plusDi: need('plusDi', adx?.pdi),
      minusDi: need('minusDi', adx?.mdi),
      stochK: need('stochK', stochK),
      stochD: need('stochD', stochD),
      close: need('close', latest.close),
      volume: need('volume', latest.volume),
    };

    if (missing.length > 0) {
      throw new InsufficientDataError(`indicators without a value: ${missing.join(', ')}`, { missing });
    }
    return set;
  }
}
