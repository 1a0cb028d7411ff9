import type { PriceBar } from '../../core/types.js';
import { sampleVariance } from '../../core/validation.js';
import type { TechnicalSnapshot, VolatilityLabel } from '../types.js';
import { IndicatorCalculator } from './indicatorCalculator.js';
import { classifyPattern } from './patternClassifier.js';
import { determineTrend, scoreStrength } from './strengthScorer.js';

const TRADING_DAYS = 252;

/** Annualised stdev of close-to-close returns, bucketed at 15% and 30%. */
export const classifyVolatility = (bars: readonly PriceBar[]): VolatilityLabel => {
  const returns: number[] = [];
  for (let i = 1; i < bars.length; i++) {
    const prev = bars[i - 1]!.close;
    if (prev !== 0) returns.push(bars[i]!.close / prev - 1);
  }
  const annualised = Math.sqrt(sampleVariance(returns)) * Math.sqrt(TRADING_DAYS);
  if (annualised > 0.3) return 'High';
  if (annualised > 0.15) return 'Medium';
  return 'Low';
};

export class TechnicalAnalyzer {
  constructor(private readonly calculator: IndicatorCalculator = new IndicatorCalculator()) {}

  get minBars(): number {
    return this.calculator.minBars;
  }

  /** Throws InsufficientDataError when the history is too short. */
  analyze(bars: readonly PriceBar[]): TechnicalSnapshot {
    const indicators = this.calculator.compute(bars);
    return {
      indicators,
      pattern: classifyPattern(bars),
      trend: determineTrend(indicators),
      strength: scoreStrength(indicators),
      volatility: classifyVolatility(bars),
      barCount: bars.length,
    };
  }
}
