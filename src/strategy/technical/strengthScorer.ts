import type { IndicatorSet, TrendLabel } from '../types.js';

type Vote = 1 | -1;

/** Binary: anything not strictly above counts against. */
const vote = (a: number, b: number): Vote => (a > b ? 1 : -1);

/**
 * Additive 0-100 score. Points reward a decisive reading, not a direction:
 * a bearish MACD cross scores the same as a bullish one.
 */
export const scoreStrength = (ind: IndicatorSet): number => {
  let score = 0;

  if (ind.rsi < 30 || ind.rsi > 70) score += 20;
  else if (ind.rsi >= 40 && ind.rsi <= 60) score += 10;

  if (ind.macd !== ind.macdSignal) score += 15;
  if (ind.ema20 !== ind.sma50) score += 15;

  if (ind.vwap > 0 && Math.abs(ind.close - ind.vwap) / ind.vwap < 0.005) score += 10;

  if (ind.adx > 25) score += 15;
  if (ind.volume > 0) score += 10;

  return Math.min(score, 100);
};

/** Indicators that vote on trend. */
export const trendVotes = (ind: IndicatorSet): Vote[] => [
  vote(ind.rsi, 50),
  vote(ind.macd, ind.macdSignal),
  vote(ind.ema20, ind.sma50),
];

export const determineTrend = (ind: IndicatorSet): TrendLabel => {
  const votes = trendVotes(ind);
  const bullish = votes.filter((v) => v === 1).length;
  const bearish = votes.length - bullish;
  if (bullish > bearish) return 'Bullish';
  if (bearish > bullish) return 'Bearish';
  // Only reachable with an even number of voters.
  return 'Sideways';
};
