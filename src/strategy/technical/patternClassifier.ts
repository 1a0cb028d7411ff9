import type { PriceBar } from '../../core/types.js';
import { sampleVariance } from '../../core/validation.js';
import type { PatternLabel } from '../types.js';

const MIN_BARS = 20;
const WINDOW = 10;
const BREAKOUT_BAND = 0.02;

/**
 * Order-sensitive heuristic over the last 10 bars; the first matching rule wins.
 */
export const classifyPattern = (bars: readonly PriceBar[]): PatternLabel => {
  if (bars.length < MIN_BARS) return 'Insufficient Data';

  const recent = bars.slice(-WINDOW);
  const highs = recent.map((b) => b.high);
  const lows = recent.map((b) => b.low);
  const firstHigh = highs[0]!;
  const firstLow = lows[0]!;
  const highVar = sampleVariance(highs);
  const lowVar = sampleVariance(lows);

  // Rising lows against a flat ceiling.
  if (lows.every((l) => l >= firstLow) && highVar < lowVar) {
    return 'Ascending Triangle';
  }

  if (highs.every((h) => h <= firstHigh) && lowVar < highVar) {
    return 'Descending Triangle';
  }

  const close = recent[recent.length - 1]!.close;
  if (close >= Math.max(...highs) * (1 - BREAKOUT_BAND)) {
    return 'Upward Breakout';
  }
  if (close <= Math.min(...lows) * (1 + BREAKOUT_BAND)) {
    return 'Downward Breakout';
  }
  return 'Consolidation';
};
