import type { DirectionCall, OIAnalysis, TechnicalSnapshot } from '../types.js';

export interface ResolverThresholds {
  confluenceRsiCeiling: number;
  confluenceRsiFloor: number;
  extremeOverbought: number;
  extremeOversold: number;
}

export const DEFAULT_RESOLVER_THRESHOLDS: ResolverThresholds = {
  confluenceRsiCeiling: 70,
  confluenceRsiFloor: 30,
  extremeOverbought: 80,
  extremeOversold: 20,
};

export const confluenceConfidence = (strength: number): number => Math.min(85 + Math.floor(strength / 5), 95);
export const reversalConfidence = (strength: number): number => Math.min(75 + Math.floor(strength / 8), 85);

/**
 * Fuses OI sentiment with the technical trend. Returns null when nothing
 * lines up; that is a valid "no opportunity" result. The minimum-confidence
 * floor is the engine's concern.
 */
export const resolveSignalType = (
  oi: OIAnalysis,
  technical: TechnicalSnapshot,
  t: ResolverThresholds = DEFAULT_RESOLVER_THRESHOLDS
): DirectionCall | null => {
  const { rsi, macd, macdSignal } = technical.indicators;
  const { trend, strength } = technical;

  if (oi.sentiment === 'Bullish' && trend === 'Bullish' && rsi < t.confluenceRsiCeiling && macd > macdSignal) {
    return { direction: 'BUY_CALL', kind: 'confluence', confidence: confluenceConfidence(strength) };
  }

  if (oi.sentiment === 'Bearish' && trend === 'Bearish' && rsi > t.confluenceRsiFloor && macd < macdSignal) {
    return { direction: 'BUY_PUT', kind: 'confluence', confidence: confluenceConfidence(strength) };
  }

  // Mean reversion: fade RSI extremes the trend does not support.
  if (rsi > t.extremeOverbought && trend !== 'Bullish') {
    return { direction: 'BUY_PUT', kind: 'reversal', confidence: reversalConfidence(strength) };
  }

  if (rsi < t.extremeOversold && trend !== 'Bearish') {
    return { direction: 'BUY_CALL', kind: 'reversal', confidence: reversalConfidence(strength) };
  }

  return null;
};
