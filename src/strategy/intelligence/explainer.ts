/**
 * Template-based descriptions attached to each Signal. Plain structured text;
 * delivery channels decide how to present it.
 */

import type {
  ConfidenceTier,
  IndicatorSet,
  OIAnalysis,
  TechnicalSnapshot,
  TimeDecayImpact,
  VolumeProfile,
} from '../types.js';

const DAY_MS = 86_400_000;

export const confidenceTier = (confidence: number): ConfidenceTier => {
  if (confidence >= 90) return 'VERY_HIGH';
  if (confidence >= 80) return 'HIGH';
  if (confidence >= 70) return 'MEDIUM';
  return 'LOW';
};

export const buildRationale = (oi: OIAnalysis, technical: TechnicalSnapshot): string => {
  const parts: string[] = [];
  const { rsi } = technical.indicators;

  parts.push(`OI shows ${oi.sentiment.toLowerCase()} sentiment (PCR: ${oi.putCallRatio.toFixed(2)})`);

  if (rsi > 70) parts.push('RSI indicates overbought conditions');
  else if (rsi < 30) parts.push('RSI indicates oversold conditions');
  else parts.push(`RSI at ${rsi.toFixed(1)} shows balanced momentum`);

  if (technical.pattern !== 'Insufficient Data') {
    parts.push(`Chart shows ${technical.pattern.toLowerCase()} formation`);
  }

  parts.push(`Overall trend is ${technical.trend.toLowerCase()}`);
  return parts.join(' | ');
};

export const describeSetup = (technical: TechnicalSnapshot): string =>
  `${technical.pattern} | ${technical.trend} Trend | Strength: ${technical.strength}%`;

export const describeVwap = ({ close, vwap }: IndicatorSet): string => {
  if (vwap === 0) return 'VWAP data unavailable';
  const diffPct = ((close - vwap) / vwap) * 100;
  if (diffPct > 1) return `Above VWAP by ${diffPct.toFixed(1)}% (Bullish)`;
  if (diffPct < -1) return `Below VWAP by ${Math.abs(diffPct).toFixed(1)}% (Bearish)`;
  const sign = diffPct >= 0 ? '+' : '-';
  return `Near VWAP (${sign}${Math.abs(diffPct).toFixed(1)}%)`;
};

/** Any traded volume on the latest bar reads as above average. */
export const volumeProfile = ({ volume }: IndicatorSet): VolumeProfile => (volume > 0 ? 'Above Average' : 'Below Average');

/** Whole days until expiry; an unparseable expiry counts as the fastest decay. */
export const timeDecayImpact = (expiry: string, now: number): TimeDecayImpact => {
  const expiryMs = Date.parse(expiry);
  if (!Number.isFinite(expiryMs)) return 'High';
  const days = Math.floor((expiryMs - now) / DAY_MS);
  if (days <= 7) return 'High';
  if (days <= 30) return 'Medium';
  return 'Low';
};
