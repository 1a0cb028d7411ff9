/**
 * Signal pipeline type system
 *
 * Every evaluation produces:
 *   OptionChain → OIAnalysis
 *   PriceBar[]  → TechnicalSnapshot
 *   → DirectionCall → OptionContract → RiskPlan → Signal
 */

import type { OptionContract } from '../core/types.js';

// ── Open Interest ───────────────────────────────────────────────────────────

export type Sentiment = 'Bullish' | 'Bearish' | 'Neutral';
export type OIStrength = 'Strong' | 'Moderate';

export interface OIAnalysis {
  readonly totalCallOi: number;
  readonly totalPutOi: number;
  readonly putCallRatio: number;
  readonly atmStrike: number;
  readonly maxCallOiStrike: number;
  readonly maxPutOiStrike: number;
  readonly supportLevel: number;      // max-OI put strike
  readonly resistanceLevel: number;   // max-OI call strike
  readonly sentiment: Sentiment;
  readonly strength: OIStrength;
}

// ── Technical ───────────────────────────────────────────────────────────────

export interface IndicatorSet {
  readonly rsi: number;
  readonly macd: number;
  readonly macdSignal: number;
  readonly macdHistogram: number;
  readonly ema20: number;
  readonly sma50: number;
  readonly bbUpper: number;
  readonly bbMiddle: number;
  readonly bbLower: number;
  readonly vwap: number;              // session-anchored
  readonly adx: number;
  readonly plusDi: number;
  readonly minusDi: number;
  readonly stochK: number;
  readonly stochD: number;
  readonly close: number;
  readonly volume: number;
}

export type PatternLabel =
  | 'Ascending Triangle'
  | 'Descending Triangle'
  | 'Upward Breakout'
  | 'Downward Breakout'
  | 'Consolidation'
  | 'Insufficient Data';

export type TrendLabel = 'Bullish' | 'Bearish' | 'Sideways';
export type VolatilityLabel = 'Low' | 'Medium' | 'High';

export interface TechnicalSnapshot {
  readonly indicators: IndicatorSet;
  readonly pattern: PatternLabel;
  readonly trend: TrendLabel;
  readonly strength: number;          // 0-100
  readonly volatility: VolatilityLabel;
  readonly barCount: number;
}

// ── Decision ────────────────────────────────────────────────────────────────

export type Direction = 'BUY_CALL' | 'BUY_PUT' | 'SELL_CALL' | 'SELL_PUT';

/** confluence = OI and trend agree; reversal = RSI extreme fade. */
export type CallKind = 'confluence' | 'reversal';

export interface DirectionCall {
  readonly direction: Direction;
  readonly kind: CallKind;
  readonly confidence: number;        // integer 0-100
}

export type ConfidenceTier = 'LOW' | 'MEDIUM' | 'HIGH' | 'VERY_HIGH';

// ── Risk ────────────────────────────────────────────────────────────────────

export interface RiskPlan {
  readonly entryPrice: number;
  readonly targetPrice: number;
  readonly stopLoss: number;
  readonly targetPct: number;
  readonly stopPct: number;
  readonly riskReward: number;
  readonly quantity: number;          // integer units in [1, maxUnits]
  readonly perUnitRisk: number;
}

export type RiskResult =
  | { readonly ok: true; readonly plan: RiskPlan }
  | { readonly ok: false; readonly riskReward: number; readonly reason: string };

// ── Signal ──────────────────────────────────────────────────────────────────

export type TimeDecayImpact = 'High' | 'Medium' | 'Low';
export type VolumeProfile = 'Above Average' | 'Below Average';

export interface Signal {
  readonly id: string;
  readonly instrument: string;
  readonly contract: OptionContract;
  readonly direction: Direction;
  readonly kind: CallKind;
  readonly entryPrice: number;
  readonly targetPrice: number;
  readonly stopLoss: number;
  readonly confidence: number;
  readonly confidenceTier: ConfidenceTier;
  readonly riskReward: number;
  readonly quantity: number;
  readonly rationale: string;
  readonly technicalSetup: string;
  readonly vwapContext: string;
  readonly timeDecay: TimeDecayImpact;
  readonly volumeProfile: VolumeProfile;
  readonly provenance: {
    readonly oi: OIAnalysis;
    readonly technical: TechnicalSnapshot;
  };
  readonly createdAt: number;
}

// ── Engine outcome ──────────────────────────────────────────────────────────

export type PipelineStage =
  | 'FETCH_CHAIN'
  | 'ANALYZE_OI'
  | 'FETCH_HISTORY'
  | 'ANALYZE_TECHNICAL'
  | 'RESOLVE_DIRECTION'
  | 'SELECT_STRIKE'
  | 'COMPUTE_RISK'
  | 'EMIT';

export type RejectReason =
  | 'upstream_unavailable'
  | 'insufficient_data'
  | 'no_opportunity'
  | 'below_min_confidence'
  | 'no_contract'
  | 'risk_reward'
  | 'daily_limit';

export type EvaluationOutcome =
  | { readonly status: 'emitted'; readonly instrument: string; readonly signal: Signal }
  | {
      readonly status: 'rejected';
      readonly instrument: string;
      readonly stage: PipelineStage;
      readonly reason: RejectReason;
      readonly detail: string;
    };
