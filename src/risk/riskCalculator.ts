import { roundTo } from '../core/validation.js';
import { isBuy } from '../strategy/options/strikeSelector.js';
import type { Direction, RiskResult, TechnicalSnapshot } from '../strategy/types.js';
import { computePositionUnits } from './positionSizing.js';

export interface RiskTier {
  minConfidence: number;
  targetPct: number;
  stopPct: number;
}

export interface RiskCalculatorConfig {
  minRiskReward: number;
  maxRiskPerTrade: number;
  maxPositionUnits: number;
  /** ADX above this widens target and stop. */
  highVolatilityAdx: number;
  highVolTargetMultiplier: number;
  highVolStopMultiplier: number;
  /** Highest `minConfidence` first; the last tier is the fallback. */
  tiers: RiskTier[];
}

export const DEFAULT_RISK_CONFIG: RiskCalculatorConfig = {
  minRiskReward: 2.0,
  maxRiskPerTrade: 500,
  maxPositionUnits: 10,
  highVolatilityAdx: 30,
  highVolTargetMultiplier: 1.2,
  highVolStopMultiplier: 1.1,
  tiers: [
    { minConfidence: 90, targetPct: 0.25, stopPct: 0.1 },
    { minConfidence: 80, targetPct: 0.2, stopPct: 0.12 },
    { minConfidence: 0, targetPct: 0.15, stopPct: 0.15 },
  ],
};

export const riskRewardRatio = (entry: number, target: number, stop: number): number => {
  const risk = Math.abs(entry - stop);
  if (risk === 0) return 0;
  return Math.abs(target - entry) / risk;
};

export interface RiskRequest {
  entryPrice: number;
  direction: Direction;
  technical: TechnicalSnapshot;
  confidence: number;
}

export class RiskCalculator {
  readonly config: RiskCalculatorConfig;

  constructor(config: Partial<RiskCalculatorConfig> = {}) {
    this.config = { ...DEFAULT_RISK_CONFIG, ...config };
  }

  private tierFor(confidence: number): RiskTier {
    const tier = this.config.tiers.find((t) => confidence >= t.minConfidence);
    return tier ?? this.config.tiers[this.config.tiers.length - 1] ?? { minConfidence: 0, targetPct: 0.15, stopPct: 0.15 };
  }

  compute({ entryPrice, direction, technical, confidence }: RiskRequest): RiskResult {
    if (!Number.isFinite(entryPrice) || entryPrice <= 0) {
      return { ok: false, riskReward: 0, reason: `invalid entry price ${entryPrice}` };
    }

    const tier = this.tierFor(confidence);
    let targetPct = tier.targetPct;
    let stopPct = tier.stopPct;
    if (technical.indicators.adx > this.config.highVolatilityAdx) {
      targetPct *= this.config.highVolTargetMultiplier;
      stopPct *= this.config.highVolStopMultiplier;
    }

    const sign = isBuy(direction) ? 1 : -1;
    const targetPrice = roundTo(entryPrice * (1 + sign * targetPct));
    const stopLoss = roundTo(entryPrice * (1 - sign * stopPct));
    const riskReward = riskRewardRatio(entryPrice, targetPrice, stopLoss);

    if (riskReward < this.config.minRiskReward) {
      return {
        ok: false,
        riskReward,
        reason: `reward-to-risk ${riskReward.toFixed(2)} below ${this.config.minRiskReward.toFixed(2)}`,
      };
    }

    const perUnitRisk = Math.abs(entryPrice - stopLoss);
    return {
      ok: true,
      plan: {
        entryPrice,
        targetPrice,
        stopLoss,
        targetPct,
        stopPct,
        riskReward,
        perUnitRisk,
        quantity: computePositionUnits(this.config.maxRiskPerTrade, perUnitRisk, this.config.maxPositionUnits),
      },
    };
  }
}
