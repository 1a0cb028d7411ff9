import { randomUUID } from 'node:crypto';
import type { OptionContract } from '../../core/types.js';
import { RiskRewardError } from '../../core/errors.js';
import { riskRewardRatio } from '../../risk/riskCalculator.js';
import type { DirectionCall, OIAnalysis, RiskPlan, Signal, TechnicalSnapshot } from '../types.js';
import {
  buildRationale,
  confidenceTier,
  describeSetup,
  describeVwap,
  timeDecayImpact,
  volumeProfile,
} from '../intelligence/explainer.js';

export interface SignalInputs {
  instrument: string;
  contract: OptionContract;
  call: DirectionCall;
  plan: RiskPlan;
  oi: OIAnalysis;
  technical: TechnicalSnapshot;
}

export interface SignalFactoryOptions {
  minRiskReward: number;
  now?: () => number;
  newId?: () => string;
}

/**
 * The only way to construct a Signal. Re-derives reward-to-risk from the plan
 * prices and throws RiskRewardError below the minimum instead of clamping.
 */
export const createSignal = (inputs: SignalInputs, options: SignalFactoryOptions): Signal => {
  const { instrument, contract, call, plan, oi, technical } = inputs;
  const riskReward = riskRewardRatio(plan.entryPrice, plan.targetPrice, plan.stopLoss);
  if (!(riskReward >= options.minRiskReward)) {
    throw new RiskRewardError(riskReward, options.minRiskReward);
  }

  const createdAt = (options.now ?? Date.now)();
  const signal: Signal = {
    id: (options.newId ?? randomUUID)(),
    instrument,
    contract: Object.freeze({ ...contract }),
    direction: call.direction,
    kind: call.kind,
    entryPrice: plan.entryPrice,
    targetPrice: plan.targetPrice,
    stopLoss: plan.stopLoss,
    confidence: call.confidence,
    confidenceTier: confidenceTier(call.confidence),
    riskReward,
    quantity: plan.quantity,
    rationale: buildRationale(oi, technical),
    technicalSetup: describeSetup(technical),
    vwapContext: describeVwap(technical.indicators),
    timeDecay: timeDecayImpact(contract.expiry, createdAt),
    volumeProfile: volumeProfile(technical.indicators),
    provenance: Object.freeze({ oi, technical }),
    createdAt,
  };
  return Object.freeze(signal);
};
