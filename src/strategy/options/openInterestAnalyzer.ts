import type { OptionChain, OptionContract } from '../../core/types.js';
import type { OIAnalysis, OIStrength, Sentiment } from '../types.js';

export interface OIThresholds {
  bullishPcr: number;
  bearishPcr: number;
  strongDivergence: number;
}

export const DEFAULT_OI_THRESHOLDS: OIThresholds = {
  bullishPcr: 1.3,
  bearishPcr: 0.7,
  strongDivergence: 0.3,
};

/** Nearest strike to spot; equidistant strikes resolve to the lower one. */
export const findAtmStrike = (spot: number, strikes: readonly number[]): number | undefined => {
  let best: number | undefined;
  for (const strike of strikes) {
    if (best === undefined) {
      best = strike;
      continue;
    }
    const d = Math.abs(strike - spot);
    const bestD = Math.abs(best - spot);
    if (d < bestD || (d === bestD && strike < best)) best = strike;
  }
  return best;
};

/** Highest OI; ties go to higher traded volume, then the lower strike. */
export const findMaxOiContract = (contracts: readonly OptionContract[]): OptionContract | undefined => {
  let best: OptionContract | undefined;
  for (const c of contracts) {
    if (
      !best ||
      c.openInterest > best.openInterest ||
      (c.openInterest === best.openInterest &&
        (c.volume > best.volume || (c.volume === best.volume && c.strike < best.strike)))
    ) {
      best = c;
    }
  }
  return best;
};

export const sentimentFromPcr = (pcr: number, t: OIThresholds = DEFAULT_OI_THRESHOLDS): Sentiment => {
  if (pcr > t.bullishPcr) return 'Bullish';
  if (pcr < t.bearishPcr) return 'Bearish';
  return 'Neutral';
};

export const strengthFromPcr = (pcr: number, t: OIThresholds = DEFAULT_OI_THRESHOLDS): OIStrength =>
  Math.abs(pcr - 1) > t.strongDivergence ? 'Strong' : 'Moderate';

export class OpenInterestAnalyzer {
  constructor(private readonly thresholds: OIThresholds = DEFAULT_OI_THRESHOLDS) {}

  /**
   * Returns null when the chain cannot support a put/call ratio: a side with
   * no contracts, zero call OI, or no usable spot price.
   */
  analyze(chain: OptionChain): OIAnalysis | null {
    const { spotPrice, contracts } = chain;
    if (!Number.isFinite(spotPrice) || spotPrice <= 0) return null;

    const calls = contracts.filter((c) => c.type === 'CALL');
    const puts = contracts.filter((c) => c.type === 'PUT');
    if (calls.length === 0 || puts.length === 0) return null;

    const totalCallOi = calls.reduce((s, c) => s + c.openInterest, 0);
    const totalPutOi = puts.reduce((s, c) => s + c.openInterest, 0);
    if (!(totalCallOi > 0) || !Number.isFinite(totalPutOi)) return null;

    const putCallRatio = totalPutOi / totalCallOi;
    const atmStrike = findAtmStrike(spotPrice, contracts.map((c) => c.strike));
    const maxCall = findMaxOiContract(calls);
    const maxPut = findMaxOiContract(puts);
    if (atmStrike === undefined || !maxCall || !maxPut) return null;

    return {
      totalCallOi,
      totalPutOi,
      putCallRatio,
      atmStrike,
      maxCallOiStrike: maxCall.strike,
      maxPutOiStrike: maxPut.strike,
      supportLevel: maxPut.strike,
      resistanceLevel: maxCall.strike,
      sentiment: sentimentFromPcr(putCallRatio, this.thresholds),
      strength: strengthFromPcr(putCallRatio, this.thresholds),
    };
  }
}
