import { clamp } from '../core/validation.js';

/**
 * Units to trade so that a stop-out loses at most `maxRiskPerTrade`.
 * Always an integer in [1, maxUnits]; a zero or non-finite per-unit risk
 * sizes to a single unit.
 *   budget 500, risk 15   → 10 (33 capped)
 *   budget 500, risk 120  → 4
 *   budget 500, risk 900  → 1 (floored)
 */
export const computePositionUnits = (maxRiskPerTrade: number, perUnitRisk: number, maxUnits = 10): number => {
  const cap = Math.max(1, Math.floor(maxUnits));
  if (!Number.isFinite(perUnitRisk) || perUnitRisk <= 0 || !Number.isFinite(maxRiskPerTrade)) return 1;
  return clamp(Math.floor(maxRiskPerTrade / perUnitRisk), 1, cap);
};
