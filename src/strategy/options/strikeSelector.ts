import type { ContractType, OptionContract } from '../../core/types.js';
import type { CallKind, Direction } from '../types.js';

const CANDIDATES = 3;

export const contractTypeFor = (direction: Direction): ContractType => {
  switch (direction) {
    case 'BUY_CALL':
    case 'SELL_CALL':
      return 'CALL';
    case 'BUY_PUT':
    case 'SELL_PUT':
      return 'PUT';
  }
};

export const isBuy = (direction: Direction): boolean => {
  switch (direction) {
    case 'BUY_CALL':
    case 'BUY_PUT':
      return true;
    case 'SELL_CALL':
    case 'SELL_PUT':
      return false;
  }
};

const liquidity = (c: OptionContract): number => (c.volume > 0 ? c.openInterest * c.volume : c.openInterest);

const nearestToSpot = (contracts: readonly OptionContract[], spot: number): OptionContract[] =>
  [...contracts]
    .sort((a, b) => Math.abs(a.strike - spot) - Math.abs(b.strike - spot) || a.strike - b.strike)
    .slice(0, CANDIDATES);

/** Up to three strikes just out of the money, nearest first. */
const outOfTheMoney = (contracts: readonly OptionContract[], spot: number, type: ContractType): OptionContract[] =>
  type === 'CALL'
    ? contracts.filter((c) => c.strike >= spot).sort((a, b) => a.strike - b.strike).slice(0, CANDIDATES)
    : contracts.filter((c) => c.strike <= spot).sort((a, b) => b.strike - a.strike).slice(0, CANDIDATES);

export interface StrikeRequest {
  direction: Direction;
  kind: CallKind;
  contracts: readonly OptionContract[];
  spotPrice: number;
}

/**
 * Picks the most liquid contract (OI × volume, OI alone when volume is 0)
 * among the candidate strikes for the direction's contract type.
 */
export const selectStrike = ({ direction, kind, contracts, spotPrice }: StrikeRequest): OptionContract | null => {
  const type = contractTypeFor(direction);
  const matching = contracts.filter((c) => c.type === type);
  if (matching.length === 0) return null;

  let candidates: OptionContract[] = [];
  if (kind === 'confluence' && isBuy(direction)) {
    candidates = outOfTheMoney(matching, spotPrice, type);
  }
  if (candidates.length === 0) {
    candidates = nearestToSpot(matching, spotPrice);
  }

  let best: OptionContract | null = null;
  for (const c of candidates) {
    if (!best || liquidity(c) > liquidity(best)) best = c;
  }
  return best;
};
