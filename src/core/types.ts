export type ContractType = 'CALL' | 'PUT';

export interface PriceBar {
  time: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface OptionContract {
  underlying: string;
  tradingSymbol: string;
  strike: number;
  type: ContractType;
  expiry: string;            // ISO date, e.g. 2026-10-29
  lastPrice: number;
  openInterest: number;
  volume: number;
}

export interface OptionChain {
  underlying: string;
  spotPrice: number;
  timestamp: number;
  contracts: OptionContract[];
}
