import type { OptionChain, PriceBar } from '../core/types.js';

/**
 * Everything the signal pipeline reads. Implementations own all I/O; the
 * pipeline never retries, so absent data simply skips the instrument.
 */
export interface MarketDataProvider {
  /** null when the chain is unavailable. */
  getOptionChain(symbol: string): Promise<OptionChain | null>;
  /** Ascending by time, no duplicate timestamps; empty when unavailable. */
  getPriceHistory(symbol: string, lookback: number): Promise<PriceBar[]>;
  /** 0 when the quote is unavailable. */
  getSpotPrice(symbol: string): Promise<number>;
}
