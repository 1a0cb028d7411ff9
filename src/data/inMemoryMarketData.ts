import type { OptionChain, PriceBar } from '../core/types.js';
import type { MarketDataProvider } from './marketDataProvider.js';

export class InMemoryMarketDataProvider implements MarketDataProvider {
  private readonly chains = new Map<string, OptionChain>();
  private readonly histories = new Map<string, PriceBar[]>();
  private readonly spots = new Map<string, number>();

  setChain(chain: OptionChain): this {
    this.chains.set(chain.underlying, chain);
    return this;
  }

  setHistory(symbol: string, bars: PriceBar[]): this {
    const sorted = [...bars].sort((a, b) => a.time - b.time);
    this.histories.set(symbol, sorted.filter((b, i) => i === 0 || b.time !== sorted[i - 1]!.time));
    return this;
  }

  setSpot(symbol: string, price: number): this {
    this.spots.set(symbol, price);
    return this;
  }

  async getOptionChain(symbol: string): Promise<OptionChain | null> {
    return this.chains.get(symbol) ?? null;
  }

  async getPriceHistory(symbol: string, lookback: number): Promise<PriceBar[]> {
    if (lookback <= 0) return [];
    const bars = this.histories.get(symbol) ?? [];
    return bars.slice(-lookback);
  }

  async getSpotPrice(symbol: string): Promise<number> {
    return this.spots.get(symbol) ?? 0;
  }
}
