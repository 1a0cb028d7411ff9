import fs from 'node:fs/promises';
import path from 'node:path';
import type { ZodType, ZodTypeDef } from 'zod';
import type { OptionChain, PriceBar } from '../core/types.js';
import { MarketDataError } from '../core/errors.js';
import type { MarketDataProvider } from './marketDataProvider.js';
import { optionChainSchema, priceHistorySchema } from './schemas.js';

/**
 * Reads snapshots written by an external collector:
 *   <dir>/<SYMBOL>.chain.json    OptionChain
 *   <dir>/<SYMBOL>.history.json  PriceBar[]
 * A missing file means the data is unavailable; a malformed one throws
 * MarketDataError.
 */
export class JsonFileMarketDataProvider implements MarketDataProvider {
  constructor(private readonly dir: string) {}

  private async readJson<T>(file: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T | null> {
    let raw: string;
    try {
      raw = await fs.readFile(path.join(this.dir, file), 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new MarketDataError(`${file} is not valid JSON`, { file, err: String(err) });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new MarketDataError(`${file} failed validation: ${details}`, { file });
    }
    return parsed.data;
  }

  async getOptionChain(symbol: string): Promise<OptionChain | null> {
    return this.readJson(`${symbol}.chain.json`, optionChainSchema);
  }

  async getPriceHistory(symbol: string, lookback: number): Promise<PriceBar[]> {
    if (lookback <= 0) return [];
    const bars = await this.readJson(`${symbol}.history.json`, priceHistorySchema);
    return bars ? bars.slice(-lookback) : [];
  }

  async getSpotPrice(symbol: string): Promise<number> {
    const bars = await this.getPriceHistory(symbol, 1);
    return bars[0]?.close ?? 0;
  }
}
