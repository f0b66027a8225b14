import { estimateVolatility } from '../engine/volatility.js';
import { errorMessage } from '../errors.js';
import type { MarketSnapshot } from '../types/market.js';
import type { OptionContract } from '../types/options.js';
import type { EarningsCalendar } from './earnings-calendar.js';
import type { MarketDataClient } from './market-data.js';
import type { PriceCache } from '../wheel/price-cache.js';

export const HISTORY_DAYS = 30;

export interface SnapshotSource {
  load(symbol: string, options?: { volatilityOverride?: number | null }): Promise<MarketSnapshot>;
}

/**
 * Fetches everything one symbol needs for pricing: price, chain, a volatility
 * estimate and upcoming earnings. Only a missing price is fatal; a failed or
 * empty chain reaches the engine as an empty list, which reports why nothing
 * qualified.
 */
export class MarketSnapshotLoader implements SnapshotSource {
  constructor(
    private readonly client: MarketDataClient,
    private readonly prices: PriceCache,
    private readonly earnings: EarningsCalendar,
    private readonly defaultVolatility: number,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async load(symbol: string, options: { volatilityOverride?: number | null } = {}): Promise<MarketSnapshot> {
    const upper = symbol.toUpperCase();

    const [currentPrice, chain] = await Promise.all([
      this.prices.getPrice(upper),
      this.loadChain(upper),
    ]);
    if (chain.length === 0) console.warn(`[Market] ${upper}: empty options chain`);

    const closes = await this.loadCloses(upper);
    const estimate = estimateVolatility({
      override: options.volatilityOverride,
      chain,
      price: currentPrice,
      closes,
      fallback: this.defaultVolatility,
    });
    if (estimate.source === 'default') {
      console.warn(`[Market] ${upper}: no volatility estimate, using default ${estimate.volatility}`);
    }

    return {
      symbol: upper,
      currentPrice,
      chain,
      volatility: estimate.volatility,
      volatilitySource: estimate.source,
      earningsDates: await this.earnings.upcoming(upper),
      fetchedAt: this.clock(),
    };
  }

  private async loadChain(symbol: string): Promise<OptionContract[]> {
    try {
      return await this.client.getOptionChain(symbol);
    } catch (err) {
      console.warn(`[Market] ${symbol}: options chain unavailable: ${errorMessage(err)}`);
      return [];
    }
  }

  private async loadCloses(symbol: string): Promise<number[]> {
    if (!this.client.getDailyBars) return [];
    try {
      const bars = await this.client.getDailyBars(symbol, HISTORY_DAYS);
      return bars.map(b => b.close);
    } catch (err) {
      console.warn(`[Market] ${symbol}: daily bars unavailable: ${errorMessage(err)}`);
      return [];
    }
  }
}
