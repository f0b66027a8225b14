import { DataUnavailableError, errorMessage } from '../errors.js';
import { priceFromQuote } from '../lib/market-data.js';
import type { MarketDataClient, PriceFetcher } from '../lib/market-data.js';
import { KeyedMutex } from './keyed-mutex.js';

export const PRICE_CACHE_TTL_MS = 300_000;

export type Clock = () => Date;

export interface CachedPrice {
  price: number;
  fetchedAt: Date;
}

/**
 * Per-symbol price cache. A lookup and the refresh it may trigger run under
 * the symbol's lock, so a reader never sees an entry a concurrent refresh is
 * about to replace.
 */
export class PriceCache {
  private readonly entries = new Map<string, CachedPrice>();
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly primary: MarketDataClient | null,
    private readonly secondary: PriceFetcher | null,
    private readonly clock: Clock = () => new Date(),
    private readonly ttlMs: number = PRICE_CACHE_TTL_MS,
  ) {}

  async getPrice(symbol: string, forceRefresh = false): Promise<number> {
    return this.locks.runExclusive(symbol, async () => {
      const cached = this.entries.get(symbol);
      if (!forceRefresh && cached && this.clock().getTime() - cached.fetchedAt.getTime() < this.ttlMs) {
        return cached.price;
      }

      const price = await this.fetch(symbol);
      this.entries.set(symbol, { price, fetchedAt: this.clock() });
      return price;
    });
  }

  peek(symbol: string): CachedPrice | undefined {
    return this.entries.get(symbol);
  }

  clear(symbol?: string): void {
    if (symbol === undefined) this.entries.clear();
    else this.entries.delete(symbol);
  }

  private async fetch(symbol: string): Promise<number> {
    let price: number | null = null;

    if (this.primary) {
      try {
        price = priceFromQuote(await this.primary.getQuote(symbol));
      } catch (err) {
        console.warn(`[Monitor] Primary quote failed for ${symbol}: ${errorMessage(err)}`);
      }
    }

    if (price === null && this.secondary) {
      try {
        price = await this.secondary.getCurrentPrice(symbol);
      } catch (err) {
        console.warn(`[Monitor] Fallback price failed for ${symbol}: ${errorMessage(err)}`);
      }
    }

    if (price === null) {
      throw new DataUnavailableError(
        `Unable to fetch price for ${symbol}. No price data provider configured or price unavailable.`,
      );
    }
    return price;
  }
}
