import type { DailyBar } from '../types/market.js';
import type { OptionContract, UnderlyingQuote } from '../types/options.js';

/** Primary source for chains, quotes and earnings. */
export interface MarketDataClient {
  getOptionChain(symbol: string): Promise<OptionContract[]>;
  getQuote(symbol: string): Promise<UnderlyingQuote>;
  getEarningsDates(symbol: string, from: string, to: string): Promise<string[]>;
  getDailyBars?(symbol: string, days: number): Promise<DailyBar[]>;
}

/** Secondary price source consulted when the primary quote has no usable field. */
export interface PriceFetcher {
  getCurrentPrice(symbol: string): Promise<number | null>;
}

export interface EarningsSource {
  getEarningsDates(symbol: string, from: string, to: string): Promise<string[]>;
}

/** last → close → bid; zero and missing fields are skipped. */
export function priceFromQuote(quote: UnderlyingQuote): number | null {
  return quote.lastPrice || quote.closePrice || quote.bidPrice || null;
}
