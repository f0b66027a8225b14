import type { OptionContract } from './options.js';

export interface DailyBar {
  date: string;   // YYYY-MM-DD
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

// Alpaca bar response shape
export interface AlpacaBar {
  t: string;
  o: number;
  h: number;
  l: number;
  c: number;
  v: number;
}

export function normalizeAlpacaBars(bars: readonly AlpacaBar[]): DailyBar[] {
  return bars.map(b => ({
    date: b.t.slice(0, 10),
    open: b.o,
    high: b.h,
    low: b.l,
    close: b.c,
    volume: b.v,
  }));
}

/** Everything the engine needs about one underlying, fetched once per symbol. */
export interface MarketSnapshot {
  symbol: string;
  currentPrice: number;
  chain: OptionContract[];
  volatility: number;
  volatilitySource: 'override' | 'implied' | 'historical' | 'default';
  earningsDates: string[];
  fetchedAt: Date;
}
