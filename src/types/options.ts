export type OptionType = 'call' | 'put';

export const OPTION_TYPES: readonly OptionType[] = ['call', 'put'];

/** One listed contract as delivered by the market-data client. Immutable snapshot. */
export interface OptionContract {
  symbol: string;           // OCC symbol e.g. AAPL260320C00190000
  underlyingSymbol: string;
  expiration: string;       // YYYY-MM-DD
  strike: number;
  type: OptionType;
  bid: number | null;
  ask: number | null;
  last?: number | null;
  openInterest: number;
  volume: number;
  impliedVolatility?: number | null;
  delta?: number | null;
  gamma?: number | null;
  theta?: number | null;
  vega?: number | null;
}

/** Underlying quote fields; any of them may be missing depending on the session. */
export interface UnderlyingQuote {
  lastPrice?: number | null;
  closePrice?: number | null;
  bidPrice?: number | null;
  openPrice?: number | null;
  highPrice?: number | null;
  lowPrice?: number | null;
}

export function callsOf(chain: readonly OptionContract[]): OptionContract[] {
  return chain.filter(c => c.type === 'call');
}

export function putsOf(chain: readonly OptionContract[]): OptionContract[] {
  return chain.filter(c => c.type === 'put');
}

/** Sorted, de-duplicated expirations present in the chain. */
export function expirationsOf(contracts: readonly OptionContract[]): string[] {
  return [...new Set(contracts.map(c => c.expiration))].sort();
}
