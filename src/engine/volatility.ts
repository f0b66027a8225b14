import type { OptionContract } from '../types/options.js';

export const TRADING_DAYS_PER_YEAR = 252;
export const DEFAULT_VOLATILITY = 0.30;

export type VolatilitySource = 'override' | 'implied' | 'historical' | 'default';

export interface VolatilityEstimate {
  volatility: number;
  source: VolatilitySource;
}

/** Annualised close-to-close volatility; null with fewer than 3 usable closes. */
export function historicalVolatility(closes: readonly number[]): number | null {
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const prev = closes[i - 1];
    const cur = closes[i];
    if (prev === undefined || cur === undefined || prev <= 0 || cur <= 0) continue;
    returns.push(Math.log(cur / prev));
  }
  if (returns.length < 2) return null;

  const mean = returns.reduce((s, r) => s + r, 0) / returns.length;
  const variance = returns.reduce((s, r) => s + (r - mean) ** 2, 0) / (returns.length - 1);
  return Math.sqrt(variance) * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

function median(values: number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const hi = sorted[mid];
  const lo = sorted[mid - 1];
  if (hi === undefined) return null;
  return sorted.length % 2 === 0 && lo !== undefined ? (lo + hi) / 2 : hi;
}

/** Median IV of contracts with strikes within ±10% of spot on the nearest expiration. */
export function chainImpliedVolatility(chain: readonly OptionContract[], price: number): number | null {
  if (price <= 0) return null;
  const withIv = chain.filter(c =>
    c.impliedVolatility != null && c.impliedVolatility > 0 && Math.abs(c.strike - price) / price <= 0.10,
  );
  const nearest = [...new Set(withIv.map(c => c.expiration))].sort()[0];
  if (nearest === undefined) return null;
  return median(withIv.filter(c => c.expiration === nearest).flatMap(c => c.impliedVolatility ?? []));
}

export function estimateVolatility(params: {
  override?: number | null;
  chain?: readonly OptionContract[];
  price?: number;
  closes?: readonly number[];
  fallback?: number;
}): VolatilityEstimate {
  if (params.override != null && params.override > 0) {
    return { volatility: params.override, source: 'override' };
  }
  const implied = params.chain && params.price ? chainImpliedVolatility(params.chain, params.price) : null;
  if (implied !== null) return { volatility: implied, source: 'implied' };

  const historical = params.closes ? historicalVolatility(params.closes) : null;
  if (historical !== null && historical > 0) return { volatility: historical, source: 'historical' };

  return { volatility: params.fallback ?? DEFAULT_VOLATILITY, source: 'default' };
}
