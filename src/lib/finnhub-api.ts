/**
 * Finnhub REST helpers: earnings calendar and a last-price quote used as the
 * secondary price source.
 */

import { z } from 'zod';
import { DataUnavailableError } from '../errors.js';
import type { EarningsSource, PriceFetcher } from './market-data.js';

const REQUEST_TIMEOUT_MS = 15_000;

const earningsSchema = z.object({
  earningsCalendar: z.array(z.object({
    date: z.string(),
    symbol: z.string(),
  })).nullish(),
});

const quoteSchema = z.object({
  c: z.number().nullish(),    // current
  pc: z.number().nullish(),   // previous close
});

export class FinnhubClient implements EarningsSource, PriceFetcher {
  constructor(
    private readonly apiKey: string,
    private readonly baseUrl: string = 'https://finnhub.io/api/v1',
  ) {}

  async getEarningsDates(symbol: string, from: string, to: string): Promise<string[]> {
    const data = earningsSchema.parse(
      await this.getJson('/calendar/earnings', { symbol, from, to }),
    );
    const dates = (data.earningsCalendar ?? [])
      .filter(e => e.symbol.toUpperCase() === symbol.toUpperCase())
      .map(e => e.date);
    return [...new Set(dates)].sort();
  }

  /** Finnhub reports 0 for unknown symbols; that is treated as no price. */
  async getCurrentPrice(symbol: string): Promise<number | null> {
    const data = quoteSchema.parse(await this.getJson('/quote', { symbol }));
    return data.c || data.pc || null;
  }

  private async getJson(path: string, params: Record<string, string>): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);
    url.searchParams.set('token', this.apiKey);

    const res = await fetch(url.toString(), { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
    if (!res.ok) {
      const text = await res.text();
      throw new DataUnavailableError(`Finnhub ${path} error ${res.status}: ${text}`);
    }
    return res.json();
  }
}
