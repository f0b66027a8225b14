/**
 * Alpaca market data: option chains, underlying quotes and daily bars.
 * All Alpaca fetch() calls live here; responses are validated with zod before use.
 */

import { z } from 'zod';
import { addDays, isoDate } from '../engine/dates.js';
import { DataUnavailableError, errorMessage } from '../errors.js';
import { normalizeAlpacaBars } from '../types/market.js';
import type { DailyBar } from '../types/market.js';
import type { OptionContract, UnderlyingQuote } from '../types/options.js';
import type { EarningsSource, MarketDataClient } from './market-data.js';

const REQUEST_TIMEOUT_MS = 20_000;
const PAGE_LIMIT = 1000;
const MAX_PAGES = 10;
export const DEFAULT_CHAIN_HORIZON_DAYS = 45;

const contractSchema = z.object({
  symbol: z.string(),
  underlying_symbol: z.string(),
  expiration_date: z.string(),
  strike_price: z.coerce.number(),
  type: z.enum(['call', 'put']),
  open_interest: z.coerce.number().nullish(),
});

const contractsPageSchema = z.object({
  option_contracts: z.array(contractSchema).nullish(),
  next_page_token: z.string().nullish(),
});

const optionSnapshotSchema = z.object({
  latestQuote: z.object({ bp: z.number().nullish(), ap: z.number().nullish() }).nullish(),
  latestTrade: z.object({ p: z.number().nullish() }).nullish(),
  dailyBar: z.object({ v: z.number().nullish() }).nullish(),
  impliedVolatility: z.number().nullish(),
  greeks: z.object({
    delta: z.number().nullish(),
    gamma: z.number().nullish(),
    theta: z.number().nullish(),
    vega: z.number().nullish(),
  }).nullish(),
});

type AlpacaOptionSnapshot = z.infer<typeof optionSnapshotSchema>;

const snapshotsPageSchema = z.object({
  snapshots: z.record(optionSnapshotSchema).nullish(),
  next_page_token: z.string().nullish(),
});

const stockSnapshotSchema = z.object({
  latestTrade: z.object({ p: z.number().nullish() }).nullish(),
  latestQuote: z.object({ bp: z.number().nullish() }).nullish(),
  dailyBar: z.object({
    o: z.number().nullish(),
    h: z.number().nullish(),
    l: z.number().nullish(),
    c: z.number().nullish(),
  }).nullish(),
  prevDailyBar: z.object({ c: z.number().nullish() }).nullish(),
});

const barsSchema = z.object({
  bars: z.array(z.object({
    t: z.string(),
    o: z.number(),
    h: z.number(),
    l: z.number(),
    c: z.number(),
    v: z.number(),
  })).nullish(),
});

export interface AlpacaMarketDataOptions {
  apiKey: string;
  secretKey: string;
  baseUrl: string;
  dataUrl: string;
  earnings?: EarningsSource | null;
  horizonDays?: number;
  clock?: () => Date;
}

const num = (v: number | null | undefined): number | undefined => v ?? undefined;

export class AlpacaMarketData implements MarketDataClient {
  private readonly headers: Record<string, string>;
  private readonly clock: () => Date;

  constructor(private readonly options: AlpacaMarketDataOptions) {
    this.headers = {
      'APCA-API-KEY-ID': options.apiKey,
      'APCA-API-SECRET-KEY': options.secretKey,
    };
    this.clock = options.clock ?? (() => new Date());
  }

  /** Listed contracts out to the horizon, priced from the indicative snapshot feed. */
  async getOptionChain(symbol: string): Promise<OptionContract[]> {
    const today = this.clock();
    const from = isoDate(today);
    const to = isoDate(addDays(today, this.options.horizonDays ?? DEFAULT_CHAIN_HORIZON_DAYS));

    const [contracts, snapshots] = await Promise.all([
      this.fetchContracts(symbol, from, to),
      this.fetchSnapshots(symbol, from, to),
    ]);

    return contracts.map(c => {
      const snap: AlpacaOptionSnapshot | undefined = snapshots[c.symbol];
      return {
        symbol: c.symbol,
        underlyingSymbol: c.underlying_symbol,
        expiration: c.expiration_date,
        strike: c.strike_price,
        type: c.type,
        bid: snap?.latestQuote?.bp ?? null,
        ask: snap?.latestQuote?.ap ?? null,
        last: num(snap?.latestTrade?.p),
        openInterest: c.open_interest ?? 0,
        volume: snap?.dailyBar?.v ?? 0,
        impliedVolatility: num(snap?.impliedVolatility),
        delta: num(snap?.greeks?.delta),
        gamma: num(snap?.greeks?.gamma),
        theta: num(snap?.greeks?.theta),
        vega: num(snap?.greeks?.vega),
      };
    });
  }

  async getQuote(symbol: string): Promise<UnderlyingQuote> {
    const url = new URL(`${this.options.dataUrl}/v2/stocks/${encodeURIComponent(symbol)}/snapshot`);
    const snap = await this.getJson(url, stockSnapshotSchema);
    return {
      lastPrice: num(snap.latestTrade?.p),
      closePrice: num(snap.dailyBar?.c ?? snap.prevDailyBar?.c),
      bidPrice: num(snap.latestQuote?.bp),
      openPrice: num(snap.dailyBar?.o),
      highPrice: num(snap.dailyBar?.h),
      lowPrice: num(snap.dailyBar?.l),
    };
  }

  async getDailyBars(symbol: string, days: number): Promise<DailyBar[]> {
    const url = new URL(`${this.options.dataUrl}/v2/stocks/${encodeURIComponent(symbol)}/bars`);
    url.searchParams.set('timeframe', '1Day');
    // calendar lookback wide enough to cover `days` sessions
    url.searchParams.set('start', isoDate(addDays(this.clock(), -Math.ceil(days * 1.6) - 5)));
    url.searchParams.set('limit', String(days));
    url.searchParams.set('adjustment', 'split');
    const data = await this.getJson(url, barsSchema);
    return normalizeAlpacaBars(data.bars ?? []);
  }

  async getEarningsDates(symbol: string, from: string, to: string): Promise<string[]> {
    return this.options.earnings ? this.options.earnings.getEarningsDates(symbol, from, to) : [];
  }

  private async fetchContracts(symbol: string, from: string, to: string): Promise<z.infer<typeof contractSchema>[]> {
    const all: z.infer<typeof contractSchema>[] = [];
    let pageToken: string | null | undefined;

    for (let page = 0; page < MAX_PAGES; page++) {
      const url = new URL(`${this.options.baseUrl}/v2/options/contracts`);
      url.searchParams.set('underlying_symbols', symbol);
      url.searchParams.set('expiration_date_gte', from);
      url.searchParams.set('expiration_date_lte', to);
      url.searchParams.set('limit', String(PAGE_LIMIT));
      if (pageToken) url.searchParams.set('page_token', pageToken);

      const data = await this.getJson(url, contractsPageSchema);
      all.push(...(data.option_contracts ?? []));
      pageToken = data.next_page_token;
      if (!pageToken) break;
    }
    return all;
  }

  private async fetchSnapshots(symbol: string, from: string, to: string): Promise<Record<string, AlpacaOptionSnapshot>> {
    const all: Record<string, AlpacaOptionSnapshot> = {};
    let pageToken: string | null | undefined;

    for (let page = 0; page < MAX_PAGES; page++) {
      const url = new URL(`${this.options.dataUrl}/v1beta1/options/snapshots/${encodeURIComponent(symbol)}`);
      url.searchParams.set('feed', 'indicative');
      url.searchParams.set('expiration_date_gte', from);
      url.searchParams.set('expiration_date_lte', to);
      url.searchParams.set('limit', String(PAGE_LIMIT));
      if (pageToken) url.searchParams.set('page_token', pageToken);

      const data = await this.getJson(url, snapshotsPageSchema);
      Object.assign(all, data.snapshots ?? {});
      pageToken = data.next_page_token;
      if (!pageToken) break;
    }
    return all;
  }

  /** Transport, JSON and shape failures all surface as DataUnavailableError. */
  private async getJson<S extends z.ZodTypeAny>(url: URL, schema: S): Promise<z.output<S>> {
    let res: Response;
    try {
      res = await fetch(url.toString(), {
        headers: this.headers,
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch (err) {
      throw new DataUnavailableError(`Alpaca ${url.pathname} request failed: ${errorMessage(err)}`);
    }
    if (!res.ok) {
      const text = await res.text();
      throw new DataUnavailableError(`Alpaca ${url.pathname} error ${res.status}: ${text}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new DataUnavailableError(`Alpaca ${url.pathname} returned invalid JSON: ${errorMessage(err)}`);
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      throw new DataUnavailableError(
        `Alpaca ${url.pathname} returned an unexpected payload: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`,
      );
    }
    return parsed.data;
  }
}
