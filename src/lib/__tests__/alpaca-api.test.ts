import { describe, expect, it, vi } from 'vitest';
import { DataUnavailableError } from '../../errors.js';
import { AlpacaMarketData } from '../alpaca-api.js';

const NOW = new Date('2026-10-19T15:00:00Z');

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function client(): AlpacaMarketData {
  return new AlpacaMarketData({
    apiKey: 'test-key',
    secretKey: 'test-secret',
    baseUrl: 'https://broker.test',
    dataUrl: 'https://data.test',
    clock: () => NOW,
  });
}

describe('AlpacaMarketData.getOptionChain', () => {
  it('joins paged contracts with their snapshots', async () => {
    const requests: URL[] = [];
    const fetchMock = vi.fn(async (input: string, init?: RequestInit) => {
      const url = new URL(input);
      requests.push(url);
      expect(init?.headers).toEqual({ 'APCA-API-KEY-ID': 'test-key', 'APCA-API-SECRET-KEY': 'test-secret' });

      if (url.pathname === '/v2/options/contracts' && !url.searchParams.has('page_token')) {
        return json({
          option_contracts: [{
            symbol: 'XYZ261030P00095000', underlying_symbol: 'XYZ', expiration_date: '2026-10-30',
            strike_price: '95', type: 'put', open_interest: '640',
          }],
          next_page_token: 'page-2',
        });
      }
      if (url.pathname === '/v2/options/contracts') {
        return json({
          option_contracts: [{
            symbol: 'XYZ261030C00105000', underlying_symbol: 'XYZ', expiration_date: '2026-10-30',
            strike_price: 105, type: 'call', open_interest: null,
          }],
          next_page_token: null,
        });
      }
      return json({
        snapshots: {
          XYZ261030P00095000: {
            latestQuote: { bp: 0.5, ap: 0.55 },
            latestTrade: { p: 0.52 },
            dailyBar: { v: 42 },
            impliedVolatility: 0.31,
            greeks: { delta: -0.14 },
          },
        },
      });
    });
    vi.stubGlobal('fetch', fetchMock);

    const chain = await client().getOptionChain('XYZ');

    expect(chain).toEqual([
      {
        symbol: 'XYZ261030P00095000',
        underlyingSymbol: 'XYZ',
        expiration: '2026-10-30',
        strike: 95,
        type: 'put',
        bid: 0.5,
        ask: 0.55,
        last: 0.52,
        openInterest: 640,
        volume: 42,
        impliedVolatility: 0.31,
        delta: -0.14,
        gamma: undefined,
        theta: undefined,
        vega: undefined,
      },
      {
        symbol: 'XYZ261030C00105000',
        underlyingSymbol: 'XYZ',
        expiration: '2026-10-30',
        strike: 105,
        type: 'call',
        bid: null,
        ask: null,
        last: undefined,
        openInterest: 0,
        volume: 0,
        impliedVolatility: undefined,
        delta: undefined,
        gamma: undefined,
        theta: undefined,
        vega: undefined,
      },
    ]);

    const first = requests.find(u => u.pathname === '/v2/options/contracts');
    expect(first?.searchParams.get('expiration_date_gte')).toBe('2026-10-19');
    expect(first?.searchParams.get('expiration_date_lte')).toBe('2026-12-03');
    expect(requests.find(u => u.pathname === '/v1beta1/options/snapshots/XYZ')?.searchParams.get('feed'))
      .toBe('indicative');
  });
});

describe('AlpacaMarketData.getQuote', () => {
  it('maps the stock snapshot and falls back to the previous close', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => json({
      latestTrade: { p: 100.5 },
      latestQuote: { bp: 100.4 },
      prevDailyBar: { c: 99 },
    })));

    expect(await client().getQuote('XYZ')).toEqual({
      lastPrice: 100.5,
      closePrice: 99,
      bidPrice: 100.4,
      openPrice: undefined,
      highPrice: undefined,
      lowPrice: undefined,
    });
  });

  it('raises DataUnavailableError on an HTTP error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('forbidden', { status: 403 })));
    await expect(client().getQuote('XYZ')).rejects.toThrow(
      new DataUnavailableError('Alpaca /v2/stocks/XYZ/snapshot error 403: forbidden'),
    );
  });

  it('raises DataUnavailableError when the request itself fails', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => { throw new TypeError('fetch failed'); }));
    await expect(client().getQuote('XYZ')).rejects.toThrow(
      new DataUnavailableError('Alpaca /v2/stocks/XYZ/snapshot request failed: fetch failed'),
    );
  });
});

describe('AlpacaMarketData.getDailyBars', () => {
  it('normalises bars to dated closes', async () => {
    const fetchMock = vi.fn(async (_input: string) => json({
      bars: [
        { t: '2026-10-15T04:00:00Z', o: 98, h: 101, l: 97, c: 100, v: 1000 },
        { t: '2026-10-16T04:00:00Z', o: 100, h: 102, l: 99, c: 101, v: 1200 },
      ],
    }));
    vi.stubGlobal('fetch', fetchMock);

    const bars = await client().getDailyBars('XYZ', 30);
    expect(bars.map(b => [b.date, b.close])).toEqual([['2026-10-15', 100], ['2026-10-16', 101]]);

    const url = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(url.searchParams.get('limit')).toBe('30');
    expect(url.searchParams.get('start')).toBe('2026-08-27');
  });

  it('raises DataUnavailableError on a malformed payload', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => json({ bars: 'none' })));
    await expect(client().getDailyBars('XYZ', 30)).rejects.toThrow(
      new DataUnavailableError('Alpaca /v2/stocks/XYZ/bars returned an unexpected payload: bars Expected array, received string'),
    );
  });
});
