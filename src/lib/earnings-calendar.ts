import { addDays, isoDate } from '../engine/dates.js';
import { earningsBeforeExpiration } from '../engine/earnings.js';
import { errorMessage } from '../errors.js';
import type { EarningsSource } from './market-data.js';

export const EARNINGS_LOOKAHEAD_DAYS = 60;
export const EARNINGS_CACHE_TTL_MS = 12 * 60 * 60 * 1000;

interface CacheEntry {
  dates: string[];
  fetchedAt: number;
}

/**
 * Upcoming earnings per symbol, cached for half a day. Lookup failures are
 * logged and reported as "no known earnings" so a flaky calendar never blocks
 * a scan.
 */
export class EarningsCalendar {
  private readonly cache = new Map<string, CacheEntry>();

  constructor(
    private readonly source: EarningsSource | null,
    private readonly clock: () => Date = () => new Date(),
    private readonly ttlMs: number = EARNINGS_CACHE_TTL_MS,
  ) {}

  async upcoming(symbol: string, lookaheadDays = EARNINGS_LOOKAHEAD_DAYS): Promise<string[]> {
    if (!this.source) return [];

    const now = this.clock();
    const cached = this.cache.get(symbol);
    if (cached && now.getTime() - cached.fetchedAt < this.ttlMs) return cached.dates;

    try {
      const dates = await this.source.getEarningsDates(
        symbol, isoDate(now), isoDate(addDays(now, lookaheadDays)),
      );
      this.cache.set(symbol, { dates, fetchedAt: now.getTime() });
      return dates;
    } catch (err) {
      console.warn(`[Earnings] Lookup failed for ${symbol}: ${errorMessage(err)}`);
      return [];
    }
  }

  /** The earnings date falling before `expiration`, or null. */
  async spansEarnings(symbol: string, expiration: string): Promise<string | null> {
    return earningsBeforeExpiration(await this.upcoming(symbol), expiration, this.clock());
  }
}
