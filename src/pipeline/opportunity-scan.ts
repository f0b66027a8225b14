/**
 * Opportunity scan: for every watchlist symbol, load one market snapshot and
 * rank puts and calls across the configured profiles. Results replace the
 * symbol's stored opportunities.
 */

import { errorMessage } from '../errors.js';
import { formatOpportunityDigest, type Notifier } from '../telegram/notifier.js';
import type { RecommendationEngine } from '../engine/recommend.js';
import type { SymbolRunResult } from '../db/repositories/scheduler-runs.js';
import type { SnapshotSource } from '../lib/market-snapshot.js';
import type { MarketSnapshot } from '../types/market.js';
import type { StrikeProfile } from '../types/pricing.js';
import type { WheelRecommendation } from '../types/wheel.js';
import type { Clock } from '../wheel/price-cache.js';
import type { WatchlistStore } from '../wheel/store.js';

export interface ScanResult {
  opportunities: WheelRecommendation[];
  saved: number;
  symbolRuns: SymbolRunResult[];
}

export class OpportunityScanJob {
  constructor(
    private readonly watchlist: WatchlistStore,
    private readonly snapshots: SnapshotSource,
    private readonly engine: RecommendationEngine,
    private readonly notifier: Notifier,
    private readonly profiles: readonly StrikeProfile[],
    private readonly clock: Clock = () => new Date(),
  ) {}

  async run(symbols?: readonly string[]): Promise<ScanResult> {
    const targets = symbols ?? (await this.watchlist.listSymbols()).map(e => e.symbol);
    if (targets.length === 0) {
      console.log('[Scan] Watchlist is empty, nothing to scan');
      return { opportunities: [], saved: 0, symbolRuns: [] };
    }

    const today = this.clock();
    const symbolRuns: SymbolRunResult[] = [];
    const opportunities: WheelRecommendation[] = [];
    const emptySymbols: string[] = [];

    // symbols are independent; fetch them concurrently
    const loaded = await Promise.allSettled(targets.map(async symbol => {
      const t0 = Date.now();
      const market: MarketSnapshot = await this.snapshots.load(symbol);
      return { symbol, market, t0 };
    }));

    loaded.forEach((outcome, i) => {
      const symbol = targets[i] ?? '?';
      if (outcome.status === 'rejected') {
        const detail = errorMessage(outcome.reason);
        console.error(`[Scan] ${symbol}: ${detail}`);
        symbolRuns.push({ symbol, status: 'error', detail, durationMs: 0 });
        return;
      }
      const { market, t0 } = outcome.value;
      const found = this.engine.scanOpportunities([market], { profiles: this.profiles, today });
      opportunities.push(...found);
      if (found.length === 0) emptySymbols.push(symbol);
      symbolRuns.push({
        symbol,
        status: 'ok',
        detail: `${found.length} opportunit${found.length === 1 ? 'y' : 'ies'}`,
        durationMs: Date.now() - t0,
      });
    });

    opportunities.sort((a, b) => b.biasScore - a.biasScore);
    for (const symbol of emptySymbols) await this.watchlist.clearOpportunities(symbol);
    const saved = await this.watchlist.saveOpportunities(opportunities, today);
    if (opportunities.length > 0) await this.notifier.send(formatOpportunityDigest(opportunities));

    console.log(`[Scan] ${targets.length} symbol(s), ${saved} opportunit${saved === 1 ? 'y' : 'ies'} stored`);
    return { opportunities, saved, symbolRuns };
  }
}
