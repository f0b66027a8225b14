/**
 * Covered-call overlay for a list of stock holdings: fetch each symbol's
 * market snapshot, run the delta-band scanner, build the trade blotter and a
 * decision memo for every symbol with a top pick.
 */

import { generateTradeBlotter } from '../engine/formatters.js';
import type { OverlayScanner } from '../engine/overlay-scanner.js';
import { errorMessage } from '../errors.js';
import type { DecisionMemo, MemoAgent } from '../agents/memo-agent.js';
import type { SnapshotSource } from '../lib/market-snapshot.js';
import type { OptionContract } from '../types/options.js';
import type { BlotterEntry, PortfolioHolding, ScanResult } from '../types/scanner.js';

export interface OverlayReport {
  results: ScanResult[];
  blotter: BlotterEntry[];
  memos: DecisionMemo[];
}

export interface OverlayScanDeps {
  snapshots: SnapshotSource;
  scanner: OverlayScanner;
  memo: MemoAgent | null;
}

export async function runOverlayScan(
  holdings: readonly PortfolioHolding[],
  deps: OverlayScanDeps,
  options: { overrideEarningsCheck?: boolean; today?: Date } = {},
): Promise<OverlayReport> {
  const prices = new Map<string, number>();
  const chains = new Map<string, readonly OptionContract[]>();
  const volatilities = new Map<string, number>();
  const earnings = new Map<string, readonly string[]>();

  // a symbol that fails to load is left out of the maps; the scanner reports it
  const symbols = [...new Set(holdings.map(h => h.symbol))];
  const loaded = await Promise.allSettled(symbols.map(s => deps.snapshots.load(s)));
  loaded.forEach((outcome, i) => {
    if (outcome.status === 'rejected') {
      console.warn(`[Overlay] ${symbols[i] ?? '?'}: ${errorMessage(outcome.reason)}`);
      return;
    }
    const snap = outcome.value;
    prices.set(snap.symbol, snap.currentPrice);
    if (snap.chain.length > 0) chains.set(snap.symbol, snap.chain);
    volatilities.set(snap.symbol, snap.volatility);
    earnings.set(snap.symbol, snap.earningsDates);
  });

  const results = [...deps.scanner.scanPortfolio(holdings, prices, chains, volatilities, {
    earnings,
    overrideEarningsCheck: options.overrideEarningsCheck,
    today: options.today,
  }).values()];

  const memos: DecisionMemo[] = [];
  if (deps.memo) {
    for (const result of results) {
      const top = result.recommendedStrikes[0];
      if (!result.memoPayload || !top) continue;
      memos.push(await deps.memo.write(result.memoPayload, top));
    }
  }

  console.log(`[Overlay] Scanned ${results.length} holding(s), ${memos.length} memo(s)`);
  return { results, blotter: generateTradeBlotter(results), memos };
}
