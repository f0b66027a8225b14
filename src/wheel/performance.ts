import { SHARES_PER_CONTRACT } from '../engine/execution-cost.js';
import type { TradeRecord, WheelPerformance, WheelPosition } from '../types/wheel.js';
import type { Clock } from './price-cache.js';
import type { WheelStore } from './store.js';

const MS_PER_DAY = 86_400_000;

export type ExportFormat = 'csv' | 'json';

export const EXPORT_COLUMNS = [
  'id',
  'symbol',
  'direction',
  'strike',
  'expiration_date',
  'premium_per_share',
  'contracts',
  'total_premium',
  'opened_at',
  'closed_at',
  'outcome',
  'price_at_expiry',
  'net_premium',
] as const;

type ExportRow = Record<(typeof EXPORT_COLUMNS)[number], string | number | null>;

/** Premium kept after any buy-back cost. */
export function netPremium(trade: TradeRecord): number {
  if (trade.outcome === 'closed_early' && trade.closePrice !== null) {
    return trade.totalPremium - trade.closePrice * trade.contracts * SHARES_PER_CONTRACT;
  }
  return trade.totalPremium;
}

export function isWin(trade: TradeRecord): boolean {
  return trade.outcome === 'expired_worthless' || (trade.outcome === 'closed_early' && netPremium(trade) > 0);
}

function wholeDays(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / MS_PER_DAY);
}

function emptyPerformance(symbol: string): WheelPerformance {
  return {
    symbol,
    totalPremium: 0,
    totalTrades: 0,
    winningTrades: 0,
    assignmentEvents: 0,
    calledAwayEvents: 0,
    closedEarlyCount: 0,
    winRatePct: 0,
    lossRatePct: 0,
    putsSold: 0,
    callsSold: 0,
    averageDaysHeld: 0,
    annualizedYieldPct: 0,
    realizedPnl: 0,
    openTrades: 0,
    completedTrades: 0,
    currentState: null,
    currentShares: 0,
    currentCostBasis: null,
    capitalDeployed: 0,
  };
}

/**
 * Pure aggregation over a set of trades. `wheel` supplies current holdings;
 * `capital` is the denominator for the annualised yield.
 */
export function calculateMetrics(
  symbol: string,
  trades: readonly TradeRecord[],
  capital: number,
  wheel: WheelPosition | null,
  now: Date,
): WheelPerformance {
  const perf = emptyPerformance(symbol);
  perf.capitalDeployed = capital;
  if (wheel) {
    perf.currentState = wheel.state;
    perf.currentShares = wheel.sharesHeld;
    perf.currentCostBasis = wheel.costBasis;
  }
  if (trades.length === 0) return perf;

  let totalDaysHeld = 0;
  for (const trade of trades) {
    perf.totalPremium += trade.totalPremium;
    perf.realizedPnl += netPremium(trade);
    if (trade.direction === 'put') perf.putsSold++;
    else perf.callsSold++;

    if (trade.outcome === 'open') {
      perf.openTrades++;
      continue;
    }

    perf.completedTrades++;
    if (trade.closedAt) totalDaysHeld += Math.max(1, wholeDays(trade.openedAt, trade.closedAt));
    if (isWin(trade)) perf.winningTrades++;

    switch (trade.outcome) {
      case 'assigned': perf.assignmentEvents++; break;
      case 'called_away': perf.calledAwayEvents++; break;
      case 'closed_early': perf.closedEarlyCount++; break;
      case 'expired_worthless': break;
    }
  }

  perf.totalTrades = trades.length;
  if (perf.completedTrades > 0) {
    perf.winRatePct = (perf.winningTrades / perf.completedTrades) * 100;
    perf.lossRatePct = ((perf.assignmentEvents + perf.calledAwayEvents) / perf.completedTrades) * 100;
    perf.averageDaysHeld = totalDaysHeld / perf.completedTrades;
  }

  if (capital > 0) {
    const oldest = Math.min(...trades.map(t => t.openedAt.getTime()));
    const daysActive = wholeDays(new Date(oldest), now);
    if (daysActive > 0) {
      perf.annualizedYieldPct = (perf.totalPremium / capital) * (365 / daysActive) * 100;
    }
  }

  return perf;
}

function exportRow(trade: TradeRecord): ExportRow {
  return {
    id: trade.id,
    symbol: trade.symbol,
    direction: trade.direction,
    strike: trade.strike,
    expiration_date: trade.expirationDate,
    premium_per_share: trade.premiumPerShare,
    contracts: trade.contracts,
    total_premium: trade.totalPremium,
    opened_at: trade.openedAt.toISOString(),
    closed_at: trade.closedAt ? trade.closedAt.toISOString() : null,
    outcome: trade.outcome,
    price_at_expiry: trade.priceAtExpiry,
    net_premium: netPremium(trade),
  };
}

function csvCell(value: string | number | null): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function tradesToCsv(trades: readonly TradeRecord[]): string {
  const lines = [EXPORT_COLUMNS.join(',')];
  for (const trade of trades) {
    const row = exportRow(trade);
    lines.push(EXPORT_COLUMNS.map(col => csvCell(row[col])).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}

export function tradesToJson(trades: readonly TradeRecord[]): string {
  return JSON.stringify(trades.map(exportRow), null, 2);
}

export class PerformanceTracker {
  constructor(
    private readonly store: WheelStore,
    private readonly clock: Clock = () => new Date(),
  ) {}

  /** Empty metrics when the symbol has no active wheel. */
  async getPerformance(symbol: string): Promise<WheelPerformance> {
    const upper = symbol.toUpperCase();
    const wheel = await this.store.getWheel(upper);
    if (!wheel) return emptyPerformance(upper);

    const trades = await this.store.listTrades({ wheelId: wheel.id });
    return calculateMetrics(upper, trades, wheel.capitalAllocated, wheel, this.clock());
  }

  async getPortfolioPerformance(): Promise<WheelPerformance> {
    const wheels = await this.store.listWheels(false);
    const trades = await this.store.listTrades();
    const capital = wheels.filter(w => w.isActive).reduce((sum, w) => sum + w.capitalAllocated, 0);
    return calculateMetrics('ALL', trades, capital, null, this.clock());
  }

  async exportTrades(symbol: string | undefined, format: ExportFormat = 'csv'): Promise<string> {
    const trades = await this.store.listTrades(symbol ? { symbol: symbol.toUpperCase() } : undefined);
    return format === 'json' ? tradesToJson(trades) : tradesToCsv(trades);
  }
}
