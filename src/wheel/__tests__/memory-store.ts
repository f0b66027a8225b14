import type { NewTrade, NewWheel, TradeFilter, WatchlistStore, WheelStore } from '../store.js';
import type {
  Opportunity,
  PositionSnapshot,
  TradeRecord,
  WatchlistEntry,
  WheelPosition,
  WheelRecommendation,
} from '../../types/wheel.js';

/** In-process stand-in for the Postgres store. Every call yields once, like a real round trip. */
export class MemoryWheelStore implements WheelStore {
  readonly wheels: WheelPosition[] = [];
  readonly trades: TradeRecord[] = [];
  readonly snapshots: PositionSnapshot[] = [];
  private seq = 0;

  constructor(private readonly now: () => Date = () => new Date('2026-10-19T15:00:00Z')) {}

  async createWheel(input: NewWheel): Promise<WheelPosition> {
    await tick();
    const wheel: WheelPosition = {
      ...input,
      id: `wheel-${++this.seq}`,
      isActive: true,
      createdAt: this.now(),
      updatedAt: this.now(),
    };
    this.wheels.push(wheel);
    return { ...wheel };
  }

  async getWheel(symbol: string): Promise<WheelPosition | null> {
    await tick();
    const wheel = this.wheels.find(w => w.symbol === symbol && w.isActive);
    return wheel ? { ...wheel } : null;
  }

  async listWheels(activeOnly: boolean): Promise<WheelPosition[]> {
    await tick();
    return this.wheels.filter(w => !activeOnly || w.isActive).map(w => ({ ...w }));
  }

  async updateWheel(wheel: WheelPosition): Promise<WheelPosition> {
    await tick();
    const idx = this.wheels.findIndex(w => w.id === wheel.id);
    if (idx < 0) throw new Error(`unknown wheel ${wheel.id}`);
    this.wheels[idx] = { ...wheel };
    return { ...wheel };
  }

  async createTrade(input: NewTrade): Promise<TradeRecord> {
    await tick();
    const trade: TradeRecord = {
      ...input,
      id: `trade-${++this.seq}`,
      totalPremium: input.premiumPerShare * input.contracts * 100,
      openedAt: this.now(),
      closedAt: null,
      outcome: 'open',
      priceAtExpiry: null,
      closePrice: null,
    };
    this.trades.push(trade);
    return { ...trade };
  }

  async updateTrade(trade: TradeRecord): Promise<TradeRecord> {
    await tick();
    const idx = this.trades.findIndex(t => t.id === trade.id);
    if (idx < 0) throw new Error(`unknown trade ${trade.id}`);
    this.trades[idx] = { ...trade };
    return { ...trade };
  }

  async openTrade(input: NewTrade, wheel: WheelPosition): Promise<TradeRecord> {
    return this.atomically(async () => {
      const trade = await this.createTrade(input);
      await this.updateWheel(wheel);
      return trade;
    });
  }

  async settleTrade(trade: TradeRecord, wheel: WheelPosition): Promise<TradeRecord> {
    return this.atomically(async () => {
      const settled = await this.updateTrade(trade);
      await this.updateWheel(wheel);
      return settled;
    });
  }

  /** Restores wheels and trades when `work` fails part-way, like a rolled-back transaction. */
  private async atomically<T>(work: () => Promise<T>): Promise<T> {
    const wheels = this.wheels.map(w => ({ ...w }));
    const trades = this.trades.map(t => ({ ...t }));
    try {
      return await work();
    } catch (err) {
      this.wheels.splice(0, this.wheels.length, ...wheels);
      this.trades.splice(0, this.trades.length, ...trades);
      throw err;
    }
  }

  async getOpenTrade(wheelId: string): Promise<TradeRecord | null> {
    await tick();
    const trade = this.trades.find(t => t.wheelId === wheelId && t.outcome === 'open');
    return trade ? { ...trade } : null;
  }

  async listTrades(filter: TradeFilter = {}): Promise<TradeRecord[]> {
    await tick();
    return this.trades
      .filter(t => (filter.wheelId === undefined || t.wheelId === filter.wheelId))
      .filter(t => (filter.symbol === undefined || t.symbol === filter.symbol))
      .map(t => ({ ...t }));
  }

  async saveSnapshot(snapshot: PositionSnapshot): Promise<void> {
    await tick();
    this.snapshots.push(snapshot);
  }
}

export class MemoryWatchlistStore implements WatchlistStore {
  readonly entries: WatchlistEntry[] = [];
  opportunities: Opportunity[] = [];
  private seq = 0;

  async addSymbol(symbol: string, notes: string | null = null): Promise<WatchlistEntry> {
    const existing = this.entries.find(e => e.symbol === symbol);
    if (existing) {
      existing.notes = notes ?? existing.notes;
      return { ...existing };
    }
    const entry: WatchlistEntry = { id: `watch-${++this.seq}`, symbol, notes, createdAt: new Date(0) };
    this.entries.push(entry);
    return { ...entry };
  }

  async removeSymbol(symbol: string): Promise<boolean> {
    const idx = this.entries.findIndex(e => e.symbol === symbol);
    if (idx < 0) return false;
    this.entries.splice(idx, 1);
    return true;
  }

  async listSymbols(): Promise<WatchlistEntry[]> {
    return [...this.entries].sort((a, b) => a.symbol.localeCompare(b.symbol));
  }

  async saveOpportunities(recs: readonly WheelRecommendation[], scannedAt: Date): Promise<number> {
    const symbols = new Set(recs.map(r => r.symbol));
    this.opportunities = this.opportunities.filter(o => !symbols.has(o.symbol));
    for (const rec of recs) {
      this.opportunities.push({ ...rec, id: `opp-${++this.seq}`, isRead: false, scannedAt });
    }
    return recs.length;
  }

  async listOpportunities(
    options: { symbol?: string; unreadOnly?: boolean; limit?: number } = {},
  ): Promise<Opportunity[]> {
    return this.opportunities
      .filter(o => options.symbol === undefined || o.symbol === options.symbol)
      .filter(o => !options.unreadOnly || !o.isRead)
      .sort((a, b) => b.biasScore - a.biasScore)
      .slice(0, options.limit ?? 50);
  }

  async markOpportunityRead(id: string): Promise<boolean> {
    const opp = this.opportunities.find(o => o.id === id);
    if (!opp) return false;
    opp.isRead = true;
    return true;
  }

  async clearOpportunities(symbol?: string): Promise<number> {
    const before = this.opportunities.length;
    this.opportunities = this.opportunities.filter(o => symbol !== undefined && o.symbol !== symbol);
    return before - this.opportunities.length;
  }
}

function tick(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
