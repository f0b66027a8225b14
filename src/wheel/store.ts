import type { OptionType } from '../types/options.js';
import type { StrikeProfile } from '../types/pricing.js';
import type {
  Opportunity,
  PositionSnapshot,
  TradeRecord,
  WatchlistEntry,
  WheelPosition,
  WheelRecommendation,
  WheelState,
} from '../types/wheel.js';

export interface NewWheel {
  symbol: string;
  state: WheelState;
  capitalAllocated: number;
  sharesHeld: number;
  costBasis: number | null;
  profile: StrikeProfile;
}

export interface NewTrade {
  wheelId: string;
  symbol: string;
  direction: OptionType;
  strike: number;
  expirationDate: string;
  premiumPerShare: number;
  contracts: number;
}

export interface TradeFilter {
  wheelId?: string;
  symbol?: string;
}

/** Persistence for wheels, their trades and daily snapshots. */
export interface WheelStore {
  createWheel(input: NewWheel): Promise<WheelPosition>;
  /** The active wheel for a symbol; archived wheels are not returned. */
  getWheel(symbol: string): Promise<WheelPosition | null>;
  listWheels(activeOnly: boolean): Promise<WheelPosition[]>;
  updateWheel(wheel: WheelPosition): Promise<WheelPosition>;

  /** Inserts the trade and writes the wheel's new state as one unit; neither lands if either fails. */
  openTrade(input: NewTrade, wheel: WheelPosition): Promise<TradeRecord>;
  /** Writes the settled trade and the wheel's new state as one unit. */
  settleTrade(trade: TradeRecord, wheel: WheelPosition): Promise<TradeRecord>;
  getOpenTrade(wheelId: string): Promise<TradeRecord | null>;
  listTrades(filter?: TradeFilter): Promise<TradeRecord[]>;

  saveSnapshot(snapshot: PositionSnapshot): Promise<void>;
}

/** Watched symbols and the opportunities the scheduled scan stores for them. */
export interface WatchlistStore {
  addSymbol(symbol: string, notes?: string | null): Promise<WatchlistEntry>;
  removeSymbol(symbol: string): Promise<boolean>;
  listSymbols(): Promise<WatchlistEntry[]>;

  saveOpportunities(recs: readonly WheelRecommendation[], scannedAt: Date): Promise<number>;
  listOpportunities(options?: { symbol?: string; unreadOnly?: boolean; limit?: number }): Promise<Opportunity[]>;
  markOpportunityRead(id: string): Promise<boolean>;
  clearOpportunities(symbol?: string): Promise<number>;
}
