import type { OptionType } from './options.js';
import type { StrikeProfile } from './pricing.js';

export type WheelState = 'cash' | 'cash_put_open' | 'shares' | 'shares_call_open';

export type WheelAction = 'sell_put' | 'sell_call' | 'expired_otm' | 'assigned' | 'called_away' | 'closed_early';

export type TradeOutcome = 'open' | 'expired_worthless' | 'assigned' | 'called_away' | 'closed_early';

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export interface WheelPosition {
  id: string;
  symbol: string;
  state: WheelState;
  capitalAllocated: number;
  sharesHeld: number;         // always a multiple of 100
  costBasis: number | null;   // per share, while holding
  profile: StrikeProfile;
  createdAt: Date;
  updatedAt: Date;
  isActive: boolean;
}

export interface TradeRecord {
  id: string;
  wheelId: string;
  symbol: string;
  direction: OptionType;
  strike: number;
  expirationDate: string;     // YYYY-MM-DD
  premiumPerShare: number;
  contracts: number;
  totalPremium: number;       // premium × contracts × 100
  openedAt: Date;
  closedAt: Date | null;
  outcome: TradeOutcome;
  priceAtExpiry: number | null;
  closePrice: number | null;  // buy-back price per share for early closes
}

export interface WheelRecommendation {
  symbol: string;
  direction: OptionType;
  strike: number;
  expirationDate: string;
  premiumPerShare: number;
  contracts: number;
  totalPremium: number;
  sigmaDistance: number;
  pItm: number;
  annualizedYieldPct: number;
  biasScore: number;          // higher = more likely to expire worthless
  dte: number;
  currentPrice: number;
  bid: number;
  ask: number;
  profile: StrikeProfile;
  warnings: string[];
}

export interface PositionStatus {
  symbol: string;
  direction: OptionType;
  strike: number;
  expirationDate: string;
  dteCalendar: number;
  dteTrading: number;
  currentPrice: number;
  priceVsStrike: number;      // positive when ITM
  isItm: boolean;
  isOtm: boolean;
  moneynessPct: number;
  moneynessLabel: string;
  riskLevel: RiskLevel;
  lastUpdated: Date;
  premiumCollected: number;
}

export interface PositionSnapshot {
  tradeId: string;
  snapshotDate: string;
  currentPrice: number;
  dteCalendar: number;
  dteTrading: number;
  moneynessPct: number;
  isItm: boolean;
  riskLevel: RiskLevel;
}

export interface WheelPerformance {
  symbol: string;             // "ALL" for portfolio-wide metrics
  totalPremium: number;
  totalTrades: number;
  winningTrades: number;
  assignmentEvents: number;
  calledAwayEvents: number;
  closedEarlyCount: number;
  winRatePct: number;
  lossRatePct: number;
  putsSold: number;
  callsSold: number;
  averageDaysHeld: number;
  annualizedYieldPct: number;
  realizedPnl: number;
  openTrades: number;
  completedTrades: number;
  currentState: WheelState | null;
  currentShares: number;
  currentCostBasis: number | null;
  capitalDeployed: number;
}

export interface WatchlistEntry {
  id: string;
  symbol: string;
  notes: string | null;
  createdAt: Date;
}

export interface Opportunity extends WheelRecommendation {
  id: string;
  isRead: boolean;
  scannedAt: Date;
}
