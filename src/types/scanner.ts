import type { OptionContract } from './options.js';
import type { DeltaBand } from './pricing.js';

export type SlippageModel = 'none' | 'full_spread' | 'half_spread' | 'half_spread_capped';

export type RejectionReason =
  | 'zero_bid'
  | 'low_premium'
  | 'wide_spread_absolute'
  | 'wide_spread_relative'
  | 'low_open_interest'
  | 'low_volume'
  | 'yield_too_low'
  | 'friction_too_high'
  | 'outside_delta_band'
  | 'earnings_week';

export interface RejectionDetail {
  reason: RejectionReason;
  actualValue: number;
  threshold: number;
  margin: number;           // 0 = exactly at threshold, grows as the candidate worsens
  marginDisplay: string;
}

export interface ExecutionCostEstimate {
  grossPremium: number;
  commission: number;
  slippage: number;
  netCredit: number;
  netCreditPerShare: number;
}

export interface CandidateStrike {
  contract: OptionContract;
  strike: number;
  expirationDate: string;
  delta: number;            // absolute model delta
  pItm: number;
  sigmaDistance: number | null;
  bid: number;
  ask: number;
  midPrice: number;
  spreadAbsolute: number;
  spreadRelativePct: number;
  openInterest: number;
  volume: number;
  costEstimate: ExecutionCostEstimate;
  deltaBand: DeltaBand | null;
  contractsToSell: number;
  totalNetCredit: number;
  annualizedYieldPct: number;
  daysToExpiry: number;
  deltaChain: number | null;
  warnings: string[];
  rejectionReasons: RejectionReason[];
  rejectionDetails: RejectionDetail[];
  bindingConstraint: RejectionDetail | null;
  nearMissScore: number;
  isRecommended: boolean;
}

export type AccountType = 'taxable' | 'qualified';

export interface PortfolioHolding {
  symbol: string;
  shares: number;
  costBasis?: number | null;
  acquiredDate?: string | null;
  accountType?: AccountType | null;
}

export interface BrokerChecklist {
  symbol: string;
  action: 'SELL TO OPEN';
  contracts: number;
  strike: number;
  expiration: string;
  optionType: 'CALL' | 'PUT';
  limitPrice: number;
  minAcceptableCredit: number;
  checks: string[];
  warnings: string[];
}

export interface MemoPayload {
  symbol: string;
  currentPrice: number;
  sharesHeld: number;
  contractsToWrite: number;
  candidate: Record<string, unknown>;
  holding: PortfolioHolding;
  riskProfile: DeltaBand;
  earningsStatus: 'CLEAR' | 'UNVERIFIED';
  dividendStatus: 'VERIFIED' | 'UNVERIFIED';
  accountType: AccountType | null;
  timestamp: string;
}

export interface ScanResult {
  symbol: string;
  currentPrice: number;
  sharesHeld: number;
  contractsAvailable: number;
  recommendedStrikes: CandidateStrike[];
  rejectedStrikes: CandidateStrike[];
  nearMissCandidates: CandidateStrike[];
  earningsDates: string[];
  hasEarningsConflict: boolean;
  brokerChecklist: BrokerChecklist | null;
  memoPayload: MemoPayload | null;
  warnings: string[];
  error: string | null;
}

export interface BlotterRecommendation {
  strike: number;
  expiration: string;
  contracts: number;
  netCredit: number;
  delta: number;
  annualizedYieldPct: number;
  deltaBand: DeltaBand | null;
}

export type BlotterEntry =
  | { symbol: string; status: 'ERROR'; error: string; recommendations: [] }
  | { symbol: string; status: 'NO_RECOMMENDATIONS'; rejectedCount: number; recommendations: [] }
  | {
      symbol: string;
      status: 'OK';
      currentPrice: number;
      shares: number;
      contractsAvailable: number;
      earningsClear: boolean;
      recommendations: BlotterRecommendation[];
      brokerChecklist: BrokerChecklist | null;
    };
