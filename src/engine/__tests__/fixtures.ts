import type { MarketSnapshot } from '../../types/market.js';
import type { OptionContract } from '../../types/options.js';
import type { CandidateStrike } from '../../types/scanner.js';
import type { WheelPosition } from '../../types/wheel.js';

export function makeContract(overrides: Partial<OptionContract> = {}): OptionContract {
  return {
    symbol: 'XYZ261120C00055000',
    underlyingSymbol: 'XYZ',
    expiration: '2026-11-20',
    strike: 55,
    type: 'call',
    bid: 1.0,
    ask: 1.05,
    openInterest: 500,
    volume: 50,
    ...overrides,
  };
}

export function makeCandidate(overrides: Partial<CandidateStrike> = {}): CandidateStrike {
  return {
    contract: makeContract(),
    strike: 55,
    expirationDate: '2026-11-20',
    delta: 0.12,
    pItm: 0.1,
    sigmaDistance: null,
    bid: 1.0,
    ask: 1.05,
    midPrice: 1.025,
    spreadAbsolute: 0.05,
    spreadRelativePct: 4.88,
    openInterest: 500,
    volume: 50,
    costEstimate: { grossPremium: 100, commission: 0.65, slippage: 2.5, netCredit: 96.85, netCreditPerShare: 0.9685 },
    deltaBand: 'conservative',
    contractsToSell: 1,
    totalNetCredit: 96.85,
    annualizedYieldPct: 10,
    daysToExpiry: 7,
    deltaChain: null,
    warnings: [],
    rejectionReasons: [],
    rejectionDetails: [],
    bindingConstraint: null,
    nearMissScore: 0,
    isRecommended: false,
    ...overrides,
  };
}

export function makePosition(overrides: Partial<WheelPosition> = {}): WheelPosition {
  const created = new Date('2026-10-01T00:00:00Z');
  return {
    id: 'wheel-1',
    symbol: 'XYZ',
    state: 'cash',
    capitalAllocated: 10_000,
    sharesHeld: 0,
    costBasis: null,
    profile: 'conservative',
    createdAt: created,
    updatedAt: created,
    isActive: true,
    ...overrides,
  };
}

export function makeSnapshot(overrides: Partial<MarketSnapshot> = {}): MarketSnapshot {
  return {
    symbol: 'XYZ',
    currentPrice: 100,
    chain: [],
    volatility: 0.3,
    volatilitySource: 'override',
    earningsDates: [],
    fetchedAt: new Date('2026-10-19T15:00:00Z'),
    ...overrides,
  };
}
