/**
 * Flat records for the API, bot and export consumers.
 *
 * Fixed rounding: prices and premiums to 2 decimals, probabilities both as a
 * 4-decimal fraction and a 2-decimal percentage, yields as 2-decimal percentages.
 */

import type { ProbabilityResult, StrikeResult } from '../types/pricing.js';
import type {
  BrokerChecklist,
  CandidateStrike,
  ExecutionCostEstimate,
  MemoPayload,
  RejectionDetail,
  ScanResult,
} from '../types/scanner.js';
import type {
  PositionStatus,
  TradeRecord,
  WheelPerformance,
  WheelPosition,
  WheelRecommendation,
} from '../types/wheel.js';
import { effectiveYieldIfAssigned } from './recommend.js';

export type FlatRecord = Record<string, unknown>;

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export const price = (v: number): number => round(v, 2);
export const fraction = (v: number): number => round(v, 4);
export const pct = (v: number): number => round(v * 100, 2);

export function strikeResultToRecord(r: StrikeResult): FlatRecord {
  return {
    theoretical_strike: fraction(r.theoreticalStrike),
    tradeable_strike: r.tradeableStrike,
    sigma: r.sigma,
    current_price: price(r.currentPrice),
    volatility: fraction(r.volatility),
    volatility_pct: pct(r.volatility),
    days_to_expiry: r.daysToExpiry,
    option_type: r.optionType,
    assignment_probability: r.assignmentProbability === null ? null : fraction(r.assignmentProbability),
    assignment_probability_pct: r.assignmentProbability === null ? null : pct(r.assignmentProbability),
  };
}

export function probabilityResultToRecord(r: ProbabilityResult): FlatRecord {
  return {
    probability: fraction(r.probability),
    probability_pct: pct(r.probability),
    d1: fraction(r.d1),
    d2: fraction(r.d2),
    delta: fraction(r.delta),
    strike: r.strike,
    current_price: price(r.currentPrice),
    volatility: fraction(r.volatility),
    time_to_expiry_years: fraction(r.timeToExpiry),
    risk_free_rate: fraction(r.riskFreeRate),
    option_type: r.optionType,
  };
}

export function rejectionDetailToRecord(d: RejectionDetail): FlatRecord {
  return {
    reason: d.reason,
    actual_value: fraction(d.actualValue),
    threshold: fraction(d.threshold),
    margin: fraction(d.margin),
    margin_display: d.marginDisplay,
  };
}

export function executionCostToRecord(c: ExecutionCostEstimate): FlatRecord {
  return {
    gross_premium: price(c.grossPremium),
    commission: price(c.commission),
    slippage: price(c.slippage),
    net_credit: price(c.netCredit),
    net_credit_per_share: fraction(c.netCreditPerShare),
  };
}

export function candidateToRecord(c: CandidateStrike): FlatRecord {
  return {
    strike: c.strike,
    expiration_date: c.expirationDate,
    delta: fraction(c.delta),
    p_itm: fraction(c.pItm),
    p_itm_pct: pct(c.pItm),
    sigma_distance: c.sigmaDistance === null ? null : price(c.sigmaDistance),
    bid: price(c.bid),
    ask: price(c.ask),
    mid_price: price(c.midPrice),
    spread_absolute: price(c.spreadAbsolute),
    spread_relative_pct: price(c.spreadRelativePct),
    open_interest: c.openInterest,
    volume: c.volume,
    cost_estimate: executionCostToRecord(c.costEstimate),
    delta_band: c.deltaBand,
    contracts_to_sell: c.contractsToSell,
    total_net_credit: price(c.totalNetCredit),
    annualized_yield_pct: price(c.annualizedYieldPct),
    days_to_expiry: c.daysToExpiry,
    warnings: c.warnings,
    rejection_reasons: c.rejectionReasons,
    rejection_details: c.rejectionDetails.map(rejectionDetailToRecord),
    binding_constraint: c.bindingConstraint ? rejectionDetailToRecord(c.bindingConstraint) : null,
    near_miss_score: fraction(c.nearMissScore),
    is_recommended: c.isRecommended,
  };
}

export function checklistToRecord(c: BrokerChecklist): FlatRecord {
  return {
    symbol: c.symbol,
    action: c.action,
    contracts: c.contracts,
    strike: c.strike,
    expiration: c.expiration,
    option_type: c.optionType,
    limit_price: price(c.limitPrice),
    min_acceptable_credit: price(c.minAcceptableCredit),
    checks: c.checks,
    warnings: c.warnings,
  };
}

export function memoPayloadToRecord(m: MemoPayload): FlatRecord {
  return {
    symbol: m.symbol,
    current_price: price(m.currentPrice),
    shares_held: m.sharesHeld,
    contracts_to_write: m.contractsToWrite,
    candidate: m.candidate,
    holding: {
      symbol: m.holding.symbol,
      shares: m.holding.shares,
      cost_basis: m.holding.costBasis ?? null,
      acquired_date: m.holding.acquiredDate ?? null,
      account_type: m.holding.accountType ?? null,
    },
    risk_profile: m.riskProfile,
    earnings_status: m.earningsStatus,
    dividend_status: m.dividendStatus,
    account_type: m.accountType,
    timestamp: m.timestamp,
  };
}

export function scanResultToRecord(r: ScanResult): FlatRecord {
  return {
    symbol: r.symbol,
    current_price: price(r.currentPrice),
    shares_held: r.sharesHeld,
    contracts_available: r.contractsAvailable,
    recommended_strikes: r.recommendedStrikes.map(candidateToRecord),
    rejected_count: r.rejectedStrikes.length,
    near_miss_candidates: r.nearMissCandidates.map(candidateToRecord),
    earnings_dates: r.earningsDates,
    has_earnings_conflict: r.hasEarningsConflict,
    broker_checklist: r.brokerChecklist ? checklistToRecord(r.brokerChecklist) : null,
    memo_payload: r.memoPayload ? memoPayloadToRecord(r.memoPayload) : null,
    warnings: r.warnings,
    error: r.error,
  };
}

export function recommendationToRecord(r: WheelRecommendation): FlatRecord {
  return {
    symbol: r.symbol,
    direction: r.direction,
    profile: r.profile,
    strike: r.strike,
    expiration_date: r.expirationDate,
    premium_per_share: price(r.premiumPerShare),
    contracts: r.contracts,
    total_premium: price(r.totalPremium),
    sigma_distance: price(r.sigmaDistance),
    p_itm: fraction(r.pItm),
    p_itm_pct: pct(r.pItm),
    annualized_yield_pct: price(r.annualizedYieldPct),
    bias_score: fraction(r.biasScore),
    dte: r.dte,
    current_price: price(r.currentPrice),
    bid: price(r.bid),
    ask: price(r.ask),
    effective_yield_if_assigned: price(effectiveYieldIfAssigned(r)),
    warnings: r.warnings,
  };
}

export function wheelToRecord(w: WheelPosition): FlatRecord {
  return {
    id: w.id,
    symbol: w.symbol,
    state: w.state,
    capital_allocated: price(w.capitalAllocated),
    shares_held: w.sharesHeld,
    cost_basis: w.costBasis === null ? null : price(w.costBasis),
    profile: w.profile,
    is_active: w.isActive,
    created_at: w.createdAt.toISOString(),
    updated_at: w.updatedAt.toISOString(),
  };
}

export function tradeToRecord(t: TradeRecord, netPremium: number): FlatRecord {
  return {
    id: t.id,
    wheel_id: t.wheelId,
    symbol: t.symbol,
    direction: t.direction,
    strike: t.strike,
    expiration_date: t.expirationDate,
    premium_per_share: price(t.premiumPerShare),
    contracts: t.contracts,
    total_premium: price(t.totalPremium),
    opened_at: t.openedAt.toISOString(),
    closed_at: t.closedAt ? t.closedAt.toISOString() : null,
    outcome: t.outcome,
    price_at_expiry: t.priceAtExpiry === null ? null : price(t.priceAtExpiry),
    close_price: t.closePrice === null ? null : price(t.closePrice),
    net_premium: price(netPremium),
  };
}

export function positionStatusToRecord(s: PositionStatus): FlatRecord {
  return {
    symbol: s.symbol,
    direction: s.direction,
    strike: s.strike,
    expiration_date: s.expirationDate,
    dte_calendar: s.dteCalendar,
    dte_trading: s.dteTrading,
    current_price: price(s.currentPrice),
    price_vs_strike: price(s.priceVsStrike),
    is_itm: s.isItm,
    is_otm: s.isOtm,
    moneyness_pct: price(s.moneynessPct),
    moneyness_label: s.moneynessLabel,
    risk_level: s.riskLevel,
    premium_collected: price(s.premiumCollected),
    last_updated: s.lastUpdated.toISOString(),
  };
}

export function performanceToRecord(p: WheelPerformance): FlatRecord {
  return {
    symbol: p.symbol,
    total_premium: price(p.totalPremium),
    total_trades: p.totalTrades,
    completed_trades: p.completedTrades,
    open_trades: p.openTrades,
    winning_trades: p.winningTrades,
    assignment_events: p.assignmentEvents,
    called_away_events: p.calledAwayEvents,
    closed_early_count: p.closedEarlyCount,
    win_rate_pct: price(p.winRatePct),
    loss_rate_pct: price(p.lossRatePct),
    puts_sold: p.putsSold,
    calls_sold: p.callsSold,
    average_days_held: price(p.averageDaysHeld),
    annualized_yield_pct: price(p.annualizedYieldPct),
    realized_pnl: price(p.realizedPnl),
    current_state: p.currentState,
    current_shares: p.currentShares,
    current_cost_basis: p.currentCostBasis === null ? null : price(p.currentCostBasis),
    capital_deployed: price(p.capitalDeployed),
  };
}
