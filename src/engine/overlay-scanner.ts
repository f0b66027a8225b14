/**
 * Weekly covered-call overlay scanner.
 *
 * Holdings-driven: each holding is sized by the overwrite cap, every OTM call
 * in the first N expirations is priced, delta-banded, cost-estimated and run
 * through the tradability gates, the delta-band filter and the earnings gate.
 * Survivors are ranked by net credit; rejects keep near-miss diagnostics.
 */

import { z } from 'zod';
import { InvalidInputError } from '../errors.js';
import { callsOf, expirationsOf } from '../types/options.js';
import type { OptionContract } from '../types/options.js';
import type {
  CandidateStrike,
  ExecutionCostEstimate,
  PortfolioHolding,
  ScanResult,
} from '../types/scanner.js';
import { daysToExpiry } from './dates.js';
import { earningsBeforeExpiration } from './earnings.js';
import { contractsToSell, executionCost } from './execution-cost.js';
import {
  applyDeltaBandFilter,
  applyTradabilityFilters,
  earningsGate,
  rankNearMisses,
} from './filters.js';
import { generateBrokerChecklist, generateMemoPayload } from './formatters.js';
import { assignmentProbability, sigmaForStrike } from './pricing.js';
import { classifyDeltaBand } from './profiles.js';
import { createScannerConfig } from './scanner-config.js';
import type { ScannerConfig, ScannerConfigInput } from './scanner-config.js';

export const portfolioHoldingSchema = z.object({
  symbol: z.string().trim().min(1, 'Invalid symbol').transform(s => s.toUpperCase()),
  shares: z.number().int().nonnegative('Shares must be non-negative'),
  costBasis: z.number().nonnegative('Cost basis must be non-negative').nullish(),
  acquiredDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).nullish(),
  accountType: z.enum(['taxable', 'qualified']).nullish(),
});

export function parseHolding(input: unknown): PortfolioHolding {
  const result = portfolioHoldingSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError(result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; '));
  }
  return result.data;
}

export interface ScanOptions {
  earningsDates?: readonly string[];
  overrideEarningsCheck?: boolean;
  today?: Date;
}

function emptyResult(symbol: string, currentPrice: number, sharesHeld: number, contractsAvailable: number): ScanResult {
  return {
    symbol,
    currentPrice,
    sharesHeld,
    contractsAvailable,
    recommendedStrikes: [],
    rejectedStrikes: [],
    nearMissCandidates: [],
    earningsDates: [],
    hasEarningsConflict: false,
    brokerChecklist: null,
    memoPayload: null,
    warnings: [],
    error: null,
  };
}

export class OverlayScanner {
  readonly config: ScannerConfig;

  constructor(config: ScannerConfigInput = {}) {
    this.config = createScannerConfig(config);
    console.log(
      `[Scanner] delta_band=${this.config.deltaBand}, overwrite_cap=${this.config.overwriteCapPct}%`,
    );
  }

  calculateContractsToSell(shares: number): number {
    return contractsToSell(shares, this.config.overwriteCapPct);
  }

  calculateExecutionCost(bid: number, ask: number, contracts = 1): ExecutionCostEstimate {
    return executionCost(bid, ask, contracts, this.config);
  }

  /** Model delta (absolute) and P(ITM) for a call at this strike. */
  computeDelta(strike: number, currentPrice: number, volatility: number, days: number): { delta: number; pItm: number } {
    const prob = assignmentProbability(
      strike, currentPrice, volatility, Math.max(1, days), 'call', this.config.riskFreeRate,
    );
    return { delta: Math.abs(prob.delta), pItm: prob.probability };
  }

  scanHolding(
    holding: PortfolioHolding,
    currentPrice: number,
    chain: readonly OptionContract[],
    volatility: number,
    options: ScanOptions = {},
  ): ScanResult {
    if (!(currentPrice > 0)) throw new InvalidInputError(`Current price must be positive, got ${currentPrice}`);
    if (!(volatility > 0)) throw new InvalidInputError(`Volatility must be positive, got ${volatility}`);

    const today = options.today ?? new Date();
    const symbol = holding.symbol;
    const contracts = this.calculateContractsToSell(holding.shares);
    const result = emptyResult(symbol, currentPrice, holding.shares, contracts);

    if (contracts === 0) {
      result.error =
        `Non-actionable: ${holding.shares} shares < 100 shares minimum for 1 contract ` +
        `with ${this.config.overwriteCapPct}% cap`;
      result.warnings.push('Insufficient shares for contract sizing');
      return result;
    }

    const earningsDates = [...(options.earningsDates ?? [])];
    result.earningsDates = earningsDates;

    const calls = callsOf(chain);
    if (calls.length === 0) {
      result.error = 'No call options found in chain';
      return result;
    }

    const recommended: CandidateStrike[] = [];
    const rejected: CandidateStrike[] = [];

    for (const expiration of expirationsOf(calls).slice(0, this.config.weeksToScan)) {
      const earningsDate = earningsBeforeExpiration(earningsDates, expiration, today);

      if (earningsDate !== null && !options.overrideEarningsCheck && this.config.skipEarningsDefault) {
        result.hasEarningsConflict = true;
        console.log(`[Scanner] ${symbol}: skipping ${expiration}, spans earnings on ${earningsDate}`);
        continue;
      }

      const days = daysToExpiry(expiration, today);

      for (const contract of calls) {
        if (contract.expiration !== expiration) continue;
        const candidate = this.buildCandidate(contract, currentPrice, volatility, days, contracts);
        if (candidate === null) continue;

        const { reasons, details } = applyTradabilityFilters(candidate, this.config, currentPrice);

        const deltaDetail = applyDeltaBandFilter(candidate, this.config);
        if (deltaDetail) {
          reasons.push(deltaDetail.reason);
          details.push(deltaDetail);
        }

        if (earningsDate !== null) {
          const gate = earningsGate(earningsDate, expiration);
          reasons.push(gate.reason);
          details.push(gate);
          candidate.warnings.push(`Expiration spans earnings on ${earningsDate}`);
        }

        if (reasons.length > 0) {
          candidate.rejectionReasons = reasons;
          candidate.rejectionDetails = details;
          candidate.isRecommended = false;
          rejected.push(candidate);
        } else {
          recommended.push(candidate);
        }
      }
    }

    recommended.sort((a, b) => b.totalNetCredit - a.totalNetCredit);

    result.recommendedStrikes = recommended;
    result.rejectedStrikes = rejected;
    result.nearMissCandidates = rankNearMisses(rejected);

    const top = recommended[0];
    if (top) {
      const earningsClear = !result.hasEarningsConflict;
      result.brokerChecklist = generateBrokerChecklist({ symbol, candidate: top, config: this.config, earningsClear });
      result.memoPayload = generateMemoPayload({
        symbol, currentPrice, holding, candidate: top, config: this.config, earningsClear, now: today,
      });
    }

    console.log(
      `[Scanner] ${symbol}: ${recommended.length} recommended, ${rejected.length} rejected, contracts=${contracts}`,
    );
    return result;
  }

  /** Symbols missing a price, chain or volatility come back as error results. */
  scanPortfolio(
    holdings: readonly PortfolioHolding[],
    prices: ReadonlyMap<string, number>,
    chains: ReadonlyMap<string, readonly OptionContract[]>,
    volatilities: ReadonlyMap<string, number>,
    options: { earnings?: ReadonlyMap<string, readonly string[]>; overrideEarningsCheck?: boolean; today?: Date } = {},
  ): Map<string, ScanResult> {
    const results = new Map<string, ScanResult>();

    for (const holding of holdings) {
      const { symbol } = holding;
      const currentPrice = prices.get(symbol);
      const chain = chains.get(symbol);
      const volatility = volatilities.get(symbol);

      if (currentPrice === undefined) {
        results.set(symbol, { ...emptyResult(symbol, 0, holding.shares, 0), error: `No price data for ${symbol}` });
        continue;
      }
      if (chain === undefined) {
        results.set(symbol, {
          ...emptyResult(symbol, currentPrice, holding.shares, 0),
          error: `No options chain for ${symbol}`,
        });
        continue;
      }
      if (volatility === undefined) {
        results.set(symbol, {
          ...emptyResult(symbol, currentPrice, holding.shares, 0),
          error: `No volatility data for ${symbol}`,
        });
        continue;
      }

      results.set(symbol, this.scanHolding(holding, currentPrice, chain, volatility, {
        earningsDates: options.earnings?.get(symbol) ?? [],
        overrideEarningsCheck: options.overrideEarningsCheck,
        today: options.today,
      }));
    }

    console.log(`[Scanner] Scanned ${holdings.length} holdings, ${results.size} results`);
    return results;
  }

  private buildCandidate(
    contract: OptionContract,
    currentPrice: number,
    volatility: number,
    days: number,
    contracts: number,
  ): CandidateStrike | null {
    if (contract.strike <= currentPrice) return null;
    if (contract.bid === null || contract.ask === null) return null;
    if (contract.ask <= 0) return null;

    const bid = contract.bid;
    const ask = contract.ask;
    const midPrice = (bid + ask) / 2;
    const spreadAbsolute = ask - bid;
    const spreadRelativePct = midPrice > 0 ? (spreadAbsolute / midPrice) * 100 : 100;

    const { delta, pItm } = this.computeDelta(contract.strike, currentPrice, volatility, days);
    const sigmaDistance = sigmaForStrike(contract.strike, currentPrice, volatility, Math.max(1, days), 'call');
    const band = classifyDeltaBand(delta);
    const costEstimate = this.calculateExecutionCost(bid, ask, contracts);

    const positionValue = currentPrice * 100 * contracts;
    const annualizedYieldPct = positionValue > 0 && days > 0
      ? (costEstimate.netCredit / positionValue) * (365 / days) * 100
      : 0;

    return {
      contract,
      strike: contract.strike,
      expirationDate: contract.expiration,
      delta,
      pItm,
      sigmaDistance,
      bid,
      ask,
      midPrice,
      spreadAbsolute,
      spreadRelativePct,
      openInterest: contract.openInterest,
      volume: contract.volume,
      costEstimate,
      deltaBand: band === 'none' ? null : band,
      contractsToSell: contracts,
      totalNetCredit: costEstimate.netCredit,
      annualizedYieldPct,
      daysToExpiry: days,
      deltaChain: contract.delta != null ? Math.abs(contract.delta) : null,
      warnings: [],
      rejectionReasons: [],
      rejectionDetails: [],
      bindingConstraint: null,
      nearMissScore: 0,
      isRecommended: true,
    };
  }
}
