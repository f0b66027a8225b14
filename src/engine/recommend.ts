/**
 * Premium-collection recommendations for a wheel position.
 *
 * The position's state decides the side (CASH → put, SHARES → call). Contracts
 * in the DTE window are priced, kept when their sigma distance sits inside the
 * position's profile range, sized from capital or shares, then ranked by a bias
 * score that favours expiring worthless over absolute yield.
 */

import { InvalidInputError, InvalidStateError, errorMessage } from '../errors.js';
import type { MarketSnapshot } from '../types/market.js';
import type { OptionContract, OptionType } from '../types/options.js';
import { OPTION_TYPES, expirationsOf } from '../types/options.js';
import { STRIKE_PROFILES } from '../types/pricing.js';
import type { StrikeProfile } from '../types/pricing.js';
import type { WheelPosition, WheelRecommendation } from '../types/wheel.js';
import { daysToExpiry } from './dates.js';
import { earningsBeforeExpiration } from './earnings.js';
import { SHARES_PER_CONTRACT } from './execution-cost.js';
import { DEFAULT_RISK_FREE_RATE, assignmentProbability, sigmaForStrike } from './pricing.js';
import { PITM_WARNING_THRESHOLDS, PROFILE_SIGMA_RANGES, classifyProfile } from './profiles.js';
import { directionForState } from './state-machine.js';

export const DEFAULT_MAX_DTE = 14;
export const MAX_EXPIRATIONS = 3;
export const DEFAULT_RECOMMENDATION_LIMIT = 5;
export const LOW_YIELD_PCT = 5;
export const SHORT_DTE_WARNING_DAYS = 7;

// Bias weights: sigma distance (capped at 2.5σ), time (capped at 45 DTE), 1 − P(ITM)
const SIGMA_WEIGHT = 0.4;
const DTE_WEIGHT = 0.3;
const PITM_WEIGHT = 0.3;
const SIGMA_CAP = 2.5;
const DTE_CAP = 45;

// Synthetic positions for scans: unlimited capital for puts, one lot for calls
const SCAN_CAPITAL = 999_999_999;
const SCAN_SHARES = 100;

export type EliminationReason =
  | 'outside_dte'
  | 'itm'
  | 'zero_bid'
  | 'expired'
  | 'outside_profile'
  | 'no_capacity';

const ELIMINATION_ORDER: readonly EliminationReason[] = [
  'outside_dte', 'itm', 'zero_bid', 'expired', 'outside_profile', 'no_capacity',
];

const ELIMINATION_LABELS: Readonly<Record<EliminationReason, string>> = {
  outside_dte: 'outside DTE window',
  itm: 'in the money',
  zero_bid: 'zero bid',
  expired: 'expired',
  outside_profile: 'outside profile range',
  no_capacity: 'insufficient capacity',
};

export type EliminationCounts = Record<EliminationReason, number>;

export interface NoCandidatesResult {
  symbol: string;
  direction: OptionType;
  profile: StrikeProfile;
  contractsExamined: number;
  eliminated: EliminationCounts;
  message: string;
}

export type RecommendationOutcome =
  | { status: 'ok'; recommendations: [WheelRecommendation, ...WheelRecommendation[]] }
  | { status: 'no_candidates'; noCandidates: NoCandidatesResult };

export interface RecommendationEngineOptions {
  riskFreeRate?: number;
  /** Calendar-day window; null scans the first expirations regardless of distance. */
  maxDte?: number | null;
}

export interface RecommendOptions {
  limit?: number;
  expirationDate?: string;
  today?: Date;
}

function emptyCounts(): EliminationCounts {
  return { outside_dte: 0, itm: 0, zero_bid: 0, expired: 0, outside_profile: 0, no_capacity: 0 };
}

export function biasScore(sigmaDistance: number, dte: number, pItm: number): number {
  const sigmaScore = Math.min(sigmaDistance / SIGMA_CAP, 1);
  const dteScore = 1 - Math.min(dte / DTE_CAP, 1);
  const pItmScore = 1 - pItm;
  return SIGMA_WEIGHT * sigmaScore + DTE_WEIGHT * dteScore + PITM_WEIGHT * pItmScore;
}

/** Net price per share if the option is exercised: put buys at strike − premium, call sells at strike + premium. */
export function effectiveYieldIfAssigned(
  rec: Pick<WheelRecommendation, 'direction' | 'strike' | 'premiumPerShare'>,
): number {
  return rec.direction === 'put' ? rec.strike - rec.premiumPerShare : rec.strike + rec.premiumPerShare;
}

export function contractsAvailable(
  position: Pick<WheelPosition, 'capitalAllocated' | 'sharesHeld'>,
  direction: OptionType,
  strike: number,
): number {
  if (direction === 'put') {
    return strike > 0 ? Math.floor(position.capitalAllocated / (strike * SHARES_PER_CONTRACT)) : 0;
  }
  return Math.floor(position.sharesHeld / SHARES_PER_CONTRACT);
}

export function describeEliminations(counts: EliminationCounts): string {
  const parts = ELIMINATION_ORDER
    .filter(r => counts[r] > 0)
    .map(r => `${counts[r]} ${ELIMINATION_LABELS[r]}`);
  return parts.length > 0 ? parts.join(', ') : 'no contracts in chain';
}

export class RecommendationEngine {
  readonly riskFreeRate: number;
  readonly maxDte: number | null;

  constructor(options: RecommendationEngineOptions = {}) {
    this.riskFreeRate = options.riskFreeRate ?? DEFAULT_RISK_FREE_RATE;
    this.maxDte = options.maxDte === undefined ? DEFAULT_MAX_DTE : options.maxDte;
  }

  /** Ranked candidates for the side the position's state permits. */
  getRecommendations(
    position: WheelPosition,
    market: MarketSnapshot,
    options: RecommendOptions = {},
  ): RecommendationOutcome {
    const direction = directionForState(position.state);
    if (direction === null) {
      throw new InvalidStateError(
        `Cannot recommend in state ${position.state}. ` +
        'Wait for current position to expire or close it first.',
      );
    }
    return this.rank(position, direction, position.profile, market, options);
  }

  /** The single best candidate, or the elimination summary when none qualify. */
  getRecommendation(
    position: WheelPosition,
    market: MarketSnapshot,
    options: Omit<RecommendOptions, 'limit'> = {},
  ): WheelRecommendation | NoCandidatesResult {
    const outcome = this.getRecommendations(position, market, { ...options, limit: 1 });
    return outcome.status === 'ok' ? outcome.recommendations[0] : outcome.noCandidates;
  }

  /**
   * Every (direction, profile) pair over already-fetched snapshots, normalised
   * to one contract so candidates compare across symbols.
   */
  scanOpportunities(
    markets: readonly MarketSnapshot[],
    options: {
      profiles?: readonly StrikeProfile[];
      directions?: readonly OptionType[];
      limitPerPair?: number;
      today?: Date;
    } = {},
  ): WheelRecommendation[] {
    const profiles = options.profiles ?? STRIKE_PROFILES;
    const directions = options.directions ?? OPTION_TYPES;
    const results: WheelRecommendation[] = [];

    for (const market of markets) {
      for (const direction of directions) {
        for (const profile of profiles) {
          const position = syntheticPosition(market.symbol, direction, profile);
          try {
            const outcome = this.rank(position, direction, profile, market, {
              limit: options.limitPerPair ?? DEFAULT_RECOMMENDATION_LIMIT,
              today: options.today,
            });
            if (outcome.status === 'ok') results.push(...outcome.recommendations.map(normaliseToOneContract));
          } catch (err) {
            console.warn(`[Recommend] ${market.symbol} ${direction}/${profile} skipped: ${errorMessage(err)}`);
          }
        }
      }
    }

    return results.sort((a, b) => b.biasScore - a.biasScore);
  }

  private rank(
    position: WheelPosition,
    direction: OptionType,
    profile: StrikeProfile,
    market: MarketSnapshot,
    options: RecommendOptions,
  ): RecommendationOutcome {
    const { currentPrice, volatility } = market;
    if (!Number.isFinite(currentPrice) || currentPrice <= 0) {
      throw new InvalidInputError(`Current price must be positive, got ${currentPrice}`);
    }
    if (!Number.isFinite(volatility) || volatility <= 0) {
      throw new InvalidInputError(`Volatility must be positive, got ${volatility}`);
    }

    const today = options.today ?? new Date();
    const counts = emptyCounts();
    const sided = market.chain.filter(c => c.type === direction);
    const window = this.targetExpirations(sided, options.expirationDate, today);

    const candidates: WheelRecommendation[] = [];
    for (const contract of sided) {
      if (!window.has(contract.expiration)) {
        counts.outside_dte++;
        continue;
      }
      const rec = this.evaluate(contract, position, direction, profile, market, today, counts);
      if (rec) candidates.push(rec);
    }

    candidates.sort((a, b) => b.biasScore - a.biasScore);
    const [top, ...rest] = candidates;
    if (top === undefined) {
      return {
        status: 'no_candidates',
        noCandidates: this.noCandidates(position.symbol, direction, profile, sided.length, counts),
      };
    }

    const limit = Math.max(1, options.limit ?? DEFAULT_RECOMMENDATION_LIMIT);
    const ranked: [WheelRecommendation, ...WheelRecommendation[]] = [top, ...rest.slice(0, limit - 1)];
    for (const c of ranked) c.warnings.push(...this.warningsFor(c, market.earningsDates, today));

    return { status: 'ok', recommendations: ranked };
  }

  private targetExpirations(chain: readonly OptionContract[], expirationDate: string | undefined, today: Date): Set<string> {
    if (expirationDate !== undefined) return new Set([expirationDate]);
    const maxDte = this.maxDte;
    const inWindow = expirationsOf(chain).filter(e => maxDte === null || daysToExpiry(e, today) <= maxDte);
    return new Set(inWindow.slice(0, MAX_EXPIRATIONS));
  }

  private evaluate(
    contract: OptionContract,
    position: WheelPosition,
    direction: OptionType,
    profile: StrikeProfile,
    market: MarketSnapshot,
    today: Date,
    counts: EliminationCounts,
  ): WheelRecommendation | null {
    const { currentPrice, volatility } = market;
    const strike = contract.strike;

    if (direction === 'call' ? strike <= currentPrice : strike >= currentPrice) {
      counts.itm++;
      return null;
    }
    if (contract.bid === null || contract.bid <= 0) {
      counts.zero_bid++;
      return null;
    }
    const dte = daysToExpiry(contract.expiration, today);
    if (dte <= 0) {
      counts.expired++;
      return null;
    }

    const pricingDays = Math.max(1, dte);
    const sigmaDistance = sigmaForStrike(strike, currentPrice, volatility, pricingDays, direction);
    const [minSigma, maxSigma] = PROFILE_SIGMA_RANGES[profile];
    if (!Number.isFinite(sigmaDistance) || sigmaDistance < minSigma || sigmaDistance >= maxSigma) {
      counts.outside_profile++;
      return null;
    }

    const contracts = contractsAvailable(position, direction, strike);
    if (contracts <= 0) {
      counts.no_capacity++;
      return null;
    }

    const pItm = assignmentProbability(
      strike, currentPrice, volatility, pricingDays, direction, this.riskFreeRate,
    ).probability;

    const premiumPerShare = contract.bid;
    const totalPremium = premiumPerShare * contracts * SHARES_PER_CONTRACT;
    const collateral = (direction === 'put' ? strike : currentPrice) * SHARES_PER_CONTRACT * contracts;
    const annualizedYieldPct = collateral > 0 ? (totalPremium / collateral) * (365 / dte) * 100 : 0;

    return {
      symbol: position.symbol,
      direction,
      strike,
      expirationDate: contract.expiration,
      premiumPerShare,
      contracts,
      totalPremium,
      sigmaDistance,
      pItm,
      annualizedYieldPct,
      biasScore: biasScore(sigmaDistance, dte, pItm),
      dte,
      currentPrice,
      bid: contract.bid,
      ask: contract.ask ?? 0,
      profile,
      warnings: [],
    };
  }

  private warningsFor(rec: WheelRecommendation, earningsDates: readonly string[], today: Date): string[] {
    const warnings: string[] = [];

    const sigmaProfile = classifyProfile(rec.sigmaDistance);
    if (sigmaProfile !== 'none') {
      const threshold = PITM_WARNING_THRESHOLDS[sigmaProfile];
      if (rec.pItm > threshold) {
        warnings.push(
          `P(ITM) ${(rec.pItm * 100).toFixed(1)}% exceeds ${(threshold * 100).toFixed(0)}% threshold ` +
          '- higher assignment risk',
        );
      }
    }

    const earnings = earningsBeforeExpiration(earningsDates, rec.expirationDate, today);
    if (earnings !== null) {
      warnings.push(`Earnings on ${earnings} before expiration - elevated volatility risk`);
    }

    if (rec.annualizedYieldPct < LOW_YIELD_PCT) {
      warnings.push(`Low annualized yield: ${rec.annualizedYieldPct.toFixed(1)}%`);
    }

    if (rec.dte <= SHORT_DTE_WARNING_DAYS) {
      warnings.push(`Short DTE (${rec.dte} days) - limited time for adjustment`);
    }

    return warnings;
  }

  private noCandidates(
    symbol: string,
    direction: OptionType,
    profile: StrikeProfile,
    examined: number,
    eliminated: EliminationCounts,
  ): NoCandidatesResult {
    return {
      symbol,
      direction,
      profile,
      contractsExamined: examined,
      eliminated,
      message:
        `No suitable ${direction} options found for ${symbol} within ${profile} profile range ` +
        `(${describeEliminations(eliminated)})`,
    };
  }
}

function syntheticPosition(symbol: string, direction: OptionType, profile: StrikeProfile): WheelPosition {
  const now = new Date(0);
  return {
    id: `scan-${symbol}-${direction}-${profile}`,
    symbol,
    state: direction === 'put' ? 'cash' : 'shares',
    capitalAllocated: direction === 'put' ? SCAN_CAPITAL : 0,
    sharesHeld: direction === 'call' ? SCAN_SHARES : 0,
    costBasis: null,
    profile,
    createdAt: now,
    updatedAt: now,
    isActive: true,
  };
}

function normaliseToOneContract(rec: WheelRecommendation): WheelRecommendation {
  const collateral = (rec.direction === 'put' ? rec.strike : rec.currentPrice) * SHARES_PER_CONTRACT;
  const totalPremium = rec.premiumPerShare * SHARES_PER_CONTRACT;
  return {
    ...rec,
    contracts: 1,
    totalPremium,
    annualizedYieldPct: collateral > 0 ? (totalPremium / collateral) * (365 / rec.dte) * 100 : 0,
    warnings: [...rec.warnings],
  };
}

export function isNoCandidates(value: WheelRecommendation | NoCandidatesResult): value is NoCandidatesResult {
  return 'eliminated' in value;
}
