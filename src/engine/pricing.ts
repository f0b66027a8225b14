/**
 * Strike and assignment-probability math for short option positions.
 *
 * Strikes are placed N standard deviations away from spot under a log-normal
 * model: K = S·exp(±n·σ·√T), T = days/365. Probabilities use Black-Scholes
 * d1/d2 with a constant risk-free rate. Everything here is pure.
 */

import { InvalidInputError } from '../errors.js';
import type { OptionType } from '../types/options.js';
import { STRIKE_PROFILES } from '../types/pricing.js';
import type {
  PricingResult,
  ProbabilityResult,
  ProfileStrikesResult,
  StrikeProfile,
  StrikeResult,
} from '../types/pricing.js';
import { profileTargetSigma } from './profiles.js';

export const DEFAULT_RISK_FREE_RATE = 0.05;
export const CALENDAR_DAYS_PER_YEAR = 365;
export const SHORT_DTE_DAYS = 14;

// [upper price bound (exclusive), increment]
const STRIKE_INCREMENTS: ReadonlyArray<readonly [number, number]> = [
  [5, 0.5],
  [25, 0.5],
  [200, 1.0],
  [500, 2.5],
  [Number.POSITIVE_INFINITY, 5.0],
];

// Rounding tolerance so 10.5 / 0.5 = 21.000000000000004 is still treated as on-grid.
const GRID_EPSILON = 1e-9;

// ── Validation ────────────────────────────────────────────────────────────────

export function assertOptionType(value: string): asserts value is OptionType {
  if (value !== 'call' && value !== 'put') {
    throw new InvalidInputError(`Option type must be 'call' or 'put', got '${value}'`);
  }
}

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidInputError(`${name} must be positive, got ${value}`);
  }
}

function validateInputs(price: number, volatility: number, days: number, optionType: string): void {
  assertPositive('Current price', price);
  assertPositive('Volatility', volatility);
  assertPositive('Days to expiry', days);
  assertOptionType(optionType);
}

// ── Normal distribution ───────────────────────────────────────────────────────

/** Abramowitz & Stegun 7.1.26, |error| < 1.5e-7. */
export function erf(x: number): number {
  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;
  const sign = x < 0 ? -1 : 1;
  const t = 1 / (1 + p * Math.abs(x));
  const y = 1 - ((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t * Math.exp(-x * x);
  return sign * y;
}

export function normCdf(x: number): number {
  return 0.5 * (1 + erf(x / Math.SQRT2));
}

// ── Strike placement ──────────────────────────────────────────────────────────

export function strikeAtSigma(
  price: number,
  volatility: number,
  daysToExpiry: number,
  sigma: number,
  optionType: string,
): number {
  validateInputs(price, volatility, daysToExpiry, optionType);
  const t = daysToExpiry / CALENDAR_DAYS_PER_YEAR;
  const n = optionType === 'call' ? Math.abs(sigma) : -Math.abs(sigma);
  return price * Math.exp(n * volatility * Math.sqrt(t));
}

/** Inverse of strikeAtSigma; OTM distance comes back positive for both calls and puts. */
export function sigmaForStrike(
  strike: number,
  price: number,
  volatility: number,
  daysToExpiry: number,
  optionType: string,
): number {
  validateInputs(price, volatility, daysToExpiry, optionType);
  assertPositive('Strike', strike);
  const t = daysToExpiry / CALENDAR_DAYS_PER_YEAR;
  const n = Math.log(strike / price) / (volatility * Math.sqrt(t));
  return optionType === 'call' ? n : -n;
}

export function strikeIncrement(price: number): number {
  for (const [upper, increment] of STRIKE_INCREMENTS) {
    if (price < upper) return increment;
  }
  return 5.0;
}

/**
 * Round a theoretical strike to something listable, always further OTM:
 * calls round up, puts round down. With a listed-strike list, calls take the
 * smallest listed strike >= theoretical and puts the largest <= theoretical;
 * if none qualifies the nearest listed strike is used.
 */
export function roundToTradeable(
  strike: number,
  price: number,
  optionType: string,
  availableStrikes?: readonly number[],
): number {
  assertOptionType(optionType);

  if (availableStrikes && availableStrikes.length > 0) {
    const sorted = [...availableStrikes].sort((a, b) => a - b);
    if (optionType === 'call') {
      const up = sorted.find(s => s >= strike);
      if (up !== undefined) return up;
    } else {
      const down = [...sorted].reverse().find(s => s <= strike);
      if (down !== undefined) return down;
    }
    return sorted.reduce((best, s) => (Math.abs(s - strike) < Math.abs(best - strike) ? s : best));
  }

  const increment = strikeIncrement(price);
  const steps = strike / increment;
  const rounded = optionType === 'call'
    ? Math.ceil(steps - GRID_EPSILON)
    : Math.floor(steps + GRID_EPSILON);
  return Math.round(rounded * increment * 100) / 100;
}

// ── Probability ───────────────────────────────────────────────────────────────

export function assignmentProbability(
  strike: number,
  price: number,
  volatility: number,
  daysToExpiry: number,
  optionType: string,
  riskFreeRate = DEFAULT_RISK_FREE_RATE,
): ProbabilityResult {
  validateInputs(price, volatility, daysToExpiry, optionType);
  assertPositive('Strike', strike);

  const t = daysToExpiry / CALENDAR_DAYS_PER_YEAR;
  const volSqrtT = volatility * Math.sqrt(t);
  const d1 = (Math.log(price / strike) + (riskFreeRate + (volatility * volatility) / 2) * t) / volSqrtT;
  const d2 = d1 - volSqrtT;

  const isCall = optionType === 'call';
  return {
    probability: isCall ? normCdf(d2) : normCdf(-d2),
    d1,
    d2,
    delta: isCall ? normCdf(d1) : normCdf(d1) - 1,
    strike,
    currentPrice: price,
    volatility,
    timeToExpiry: t,
    riskFreeRate,
    optionType: isCall ? 'call' : 'put',
  };
}

export function calculateStrike(
  price: number,
  volatility: number,
  daysToExpiry: number,
  sigma: number,
  optionType: string,
  availableStrikes?: readonly number[],
  riskFreeRate = DEFAULT_RISK_FREE_RATE,
): StrikeResult {
  const theoretical = strikeAtSigma(price, volatility, daysToExpiry, sigma, optionType);
  assertOptionType(optionType);
  const tradeable = roundToTradeable(theoretical, price, optionType, availableStrikes);
  const prob = assignmentProbability(tradeable, price, volatility, daysToExpiry, optionType, riskFreeRate);

  return {
    theoreticalStrike: theoretical,
    tradeableStrike: tradeable,
    sigma,
    currentPrice: price,
    volatility,
    daysToExpiry,
    optionType,
    assignmentProbability: prob.probability,
  };
}

/** Strike placement plus the full probability breakdown at the tradeable strike. */
export function priceStrike(
  price: number,
  volatility: number,
  daysToExpiry: number,
  sigma: number,
  optionType: string,
  availableStrikes?: readonly number[],
  riskFreeRate = DEFAULT_RISK_FREE_RATE,
): PricingResult {
  const strike = calculateStrike(price, volatility, daysToExpiry, sigma, optionType, availableStrikes, riskFreeRate);
  const probability = assignmentProbability(
    strike.tradeableStrike, price, volatility, daysToExpiry, optionType, riskFreeRate,
  );
  return { strike, probability };
}

/** One representative strike per risk profile, with short-DTE and collapse diagnostics. */
export function calculateStrikesForProfiles(
  price: number,
  volatility: number,
  daysToExpiry: number,
  optionType: string,
  availableStrikes?: readonly number[],
  riskFreeRate = DEFAULT_RISK_FREE_RATE,
): ProfileStrikesResult {
  const at = (profile: StrikeProfile): StrikeResult => calculateStrike(
    price, volatility, daysToExpiry, profileTargetSigma(profile), optionType, availableStrikes, riskFreeRate,
  );
  const strikes: Record<StrikeProfile, StrikeResult> = {
    aggressive: at('aggressive'),
    moderate: at('moderate'),
    conservative: at('conservative'),
    defensive: at('defensive'),
  };

  const warnings: string[] = [];
  const isShortDte = daysToExpiry < SHORT_DTE_DAYS;
  if (isShortDte) {
    warnings.push(`Short DTE (${daysToExpiry} days): sigma distances are compressed and profiles may overlap`);
  }

  const byStrike = new Map<number, StrikeProfile[]>();
  for (const profile of STRIKE_PROFILES) {
    const k = strikes[profile].tradeableStrike;
    byStrike.set(k, [...(byStrike.get(k) ?? []), profile]);
  }

  const collapsedProfiles: StrikeProfile[][] = [];
  for (const [strike, profiles] of byStrike) {
    if (profiles.length > 1) {
      collapsedProfiles.push(profiles);
      warnings.push(`Profiles ${profiles.join(', ')} collapse to same strike $${strike.toFixed(2)}`);
    }
  }

  return { strikes, warnings, collapsedProfiles, isShortDte };
}
