import type { OptionType } from './options.js';

export type StrikeProfile = 'aggressive' | 'moderate' | 'conservative' | 'defensive';

export const STRIKE_PROFILES: readonly StrikeProfile[] = ['aggressive', 'moderate', 'conservative', 'defensive'];

export type DeltaBand = 'defensive' | 'conservative' | 'moderate' | 'aggressive';

export const DELTA_BANDS: readonly DeltaBand[] = ['defensive', 'conservative', 'moderate', 'aggressive'];

export interface StrikeResult {
  theoreticalStrike: number;
  tradeableStrike: number;
  sigma: number;
  currentPrice: number;
  volatility: number;
  daysToExpiry: number;
  optionType: OptionType;
  assignmentProbability: number | null;
}

export interface ProbabilityResult {
  probability: number;      // P(ITM) at expiry, 0..1
  d1: number;
  d2: number;
  delta: number;
  strike: number;
  currentPrice: number;
  volatility: number;
  timeToExpiry: number;     // years
  riskFreeRate: number;
  optionType: OptionType;
}

/** theoretical/tradeable strike + probability + the intermediate d1/d2 terms */
export interface PricingResult {
  strike: StrikeResult;
  probability: ProbabilityResult;
}

export interface ProfileStrikesResult {
  strikes: Record<StrikeProfile, StrikeResult>;
  warnings: string[];
  collapsedProfiles: StrikeProfile[][];
  isShortDte: boolean;
}
