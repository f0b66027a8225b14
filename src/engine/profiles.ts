import { DELTA_BANDS, STRIKE_PROFILES } from '../types/pricing.js';
import type { DeltaBand, StrikeProfile } from '../types/pricing.js';

type Range = readonly [min: number, max: number];

// Ordered, non-overlapping; a value matches when min <= v < max.
export const PROFILE_SIGMA_RANGES: Readonly<Record<StrikeProfile, Range>> = {
  aggressive: [0.5, 1.0],
  moderate: [1.0, 1.5],
  conservative: [1.5, 2.0],
  defensive: [2.0, 2.5],
};

export const DELTA_BAND_RANGES: Readonly<Record<DeltaBand, Range>> = {
  defensive: [0.05, 0.10],
  conservative: [0.10, 0.15],
  moderate: [0.15, 0.25],
  aggressive: [0.25, 0.35],
};

/** More aggressive profiles tolerate a higher probability of finishing ITM. */
export const PITM_WARNING_THRESHOLDS: Readonly<Record<StrikeProfile, number>> = {
  aggressive: 0.40,
  moderate: 0.30,
  conservative: 0.15,
  defensive: 0.07,
};

function lookup<K extends string>(keys: readonly K[], table: Readonly<Record<K, Range>>, value: number): K | 'none' {
  for (const key of keys) {
    const [min, max] = table[key];
    if (min <= value && value < max) return key;
  }
  return 'none';
}

export function classifyProfile(sigma: number): StrikeProfile | 'none' {
  return lookup(STRIKE_PROFILES, PROFILE_SIGMA_RANGES, sigma);
}

export function classifyDeltaBand(delta: number): DeltaBand | 'none' {
  return lookup(DELTA_BANDS, DELTA_BAND_RANGES, Math.abs(delta));
}

export function isStrikeProfile(value: string): value is StrikeProfile {
  return STRIKE_PROFILES.some(p => p === value);
}

export function isDeltaBand(value: string): value is DeltaBand {
  return DELTA_BANDS.some(b => b === value);
}

/** Midpoint of the profile's sigma range, used when one representative strike is needed. */
export function profileTargetSigma(profile: StrikeProfile): number {
  const [min, max] = PROFILE_SIGMA_RANGES[profile];
  return (min + max) / 2;
}
