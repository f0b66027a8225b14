import { describe, expect, it } from 'vitest';
import type { RejectionDetail } from '../../types/scanner.js';
import { executionCost } from '../execution-cost.js';
import {
  applyDeltaBandFilter,
  applyTradabilityFilters,
  bindingConstraint,
  earningsGate,
  marginOf,
  nearMissScore,
  rankNearMisses,
} from '../filters.js';
import { createScannerConfig } from '../scanner-config.js';
import { makeCandidate } from './fixtures.js';

const config = createScannerConfig();

const detail = (margin: number, reason: RejectionDetail['reason'] = 'low_volume'): RejectionDetail => ({
  reason,
  actualValue: 0,
  threshold: 0,
  margin,
  marginDisplay: '',
});

describe('marginOf', () => {
  it('is zero exactly at the threshold', () => {
    expect(marginOf(100, 100, 'min').margin).toBe(0);
    expect(marginOf(0.1, 0.1, 'max').margin).toBe(0);
  });

  it('grows as the value moves away from the threshold', () => {
    const a = marginOf(80, 100, 'min').margin;
    const b = marginOf(50, 100, 'min').margin;
    const c = marginOf(25, 100, 'min').margin;
    expect(a).toBeCloseTo(0.2, 10);
    expect(b).toBeGreaterThan(a);
    expect(c).toBeGreaterThan(b);
    expect(marginOf(0.15, 0.1, 'max').margin).toBeCloseTo(0.5, 10);
  });

  it('clamps a passing value to zero', () => {
    expect(marginOf(150, 100, 'min').margin).toBe(0);
    expect(marginOf(0.05, 0.1, 'max').margin).toBe(0);
  });

  it('treats a zero threshold as pass/fail', () => {
    expect(marginOf(0, 0, 'min').margin).toBe(1);
    expect(marginOf(2, 0, 'max').margin).toBe(1);
  });

  it('describes the shortfall', () => {
    expect(marginOf(0.03, 0.05, 'min').display).toBe('0.03 vs 0.05 (need +0.02)');
  });
});

describe('applyTradabilityFilters', () => {
  it('passes a liquid, well-priced contract', () => {
    const outcome = applyTradabilityFilters(makeCandidate(), config, 50);
    expect(outcome.reasons).toEqual([]);
  });

  it('rejects a zero bid with margin 1.0 regardless of other fields', () => {
    const cost = executionCost(0, 0.05, 1, config);
    const outcome = applyTradabilityFilters(
      makeCandidate({ bid: 0, ask: 0.05, midPrice: 0.025, spreadAbsolute: 0.05, costEstimate: cost }),
      config,
      50,
    );
    expect(outcome.reasons[0]).toBe('zero_bid');
    expect(outcome.details[0]?.margin).toBe(1.0);
    expect(outcome.reasons).not.toContain('low_premium');
    expect(bindingConstraint(outcome.details)?.reason).toBe('zero_bid');
  });

  it('flags low premium only when the bid is non-zero', () => {
    const outcome = applyTradabilityFilters(makeCandidate({ bid: 0.03 }), config, 50);
    expect(outcome.reasons).toContain('low_premium');
    expect(outcome.details.find(d => d.reason === 'low_premium')?.marginDisplay).toBe('bid=0.03 vs 0.05 (need +0.02)');
  });

  it('skips the relative spread check for cheap options', () => {
    const cheap = applyTradabilityFilters(
      makeCandidate({ midPrice: 0.3, spreadAbsolute: 0.08, spreadRelativePct: 26.7 }),
      config,
      50,
    );
    expect(cheap.reasons).not.toContain('wide_spread_relative');

    const pricey = applyTradabilityFilters(
      makeCandidate({ midPrice: 0.6, spreadAbsolute: 0.08, spreadRelativePct: 26.7 }),
      config,
      50,
    );
    expect(pricey.reasons).toEqual(['wide_spread_relative']);
  });

  it('collects every liquidity failure', () => {
    const outcome = applyTradabilityFilters(
      makeCandidate({ spreadAbsolute: 0.2, openInterest: 20, volume: 2 }),
      config,
      50,
    );
    expect(outcome.reasons).toEqual(['wide_spread_absolute', 'low_open_interest', 'low_volume']);
    expect(outcome.details[1]?.marginDisplay).toBe('OI=20 vs 100');
  });

  it('rejects credits below the friction multiple', () => {
    const outcome = applyTradabilityFilters(
      makeCandidate({
        costEstimate: { grossPremium: 8, commission: 0.65, slippage: 2.5, netCredit: 4.85, netCreditPerShare: 0.0485 },
      }),
      config,
    );
    expect(outcome.reasons).toEqual(['friction_too_high']);
    expect(outcome.details[0]?.threshold).toBeCloseTo(6.3, 10);
  });
});

describe('applyDeltaBandFilter', () => {
  it('accepts a delta inside the half-open band', () => {
    expect(applyDeltaBandFilter({ delta: 0.12 }, config)).toBeNull();
    expect(applyDeltaBandFilter({ delta: 0.10 }, config)).toBeNull();
  });

  it('rejects deltas below and at or above the band', () => {
    const low = applyDeltaBandFilter({ delta: 0.05 }, config);
    expect(low?.margin).toBeCloseTo(0.5, 10);
    expect(low?.marginDisplay).toBe('delta=0.050 < 0.10 (need +0.050)');

    const high = applyDeltaBandFilter({ delta: 0.2 }, config);
    expect(high?.threshold).toBe(0.15);
    expect(high?.margin).toBeCloseTo(1 / 3, 6);

    expect(applyDeltaBandFilter({ delta: 0.15 }, config)?.reason).toBe('outside_delta_band');
  });
});

describe('earningsGate', () => {
  it('is a hard rejection', () => {
    expect(earningsGate('2026-11-18', '2026-11-20')).toEqual({
      reason: 'earnings_week',
      actualValue: 1.0,
      threshold: 0.0,
      margin: 1.0,
      marginDisplay: 'earnings on 2026-11-18 before 2026-11-20',
    });
  });
});

describe('near-miss ranking', () => {
  it('scores credit, rejection count and closest margin', () => {
    expect(nearMissScore(makeCandidate({ totalNetCredit: 50, rejectionDetails: [detail(0.2)] }), 100))
      .toBeCloseTo(0.66, 10);
    expect(nearMissScore(makeCandidate({ totalNetCredit: 50, rejectionDetails: [detail(0.2), detail(0.5)] }), 100))
      .toBeCloseTo(0.61, 10);
    expect(nearMissScore(makeCandidate(), 100)).toBe(1.0);
  });

  it('sets the binding constraint and orders by score', () => {
    const far = makeCandidate({ strike: 60, totalNetCredit: 10, rejectionDetails: [detail(0.9), detail(0.95)] });
    const close = makeCandidate({ strike: 57, totalNetCredit: 40, rejectionDetails: [detail(0.1, 'low_open_interest')] });

    const ranked = rankNearMisses([far, close], 5);
    expect(ranked.map(c => c.strike)).toEqual([57, 60]);
    expect(close.bindingConstraint?.reason).toBe('low_open_interest');
    expect(far.bindingConstraint?.margin).toBe(0.9);
  });

  it('limits the number of near misses', () => {
    const rejected = [1, 2, 3].map(i => makeCandidate({ strike: 50 + i, totalNetCredit: i, rejectionDetails: [detail(0.5)] }));
    expect(rankNearMisses(rejected, 2).map(c => c.strike)).toEqual([53, 52]);
  });

  it('scales against the default credit when no rejected contract nets a credit', () => {
    const loser = makeCandidate({ strike: 55, totalNetCredit: -5, rejectionDetails: [detail(0.5)] });

    rankNearMisses([loser], 5);
    // -5/100·0.6 + 0.2 + 0.5·0.2
    expect(loser.nearMissScore).toBeCloseTo(0.27, 10);
  });
});
