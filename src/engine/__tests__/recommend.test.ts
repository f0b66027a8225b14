import { afterEach, describe, expect, it, vi } from 'vitest';
import { InvalidInputError, InvalidStateError } from '../../errors.js';
import {
  RecommendationEngine,
  biasScore,
  contractsAvailable,
  describeEliminations,
  effectiveYieldIfAssigned,
  isNoCandidates,
} from '../recommend.js';
import { makeContract, makePosition, makeSnapshot } from './fixtures.js';

const TODAY = new Date('2026-10-19T15:00:00Z');

function put(strike: number, expiration: string, bid: number | null) {
  return makeContract({ type: 'put', strike, expiration, bid, ask: bid === null ? null : bid + 0.05 });
}

function call(strike: number, expiration: string, bid: number) {
  return makeContract({ type: 'call', strike, expiration, bid, ask: bid + 0.05 });
}

// price 100, vol 30%: 95/10-23 and 91/92 on 10-30 sit in the conservative band
const CHAIN = [
  put(95, '2026-10-23', 0.4),
  put(92, '2026-10-30', 0.5),
  put(91, '2026-10-30', 0.35),
  put(95, '2026-10-30', 1.0),   // ~0.98σ, aggressive
  put(90, '2026-10-30', 0),
  put(101, '2026-10-30', 2.5),
  put(90, '2026-11-06', 0.2),   // 18 DTE
  call(105, '2026-10-23', 0.3),
  call(106, '2026-10-30', 0.6),
];

afterEach(() => {
  vi.restoreAllMocks();
});

describe('biasScore', () => {
  it('weights sigma, time and P(ITM)', () => {
    expect(biasScore(2.5, 0, 0)).toBeCloseTo(1, 10);
    expect(biasScore(1.25, 22.5, 0.5)).toBeCloseTo(0.2 + 0.15 + 0.15, 10);
  });

  it('caps sigma at 2.5 and DTE at 45', () => {
    expect(biasScore(5, 90, 0.1)).toBeCloseTo(0.4 + 0 + 0.27, 10);
  });
});

describe('effectiveYieldIfAssigned', () => {
  it('nets the premium off the strike for puts and adds it for calls', () => {
    expect(effectiveYieldIfAssigned({ direction: 'put', strike: 95, premiumPerShare: 0.4 })).toBeCloseTo(94.6, 10);
    expect(effectiveYieldIfAssigned({ direction: 'call', strike: 105, premiumPerShare: 0.3 })).toBeCloseTo(105.3, 10);
  });
});

describe('contractsAvailable', () => {
  it('sizes puts from capital and calls from shares', () => {
    expect(contractsAvailable({ capitalAllocated: 19_000, sharesHeld: 0 }, 'put', 95)).toBe(2);
    expect(contractsAvailable({ capitalAllocated: 9_000, sharesHeld: 0 }, 'put', 95)).toBe(0);
    expect(contractsAvailable({ capitalAllocated: 0, sharesHeld: 250 }, 'call', 105)).toBe(2);
  });
});

describe('describeEliminations', () => {
  it('lists non-zero counts in a fixed order', () => {
    expect(describeEliminations({
      outside_dte: 0, itm: 2, zero_bid: 1, expired: 0, outside_profile: 0, no_capacity: 0,
    })).toBe('2 in the money, 1 zero bid');
  });

  it('reports an empty chain', () => {
    expect(describeEliminations({
      outside_dte: 0, itm: 0, zero_bid: 0, expired: 0, outside_profile: 0, no_capacity: 0,
    })).toBe('no contracts in chain');
  });
});

describe('RecommendationEngine.getRecommendations', () => {
  const engine = new RecommendationEngine({ riskFreeRate: 0.05 });

  it('ranks conservative puts by bias score', () => {
    const outcome = engine.getRecommendations(makePosition(), makeSnapshot({ chain: CHAIN }), { today: TODAY });
    expect(outcome.status).toBe('ok');
    if (outcome.status !== 'ok') return;

    const recs = outcome.recommendations;
    expect(recs.map(r => [r.strike, r.expirationDate])).toEqual([
      [95, '2026-10-23'],
      [91, '2026-10-30'],
      [92, '2026-10-30'],
    ]);
    expect(recs[0].biasScore).toBeCloseTo(0.81935, 4);
    expect(recs[0].sigmaDistance).toBeCloseTo(1.6333, 3);
    expect(recs[0].pItm).toBeCloseTo(0.05102, 4);
    expect(recs[0].dte).toBe(4);
    expect(recs[0].contracts).toBe(1);
    expect(recs[0].totalPremium).toBeCloseTo(40, 10);
    expect(recs[0].annualizedYieldPct).toBeCloseTo(38.421, 2);
    expect(recs[0].ask).toBeCloseTo(0.45, 10);
    expect(recs[0].profile).toBe('conservative');
  });

  it('adds warnings to returned candidates only', () => {
    const outcome = engine.getRecommendations(
      makePosition(),
      makeSnapshot({ chain: CHAIN, earningsDates: ['2026-10-28'] }),
      { today: TODAY },
    );
    if (outcome.status !== 'ok') throw new Error('expected recommendations');

    const [first, second, third] = outcome.recommendations;
    expect(first.warnings).toEqual(['Short DTE (4 days) - limited time for adjustment']);
    expect(second?.warnings).toEqual(['Earnings on 2026-10-28 before expiration - elevated volatility risk']);
    expect(third?.warnings).toEqual(['Earnings on 2026-10-28 before expiration - elevated volatility risk']);
  });

  it('honours the limit', () => {
    const outcome = engine.getRecommendations(makePosition(), makeSnapshot({ chain: CHAIN }), { today: TODAY, limit: 2 });
    if (outcome.status !== 'ok') throw new Error('expected recommendations');
    expect(outcome.recommendations.map(r => r.strike)).toEqual([95, 91]);
  });

  it('restricts to a requested expiration', () => {
    const outcome = engine.getRecommendations(makePosition(), makeSnapshot({ chain: CHAIN }), {
      today: TODAY,
      expirationDate: '2026-10-30',
    });
    if (outcome.status !== 'ok') throw new Error('expected recommendations');
    expect(outcome.recommendations.map(r => r.strike)).toEqual([91, 92]);
  });

  it('scans past the DTE window when maxDte is null', () => {
    const wide = new RecommendationEngine({ riskFreeRate: 0.05, maxDte: null });
    const outcome = wide.getRecommendations(makePosition(), makeSnapshot({ chain: CHAIN }), { today: TODAY });
    if (outcome.status !== 'ok') throw new Error('expected recommendations');
    expect(outcome.recommendations.map(r => [r.strike, r.expirationDate])).toEqual([
      [95, '2026-10-23'],
      [91, '2026-10-30'],
      [92, '2026-10-30'],
      [90, '2026-11-06'],
    ]);
  });

  it('recommends calls when holding shares', () => {
    const position = makePosition({ state: 'shares', capitalAllocated: 0, sharesHeld: 100, costBasis: 98 });
    const outcome = engine.getRecommendations(position, makeSnapshot({ chain: CHAIN }), { today: TODAY });
    if (outcome.status !== 'ok') throw new Error('expected recommendations');

    expect(outcome.recommendations).toHaveLength(1);
    const [rec] = outcome.recommendations;
    expect(rec.direction).toBe('call');
    expect(rec.strike).toBe(105);
    expect(rec.biasScore).toBeCloseTo(0.8038, 3);
    expect(rec.annualizedYieldPct).toBeCloseTo(27.375, 6);
  });

  it('explains why nothing qualified', () => {
    const outcome = engine.getRecommendations(
      makePosition({ capitalAllocated: 5_000 }),
      makeSnapshot({ chain: CHAIN }),
      { today: TODAY },
    );
    expect(outcome.status).toBe('no_candidates');
    if (outcome.status !== 'no_candidates') return;

    expect(outcome.noCandidates.contractsExamined).toBe(7);
    expect(outcome.noCandidates.eliminated).toEqual({
      outside_dte: 1, itm: 1, zero_bid: 1, expired: 0, outside_profile: 1, no_capacity: 3,
    });
    expect(outcome.noCandidates.message).toBe(
      'No suitable put options found for XYZ within conservative profile range ' +
      '(1 outside DTE window, 1 in the money, 1 zero bid, 1 outside profile range, 3 insufficient capacity)',
    );
  });

  it('reports an empty chain without throwing', () => {
    const outcome = engine.getRecommendations(makePosition(), makeSnapshot(), { today: TODAY });
    if (outcome.status !== 'no_candidates') throw new Error('expected no candidates');
    expect(outcome.noCandidates.message).toBe(
      'No suitable put options found for XYZ within conservative profile range (no contracts in chain)',
    );
  });

  it('rejects open states', () => {
    expect(() =>
      engine.getRecommendations(makePosition({ state: 'cash_put_open' }), makeSnapshot({ chain: CHAIN }), { today: TODAY }),
    ).toThrow(InvalidStateError);
  });

  it('rejects non-positive volatility', () => {
    expect(() =>
      engine.getRecommendations(makePosition(), makeSnapshot({ chain: CHAIN, volatility: 0 }), { today: TODAY }),
    ).toThrow(InvalidInputError);
  });
});

describe('RecommendationEngine.getRecommendation', () => {
  const engine = new RecommendationEngine({ riskFreeRate: 0.05 });

  it('returns the best candidate', () => {
    const rec = engine.getRecommendation(makePosition(), makeSnapshot({ chain: CHAIN }), { today: TODAY });
    expect(isNoCandidates(rec)).toBe(false);
    if (isNoCandidates(rec)) return;
    expect(rec.strike).toBe(95);
  });

  it('returns the elimination summary when nothing qualifies', () => {
    const rec = engine.getRecommendation(makePosition({ capitalAllocated: 5_000 }), makeSnapshot({ chain: CHAIN }), { today: TODAY });
    expect(isNoCandidates(rec)).toBe(true);
  });
});

describe('RecommendationEngine.scanOpportunities', () => {
  const engine = new RecommendationEngine({ riskFreeRate: 0.05 });

  it('normalises candidates to one contract and sorts by bias', () => {
    const results = engine.scanOpportunities([makeSnapshot({ chain: CHAIN })], {
      profiles: ['conservative'],
      directions: ['put'],
      today: TODAY,
    });

    expect(results.map(r => r.strike)).toEqual([95, 91, 92]);
    for (const r of results) expect(r.contracts).toBe(1);
    expect(results[0]?.totalPremium).toBeCloseTo(40, 10);
    expect(results[0]?.annualizedYieldPct).toBeCloseTo(38.421, 2);
  });

  it('skips markets the engine cannot price', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const results = engine.scanOpportunities(
      [makeSnapshot({ symbol: 'BAD', currentPrice: 0, chain: CHAIN }), makeSnapshot({ chain: CHAIN })],
      { profiles: ['conservative'], directions: ['call'], today: TODAY },
    );
    expect(results.map(r => [r.symbol, r.strike])).toEqual([['XYZ', 105]]);
    expect(warn).toHaveBeenCalledWith('[Recommend] BAD call/conservative skipped: Current price must be positive, got 0');
  });
});
