import type { CandidateStrike, RejectionDetail, RejectionReason } from '../types/scanner.js';
import { DELTA_BAND_RANGES } from './profiles.js';
import type { ScannerConfig } from './scanner-config.js';

export type ConstraintKind = 'min' | 'max';

export interface Margin {
  margin: number;
  display: string;
}

export interface FilterOutcome {
  reasons: RejectionReason[];
  details: RejectionDetail[];
}

export type FilterableCandidate = Pick<
  CandidateStrike,
  'bid' | 'midPrice' | 'spreadAbsolute' | 'spreadRelativePct' | 'openInterest' | 'volume' | 'costEstimate'
>;

export const NEAR_MISS_LIMIT = 5;
export const DEFAULT_MAX_NET_CREDIT = 100;

/**
 * Normalised distance to a threshold: 0 exactly at it, growing without bound
 * as the value worsens. "min" means actual must be >= threshold, "max" <=.
 */
export function marginOf(actual: number, threshold: number, kind: ConstraintKind): Margin {
  if (kind === 'min') {
    const margin = threshold === 0
      ? (actual <= 0 ? 1 : 0)
      : Math.max(0, (threshold - actual) / threshold);
    const shortfall = threshold - actual;
    return { margin, display: `${actual.toFixed(2)} vs ${threshold.toFixed(2)} (need +${shortfall.toFixed(2)})` };
  }
  const margin = threshold === 0
    ? (actual > 0 ? 1 : 0)
    : Math.max(0, (actual - threshold) / threshold);
  const excess = actual - threshold;
  return { margin, display: `${actual.toFixed(2)} vs ${threshold.toFixed(2)} (excess ${excess.toFixed(2)})` };
}

/**
 * Liquidity and economics gates. All are evaluated, except that "low premium"
 * is only considered once the bid is non-zero.
 */
export function applyTradabilityFilters(
  candidate: FilterableCandidate,
  config: ScannerConfig,
  currentPrice = 0,
): FilterOutcome {
  const reasons: RejectionReason[] = [];
  const details: RejectionDetail[] = [];
  const reject = (detail: RejectionDetail): void => {
    reasons.push(detail.reason);
    details.push(detail);
  };

  // 1-2. Bid
  if (candidate.bid <= 0) {
    reject({
      reason: 'zero_bid',
      actualValue: candidate.bid,
      threshold: 0.01,
      margin: 1.0,
      marginDisplay: `bid=$${candidate.bid.toFixed(2)} (no market)`,
    });
  } else if (candidate.bid < config.minBidPrice) {
    const { margin, display } = marginOf(candidate.bid, config.minBidPrice, 'min');
    reject({
      reason: 'low_premium',
      actualValue: candidate.bid,
      threshold: config.minBidPrice,
      margin,
      marginDisplay: `bid=${display}`,
    });
  }

  // 3. Absolute spread
  if (candidate.spreadAbsolute > config.maxSpreadAbsolute) {
    const { margin } = marginOf(candidate.spreadAbsolute, config.maxSpreadAbsolute, 'max');
    reject({
      reason: 'wide_spread_absolute',
      actualValue: candidate.spreadAbsolute,
      threshold: config.maxSpreadAbsolute,
      margin,
      marginDisplay: `spread=$${candidate.spreadAbsolute.toFixed(2)} vs $${config.maxSpreadAbsolute.toFixed(2)}`,
    });
  }

  // 4. Relative spread, skipped for cheap options where a few cents is a huge percentage
  if (
    candidate.midPrice >= config.minMidForRelativeSpread &&
    candidate.spreadRelativePct > config.maxSpreadRelativePct
  ) {
    const { margin } = marginOf(candidate.spreadRelativePct, config.maxSpreadRelativePct, 'max');
    reject({
      reason: 'wide_spread_relative',
      actualValue: candidate.spreadRelativePct,
      threshold: config.maxSpreadRelativePct,
      margin,
      marginDisplay:
        `spread%=${candidate.spreadRelativePct.toFixed(1)}% vs ${config.maxSpreadRelativePct.toFixed(1)}% ` +
        `(mid=$${candidate.midPrice.toFixed(2)})`,
    });
  }

  // 5. Open interest
  if (candidate.openInterest < config.minOpenInterest) {
    const { margin } = marginOf(candidate.openInterest, config.minOpenInterest, 'min');
    reject({
      reason: 'low_open_interest',
      actualValue: candidate.openInterest,
      threshold: config.minOpenInterest,
      margin,
      marginDisplay: `OI=${Math.trunc(candidate.openInterest)} vs ${Math.trunc(config.minOpenInterest)}`,
    });
  }

  // 6. Volume
  if (candidate.volume < config.minVolume) {
    const { margin } = marginOf(candidate.volume, config.minVolume, 'min');
    reject({
      reason: 'low_volume',
      actualValue: candidate.volume,
      threshold: config.minVolume,
      margin,
      marginDisplay: `vol=${Math.trunc(candidate.volume)} vs ${Math.trunc(config.minVolume)}`,
    });
  }

  // 7. Per-contract yield on notional, in basis points
  if (currentPrice > 0) {
    const notionalPerContract = currentPrice * 100;
    const netCreditPerContract = candidate.costEstimate.netCreditPerShare * 100;
    const actualBps = (netCreditPerContract / notionalPerContract) * 10_000;

    if (actualBps < config.minWeeklyYieldBps) {
      const { margin } = marginOf(actualBps, config.minWeeklyYieldBps, 'min');
      const minCredit = (config.minWeeklyYieldBps / 10_000) * notionalPerContract;
      reject({
        reason: 'yield_too_low',
        actualValue: actualBps,
        threshold: config.minWeeklyYieldBps,
        margin,
        marginDisplay:
          `yield=${actualBps.toFixed(1)}bps vs ${config.minWeeklyYieldBps.toFixed(1)}bps ` +
          `(need $${minCredit.toFixed(2)})`,
      });
    }
  }

  // 8. Friction floor
  const friction = candidate.costEstimate.commission + candidate.costEstimate.slippage;
  const minCredit = config.minFrictionMultiple * friction;
  const netCredit = candidate.costEstimate.netCredit;
  if (netCredit < minCredit) {
    const { margin } = marginOf(netCredit, minCredit, 'min');
    reject({
      reason: 'friction_too_high',
      actualValue: netCredit,
      threshold: minCredit,
      margin,
      marginDisplay:
        `net=$${netCredit.toFixed(2)} vs ${config.minFrictionMultiple.toFixed(1)}x friction ` +
        `($${minCredit.toFixed(2)})`,
    });
  }

  return { reasons, details };
}

/** Primary selector for weekly calls; kept apart from the generic gate set. */
export function applyDeltaBandFilter(
  candidate: Pick<CandidateStrike, 'delta'>,
  config: Pick<ScannerConfig, 'deltaBand'>,
): RejectionDetail | null {
  const [minDelta, maxDelta] = DELTA_BAND_RANGES[config.deltaBand];
  const delta = Math.abs(candidate.delta);

  if (minDelta <= delta && delta < maxDelta) return null;

  if (delta < minDelta) {
    const gap = minDelta - delta;
    return {
      reason: 'outside_delta_band',
      actualValue: delta,
      threshold: minDelta,
      margin: minDelta > 0 ? gap / minDelta : 1.0,
      marginDisplay: `delta=${delta.toFixed(3)} < ${minDelta.toFixed(2)} (need +${gap.toFixed(3)})`,
    };
  }

  const gap = delta - maxDelta;
  return {
    reason: 'outside_delta_band',
    actualValue: delta,
    threshold: maxDelta,
    margin: maxDelta > 0 ? gap / maxDelta : 1.0,
    marginDisplay: `delta=${delta.toFixed(3)} > ${maxDelta.toFixed(2)} (excess ${gap.toFixed(3)})`,
  };
}

/** Hard gate: never partially satisfiable. */
export function earningsGate(earningsDate: string, expiration: string): RejectionDetail {
  return {
    reason: 'earnings_week',
    actualValue: 1.0,
    threshold: 0.0,
    margin: 1.0,
    marginDisplay: `earnings on ${earningsDate} before ${expiration}`,
  };
}

// ── Near-miss ranking ──────────────────────────────────────────────────────────

export function bindingConstraint(details: readonly RejectionDetail[]): RejectionDetail | null {
  let best: RejectionDetail | null = null;
  for (const d of details) {
    if (best === null || d.margin < best.margin) best = d;
  }
  return best;
}

/**
 * 0.6·credit + 0.2·fewer-rejections + 0.2·closest-margin. A candidate with no
 * rejection details scores a full 1.0.
 */
export function nearMissScore(
  candidate: Pick<CandidateStrike, 'rejectionDetails' | 'totalNetCredit'>,
  maxNetCredit = DEFAULT_MAX_NET_CREDIT,
): number {
  const binding = bindingConstraint(candidate.rejectionDetails);
  if (binding === null) return 1.0;

  const creditScore = Math.min(1, candidate.totalNetCredit / maxNetCredit) * 0.6;
  const rejectionPenalty = Math.max(0, 1 - (candidate.rejectionDetails.length - 1) * 0.25);
  const marginScore = Math.max(0, 1 - binding.margin) * 0.2;
  return creditScore + rejectionPenalty * 0.2 + marginScore;
}

/** Sets bindingConstraint and nearMissScore on each rejected candidate; returns the top near misses. */
export function rankNearMisses(rejected: CandidateStrike[], limit = NEAR_MISS_LIMIT): CandidateStrike[] {
  const maxSeen = rejected.reduce((max, c) => Math.max(max, c.totalNetCredit), Number.NEGATIVE_INFINITY);
  // a non-positive best credit cannot normalize; negative credits would score as full credit
  const maxNetCredit = maxSeen > 0 ? maxSeen : DEFAULT_MAX_NET_CREDIT;

  for (const candidate of rejected) {
    if (candidate.rejectionDetails.length === 0) continue;
    candidate.bindingConstraint = bindingConstraint(candidate.rejectionDetails);
    candidate.nearMissScore = nearMissScore(candidate, maxNetCredit);
  }

  return [...rejected].sort((a, b) => b.nearMissScore - a.nearMissScore).slice(0, limit);
}
