import type {
  BlotterEntry,
  BrokerChecklist,
  CandidateStrike,
  MemoPayload,
  PortfolioHolding,
  ScanResult,
} from '../types/scanner.js';
import type { ScannerConfig } from './scanner-config.js';
import { candidateToRecord, price, round } from './serialize.js';

/** What to re-verify at the broker before placing the top pick by hand. */
export function generateBrokerChecklist(params: {
  symbol: string;
  candidate: CandidateStrike;
  config: ScannerConfig;
  earningsClear: boolean;
  dividendVerified?: boolean;
}): BrokerChecklist {
  const { symbol, candidate, config, earningsClear } = params;
  const dividendVerified = params.dividendVerified ?? false;

  const checks = [
    `Verify current bid >= $${candidate.bid.toFixed(2)}`,
    `Verify spread <= $${config.maxSpreadAbsolute.toFixed(2)} or ${config.maxSpreadRelativePct.toFixed(0)}%`,
    `Verify open interest >= ${config.minOpenInterest}`,
    `Confirm ${candidate.contractsToSell} contracts x $${candidate.strike} strike`,
    `Expected net credit: $${candidate.totalNetCredit.toFixed(2)}`,
    earningsClear
      ? 'Earnings: CLEAR (no earnings before expiration)'
      : 'Earnings: VERIFY at broker (data may be stale)',
    dividendVerified
      ? 'Dividend: VERIFIED (no ex-div before expiration)'
      : 'Dividend: UNVERIFIED (check for early exercise risk)',
  ];

  const warnings = [...candidate.warnings];
  if (!dividendVerified) warnings.push('Dividend data unverified - check at broker');

  return {
    symbol,
    action: 'SELL TO OPEN',
    contracts: candidate.contractsToSell,
    strike: candidate.strike,
    expiration: candidate.expirationDate,
    optionType: 'CALL',
    limitPrice: candidate.midPrice,
    minAcceptableCredit: candidate.bid,
    checks,
    warnings,
  };
}

/** Structured summary handed to the memo writer. */
export function generateMemoPayload(params: {
  symbol: string;
  currentPrice: number;
  holding: PortfolioHolding;
  candidate: CandidateStrike;
  config: ScannerConfig;
  earningsClear: boolean;
  now?: Date;
}): MemoPayload {
  const { symbol, currentPrice, holding, candidate, config } = params;
  return {
    symbol,
    currentPrice,
    sharesHeld: holding.shares,
    contractsToWrite: candidate.contractsToSell,
    candidate: candidateToRecord(candidate),
    holding,
    riskProfile: config.deltaBand,
    earningsStatus: params.earningsClear ? 'CLEAR' : 'UNVERIFIED',
    dividendStatus: 'UNVERIFIED',
    accountType: holding.accountType ?? null,
    timestamp: (params.now ?? new Date()).toISOString(),
  };
}

function firstNetCredit(entry: BlotterEntry): number {
  return entry.status === 'OK' ? entry.recommendations[0]?.netCredit ?? 0 : 0;
}

/** Top-N recommendations per symbol, symbols ordered by their best net credit. */
export function generateTradeBlotter(results: Iterable<ScanResult>, topN = 3): BlotterEntry[] {
  const blotter: BlotterEntry[] = [];

  for (const result of results) {
    if (result.error !== null) {
      blotter.push({ symbol: result.symbol, status: 'ERROR', error: result.error, recommendations: [] });
      continue;
    }

    if (result.recommendedStrikes.length === 0) {
      blotter.push({
        symbol: result.symbol,
        status: 'NO_RECOMMENDATIONS',
        rejectedCount: result.rejectedStrikes.length,
        recommendations: [],
      });
      continue;
    }

    blotter.push({
      symbol: result.symbol,
      status: 'OK',
      currentPrice: price(result.currentPrice),
      shares: result.sharesHeld,
      contractsAvailable: result.contractsAvailable,
      earningsClear: !result.hasEarningsConflict,
      recommendations: result.recommendedStrikes.slice(0, topN).map(s => ({
        strike: s.strike,
        expiration: s.expirationDate,
        contracts: s.contractsToSell,
        netCredit: price(s.totalNetCredit),
        delta: round(s.delta, 3),
        annualizedYieldPct: price(s.annualizedYieldPct),
        deltaBand: s.deltaBand,
      })),
      brokerChecklist: result.brokerChecklist,
    });
  }

  return blotter.sort((a, b) => firstNetCredit(b) - firstNetCredit(a));
}
