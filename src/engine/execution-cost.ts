import type { ExecutionCostEstimate } from '../types/scanner.js';
import type { ScannerConfig } from './scanner-config.js';

export const SHARES_PER_CONTRACT = 100;

/**
 * floor(shares × overwriteCapPct / 100 / 100). Fewer than 100 shares, or a cap
 * that rounds down to nothing, gives 0 and the holding is non-actionable.
 */
export function contractsToSell(shares: number, overwriteCapPct: number): number {
  if (shares < SHARES_PER_CONTRACT) return 0;
  return Math.max(0, Math.floor((shares * overwriteCapPct) / 100 / SHARES_PER_CONTRACT));
}

export function slippagePerShare(
  bid: number,
  ask: number,
  config: Pick<ScannerConfig, 'slippageModel' | 'maxSlippagePerContract'>,
): number {
  const spread = ask - bid;
  switch (config.slippageModel) {
    case 'none':
      return 0;
    case 'full_spread':
      // credit is already priced at the bid
      return 0;
    case 'half_spread':
      return spread / 2;
    case 'half_spread_capped':
      return Math.min(spread / 2, config.maxSlippagePerContract);
  }
}

export function executionCost(
  bid: number,
  ask: number,
  contracts: number,
  config: Pick<ScannerConfig, 'slippageModel' | 'maxSlippagePerContract' | 'perContractFee'>,
): ExecutionCostEstimate {
  const grossPremium = bid * SHARES_PER_CONTRACT * contracts;
  const commission = config.perContractFee * contracts;
  const slippage = slippagePerShare(bid, ask, config) * SHARES_PER_CONTRACT * contracts;
  const netCredit = grossPremium - commission - slippage;

  return {
    grossPremium,
    commission,
    slippage,
    netCredit,
    netCreditPerShare: contracts > 0 ? netCredit / (SHARES_PER_CONTRACT * contracts) : 0,
  };
}
