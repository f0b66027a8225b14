import { z } from 'zod';
import { InvalidInputError } from '../errors.js';

export const scannerConfigSchema = z.object({
  overwriteCapPct: z.number()
    .gt(0, 'overwriteCapPct must be between 0 and 100')
    .lte(100, 'overwriteCapPct must be between 0 and 100')
    .default(25),
  perContractFee: z.number().nonnegative('perContractFee must be non-negative').default(0.65),
  slippageModel: z.enum(['none', 'full_spread', 'half_spread', 'half_spread_capped']).default('half_spread_capped'),
  maxSlippagePerContract: z.number().nonnegative().default(0.10),
  minWeeklyYieldBps: z.number().nonnegative('minWeeklyYieldBps must be non-negative').default(10),
  minFrictionMultiple: z.number().gte(1, 'minFrictionMultiple must be >= 1').default(2),
  skipEarningsDefault: z.boolean().default(true),
  deltaBand: z.enum(['defensive', 'conservative', 'moderate', 'aggressive']).default('conservative'),
  minOpenInterest: z.number().int().nonnegative().default(100),
  minVolume: z.number().int().nonnegative().default(10),
  maxSpreadAbsolute: z.number().nonnegative().default(0.10),
  maxSpreadRelativePct: z.number().nonnegative().default(20),
  minMidForRelativeSpread: z.number().nonnegative().default(0.50),
  minBidPrice: z.number().nonnegative().default(0.05),
  weeksToScan: z.number().int().positive().default(3),
  riskFreeRate: z.number().default(0.05),
});

export type ScannerConfig = z.infer<typeof scannerConfigSchema>;
export type ScannerConfigInput = z.input<typeof scannerConfigSchema>;

/** Apply defaults and validate; throws InvalidInputError listing every violated rule. */
export function createScannerConfig(overrides: ScannerConfigInput = {}): ScannerConfig {
  const result = scannerConfigSchema.safeParse(overrides);
  if (!result.success) {
    const issues = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new InvalidInputError(`Invalid scanner config: ${issues}`);
  }
  return result.data;
}
