import { z } from 'zod';
import {
  assignmentProbability,
  calculateStrike,
  calculateStrikesForProfiles,
  DEFAULT_RISK_FREE_RATE,
} from '../../../src/engine/pricing.js';
import {
  probabilityResultToRecord,
  strikeResultToRecord,
} from '../../../src/engine/serialize.js';
import { expiryOutcome, nextState, validActions } from '../../../src/engine/state-machine.js';
import { errorMessage } from '../../../src/errors.js';
import { STRIKE_PROFILES } from '../../../src/types/pricing.js';

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

function ok(data: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data) }] };
}

function fail(err: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify({ error: errorMessage(err) }) }], isError: true };
}

/** Engine errors become an `isError` result instead of a protocol failure. */
function guarded<A>(fn: (args: A) => unknown): (args: A) => Promise<ToolResult> {
  return async args => {
    try {
      return ok(fn(args));
    } catch (err) {
      return fail(err);
    }
  };
}

const optionType = z.enum(['put', 'call']).describe("'put' or 'call'");
const wheelState = z.enum(['cash', 'cash_put_open', 'shares', 'shares_call_open']);

const pricingInputs = {
  price: z.number().describe('Current underlying price'),
  volatility: z.number().describe('Annualized volatility as a decimal, e.g. 0.30'),
  days: z.number().describe('Calendar days to expiration'),
  type: optionType,
  riskFreeRate: z.number().default(DEFAULT_RISK_FREE_RATE).describe('Annual risk-free rate'),
};

// ── Schemas ───────────────────────────────────────────────────────────────────

export const strikeAtSigmaShape = {
  ...pricingInputs,
  sigma: z.number().describe('Standard deviations out of the money'),
  availableStrikes: z.array(z.number()).optional().describe('Listed strikes to snap to'),
};

export const assignmentProbabilityShape = {
  ...pricingInputs,
  strike: z.number().describe('Option strike'),
};

export const profileStrikesShape = {
  ...pricingInputs,
  availableStrikes: z.array(z.number()).optional(),
};

export const nextStateShape = {
  state: wheelState,
  action: z.string().describe('sell_put, sell_call, expired_otm, assigned, called_away or closed_early'),
};

export const expiryOutcomeShape = {
  direction: optionType,
  strike: z.number(),
  priceAtExpiry: z.number(),
  contracts: z.number().int().positive().default(1),
  sharesHeld: z.number().int().nonnegative().default(0),
  costBasis: z.number().nullable().default(null),
};

type Args<S extends z.ZodRawShape> = z.output<z.ZodObject<S>>;

// ── Handlers ──────────────────────────────────────────────────────────────────

export const strikeAtSigmaTool = guarded((a: Args<typeof strikeAtSigmaShape>) =>
  strikeResultToRecord(calculateStrike(a.price, a.volatility, a.days, a.sigma, a.type, a.availableStrikes, a.riskFreeRate)),
);

export const assignmentProbabilityTool = guarded((a: Args<typeof assignmentProbabilityShape>) =>
  probabilityResultToRecord(assignmentProbability(a.strike, a.price, a.volatility, a.days, a.type, a.riskFreeRate)),
);

export const profileStrikesTool = guarded((a: Args<typeof profileStrikesShape>) => {
  const result = calculateStrikesForProfiles(a.price, a.volatility, a.days, a.type, a.availableStrikes, a.riskFreeRate);
  return {
    strikes: Object.fromEntries(STRIKE_PROFILES.map(p => [p, strikeResultToRecord(result.strikes[p])])),
    warnings: result.warnings,
    collapsed_profiles: result.collapsedProfiles,
    is_short_dte: result.isShortDte,
  };
});

export const nextStateTool = guarded((a: Args<typeof nextStateShape>) => ({
  state: a.state,
  action: a.action,
  next_state: nextState(a.state, a.action),
  valid_actions: validActions(a.state),
}));

export const expiryOutcomeTool = guarded((a: Args<typeof expiryOutcomeShape>) =>
  expiryOutcome(a.direction, a.strike, a.priceAtExpiry, a.contracts, {
    sharesHeld: a.sharesHeld,
    costBasis: a.costBasis,
  }),
);
