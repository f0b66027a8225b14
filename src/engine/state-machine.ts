/**
 * Wheel lifecycle: CASH → put → (CASH | SHARES) → call → (SHARES | CASH).
 *
 * The transition table is the only source of truth for which side may be sold.
 * All functions are pure; the manager applies the results under its lock.
 */

import { InsufficientCapacityError, InvalidTransitionError } from '../errors.js';
import type { OptionType } from '../types/options.js';
import type { TradeOutcome, WheelAction, WheelPosition, WheelState } from '../types/wheel.js';
import { SHARES_PER_CONTRACT } from './execution-cost.js';

export const TRANSITIONS: Readonly<Record<WheelState, Readonly<Partial<Record<WheelAction, WheelState>>>>> = {
  cash: { sell_put: 'cash_put_open' },
  cash_put_open: { expired_otm: 'cash', assigned: 'shares', closed_early: 'cash' },
  shares: { sell_call: 'shares_call_open' },
  shares_call_open: { expired_otm: 'shares', called_away: 'cash', closed_early: 'shares' },
};

const ACTION_ORDER: readonly WheelAction[] = [
  'sell_put', 'sell_call', 'expired_otm', 'assigned', 'called_away', 'closed_early',
];

export function validActions(state: WheelState): WheelAction[] {
  return ACTION_ORDER.filter(a => TRANSITIONS[state][a] !== undefined);
}

export function isWheelAction(value: string): value is WheelAction {
  return ACTION_ORDER.some(a => a === value);
}

export function canTransition(state: WheelState, action: string): boolean {
  return isWheelAction(action) && TRANSITIONS[state][action] !== undefined;
}

/** Throws InvalidTransitionError listing the legal actions when `action` is not allowed. */
export function nextState(state: WheelState, action: string): WheelState {
  const next = isWheelAction(action) ? TRANSITIONS[state][action] : undefined;
  if (next === undefined) throw new InvalidTransitionError(state, action, validActions(state));
  return next;
}

export function isOpenState(state: WheelState): boolean {
  return state === 'cash_put_open' || state === 'shares_call_open';
}

/** Which side the state permits selling, or null while a trade is open. */
export function directionForState(state: WheelState): OptionType | null {
  if (state === 'cash') return 'put';
  if (state === 'shares') return 'call';
  return null;
}

export function sellAction(direction: OptionType): WheelAction {
  return direction === 'put' ? 'sell_put' : 'sell_call';
}

// ── Capacity ──────────────────────────────────────────────────────────────────

export function assertPutCapacity(strike: number, contracts: number, capital: number): void {
  const required = strike * contracts * SHARES_PER_CONTRACT;
  if (required > capital) {
    throw new InsufficientCapacityError(
      `Need $${required.toFixed(2)} for ${contracts} contracts @ $${strike} strike, ` +
      `but only $${capital.toFixed(2)} allocated`,
    );
  }
}

export function assertCallCapacity(contracts: number, sharesHeld: number): void {
  const required = contracts * SHARES_PER_CONTRACT;
  if (required > sharesHeld) {
    throw new InsufficientCapacityError(
      `Need ${required} shares for ${contracts} contracts, but only ${sharesHeld} held`,
    );
  }
}

export function assertCapacity(
  position: Pick<WheelPosition, 'capitalAllocated' | 'sharesHeld'>,
  direction: OptionType,
  strike: number,
  contracts: number,
): void {
  if (direction === 'put') assertPutCapacity(strike, contracts, position.capitalAllocated);
  else assertCallCapacity(contracts, position.sharesHeld);
}

// ── Expiry ────────────────────────────────────────────────────────────────────

export interface ExpiryResolution {
  outcome: Exclude<TradeOutcome, 'open' | 'closed_early'>;
  action: WheelAction;
  nextState: WheelState;
  sharesHeld: number;
  costBasis: number | null;
}

/**
 * Settles an expiring short option. price == strike resolves against the
 * seller (assigned / called away).
 */
export function expiryOutcome(
  direction: OptionType,
  strike: number,
  priceAtExpiry: number,
  contracts: number,
  current: Pick<WheelPosition, 'sharesHeld' | 'costBasis'> = { sharesHeld: 0, costBasis: null },
): ExpiryResolution {
  if (direction === 'put') {
    if (priceAtExpiry > strike) {
      return {
        outcome: 'expired_worthless',
        action: 'expired_otm',
        nextState: nextState('cash_put_open', 'expired_otm'),
        sharesHeld: current.sharesHeld,
        costBasis: current.costBasis,
      };
    }
    return {
      outcome: 'assigned',
      action: 'assigned',
      nextState: nextState('cash_put_open', 'assigned'),
      sharesHeld: contracts * SHARES_PER_CONTRACT,
      costBasis: strike,
    };
  }

  if (priceAtExpiry < strike) {
    return {
      outcome: 'expired_worthless',
      action: 'expired_otm',
      nextState: nextState('shares_call_open', 'expired_otm'),
      sharesHeld: current.sharesHeld,
      costBasis: current.costBasis,
    };
  }
  return {
    outcome: 'called_away',
    action: 'called_away',
    nextState: nextState('shares_call_open', 'called_away'),
    sharesHeld: 0,
    costBasis: null,
  };
}
