import type { WheelAction, WheelState } from './types/wheel.js';

export class WheelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Non-positive price/volatility/days or an unrecognised option type. Never clamped. */
export class InvalidInputError extends WheelError {}

export class InvalidTransitionError extends WheelError {
  constructor(
    readonly state: WheelState,
    readonly action: string,
    readonly validActions: readonly WheelAction[],
  ) {
    super(
      `Invalid action '${action}' for state ${state}. Valid actions: ${validActions.join(', ') || 'none'}`,
    );
  }
}

export class InsufficientCapacityError extends WheelError {}

export class DuplicatePositionError extends WheelError {}

export class PositionNotFoundError extends WheelError {}

export class TradeNotFoundError extends WheelError {}

/** Operation not allowed while the position is in its current state. */
export class InvalidStateError extends WheelError {}

export class DataUnavailableError extends WheelError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
