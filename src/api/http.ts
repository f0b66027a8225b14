import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import {
  DataUnavailableError,
  DuplicatePositionError,
  InsufficientCapacityError,
  InvalidInputError,
  InvalidStateError,
  InvalidTransitionError,
  PositionNotFoundError,
  TradeNotFoundError,
  WheelError,
  errorMessage,
} from '../errors.js';

/** Express 4 does not catch rejected handler promises; forward them to the error middleware. */
export function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidInputError(
      result.error.errors.map(e => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message)).join('; '),
    );
  }
  return result.data;
}

export function param(req: Request, name: string): string {
  const value = req.params[name];
  if (!value) throw new InvalidInputError(`Missing path parameter '${name}'`);
  return value;
}

export function statusFor(err: unknown): number {
  if (err instanceof InvalidInputError) return 400;
  if (err instanceof PositionNotFoundError || err instanceof TradeNotFoundError) return 404;
  if (
    err instanceof InvalidTransitionError ||
    err instanceof InvalidStateError ||
    err instanceof DuplicatePositionError
  ) return 409;
  if (err instanceof InsufficientCapacityError) return 422;
  if (err instanceof DataUnavailableError) return 503;
  return 500;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const status = statusFor(err);
  if (status === 500) console.error(`[API] ${req.method} ${req.path} failed:`, err);
  else console.warn(`[API] ${req.method} ${req.path} → ${status}: ${errorMessage(err)}`);

  const body: Record<string, unknown> = { error: errorMessage(err) };
  if (err instanceof WheelError) body['type'] = err.name;
  if (err instanceof InvalidTransitionError) body['valid_actions'] = err.validActions;
  res.status(status).json(body);
}
