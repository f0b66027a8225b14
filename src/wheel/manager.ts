/**
 * Wheel lifecycle service: creates positions, records trades and settles them.
 *
 * Every mutating call takes the symbol's lock for the whole read → validate →
 * write sequence, so two trades recorded at once against one wheel cannot both
 * pass the capacity check.
 */

import { z } from 'zod';
import { SHARES_PER_CONTRACT } from '../engine/execution-cost.js';
import { isStrikeProfile } from '../engine/profiles.js';
import type { NoCandidatesResult, RecommendationEngine, RecommendationOutcome } from '../engine/recommend.js';
import {
  assertCapacity,
  expiryOutcome,
  isOpenState,
  nextState,
  sellAction,
} from '../engine/state-machine.js';
import {
  DataUnavailableError,
  DuplicatePositionError,
  InvalidInputError,
  InvalidStateError,
  PositionNotFoundError,
  TradeNotFoundError,
  errorMessage,
} from '../errors.js';
import type { SnapshotSource } from '../lib/market-snapshot.js';
import { STRIKE_PROFILES } from '../types/pricing.js';
import type { StrikeProfile } from '../types/pricing.js';
import type { TradeOutcome, TradeRecord, WheelPosition, WheelRecommendation } from '../types/wheel.js';
import { KeyedMutex } from './keyed-mutex.js';
import { netPremium } from './performance.js';
import type { Clock } from './price-cache.js';
import type { WheelStore } from './store.js';

export const DEFAULT_PROFILE: StrikeProfile = 'conservative';

const symbolSchema = z.string().trim().min(1, 'Symbol is required').max(10).transform(s => s.toUpperCase());

const tradeInputSchema = z.object({
  direction: z.string().transform(s => s.toLowerCase()).pipe(
    z.enum(['put', 'call'], { errorMap: () => ({ message: "Direction must be 'put' or 'call'" }) }),
  ),
  strike: z.number().positive('Strike must be positive'),
  expirationDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expiration must be YYYY-MM-DD'),
  premium: z.number().nonnegative('Premium must be non-negative'),
  contracts: z.number().int('Contracts must be a whole number').positive('Contracts must be positive'),
});

export type TradeInput = z.input<typeof tradeInputSchema>;

function parse<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidInputError(result.error.errors.map(e => e.message).join('; '));
  }
  return result.data;
}

function parseProfile(profile: string): StrikeProfile {
  const lower = profile.toLowerCase();
  if (!isStrikeProfile(lower)) {
    throw new InvalidInputError(`Invalid profile '${profile}'. Valid: ${STRIKE_PROFILES.join(', ')}`);
  }
  return lower;
}

export class WheelManager {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly store: WheelStore,
    private readonly engine: RecommendationEngine,
    private readonly market: SnapshotSource | null = null,
    private readonly clock: Clock = () => new Date(),
  ) {}

  // ── Wheels ──────────────────────────────────────────────────────────────────

  async createWheel(symbol: string, capital: number, profile: string = DEFAULT_PROFILE): Promise<WheelPosition> {
    const sym = parse(symbolSchema, symbol);
    if (!(capital > 0)) throw new InvalidInputError(`Capital must be positive, got ${capital}`);
    const strikeProfile = parseProfile(profile);

    return this.locks.runExclusive(sym, async () => {
      if (await this.store.getWheel(sym)) {
        throw new DuplicatePositionError(`Wheel already exists for ${sym}. Close it first or use a different symbol.`);
      }
      const wheel = await this.store.createWheel({
        symbol: sym,
        state: 'cash',
        capitalAllocated: capital,
        sharesHeld: 0,
        costBasis: null,
        profile: strikeProfile,
      });
      console.log(`[Wheel] Created ${sym}: $${capital.toFixed(2)} capital, ${strikeProfile} profile`);
      return wheel;
    });
  }

  /** Starts a wheel in SHARES so calls can be sold immediately. */
  async importShares(
    symbol: string,
    shares: number,
    costBasis: number,
    profile: string = DEFAULT_PROFILE,
    capital = 0,
  ): Promise<WheelPosition> {
    const sym = parse(symbolSchema, symbol);
    if (!Number.isInteger(shares) || shares % SHARES_PER_CONTRACT !== 0) {
      throw new InvalidInputError(`Shares must be a multiple of 100 for covered calls. Got ${shares}.`);
    }
    if (shares <= 0) throw new InvalidInputError('Shares must be positive');
    if (!(costBasis > 0)) throw new InvalidInputError(`Cost basis must be positive, got ${costBasis}`);
    if (capital < 0) throw new InvalidInputError(`Capital must be non-negative, got ${capital}`);
    const strikeProfile = parseProfile(profile);

    return this.locks.runExclusive(sym, async () => {
      if (await this.store.getWheel(sym)) {
        throw new DuplicatePositionError(`Wheel already exists for ${sym}`);
      }
      const wheel = await this.store.createWheel({
        symbol: sym,
        state: 'shares',
        capitalAllocated: capital,
        sharesHeld: shares,
        costBasis,
        profile: strikeProfile,
      });
      console.log(`[Wheel] Imported ${shares} shares of ${sym} @ $${costBasis.toFixed(2)}, ready for covered calls`);
      return wheel;
    });
  }

  async getWheel(symbol: string): Promise<WheelPosition | null> {
    return this.store.getWheel(symbol.toUpperCase());
  }

  async listWheels(activeOnly = true): Promise<WheelPosition[]> {
    return this.store.listWheels(activeOnly);
  }

  async updateProfile(symbol: string, profile: string): Promise<WheelPosition> {
    const strikeProfile = parseProfile(profile);
    return this.withWheel(symbol, async wheel => {
      const updated = await this.store.updateWheel({ ...wheel, profile: strikeProfile, updatedAt: this.clock() });
      console.log(`[Wheel] Updated ${wheel.symbol} profile to ${strikeProfile}`);
      return updated;
    });
  }

  /** Deactivates the wheel; refused while a trade is open. */
  async archiveWheel(symbol: string): Promise<WheelPosition> {
    return this.withWheel(symbol, async wheel => {
      if (isOpenState(wheel.state)) {
        throw new InvalidStateError(
          `Cannot close wheel with open position. Current state: ${wheel.state}. ` +
          'Record expiration or close trade first.',
        );
      }
      const archived = await this.store.updateWheel({ ...wheel, isActive: false, updatedAt: this.clock() });
      console.log(`[Wheel] Archived ${wheel.symbol}`);
      return archived;
    });
  }

  // ── Trades ──────────────────────────────────────────────────────────────────

  async recordTrade(symbol: string, input: TradeInput): Promise<TradeRecord> {
    const trade = parse(tradeInputSchema, input);

    return this.withWheel(symbol, async wheel => {
      const state = nextState(wheel.state, sellAction(trade.direction));
      assertCapacity(wheel, trade.direction, trade.strike, trade.contracts);

      const record = await this.store.openTrade(
        {
          wheelId: wheel.id,
          symbol: wheel.symbol,
          direction: trade.direction,
          strike: trade.strike,
          expirationDate: trade.expirationDate,
          premiumPerShare: trade.premium,
          contracts: trade.contracts,
        },
        { ...wheel, state, updatedAt: this.clock() },
      );

      console.log(
        `[Wheel] SELL ${trade.contracts}x ${wheel.symbol} $${trade.strike} ${trade.direction.toUpperCase()} ` +
        `for $${record.totalPremium.toFixed(2)} premium`,
      );
      return record;
    });
  }

  async recordExpiration(symbol: string, priceAtExpiry: number): Promise<TradeOutcome> {
    if (!(priceAtExpiry > 0)) throw new InvalidInputError(`Price at expiry must be positive, got ${priceAtExpiry}`);

    return this.withWheel(symbol, async wheel => {
      if (!isOpenState(wheel.state)) {
        throw new InvalidStateError(`No open position to expire. Current state: ${wheel.state}`);
      }
      const trade = await this.store.getOpenTrade(wheel.id);
      if (!trade) throw new TradeNotFoundError(`No open trade found for ${wheel.symbol}`);

      const resolution = expiryOutcome(trade.direction, trade.strike, priceAtExpiry, trade.contracts, wheel);
      const now = this.clock();

      await this.store.settleTrade(
        { ...trade, outcome: resolution.outcome, priceAtExpiry, closedAt: now },
        {
          ...wheel,
          state: resolution.nextState,
          sharesHeld: resolution.sharesHeld,
          costBasis: resolution.costBasis,
          updatedAt: now,
        },
      );

      console.log(
        `[Wheel] Expiration ${wheel.symbol}: ${resolution.outcome} ` +
        `(price $${priceAtExpiry.toFixed(2)} vs strike $${trade.strike.toFixed(2)})`,
      );
      return resolution.outcome;
    });
  }

  /** Buys back the open option; the wheel returns to the state it sold from. */
  async closeTradeEarly(symbol: string, closePrice: number): Promise<TradeRecord> {
    if (!(closePrice >= 0)) throw new InvalidInputError(`Close price must be non-negative, got ${closePrice}`);

    return this.withWheel(symbol, async wheel => {
      const trade = await this.store.getOpenTrade(wheel.id);
      if (!trade) throw new TradeNotFoundError(`No open trade found for ${wheel.symbol}`);

      const state = nextState(wheel.state, 'closed_early');
      const now = this.clock();
      const closed = await this.store.settleTrade(
        { ...trade, outcome: 'closed_early', closePrice, closedAt: now },
        { ...wheel, state, updatedAt: now },
      );

      console.log(
        `[Wheel] Closed ${wheel.symbol} early for $${closePrice.toFixed(2)}/share. ` +
        `Net premium: $${netPremium(closed).toFixed(2)}`,
      );
      return closed;
    });
  }

  async getOpenTrade(symbol: string): Promise<TradeRecord | null> {
    const wheel = await this.store.getWheel(symbol.toUpperCase());
    return wheel ? this.store.getOpenTrade(wheel.id) : null;
  }

  async getTradeHistory(symbol: string): Promise<TradeRecord[]> {
    const wheel = await this.store.getWheel(symbol.toUpperCase());
    return wheel ? this.store.listTrades({ wheelId: wheel.id }) : [];
  }

  // ── Recommendations ─────────────────────────────────────────────────────────

  async getRecommendations(symbol: string, limit?: number): Promise<RecommendationOutcome> {
    const wheel = await this.requireWheel(symbol);
    if (isOpenState(wheel.state)) {
      throw new InvalidStateError(
        `Cannot recommend in state ${wheel.state}. Wait for current position to expire or close it first.`,
      );
    }
    const snapshot = await this.requireMarket().load(wheel.symbol);
    return this.engine.getRecommendations(wheel, snapshot, { limit, today: this.clock() });
  }

  async getRecommendation(symbol: string): Promise<WheelRecommendation | NoCandidatesResult> {
    const outcome = await this.getRecommendations(symbol, 1);
    return outcome.status === 'ok' ? outcome.recommendations[0] : outcome.noCandidates;
  }

  /** Best candidate for every active wheel that can sell; failures are logged and skipped. */
  async getAllRecommendations(): Promise<WheelRecommendation[]> {
    const results: WheelRecommendation[] = [];
    for (const wheel of await this.store.listWheels(true)) {
      if (isOpenState(wheel.state)) continue;
      try {
        const outcome = await this.getRecommendations(wheel.symbol, 1);
        if (outcome.status === 'ok') results.push(outcome.recommendations[0]);
        else console.warn(`[Wheel] ${outcome.noCandidates.message}`);
      } catch (err) {
        console.warn(`[Wheel] Could not get recommendation for ${wheel.symbol}: ${errorMessage(err)}`);
      }
    }
    return results;
  }

  // ── Internals ───────────────────────────────────────────────────────────────

  private requireMarket(): SnapshotSource {
    if (!this.market) throw new DataUnavailableError('No market data client configured');
    return this.market;
  }

  private async requireWheel(symbol: string): Promise<WheelPosition> {
    const sym = symbol.toUpperCase();
    const wheel = await this.store.getWheel(sym);
    if (!wheel) throw new PositionNotFoundError(`No wheel found for ${sym}`);
    return wheel;
  }

  private async withWheel<T>(symbol: string, task: (wheel: WheelPosition) => Promise<T>): Promise<T> {
    const sym = symbol.toUpperCase();
    return this.locks.runExclusive(sym, async () => task(await this.requireWheel(sym)));
  }
}
