import { beforeEach, describe, expect, it, vi } from 'vitest';
import { RecommendationEngine } from '../../engine/recommend.js';
import {
  DataUnavailableError,
  DuplicatePositionError,
  InsufficientCapacityError,
  InvalidInputError,
  InvalidStateError,
  InvalidTransitionError,
  PositionNotFoundError,
  TradeNotFoundError,
} from '../../errors.js';
import type { SnapshotSource } from '../../lib/market-snapshot.js';
import { makeContract, makeSnapshot } from '../../engine/__tests__/fixtures.js';
import { WheelManager } from '../manager.js';
import type { WheelPosition } from '../../types/wheel.js';
import { MemoryWheelStore } from './memory-store.js';

const NOW = new Date('2026-10-19T15:00:00Z');

/** Fails the next `failures` wheel writes, as a dropped connection would. */
class FailingWheelStore extends MemoryWheelStore {
  failures = 0;

  override async updateWheel(wheel: WheelPosition): Promise<WheelPosition> {
    if (this.failures > 0) {
      this.failures--;
      throw new Error('connection reset');
    }
    return super.updateWheel(wheel);
  }
}

describe('WheelManager', () => {
  let store: MemoryWheelStore;
  let manager: WheelManager;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    store = new MemoryWheelStore(() => NOW);
    manager = new WheelManager(store, new RecommendationEngine(), null, () => NOW);
  });

  describe('createWheel', () => {
    it('starts in cash with the default profile', async () => {
      const wheel = await manager.createWheel('xyz', 10_000);
      expect(wheel).toMatchObject({
        symbol: 'XYZ',
        state: 'cash',
        capitalAllocated: 10_000,
        sharesHeld: 0,
        costBasis: null,
        profile: 'conservative',
      });
    });

    it('rejects a second active wheel for the symbol', async () => {
      await manager.createWheel('XYZ', 10_000);
      await expect(manager.createWheel('XYZ', 5_000)).rejects.toThrow(DuplicatePositionError);
    });

    it('validates capital and profile', async () => {
      await expect(manager.createWheel('XYZ', 0)).rejects.toThrow('Capital must be positive, got 0');
      await expect(manager.createWheel('XYZ', 1_000, 'reckless')).rejects.toThrow(
        "Invalid profile 'reckless'. Valid: aggressive, moderate, conservative, defensive",
      );
    });
  });

  describe('importShares', () => {
    it('starts in shares so calls can be sold', async () => {
      const wheel = await manager.importShares('XYZ', 200, 48.5, 'moderate');
      expect(wheel).toMatchObject({ state: 'shares', sharesHeld: 200, costBasis: 48.5, profile: 'moderate' });
    });

    it('requires round lots', async () => {
      await expect(manager.importShares('XYZ', 150, 48.5)).rejects.toThrow(
        new InvalidInputError('Shares must be a multiple of 100 for covered calls. Got 150.'),
      );
    });
  });

  describe('full cycle', () => {
    it('walks cash → put → shares → call → cash', async () => {
      await manager.createWheel('XYZ', 10_000);

      const put = await manager.recordTrade('XYZ', {
        direction: 'PUT', strike: 95, expirationDate: '2026-10-30', premium: 1.25, contracts: 1,
      });
      expect(put.totalPremium).toBeCloseTo(125, 10);
      expect((await manager.getWheel('XYZ'))?.state).toBe('cash_put_open');

      // equal to the strike resolves as assignment
      expect(await manager.recordExpiration('XYZ', 95)).toBe('assigned');
      expect(await manager.getWheel('XYZ')).toMatchObject({ state: 'shares', sharesHeld: 100, costBasis: 95 });

      await manager.recordTrade('XYZ', {
        direction: 'call', strike: 100, expirationDate: '2026-11-06', premium: 0.8, contracts: 1,
      });
      expect(await manager.recordExpiration('XYZ', 101)).toBe('called_away');
      expect(await manager.getWheel('XYZ')).toMatchObject({ state: 'cash', sharesHeld: 0, costBasis: null });

      const history = await manager.getTradeHistory('XYZ');
      expect(history.map(t => t.outcome)).toEqual(['assigned', 'called_away']);
      expect(history[0]?.priceAtExpiry).toBe(95);
      expect(history[0]?.closedAt).toEqual(NOW);
    });

    it('keeps shares when a call expires worthless', async () => {
      await manager.importShares('XYZ', 100, 50);
      await manager.recordTrade('XYZ', {
        direction: 'call', strike: 55, expirationDate: '2026-10-30', premium: 0.5, contracts: 1,
      });
      expect(await manager.recordExpiration('XYZ', 54.99)).toBe('expired_worthless');
      expect(await manager.getWheel('XYZ')).toMatchObject({ state: 'shares', sharesHeld: 100, costBasis: 50 });
    });
  });

  describe('recordTrade', () => {
    it('refuses the wrong side for the state', async () => {
      await manager.createWheel('XYZ', 10_000);
      const attempt = manager.recordTrade('XYZ', {
        direction: 'call', strike: 105, expirationDate: '2026-10-30', premium: 1, contracts: 1,
      });
      await expect(attempt).rejects.toThrow(InvalidTransitionError);
      await expect(attempt).rejects.toThrow("Invalid action 'sell_call' for state cash. Valid actions: sell_put");
    });

    it('checks capital before opening a put', async () => {
      await manager.createWheel('XYZ', 10_000);
      await expect(manager.recordTrade('XYZ', {
        direction: 'put', strike: 60, expirationDate: '2026-10-30', premium: 1, contracts: 2,
      })).rejects.toThrow(new InsufficientCapacityError(
        'Need $12000.00 for 2 contracts @ $60 strike, but only $10000.00 allocated',
      ));
      expect(store.trades).toHaveLength(0);
    });

    it('validates the input', async () => {
      await manager.createWheel('XYZ', 10_000);
      await expect(manager.recordTrade('XYZ', {
        direction: 'straddle', strike: 95, expirationDate: '2026-10-30', premium: 1, contracts: 1,
      })).rejects.toThrow("Direction must be 'put' or 'call'");
      await expect(manager.recordTrade('XYZ', {
        direction: 'put', strike: 95, expirationDate: '30/10/2026', premium: 1, contracts: 1,
      })).rejects.toThrow('Expiration must be YYYY-MM-DD');
    });

    it('reports an unknown symbol', async () => {
      await expect(manager.recordTrade('NOPE', {
        direction: 'put', strike: 95, expirationDate: '2026-10-30', premium: 1, contracts: 1,
      })).rejects.toThrow(new PositionNotFoundError('No wheel found for NOPE'));
    });

    it('lets only one of two concurrent trades through', async () => {
      await manager.createWheel('XYZ', 10_000);
      const trade = { direction: 'put', strike: 95, expirationDate: '2026-10-30', premium: 1, contracts: 1 };

      const results = await Promise.allSettled([
        manager.recordTrade('XYZ', trade),
        manager.recordTrade('XYZ', trade),
      ]);

      expect(results.map(r => r.status)).toEqual(['fulfilled', 'rejected']);
      const [, second] = results;
      if (second?.status !== 'rejected') throw new Error('expected the second trade to fail');
      expect(second.reason).toBeInstanceOf(InvalidTransitionError);
      expect(store.trades).toHaveLength(1);
    });
  });

  describe('partial write failures', () => {
    const put = { direction: 'put', strike: 50, expirationDate: '2026-10-30', premium: 1, contracts: 1 };
    let failing: FailingWheelStore;
    let flaky: WheelManager;

    beforeEach(() => {
      failing = new FailingWheelStore(() => NOW);
      flaky = new WheelManager(failing, new RecommendationEngine(), null, () => NOW);
    });

    it('leaves no open trade behind when the wheel write fails', async () => {
      await flaky.createWheel('XYZ', 10_000);
      failing.failures = 1;

      await expect(flaky.recordTrade('XYZ', put)).rejects.toThrow('connection reset');
      expect((await flaky.getWheel('XYZ'))?.state).toBe('cash');
      expect(await flaky.getOpenTrade('XYZ')).toBeNull();
      expect(failing.trades).toHaveLength(0);

      await flaky.recordTrade('XYZ', put);
      expect(failing.trades).toHaveLength(1);
      expect(await flaky.recordExpiration('XYZ', 55)).toBe('expired_worthless');
    });

    it('keeps the trade open when settling the wheel fails', async () => {
      await flaky.createWheel('XYZ', 10_000);
      await flaky.recordTrade('XYZ', put);
      failing.failures = 1;

      await expect(flaky.recordExpiration('XYZ', 45)).rejects.toThrow('connection reset');
      expect((await flaky.getWheel('XYZ'))?.state).toBe('cash_put_open');
      expect((await flaky.getOpenTrade('XYZ'))?.outcome).toBe('open');

      expect(await flaky.recordExpiration('XYZ', 45)).toBe('assigned');
      expect(await flaky.getWheel('XYZ')).toMatchObject({ state: 'shares', sharesHeld: 100, costBasis: 50 });
    });
  });

  describe('closeTradeEarly', () => {
    it('returns the wheel to the state it sold from', async () => {
      await manager.createWheel('XYZ', 10_000);
      await manager.recordTrade('XYZ', {
        direction: 'put', strike: 95, expirationDate: '2026-10-30', premium: 1.25, contracts: 1,
      });

      const closed = await manager.closeTradeEarly('XYZ', 0.4);
      expect(closed).toMatchObject({ outcome: 'closed_early', closePrice: 0.4, closedAt: NOW });
      expect((await manager.getWheel('XYZ'))?.state).toBe('cash');
    });

    it('needs an open trade', async () => {
      await manager.createWheel('XYZ', 10_000);
      await expect(manager.closeTradeEarly('XYZ', 0.4)).rejects.toThrow(TradeNotFoundError);
    });
  });

  describe('recordExpiration', () => {
    it('needs an open position', async () => {
      await manager.createWheel('XYZ', 10_000);
      await expect(manager.recordExpiration('XYZ', 100)).rejects.toThrow(
        new InvalidStateError('No open position to expire. Current state: cash'),
      );
    });
  });

  describe('archiveWheel', () => {
    it('deactivates an idle wheel and frees the symbol', async () => {
      await manager.createWheel('XYZ', 10_000);
      const archived = await manager.archiveWheel('XYZ');
      expect(archived.isActive).toBe(false);
      expect(await manager.getWheel('XYZ')).toBeNull();
      expect(await manager.listWheels(false)).toHaveLength(1);
      await expect(manager.createWheel('XYZ', 5_000)).resolves.toMatchObject({ capitalAllocated: 5_000 });
    });

    it('is refused while a trade is open', async () => {
      await manager.createWheel('XYZ', 10_000);
      await manager.recordTrade('XYZ', {
        direction: 'put', strike: 95, expirationDate: '2026-10-30', premium: 1, contracts: 1,
      });
      await expect(manager.archiveWheel('XYZ')).rejects.toThrow(InvalidStateError);
    });
  });

  describe('updateProfile', () => {
    it('changes the profile case-insensitively', async () => {
      await manager.createWheel('XYZ', 10_000);
      expect((await manager.updateProfile('xyz', 'DEFENSIVE')).profile).toBe('defensive');
    });
  });

  describe('recommendations', () => {
    const chain = [
      makeContract({ type: 'put', strike: 95, expiration: '2026-10-23', bid: 0.4, ask: 0.45 }),
      makeContract({ type: 'put', strike: 91, expiration: '2026-10-30', bid: 0.35, ask: 0.4 }),
    ];
    const snapshots: SnapshotSource = {
      load: async symbol => makeSnapshot({ symbol, chain }),
    };

    it('needs a market data source', async () => {
      await manager.createWheel('XYZ', 10_000);
      await expect(manager.getRecommendations('XYZ')).rejects.toThrow(DataUnavailableError);
    });

    it('ranks candidates from the loaded snapshot', async () => {
      const withMarket = new WheelManager(store, new RecommendationEngine(), snapshots, () => NOW);
      await withMarket.createWheel('XYZ', 10_000);

      const best = await withMarket.getRecommendation('XYZ');
      expect(best).toMatchObject({ symbol: 'XYZ', direction: 'put', strike: 95 });
    });

    it('skips wheels with open trades when collecting all recommendations', async () => {
      const withMarket = new WheelManager(store, new RecommendationEngine(), snapshots, () => NOW);
      await withMarket.createWheel('XYZ', 10_000);
      await withMarket.createWheel('ABC', 10_000);
      await withMarket.recordTrade('ABC', {
        direction: 'put', strike: 95, expirationDate: '2026-10-30', premium: 1, contracts: 1,
      });

      const all = await withMarket.getAllRecommendations();
      expect(all.map(r => [r.symbol, r.strike])).toEqual([['XYZ', 95]]);
    });

    it('rejects recommendations while a trade is open', async () => {
      const withMarket = new WheelManager(store, new RecommendationEngine(), snapshots, () => NOW);
      await withMarket.createWheel('XYZ', 10_000);
      await withMarket.recordTrade('XYZ', {
        direction: 'put', strike: 95, expirationDate: '2026-10-30', premium: 1, contracts: 1,
      });
      await expect(withMarket.getRecommendations('XYZ')).rejects.toThrow(InvalidStateError);
    });
  });
});
