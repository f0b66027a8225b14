import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryWheelStore } from '../../wheel/__tests__/memory-store.js';
import { FakeMarketData } from '../../wheel/__tests__/fake-market.js';
import { PositionMonitor } from '../../wheel/monitor.js';
import { PriceCache } from '../../wheel/price-cache.js';
import { PositionRefreshJob } from '../position-refresh.js';
import { RecordingNotifier } from './recording-notifier.js';

const NOW = new Date('2026-10-19T15:00:00Z');

describe('PositionRefreshJob', () => {
  let store: MemoryWheelStore;
  let market: FakeMarketData;
  let notifier: RecordingNotifier;
  let job: PositionRefreshJob;
  let tradeId: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    store = new MemoryWheelStore(() => NOW);
    market = new FakeMarketData();
    notifier = new RecordingNotifier();
    job = new PositionRefreshJob(store, new PositionMonitor(new PriceCache(market, null, () => NOW), () => NOW), notifier);

    const wheel = await store.createWheel({
      symbol: 'XYZ', state: 'cash_put_open', capitalAllocated: 10_000, sharesHeld: 0, costBasis: null, profile: 'conservative',
    });
    await store.createWheel({
      symbol: 'IDLE', state: 'cash', capitalAllocated: 5_000, sharesHeld: 0, costBasis: null, profile: 'moderate',
    });
    const trade = await store.createTrade({
      wheelId: wheel.id, symbol: 'XYZ', direction: 'put', strike: 95, expirationDate: '2026-10-30',
      premiumPerShare: 1.25, contracts: 1,
    });
    tradeId = trade.id;
  });

  it('snapshots open positions without alerting while they are out of the money', async () => {
    market.quotes.set('XYZ', { lastPrice: 96 });

    const result = await job.run();

    expect(result.snapshotsSaved).toBe(1);
    expect(result.alertsSent).toBe(0);
    expect(result.symbolRuns).toEqual([
      { symbol: 'XYZ', status: 'ok', detail: 'MEDIUM OTM by 1.1%', durationMs: expect.any(Number) },
    ]);
    expect(store.snapshots).toEqual([expect.objectContaining({
      tradeId, snapshotDate: '2026-10-19', currentPrice: 96, riskLevel: 'MEDIUM',
    })]);
    expect(notifier.sent).toEqual([]);
  });

  it('alerts once when a position turns HIGH risk', async () => {
    market.quotes.set('XYZ', { lastPrice: 94 });
    expect((await job.run()).alertsSent).toBe(1);
    expect(notifier.sent).toEqual([
      '🔴 <b>XYZ PUT $95.00 is HIGH risk</b>\n' +
      'Price: $94.00 | ITM by 1.1%\n' +
      'Expires 2026-10-30 (11d, 9 trading)\n' +
      'Premium collected: $125.00',
    ]);

    market.quotes.set('XYZ', { lastPrice: 93 });
    expect((await job.run()).alertsSent).toBe(0);

    market.quotes.set('XYZ', { lastPrice: 97 });
    await job.run();
    market.quotes.set('XYZ', { lastPrice: 94 });
    expect((await job.run()).alertsSent).toBe(1);
    expect(notifier.sent).toHaveLength(2);
  });

  it('records a failed snapshot as an error run', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    market.quotes.set('XYZ', { lastPrice: 96 });
    vi.spyOn(store, 'saveSnapshot').mockRejectedValueOnce(new Error('disk full'));

    const result = await job.run();
    expect(result.snapshotsSaved).toBe(0);
    expect(result.symbolRuns).toEqual([
      { symbol: 'XYZ', status: 'error', detail: 'disk full', durationMs: expect.any(Number) },
    ]);
    expect(error).toHaveBeenCalledWith('[Refresh] XYZ: disk full');
  });
});
