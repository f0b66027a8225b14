/**
 * Position refresh: runs on REFRESH_CRON during market hours.
 *
 *   1. Status: price every open wheel position through the monitor
 *   2. Snapshot: upsert one snapshot row per open trade per day
 *   3. Alert: notify once when a position turns HIGH risk
 */

import { errorMessage } from '../errors.js';
import { formatRiskAlert, type Notifier } from '../telegram/notifier.js';
import type { SymbolRunResult } from '../db/repositories/scheduler-runs.js';
import type { RiskLevel, TradeRecord } from '../types/wheel.js';
import type { MonitoredPosition, PositionMonitor } from '../wheel/monitor.js';
import type { WheelStore } from '../wheel/store.js';

export interface RefreshResult {
  positions: MonitoredPosition[];
  snapshotsSaved: number;
  alertsSent: number;
  symbolRuns: SymbolRunResult[];
}

export class PositionRefreshJob {
  // last seen risk per trade; alerts fire on the transition into HIGH
  private readonly lastRisk = new Map<string, RiskLevel>();

  constructor(
    private readonly store: WheelStore,
    private readonly monitor: PositionMonitor,
    private readonly notifier: Notifier,
  ) {}

  async run(): Promise<RefreshResult> {
    const started = Date.now();
    const wheels = await this.store.listWheels(true);

    const trades: TradeRecord[] = [];
    for (const wheel of wheels) {
      const trade = await this.store.getOpenTrade(wheel.id);
      if (trade) trades.push(trade);
    }

    const positions = await this.monitor.getAllPositionsStatus(wheels, trades, true);
    const symbolRuns: SymbolRunResult[] = [];
    let snapshotsSaved = 0;
    let alertsSent = 0;

    for (const monitored of positions) {
      const t0 = Date.now();
      const { trade, status } = monitored;
      try {
        await this.store.saveSnapshot(this.monitor.createSnapshot(trade, status));
        snapshotsSaved++;

        const previous = this.lastRisk.get(trade.id);
        this.lastRisk.set(trade.id, status.riskLevel);
        if (status.riskLevel === 'HIGH' && previous !== 'HIGH') {
          await this.notifier.send(formatRiskAlert(monitored));
          alertsSent++;
        }

        symbolRuns.push({
          symbol: status.symbol,
          status: 'ok',
          detail: `${status.riskLevel} ${status.moneynessLabel}`,
          durationMs: Date.now() - t0,
        });
      } catch (err) {
        console.error(`[Refresh] ${status.symbol}: ${errorMessage(err)}`);
        symbolRuns.push({ symbol: status.symbol, status: 'error', detail: errorMessage(err), durationMs: Date.now() - t0 });
      }
    }

    // forget trades that are no longer open
    const openIds = new Set(trades.map(t => t.id));
    for (const id of [...this.lastRisk.keys()]) {
      if (!openIds.has(id)) this.lastRisk.delete(id);
    }

    console.log(
      `[Refresh] ${positions.length} position(s), ${snapshotsSaved} snapshot(s), ` +
      `${alertsSent} alert(s) in ${Date.now() - started}ms`,
    );
    return { positions, snapshotsSaved, alertsSent, symbolRuns };
  }
}
