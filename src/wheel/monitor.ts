/**
 * Live status for open wheel trades: moneyness, risk tier and time left.
 */

import { tradingDaysToExpiry, daysToExpiry, isoDate } from '../engine/dates.js';
import { isOpenState } from '../engine/state-machine.js';
import { InvalidStateError, errorMessage } from '../errors.js';
import type { OptionType } from '../types/options.js';
import type {
  PositionSnapshot,
  PositionStatus,
  RiskLevel,
  TradeRecord,
  WheelPosition,
} from '../types/wheel.js';
import type { Clock, PriceCache } from './price-cache.js';

export const MEDIUM_RISK_BAND_PCT = 5;

export interface Moneyness {
  isItm: boolean;
  isOtm: boolean;
  pct: number;
  label: string;
  priceDiff: number;   // positive when ITM
}

export function calculateMoneyness(currentPrice: number, strike: number, direction: OptionType): Moneyness {
  const isItm = direction === 'put' ? currentPrice <= strike : currentPrice >= strike;
  const priceDiff = direction === 'put' ? strike - currentPrice : currentPrice - strike;
  const pct = ((currentPrice - strike) / strike) * 100;
  return {
    isItm,
    isOtm: !isItm,
    pct,
    label: `${isItm ? 'ITM' : 'OTM'} by ${Math.abs(pct).toFixed(1)}%`,
    priceDiff,
  };
}

export function assessRisk(moneynessPct: number, isItm: boolean): RiskLevel {
  if (isItm) return 'HIGH';
  if (Math.abs(moneynessPct) > MEDIUM_RISK_BAND_PCT) return 'LOW';
  return 'MEDIUM';
}

export interface MonitoredPosition {
  position: WheelPosition;
  trade: TradeRecord;
  status: PositionStatus;
}

export class PositionMonitor {
  constructor(
    private readonly prices: PriceCache,
    private readonly clock: Clock = () => new Date(),
  ) {}

  async getPositionStatus(position: WheelPosition, trade: TradeRecord, forceRefresh = false): Promise<PositionStatus> {
    if (!isOpenState(position.state)) {
      throw new InvalidStateError(
        `Position ${position.symbol} is not in an open state (current state: ${position.state})`,
      );
    }

    const currentPrice = await this.prices.getPrice(position.symbol, forceRefresh);
    const now = this.clock();
    const moneyness = calculateMoneyness(currentPrice, trade.strike, trade.direction);

    return {
      symbol: position.symbol,
      direction: trade.direction,
      strike: trade.strike,
      expirationDate: trade.expirationDate,
      dteCalendar: daysToExpiry(trade.expirationDate, now),
      dteTrading: tradingDaysToExpiry(trade.expirationDate, now),
      currentPrice,
      priceVsStrike: moneyness.priceDiff,
      isItm: moneyness.isItm,
      isOtm: moneyness.isOtm,
      moneynessPct: moneyness.pct,
      moneynessLabel: moneyness.label,
      riskLevel: assessRisk(moneyness.pct, moneyness.isItm),
      lastUpdated: now,
      premiumCollected: trade.totalPremium,
    };
  }

  /** Positions without an open trade are skipped; per-position failures are logged. */
  async getAllPositionsStatus(
    positions: readonly WheelPosition[],
    trades: readonly TradeRecord[],
    forceRefresh = false,
  ): Promise<MonitoredPosition[]> {
    const results: MonitoredPosition[] = [];

    for (const position of positions) {
      if (!isOpenState(position.state)) continue;

      const trade = trades.find(t => t.wheelId === position.id && t.outcome === 'open');
      if (!trade) {
        console.warn(`[Monitor] ${position.symbol} is in an open state but no open trade found`);
        continue;
      }

      try {
        results.push({ position, trade, status: await this.getPositionStatus(position, trade, forceRefresh) });
      } catch (err) {
        console.error(`[Monitor] Failed to get status for ${position.symbol}: ${errorMessage(err)}`);
      }
    }

    return results;
  }

  createSnapshot(trade: TradeRecord, status: PositionStatus, snapshotDate?: string): PositionSnapshot {
    return {
      tradeId: trade.id,
      snapshotDate: snapshotDate ?? isoDate(this.clock()),
      currentPrice: status.currentPrice,
      dteCalendar: status.dteCalendar,
      dteTrading: status.dteTrading,
      moneynessPct: status.moneynessPct,
      isItm: status.isItm,
      riskLevel: status.riskLevel,
    };
  }
}
