import { v4 as uuidv4 } from 'uuid';
import { firstRow, getPool } from '../client.js';
import type { Queryable } from '../client.js';
import { SHARES_PER_CONTRACT } from '../../engine/execution-cost.js';
import type { OptionType } from '../../types/options.js';
import type { PositionSnapshot, TradeOutcome, TradeRecord } from '../../types/wheel.js';
import type { NewTrade, TradeFilter } from '../../wheel/store.js';

interface TradeRow {
  id: string;
  wheel_id: string;
  symbol: string;
  direction: OptionType;
  strike: number;
  expiration_date: string;
  premium_per_share: number;
  contracts: number;
  total_premium: number;
  opened_at: Date;
  closed_at: Date | null;
  outcome: TradeOutcome;
  price_at_expiry: number | null;
  close_price: number | null;
}

const COLUMNS = `
  id, wheel_id, symbol, direction, strike::float8 AS strike,
  expiration_date::text AS expiration_date, premium_per_share::float8 AS premium_per_share,
  contracts, total_premium::float8 AS total_premium, opened_at, closed_at, outcome,
  price_at_expiry::float8 AS price_at_expiry, close_price::float8 AS close_price`;

function toTrade(r: TradeRow): TradeRecord {
  return {
    id: r.id,
    wheelId: r.wheel_id,
    symbol: r.symbol,
    direction: r.direction,
    strike: r.strike,
    expirationDate: r.expiration_date,
    premiumPerShare: r.premium_per_share,
    contracts: r.contracts,
    totalPremium: r.total_premium,
    openedAt: r.opened_at,
    closedAt: r.closed_at,
    outcome: r.outcome,
    priceAtExpiry: r.price_at_expiry,
    closePrice: r.close_price,
  };
}

export async function insertTrade(input: NewTrade, db: Queryable = getPool()): Promise<TradeRecord> {
  const { rows } = await db.query<TradeRow>(
    `INSERT INTO wheel.trades (
      id, wheel_id, symbol, direction, strike, expiration_date,
      premium_per_share, contracts, total_premium, outcome
    ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,'open')
    RETURNING ${COLUMNS}`,
    [
      uuidv4(),
      input.wheelId,
      input.symbol,
      input.direction,
      input.strike,
      input.expirationDate,
      input.premiumPerShare,
      input.contracts,
      input.premiumPerShare * input.contracts * SHARES_PER_CONTRACT,
    ],
  );
  return toTrade(firstRow(rows, 'insertTrade'));
}

export async function updateTrade(trade: TradeRecord, db: Queryable = getPool()): Promise<TradeRecord> {
  const { rows } = await db.query<TradeRow>(
    `UPDATE wheel.trades
     SET outcome = $2, closed_at = $3, price_at_expiry = $4, close_price = $5
     WHERE id = $1
     RETURNING ${COLUMNS}`,
    [trade.id, trade.outcome, trade.closedAt, trade.priceAtExpiry, trade.closePrice],
  );
  return toTrade(firstRow(rows, 'updateTrade'));
}

export async function getOpenTrade(wheelId: string): Promise<TradeRecord | null> {
  const pool = getPool();
  const { rows } = await pool.query<TradeRow>(
    `SELECT ${COLUMNS} FROM wheel.trades WHERE wheel_id = $1 AND outcome = 'open' LIMIT 1`,
    [wheelId],
  );
  const row = rows[0];
  return row ? toTrade(row) : null;
}

export async function listTrades(filter: TradeFilter = {}): Promise<TradeRecord[]> {
  const pool = getPool();
  const where: string[] = [];
  const params: string[] = [];
  if (filter.wheelId) {
    params.push(filter.wheelId);
    where.push(`wheel_id = $${params.length}`);
  }
  if (filter.symbol) {
    params.push(filter.symbol);
    where.push(`symbol = $${params.length}`);
  }
  const { rows } = await pool.query<TradeRow>(
    `SELECT ${COLUMNS} FROM wheel.trades
     ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
     ORDER BY opened_at`,
    params,
  );
  return rows.map(toTrade);
}

/** One row per trade per day; a later refresh on the same day overwrites it. */
export async function upsertSnapshot(s: PositionSnapshot): Promise<void> {
  const pool = getPool();
  await pool.query(
    `INSERT INTO wheel.position_snapshots (
      trade_id, snapshot_date, current_price, dte_calendar, dte_trading,
      moneyness_pct, is_itm, risk_level
    ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8)
    ON CONFLICT (trade_id, snapshot_date) DO UPDATE SET
      current_price = EXCLUDED.current_price,
      dte_calendar = EXCLUDED.dte_calendar,
      dte_trading = EXCLUDED.dte_trading,
      moneyness_pct = EXCLUDED.moneyness_pct,
      is_itm = EXCLUDED.is_itm,
      risk_level = EXCLUDED.risk_level`,
    [s.tradeId, s.snapshotDate, s.currentPrice, s.dteCalendar, s.dteTrading, s.moneynessPct, s.isItm, s.riskLevel],
  );
}
