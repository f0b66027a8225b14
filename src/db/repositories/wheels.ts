import { v4 as uuidv4 } from 'uuid';
import { firstRow, getPool } from '../client.js';
import type { Queryable } from '../client.js';
import type { StrikeProfile } from '../../types/pricing.js';
import type { WheelPosition, WheelState } from '../../types/wheel.js';
import type { NewWheel } from '../../wheel/store.js';

interface WheelRow {
  id: string;
  symbol: string;
  state: WheelState;
  capital_allocated: number;
  shares_held: number;
  cost_basis: number | null;
  profile: StrikeProfile;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

const COLUMNS = `
  id, symbol, state, capital_allocated::float8 AS capital_allocated, shares_held,
  cost_basis::float8 AS cost_basis, profile, is_active, created_at, updated_at`;

function toWheel(r: WheelRow): WheelPosition {
  return {
    id: r.id,
    symbol: r.symbol,
    state: r.state,
    capitalAllocated: r.capital_allocated,
    sharesHeld: r.shares_held,
    costBasis: r.cost_basis,
    profile: r.profile,
    isActive: r.is_active,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

export async function insertWheel(input: NewWheel): Promise<WheelPosition> {
  const pool = getPool();
  const { rows } = await pool.query<WheelRow>(
    `INSERT INTO wheel.wheels (id, symbol, state, capital_allocated, shares_held, cost_basis, profile)
     VALUES ($1,$2,$3,$4,$5,$6,$7)
     RETURNING ${COLUMNS}`,
    [uuidv4(), input.symbol, input.state, input.capitalAllocated, input.sharesHeld, input.costBasis, input.profile],
  );
  return toWheel(firstRow(rows, 'insertWheel'));
}

/** Active wheel for the symbol, or null. */
export async function getActiveWheel(symbol: string): Promise<WheelPosition | null> {
  const pool = getPool();
  const { rows } = await pool.query<WheelRow>(
    `SELECT ${COLUMNS} FROM wheel.wheels WHERE symbol = $1 AND is_active LIMIT 1`,
    [symbol],
  );
  const row = rows[0];
  return row ? toWheel(row) : null;
}

export async function listWheels(activeOnly: boolean): Promise<WheelPosition[]> {
  const pool = getPool();
  const { rows } = await pool.query<WheelRow>(
    `SELECT ${COLUMNS} FROM wheel.wheels
     ${activeOnly ? 'WHERE is_active' : ''}
     ORDER BY symbol, created_at`,
  );
  return rows.map(toWheel);
}

export async function updateWheel(wheel: WheelPosition, db: Queryable = getPool()): Promise<WheelPosition> {
  const { rows } = await db.query<WheelRow>(
    `UPDATE wheel.wheels
     SET state = $2, capital_allocated = $3, shares_held = $4, cost_basis = $5,
         profile = $6, is_active = $7, updated_at = $8
     WHERE id = $1
     RETURNING ${COLUMNS}`,
    [
      wheel.id,
      wheel.state,
      wheel.capitalAllocated,
      wheel.sharesHeld,
      wheel.costBasis,
      wheel.profile,
      wheel.isActive,
      wheel.updatedAt,
    ],
  );
  return toWheel(firstRow(rows, 'updateWheel'));
}
