import { v4 as uuidv4 } from 'uuid';
import { firstRow, getPool } from '../client.js';
import type { WatchlistEntry } from '../../types/wheel.js';

interface WatchlistRow {
  id: string;
  symbol: string;
  notes: string | null;
  created_at: Date;
}

const toEntry = (r: WatchlistRow): WatchlistEntry => ({
  id: r.id,
  symbol: r.symbol,
  notes: r.notes,
  createdAt: r.created_at,
});

/** Adding an existing symbol updates its notes. */
export async function addWatchlistSymbol(symbol: string, notes: string | null): Promise<WatchlistEntry> {
  const pool = getPool();
  const { rows } = await pool.query<WatchlistRow>(
    `INSERT INTO wheel.watchlist (id, symbol, notes) VALUES ($1, $2, $3)
     ON CONFLICT (symbol) DO UPDATE SET notes = COALESCE(EXCLUDED.notes, wheel.watchlist.notes)
     RETURNING id, symbol, notes, created_at`,
    [uuidv4(), symbol, notes],
  );
  return toEntry(firstRow(rows, 'addWatchlistSymbol'));
}

export async function removeWatchlistSymbol(symbol: string): Promise<boolean> {
  const pool = getPool();
  const { rowCount } = await pool.query(`DELETE FROM wheel.watchlist WHERE symbol = $1`, [symbol]);
  return (rowCount ?? 0) > 0;
}

export async function listWatchlist(): Promise<WatchlistEntry[]> {
  const pool = getPool();
  const { rows } = await pool.query<WatchlistRow>(
    `SELECT id, symbol, notes, created_at FROM wheel.watchlist ORDER BY symbol`,
  );
  return rows.map(toEntry);
}
