import { Pool } from 'pg';
import type { PoolClient, QueryResultRow } from 'pg';
import { config } from '../config.js';

let pool: Pool | null = null;

/** A pool or a checked-out client; repositories accept either so they can join a transaction. */
export type Queryable = Pick<PoolClient, 'query'>;

export function getPool(): Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: config.DATABASE_URL,
      max: 10,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
    });

    pool.on('error', (err) => {
      console.error('[DB] Unexpected pool error:', err);
    });
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/** Runs `work` inside BEGIN/COMMIT on one pooled connection, rolling back on error. */
export async function withTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

/** First row of a RETURNING query; an empty result is a driver-level surprise. */
export function firstRow<T extends QueryResultRow>(rows: T[], what: string): T {
  const row = rows[0];
  if (!row) throw new Error(`[DB] ${what} returned no row`);
  return row;
}
