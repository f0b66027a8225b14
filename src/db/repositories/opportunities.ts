import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { getPool, withTransaction } from '../client.js';
import type { OptionType } from '../../types/options.js';
import type { StrikeProfile } from '../../types/pricing.js';
import type { Opportunity, WheelRecommendation } from '../../types/wheel.js';

interface OpportunityRow {
  id: string;
  symbol: string;
  direction: OptionType;
  profile: StrikeProfile;
  strike: number;
  expiration_date: string;
  premium_per_share: number;
  contracts: number;
  total_premium: number;
  sigma_distance: number;
  p_itm: number;
  annualized_yield_pct: number;
  bias_score: number;
  dte: number;
  current_price: number;
  bid: number;
  ask: number;
  warnings: unknown;
  is_read: boolean;
  scanned_at: Date;
}

const COLUMNS = `
  id, symbol, direction, profile, strike::float8 AS strike, expiration_date::text AS expiration_date,
  premium_per_share::float8 AS premium_per_share, contracts, total_premium::float8 AS total_premium,
  sigma_distance::float8 AS sigma_distance, p_itm::float8 AS p_itm,
  annualized_yield_pct::float8 AS annualized_yield_pct, bias_score::float8 AS bias_score, dte,
  current_price::float8 AS current_price, bid::float8 AS bid, ask::float8 AS ask,
  warnings, is_read, scanned_at`;

const warningsSchema = z.array(z.string()).catch([]);

function toOpportunity(r: OpportunityRow): Opportunity {
  return {
    id: r.id,
    symbol: r.symbol,
    direction: r.direction,
    profile: r.profile,
    strike: r.strike,
    expirationDate: r.expiration_date,
    premiumPerShare: r.premium_per_share,
    contracts: r.contracts,
    totalPremium: r.total_premium,
    sigmaDistance: r.sigma_distance,
    pItm: r.p_itm,
    annualizedYieldPct: r.annualized_yield_pct,
    biasScore: r.bias_score,
    dte: r.dte,
    currentPrice: r.current_price,
    bid: r.bid,
    ask: r.ask,
    warnings: warningsSchema.parse(r.warnings),
    isRead: r.is_read,
    scannedAt: r.scanned_at,
  };
}

/** Replaces each scanned symbol's previous opportunities with the new set. */
export async function replaceOpportunities(recs: readonly WheelRecommendation[], scannedAt: Date): Promise<number> {
  const symbols = [...new Set(recs.map(r => r.symbol))];
  return withTransaction(async client => {
    if (symbols.length > 0) {
      await client.query(`DELETE FROM wheel.opportunities WHERE symbol = ANY($1::text[])`, [symbols]);
    }
    for (const r of recs) {
      await client.query(
        `INSERT INTO wheel.opportunities (
          id, symbol, direction, profile, strike, expiration_date, premium_per_share,
          contracts, total_premium, sigma_distance, p_itm, annualized_yield_pct,
          bias_score, dte, current_price, bid, ask, warnings, scanned_at
        ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15,$16,$17,$18::jsonb,$19)`,
        [
          uuidv4(), r.symbol, r.direction, r.profile, r.strike, r.expirationDate, r.premiumPerShare,
          r.contracts, r.totalPremium, r.sigmaDistance, r.pItm, r.annualizedYieldPct,
          r.biasScore, r.dte, r.currentPrice, r.bid, r.ask, JSON.stringify(r.warnings), scannedAt,
        ],
      );
    }
    return recs.length;
  });
}

export async function listOpportunities(options: {
  symbol?: string;
  unreadOnly?: boolean;
  limit?: number;
} = {}): Promise<Opportunity[]> {
  const pool = getPool();
  const where: string[] = [];
  const params: Array<string | number> = [];
  if (options.symbol) {
    params.push(options.symbol);
    where.push(`symbol = $${params.length}`);
  }
  if (options.unreadOnly) where.push('NOT is_read');
  params.push(options.limit ?? 50);

  const { rows } = await pool.query<OpportunityRow>(
    `SELECT ${COLUMNS} FROM wheel.opportunities
     ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
     ORDER BY bias_score DESC, scanned_at DESC
     LIMIT $${params.length}`,
    params,
  );
  return rows.map(toOpportunity);
}

export async function markOpportunityRead(id: string): Promise<boolean> {
  const pool = getPool();
  const { rowCount } = await pool.query(`UPDATE wheel.opportunities SET is_read = TRUE WHERE id = $1`, [id]);
  return (rowCount ?? 0) > 0;
}

export async function deleteOpportunities(symbol?: string): Promise<number> {
  const pool = getPool();
  const { rowCount } = symbol
    ? await pool.query(`DELETE FROM wheel.opportunities WHERE symbol = $1`, [symbol])
    : await pool.query(`DELETE FROM wheel.opportunities`);
  return rowCount ?? 0;
}
