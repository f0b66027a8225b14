import { v4 as uuidv4 } from 'uuid';
import { getPool } from '../client.js';

export type SchedulerJob = 'scan' | 'refresh';

export interface SymbolRunResult {
  symbol: string;
  status: 'ok' | 'error';
  detail?: string;
  durationMs: number;
}

/** Insert a new scheduler run row. Returns the generated id. */
export async function insertSchedulerRun(
  job: SchedulerJob,
  runAt: Date,
  triggerType: 'AUTO' | 'MANUAL',
  status: 'RUNNING' | 'SKIPPED',
  skippedReason?: 'PREV_RUN_ACTIVE',
): Promise<string> {
  const pool = getPool();
  const id = uuidv4();
  await pool.query(
    `INSERT INTO wheel.scheduler_runs (id, job, run_at, trigger_type, status, skipped_reason)
     VALUES ($1, $2, $3, $4, $5, $6)`,
    [id, job, runAt, triggerType, status, skippedReason ?? null],
  );
  return id;
}

/** Finalize a RUNNING row with outcome, per-symbol results, and total duration. */
export async function completeSchedulerRun(
  id: string,
  status: 'COMPLETED' | 'FAILED',
  symbolRuns: SymbolRunResult[],
  totalDurationMs: number,
  error?: string,
): Promise<void> {
  const pool = getPool();
  await pool.query(
    `UPDATE wheel.scheduler_runs
     SET status = $1, symbol_runs = $2::jsonb, total_duration_ms = $3, error = $4
     WHERE id = $5`,
    [status, JSON.stringify(symbolRuns), totalDurationMs, error ?? null, id],
  );
}
