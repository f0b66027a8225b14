import cron, { type ScheduledTask } from 'node-cron';
import {
  completeSchedulerRun,
  insertSchedulerRun,
  type SchedulerJob,
  type SymbolRunResult,
} from './db/repositories/scheduler-runs.js';
import { errorMessage } from './errors.js';
import { formatJobFailure, type Notifier } from './telegram/notifier.js';
import type { OpportunityScanJob } from './pipeline/opportunity-scan.js';
import type { PositionRefreshJob } from './pipeline/position-refresh.js';

export type TriggerType = 'AUTO' | 'MANUAL';

export interface RunRecorder {
  start(job: SchedulerJob, runAt: Date, trigger: TriggerType, status: 'RUNNING' | 'SKIPPED', reason?: 'PREV_RUN_ACTIVE'): Promise<string>;
  complete(id: string, status: 'COMPLETED' | 'FAILED', symbolRuns: SymbolRunResult[], durationMs: number, error?: string): Promise<void>;
}

export const pgRunRecorder: RunRecorder = {
  start: insertSchedulerRun,
  complete: completeSchedulerRun,
};

export interface JobRunOutcome {
  job: SchedulerJob;
  status: 'COMPLETED' | 'FAILED' | 'SKIPPED';
  symbolRuns: SymbolRunResult[];
  error?: string;
}

export interface SchedulerOptions {
  scanCron: string;
  refreshCron: string;
}

/**
 * Cron-driven scan and refresh jobs (UTC). A job that fires while its previous
 * run is still active is recorded as SKIPPED; failures are recorded and
 * announced on Telegram.
 */
export class Scheduler {
  private readonly running = new Set<SchedulerJob>();
  private readonly tasks: ScheduledTask[] = [];

  constructor(
    private readonly jobs: { scan: OpportunityScanJob; refresh: PositionRefreshJob },
    private readonly recorder: RunRecorder,
    private readonly notifier: Notifier,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  start(options: SchedulerOptions): void {
    for (const [job, expr] of [['scan', options.scanCron], ['refresh', options.refreshCron]] as const) {
      if (!cron.validate(expr)) throw new Error(`Invalid cron expression for ${job}: "${expr}"`);
      this.tasks.push(cron.schedule(expr, () => {
        this.trigger(job, 'AUTO').catch(err => console.error(`[Scheduler] Unhandled ${job} error:`, errorMessage(err)));
      }, { timezone: 'UTC' }));
      console.log(`[Scheduler] ${job} cron: "${expr}" (UTC)`);
    }
  }

  stop(): void {
    for (const task of this.tasks.splice(0)) task.stop();
  }

  isRunning(job: SchedulerJob): boolean {
    return this.running.has(job);
  }

  async trigger(job: SchedulerJob, triggerType: TriggerType = 'MANUAL'): Promise<JobRunOutcome> {
    const runAt = this.clock();

    if (this.running.has(job)) {
      console.log(`[Scheduler] Skipping ${job}, previous run still active`);
      await this.recorder.start(job, runAt, triggerType, 'SKIPPED', 'PREV_RUN_ACTIVE');
      return { job, status: 'SKIPPED', symbolRuns: [] };
    }

    this.running.add(job);
    const started = Date.now();
    console.log(`[Scheduler] ${triggerType} ${job} at ${runAt.toUTCString()}`);

    try {
      const runId = await this.recorder.start(job, runAt, triggerType, 'RUNNING');
      try {
        const { symbolRuns } = job === 'scan' ? await this.jobs.scan.run() : await this.jobs.refresh.run();
        await this.recorder.complete(runId, 'COMPLETED', symbolRuns, Date.now() - started);
        return { job, status: 'COMPLETED', symbolRuns };
      } catch (err) {
        const error = errorMessage(err);
        console.error(`[Scheduler] ${job} failed: ${error}`);
        await this.recorder.complete(runId, 'FAILED', [], Date.now() - started, error);
        await this.notifier.send(formatJobFailure(job, error));
        return { job, status: 'FAILED', symbolRuns: [], error };
      }
    } finally {
      this.running.delete(job);
    }
  }
}
