import { DateTime } from 'luxon';
import { Database } from './database';
import { Clock, systemClock } from './clock';
import { Logger, silentLogger } from './logger';
import { errorMessage } from './errors';

export type Trigger =
  | { kind: 'interval'; everyMs: number }
  | { kind: 'daily'; hour: number; minute: number };

export type JobStatus = 'ok' | 'failed' | 'skipped';

export interface JobDefinition {
  id: string;
  trigger: Trigger;
  run: () => Promise<unknown>;
}

export interface JobState {
  id: string;
  trigger: Trigger;
  next_run_at?: Date;
  last_run_at?: Date;
  last_status?: JobStatus;
  last_error?: string;
  running: boolean;
}

export interface JobOutcome {
  id: string;
  status: JobStatus;
  error?: string;
}

export interface SchedulerOptions {
  clock?: Clock;
  logger?: Logger;
  /** Zone daily triggers are evaluated in (default: UTC). */
  zone?: string;
}

interface RegisteredJob {
  def: JobDefinition;
  nextRunAt: Date;
  inFlight: Promise<JobOutcome> | null;
  timer: NodeJS.Timeout | null;
}

// setTimeout overflows past this
const MAX_TIMER_MS = 2 ** 31 - 1;

function isJobStatus(value: string | null): value is JobStatus {
  return value === 'ok' || value === 'failed' || value === 'skipped';
}

/** First fire time of `trigger` strictly after `from`. */
export function nextFireTime(trigger: Trigger, from: Date, zone = 'UTC'): Date {
  if (trigger.kind === 'interval') {
    return new Date(from.getTime() + trigger.everyMs);
  }
  const base = DateTime.fromJSDate(from, { zone });
  let candidate = base.set({ hour: trigger.hour, minute: trigger.minute, second: 0, millisecond: 0 });
  if (candidate.toMillis() <= base.toMillis()) {
    candidate = candidate.plus({ days: 1 });
  }
  return candidate.toJSDate();
}

/**
 * Runs registered jobs on their triggers. Next run times live in the database so
 * a restarted worker catches up once on anything it missed. A job never runs
 * twice at the same time: a tick that finds it busy is recorded as skipped.
 */
export class Scheduler {
  private jobs = new Map<string, RegisteredJob>();
  private clock: Clock;
  private logger: Logger;
  private zone: string;
  private loaded = false;
  private isRunning = false;

  constructor(
    private db: Database,
    options: SchedulerOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? silentLogger).child({ component: 'scheduler' });
    this.zone = options.zone ?? 'UTC';
  }

  /** Adds a job. Registration is closed while the scheduler is running. */
  register(def: JobDefinition): void {
    if (this.isRunning) {
      throw new Error(`Cannot register job "${def.id}" while the scheduler is running`);
    }
    if (this.jobs.has(def.id)) {
      throw new Error(`Job "${def.id}" is already registered`);
    }
    if (def.trigger.kind === 'interval' && def.trigger.everyMs <= 0) {
      throw new Error(`Job "${def.id}" needs a positive interval`);
    }
    this.jobs.set(def.id, {
      def,
      nextRunAt: nextFireTime(def.trigger, this.clock.now(), this.zone),
      inFlight: null,
      timer: null,
    });
    this.loaded = false;
  }

  /** Reads stored next run times. A stored time in the past makes the job due now. */
  async load(): Promise<void> {
    const now = this.clock.now();
    for (const job of this.jobs.values()) {
      const row = await this.db.getJob(job.def.id);
      if (row?.next_run_at) {
        job.nextRunAt = new Date(row.next_run_at);
      } else {
        job.nextRunAt = nextFireTime(job.def.trigger, now, this.zone);
        await this.db.saveJob({
          id: job.def.id,
          next_run_at: job.nextRunAt.toISOString(),
          last_run_at: row?.last_run_at ?? null,
          last_status: row?.last_status ?? null,
          last_error: row?.last_error ?? null,
        });
      }
    }
    this.loaded = true;
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      this.logger.warn('Scheduler already running');
      return;
    }
    await this.load();
    this.isRunning = true;
    for (const job of this.jobs.values()) {
      this.arm(job);
    }
    this.logger.info({ jobs: [...this.jobs.keys()] }, 'Scheduler started');
  }

  /** Stops dispatching and waits for runs already in progress. */
  async stop(): Promise<void> {
    this.isRunning = false;
    const running: Promise<JobOutcome>[] = [];
    for (const job of this.jobs.values()) {
      if (job.timer) {
        clearTimeout(job.timer);
        job.timer = null;
      }
      if (job.inFlight) {
        running.push(job.inFlight);
      }
    }
    await Promise.all(running);
    this.logger.info('Scheduler stopped');
  }

  /** Runs every job whose next run time has come, once each. */
  async runDue(): Promise<JobOutcome[]> {
    if (!this.loaded) {
      await this.load();
    }
    const now = this.clock.now();
    const due = [...this.jobs.values()].filter((job) => job.nextRunAt.getTime() <= now.getTime());
    const outcomes: JobOutcome[] = [];
    for (const job of due) {
      outcomes.push(await this.dispatch(job, now));
    }
    return outcomes;
  }

  async listJobs(): Promise<JobState[]> {
    const states: JobState[] = [];
    for (const job of this.jobs.values()) {
      const row = await this.db.getJob(job.def.id);
      states.push({
        id: job.def.id,
        trigger: job.def.trigger,
        next_run_at: row?.next_run_at ? new Date(row.next_run_at) : job.nextRunAt,
        last_run_at: row?.last_run_at ? new Date(row.last_run_at) : undefined,
        last_status: row && isJobStatus(row.last_status) ? row.last_status : undefined,
        last_error: row?.last_error ?? undefined,
        running: job.inFlight !== null,
      });
    }
    return states;
  }

  // ===== DISPATCH =====

  private arm(job: RegisteredJob): void {
    if (job.timer) {
      clearTimeout(job.timer);
    }
    const delay = Math.min(Math.max(0, job.nextRunAt.getTime() - this.clock.now().getTime()), MAX_TIMER_MS);
    job.timer = setTimeout(() => {
      job.timer = null;
      this.fire(job).catch((err) =>
        this.logger.error({ jobId: job.def.id, err: errorMessage(err) }, 'Scheduler tick failed')
      );
    }, delay);
  }

  private async fire(job: RegisteredJob): Promise<void> {
    if (!this.isRunning) {
      return;
    }
    const now = this.clock.now();
    if (job.nextRunAt.getTime() > now.getTime()) {
      this.arm(job);
      return;
    }
    const outcome = this.dispatch(job, now);
    // dispatch has already advanced nextRunAt
    this.arm(job);
    await outcome;
  }

  /**
   * Advances the job's next run time before anything awaits, then either runs
   * it or records the tick as skipped when a previous run is still going.
   */
  private dispatch(job: RegisteredJob, now: Date): Promise<JobOutcome> {
    const id = job.def.id;
    job.nextRunAt = nextFireTime(job.def.trigger, now, this.zone);

    if (job.inFlight) {
      this.logger.warn({ jobId: id }, 'Previous run still in progress, skipping');
      return this.recordSkip(job);
    }

    const run = this.execute(job, now).finally(() => {
      job.inFlight = null;
    });
    job.inFlight = run;
    return run;
  }

  private async execute(job: RegisteredJob, startedAt: Date): Promise<JobOutcome> {
    const id = job.def.id;
    let outcome: JobOutcome;
    try {
      await job.def.run();
      outcome = { id, status: 'ok' };
      this.logger.debug({ jobId: id }, 'Job finished');
    } catch (err) {
      outcome = { id, status: 'failed', error: errorMessage(err) };
      this.logger.error({ jobId: id, err: outcome.error }, 'Job failed');
    }

    await this.db.saveJob({
      id,
      next_run_at: job.nextRunAt.toISOString(),
      last_run_at: startedAt.toISOString(),
      last_status: outcome.status,
      last_error: outcome.error ?? null,
    });
    return outcome;
  }

  private async recordSkip(job: RegisteredJob): Promise<JobOutcome> {
    const id = job.def.id;
    const row = await this.db.getJob(id);
    await this.db.saveJob({
      id,
      next_run_at: job.nextRunAt.toISOString(),
      last_run_at: row?.last_run_at ?? null,
      last_status: 'skipped',
      last_error: null,
    });
    return { id, status: 'skipped' };
  }
}
