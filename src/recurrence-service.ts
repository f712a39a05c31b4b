import { Database } from './database';
import { Clock, systemClock } from './clock';
import { Logger, silentLogger } from './logger';
import { ConstraintViolation, errorMessage } from './errors';
import {
  Pattern,
  Instance,
  TaskStatus,
  CreatePatternInput,
  SeriesResult,
} from './types';
import {
  buildRecurrence,
  nextDue,
  isExhausted,
  shouldGenerateToday,
  localDayWindow,
  localDaysBetween,
  rebaseToDay,
} from './recurrence';

export interface ServiceOptions {
  clock?: Clock;
  logger?: Logger;
  /** IANA zone the owners' local calendar is evaluated in (default: UTC). */
  zone?: string;
}

export interface DailyGenerationReport {
  checked: number;
  generated: number;
  completed: number;
  skipped: number;
  failed: number;
}

const SERIES_NOT_FOUND: SeriesResult = { ok: false, message: 'Series not found' };

export class RecurrenceService {
  private clock: Clock;
  private logger: Logger;
  private zone: string;

  constructor(
    private db: Database,
    options: ServiceOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? silentLogger).child({ component: 'recurrence' });
    this.zone = options.zone ?? 'UTC';
  }

  // ===== PATTERNS =====

  /**
   * Stores a new recurring series. When the first due date falls today or
   * earlier, its instance is created straight away.
   */
  async createPattern(input: CreatePatternInput): Promise<Pattern> {
    const recurrence = buildRecurrence(input, this.zone);
    const id = await this.db.insertPattern({
      owner_id: input.owner_id,
      description: input.description.trim(),
      due_at: input.due_at,
      recurrence,
    });

    const pattern = await this.requirePattern(id);
    this.logger.info({ patternId: id, kind: recurrence.kind }, 'Created recurring series');

    if (localDaysBetween(input.due_at, this.clock.now(), this.zone) >= 0) {
      await this.generateNextInstance(pattern);
      return this.requirePattern(id);
    }
    return pattern;
  }

  /**
   * Materializes the occurrence at `pattern.due_at` and advances the pattern.
   * Returns the instance already in that slot when there is one, and null when
   * the pattern may not generate.
   */
  async generateNextInstance(pattern: Pattern): Promise<Instance | null> {
    const now = this.clock.now();
    const r = pattern.recurrence;

    if (pattern.status !== TaskStatus.PENDING || !pattern.due_at) {
      return null;
    }
    if (isExhausted(pattern, now)) {
      this.logger.debug({ patternId: pattern.id }, 'Series exhausted, not generating');
      return null;
    }

    const dueAt = pattern.due_at;
    const next = nextDue(pattern, this.zone);

    const existing = await this.db.findInstanceBySlot(pattern.id, dueAt);
    if (existing) {
      if (next) {
        await this.db.updatePattern(pattern.id, { due_at: next });
      }
      return existing;
    }

    if (!next) {
      this.logger.warn({ patternId: pattern.id, kind: r.kind }, 'Series has no next occurrence');
      return null;
    }

    try {
      const { instance, superseded } = await this.db.commitGeneratedInstance({
        pattern,
        due_at: dueAt,
        next_due_at: next,
        now,
      });
      this.logger.info(
        { patternId: pattern.id, instanceId: instance.id, dueAt: dueAt.toISOString(), superseded },
        'Generated instance'
      );
      return instance;
    } catch (err) {
      if (err instanceof ConstraintViolation) {
        this.logger.debug({ patternId: pattern.id }, 'Slot filled concurrently, using existing instance');
        return this.db.findInstanceBySlot(pattern.id, dueAt);
      }
      throw err;
    }
  }

  // ===== SERIES OPERATIONS =====

  async stopSeries(
    patternId: number,
    ownerId: string,
    deleteFutureInstances = false
  ): Promise<SeriesResult> {
    const pattern = await this.db.getPattern(patternId);
    if (!pattern || pattern.owner_id !== ownerId) {
      return SERIES_NOT_FOUND;
    }
    if (pattern.status === TaskStatus.CANCELLED) {
      return { ok: false, message: `Series "${pattern.description}" is already stopped` };
    }

    await this.db.updatePattern(patternId, { status: TaskStatus.CANCELLED });

    let removed = 0;
    if (deleteFutureInstances) {
      removed = await this.db.deletePendingInstances(patternId, this.clock.now());
    }

    this.logger.info({ patternId, removed }, 'Stopped series');
    const suffix = removed > 0 ? ` and removed ${removed} upcoming instance(s)` : '';
    return { ok: true, message: `Stopped series "${pattern.description}"${suffix}` };
  }

  async completeSeries(patternId: number, ownerId: string): Promise<SeriesResult> {
    const pattern = await this.db.getPattern(patternId);
    if (!pattern || pattern.owner_id !== ownerId) {
      return SERIES_NOT_FOUND;
    }
    if (pattern.status === TaskStatus.COMPLETED) {
      return { ok: false, message: `Series "${pattern.description}" is already completed` };
    }

    await this.db.updatePattern(patternId, { status: TaskStatus.COMPLETED });

    const pending = await this.db.getTasks({
      parent_pattern_id: patternId,
      status: TaskStatus.PENDING,
    });
    const now = this.clock.now();
    for (const instance of pending) {
      await this.db.updateTask(instance.id, {
        status: TaskStatus.CANCELLED,
        local_modified_at: now,
      });
    }

    this.logger.info({ patternId, cancelled: pending.length }, 'Completed series');
    return {
      ok: true,
      message: `Completed series "${pattern.description}" (${pending.length} pending instance(s) cancelled)`,
    };
  }

  // ===== DAILY GENERATION =====

  /** One pass over every active series for the local day of `clock.now()`. */
  async runDailyGeneration(): Promise<DailyGenerationReport> {
    const now = this.clock.now();
    const today = localDayWindow(now, this.zone);
    const report: DailyGenerationReport = {
      checked: 0,
      generated: 0,
      completed: 0,
      skipped: 0,
      failed: 0,
    };

    const patterns = await this.db.getActivePatterns();
    for (const pattern of patterns) {
      report.checked++;
      try {
        if (isExhausted(pattern, now)) {
          await this.db.updatePattern(pattern.id, { status: TaskStatus.COMPLETED });
          report.completed++;
          this.logger.info({ patternId: pattern.id }, 'Series reached its end');
          continue;
        }

        const last = await this.db.getLatestInstance(pattern.id);
        if (!shouldGenerateToday(pattern, now, this.zone, last)) {
          report.skipped++;
          continue;
        }

        if (await this.db.findInstanceInRange(pattern.id, today.start, today.end)) {
          report.skipped++;
          continue;
        }

        const timeOf = pattern.due_at ?? pattern.recurrence.anchor_at;
        if (!timeOf) {
          report.skipped++;
          continue;
        }

        const rebased: Pattern = { ...pattern, due_at: rebaseToDay(timeOf, now, this.zone) };
        const instance = await this.generateNextInstance(rebased);
        if (instance) {
          report.generated++;
        } else {
          report.skipped++;
        }
      } catch (err) {
        report.failed++;
        this.logger.error({ patternId: pattern.id, err: errorMessage(err) }, 'Daily generation failed');
      }
    }

    this.logger.info({ ...report }, 'Daily generation finished');
    return report;
  }

  // ===== HELPERS =====

  private async requirePattern(id: number): Promise<Pattern> {
    const pattern = await this.db.getPattern(id);
    if (!pattern) {
      throw new Error(`Pattern ${id} not found`);
    }
    return pattern;
  }
}
