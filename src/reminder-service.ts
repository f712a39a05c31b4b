import { Database } from './database';
import { Clock, systemClock } from './clock';
import { Logger, silentLogger } from './logger';
import { Lock, withLock } from './lock';
import { Notifier } from './notifier';
import { RetryPolicy, Sleep, resolvePolicy, retryBudgetMs, withRetry } from './retry';
import { LockContention, TransientExternalError, errorMessage } from './errors';
import { Instance } from './types';

export interface ReminderServiceOptions {
  clock?: Clock;
  logger?: Logger;
  retry?: Partial<RetryPolicy>;
  sleep?: Sleep;
  /**
   * How long one worker may hold a task's reminder lock (default: 30s). Raised
   * when the retry policy could outlast it, so the lock never expires mid-send.
   */
  lockTtlMs?: number;
}

const DEFAULT_LOCK_TTL_MS = 30_000;
const LOCK_MARGIN_MS = 5_000;

export interface ReminderReport {
  due: number;
  sent: number;
  skipped: number;
  failed: number;
}

export function reminderText(task: Instance): string {
  return `Reminder: ${task.description}`;
}

export class ReminderService {
  private clock: Clock;
  private logger: Logger;
  private lockTtlMs: number;

  constructor(
    private db: Database,
    private notifier: Notifier,
    private lock: Lock,
    private options: ReminderServiceOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? silentLogger).child({ component: 'reminders' });
    this.lockTtlMs = Math.max(
      options.lockTtlMs ?? DEFAULT_LOCK_TTL_MS,
      retryBudgetMs(resolvePolicy(options.retry)) + LOCK_MARGIN_MS
    );
  }

  /** Sends one reminder for every pending task that is due and has not had one. */
  async sendDueReminders(): Promise<ReminderReport> {
    const due = await this.db.getDueForReminders(this.clock.now());
    const report: ReminderReport = { due: due.length, sent: 0, skipped: 0, failed: 0 };

    for (const task of due) {
      try {
        const sent = await withLock(this.lock, `reminder:${task.id}`, this.lockTtlMs, () =>
          this.deliver(task)
        );
        if (sent) {
          report.sent++;
        } else {
          report.skipped++;
        }
      } catch (err) {
        if (err instanceof LockContention) {
          report.skipped++;
          this.logger.debug({ taskId: task.id }, 'Reminder locked by another worker');
          continue;
        }
        report.failed++;
        this.logger.error({ taskId: task.id, err: errorMessage(err) }, 'Reminder delivery failed');
      }
    }

    if (report.due > 0) {
      this.logger.info({ ...report }, 'Reminder pass finished');
    }
    return report;
  }

  /** False when the reminder went out elsewhere between the query and the lock. */
  private async deliver(task: Instance): Promise<boolean> {
    const current = await this.db.getInstance(task.id);
    if (!current || current.reminder_sent) {
      return false;
    }

    const result = await withRetry(
      async () => {
        const r = await this.notifier.send(task.owner_id, reminderText(task));
        if (!r.success) {
          throw new TransientExternalError(r.error ?? 'Notifier reported failure');
        }
        return r;
      },
      { ...this.options.retry, label: 'reminder send', sleep: this.options.sleep }
    );

    await this.db.updateTask(task.id, { reminder_sent: true });
    this.logger.info({ taskId: task.id, messageId: result.messageId }, 'Reminder sent');
    return true;
  }
}
