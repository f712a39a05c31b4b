import { Database } from '../database';
import { Clock, systemClock } from '../clock';
import { Logger, silentLogger } from '../logger';
import { NotFoundExternalError, errorMessage } from '../errors';
import { CalendarAccount, Instance, TaskStatus, UpdateTaskInput } from '../types';
import { AccountSyncResult, CalendarClient, CalendarEvent, EventSpec, SyncResult } from './types';
import {
  COMPLETED_COLOR_ID,
  COMPLETED_PREFIX,
  completedTitle,
  isDoneOnCalendar,
  isTaskLike,
} from './classify';

export interface SyncEngineOptions {
  clock?: Clock;
  logger?: Logger;
  /** Length of events created for tasks (default: 60). */
  eventDurationMinutes?: number;
  /** Most local tasks published as new events in one pass (default: 20). */
  publishLimit?: number;
}

export interface SyncAllReport {
  accounts: number;
  failed: string[];
  totals: SyncResult;
}

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/** Overlap with the previous pass so edits made during it are not missed. */
const WATERMARK_OVERLAP_MS = HOUR_MS;
const FIRST_SYNC_LOOKBACK_MS = 7 * DAY_MS;
const LOOKAHEAD_MS = 30 * DAY_MS;
const VERIFY_WINDOW_MS = HOUR_MS;
const VERIFY_LIMIT = 10;

function stripCompletedPrefix(title: string): string {
  return title.startsWith(COMPLETED_PREFIX) ? title.slice(COMPLETED_PREFIX.length) : title;
}

/**
 * Two-way reconciliation between an owner's tasks and their external calendar.
 * Conflicts resolve last-writer-wins on modification timestamps.
 */
export class CalendarSyncEngine {
  private clock: Clock;
  private logger: Logger;
  private eventDurationMs: number;
  private publishLimit: number;

  constructor(
    private db: Database,
    private client: CalendarClient,
    options: SyncEngineOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? silentLogger).child({ component: 'calendar-sync' });
    this.eventDurationMs = (options.eventDurationMinutes ?? 60) * 60_000;
    this.publishLimit = options.publishLimit ?? 20;
  }

  /**
   * One pass for one owner. Failures never escape: they are logged, the
   * watermark stays where it was and the partial counts come back with `failed`.
   */
  async syncAccount(ownerId: string): Promise<AccountSyncResult> {
    const result: AccountSyncResult = { created: 0, updated: 0, deleted: 0 };
    try {
      await this.runPass(ownerId, result);
    } catch (err) {
      result.failed = true;
      result.error = errorMessage(err);
      this.logger.error({ ownerId, err: result.error }, 'Calendar sync failed');
    }
    return result;
  }

  private async runPass(ownerId: string, result: SyncResult): Promise<void> {
    const account = await this.db.getAccount(ownerId);
    if (!account || !account.enabled) {
      this.logger.debug({ ownerId }, 'No enabled calendar account');
      return;
    }

    const now = this.clock.now();
    const rangeStart = account.last_sync_at
      ? new Date(account.last_sync_at.getTime() - WATERMARK_OVERLAP_MS)
      : new Date(now.getTime() - FIRST_SYNC_LOOKBACK_MS);
    const rangeEnd = new Date(now.getTime() + LOOKAHEAD_MS);

    const events = await this.client.fetchEvents(account, rangeStart, rangeEnd, true);

    if (!account.last_sync_at && events.length === 0) {
      await this.db.setAccountLastSync(ownerId, now);
      this.logger.info({ ownerId }, 'First sync found no events');
      return;
    }

    // inbound
    for (const event of events) {
      if (!isTaskLike(account, event)) continue;
      try {
        const task = await this.db.findByExternalEventId(ownerId, event.id);
        if (task) {
          if (await this.resolve(account, task, event)) {
            result.updated++;
          }
        } else {
          await this.createFromEvent(account, event, now);
          result.created++;
        }
      } catch (err) {
        this.logger.warn({ ownerId, eventId: event.id, err: errorMessage(err) }, 'Failed to reconcile event');
      }
    }

    result.deleted = await this.removeDeletedEvents(account, events);
    const published = await this.publishLocalTasks(account, rangeStart, rangeEnd);
    await this.verifyCompletions(account, now);

    await this.db.setAccountLastSync(ownerId, now);
    this.logger.info({ ownerId, ...result, published }, 'Calendar synced');
  }

  /** Syncs every enabled account; one account failing never stops the others. */
  async syncAll(): Promise<SyncAllReport> {
    const accounts = await this.db.getEnabledAccounts();
    const report: SyncAllReport = {
      accounts: accounts.length,
      failed: [],
      totals: { created: 0, updated: 0, deleted: 0 },
    };

    for (const account of accounts) {
      const r = await this.syncAccount(account.owner_id);
      report.totals.created += r.created;
      report.totals.updated += r.updated;
      report.totals.deleted += r.deleted;
      if (r.failed) {
        report.failed.push(account.owner_id);
      }
    }
    return report;
  }

  /**
   * Settles one linked pair. Returns true when the local task took the
   * calendar's version, false when nothing changed locally.
   */
  async resolve(account: CalendarAccount, task: Instance, event: CalendarEvent): Promise<boolean> {
    const eventUpdated = event.updated_at;
    if (!eventUpdated) {
      return false;
    }

    const seen = task.external_event_updated_at;
    if (seen && seen.getTime() >= eventUpdated.getTime()) {
      return false;
    }

    const localModified = task.local_modified_at;
    if (localModified && localModified.getTime() > eventUpdated.getTime()) {
      await this.pushTask(account, task, eventUpdated);
      return false;
    }

    const updates: UpdateTaskInput = {
      description: stripCompletedPrefix(event.title),
      due_at: event.start,
      external_event_updated_at: eventUpdated,
    };
    if (task.due_at?.getTime() !== event.start.getTime()) {
      updates.reminder_sent = false;
    }
    if (isDoneOnCalendar(event) && task.status === TaskStatus.PENDING) {
      updates.status = TaskStatus.COMPLETED;
      updates.completed_at = this.clock.now();
    }

    await this.db.updateTask(task.id, updates);
    this.logger.debug({ taskId: task.id, eventId: event.id }, 'Pulled calendar changes');
    return true;
  }

  // ===== STEPS =====

  private async createFromEvent(account: CalendarAccount, event: CalendarEvent, now: Date): Promise<void> {
    const done = isDoneOnCalendar(event);
    const id = await this.db.insertTask({
      owner_id: account.owner_id,
      description: stripCompletedPrefix(event.title),
      due_at: event.start,
      status: done ? TaskStatus.COMPLETED : TaskStatus.PENDING,
      completed_at: done ? now : undefined,
      external_event_id: event.id,
      external_event_updated_at: event.updated_at ?? undefined,
      local_modified_at: now,
      originated_externally: true,
    });
    this.logger.debug({ taskId: id, eventId: event.id }, 'Created task from calendar event');
  }

  private async removeDeletedEvents(account: CalendarAccount, events: CalendarEvent[]): Promise<number> {
    const present = new Set(events.map((e) => e.id));
    const linked = await this.db.getTasks({
      owner_id: account.owner_id,
      is_pattern: false,
      status: TaskStatus.PENDING,
      originated_externally: true,
      has_external_event: true,
    });

    let deleted = 0;
    for (const task of linked) {
      if (task.external_event_id && !present.has(task.external_event_id)) {
        await this.db.deleteTask(task.id);
        deleted++;
        this.logger.info({ taskId: task.id, eventId: task.external_event_id }, 'Calendar event gone, task deleted');
      }
    }
    return deleted;
  }

  private async publishLocalTasks(account: CalendarAccount, from: Date, to: Date): Promise<number> {
    const unlinked = await this.db.getTasks({
      owner_id: account.owner_id,
      is_pattern: false,
      status: TaskStatus.PENDING,
      has_external_event: false,
      due_from: from,
      due_before: to,
    });

    let published = 0;
    for (const task of unlinked.slice(0, this.publishLimit)) {
      if (task.is_pattern || !task.due_at) continue;
      try {
        const event = await this.client.createEvent(account, this.eventSpecFor(account, task, task.due_at));
        await this.db.updateTask(task.id, {
          external_event_id: event.id,
          external_event_updated_at: event.updated_at,
        });
        published++;
      } catch (err) {
        this.logger.warn({ taskId: task.id, err: errorMessage(err) }, 'Failed to publish task');
      }
    }
    return published;
  }

  private async verifyCompletions(account: CalendarAccount, now: Date): Promise<void> {
    const since = new Date(now.getTime() - VERIFY_WINDOW_MS);
    const recent = await this.db.getRecentlyCompletedLinked(account.owner_id, since, VERIFY_LIMIT);

    for (const task of recent) {
      if (!task.external_event_id) continue;
      try {
        await this.client.updateEvent(account, task.external_event_id, {
          title: completedTitle(task.description),
          color_id: COMPLETED_COLOR_ID,
        });
      } catch (err) {
        this.logger.warn(
          { taskId: task.id, eventId: task.external_event_id, err: errorMessage(err) },
          'Failed to mark calendar event completed'
        );
      }
    }
  }

  // ===== HELPERS =====

  private async pushTask(account: CalendarAccount, task: Instance, eventUpdated: Date): Promise<void> {
    const spec: Partial<EventSpec> = task.due_at
      ? this.eventSpecFor(account, task, task.due_at)
      : { title: task.description };
    if (task.status === TaskStatus.COMPLETED) {
      spec.title = completedTitle(task.description);
      spec.color_id = COMPLETED_COLOR_ID;
    }

    const eventId = task.external_event_id;
    if (!eventId) {
      return;
    }

    try {
      await this.client.updateEvent(account, eventId, spec);
      await this.db.updateTask(task.id, { external_event_updated_at: eventUpdated });
      this.logger.debug({ taskId: task.id, eventId }, 'Pushed local changes');
    } catch (err) {
      if (!(err instanceof NotFoundExternalError) || !task.due_at) {
        throw err;
      }
      await this.db.updateTask(task.id, { external_event_id: null, external_event_updated_at: null });
      const created = await this.client.createEvent(account, this.eventSpecFor(account, task, task.due_at));
      await this.db.updateTask(task.id, {
        external_event_id: created.id,
        external_event_updated_at: created.updated_at,
      });
      this.logger.info({ taskId: task.id, eventId: created.id }, 'Event vanished, recreated it');
    }
  }

  private eventSpecFor(account: CalendarAccount, task: Instance, start: Date): EventSpec {
    return {
      title: task.description,
      start,
      end: new Date(start.getTime() + this.eventDurationMs),
      color_id: account.marker_color,
    };
  }
}
