import { Database } from './database';
import { AppConfig } from './config';
import { Clock, systemClock } from './clock';
import { Logger, createLogger } from './logger';
import { Lock, SqliteLock } from './lock';
import { Notifier, LogNotifier } from './notifier';
import { RecurrenceService } from './recurrence-service';
import { TaskService } from './task-service';
import { ReminderService } from './reminder-service';
import { Scheduler } from './scheduler';
import { CalendarClient } from './calendar/types';
import { CalendarSyncEngine } from './calendar/sync-engine';
import { GoogleCalendarClient } from './calendar/google';

export const JOB_REMINDERS = 'reminders';
export const JOB_RECURRING_GENERATION = 'recurring-generation';
export const JOB_CALENDAR_SYNC = 'calendar-sync';

export interface WorkerOverrides {
  clock?: Clock;
  logger?: Logger;
  notifier?: Notifier;
  lock?: Lock;
  calendar?: CalendarClient;
}

export interface Worker {
  db: Database;
  logger: Logger;
  tasks: TaskService;
  recurrence: RecurrenceService;
  reminders: ReminderService;
  sync: CalendarSyncEngine | null;
  scheduler: Scheduler;
  close(): Promise<void>;
}

function googleClient(config: AppConfig): CalendarClient | null {
  const token = config.googleAccessToken;
  if (!token) {
    return null;
  }
  return new GoogleCalendarClient({
    getAccessToken: async () => token,
    zone: config.timezone,
    defaultDurationMinutes: config.eventDurationMinutes,
    retry: config.retry,
  });
}

/**
 * Opens the database and wires every service and the three periodic jobs.
 * Calendar sync is registered only when a calendar client is available.
 */
export async function createWorker(config: AppConfig, overrides: WorkerOverrides = {}): Promise<Worker> {
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const clock = overrides.clock ?? systemClock;
  const zone = config.timezone;

  const db = new Database(config.dbPath);
  await db.init();

  const tasks = new TaskService(db, { clock, zone });
  const recurrence = new RecurrenceService(db, { clock, logger, zone });
  const reminders = new ReminderService(
    db,
    overrides.notifier ?? new LogNotifier(logger.child({ component: 'notifier' })),
    overrides.lock ?? new SqliteLock(db, clock),
    { clock, logger, retry: config.retry }
  );

  const calendar = overrides.calendar ?? googleClient(config);
  const sync = calendar
    ? new CalendarSyncEngine(db, calendar, {
        clock,
        logger,
        eventDurationMinutes: config.eventDurationMinutes,
      })
    : null;

  const scheduler = new Scheduler(db, { clock, logger, zone });
  scheduler.register({
    id: JOB_REMINDERS,
    trigger: { kind: 'interval', everyMs: config.reminderIntervalMs },
    run: () => reminders.sendDueReminders(),
  });
  scheduler.register({
    id: JOB_RECURRING_GENERATION,
    trigger: { kind: 'daily', hour: 0, minute: 0 },
    run: () => recurrence.runDailyGeneration(),
  });
  if (sync) {
    scheduler.register({
      id: JOB_CALENDAR_SYNC,
      trigger: { kind: 'interval', everyMs: config.syncIntervalMs },
      run: () => sync.syncAll(),
    });
  } else {
    logger.info('No calendar client configured, calendar sync disabled');
  }

  return {
    db,
    logger,
    tasks,
    recurrence,
    reminders,
    sync,
    scheduler,
    close: async () => {
      await scheduler.stop();
      await db.close();
    },
  };
}
