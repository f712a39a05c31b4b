// Core types
export * from './types';
export * from './errors';

// Storage
export { Database } from './database';

// Ambient
export { Clock, systemClock, FixedClock } from './clock';
export { createLogger, silentLogger, Logger, LogLevel } from './logger';
export { EnvSchema, EnvConfig, AppConfig, readEnv, loadConfig } from './config';
export {
  RetryPolicy,
  DEFAULT_RETRY,
  computeBackoff,
  resolvePolicy,
  retryBudgetMs,
  withRetry,
  withTimeout,
} from './retry';
export { Lock, SqliteLock, withLock } from './lock';
export { Notifier, SendResult, LogNotifier } from './notifier';
export { FetchLike, request, requestJson } from './http';

// Recurrence
export {
  nextDue,
  normalizeDaysOfWeek,
  validateRecurrence,
  buildRecurrence,
  shouldGenerateToday,
  isExhausted,
  localDayWindow,
  rebaseToDay,
} from './recurrence';
export { RecurrenceService, ServiceOptions, DailyGenerationReport } from './recurrence-service';

// Services
export { TaskService, TaskChanges } from './task-service';
export { ReminderService, ReminderServiceOptions, ReminderReport } from './reminder-service';

// Calendar
export * from './calendar/types';
export { isTaskLike, isDoneOnCalendar } from './calendar/classify';
export { CalendarSyncEngine, SyncEngineOptions, SyncAllReport } from './calendar/sync-engine';
export { GoogleCalendarClient, GoogleCalendarClientOptions } from './calendar/google';

// Scheduling
export {
  Scheduler,
  Trigger,
  JobDefinition,
  JobState,
  JobOutcome,
  JobStatus,
  nextFireTime,
} from './scheduler';
export { createWorker, Worker, WorkerOverrides } from './worker';
