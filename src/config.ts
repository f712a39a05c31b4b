import { z } from 'zod';
import { IANAZone } from 'luxon';
import { RetryPolicy } from './retry';
import { LogLevel } from './logger';

const str = z.string().min(1);

export const EnvSchema = z.object({
  // storage
  TASKMIRROR_DB_PATH: str.default('taskmirror.db'),

  // local calendar semantics
  TASKMIRROR_TIMEZONE: str
    .default('UTC')
    .refine((zone) => IANAZone.isValidZone(zone), { message: 'Unknown IANA time zone' }),

  // behavior
  TASKMIRROR_LOG_LEVEL: z
    .enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])
    .default('info'),
  TASKMIRROR_REMINDER_INTERVAL_SECONDS: z.coerce.number().int().positive().default(30),
  TASKMIRROR_SYNC_INTERVAL_MINUTES: z.coerce.number().int().positive().default(10),
  TASKMIRROR_EVENT_DURATION_MINUTES: z.coerce.number().int().positive().default(60),

  // external calls
  TASKMIRROR_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  TASKMIRROR_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  TASKMIRROR_RETRY_BACKOFF_MS: z.coerce.number().int().nonnegative().default(200),

  // Google Calendar
  TASKMIRROR_GOOGLE_ACCESS_TOKEN: str.optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export interface AppConfig {
  dbPath: string;
  timezone: string;
  logLevel: LogLevel;
  reminderIntervalMs: number;
  syncIntervalMs: number;
  eventDurationMinutes: number;
  retry: RetryPolicy;
  googleAccessToken?: string;
}

export function readEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return EnvSchema.parse(env);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = readEnv(env);
  return {
    dbPath: e.TASKMIRROR_DB_PATH,
    timezone: e.TASKMIRROR_TIMEZONE,
    logLevel: e.TASKMIRROR_LOG_LEVEL,
    reminderIntervalMs: e.TASKMIRROR_REMINDER_INTERVAL_SECONDS * 1000,
    syncIntervalMs: e.TASKMIRROR_SYNC_INTERVAL_MINUTES * 60_000,
    eventDurationMinutes: e.TASKMIRROR_EVENT_DURATION_MINUTES,
    retry: {
      attempts: e.TASKMIRROR_RETRY_ATTEMPTS,
      backoffMs: e.TASKMIRROR_RETRY_BACKOFF_MS,
      maxBackoffMs: 5_000,
      timeoutMs: e.TASKMIRROR_HTTP_TIMEOUT_MS,
    },
    googleAccessToken: e.TASKMIRROR_GOOGLE_ACCESS_TOKEN,
  };
}
