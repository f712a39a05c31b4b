import { DateTime } from 'luxon';
import {
  Pattern,
  Instance,
  Recurrence,
  RecurrenceKind,
  Weekday,
  WEEKDAYS,
  CreatePatternInput,
  DEFAULT_MAX_INSTANCES,
} from './types';
import { ValidationError } from './errors';

// ===== LOCAL CALENDAR HELPERS =====

function local(date: Date, zone: string): DateTime {
  return DateTime.fromJSDate(date, { zone });
}

export function weekdayOf(date: Date, zone: string): Weekday {
  return WEEKDAYS[local(date, zone).weekday - 1];
}

/** Start of the owner's local day containing `now`, and the start of the next one. */
export function localDayWindow(now: Date, zone: string): { start: Date; end: Date } {
  const start = local(now, zone).startOf('day');
  return { start: start.toJSDate(), end: start.plus({ days: 1 }).toJSDate() };
}

/** `day` at the local time of day carried by `timeOf`. */
export function rebaseToDay(timeOf: Date, day: Date, zone: string): Date {
  const t = local(timeOf, zone);
  return local(day, zone)
    .set({ hour: t.hour, minute: t.minute, second: t.second, millisecond: t.millisecond })
    .toJSDate();
}

/** Whole local calendar days from `from` to `to` (negative when `to` is earlier). */
export function localDaysBetween(from: Date, to: Date, zone: string): number {
  const a = local(from, zone).startOf('day');
  const b = local(to, zone).startOf('day');
  return Math.round(b.diff(a, 'days').days);
}

// ===== NEXT OCCURRENCE =====

/**
 * Next occurrence strictly after the pattern's current `due_at`, computed on the
 * local calendar of `zone` so wall-clock time survives DST changes.
 */
export function nextDue(pattern: Pattern, zone: string): Date | null {
  if (!pattern.due_at) {
    return null;
  }

  const r = pattern.recurrence;
  const due = local(pattern.due_at, zone);

  switch (r.kind) {
    case RecurrenceKind.DAILY:
    case RecurrenceKind.INTERVAL:
      return due.plus({ days: r.interval }).toJSDate();

    case RecurrenceKind.WEEKLY:
      return due.plus({ weeks: r.interval }).toJSDate();

    case RecurrenceKind.SPECIFIC_DAYS: {
      if (r.days_of_week.size === 0) {
        return null;
      }
      let candidate = due.plus({ days: 1 });
      for (let i = 0; i < 7; i++) {
        if (r.days_of_week.has(WEEKDAYS[candidate.weekday - 1])) {
          return candidate.toJSDate();
        }
        candidate = candidate.plus({ days: 1 });
      }
      return null;
    }

    case RecurrenceKind.MONTHLY: {
      if (r.day_of_month === undefined) {
        return null;
      }
      const nextMonth = due.startOf('month').plus({ months: 1 });
      const day = Math.min(r.day_of_month, nextMonth.daysInMonth ?? 28);
      return nextMonth
        .set({
          day,
          hour: due.hour,
          minute: due.minute,
          second: due.second,
          millisecond: due.millisecond,
        })
        .toJSDate();
    }
  }
}

// ===== DESCRIPTORS =====

/**
 * Weekday set stored with a pattern. Daily and interval patterns fire on every
 * day, weekly ones on the weekday of their first due date unless told otherwise.
 */
export function normalizeDaysOfWeek(
  kind: RecurrenceKind,
  dueAt: Date,
  zone: string,
  days?: Iterable<Weekday>
): Set<Weekday> {
  const given = new Set(days ?? []);
  switch (kind) {
    case RecurrenceKind.DAILY:
    case RecurrenceKind.INTERVAL:
      return new Set(WEEKDAYS);
    case RecurrenceKind.WEEKLY:
      return given.size > 0 ? given : new Set([weekdayOf(dueAt, zone)]);
    case RecurrenceKind.SPECIFIC_DAYS:
      return given;
    case RecurrenceKind.MONTHLY:
      return new Set();
  }
}

export function validateRecurrence(input: CreatePatternInput): void {
  if (!input.description.trim()) {
    throw new ValidationError('Description must not be empty');
  }
  if (Number.isNaN(input.due_at.getTime())) {
    throw new ValidationError('Due date is not a valid date');
  }

  const interval = input.interval ?? 1;
  if (!Number.isInteger(interval) || interval < 1) {
    throw new ValidationError(`Interval must be a positive integer, got ${interval}`);
  }

  const maxInstances = input.max_instances ?? DEFAULT_MAX_INSTANCES;
  if (!Number.isInteger(maxInstances) || maxInstances < 1) {
    throw new ValidationError(`Instance limit must be a positive integer, got ${maxInstances}`);
  }

  if (input.kind === RecurrenceKind.SPECIFIC_DAYS && new Set(input.days_of_week ?? []).size === 0) {
    throw new ValidationError('Specific-days patterns need at least one weekday');
  }

  if (input.kind === RecurrenceKind.MONTHLY) {
    const dom = input.day_of_month;
    if (dom === undefined || !Number.isInteger(dom) || dom < 1 || dom > 31) {
      throw new ValidationError('Monthly patterns need a day of month between 1 and 31');
    }
  } else if (input.day_of_month !== undefined) {
    throw new ValidationError('Day of month only applies to monthly patterns');
  }

  if (input.end_at && input.end_at.getTime() < input.due_at.getTime()) {
    throw new ValidationError('End date is before the first due date');
  }
}

export function buildRecurrence(input: CreatePatternInput, zone: string): Recurrence {
  validateRecurrence(input);
  return {
    kind: input.kind,
    interval: input.interval ?? 1,
    days_of_week: normalizeDaysOfWeek(input.kind, input.due_at, zone, input.days_of_week),
    day_of_month: input.kind === RecurrenceKind.MONTHLY ? input.day_of_month : undefined,
    end_at: input.end_at,
    instance_count: 0,
    generated_count: 0,
    max_instances: input.max_instances ?? DEFAULT_MAX_INSTANCES,
    anchor_at: input.due_at,
  };
}

// ===== DAILY TRIGGER POLICY =====

export function isExhausted(pattern: Pattern, now: Date): boolean {
  const r = pattern.recurrence;
  if (r.generated_count >= r.max_instances) {
    return true;
  }
  return r.end_at !== undefined && now.getTime() > r.end_at.getTime();
}

function intervalGapReached(
  pattern: Pattern,
  gapDays: number,
  now: Date,
  zone: string,
  lastInstance: Instance | null
): boolean {
  if (lastInstance?.due_at) {
    return localDaysBetween(lastInstance.due_at, now, zone) >= gapDays;
  }

  const anchor = pattern.recurrence.anchor_at ?? pattern.due_at;
  if (!anchor) {
    return true;
  }
  const elapsed = localDaysBetween(anchor, now, zone);
  return elapsed >= 0 && elapsed % gapDays === 0;
}

/** Whether the midnight job should materialize an occurrence of `pattern` for the local day of `now`. */
export function shouldGenerateToday(
  pattern: Pattern,
  now: Date,
  zone: string,
  lastInstance: Instance | null
): boolean {
  const r = pattern.recurrence;
  const today = local(now, zone);

  const start = pattern.due_at ?? r.anchor_at;
  if (start && localDaysBetween(start, now, zone) < 0) {
    return false;
  }

  if (r.kind === RecurrenceKind.MONTHLY) {
    if (r.day_of_month === undefined) {
      return false;
    }
    const length = today.daysInMonth ?? 31;
    return today.day === r.day_of_month || (today.day === length && r.day_of_month > length);
  }

  const days =
    r.days_of_week.size > 0
      ? r.days_of_week
      : normalizeDaysOfWeek(r.kind, r.anchor_at ?? pattern.due_at ?? now, zone);
  if (!days.has(WEEKDAYS[today.weekday - 1])) {
    return false;
  }

  if (r.kind === RecurrenceKind.WEEKLY && r.interval > 1) {
    return intervalGapReached(pattern, 7 * r.interval, now, zone, lastInstance);
  }
  if (r.kind === RecurrenceKind.INTERVAL) {
    return intervalGapReached(pattern, r.interval, now, zone, lastInstance);
  }
  return true;
}
