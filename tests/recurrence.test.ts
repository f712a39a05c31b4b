import {
  Pattern,
  Instance,
  Recurrence,
  RecurrenceKind,
  TaskStatus,
  Weekday,
  ValidationError,
  nextDue,
  normalizeDaysOfWeek,
  validateRecurrence,
  shouldGenerateToday,
  localDayWindow,
  rebaseToDay,
} from '../src';
import { at } from './helpers';

function pattern(kind: RecurrenceKind, due: string | undefined, extra: Partial<Recurrence> = {}): Pattern {
  return {
    id: 1,
    owner_id: 'owner-1',
    description: 'Water plants',
    status: TaskStatus.PENDING,
    due_at: due ? at(due) : undefined,
    created_at: at('2025-01-01T00:00:00Z'),
    updated_at: at('2025-01-01T00:00:00Z'),
    originated_externally: false,
    is_pattern: true,
    recurrence: {
      kind,
      interval: 1,
      days_of_week: new Set<Weekday>(),
      instance_count: 0,
      generated_count: 0,
      max_instances: 100,
      ...extra,
    },
  };
}

function instance(due: string): Instance {
  return {
    id: 2,
    owner_id: 'owner-1',
    description: 'Water plants',
    status: TaskStatus.PENDING,
    due_at: at(due),
    created_at: at(due),
    updated_at: at(due),
    originated_externally: false,
    is_pattern: false,
    parent_pattern_id: 1,
    reminder_sent: false,
  };
}

describe('nextDue', () => {
  test('daily adds the interval in days', () => {
    expect(nextDue(pattern(RecurrenceKind.DAILY, '2025-03-10T09:00:00Z'), 'UTC')).toEqual(
      at('2025-03-11T09:00:00Z')
    );
    expect(
      nextDue(pattern(RecurrenceKind.DAILY, '2025-03-10T09:00:00Z', { interval: 3 }), 'UTC')
    ).toEqual(at('2025-03-13T09:00:00Z'));
  });

  test('interval adds the interval in days', () => {
    expect(
      nextDue(pattern(RecurrenceKind.INTERVAL, '2025-03-10T09:00:00Z', { interval: 4 }), 'UTC')
    ).toEqual(at('2025-03-14T09:00:00Z'));
  });

  test('weekly adds the interval in weeks', () => {
    expect(
      nextDue(pattern(RecurrenceKind.WEEKLY, '2025-03-10T09:00:00Z', { interval: 2 }), 'UTC')
    ).toEqual(at('2025-03-24T09:00:00Z'));
  });

  test('specific days wrap around the week', () => {
    const p = pattern(RecurrenceKind.SPECIFIC_DAYS, '2025-03-14T09:00:00Z', {
      days_of_week: new Set([Weekday.MONDAY, Weekday.WEDNESDAY, Weekday.FRIDAY]),
    });
    // Friday -> Monday
    expect(nextDue(p, 'UTC')).toEqual(at('2025-03-17T09:00:00Z'));
  });

  test('specific days with a single weekday land one week later', () => {
    const p = pattern(RecurrenceKind.SPECIFIC_DAYS, '2025-03-12T07:15:00Z', {
      days_of_week: new Set([Weekday.WEDNESDAY]),
    });
    expect(nextDue(p, 'UTC')).toEqual(at('2025-03-19T07:15:00Z'));
  });

  test('specific days with no weekdays has no next occurrence', () => {
    expect(nextDue(pattern(RecurrenceKind.SPECIFIC_DAYS, '2025-03-14T09:00:00Z'), 'UTC')).toBeNull();
  });

  test('monthly clamps to the last day of a short month and recovers after', () => {
    const jan = pattern(RecurrenceKind.MONTHLY, '2025-01-31T10:00:00Z', { day_of_month: 31 });
    const feb = nextDue(jan, 'UTC');
    expect(feb).toEqual(at('2025-02-28T10:00:00Z'));

    const march = nextDue(pattern(RecurrenceKind.MONTHLY, '2025-02-28T10:00:00Z', { day_of_month: 31 }), 'UTC');
    expect(march).toEqual(at('2025-03-31T10:00:00Z'));
  });

  test('monthly uses February 29 in a leap year', () => {
    const p = pattern(RecurrenceKind.MONTHLY, '2024-01-31T10:00:00Z', { day_of_month: 30 });
    expect(nextDue(p, 'UTC')).toEqual(at('2024-02-29T10:00:00Z'));
  });

  test('monthly without a day of month has no next occurrence', () => {
    expect(nextDue(pattern(RecurrenceKind.MONTHLY, '2025-01-31T10:00:00Z'), 'UTC')).toBeNull();
  });

  test('pattern without a due date has no next occurrence', () => {
    expect(nextDue(pattern(RecurrenceKind.DAILY, undefined), 'UTC')).toBeNull();
  });

  test('keeps local wall time across a DST change', () => {
    // 09:00 EST the day before clocks move forward
    const p = pattern(RecurrenceKind.DAILY, '2025-03-08T14:00:00Z');
    expect(nextDue(p, 'America/New_York')).toEqual(at('2025-03-09T13:00:00Z'));
  });
});

describe('normalizeDaysOfWeek', () => {
  const monday = at('2025-03-10T09:00:00Z');

  test('daily and interval cover the whole week', () => {
    expect(normalizeDaysOfWeek(RecurrenceKind.DAILY, monday, 'UTC').size).toBe(7);
    expect(normalizeDaysOfWeek(RecurrenceKind.INTERVAL, monday, 'UTC', [Weekday.FRIDAY]).size).toBe(7);
  });

  test('weekly defaults to the weekday of the due date', () => {
    expect([...normalizeDaysOfWeek(RecurrenceKind.WEEKLY, monday, 'UTC')]).toEqual([Weekday.MONDAY]);
    expect([...normalizeDaysOfWeek(RecurrenceKind.WEEKLY, monday, 'UTC', [Weekday.THURSDAY])]).toEqual([
      Weekday.THURSDAY,
    ]);
  });

  test('weekday follows the configured zone', () => {
    // 02:00 UTC Monday is still Sunday evening in New York
    const early = at('2025-03-10T02:00:00Z');
    expect([...normalizeDaysOfWeek(RecurrenceKind.WEEKLY, early, 'America/New_York')]).toEqual([
      Weekday.SUNDAY,
    ]);
  });

  test('specific days keep the given set and monthly keeps none', () => {
    const days = normalizeDaysOfWeek(RecurrenceKind.SPECIFIC_DAYS, monday, 'UTC', [
      Weekday.TUESDAY,
      Weekday.TUESDAY,
      Weekday.SATURDAY,
    ]);
    expect([...days]).toEqual([Weekday.TUESDAY, Weekday.SATURDAY]);
    expect(normalizeDaysOfWeek(RecurrenceKind.MONTHLY, monday, 'UTC', [Weekday.TUESDAY]).size).toBe(0);
  });
});

describe('validateRecurrence', () => {
  const base = {
    owner_id: 'owner-1',
    description: 'Pay rent',
    due_at: at('2025-03-01T09:00:00Z'),
  };

  test('accepts a valid monthly descriptor', () => {
    expect(() => validateRecurrence({ ...base, kind: RecurrenceKind.MONTHLY, day_of_month: 1 })).not.toThrow();
  });

  test('rejects a day of month out of range', () => {
    expect(() => validateRecurrence({ ...base, kind: RecurrenceKind.MONTHLY, day_of_month: 32 })).toThrow(
      ValidationError
    );
  });

  test('rejects monthly without a day of month', () => {
    expect(() => validateRecurrence({ ...base, kind: RecurrenceKind.MONTHLY })).toThrow(
      'Monthly patterns need a day of month between 1 and 31'
    );
  });

  test('rejects specific days without weekdays', () => {
    expect(() => validateRecurrence({ ...base, kind: RecurrenceKind.SPECIFIC_DAYS, days_of_week: [] })).toThrow(
      'Specific-days patterns need at least one weekday'
    );
  });

  test('rejects a non-positive interval', () => {
    expect(() => validateRecurrence({ ...base, kind: RecurrenceKind.INTERVAL, interval: 0 })).toThrow(
      'Interval must be a positive integer, got 0'
    );
  });

  test('rejects an end date before the first occurrence', () => {
    expect(() =>
      validateRecurrence({ ...base, kind: RecurrenceKind.DAILY, end_at: at('2025-02-01T00:00:00Z') })
    ).toThrow('End date is before the first due date');
  });

  test('rejects an empty description', () => {
    expect(() => validateRecurrence({ ...base, description: '  ', kind: RecurrenceKind.DAILY })).toThrow(
      'Description must not be empty'
    );
  });
});

describe('shouldGenerateToday', () => {
  test('monthly fires on its day of month', () => {
    const p = pattern(RecurrenceKind.MONTHLY, '2025-04-15T10:00:00Z', { day_of_month: 15 });
    expect(shouldGenerateToday(p, at('2025-04-15T00:00:05Z'), 'UTC', null)).toBe(true);
    expect(shouldGenerateToday(p, at('2025-04-16T00:00:05Z'), 'UTC', null)).toBe(false);
  });

  test('monthly on day 31 fires on the last day of a 30-day month', () => {
    const p = pattern(RecurrenceKind.MONTHLY, '2025-04-30T10:00:00Z', { day_of_month: 31 });
    expect(shouldGenerateToday(p, at('2025-04-30T00:00:05Z'), 'UTC', null)).toBe(true);
    expect(shouldGenerateToday(p, at('2025-04-29T00:00:05Z'), 'UTC', null)).toBe(false);
  });

  test('specific days fire only on listed weekdays', () => {
    const p = pattern(RecurrenceKind.SPECIFIC_DAYS, '2025-03-10T09:00:00Z', {
      days_of_week: new Set([Weekday.MONDAY]),
    });
    expect(shouldGenerateToday(p, at('2025-03-10T00:00:05Z'), 'UTC', null)).toBe(true);
    expect(shouldGenerateToday(p, at('2025-03-11T00:00:05Z'), 'UTC', null)).toBe(false);
  });

  test('interval without prior instances counts days from the anchor', () => {
    const p = pattern(RecurrenceKind.INTERVAL, '2025-03-10T09:00:00Z', {
      interval: 3,
      days_of_week: normalizeDaysOfWeek(RecurrenceKind.INTERVAL, at('2025-03-10T09:00:00Z'), 'UTC'),
      anchor_at: at('2025-03-10T09:00:00Z'),
    });
    expect(shouldGenerateToday(p, at('2025-03-12T00:00:05Z'), 'UTC', null)).toBe(false);
    expect(shouldGenerateToday(p, at('2025-03-13T00:00:05Z'), 'UTC', null)).toBe(true);
    expect(shouldGenerateToday(p, at('2025-03-09T00:00:05Z'), 'UTC', null)).toBe(false);
  });

  test('interval with a prior instance waits for the gap', () => {
    const p = pattern(RecurrenceKind.INTERVAL, '2025-03-14T09:00:00Z', {
      interval: 3,
      anchor_at: at('2025-03-10T09:00:00Z'),
    });
    const last = instance('2025-03-11T09:00:00Z');
    expect(shouldGenerateToday(p, at('2025-03-13T00:00:05Z'), 'UTC', last)).toBe(false);
    expect(shouldGenerateToday(p, at('2025-03-14T00:00:05Z'), 'UTC', last)).toBe(true);
  });

  test('nothing fires before the first due date', () => {
    const weekly = pattern(RecurrenceKind.SPECIFIC_DAYS, '2025-03-20T09:00:00Z', {
      days_of_week: new Set([Weekday.THURSDAY]),
      anchor_at: at('2025-03-20T09:00:00Z'),
    });
    expect(shouldGenerateToday(weekly, at('2025-03-13T00:00:05Z'), 'UTC', null)).toBe(false);
    expect(shouldGenerateToday(weekly, at('2025-03-20T00:00:05Z'), 'UTC', null)).toBe(true);

    const monthly = pattern(RecurrenceKind.MONTHLY, '2025-05-15T10:00:00Z', { day_of_month: 15 });
    expect(shouldGenerateToday(monthly, at('2025-04-15T00:00:05Z'), 'UTC', null)).toBe(false);
  });

  test('weekly with interval 2 skips the week in between', () => {
    const p = pattern(RecurrenceKind.WEEKLY, '2025-03-10T09:00:00Z', {
      interval: 2,
      days_of_week: new Set([Weekday.MONDAY]),
      anchor_at: at('2025-03-10T09:00:00Z'),
    });
    expect(shouldGenerateToday(p, at('2025-03-17T00:00:05Z'), 'UTC', null)).toBe(false);
    expect(shouldGenerateToday(p, at('2025-03-24T00:00:05Z'), 'UTC', null)).toBe(true);
  });
});

describe('local day helpers', () => {
  test('localDayWindow spans the owner-local day', () => {
    const window = localDayWindow(at('2025-06-15T03:00:00Z'), 'America/New_York');
    expect(window.start).toEqual(at('2025-06-14T04:00:00Z'));
    expect(window.end).toEqual(at('2025-06-15T04:00:00Z'));
  });

  test('rebaseToDay keeps the time of day', () => {
    expect(rebaseToDay(at('2025-03-10T09:30:00Z'), at('2025-03-20T00:00:05Z'), 'UTC')).toEqual(
      at('2025-03-20T09:30:00Z')
    );
  });
});
