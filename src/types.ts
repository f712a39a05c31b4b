// ===== ENUMS =====

export enum TaskStatus {
  PENDING = 'pending',
  IN_PROGRESS = 'in_progress',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
}

export enum RecurrenceKind {
  DAILY = 'daily',
  WEEKLY = 'weekly',
  SPECIFIC_DAYS = 'specific_days',
  INTERVAL = 'interval',
  MONTHLY = 'monthly',
}

export enum Weekday {
  MONDAY = 'monday',
  TUESDAY = 'tuesday',
  WEDNESDAY = 'wednesday',
  THURSDAY = 'thursday',
  FRIDAY = 'friday',
  SATURDAY = 'saturday',
  SUNDAY = 'sunday',
}

/** Weekdays in ISO order; index + 1 is the ISO weekday number (luxon's `weekday`). */
export const WEEKDAYS: readonly Weekday[] = [
  Weekday.MONDAY,
  Weekday.TUESDAY,
  Weekday.WEDNESDAY,
  Weekday.THURSDAY,
  Weekday.FRIDAY,
  Weekday.SATURDAY,
  Weekday.SUNDAY,
];

export const DEFAULT_MAX_INSTANCES = 100;

// ===== INTERFACES =====

export interface Recurrence {
  kind: RecurrenceKind;
  interval: number;
  days_of_week: ReadonlySet<Weekday>;
  day_of_month?: number; // 1-31, monthly only
  end_at?: Date;
  instance_count: number;
  generated_count: number; // every instance ever generated; supersession does not lower it
  max_instances: number;
  anchor_at?: Date; // first due_at of the series
}

export interface CalendarLink {
  external_event_id?: string;
  external_event_updated_at?: Date;
  local_modified_at?: Date;
  originated_externally: boolean;
}

interface TaskBase extends CalendarLink {
  id: number;
  owner_id: string;
  description: string;
  status: TaskStatus;
  due_at?: Date;
  created_at: Date;
  updated_at: Date;
}

/** Recurrence definition. `due_at` is the next occurrence still to be materialized. */
export interface Pattern extends TaskBase {
  is_pattern: true;
  recurrence: Recurrence;
}

/** A concrete to-do: an occurrence of a pattern, a one-off task, or a task created from a calendar event. */
export interface Instance extends TaskBase {
  is_pattern: false;
  parent_pattern_id?: number;
  completed_at?: Date;
  reminder_sent: boolean;
}

export type Task = Pattern | Instance;

export interface CalendarAccount {
  owner_id: string;
  enabled: boolean;
  calendar_id: string;
  marker_color?: string;
  marker_hashtag: boolean;
  last_sync_at?: Date;
}

export interface SeriesResult {
  ok: boolean;
  message: string;
}

export type TaskResult = SeriesResult;

// ===== INPUT TYPES =====

export interface CreatePatternInput {
  owner_id: string;
  description: string;
  due_at: Date;
  kind: RecurrenceKind;
  interval?: number;
  days_of_week?: Iterable<Weekday>;
  day_of_month?: number;
  end_at?: Date;
  max_instances?: number;
}

export interface CreateTaskInput {
  owner_id: string;
  description: string;
  due_at?: Date;
  status?: TaskStatus;
  parent_pattern_id?: number;
  completed_at?: Date;
  external_event_id?: string;
  external_event_updated_at?: Date;
  local_modified_at?: Date;
  originated_externally?: boolean;
}

export interface UpdateTaskInput {
  description?: string;
  due_at?: Date | null;
  status?: TaskStatus;
  completed_at?: Date | null;
  reminder_sent?: boolean;
  external_event_id?: string | null;
  external_event_updated_at?: Date | null;
  local_modified_at?: Date;
}

export interface UpdatePatternInput {
  status?: TaskStatus;
  due_at?: Date;
  instance_count?: number;
}

export interface TaskFilter {
  owner_id?: string;
  status?: TaskStatus | TaskStatus[];
  is_pattern?: boolean;
  parent_pattern_id?: number;
  has_due_date?: boolean;
  due_before?: Date;
  due_from?: Date;
  originated_externally?: boolean;
  has_external_event?: boolean;
}

export interface UpsertAccountInput {
  owner_id: string;
  enabled?: boolean;
  calendar_id?: string;
  marker_color?: string | null;
  marker_hashtag?: boolean;
}

/** Everything needed to commit one generated occurrence atomically. */
export interface GeneratedInstanceInput {
  pattern: Pattern;
  due_at: Date;
  next_due_at: Date;
  now: Date;
}

export interface GeneratedInstanceResult {
  instance: Instance;
  superseded: number;
}

export interface TaskStats {
  total: number;
  pending: number;
  completed: number;
  due_today: number;
  overdue: number;
  completion_rate: number; // percent, one decimal
}

// ===== DATABASE ROW TYPES =====

export interface TaskRow {
  id: number;
  owner_id: string;
  description: string;
  status: string;
  due_at: string | null; // ISO 8601
  is_pattern: number; // 0 | 1
  parent_pattern_id: number | null;
  recurrence_kind: string | null;
  recurrence_interval: number | null;
  days_of_week: string | null; // JSON array of weekday tags
  day_of_month: number | null;
  end_at: string | null; // ISO 8601
  instance_count: number;
  generated_count: number;
  max_instances: number;
  anchor_at: string | null; // ISO 8601
  completed_at: string | null; // ISO 8601
  reminder_sent: number; // 0 | 1
  external_event_id: string | null;
  external_event_updated_at: string | null; // ISO 8601
  local_modified_at: string | null; // ISO 8601
  originated_externally: number; // 0 | 1
  created_at: string; // ISO 8601
  updated_at: string; // ISO 8601
}

export interface AccountRow {
  owner_id: string;
  enabled: number; // 0 | 1
  calendar_id: string;
  marker_color: string | null;
  marker_hashtag: number; // 0 | 1
  last_sync_at: string | null; // ISO 8601
}

export interface JobRow {
  id: string;
  next_run_at: string | null; // ISO 8601
  last_run_at: string | null; // ISO 8601
  last_status: string | null;
  last_error: string | null;
}
