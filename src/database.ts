import BetterSqlite3, { Database as SqliteDatabase } from 'better-sqlite3';
import {
  Task,
  TaskRow,
  Pattern,
  Instance,
  Recurrence,
  RecurrenceKind,
  TaskStatus,
  Weekday,
  WEEKDAYS,
  CalendarAccount,
  AccountRow,
  JobRow,
  CreateTaskInput,
  UpdateTaskInput,
  UpdatePatternInput,
  TaskFilter,
  UpsertAccountInput,
  GeneratedInstanceInput,
  GeneratedInstanceResult,
} from './types';
import { ConstraintViolation } from './errors';

const SCHEMA = `
-- Enable foreign keys
PRAGMA foreign_keys = ON;

-- ===== TASKS (patterns and instances) =====
CREATE TABLE IF NOT EXISTS tasks (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  owner_id TEXT NOT NULL,
  description TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'pending' CHECK(status IN ('pending', 'in_progress', 'completed', 'cancelled')),
  due_at TEXT,
  is_pattern INTEGER NOT NULL DEFAULT 0 CHECK(is_pattern IN (0, 1)),
  parent_pattern_id INTEGER REFERENCES tasks(id) ON DELETE SET NULL,
  recurrence_kind TEXT CHECK(recurrence_kind IN ('daily', 'weekly', 'specific_days', 'interval', 'monthly')),
  recurrence_interval INTEGER,
  days_of_week TEXT,
  day_of_month INTEGER CHECK(day_of_month BETWEEN 1 AND 31),
  end_at TEXT,
  instance_count INTEGER NOT NULL DEFAULT 0,
  generated_count INTEGER NOT NULL DEFAULT 0,
  max_instances INTEGER NOT NULL DEFAULT 100,
  anchor_at TEXT,
  completed_at TEXT,
  reminder_sent INTEGER NOT NULL DEFAULT 0,
  external_event_id TEXT,
  external_event_updated_at TEXT,
  local_modified_at TEXT,
  originated_externally INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  CHECK(is_pattern = 0 OR parent_pattern_id IS NULL),
  CHECK(is_pattern = 1 OR recurrence_kind IS NULL)
);

-- One instance per occurrence
CREATE UNIQUE INDEX IF NOT EXISTS uq_tasks_parent_due ON tasks(parent_pattern_id, due_at);

CREATE INDEX IF NOT EXISTS idx_tasks_owner_status ON tasks(owner_id, status);
CREATE INDEX IF NOT EXISTS idx_tasks_status_due ON tasks(status, due_at);
CREATE INDEX IF NOT EXISTS idx_tasks_is_pattern ON tasks(is_pattern);
CREATE INDEX IF NOT EXISTS idx_tasks_external_event ON tasks(owner_id, external_event_id);

-- ===== CALENDAR ACCOUNTS =====
CREATE TABLE IF NOT EXISTS calendar_accounts (
  owner_id TEXT PRIMARY KEY,
  enabled INTEGER NOT NULL DEFAULT 1,
  calendar_id TEXT NOT NULL DEFAULT 'primary',
  marker_color TEXT,
  marker_hashtag INTEGER NOT NULL DEFAULT 1,
  last_sync_at TEXT
);

-- ===== SCHEDULER JOB REGISTRY =====
CREATE TABLE IF NOT EXISTS scheduler_jobs (
  id TEXT PRIMARY KEY,
  next_run_at TEXT,
  last_run_at TEXT,
  last_status TEXT CHECK(last_status IN ('ok', 'failed', 'skipped')),
  last_error TEXT
);

-- ===== LOCKS =====
CREATE TABLE IF NOT EXISTS locks (
  key TEXT PRIMARY KEY,
  holder TEXT NOT NULL,
  expires_at TEXT NOT NULL
);
`;

const TASK_STATUSES = new Set<string>(Object.values(TaskStatus));
const RECURRENCE_KINDS = new Set<string>(Object.values(RecurrenceKind));
const WEEKDAY_TAGS = new Set<string>(WEEKDAYS);

function iso(date: Date | undefined | null): string | null {
  return date ? date.toISOString() : null;
}

function toDate(value: string | null): Date | undefined {
  return value ? new Date(value) : undefined;
}

function isWeekday(value: unknown): value is Weekday {
  return typeof value === 'string' && WEEKDAY_TAGS.has(value);
}

function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.has(value);
}

function isRecurrenceKind(value: string | null): value is RecurrenceKind {
  return value !== null && RECURRENCE_KINDS.has(value);
}

function parseStatus(value: string): TaskStatus {
  if (!isTaskStatus(value)) {
    throw new Error(`Unknown task status "${value}"`);
  }
  return value;
}

/** Unparsable or missing weekday lists become an empty set. */
function parseDaysOfWeek(value: string | null): Set<Weekday> {
  if (!value) return new Set();
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? new Set(parsed.filter(isWeekday)) : new Set();
  } catch {
    return new Set();
  }
}

function serializeDaysOfWeek(days: ReadonlySet<Weekday>): string {
  return JSON.stringify(WEEKDAYS.filter((d) => days.has(d)));
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

export class Database {
  private db: SqliteDatabase;
  private path: string;

  constructor(path: string) {
    this.path = path;
    this.db = new BetterSqlite3(path);
  }

  async init(): Promise<void> {
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA);
  }

  async close(): Promise<void> {
    this.db.close();
  }

  // ===== TASK OPERATIONS =====

  async insertTask(input: CreateTaskInput): Promise<number> {
    const now = new Date().toISOString();
    const stmt = this.db.prepare(`
      INSERT INTO tasks (
        owner_id, description, status, due_at, is_pattern, parent_pattern_id,
        completed_at, external_event_id, external_event_updated_at,
        local_modified_at, originated_externally, created_at, updated_at
      ) VALUES (?, ?, ?, ?, 0, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const result = stmt.run(
      input.owner_id,
      input.description,
      input.status ?? TaskStatus.PENDING,
      iso(input.due_at),
      input.parent_pattern_id ?? null,
      iso(input.completed_at),
      input.external_event_id ?? null,
      iso(input.external_event_updated_at),
      iso(input.local_modified_at) ?? now,
      input.originated_externally ? 1 : 0,
      now,
      now
    );

    return Number(result.lastInsertRowid);
  }

  async insertPattern(input: {
    owner_id: string;
    description: string;
    due_at: Date;
    recurrence: Recurrence;
  }): Promise<number> {
    const now = new Date().toISOString();
    const r = input.recurrence;
    const stmt = this.db.prepare(`
      INSERT INTO tasks (
        owner_id, description, status, due_at, is_pattern,
        recurrence_kind, recurrence_interval, days_of_week, day_of_month,
        end_at, instance_count, generated_count, max_instances, anchor_at,
        local_modified_at, created_at, updated_at
      ) VALUES (?, ?, ?, ?, 1, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const result = stmt.run(
      input.owner_id,
      input.description,
      TaskStatus.PENDING,
      input.due_at.toISOString(),
      r.kind,
      r.interval,
      serializeDaysOfWeek(r.days_of_week),
      r.day_of_month ?? null,
      iso(r.end_at),
      r.instance_count,
      r.generated_count,
      r.max_instances,
      iso(r.anchor_at ?? input.due_at),
      now,
      now,
      now
    );

    return Number(result.lastInsertRowid);
  }

  async getTask(id: number): Promise<Task | null> {
    const stmt = this.db.prepare('SELECT * FROM tasks WHERE id = ?');
    const row = stmt.get(id) as TaskRow | undefined;
    return row ? this.rowToTask(row) : null;
  }

  async getPattern(id: number): Promise<Pattern | null> {
    const task = await this.getTask(id);
    return task && task.is_pattern ? task : null;
  }

  async getInstance(id: number): Promise<Instance | null> {
    const task = await this.getTask(id);
    return task && !task.is_pattern ? task : null;
  }

  async getTasks(filter?: TaskFilter): Promise<Task[]> {
    let sql = 'SELECT * FROM tasks WHERE 1=1';
    const params: unknown[] = [];

    if (filter) {
      if (filter.owner_id !== undefined) {
        sql += ' AND owner_id = ?';
        params.push(filter.owner_id);
      }

      if (filter.status) {
        if (Array.isArray(filter.status)) {
          sql += ` AND status IN (${filter.status.map(() => '?').join(',')})`;
          params.push(...filter.status);
        } else {
          sql += ' AND status = ?';
          params.push(filter.status);
        }
      }

      if (filter.is_pattern !== undefined) {
        sql += ' AND is_pattern = ?';
        params.push(filter.is_pattern ? 1 : 0);
      }

      if (filter.parent_pattern_id !== undefined) {
        sql += ' AND parent_pattern_id = ?';
        params.push(filter.parent_pattern_id);
      }

      if (filter.has_due_date !== undefined) {
        sql += filter.has_due_date ? ' AND due_at IS NOT NULL' : ' AND due_at IS NULL';
      }

      if (filter.due_before) {
        sql += ' AND due_at < ?';
        params.push(filter.due_before.toISOString());
      }

      if (filter.due_from) {
        sql += ' AND due_at >= ?';
        params.push(filter.due_from.toISOString());
      }

      if (filter.originated_externally !== undefined) {
        sql += ' AND originated_externally = ?';
        params.push(filter.originated_externally ? 1 : 0);
      }

      if (filter.has_external_event !== undefined) {
        sql += filter.has_external_event
          ? ' AND external_event_id IS NOT NULL'
          : ' AND external_event_id IS NULL';
      }
    }

    sql += ' ORDER BY due_at IS NULL, due_at ASC, id ASC';

    const stmt = this.db.prepare(sql);
    const rows = stmt.all(...params) as TaskRow[];
    return rows.map((row) => this.rowToTask(row));
  }

  async getActivePatterns(): Promise<Pattern[]> {
    const tasks = await this.getTasks({ is_pattern: true, status: TaskStatus.PENDING });
    return tasks.filter((t): t is Pattern => t.is_pattern);
  }

  async updateTask(id: number, updates: UpdateTaskInput): Promise<void> {
    const fields: string[] = [];
    const params: unknown[] = [];

    if (updates.description !== undefined) {
      fields.push('description = ?');
      params.push(updates.description);
    }

    if (updates.due_at !== undefined) {
      fields.push('due_at = ?');
      params.push(iso(updates.due_at));
    }

    if (updates.status !== undefined) {
      fields.push('status = ?');
      params.push(updates.status);
    }

    if (updates.completed_at !== undefined) {
      fields.push('completed_at = ?');
      params.push(iso(updates.completed_at));
    }

    if (updates.reminder_sent !== undefined) {
      fields.push('reminder_sent = ?');
      params.push(updates.reminder_sent ? 1 : 0);
    }

    if (updates.external_event_id !== undefined) {
      fields.push('external_event_id = ?');
      params.push(updates.external_event_id);
    }

    if (updates.external_event_updated_at !== undefined) {
      fields.push('external_event_updated_at = ?');
      params.push(iso(updates.external_event_updated_at));
    }

    if (updates.local_modified_at !== undefined) {
      fields.push('local_modified_at = ?');
      params.push(updates.local_modified_at.toISOString());
    }

    if (fields.length === 0) {
      return;
    }

    fields.push('updated_at = ?');
    params.push(new Date().toISOString());
    params.push(id);

    const sql = `UPDATE tasks SET ${fields.join(', ')} WHERE id = ?`;
    try {
      this.db.prepare(sql).run(...params);
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConstraintViolation(`Task ${id} collides with an existing occurrence`, { cause: err });
      }
      throw err;
    }
  }

  async updatePattern(id: number, updates: UpdatePatternInput): Promise<void> {
    const fields: string[] = [];
    const params: unknown[] = [];

    if (updates.status !== undefined) {
      fields.push('status = ?');
      params.push(updates.status);
    }

    if (updates.due_at !== undefined) {
      fields.push('due_at = ?');
      params.push(updates.due_at.toISOString());
    }

    if (updates.instance_count !== undefined) {
      fields.push('instance_count = ?');
      params.push(updates.instance_count);
    }

    if (fields.length === 0) {
      return;
    }

    fields.push('updated_at = ?');
    params.push(new Date().toISOString());
    params.push(id);

    this.db.prepare(`UPDATE tasks SET ${fields.join(', ')} WHERE id = ? AND is_pattern = 1`).run(...params);
  }

  async deleteTask(id: number): Promise<void> {
    this.db.prepare('DELETE FROM tasks WHERE id = ?').run(id);
  }

  /** Deletes pending instances of a pattern due at or after `dueFrom`. Returns how many went. */
  async deletePendingInstances(patternId: number, dueFrom?: Date): Promise<number> {
    let sql = 'DELETE FROM tasks WHERE parent_pattern_id = ? AND status = ?';
    const params: unknown[] = [patternId, TaskStatus.PENDING];
    if (dueFrom) {
      sql += ' AND due_at >= ?';
      params.push(dueFrom.toISOString());
    }
    return this.db.prepare(sql).run(...params).changes;
  }

  // ===== INSTANCE LOOKUPS =====

  async findInstanceBySlot(patternId: number, dueAt: Date): Promise<Instance | null> {
    const row = this.db
      .prepare('SELECT * FROM tasks WHERE parent_pattern_id = ? AND due_at = ?')
      .get(patternId, dueAt.toISOString()) as TaskRow | undefined;
    return row ? this.rowToInstance(row) : null;
  }

  async findInstanceInRange(patternId: number, from: Date, to: Date): Promise<Instance | null> {
    const row = this.db
      .prepare(
        `
      SELECT * FROM tasks
      WHERE parent_pattern_id = ? AND due_at >= ? AND due_at < ?
      ORDER BY due_at ASC
      LIMIT 1
    `
      )
      .get(patternId, from.toISOString(), to.toISOString()) as TaskRow | undefined;
    return row ? this.rowToInstance(row) : null;
  }

  async getLatestInstance(patternId: number): Promise<Instance | null> {
    const row = this.db
      .prepare(
        `
      SELECT * FROM tasks
      WHERE parent_pattern_id = ? AND due_at IS NOT NULL
      ORDER BY due_at DESC
      LIMIT 1
    `
      )
      .get(patternId) as TaskRow | undefined;
    return row ? this.rowToInstance(row) : null;
  }

  async findByExternalEventId(ownerId: string, eventId: string): Promise<Instance | null> {
    const row = this.db
      .prepare('SELECT * FROM tasks WHERE owner_id = ? AND external_event_id = ? AND is_pattern = 0 LIMIT 1')
      .get(ownerId, eventId) as TaskRow | undefined;
    return row ? this.rowToInstance(row) : null;
  }

  async getRecentlyCompletedLinked(ownerId: string, since: Date, limit: number): Promise<Instance[]> {
    const rows = this.db
      .prepare(
        `
      SELECT * FROM tasks
      WHERE owner_id = ?
        AND is_pattern = 0
        AND status = ?
        AND external_event_id IS NOT NULL
        AND completed_at IS NOT NULL
        AND completed_at >= ?
      ORDER BY completed_at DESC
      LIMIT ?
    `
      )
      .all(ownerId, TaskStatus.COMPLETED, since.toISOString(), limit) as TaskRow[];
    return rows.map((row) => this.rowToInstance(row));
  }

  async getDueForReminders(now: Date): Promise<Instance[]> {
    const rows = this.db
      .prepare(
        `
      SELECT * FROM tasks
      WHERE is_pattern = 0
        AND status = ?
        AND due_at IS NOT NULL
        AND due_at <= ?
        AND reminder_sent = 0
      ORDER BY due_at ASC
    `
      )
      .all(TaskStatus.PENDING, now.toISOString()) as TaskRow[];
    return rows.map((row) => this.rowToInstance(row));
  }

  /**
   * Supersede, insert and advance in one transaction. A concurrent writer that
   * already filled the slot surfaces as ConstraintViolation and nothing is kept.
   */
  async commitGeneratedInstance(input: GeneratedInstanceInput): Promise<GeneratedInstanceResult> {
    const { pattern, due_at, next_due_at, now } = input;
    const nowIso = now.toISOString();

    const run = this.db.transaction((): GeneratedInstanceResult => {
      const superseded = this.db
        .prepare(
          `
        DELETE FROM tasks
        WHERE parent_pattern_id = ? AND status = ? AND due_at < ?
      `
        )
        .run(pattern.id, TaskStatus.PENDING, due_at.toISOString()).changes;

      const inserted = this.db
        .prepare(
          `
        INSERT INTO tasks (
          owner_id, description, status, due_at, is_pattern, parent_pattern_id,
          local_modified_at, created_at, updated_at
        ) VALUES (?, ?, ?, ?, 0, ?, ?, ?, ?)
      `
        )
        .run(
          pattern.owner_id,
          pattern.description,
          TaskStatus.PENDING,
          due_at.toISOString(),
          pattern.id,
          nowIso,
          nowIso,
          nowIso
        );

      const instanceCount = Math.max(0, pattern.recurrence.instance_count - superseded) + 1;
      this.db
        .prepare(
          `
        UPDATE tasks
        SET instance_count = ?, generated_count = generated_count + 1, due_at = ?, updated_at = ?
        WHERE id = ?
      `
        )
        .run(instanceCount, next_due_at.toISOString(), nowIso, pattern.id);

      const row = this.db
        .prepare('SELECT * FROM tasks WHERE id = ?')
        .get(Number(inserted.lastInsertRowid)) as TaskRow;
      return { instance: this.rowToInstance(row), superseded };
    });

    try {
      return run();
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConstraintViolation(
          `Pattern ${pattern.id} already has an instance due ${due_at.toISOString()}`,
          { cause: err }
        );
      }
      throw err;
    }
  }

  // ===== CALENDAR ACCOUNT OPERATIONS =====

  async upsertAccount(input: UpsertAccountInput): Promise<CalendarAccount> {
    const existing = await this.getAccount(input.owner_id);
    const marker =
      input.marker_color === undefined ? existing?.marker_color ?? null : input.marker_color;

    this.db
      .prepare(
        `
      INSERT INTO calendar_accounts (owner_id, enabled, calendar_id, marker_color, marker_hashtag)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(owner_id) DO UPDATE SET
        enabled = excluded.enabled,
        calendar_id = excluded.calendar_id,
        marker_color = excluded.marker_color,
        marker_hashtag = excluded.marker_hashtag
    `
      )
      .run(
        input.owner_id,
        (input.enabled ?? existing?.enabled ?? true) ? 1 : 0,
        input.calendar_id ?? existing?.calendar_id ?? 'primary',
        marker,
        (input.marker_hashtag ?? existing?.marker_hashtag ?? true) ? 1 : 0
      );

    const account = await this.getAccount(input.owner_id);
    if (!account) {
      throw new Error(`Failed to save calendar account for ${input.owner_id}`);
    }
    return account;
  }

  async getAccount(ownerId: string): Promise<CalendarAccount | null> {
    const row = this.db
      .prepare('SELECT * FROM calendar_accounts WHERE owner_id = ?')
      .get(ownerId) as AccountRow | undefined;
    return row ? this.rowToAccount(row) : null;
  }

  async getEnabledAccounts(): Promise<CalendarAccount[]> {
    const rows = this.db
      .prepare('SELECT * FROM calendar_accounts WHERE enabled = 1 ORDER BY owner_id')
      .all() as AccountRow[];
    return rows.map((row) => this.rowToAccount(row));
  }

  async setAccountLastSync(ownerId: string, at: Date): Promise<void> {
    this.db
      .prepare('UPDATE calendar_accounts SET last_sync_at = ? WHERE owner_id = ?')
      .run(at.toISOString(), ownerId);
  }

  // ===== SCHEDULER JOB REGISTRY =====

  async getJob(id: string): Promise<JobRow | null> {
    const row = this.db.prepare('SELECT * FROM scheduler_jobs WHERE id = ?').get(id) as
      | JobRow
      | undefined;
    return row ?? null;
  }

  async getJobs(): Promise<JobRow[]> {
    return this.db.prepare('SELECT * FROM scheduler_jobs ORDER BY id').all() as JobRow[];
  }

  async saveJob(job: JobRow): Promise<void> {
    this.db
      .prepare(
        `
      INSERT INTO scheduler_jobs (id, next_run_at, last_run_at, last_status, last_error)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        next_run_at = excluded.next_run_at,
        last_run_at = excluded.last_run_at,
        last_status = excluded.last_status,
        last_error = excluded.last_error
    `
      )
      .run(job.id, job.next_run_at, job.last_run_at, job.last_status, job.last_error);
  }

  // ===== LOCKS =====

  /** Takes the lock when it is free or its previous holder's TTL has run out. */
  async tryAcquireLock(key: string, holder: string, now: Date, ttlMs: number): Promise<boolean> {
    const expiresAt = new Date(now.getTime() + ttlMs).toISOString();
    const result = this.db
      .prepare(
        `
      INSERT INTO locks (key, holder, expires_at) VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET holder = excluded.holder, expires_at = excluded.expires_at
      WHERE locks.expires_at <= ?
    `
      )
      .run(key, holder, expiresAt, now.toISOString());
    return result.changes > 0;
  }

  async releaseLock(key: string, holder: string): Promise<void> {
    this.db.prepare('DELETE FROM locks WHERE key = ? AND holder = ?').run(key, holder);
  }

  // ===== TRANSACTIONS =====

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ===== UTILITY METHODS =====

  getPath(): string {
    return this.path;
  }

  // ===== PRIVATE HELPERS =====

  private rowToTask(row: TaskRow): Task {
    return row.is_pattern ? this.rowToPattern(row) : this.rowToInstance(row);
  }

  private rowToPattern(row: TaskRow): Pattern {
    const kind = row.recurrence_kind;
    if (!isRecurrenceKind(kind)) {
      throw new Error(`Pattern ${row.id} has no valid recurrence kind`);
    }

    return {
      ...this.rowToBase(row),
      is_pattern: true,
      recurrence: {
        kind,
        interval: row.recurrence_interval ?? 1,
        days_of_week: parseDaysOfWeek(row.days_of_week),
        day_of_month: row.day_of_month ?? undefined,
        end_at: toDate(row.end_at),
        instance_count: row.instance_count,
        generated_count: row.generated_count,
        max_instances: row.max_instances,
        anchor_at: toDate(row.anchor_at),
      },
    };
  }

  private rowToInstance(row: TaskRow): Instance {
    return {
      ...this.rowToBase(row),
      is_pattern: false,
      parent_pattern_id: row.parent_pattern_id ?? undefined,
      completed_at: toDate(row.completed_at),
      reminder_sent: row.reminder_sent === 1,
    };
  }

  private rowToBase(row: TaskRow) {
    return {
      id: row.id,
      owner_id: row.owner_id,
      description: row.description,
      status: parseStatus(row.status),
      due_at: toDate(row.due_at),
      external_event_id: row.external_event_id ?? undefined,
      external_event_updated_at: toDate(row.external_event_updated_at),
      local_modified_at: toDate(row.local_modified_at),
      originated_externally: row.originated_externally === 1,
      created_at: new Date(row.created_at),
      updated_at: new Date(row.updated_at),
    };
  }

  private rowToAccount(row: AccountRow): CalendarAccount {
    return {
      owner_id: row.owner_id,
      enabled: row.enabled === 1,
      calendar_id: row.calendar_id,
      marker_color: row.marker_color ?? undefined,
      marker_hashtag: row.marker_hashtag === 1,
      last_sync_at: toDate(row.last_sync_at),
    };
  }
}
