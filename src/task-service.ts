import { Database } from './database';
import { Clock, systemClock } from './clock';
import { ValidationError } from './errors';
import { localDayWindow } from './recurrence';
import {
  Task,
  Instance,
  TaskStatus,
  CreateTaskInput,
  TaskFilter,
  TaskResult,
  TaskStats,
} from './types';

export interface TaskChanges {
  description?: string;
  due_at?: Date | null;
}

const TASK_NOT_FOUND: TaskResult = { ok: false, message: 'Task not found' };

export class TaskService {
  private clock: Clock;
  private zone: string;

  constructor(
    private db: Database,
    options: { clock?: Clock; zone?: string } = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.zone = options.zone ?? 'UTC';
  }

  // ===== CRUD =====

  async create(input: CreateTaskInput): Promise<Instance> {
    const description = input.description.trim();
    if (!description) {
      throw new ValidationError('Description must not be empty');
    }

    const id = await this.db.insertTask({
      ...input,
      description,
      local_modified_at: input.local_modified_at ?? this.clock.now(),
    });
    const task = await this.db.getInstance(id);
    if (!task) {
      throw new Error('Failed to create task');
    }
    return task;
  }

  async get(id: number): Promise<Task | null> {
    return this.db.getTask(id);
  }

  async list(filter?: TaskFilter): Promise<Task[]> {
    return this.db.getTasks(filter);
  }

  async update(id: number, ownerId: string, changes: TaskChanges): Promise<TaskResult> {
    const task = await this.findOwned(id, ownerId);
    if (!task) {
      return TASK_NOT_FOUND;
    }
    if (task.is_pattern) {
      return { ok: false, message: 'Recurring series cannot be edited directly' };
    }
    if (task.status === TaskStatus.COMPLETED) {
      return { ok: false, message: 'Completed tasks cannot be edited' };
    }

    const description = changes.description?.trim();
    if (changes.description !== undefined && !description) {
      return { ok: false, message: 'Description must not be empty' };
    }

    const dueChanged =
      changes.due_at !== undefined &&
      (changes.due_at?.getTime() ?? null) !== (task.due_at?.getTime() ?? null);

    await this.db.updateTask(id, {
      description,
      due_at: changes.due_at,
      reminder_sent: dueChanged ? false : undefined,
      local_modified_at: this.clock.now(),
    });
    return { ok: true, message: `Task updated: ${description ?? task.description}` };
  }

  async delete(id: number, ownerId: string): Promise<TaskResult> {
    const task = await this.findOwned(id, ownerId);
    if (!task) {
      return TASK_NOT_FOUND;
    }
    if (task.is_pattern) {
      return { ok: false, message: 'Use stopSeries to remove a recurring series' };
    }

    await this.db.deleteTask(id);
    return { ok: true, message: `Task deleted: ${task.description}` };
  }

  // ===== STATUS MANAGEMENT =====

  async complete(id: number, ownerId: string): Promise<TaskResult> {
    const task = await this.findOwned(id, ownerId);
    if (!task) {
      return TASK_NOT_FOUND;
    }
    if (task.is_pattern) {
      return { ok: false, message: 'Recurring series cannot be completed directly' };
    }
    if (task.status === TaskStatus.COMPLETED) {
      return { ok: false, message: 'Task is already completed' };
    }

    const now = this.clock.now();
    await this.db.updateTask(id, {
      status: TaskStatus.COMPLETED,
      completed_at: now,
      local_modified_at: now,
    });
    return { ok: true, message: `Task completed: ${task.description}` };
  }

  async cancel(id: number, ownerId: string): Promise<TaskResult> {
    const task = await this.findOwned(id, ownerId);
    if (!task) {
      return TASK_NOT_FOUND;
    }
    if (task.is_pattern) {
      return { ok: false, message: 'Use stopSeries to cancel a recurring series' };
    }
    if (task.status === TaskStatus.COMPLETED || task.status === TaskStatus.CANCELLED) {
      return { ok: false, message: `Task is already ${task.status}` };
    }

    await this.db.updateTask(id, {
      status: TaskStatus.CANCELLED,
      local_modified_at: this.clock.now(),
    });
    return { ok: true, message: `Task cancelled: ${task.description}` };
  }

  // ===== REMINDERS =====

  async getDueForReminders(now?: Date): Promise<Instance[]> {
    return this.db.getDueForReminders(now ?? this.clock.now());
  }

  async markReminderSent(id: number): Promise<void> {
    await this.db.updateTask(id, { reminder_sent: true });
  }

  // ===== STATS =====

  /** Counts over the owner's concrete tasks; patterns are not tasks to do. */
  async stats(ownerId: string, now?: Date): Promise<TaskStats> {
    const at = now ?? this.clock.now();
    const today = localDayWindow(at, this.zone);
    const tasks = await this.db.getTasks({ owner_id: ownerId, is_pattern: false });

    let pending = 0;
    let completed = 0;
    let dueToday = 0;
    let overdue = 0;

    for (const task of tasks) {
      if (task.status === TaskStatus.COMPLETED) {
        completed++;
        continue;
      }
      if (task.status !== TaskStatus.PENDING) {
        continue;
      }
      pending++;
      if (!task.due_at) {
        continue;
      }
      const due = task.due_at.getTime();
      if (due >= today.start.getTime() && due < today.end.getTime()) {
        dueToday++;
      }
      if (due < at.getTime()) {
        overdue++;
      }
    }

    const total = tasks.length;
    return {
      total,
      pending,
      completed,
      due_today: dueToday,
      overdue,
      completion_rate: total > 0 ? Math.round((completed / total) * 1000) / 10 : 0,
    };
  }

  // ===== HELPERS =====

  private async findOwned(id: number, ownerId: string): Promise<Task | null> {
    const task = await this.db.getTask(id);
    return task && task.owner_id === ownerId ? task : null;
  }
}
