import { randomUUID } from 'node:crypto';
import { Database } from './database';
import { Clock, systemClock } from './clock';
import { LockContention } from './errors';

export interface Lock {
  /** True when this caller now holds `key` for at most `ttlMs`. */
  acquire(key: string, ttlMs: number): Promise<boolean>;
  release(key: string): Promise<void>;
}

/**
 * Lock rows live in the shared database, so every worker process opened on the
 * same file competes for the same keys. Expired rows are taken over.
 */
export class SqliteLock implements Lock {
  private readonly holder: string;

  constructor(
    private db: Database,
    private clock: Clock = systemClock,
    holder?: string
  ) {
    this.holder = holder ?? `${process.pid}:${randomUUID()}`;
  }

  async acquire(key: string, ttlMs: number): Promise<boolean> {
    return this.db.tryAcquireLock(key, this.holder, this.clock.now(), ttlMs);
  }

  async release(key: string): Promise<void> {
    await this.db.releaseLock(key, this.holder);
  }
}

/** Runs `fn` while holding `key`; throws LockContention when someone else has it. */
export async function withLock<T>(lock: Lock, key: string, ttlMs: number, fn: () => Promise<T>): Promise<T> {
  if (!(await lock.acquire(key, ttlMs))) {
    throw new LockContention(key);
  }
  try {
    return await fn();
  } finally {
    await lock.release(key);
  }
}
