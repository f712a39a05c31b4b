import { TransientExternalError } from './errors';

export interface RetryPolicy {
  /** Total attempts including the first (default: 3). */
  attempts: number;
  /** Delay before the first retry in ms (default: 200). */
  backoffMs: number;
  /** Upper bound for a single delay in ms (default: 5000). */
  maxBackoffMs: number;
  /** Per-attempt timeout in ms (default: 10000). */
  timeoutMs: number;
}

export const DEFAULT_RETRY: RetryPolicy = {
  attempts: 3,
  backoffMs: 200,
  maxBackoffMs: 5_000,
  timeoutMs: 10_000,
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before retry number `attempt` (zero-based), doubling each time and
 * capped at `maxBackoffMs`.
 */
export function computeBackoff(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.backoffMs * 2 ** attempt, policy.maxBackoffMs);
}

export function resolvePolicy(partial: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    attempts: partial.attempts ?? DEFAULT_RETRY.attempts,
    backoffMs: partial.backoffMs ?? DEFAULT_RETRY.backoffMs,
    maxBackoffMs: partial.maxBackoffMs ?? DEFAULT_RETRY.maxBackoffMs,
    timeoutMs: partial.timeoutMs ?? DEFAULT_RETRY.timeoutMs,
  };
}

/** Longest a `withRetry` call can take: every attempt timing out plus every backoff in between. */
export function retryBudgetMs(policy: RetryPolicy): number {
  let total = policy.attempts * policy.timeoutMs;
  for (let attempt = 0; attempt < policy.attempts - 1; attempt++) {
    total += computeBackoff(policy, attempt);
  }
  return total;
}

/** Rejects with TransientExternalError when `promise` does not settle within `ms`. */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label = 'operation'): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TransientExternalError(`${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs `fn` with a timeout per attempt. Only TransientExternalError is retried;
 * anything else propagates on the first failure.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: Partial<RetryPolicy> & { label?: string; sleep?: Sleep } = {}
): Promise<T> {
  const policy = resolvePolicy(opts);
  const wait = opts.sleep ?? sleep;
  const label = opts.label ?? 'operation';

  let attempt = 0;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      return await withTimeout(fn(), policy.timeoutMs, label);
    } catch (err) {
      attempt++;
      if (!(err instanceof TransientExternalError) || attempt >= policy.attempts) {
        throw err;
      }
      await wait(computeBackoff(policy, attempt - 1));
    }
  }
}
