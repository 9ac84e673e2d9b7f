import { SubsystemUnavailableError, TimeoutError } from '../errors/originality.errors';

export interface RetryPolicy {
  subsystem: string;
  timeoutMs: number;
  retries: number;
  backoffMs: number;
  onRetry?: (attempt: number, error: unknown) => void;
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withTimeout<T>(
  task: () => Promise<T>,
  timeoutMs: number,
  subsystem: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(subsystem, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([task(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof SubsystemUnavailableError) return error.retryable;
  return true;
}

/**
 * Runs `task` under a per-call timeout. Retryable failures are retried up to
 * `policy.retries` times, waiting `backoffMs * 2^attempt` between attempts.
 */
export async function withRetry<T>(task: () => Promise<T>, policy: RetryPolicy): Promise<T> {
  let attempt = 0;
  for (;;) {
    try {
      return await withTimeout(task, policy.timeoutMs, policy.subsystem);
    } catch (err) {
      if (attempt >= policy.retries || !isRetryable(err)) {
        throw err;
      }
      policy.onRetry?.(attempt + 1, err);
      await sleep(policy.backoffMs * 2 ** attempt);
      attempt += 1;
    }
  }
}
