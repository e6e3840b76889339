import {
  retry,
  handleWhen,
  timeout,
  ExponentialBackoff,
  TimeoutStrategy,
  TaskCancelledError,
  type RetryPolicy,
} from 'cockatiel';
import Bottleneck from 'bottleneck';

/**
 * Runs `fn` under an aggressive timeout. The signal handed to `fn` aborts when the
 * budget runs out or when `outer` aborts; either way the promise rejects with a
 * cockatiel TaskCancelledError.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  outer?: AbortSignal,
): Promise<T> {
  const policy = timeout(timeoutMs, TimeoutStrategy.Aggressive);
  return policy.execute(({ signal }) => fn(signal), outer);
}

export function isTimeoutError(error: unknown): boolean {
  return error instanceof TaskCancelledError;
}

/**
 * Retry policy for vendor clients. `maxAttempts` counts the first call, so 1 means
 * no retry at all and the policy is skipped.
 */
export function createRetry(
  maxAttempts: number,
  shouldRetry: (error: Error) => boolean,
): RetryPolicy | undefined {
  const retries = Math.max(0, Math.floor(maxAttempts) - 1);
  if (retries === 0) return undefined;
  return retry(handleWhen(shouldRetry), {
    maxAttempts: retries,
    backoff: new ExponentialBackoff({ initialDelay: 200, maxDelay: 2000 }),
  });
}

export function createLimiter(opts: { minTime: number; maxConcurrent: number }): Bottleneck {
  return new Bottleneck({ minTime: opts.minTime, maxConcurrent: opts.maxConcurrent });
}

/**
 * One FIFO lane per key with a single slot each: work for the same key runs in
 * arrival order, work for different keys runs in parallel.
 */
export class KeyedSerialQueue {
  private readonly group = new Bottleneck.Group({ maxConcurrent: 1 });

  run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.group.key(key).schedule(fn);
  }

  async close(): Promise<void> {
    await Promise.all(this.group.limiters().map(({ limiter }) => limiter.stop({ dropWaitingJobs: false })));
  }
}
