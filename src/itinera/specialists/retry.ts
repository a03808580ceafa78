export type RetryPolicy = {
  /** Retries after the first attempt */
  maxRetries: number;
  initialDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  initialDelayMs: 500,
  backoffFactor: 2,
  maxDelayMs: 5000
};

export type RetryVerdict = {
  retryable: boolean;
  /** Server-requested minimum wait */
  retryAfterMs?: number | undefined;
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export type RetryOptions = {
  policy: RetryPolicy;
  classify: (error: unknown) => RetryVerdict;
  signal?: AbortSignal | undefined;
  sleep?: Sleep;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
};

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects.
 */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });

/**
 * Delay before retry number `retry` (1-based).
 */
export function backoffDelay(policy: RetryPolicy, retry: number, retryAfterMs?: number): number {
  const exponential = policy.initialDelayMs * policy.backoffFactor ** (retry - 1);
  const capped = Math.min(exponential, policy.maxDelayMs);
  return retryAfterMs === undefined ? capped : Math.max(capped, retryAfterMs);
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error, runs out
 * of retries, or `signal` aborts. Failures are returned, not thrown.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const sleep = options.sleep ?? abortableSleep;
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      const verdict = options.classify(error);
      if (!verdict.retryable || attempt > options.policy.maxRetries || options.signal?.aborted) {
        return { ok: false, error, attempts: attempt };
      }
      const delayMs = backoffDelay(options.policy, attempt, verdict.retryAfterMs);
      options.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs, options.signal);
      if (options.signal?.aborted) {
        return { ok: false, error, attempts: attempt };
      }
    }
  }
}
