/**
 * Retries with exponential backoff
 *
 * Only the caller knows which failures are worth another attempt, so the
 * predicate is passed in; transient fetch failures are the main user.
 */

export type RetryConfig = {
  /** Total attempts including the first (default: 1, i.e. no retries). */
  attempts?: number;
  /** Delay before the first retry, doubled for every further one (default: 200ms). */
  baseDelayMs?: number;
  /** Max backoff delay (default: 5000ms). */
  maxDelayMs?: number;
  /** Random jitter factor between 0 and 1 (default: 0.2). */
  jitter?: number;
};

export type RetryContext = {
  /** 1-based number of the attempt about to run */
  attempt: number;
  attempts: number;
  /** Pause before this attempt */
  delayMs: number;
};

export type RetryHooks = {
  /** Called after a retryable failure, before the pause and the next attempt */
  onRetry?: (err: unknown, next: RetryContext) => void;
  /** Replaces the backoff sleep, e.g. in tests */
  sleep?: (ms: number) => Promise<void>;
};

export async function sleep(ms: number): Promise<void> {
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Pause before retry number `retry` (1 for the second attempt)
 */
export function backoffDelayMs(cfg: RetryConfig, retry: number): number {
  const base = cfg.baseDelayMs ?? 200;
  const cap = cfg.maxDelayMs ?? 5000;
  const jitter = Math.min(1, Math.max(0, cfg.jitter ?? 0.2));
  const delay = Math.min(cap, base * 2 ** Math.max(0, retry - 1));
  return Math.max(0, Math.round(delay * (1 + (Math.random() * 2 - 1) * jitter)));
}

/**
 * Run `fn` until it succeeds, fails with a non-retryable error, or attempts run out
 *
 * The last error is rethrown unchanged; callers map exhaustion themselves.
 */
export async function withRetries<T>(
  fn: (attempt: number) => Promise<T>,
  cfg: RetryConfig | undefined,
  isRetryable: (err: unknown) => boolean,
  hooks: RetryHooks = {}
): Promise<T> {
  const config = cfg ?? {};
  const attempts = Math.max(1, config.attempts ?? 1);
  const pause = hooks.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= attempts || !isRetryable(err)) throw err;
      const delayMs = backoffDelayMs(config, attempt);
      hooks.onRetry?.(err, { attempt: attempt + 1, attempts, delayMs });
      if (delayMs > 0) await pause(delayMs);
    }
  }
}
