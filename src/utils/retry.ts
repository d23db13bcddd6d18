/**
 * withRetry / RetryExecutor — exponential backoff with bounded jitter
 *
 * delay(attempt) = min(maxDelayMs, baseDelayMs * 2^(attempt - 1)) + jitter,
 * jitter drawn from [0, jitterMs). On final failure the last error is re-thrown
 * untouched so callers can still tell its kind apart.
 */

export interface RetryInfo {
  /** The attempt that just failed (1-based) */
  attempt: number;
  /** Delay before the next attempt */
  delayMs: number;
  error: unknown;
}

export interface BackoffOptions {
  /** Initial delay in ms (default: 1000) */
  baseDelayMs?: number;
  /** Cap on the exponential part in ms (default: 10_000) */
  maxDelayMs?: number;
  /** Upper bound (exclusive) of the random jitter in ms (default: 1000) */
  jitterMs?: number;
}

export interface RetryOptions extends BackoffOptions {
  /** Maximum number of attempts (default: 3) */
  maxAttempts?: number;
  /** Retry only if this returns true for the error */
  retryIf?: (error: unknown) => boolean;
  onRetry?: (info: RetryInfo) => void;
  /** Aborting stops further attempts and interrupts a backoff sleep */
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('Operation aborted');
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new Error('Operation aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function computeBackoffDelay(
  attempt: number,
  options: BackoffOptions = {},
  random: () => number = Math.random,
): number {
  const { baseDelayMs = 1000, maxDelayMs = 10_000, jitterMs = 1000 } = options;
  const exponential = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
  const r = Math.min(Math.max(random(), 0), 1);
  const jitter = jitterMs > 0 ? Math.min(Math.floor(r * jitterMs), jitterMs - 1) : 0;
  return Math.max(0, exponential) + jitter;
}

/**
 * Retry an async function with exponential backoff.
 * The function receives the 1-based attempt number.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxAttempts = 3,
    retryIf,
    onRetry,
    signal,
    sleep: sleepFn = sleep,
    random = Math.random,
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw abortReason(signal);
    }

    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt === maxAttempts) break;
      if (retryIf && !retryIf(error)) break;
      if (signal?.aborted) break;

      const delayMs = computeBackoffDelay(attempt, options, random);
      onRetry?.({ attempt, delayMs, error });
      await sleepFn(delayMs, signal);
    }
  }

  throw lastError;
}

/**
 * Holds a retry policy so one configured instance can wrap many operations.
 * Per-call options (signal, hooks) are layered over the policy.
 */
export class RetryExecutor {
  private readonly policy: RetryOptions;

  constructor(policy: RetryOptions = {}) {
    this.policy = { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 10_000, jitterMs: 1000, ...policy };
  }

  get maxAttempts(): number {
    return this.policy.maxAttempts ?? 3;
  }

  execute<T>(
    operation: (attempt: number) => Promise<T>,
    overrides: Pick<RetryOptions, 'signal' | 'onRetry' | 'retryIf'> = {},
  ): Promise<T> {
    const { onRetry: policyHook } = this.policy;
    const { onRetry: callHook } = overrides;
    return withRetry(operation, {
      ...this.policy,
      ...overrides,
      onRetry: (info) => {
        policyHook?.(info);
        callHook?.(info);
      },
    });
  }
}
