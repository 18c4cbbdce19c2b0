export type RetryPolicy = {
  initialDelayMs: number;
  maxDelayMs: number;
  maxElapsedMs: number;
  multiplier: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  initialDelayMs: 1_000,
  maxDelayMs: 30_000,
  maxElapsedMs: 120_000,
  multiplier: 2,
};

export type SleepFn = (delayMs: number, signal?: AbortSignal) => Promise<void>;

export type RetryDecision = {
  attempt: number;
  delayMs: number;
  error: unknown;
};

export type RetryOptions = {
  isRetryable: (error: unknown) => boolean;
  now?: () => number;
  onGiveUp?: (decision: { attempt: number; error: unknown; reason: "budget_exhausted" | "permanent" }) => void;
  onRetry?: (decision: RetryDecision) => void;
  policy?: RetryPolicy;
  signal?: AbortSignal;
  sleep?: SleepFn;
};

export function getBackoffDelayMs(policy: RetryPolicy, retryIndex: number): number {
  const normalizedIndex = Math.max(0, Math.trunc(retryIndex));
  const delay = policy.initialDelayMs * policy.multiplier ** normalizedIndex;
  return Math.min(Math.max(0, delay), policy.maxDelayMs);
}

export async function sleep(delayMs: number, signal?: AbortSignal): Promise<void> {
  if (delayMs <= 0) {
    return;
  }

  signal?.throwIfAborted();
  await new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timeoutId);
      reject(signal?.reason);
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, delayMs);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Runs `operation` until it succeeds, throws a non-retryable error, or the next
 * backoff delay would push the sequence past `policy.maxElapsedMs`. Attempts are
 * strictly sequential. An aborted `signal` stops the sequence immediately.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const now = options.now ?? Date.now;
  const wait = options.sleep ?? sleep;
  const startedAt = now();
  let attempt = 0;

  while (true) {
    attempt += 1;
    options.signal?.throwIfAborted();

    try {
      return await operation(attempt);
    } catch (error) {
      if (options.signal?.aborted || !options.isRetryable(error)) {
        options.onGiveUp?.({ attempt, error, reason: "permanent" });
        throw error;
      }

      const delayMs = getBackoffDelayMs(policy, attempt - 1);
      const elapsedMs = now() - startedAt;
      if (elapsedMs + delayMs > policy.maxElapsedMs) {
        options.onGiveUp?.({ attempt, error, reason: "budget_exhausted" });
        throw error;
      }

      options.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs, options.signal);
    }
  }
}
