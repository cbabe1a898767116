import { RetryExhaustedError } from "./errors.js";
import { withTimeout } from "./timeout.js";

export interface RetryPolicy {
  /** Total attempts, including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  /** Upper bound for a single wait. Unbounded when omitted. */
  maxDelayMs?: number;
}

export interface RetryAttemptFailure {
  attempt: number;
  maxAttempts: number;
  error: unknown;
  /** Wait before the next attempt; null when this was the last attempt. */
  nextDelayMs: number | null;
}

export interface LoadWithRetryOptions {
  /** Per-attempt deadline; 0 or undefined disables it. */
  attemptTimeoutMs?: number;
  /** Label used in timeout errors. */
  operation?: string;
  sleep?: (ms: number) => Promise<void>;
  onAttemptFailed?: (failure: RetryAttemptFailure) => void;
}

export function assertValidRetryPolicy(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be an integer >= 1, got ${policy.maxAttempts}`);
  }
  if (!Number.isFinite(policy.baseDelayMs) || policy.baseDelayMs < 0) {
    throw new RangeError(`baseDelayMs must be >= 0, got ${policy.baseDelayMs}`);
  }
  if (policy.maxDelayMs !== undefined && !(policy.maxDelayMs >= 0)) {
    throw new RangeError(`maxDelayMs must be >= 0, got ${policy.maxDelayMs}`);
  }
}

/**
 * Delay to wait after failed attempt number `attempt` (counted from 1):
 * baseDelayMs * 2^(attempt - 1), capped at maxDelayMs when set.
 */
export function computeBackoffDelay(policy: RetryPolicy, attempt: number): number {
  if (!Number.isInteger(attempt) || attempt < 1) {
    throw new RangeError(`attempt must be an integer >= 1, got ${attempt}`);
  }
  const delay = policy.baseDelayMs * 2 ** (attempt - 1);
  return policy.maxDelayMs === undefined ? delay : Math.min(delay, policy.maxDelayMs);
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Calls `loadFn` until it succeeds or `policy.maxAttempts` attempts have
 * failed, waiting with exponential backoff in between. Rejects with
 * RetryExhaustedError carrying the last failure as its cause.
 */
export async function loadWithRetry<T>(
  loadFn: (attempt: number, signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  options: LoadWithRetryOptions = {},
): Promise<T> {
  assertValidRetryPolicy(policy);
  const sleep = options.sleep ?? defaultSleep;
  const operation = options.operation ?? "load attempt";

  let lastError: unknown;
  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await withTimeout(operation, options.attemptTimeoutMs ?? 0, (signal) =>
        loadFn(attempt, signal),
      );
    } catch (err) {
      lastError = err;
      const isLast = attempt === policy.maxAttempts;
      const nextDelayMs = isLast ? null : computeBackoffDelay(policy, attempt);
      options.onAttemptFailed?.({
        attempt,
        maxAttempts: policy.maxAttempts,
        error: err,
        nextDelayMs,
      });
      if (nextDelayMs !== null) {
        await sleep(nextDelayMs);
      }
    }
  }

  throw new RetryExhaustedError(policy.maxAttempts, lastError);
}
