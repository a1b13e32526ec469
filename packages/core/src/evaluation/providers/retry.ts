import { setTimeout as delay } from 'node:timers/promises';

/**
 * Retry policy for transport calls. Attempts, classification and backoff are
 * plain data so they can be swapped in tests.
 */
export interface RetryPolicy {
  /** Total attempts, including the first */
  readonly maxAttempts: number;
  shouldRetry(error: unknown): boolean;
  /** Delay before the attempt following `attempt` (0-based) */
  delayMs(attempt: number): number;
}

export interface WithRetryOptions {
  readonly signal?: AbortSignal;
  /** Receives `signal` so a backoff can end early on abort */
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const INITIAL_DELAY_MS = 1000;
const MAX_DELAY_MS = 10_000;
const MAX_JITTER_MS = 1000;

export function extractStatus(error: unknown): number | undefined {
  if (!error || typeof error !== 'object') {
    return undefined;
  }

  const direct =
    'statusCode' in error ? error.statusCode : 'status' in error ? error.status : undefined;
  if (typeof direct === 'number' && Number.isFinite(direct)) {
    return direct;
  }

  if ('response' in error && error.response && typeof error.response === 'object') {
    const response = error.response;
    if ('status' in response && typeof response.status === 'number') {
      return response.status;
    }
  }

  if ('message' in error && typeof error.message === 'string') {
    const match = error.message.match(/HTTP\s+(\d{3})/i);
    if (match) {
      return Number.parseInt(match[1], 10);
    }
  }

  return undefined;
}

export function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')
  );
}

export function isNetworkError(error: unknown): boolean {
  if (!error || typeof error !== 'object' || isAbortError(error)) {
    return false;
  }

  if (
    'code' in error &&
    typeof error.code === 'string' &&
    /^E(AI|CONN|HOST|NET|PIPE|TIME|REFUSED|RESET)/i.test(error.code)
  ) {
    return true;
  }

  if ('cause' in error && error.cause && isNetworkError(error.cause)) {
    return true;
  }

  return (
    'message' in error &&
    typeof error.message === 'string' &&
    /(network|fetch failed|socket hang up|ECONNRESET|ENOTFOUND|EAI_AGAIN|ETIMEDOUT|ECONNREFUSED)/i.test(
      error.message,
    )
  );
}

/**
 * Connection failures, rate limits (429) and server errors (5xx) are retried.
 * Other client errors and aborts are not.
 */
export function isRetryableError(error: unknown): boolean {
  if (isAbortError(error)) {
    return false;
  }
  const status = extractStatus(error);
  if (typeof status === 'number') {
    return status === 429 || status >= 500;
  }
  return isNetworkError(error);
}

export function calculateRetryDelay(attempt: number, random: () => number = Math.random): number {
  const base = Math.min(INITIAL_DELAY_MS * 2 ** attempt, MAX_DELAY_MS);
  return base + Math.floor(random() * MAX_JITTER_MS);
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  shouldRetry: isRetryableError,
  delayMs: (attempt: number) => calculateRetryDelay(attempt),
});

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(ms, undefined, signal ? { signal } : undefined);
}

/**
 * Run `fn` until it succeeds, the policy declines a retry, or attempts run
 * out. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: WithRetryOptions = {},
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, policy.maxAttempts);
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    options.signal?.throwIfAborted();

    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt + 1 >= attempts || !policy.shouldRetry(error)) {
        throw error;
      }

      try {
        await wait(policy.delayMs(attempt), options.signal);
      } catch (sleepError) {
        // Surface the signal's own reason (e.g. TimeoutError) rather than the timer's
        options.signal?.throwIfAborted();
        throw sleepError;
      }
    }
  }

  throw lastError;
}
