import { setTimeout as delay } from "node:timers/promises";
import { AppError } from "./app-error.js";

export interface RetryOptions {
  /** Attempts after the first one. Default: 3 */
  maxRetries?: number;
  /** Backoff before the first retry, doubled for each one after. Default: 1000 */
  baseDelayMs?: number;
  /** Upper bound for a single backoff. Default: 10000 */
  maxDelayMs?: number;
  /** Overrides the default decision, which follows `AppError.retryable`. */
  shouldRetry?: (error: unknown) => boolean;
  /** Aborting skips the remaining attempts and cuts a running backoff short. */
  signal?: AbortSignal;
  /** Source of jitter in [0, 1). Default: Math.random */
  random?: () => number;
  onRetry?: (info: RetryAttemptInfo) => void;
}

export interface RetryAttemptInfo {
  attempt: number;
  maxRetries: number;
  delayMs: number;
  error: unknown;
}

/** AppErrors carry their own verdict; anything else is treated as transport trouble. */
function defaultShouldRetry(error: unknown): boolean {
  return AppError.isAppError(error) ? error.retryable : true;
}

/**
 * Equal-jitter exponential backoff: half the capped delay is fixed, the other
 * half is random.
 */
export function backoffDelay(
  retry: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random,
): number {
  const capped = Math.min(maxDelayMs, baseDelayMs * 2 ** retry);
  return Math.floor(capped / 2 + (capped / 2) * random());
}

/** Resolves false when the signal fires before the delay elapses. */
async function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error: unknown) {
    if (signal?.aborted) return false;
    throw error;
  }
}

/**
 * Runs `fn` until it succeeds or the retry budget is spent. The error from the
 * last attempt is rethrown unchanged.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = 3,
    baseDelayMs = 1_000,
    maxDelayMs = 10_000,
    shouldRetry = defaultShouldRetry,
    signal,
    random,
    onRetry,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      if (attempt >= maxRetries || signal?.aborted || !shouldRetry(error)) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs, random);
      onRetry?.({ attempt: attempt + 1, maxRetries, delayMs, error });
      if (!(await pause(delayMs, signal))) {
        throw error;
      }
    }
  }
}
