/**
 * Retry policy: exponential backoff with jitter around a blocking remote call
 *
 * Only errors the policy deems retryable (by default: RateLimitedError) are
 * retried. Anything else, including JobFailedError and AssetCaptureFailedError,
 * propagates on the first throw. After maxAttempts rate-limited attempts the
 * call fails with RetriesExhaustedError.
 *
 * Abort is honoured between attempts: an aborted signal stops further retries
 * but never cancels the call already in flight.
 */

import type { Logger, RetryOptions, RetryPolicy } from "@/types";
import {
  RETRY_JITTER_MAX_MS,
  RETRY_MAX_ATTEMPTS,
  RETRY_MAX_DELAY_MS,
  RETRY_MIN_DELAY_MS,
} from "@/constants";
import {
  RateLimitedError,
  RetriesExhaustedError,
  RunAbortedError,
} from "@/errors";
import * as logger from "@/logger";

function isRateLimited(error: unknown): boolean {
  return error instanceof RateLimitedError;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxAttempts: RETRY_MAX_ATTEMPTS,
  minDelayMs: RETRY_MIN_DELAY_MS,
  maxDelayMs: RETRY_MAX_DELAY_MS,
  jitterMaxMs: RETRY_JITTER_MAX_MS,
  isRetryable: isRateLimited,
});

/**
 * Compute the wait after a failed attempt
 * Formula: min(maxDelay, minDelay * 2^(attempt-1)) + random * jitterMax
 *
 * @param attempt - The attempt that just failed (1-based)
 */
export function computeRetryDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const exponentialDelay = policy.minDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, policy.maxDelayMs);
  return Math.floor(cappedDelay + random() * policy.jitterMaxMs);
}

/**
 * Sleep for the specified number of milliseconds
 * Rejects with RunAbortedError as soon as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RunAbortedError("retry"));
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new RunAbortedError("retry"));
    };

    timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Run `fn`, retrying per the policy
 *
 * @param fn - The blocking call. Invoked once per attempt.
 * @returns Whatever the first successful attempt returns
 * @throws {RetriesExhaustedError} After maxAttempts retryable failures
 * @throws {RunAbortedError} If the signal aborts before an attempt or during backoff
 * @throws Any non-retryable error from `fn`, unchanged
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const operation = options.operation ?? "remote call";
  const sleepFn = options.sleep ?? sleep;
  const random = options.random ?? Math.random;
  const log: Logger = options.logger ?? logger;

  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      throw new RunAbortedError(operation);
    }

    try {
      return await fn();
    } catch (error) {
      if (!policy.isRetryable(error)) {
        throw error;
      }
      lastError = error;

      if (attempt >= policy.maxAttempts) {
        break;
      }

      const delayMs = computeRetryDelay(attempt, policy, random);
      log.warn("Rate limited, backing off", {
        operation,
        attempt,
        maxAttempts: policy.maxAttempts,
        delayMs,
      });
      await sleepFn(delayMs, options.signal);
    }
  }

  log.error("Retries exhausted", { operation, attempts: policy.maxAttempts });
  throw new RetriesExhaustedError(operation, policy.maxAttempts, lastError);
}
