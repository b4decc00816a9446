/**
 * Retry policy type definitions
 */

import type { Logger } from "./logger";

/**
 * Backoff policy for a blocking remote call
 *
 * Delay before attempt n+1: min(maxDelayMs, minDelayMs * 2^(n-1)) + [0, jitterMaxMs)
 */
export type RetryPolicy = {
  /** Total attempts, including the first */
  maxAttempts: number;
  minDelayMs: number;
  maxDelayMs: number;
  jitterMaxMs: number;
  /** Decides whether a failure is transient */
  isRetryable: (error: unknown) => boolean;
};

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export type RetryOptions = {
  policy?: RetryPolicy;
  /** Label used in logs and in the exhaustion error */
  operation?: string;
  sleep?: SleepFn;
  /** Returns a number in [0, 1) */
  random?: () => number;
  signal?: AbortSignal;
  logger?: Logger;
};
