/**
 * Retry policy constants
 *
 * Applied to the two polling waits (computation completion and data asset
 * readiness). Worst case per wait: 8 + 16 + 32 * 4 = 152s of backoff plus
 * up to 5s of jitter per retry.
 */

/**
 * Total attempts, including the first
 */
export const RETRY_MAX_ATTEMPTS = 7;

/**
 * First backoff delay; doubles on every retry
 */
export const RETRY_MIN_DELAY_MS = 8_000;

export const RETRY_MAX_DELAY_MS = 32_000;

/**
 * Upper bound of the random jitter added to every delay
 */
export const RETRY_JITTER_MAX_MS = 5_000;
