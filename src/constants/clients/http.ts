/**
 * HTTP client constants: defaults and configuration
 */

/**
 * Default request timeout in milliseconds (60 seconds)
 * Result file downloads go through the same client, so keep it generous.
 */
export const DEFAULT_HTTP_TIMEOUT_MS = 60_000;

/**
 * Default headers for JSON requests
 */
export const DEFAULT_JSON_HEADERS: Record<string, string> = {
  "Content-Type": "application/json",
  Accept: "application/json",
};

/**
 * Maximum length of error body snippet to include in error messages
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;

/**
 * Status the service uses to signal rate limiting
 */
export const HTTP_STATUS_TOO_MANY_REQUESTS = 429;
