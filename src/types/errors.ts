/**
 * Error kind type definitions
 *
 * - RATE_LIMITED: service answered 429; retried by the retry policy,
 *   terminal once attempts are exhausted
 * - REMOTE_FAILURE: any other remote error (network, auth, bad response)
 * - JOB_FAILED: the computation ended in the "failed" state
 * - ASSET_CAPTURE_FAILED: the captured data asset ended in "failed"
 * - NAME_RESOLUTION_FAILED: no naming strategy produced a name
 * - ABORTED: the caller aborted the run between steps or retries
 * - INVALID_SETTINGS: job settings failed validation
 */
export type PipelineMonitorErrorKind =
  | "RATE_LIMITED"
  | "REMOTE_FAILURE"
  | "JOB_FAILED"
  | "ASSET_CAPTURE_FAILED"
  | "NAME_RESOLUTION_FAILED"
  | "ABORTED"
  | "INVALID_SETTINGS";
