/**
 * Pipeline monitor job type definitions
 */

import type { Logger } from "./logger";
import type { NameStrategy } from "./naming";
import type { RetryPolicy, SleepFn } from "./retry";

/**
 * Orchestrator state
 *
 * pending → submitted → monitoring → completed | failed
 *   → capturing → asset_pending → asset_ready | asset_failed
 *   → permissions_set → finished
 *
 * Runs without capture settings go from completed straight to finished.
 */
export type MonitorState =
  | "pending"
  | "submitted"
  | "monitoring"
  | "completed"
  | "failed"
  | "capturing"
  | "asset_pending"
  | "asset_ready"
  | "asset_failed"
  | "permissions_set"
  | "finished";

export type PipelineMonitorOptions = {
  /** Overrides the policy used by both polling waits */
  retryPolicy?: RetryPolicy;
  sleep?: SleepFn;
  random?: () => number;
  /** Clock used for the default name's timestamp */
  now?: () => Date;
  /** Stops the run at the next step boundary or backoff */
  signal?: AbortSignal;
  nameStrategies?: readonly NameStrategy[];
  logger?: Logger;
};
