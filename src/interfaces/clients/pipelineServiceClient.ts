/**
 * PipelineServiceClient interface: the remote job/asset service the monitor drives
 *
 * Implementations translate transport failures into the typed errors in
 * "@/errors": HTTP 429 must surface as RateLimitedError so the retry policy
 * can recognise it, anything else as RemoteFailureError.
 */

import type {
  Computation,
  DataAsset,
  DataAssetParams,
  Permissions,
  RunParams,
  WaitOptions,
} from "@/types";

export interface PipelineServiceClient {
  /**
   * Start a pipeline run. Mutating: called once per job.
   */
  runCapsule(runParams: RunParams): Promise<Computation>;

  /**
   * Block until the computation reaches "completed" or "failed"
   *
   * @returns The computation in its terminal state
   * @throws {RateLimitedError} If a status poll is rate limited
   * @throws {RunAbortedError} If the signal aborts while waiting
   */
  waitUntilCompleted(computation: Computation, options?: WaitOptions): Promise<Computation>;

  getDataAsset(dataAssetId: string): Promise<DataAsset>;

  /**
   * Paths of the computation's top-level result files
   */
  listResultFiles(computationId: string): Promise<string[]>;

  /**
   * Fetch a result file's content as text
   */
  downloadResultFile(computationId: string, path: string): Promise<string>;

  /**
   * Create a data asset. Mutating: called at most once per job.
   */
  createDataAsset(params: DataAssetParams): Promise<DataAsset>;

  /**
   * Block until the data asset reaches "ready" or "failed"
   *
   * @throws {RateLimitedError} If a status poll is rate limited
   * @throws {RunAbortedError} If the signal aborts while waiting
   */
  waitUntilReady(dataAsset: DataAsset, options?: WaitOptions): Promise<DataAsset>;

  /**
   * Replace the permissions of a data asset. Mutating: called at most once per job.
   */
  updatePermissions(dataAssetId: string, permissions: Permissions): Promise<void>;
}
