/**
 * Pipeline monitor job: submit a run, wait for it, capture its results
 *
 * Steps, strictly sequential:
 * 1. Submit the run (once, never retried)
 * 2. Wait for a terminal state, retrying on rate limits; "failed" aborts
 * 3. If capture settings are present:
 *    a. resolve the asset name and build the creation request
 *    b. create the data asset (once)
 *    c. wait for it to be ready, retrying on rate limits; "failed" aborts
 *    d. apply permissions (once)
 *
 * Retries wrap only the two status waits. The permission call and the reads
 * done while resolving the name are single-shot.
 */

import type {
  CapturedDataAssetSettings,
  Computation,
  DataAsset,
  DataAssetParams,
  Logger,
  LogMeta,
  MonitorState,
  PipelineMonitorOptions,
  PipelineMonitorSettings,
  RetryOptions,
} from "@/types";
import type { PipelineServiceClient } from "@/interfaces";
import { withRetry } from "@/retry";
import { resolveName } from "@/naming";
import { buildDataAssetParams } from "@/capture";
import {
  AssetCaptureFailedError,
  JobFailedError,
  RunAbortedError,
} from "@/errors";
import * as logger from "@/logger";

export class PipelineMonitorJob {
  private readonly log: Logger;
  private state: MonitorState = "pending";

  constructor(
    private readonly settings: PipelineMonitorSettings,
    private readonly client: PipelineServiceClient,
    private readonly options: PipelineMonitorOptions = {},
  ) {
    this.log = options.logger ?? logger;
  }

  get currentState(): MonitorState {
    return this.state;
  }

  /**
   * Run the job to completion
   *
   * @throws {JobFailedError} If the computation fails
   * @throws {RetriesExhaustedError} If a wait stays rate limited
   * @throws {NameResolutionError} If no asset name can be built
   * @throws {AssetCaptureFailedError} If the data asset fails
   * @throws {RemoteFailureError} On any other remote error
   * @throws {RunAbortedError} If the signal aborts
   */
  async runJob(): Promise<void> {
    this.log.info("Starting job", { settings: this.settings });

    this.checkAborted("submit");
    const computation = await this.client.runCapsule(this.settings.runParams);
    this.transition("submitted", { computationId: computation.id, computationState: computation.state });

    const completed = await this.monitorPipeline(computation);

    const captureSettings = this.settings.capturedDataAssetParams;
    if (captureSettings === undefined) {
      this.transition("finished", { computationId: completed.id });
      this.log.info("Finished job.", { computationId: completed.id });
      return;
    }

    const dataAsset = await this.captureResult(completed, captureSettings);

    this.transition("finished", { computationId: completed.id, dataAssetId: dataAsset.id });
    this.log.info("Finished job.", {
      computationId: completed.id,
      dataAssetId: dataAsset.id,
      dataAssetName: dataAsset.name,
    });
  }

  private async monitorPipeline(computation: Computation): Promise<Computation> {
    this.checkAborted("monitor");
    this.transition("monitoring", { computationId: computation.id });

    const response = await withRetry(
      () => this.client.waitUntilCompleted(computation, { signal: this.options.signal }),
      this.retryOptions("monitor_pipeline"),
    );

    if (response.state === "failed") {
      this.transition("failed", { computationId: response.id, endStatus: response.endStatus });
      throw new JobFailedError(response);
    }

    this.transition("completed", {
      computationId: response.id,
      endStatus: response.endStatus,
      runTime: response.runTime,
    });
    return response;
  }

  private async captureResult(
    computation: Computation,
    captureSettings: CapturedDataAssetSettings,
  ): Promise<DataAsset> {
    this.checkAborted("capture");
    this.transition("capturing", { computationId: computation.id });

    const params = await this.buildDataAssetParams(computation, captureSettings);

    this.checkAborted("create_data_asset");
    const created = await this.client.createDataAsset(params);
    this.transition("asset_pending", { dataAssetId: created.id, name: created.name });

    const ready = await this.waitForDataAsset(created);

    this.checkAborted("update_permissions");
    await this.client.updatePermissions(ready.id, captureSettings.permissions);
    this.transition("permissions_set", {
      dataAssetId: ready.id,
      permissions: captureSettings.permissions,
    });

    return ready;
  }

  private async buildDataAssetParams(
    computation: Computation,
    captureSettings: CapturedDataAssetSettings,
  ): Promise<DataAssetParams> {
    const name = await resolveName(
      {
        settings: captureSettings,
        runParams: this.settings.runParams,
        computation,
        client: this.client,
        now: this.options.now ?? (() => new Date()),
        logger: this.log,
      },
      this.options.nameStrategies,
    );
    return buildDataAssetParams(captureSettings, name, computation);
  }

  private async waitForDataAsset(dataAsset: DataAsset): Promise<DataAsset> {
    const response = await withRetry(
      () => this.client.waitUntilReady(dataAsset, { signal: this.options.signal }),
      this.retryOptions("wait_for_data_asset"),
    );

    if (response.state === "failed") {
      this.transition("asset_failed", { dataAssetId: response.id });
      throw new AssetCaptureFailedError(response);
    }

    this.transition("asset_ready", { dataAssetId: response.id, name: response.name });
    return response;
  }

  private retryOptions(operation: string): RetryOptions {
    return {
      operation,
      policy: this.options.retryPolicy,
      sleep: this.options.sleep,
      random: this.options.random,
      signal: this.options.signal,
      logger: this.log,
    };
  }

  private checkAborted(step: string): void {
    if (this.options.signal?.aborted) {
      this.log.warn("Run aborted", { step, state: this.state });
      throw new RunAbortedError(step);
    }
  }

  private transition(next: MonitorState, meta: LogMeta): void {
    this.log.info(`Pipeline monitor ${next}`, { from: this.state, ...meta });
    this.state = next;
  }
}

/**
 * Run a pipeline monitor job end to end
 */
export async function runJob(
  settings: PipelineMonitorSettings,
  client: PipelineServiceClient,
  options: PipelineMonitorOptions = {},
): Promise<void> {
  await new PipelineMonitorJob(settings, client, options).runJob();
}
