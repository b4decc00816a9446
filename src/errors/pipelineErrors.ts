/**
 * Typed errors raised by the pipeline monitor
 *
 * Every failure that aborts a run is a PipelineMonitorError with a `kind`,
 * so the entry point can report which step failed and why.
 */

import type {
  Computation,
  DataAsset,
  PipelineMonitorErrorKind,
} from "@/types";
import type { HttpError } from "@/clients/http/httpError";

export abstract class PipelineMonitorError extends Error {
  abstract readonly kind: PipelineMonitorErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineMonitorError";
  }
}

/**
 * The service answered "429 Too Many Requests"
 * Transient: the retry policy backs off and tries again.
 */
export class RateLimitedError extends PipelineMonitorError {
  readonly kind = "RATE_LIMITED";
  readonly operation: string;

  constructor(operation: string, cause?: HttpError) {
    super(
      `Too many requests during ${operation}${cause ? ` - ${cause.message}` : ""}`,
      { cause },
    );
    this.name = "RateLimitedError";
    this.operation = operation;
  }
}

/**
 * Every attempt of a retried call was rate limited
 */
export class RetriesExhaustedError extends PipelineMonitorError {
  readonly kind = "RATE_LIMITED";
  readonly operation: string;
  readonly attempts: number;

  constructor(operation: string, attempts: number, lastError: unknown) {
    super(`${operation} still rate limited after ${attempts} attempts`, {
      cause: lastError,
    });
    this.name = "RetriesExhaustedError";
    this.operation = operation;
    this.attempts = attempts;
  }
}

/**
 * Any other remote failure: network, auth, non-429 status, malformed response
 */
export class RemoteFailureError extends PipelineMonitorError {
  readonly kind = "REMOTE_FAILURE";
  readonly operation: string;
  readonly status?: number;

  constructor(
    operation: string,
    message: string,
    options?: { status?: number; cause?: unknown },
  ) {
    super(`${operation} failed: ${message}`, { cause: options?.cause });
    this.name = "RemoteFailureError";
    this.operation = operation;
    this.status = options?.status;
  }
}

export class JobFailedError extends PipelineMonitorError {
  readonly kind = "JOB_FAILED";
  readonly computation: Computation;

  constructor(computation: Computation) {
    super(`The pipeline run failed: ${JSON.stringify(computation)}`);
    this.name = "JobFailedError";
    this.computation = computation;
  }
}

export class AssetCaptureFailedError extends PipelineMonitorError {
  readonly kind = "ASSET_CAPTURE_FAILED";
  readonly dataAsset: DataAsset;

  constructor(dataAsset: DataAsset) {
    super(`Data asset creation failed: ${JSON.stringify(dataAsset)}`);
    this.name = "AssetCaptureFailedError";
    this.dataAsset = dataAsset;
  }
}

/**
 * No naming strategy produced a name; raised before any asset is created
 */
export class NameResolutionError extends PipelineMonitorError {
  readonly kind = "NAME_RESOLUTION_FAILED";

  constructor(message = "Unable to construct data asset name.") {
    super(message);
    this.name = "NameResolutionError";
  }
}

export class RunAbortedError extends PipelineMonitorError {
  readonly kind = "ABORTED";
  readonly step: string;

  constructor(step: string) {
    super(`Run aborted before ${step}`);
    this.name = "RunAbortedError";
    this.step = step;
  }
}

/**
 * Job settings failed validation
 * The message names the offending field path.
 */
export class SettingsValidationError extends PipelineMonitorError {
  readonly kind = "INVALID_SETTINGS";

  constructor(message: string, options?: { cause?: unknown }) {
    super(`Settings validation failed: ${message}`, options);
    this.name = "SettingsValidationError";
  }
}
