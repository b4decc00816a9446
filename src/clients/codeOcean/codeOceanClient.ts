/**
 * CodeOceanClient: API client for Code Ocean (REST API v1)
 *
 * Implements the PipelineServiceClient interface. Every failure leaves this
 * class as a typed error: HTTP 429 → RateLimitedError, anything else →
 * RemoteFailureError carrying the response detail.
 */

import type { PipelineServiceClient } from "@/interfaces";
import type {
  Computation,
  DataAsset,
  DataAssetParams,
  HttpRequest,
  HttpRequestFn,
  HttpTextRequestFn,
  Permissions,
  RunParams,
  SleepFn,
  WaitOptions,
} from "@/types";
import type {
  CodeOceanComputation,
  CodeOceanDataAsset,
  CodeOceanDownloadUrl,
  CodeOceanFolder,
} from "@/types/clients/codeOcean";
import {
  HttpError,
  httpRequest as defaultHttpRequest,
  httpRequestText as defaultHttpRequestText,
} from "@/clients/http";
import {
  CODEOCEAN_API_PATH,
  CODEOCEAN_API_TOKEN_ENV,
  CODEOCEAN_COMPUTATIONS_PATH,
  CODEOCEAN_DATA_ASSETS_PATH,
  CODEOCEAN_DEFAULT_POLL_INTERVAL_MS,
  CODEOCEAN_DEFAULT_WAIT_TIMEOUT_MS,
  CODEOCEAN_DOMAIN_ENV,
} from "@/constants";
import {
  PipelineMonitorError,
  RateLimitedError,
  RemoteFailureError,
  RunAbortedError,
} from "@/errors";
import { sleep as defaultSleep } from "@/retry";
import {
  mapComputation,
  mapDataAsset,
  mapResultFilePaths,
  toCodeOceanDataAssetParams,
  toCodeOceanPermissions,
  toCodeOceanRunParams,
} from "./mappers";
import * as logger from "@/logger";

export interface CodeOceanClientConfig {
  /**
   * Optional HTTP request functions (for testing/mocking)
   * Default to the production implementations
   */
  httpRequest?: HttpRequestFn;
  httpRequestText?: HttpTextRequestFn;

  /**
   * Optional credentials (for testing)
   * Defaults to process.env.CODEOCEAN_DOMAIN / CODEOCEAN_API_TOKEN
   */
  credentials?: {
    domain: string;
    apiToken: string;
  };

  /** Interval between status polls in the wait calls */
  pollIntervalMs?: number;
  /** Wall-clock limit of a single wait call; unset waits indefinitely */
  waitTimeoutMs?: number;
  /** Sleep between polls (for testing) */
  sleep?: SleepFn;
}

/**
 * Translate a transport failure into a typed pipeline error
 */
function toPipelineError(error: unknown, operation: string): PipelineMonitorError {
  if (error instanceof PipelineMonitorError) {
    return error;
  }
  if (error instanceof HttpError) {
    if (error.isRateLimited) {
      return new RateLimitedError(operation, error);
    }
    return new RemoteFailureError(operation, error.message, {
      status: error.status,
      cause: error,
    });
  }
  const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  return new RemoteFailureError(operation, message, { cause: error });
}

export class CodeOceanClient implements PipelineServiceClient {
  private readonly baseUrl: string;
  private readonly authHeader: string;
  private readonly httpRequest: HttpRequestFn;
  private readonly httpRequestText: HttpTextRequestFn;
  private readonly pollIntervalMs: number;
  private readonly waitTimeoutMs: number | undefined;
  private readonly sleep: SleepFn;

  constructor(config?: CodeOceanClientConfig) {
    // Use provided credentials or fall back to env vars
    const domain = config?.credentials?.domain ?? process.env[CODEOCEAN_DOMAIN_ENV] ?? "";
    const apiToken = config?.credentials?.apiToken ?? process.env[CODEOCEAN_API_TOKEN_ENV] ?? "";

    if (!domain || !apiToken) {
      const missing: string[] = [];
      if (!domain) missing.push(CODEOCEAN_DOMAIN_ENV);
      if (!apiToken) missing.push(CODEOCEAN_API_TOKEN_ENV);
      throw new Error(
        `Code Ocean authentication configuration missing: ${missing.join(", ")}. ` +
          `Please set these environment variables.`,
      );
    }

    this.baseUrl = `${domain.replace(/\/+$/, "")}${CODEOCEAN_API_PATH}`;
    // The API token is the Basic auth user name, with an empty password
    this.authHeader = `Basic ${Buffer.from(`${apiToken}:`, "utf-8").toString("base64")}`;
    this.httpRequest = config?.httpRequest ?? defaultHttpRequest;
    this.httpRequestText = config?.httpRequestText ?? defaultHttpRequestText;
    this.pollIntervalMs = config?.pollIntervalMs ?? CODEOCEAN_DEFAULT_POLL_INTERVAL_MS;
    this.waitTimeoutMs = config?.waitTimeoutMs ?? CODEOCEAN_DEFAULT_WAIT_TIMEOUT_MS;
    this.sleep = config?.sleep ?? defaultSleep;

    logger.debug("CodeOceanClient initialized", { baseUrl: this.baseUrl });
  }

  /**
   * Perform an authenticated JSON call against the API
   */
  private async call<T>(
    operation: string,
    req: Omit<HttpRequest, "url" | "headers"> & { path: string },
  ): Promise<T> {
    const { path, ...rest } = req;
    try {
      return await this.httpRequest<T>({
        ...rest,
        url: `${this.baseUrl}${path}`,
        headers: { Authorization: this.authHeader },
      });
    } catch (error) {
      throw toPipelineError(error, operation);
    }
  }

  private mappingFailure(operation: string, what: string): RemoteFailureError {
    return new RemoteFailureError(
      operation,
      `Code Ocean ${what} mapping failed - invalid response structure`,
    );
  }

  async runCapsule(runParams: RunParams): Promise<Computation> {
    const raw = await this.call<CodeOceanComputation>("run_capsule", {
      method: "POST",
      path: CODEOCEAN_COMPUTATIONS_PATH,
      json: toCodeOceanRunParams(runParams),
    });
    const computation = mapComputation(raw);
    if (!computation) {
      throw this.mappingFailure("run_capsule", "computation");
    }
    logger.debug("Code Ocean run submitted", { computationId: computation.id });
    return computation;
  }

  async getComputation(computationId: string): Promise<Computation> {
    const raw = await this.call<CodeOceanComputation>("get_computation", {
      method: "GET",
      path: `${CODEOCEAN_COMPUTATIONS_PATH}/${encodeURIComponent(computationId)}`,
    });
    const computation = mapComputation(raw);
    if (!computation) {
      throw this.mappingFailure("get_computation", "computation");
    }
    return computation;
  }

  async waitUntilCompleted(computation: Computation, options?: WaitOptions): Promise<Computation> {
    return this.pollUntil(
      "wait_until_completed",
      () => this.getComputation(computation.id),
      (current) => current.state === "completed" || current.state === "failed",
      options?.signal,
    );
  }

  async getDataAsset(dataAssetId: string): Promise<DataAsset> {
    const raw = await this.call<CodeOceanDataAsset>("get_data_asset", {
      method: "GET",
      path: `${CODEOCEAN_DATA_ASSETS_PATH}/${encodeURIComponent(dataAssetId)}`,
    });
    const dataAsset = mapDataAsset(raw);
    if (!dataAsset) {
      throw this.mappingFailure("get_data_asset", "data asset");
    }
    return dataAsset;
  }

  async listResultFiles(computationId: string): Promise<string[]> {
    const raw = await this.call<CodeOceanFolder>("list_result_files", {
      method: "POST",
      path: `${CODEOCEAN_COMPUTATIONS_PATH}/${encodeURIComponent(computationId)}/results`,
      json: { path: "" },
    });
    return mapResultFilePaths(raw);
  }

  /**
   * Resolve a signed download URL, then fetch the file from it
   * The signed URL carries its own credentials; no Authorization header is sent.
   */
  async downloadResultFile(computationId: string, path: string): Promise<string> {
    const operation = "download_result_file";
    const raw = await this.call<CodeOceanDownloadUrl>(operation, {
      method: "GET",
      path: `${CODEOCEAN_COMPUTATIONS_PATH}/${encodeURIComponent(computationId)}/results/download_url`,
      query: { path },
    });
    if (!raw?.url) {
      throw this.mappingFailure(operation, "download url");
    }

    try {
      return await this.httpRequestText({ method: "GET", url: raw.url });
    } catch (error) {
      throw toPipelineError(error, operation);
    }
  }

  async createDataAsset(params: DataAssetParams): Promise<DataAsset> {
    const raw = await this.call<CodeOceanDataAsset>("create_data_asset", {
      method: "POST",
      path: CODEOCEAN_DATA_ASSETS_PATH,
      json: toCodeOceanDataAssetParams(params),
    });
    const dataAsset = mapDataAsset(raw);
    if (!dataAsset) {
      throw this.mappingFailure("create_data_asset", "data asset");
    }
    return dataAsset;
  }

  async waitUntilReady(dataAsset: DataAsset, options?: WaitOptions): Promise<DataAsset> {
    return this.pollUntil(
      "wait_until_ready",
      () => this.getDataAsset(dataAsset.id),
      (current) => current.state === "ready" || current.state === "failed",
      options?.signal,
    );
  }

  async updatePermissions(dataAssetId: string, permissions: Permissions): Promise<void> {
    await this.call<unknown>("update_permissions", {
      method: "POST",
      path: `${CODEOCEAN_DATA_ASSETS_PATH}/${encodeURIComponent(dataAssetId)}/permissions`,
      json: toCodeOceanPermissions(permissions),
    });
  }

  /**
   * Poll until `isTerminal` holds
   * Errors from `fetchCurrent` (rate limits included) end the wait immediately.
   * An aborted signal stops the wait before the next read or during the interval.
   */
  private async pollUntil<T>(
    operation: string,
    fetchCurrent: () => Promise<T>,
    isTerminal: (current: T) => boolean,
    signal?: AbortSignal,
  ): Promise<T> {
    const startMs = Date.now();
    for (;;) {
      if (signal?.aborted) {
        throw new RunAbortedError(operation);
      }

      const current = await fetchCurrent();
      if (isTerminal(current)) {
        return current;
      }

      if (
        this.waitTimeoutMs !== undefined &&
        Date.now() - startMs + this.pollIntervalMs > this.waitTimeoutMs
      ) {
        throw new RemoteFailureError(
          operation,
          `not terminal after ${this.waitTimeoutMs}ms`,
        );
      }

      await this.sleep(this.pollIntervalMs, signal);
    }
  }
}
