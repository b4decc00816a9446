/**
 * Offline tests for CodeOceanClient
 *
 * Every request goes through the mock HTTP harness; unmocked routes throw.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CodeOceanClient } from "@/clients/codeOcean";
import { RateLimitedError, RemoteFailureError, RunAbortedError } from "@/errors";
import { createMockHttp, type MockHttp } from "../helpers/mockHttp";

const BASE = "https://codeocean.test/api/v1";
const AUTH = { Authorization: "Basic dGVzdC10b2tlbjo=" };

describe("CodeOceanClient (offline)", () => {
  let mock: MockHttp;
  let sleeps: number[];
  let client: CodeOceanClient;

  beforeEach(() => {
    mock = createMockHttp();
    sleeps = [];
    client = new CodeOceanClient({
      httpRequest: mock.request,
      httpRequestText: mock.requestText,
      credentials: { domain: "https://codeocean.test/", apiToken: "test-token" },
      pollIntervalMs: 10,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });
  });

  it("should refuse to start without credentials", () => {
    expect(
      () => new CodeOceanClient({ credentials: { domain: "", apiToken: "" } }),
    ).toThrow(
      "Code Ocean authentication configuration missing: CODEOCEAN_DOMAIN, CODEOCEAN_API_TOKEN. " +
        "Please set these environment variables.",
    );
  });

  describe("runCapsule", () => {
    it("should submit run params in wire format with Basic auth", async () => {
      mock.on("POST", `${BASE}/computations`, { id: "comp-1", state: "initializing" });

      const computation = await client.runCapsule({
        pipelineId: "pipeline-1",
        version: 3,
        dataAssets: [{ id: "asset-in", mount: "ecephys" }],
        namedParameters: [{ paramName: "threshold", value: "4" }],
      });

      expect(computation).toEqual({ id: "comp-1", state: "initializing" });
      expect(mock.getRecordedRequests()).toEqual([
        {
          method: "POST",
          url: `${BASE}/computations`,
          headers: AUTH,
          json: {
            pipeline_id: "pipeline-1",
            version: 3,
            data_assets: [{ id: "asset-in", mount: "ecephys" }],
            named_parameters: [{ param_name: "threshold", value: "4" }],
          },
        },
      ]);
    });

    it("should map 429 to RateLimitedError", async () => {
      mock.onResponse("POST", `${BASE}/computations`, { status: 429, body: "slow down" });

      await expect(
        client.runCapsule({ capsuleId: "capsule-1", dataAssets: [] }),
      ).rejects.toBeInstanceOf(RateLimitedError);
    });

    it("should map transport failures to RemoteFailureError", async () => {
      const failing = new CodeOceanClient({
        httpRequest: async () => {
          throw new TypeError("fetch failed");
        },
        credentials: { domain: "https://codeocean.test", apiToken: "test-token" },
      });

      await expect(
        failing.runCapsule({ capsuleId: "capsule-1", dataAssets: [] }),
      ).rejects.toThrow(new RemoteFailureError("run_capsule", "TypeError: fetch failed"));
    });
  });

  describe("waitUntilCompleted", () => {
    it("should poll until the computation is terminal", async () => {
      mock.onSequence("GET", `${BASE}/computations/comp-1`, [
        { status: 200, body: { id: "comp-1", state: "running" } },
        { status: 200, body: { id: "comp-1", state: "finalizing" } },
        {
          status: 200,
          body: { id: "comp-1", state: "completed", end_status: "succeeded", run_time: 42 },
        },
      ]);

      const result = await client.waitUntilCompleted({ id: "comp-1", state: "initializing" });

      expect(result).toEqual({
        id: "comp-1",
        state: "completed",
        endStatus: "succeeded",
        runTime: 42,
      });
      expect(sleeps).toEqual([10, 10]);
    });

    it("should return a failed computation without throwing", async () => {
      mock.on("GET", `${BASE}/computations/comp-1`, { id: "comp-1", state: "failed" });

      const result = await client.waitUntilCompleted({ id: "comp-1", state: "running" });

      expect(result.state).toBe("failed");
      expect(sleeps).toEqual([]);
    });

    it("should end the wait on a rate limit", async () => {
      mock.onSequence("GET", `${BASE}/computations/comp-1`, [
        { status: 200, body: { id: "comp-1", state: "running" } },
        { status: 429, body: "" },
      ]);

      await expect(
        client.waitUntilCompleted({ id: "comp-1", state: "running" }),
      ).rejects.toBeInstanceOf(RateLimitedError);
      expect(mock.getRecordedRequests()).toHaveLength(2);
    });

    it("should give up after the wait timeout", async () => {
      const bounded = new CodeOceanClient({
        httpRequest: mock.request,
        credentials: { domain: "https://codeocean.test", apiToken: "test-token" },
        pollIntervalMs: 10,
        waitTimeoutMs: 0,
        sleep: async () => undefined,
      });
      mock.on("GET", `${BASE}/computations/comp-1`, { id: "comp-1", state: "running" });

      await expect(
        bounded.waitUntilCompleted({ id: "comp-1", state: "running" }),
      ).rejects.toThrow("wait_until_completed failed: not terminal after 0ms");
    });

    it("should stop polling once the signal aborts", async () => {
      const controller = new AbortController();
      const sleepSignals: (AbortSignal | undefined)[] = [];
      const aborting = new CodeOceanClient({
        httpRequest: mock.request,
        credentials: { domain: "https://codeocean.test", apiToken: "test-token" },
        pollIntervalMs: 10,
        sleep: async (_ms, signal) => {
          sleepSignals.push(signal);
          controller.abort();
        },
      });
      mock.on("GET", `${BASE}/computations/comp-1`, { id: "comp-1", state: "running" });

      await expect(
        aborting.waitUntilCompleted({ id: "comp-1", state: "running" }, { signal: controller.signal }),
      ).rejects.toThrow(new RunAbortedError("wait_until_completed"));
      expect(mock.getRecordedRequests()).toHaveLength(1);
      expect(sleepSignals).toEqual([controller.signal]);
    });

    it("should not poll at all with an already aborted signal", async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        client.waitUntilCompleted({ id: "comp-1", state: "running" }, { signal: controller.signal }),
      ).rejects.toBeInstanceOf(RunAbortedError);
      expect(mock.getRecordedRequests()).toEqual([]);
    });

    it("should reject an unknown state", async () => {
      mock.on("GET", `${BASE}/computations/comp-1`, { id: "comp-1", state: "exploded" });

      await expect(
        client.waitUntilCompleted({ id: "comp-1", state: "running" }),
      ).rejects.toThrow(
        "get_computation failed: Code Ocean computation mapping failed - invalid response structure",
      );
    });
  });

  describe("data assets", () => {
    it("should fetch a data asset", async () => {
      mock.on("GET", `${BASE}/data_assets/asset-in`, {
        id: "asset-in",
        name: "ecephys_123456_2024-01-01_09-00-00",
        mount: "ecephys",
        state: "ready",
        type: "dataset",
      });

      const dataAsset = await client.getDataAsset("asset-in");

      expect(dataAsset).toEqual({
        id: "asset-in",
        name: "ecephys_123456_2024-01-01_09-00-00",
        mount: "ecephys",
        state: "ready",
      });
    });

    it("should report a missing asset as a remote failure with its status", async () => {
      mock.onResponse("GET", `${BASE}/data_assets/missing`, {
        status: 404,
        body: { message: "not found" },
      });

      const error = await client.getDataAsset("missing").catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RemoteFailureError);
      expect(error).toMatchObject({ operation: "get_data_asset", status: 404 });
    });

    it("should create a data asset from the computation", async () => {
      mock.on("POST", `${BASE}/data_assets`, {
        id: "asset-out",
        name: "run-42",
        mount: "run-42",
        state: "draft",
      });

      const created = await client.createDataAsset({
        name: "run-42",
        mount: "run-42",
        tags: ["derived"],
        source: { computation: { id: "comp-1" } },
        target: { aws: { bucket: "results-bucket", prefix: "run-42" } },
        customMetadata: { "data level": "derived" },
      });

      expect(created).toEqual({ id: "asset-out", name: "run-42", mount: "run-42", state: "draft" });
      expect(mock.getRecordedRequests()[0].json).toEqual({
        name: "run-42",
        mount: "run-42",
        tags: ["derived"],
        source: { computation: { id: "comp-1" } },
        target: { aws: { bucket: "results-bucket", prefix: "run-42" } },
        custom_metadata: { "data level": "derived" },
      });
    });

    it("should poll until the data asset is ready", async () => {
      mock.onSequence("GET", `${BASE}/data_assets/asset-out`, [
        { status: 200, body: { id: "asset-out", name: "run-42", mount: "run-42", state: "draft" } },
        { status: 200, body: { id: "asset-out", name: "run-42", mount: "run-42", state: "ready" } },
      ]);

      const ready = await client.waitUntilReady({
        id: "asset-out",
        name: "run-42",
        mount: "run-42",
        state: "draft",
      });

      expect(ready.state).toBe("ready");
      expect(sleeps).toEqual([10]);
    });

    it("should stop waiting for the data asset once the signal aborts", async () => {
      const controller = new AbortController();
      const aborting = new CodeOceanClient({
        httpRequest: mock.request,
        credentials: { domain: "https://codeocean.test", apiToken: "test-token" },
        pollIntervalMs: 10,
        sleep: async () => {
          controller.abort();
        },
      });
      mock.on("GET", `${BASE}/data_assets/asset-out`, {
        id: "asset-out",
        name: "run-42",
        mount: "run-42",
        state: "draft",
      });

      await expect(
        aborting.waitUntilReady(
          { id: "asset-out", name: "run-42", mount: "run-42", state: "draft" },
          { signal: controller.signal },
        ),
      ).rejects.toThrow(new RunAbortedError("wait_until_ready"));
      expect(mock.getRecordedRequests()).toHaveLength(1);
    });

    it("should post permissions in wire format", async () => {
      mock.onResponse("POST", `${BASE}/data_assets/asset-out/permissions`, {
        status: 204,
        body: undefined,
      });

      await client.updatePermissions("asset-out", {
        users: [{ email: "user@example.org", role: "owner" }],
        everyone: "viewer",
        shareAssets: false,
      });

      expect(mock.getRecordedRequests()[0]).toEqual({
        method: "POST",
        url: `${BASE}/data_assets/asset-out/permissions`,
        headers: AUTH,
        json: {
          users: [{ email: "user@example.org", role: "owner" }],
          everyone: "viewer",
          share_assets: false,
        },
      });
    });
  });

  describe("result files", () => {
    it("should list top-level result files", async () => {
      mock.on("POST", `${BASE}/computations/comp-1/results`, {
        items: [
          { name: "data_description.json", path: "data_description.json", type: "file", size: 120 },
          { name: "sorted", path: "sorted", type: "folder" },
          { name: "output", path: "output", type: "file", size: 9 },
        ],
      });

      const files = await client.listResultFiles("comp-1");

      expect(files).toEqual(["data_description.json", "output"]);
      expect(mock.getRecordedRequests()[0].json).toEqual({ path: "" });
    });

    it("should download a file through its signed URL without credentials", async () => {
      mock.on("GET", `${BASE}/computations/comp-1/results/download_url`, {
        url: "https://signed.test/comp-1/data_description.json",
      });
      mock.on("GET", "https://signed.test/comp-1/data_description.json", '{"name": "run-42"}');

      const content = await client.downloadResultFile("comp-1", "data_description.json");

      expect(content).toBe('{"name": "run-42"}');
      expect(mock.getRecordedRequests()).toEqual([
        {
          method: "GET",
          url: `${BASE}/computations/comp-1/results/download_url`,
          headers: AUTH,
          query: { path: "data_description.json" },
        },
        { method: "GET", url: "https://signed.test/comp-1/data_description.json" },
      ]);
    });

    it("should reject a download URL response without a url", async () => {
      mock.on("GET", `${BASE}/computations/comp-1/results/download_url`, {});

      await expect(
        client.downloadResultFile("comp-1", "data_description.json"),
      ).rejects.toThrow(
        "download_result_file failed: Code Ocean download url mapping failed - invalid response structure",
      );
    });
  });
});
