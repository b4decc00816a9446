/**
 * Unit tests for data asset name resolution
 *
 * Strategies run against the in-process fake service; the clock is fixed.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { CapturedDataAssetSettings, NameStrategy, NamingContext } from "@/types";
import {
  dataDescriptionStrategy,
  defaultNameStrategy,
  explicitNameStrategy,
  extractDescriptorName,
  formatNameTimestamp,
  resolveName,
} from "@/naming";
import { NameResolutionError, RemoteFailureError } from "@/errors";
import { FakePipelineService } from "../helpers/fakePipelineService";
import { createRecordingLogger, type RecordingLogger } from "../helpers/recordingLogger";
import { buildCaptureSettings, buildRunParams } from "../helpers/settingsFactory";

const FIXED_NOW = new Date("2024-01-01T10:00:00Z");
const VALID_DERIVED_NAME = "ecephys_123456_2024-01-01_09-00-00_sorted_2024-01-02_10-00-00";

describe("formatNameTimestamp", () => {
  it("should format UTC time as YYYY-MM-DD_HH-MM-SS", () => {
    expect(formatNameTimestamp(FIXED_NOW)).toBe("2024-01-01_10-00-00");
  });

  it("should render midnight as 00", () => {
    expect(formatNameTimestamp(new Date("2024-03-05T00:07:09Z"), "UTC")).toBe(
      "2024-03-05_00-07-09",
    );
  });

  it("should convert to the requested time zone", () => {
    expect(formatNameTimestamp(FIXED_NOW, "America/New_York")).toBe("2024-01-01_05-00-00");
  });
});

describe("extractDescriptorName", () => {
  const ctx = { logger: createRecordingLogger() };

  it("should read the name field of a JSON object", () => {
    expect(extractDescriptorName('{"name": "abc", "subject_id": "123"}', ctx)).toBe("abc");
  });

  it.each([
    ["not json", "{name: abc"],
    ["an array", '["abc"]'],
    ["a string", '"abc"'],
    ["no name", '{"subject_id": "123"}'],
    ["a numeric name", '{"name": 42}'],
    ["an empty name", '{"name": ""}'],
  ])("should return null for %s", (_label, content) => {
    expect(extractDescriptorName(content, ctx)).toBe(null);
  });
});

describe("resolveName", () => {
  let client: FakePipelineService;
  let logger: RecordingLogger;

  function buildContext(overrides: Partial<CapturedDataAssetSettings> = {}): NamingContext {
    return {
      settings: buildCaptureSettings(overrides),
      runParams: buildRunParams({ dataAssets: [{ id: "raw-1" }] }),
      computation: { id: "comp-1", state: "completed" },
      client,
      now: () => FIXED_NOW,
      logger,
    };
  }

  beforeEach(() => {
    client = new FakePipelineService();
    client.dataAssets["raw-1"] = {
      id: "raw-1",
      name: "raw-ecephys",
      mount: "ecephys",
      state: "ready",
    };
    logger = createRecordingLogger();
  });

  describe("explicit name", () => {
    it("should return the explicit name unmodified, whatever the data description says", async () => {
      client.resultFiles["data_description.json"] = JSON.stringify({ name: VALID_DERIVED_NAME });

      await expect(resolveName(buildContext({ name: "run-42" }))).resolves.toBe("run-42");
      expect(client.calls).toEqual([]);
    });

    it("should not validate the explicit name against the naming convention", async () => {
      await expect(resolveName(buildContext({ name: "not_matching_pattern" }))).resolves.toBe(
        "not_matching_pattern",
      );
    });
  });

  describe("data description", () => {
    it("should use a name that follows the derived naming convention", async () => {
      client.resultFiles["data_description.json"] = JSON.stringify({ name: VALID_DERIVED_NAME });

      await expect(resolveName(buildContext())).resolves.toBe(VALID_DERIVED_NAME);
      expect(client.callsTo("downloadResultFile")).toEqual([
        { method: "downloadResultFile", computationId: "comp-1", path: "data_description.json" },
      ]);
      expect(client.callsTo("getDataAsset")).toEqual([]);
    });

    it("should fall through to the default name when the pattern does not match", async () => {
      client.resultFiles["data_description.json"] = JSON.stringify({
        name: "not_matching_pattern",
      });

      await expect(resolveName(buildContext())).resolves.toBe(
        "raw-ecephys_processed_2024-01-01_10-00-00",
      );
      expect(logger.messages("warn")).toEqual([
        "Name in data description does not match naming convention, ignoring",
      ]);
    });

    it("should fall through when the file is not valid JSON", async () => {
      client.resultFiles["data_description.json"] = "{ truncated";

      await expect(resolveName(buildContext())).resolves.toBe(
        "raw-ecephys_processed_2024-01-01_10-00-00",
      );
    });

    it("should not download anything when the file is absent", async () => {
      client.resultFiles["output.nwb"] = "binary";

      await expect(resolveName(buildContext())).resolves.toBe(
        "raw-ecephys_processed_2024-01-01_10-00-00",
      );
      expect(client.callsTo("downloadResultFile")).toEqual([]);
    });

    it("should look for a configured filename", async () => {
      client.resultFiles["data_description.json"] = JSON.stringify({ name: "ignored" });
      client.resultFiles["metadata/description.json"] = JSON.stringify({
        name: VALID_DERIVED_NAME,
      });

      await expect(
        resolveName(buildContext({ dataDescriptionFilename: "metadata/description.json" })),
      ).resolves.toBe(VALID_DERIVED_NAME);
    });

    it("should skip the lookup entirely when no filename is configured", async () => {
      await expect(
        resolveName(buildContext({ dataDescriptionFilename: undefined })),
      ).resolves.toBe("raw-ecephys_processed_2024-01-01_10-00-00");
      expect(client.callsTo("listResultFiles")).toEqual([]);
    });
  });

  describe("default name", () => {
    it("should prefer a configured input data name over looking one up", async () => {
      await expect(
        resolveName(buildContext({ inputDataName: "ecephys_123456_2023-12-31_08-00-00" })),
      ).resolves.toBe("ecephys_123456_2023-12-31_08-00-00_processed_2024-01-01_10-00-00");
      expect(client.callsTo("getDataAsset")).toEqual([]);
    });

    it("should apply the configured suffix and time zone", async () => {
      await expect(
        resolveName(
          buildContext({ processNameSuffix: "sorted", processNameSuffixTz: "America/New_York" }),
        ),
      ).resolves.toBe("raw-ecephys_sorted_2024-01-01_05-00-00");
    });

    it("should look up only the first input data asset", async () => {
      const ctx = buildContext();
      ctx.runParams = buildRunParams({ dataAssets: [{ id: "raw-1" }, { id: "raw-2" }] });

      await resolveName(ctx);
      expect(client.callsTo("getDataAsset")).toEqual([
        { method: "getDataAsset", dataAssetId: "raw-1" },
      ]);
    });

    it("should propagate a failed input lookup", async () => {
      const ctx = buildContext();
      ctx.runParams = buildRunParams({ dataAssets: [{ id: "missing" }] });

      await expect(resolveName(ctx)).rejects.toBeInstanceOf(RemoteFailureError);
    });
  });

  describe("failure", () => {
    it("should raise NameResolutionError when no strategy yields a name", async () => {
      const ctx = buildContext();
      ctx.runParams = buildRunParams({ dataAssets: [] });

      await expect(resolveName(ctx)).rejects.toBeInstanceOf(NameResolutionError);
    });

    it("should raise when the data description name is rejected and there is no input", async () => {
      client.resultFiles["data_description.json"] = JSON.stringify({ name: "bad name" });
      const ctx = buildContext();
      ctx.runParams = buildRunParams({ dataAssets: [] });

      await expect(resolveName(ctx)).rejects.toThrow("Unable to construct data asset name.");
    });
  });

  describe("strategy order", () => {
    it("should evaluate strategies left to right and stop at the first name", async () => {
      const visited: string[] = [];
      const track = (label: string, result: string | null): NameStrategy => ({
        label,
        tryResolve: async () => {
          visited.push(label);
          return result;
        },
      });

      const name = await resolveName(buildContext(), [
        track("first", null),
        track("second", "picked"),
        track("third", "never"),
      ]);

      expect(name).toBe("picked");
      expect(visited).toEqual(["first", "second"]);
    });

    it("should expose each built-in strategy on its own", async () => {
      const ctx = buildContext();
      await expect(explicitNameStrategy.tryResolve(ctx)).resolves.toBe(null);
      await expect(dataDescriptionStrategy.tryResolve(ctx)).resolves.toBe(null);
      await expect(defaultNameStrategy.tryResolve(ctx)).resolves.toBe(
        "raw-ecephys_processed_2024-01-01_10-00-00",
      );
    });
  });
});
