/**
 * Settings builders for tests: defaults match what parseSettings fills in
 */

import type {
  CapturedDataAssetSettings,
  PipelineMonitorSettings,
  RunParams,
} from "@/types";
import {
  DEFAULT_DATA_DESCRIPTION_FILENAME,
  DEFAULT_PROCESS_NAME_SUFFIX,
  DEFAULT_PROCESS_NAME_SUFFIX_TZ,
  DERIVED_NAME_REGEX,
} from "@/constants";

export function buildRunParams(overrides: Partial<RunParams> = {}): RunParams {
  return {
    pipelineId: "pipeline-abc-123",
    version: 2,
    dataAssets: [{ id: "input-asset-1", mount: "ecephys" }],
    ...overrides,
  };
}

export function buildCaptureSettings(
  overrides: Partial<CapturedDataAssetSettings> = {},
): CapturedDataAssetSettings {
  return {
    processNameSuffix: DEFAULT_PROCESS_NAME_SUFFIX,
    processNameSuffixTz: DEFAULT_PROCESS_NAME_SUFFIX_TZ,
    dataDescriptionFilename: DEFAULT_DATA_DESCRIPTION_FILENAME,
    nameRegex: DERIVED_NAME_REGEX,
    tags: [],
    permissions: { everyone: "viewer" },
    ...overrides,
  };
}

export function buildSettings(
  capture?: CapturedDataAssetSettings,
  runParams: RunParams = buildRunParams(),
): PipelineMonitorSettings {
  return { runParams, capturedDataAssetParams: capture };
}
