/**
 * Job settings type definitions
 *
 * Produced once by parseSettings() and handed to the orchestrator frozen.
 */

import type {
  CustomMetadata,
  Permissions,
  ResultsInfo,
  RunParams,
  Target,
} from "./pipeline";

/**
 * How (and whether) to capture the run's results as a data asset
 */
export type CapturedDataAssetSettings = {
  /** Explicit asset name. Always wins over any derived name. */
  name?: string;
  /** Mount point. Defaults to the resolved name. */
  mount?: string;
  /** Input name for the default "{input}_{suffix}_{timestamp}" name */
  inputDataName?: string;
  processNameSuffix: string;
  /** IANA time zone used for the default name's timestamp */
  processNameSuffixTz: string;
  /**
   * Result file holding a JSON document with a `name` field.
   * Undefined disables the lookup.
   */
  dataDescriptionFilename?: string;
  /** Pattern a name read from the data description must match */
  nameRegex: string;
  description?: string;
  tags: readonly string[];
  customMetadata?: CustomMetadata;
  /** Bucket is used as given; the prefix is always replaced by the name */
  target?: Target;
  resultsInfo?: ResultsInfo;
  permissions: Permissions;
};

/**
 * Settings to start a pipeline, monitor it and optionally capture its results
 */
export type PipelineMonitorSettings = {
  runParams: RunParams;
  /** Absent means results are not captured */
  capturedDataAssetParams?: CapturedDataAssetSettings;
};
