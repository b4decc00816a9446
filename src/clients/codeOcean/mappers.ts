/**
 * Code Ocean payload mappers: wire (snake_case) ↔ domain (camelCase)
 *
 * Inbound mappers return null when a required field is missing or a state
 * is unknown; the client turns that into a RemoteFailureError.
 */

import type {
  Computation,
  ComputationState,
  DataAsset,
  DataAssetParams,
  DataAssetState,
  Permissions,
  RunParams,
} from "@/types";
import type {
  CodeOceanComputation,
  CodeOceanDataAsset,
  CodeOceanDataAssetParams,
  CodeOceanFolder,
  CodeOceanPermissions,
  CodeOceanRunParams,
} from "@/types/clients/codeOcean";

const COMPUTATION_STATES: readonly ComputationState[] = [
  "initializing",
  "running",
  "finalizing",
  "completed",
  "failed",
];

const DATA_ASSET_STATES: readonly DataAssetState[] = ["draft", "ready", "failed"];

function isComputationState(value: string | undefined): value is ComputationState {
  return COMPUTATION_STATES.some((state) => state === value);
}

function isDataAssetState(value: string | undefined): value is DataAssetState {
  return DATA_ASSET_STATES.some((state) => state === value);
}

export function mapComputation(raw: CodeOceanComputation | undefined): Computation | null {
  if (!raw?.id || !isComputationState(raw.state)) {
    return null;
  }
  return {
    id: raw.id,
    state: raw.state,
    name: raw.name,
    created: raw.created,
    runTime: raw.run_time,
    endStatus: raw.end_status,
    hasResults: raw.has_results,
  };
}

export function mapDataAsset(raw: CodeOceanDataAsset | undefined): DataAsset | null {
  if (!raw?.id || !isDataAssetState(raw.state)) {
    return null;
  }
  return {
    id: raw.id,
    name: raw.name ?? "",
    mount: raw.mount ?? "",
    state: raw.state,
  };
}

/**
 * Paths of the plain files in a results folder listing
 */
export function mapResultFilePaths(raw: CodeOceanFolder | undefined): string[] {
  const paths: string[] = [];
  for (const item of raw?.items ?? []) {
    if (item.type === "file" && item.path) {
      paths.push(item.path);
    }
  }
  return paths;
}

export function toCodeOceanRunParams(params: RunParams): CodeOceanRunParams {
  return {
    capsule_id: params.capsuleId,
    pipeline_id: params.pipelineId,
    version: params.version,
    data_assets: params.dataAssets.map((asset) => ({
      id: asset.id,
      mount: asset.mount,
    })),
    parameters: params.parameters ? [...params.parameters] : undefined,
    named_parameters: params.namedParameters?.map((param) => ({
      param_name: param.paramName,
      value: param.value,
    })),
  };
}

export function toCodeOceanDataAssetParams(params: DataAssetParams): CodeOceanDataAssetParams {
  return {
    name: params.name,
    description: params.description,
    mount: params.mount,
    tags: [...params.tags],
    source: { computation: { id: params.source.computation.id } },
    target: params.target
      ? { aws: { bucket: params.target.aws.bucket, prefix: params.target.aws.prefix } }
      : undefined,
    custom_metadata: params.customMetadata ? { ...params.customMetadata } : undefined,
    results_info: params.resultsInfo ? { ...params.resultsInfo } : undefined,
  };
}

export function toCodeOceanPermissions(permissions: Permissions): CodeOceanPermissions {
  return {
    users: permissions.users?.map((user) => ({ email: user.email, role: user.role })),
    groups: permissions.groups?.map((group) => ({ group: group.group, role: group.role })),
    everyone: permissions.everyone,
    share_assets: permissions.shareAssets,
  };
}
