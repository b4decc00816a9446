/**
 * Pipeline domain types: computations, data assets and permissions
 *
 * These are the normalized (camelCase) shapes the orchestrator works with.
 * Wire shapes for the Code Ocean API live in "@/types/clients/codeOcean".
 */

/**
 * Lifecycle state of a computation (one pipeline run)
 * Terminal states: "completed", "failed"
 */
export type ComputationState =
  | "initializing"
  | "running"
  | "finalizing"
  | "completed"
  | "failed";

/**
 * Handle on a submitted computation
 */
export type Computation = {
  id: string;
  state: ComputationState;
  name?: string;
  /** Creation time, seconds since epoch */
  created?: number;
  /** Run time in seconds */
  runTime?: number;
  endStatus?: string;
  hasResults?: boolean;
};

/**
 * Lifecycle state of a data asset
 * Terminal states: "ready", "failed"
 */
export type DataAssetState = "draft" | "ready" | "failed";

/**
 * Handle on a data asset
 */
export type DataAsset = {
  id: string;
  name: string;
  mount: string;
  state: DataAssetState;
};

/**
 * Data asset attached to a run as input
 */
export type DataAssetAttachment = {
  id: string;
  mount?: string;
};

export type NamedParameter = {
  paramName: string;
  value: string;
};

/**
 * Parameters to start a pipeline (or capsule) run
 * Exactly what is submitted; never mutated after validation.
 */
export type RunParams = {
  pipelineId?: string;
  capsuleId?: string;
  version?: number;
  dataAssets: readonly DataAssetAttachment[];
  parameters?: readonly string[];
  namedParameters?: readonly NamedParameter[];
};

export type AwsS3Target = {
  bucket: string;
  prefix: string;
};

/**
 * External storage target for a captured data asset
 */
export type Target = {
  aws: AwsS3Target;
};

/**
 * Free-form metadata blocks passed through to the service verbatim
 */
export type CustomMetadata = Readonly<Record<string, unknown>>;
export type ResultsInfo = Readonly<Record<string, unknown>>;

export type UserRole = "owner" | "editor" | "viewer";
export type GroupRole = "owner" | "editor" | "viewer" | "discoverable";
export type EveryoneRole = "viewer" | "discoverable" | "none";

export type UserPermissions = {
  email: string;
  role: UserRole;
};

export type GroupPermissions = {
  group: string;
  role: GroupRole;
};

/**
 * Access control applied to a data asset once it is ready
 */
export type Permissions = {
  users?: readonly UserPermissions[];
  groups?: readonly GroupPermissions[];
  everyone?: EveryoneRole;
  shareAssets?: boolean;
};

/**
 * Source of a captured data asset: always the computation that produced it
 */
export type DataAssetSource = {
  computation: {
    id: string;
  };
};

/**
 * Fully resolved request to create the captured data asset
 */
export type DataAssetParams = {
  name: string;
  mount: string;
  description?: string;
  tags: readonly string[];
  source: DataAssetSource;
  target?: Target;
  customMetadata?: CustomMetadata;
  resultsInfo?: ResultsInfo;
};

/**
 * Options for the blocking status waits
 */
export type WaitOptions = {
  /** Stops polling before the next status read or during the poll interval */
  signal?: AbortSignal;
};
