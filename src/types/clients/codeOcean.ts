/**
 * Code Ocean API wire types (v1)
 *
 * Raw snake_case payloads as sent and received over HTTP. Only the fields
 * the pipeline monitor reads or writes are declared; everything else is
 * ignored by the mappers.
 */

export interface CodeOceanComputation {
  id?: string;
  created?: number;
  name?: string;
  run_time?: number;
  state?: string;
  end_status?: string;
  has_results?: boolean;
}

export interface CodeOceanDataAsset {
  id?: string;
  created?: number;
  name?: string;
  mount?: string;
  state?: string;
  type?: string;
  description?: string;
  tags?: string[];
}

export interface CodeOceanDataAssetAttachment {
  id: string;
  mount?: string;
}

export interface CodeOceanNamedParameter {
  param_name: string;
  value: string;
}

export interface CodeOceanRunParams {
  capsule_id?: string;
  pipeline_id?: string;
  version?: number;
  data_assets?: CodeOceanDataAssetAttachment[];
  parameters?: string[];
  named_parameters?: CodeOceanNamedParameter[];
}

export interface CodeOceanDataAssetParams {
  name: string;
  description?: string;
  mount: string;
  tags: string[];
  source: {
    computation: {
      id: string;
    };
  };
  target?: {
    aws: {
      bucket: string;
      prefix: string;
    };
  };
  custom_metadata?: Record<string, unknown>;
  results_info?: Record<string, unknown>;
}

export interface CodeOceanFolderItem {
  name?: string;
  path?: string;
  type?: string;
  size?: number;
}

/**
 * Response of POST /computations/{id}/results
 */
export interface CodeOceanFolder {
  items?: CodeOceanFolderItem[];
}

/**
 * Response of GET /computations/{id}/results/download_url
 */
export interface CodeOceanDownloadUrl {
  url?: string;
}

export interface CodeOceanPermissions {
  users?: { email: string; role: string }[];
  groups?: { group: string; role: string }[];
  everyone?: string;
  share_assets?: boolean;
}
