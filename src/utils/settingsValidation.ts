/**
 * Settings validation module
 *
 * Turns an untrusted settings document (parsed JSON, snake_case or camelCase
 * keys) into a frozen PipelineMonitorSettings with defaults filled in.
 *
 * Enforces:
 * - run_params present, with a pipeline_id or capsule_id
 * - no empty strings in name-like fields
 * - known permission roles
 * - a name regex that compiles and a time zone Intl knows
 *
 * Validation is fail-fast: throws on first error with the field path.
 */

import type {
  CapturedDataAssetSettings,
  DataAssetAttachment,
  EveryoneRole,
  GroupPermissions,
  GroupRole,
  NamedParameter,
  Permissions,
  PipelineMonitorSettings,
  RunParams,
  Target,
  UserPermissions,
  UserRole,
} from "@/types";
import {
  DEFAULT_CAPTURE_PERMISSIONS,
  DEFAULT_DATA_DESCRIPTION_FILENAME,
  DEFAULT_PROCESS_NAME_SUFFIX,
  DEFAULT_PROCESS_NAME_SUFFIX_TZ,
  DERIVED_NAME_REGEX,
  EVERYONE_ROLES,
  GROUP_ROLES,
  USER_ROLES,
} from "@/constants";
import { SettingsValidationError } from "@/errors";
import { isValidTimeZone } from "@/naming";

type RawObject = Record<string, unknown>;

function isRecord(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

/**
 * Read a field by its camelCase name, falling back to snake_case
 */
function field(obj: RawObject, camelKey: string): unknown {
  if (camelKey in obj) {
    return obj[camelKey];
  }
  return obj[toSnakeCase(camelKey)];
}

function hasField(obj: RawObject, camelKey: string): boolean {
  return camelKey in obj || toSnakeCase(camelKey) in obj;
}

function expectRecord(value: unknown, fieldPath: string): RawObject {
  if (!isRecord(value)) {
    throw new SettingsValidationError(`${fieldPath} must be an object`);
  }
  return value;
}

function expectNonEmptyString(value: unknown, fieldPath: string): string {
  if (typeof value !== "string") {
    throw new SettingsValidationError(
      `${fieldPath} must be a string, got ${value === null ? "null" : typeof value}`,
    );
  }
  if (value.trim().length === 0) {
    throw new SettingsValidationError(`${fieldPath} cannot be empty or whitespace-only`);
  }
  return value;
}

/**
 * null and undefined both mean "not set"
 */
function optionalString(value: unknown, fieldPath: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return expectNonEmptyString(value, fieldPath);
}

function optionalStringArray(value: unknown, fieldPath: string): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new SettingsValidationError(`${fieldPath} must be an array`);
  }
  return value.map((item, index) => {
    if (typeof item !== "string") {
      throw new SettingsValidationError(`${fieldPath}[${index}] must be a string`);
    }
    return item;
  });
}

function optionalRecord(value: unknown, fieldPath: string): RawObject | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return { ...expectRecord(value, fieldPath) };
}

function optionalArray(value: unknown, fieldPath: string): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new SettingsValidationError(`${fieldPath} must be an array`);
  }
  return value;
}

function expectOneOf<T extends string>(
  value: unknown,
  allowed: readonly T[],
  fieldPath: string,
): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new SettingsValidationError(
      `${fieldPath} must be one of ${allowed.join(", ")}, got ${JSON.stringify(value)}`,
    );
  }
  return match;
}

function validateVersion(value: unknown, fieldPath: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new SettingsValidationError(`${fieldPath} must be a positive integer`);
  }
  return value;
}

function validateDataAssets(value: unknown, fieldPath: string): DataAssetAttachment[] {
  return optionalArray(value, fieldPath).map((item, index) => {
    const path = `${fieldPath}[${index}]`;
    const raw = expectRecord(item, path);
    return {
      id: expectNonEmptyString(raw.id, `${path}.id`),
      mount: optionalString(raw.mount, `${path}.mount`),
    };
  });
}

function validateNamedParameters(
  value: unknown,
  fieldPath: string,
): NamedParameter[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return optionalArray(value, fieldPath).map((item, index) => {
    const path = `${fieldPath}[${index}]`;
    const raw = expectRecord(item, path);
    const paramValue = field(raw, "value");
    if (typeof paramValue !== "string") {
      throw new SettingsValidationError(`${path}.value must be a string`);
    }
    return {
      paramName: expectNonEmptyString(field(raw, "paramName"), `${path}.param_name`),
      value: paramValue,
    };
  });
}

/**
 * Validates run parameters.
 *
 * @throws {SettingsValidationError} If neither pipeline_id nor capsule_id is set
 */
function validateRunParams(value: unknown, fieldPath = "run_params"): RunParams {
  const raw = expectRecord(value, fieldPath);

  const pipelineId = optionalString(field(raw, "pipelineId"), `${fieldPath}.pipeline_id`);
  const capsuleId = optionalString(field(raw, "capsuleId"), `${fieldPath}.capsule_id`);
  if (pipelineId === undefined && capsuleId === undefined) {
    throw new SettingsValidationError(`${fieldPath} requires pipeline_id or capsule_id`);
  }

  return {
    pipelineId,
    capsuleId,
    version: validateVersion(raw.version, `${fieldPath}.version`),
    dataAssets: validateDataAssets(field(raw, "dataAssets"), `${fieldPath}.data_assets`),
    parameters: optionalStringArray(raw.parameters, `${fieldPath}.parameters`),
    namedParameters: validateNamedParameters(
      field(raw, "namedParameters"),
      `${fieldPath}.named_parameters`,
    ),
  };
}

function validateTarget(value: unknown, fieldPath: string): Target | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const raw = expectRecord(value, fieldPath);
  const aws = expectRecord(raw.aws, `${fieldPath}.aws`);
  const prefix = aws.prefix;
  if (prefix !== undefined && prefix !== null && typeof prefix !== "string") {
    throw new SettingsValidationError(`${fieldPath}.aws.prefix must be a string`);
  }
  return {
    aws: {
      bucket: expectNonEmptyString(aws.bucket, `${fieldPath}.aws.bucket`),
      // Replaced by the resolved name when the asset is created
      prefix: typeof prefix === "string" ? prefix : "",
    },
  };
}

/**
 * Validates permissions. Missing permissions get the default (everyone: viewer).
 */
function validatePermissions(value: unknown, fieldPath = "permissions"): Permissions {
  if (value === undefined || value === null) {
    return { ...DEFAULT_CAPTURE_PERMISSIONS };
  }
  const raw = expectRecord(value, fieldPath);

  const users: UserPermissions[] = optionalArray(raw.users, `${fieldPath}.users`).map(
    (item, index) => {
      const path = `${fieldPath}.users[${index}]`;
      const user = expectRecord(item, path);
      return {
        email: expectNonEmptyString(user.email, `${path}.email`),
        role: expectOneOf<UserRole>(user.role, USER_ROLES, `${path}.role`),
      };
    },
  );

  const groups: GroupPermissions[] = optionalArray(raw.groups, `${fieldPath}.groups`).map(
    (item, index) => {
      const path = `${fieldPath}.groups[${index}]`;
      const group = expectRecord(item, path);
      return {
        group: expectNonEmptyString(group.group, `${path}.group`),
        role: expectOneOf<GroupRole>(group.role, GROUP_ROLES, `${path}.role`),
      };
    },
  );

  const everyone =
    raw.everyone === undefined || raw.everyone === null
      ? undefined
      : expectOneOf<EveryoneRole>(raw.everyone, EVERYONE_ROLES, `${fieldPath}.everyone`);

  const shareAssets = field(raw, "shareAssets");
  if (shareAssets !== undefined && shareAssets !== null && typeof shareAssets !== "boolean") {
    throw new SettingsValidationError(`${fieldPath}.share_assets must be a boolean`);
  }

  return {
    users: users.length > 0 ? users : undefined,
    groups: groups.length > 0 ? groups : undefined,
    everyone,
    shareAssets: typeof shareAssets === "boolean" ? shareAssets : undefined,
  };
}

function validateNameRegex(value: unknown, fieldPath: string): string {
  if (value === undefined || value === null) {
    return DERIVED_NAME_REGEX;
  }
  const pattern = expectNonEmptyString(value, fieldPath);
  try {
    new RegExp(pattern);
  } catch (regexError) {
    throw new SettingsValidationError(`${fieldPath} is not a valid regular expression`, {
      cause: regexError,
    });
  }
  return pattern;
}

function validateTimeZone(value: unknown, fieldPath: string): string {
  if (value === undefined || value === null) {
    return DEFAULT_PROCESS_NAME_SUFFIX_TZ;
  }
  const timeZone = expectNonEmptyString(value, fieldPath);
  if (!isValidTimeZone(timeZone)) {
    throw new SettingsValidationError(`${fieldPath} is not a known time zone: ${timeZone}`);
  }
  return timeZone;
}

/**
 * An explicit null disables the data description lookup; absent means the default file
 */
function validateDataDescriptionFilename(raw: RawObject, fieldPath: string): string | undefined {
  if (!hasField(raw, "dataDescriptionFilename")) {
    return DEFAULT_DATA_DESCRIPTION_FILENAME;
  }
  return optionalString(field(raw, "dataDescriptionFilename"), fieldPath);
}

/**
 * Validates capture settings.
 */
function validateCapturedDataAssetParams(
  value: unknown,
  fieldPath = "captured_data_asset_params",
): CapturedDataAssetSettings {
  const raw = expectRecord(value, fieldPath);

  if (raw.source !== undefined && raw.source !== null) {
    throw new SettingsValidationError(
      `${fieldPath}.source cannot be set; the source is always the pipeline run`,
    );
  }

  const suffix = field(raw, "processNameSuffix");

  return {
    name: optionalString(raw.name, `${fieldPath}.name`),
    mount: optionalString(raw.mount, `${fieldPath}.mount`),
    inputDataName: optionalString(field(raw, "inputDataName"), `${fieldPath}.input_data_name`),
    processNameSuffix:
      suffix === undefined || suffix === null
        ? DEFAULT_PROCESS_NAME_SUFFIX
        : expectNonEmptyString(suffix, `${fieldPath}.process_name_suffix`),
    processNameSuffixTz: validateTimeZone(
      field(raw, "processNameSuffixTz"),
      `${fieldPath}.process_name_suffix_tz`,
    ),
    dataDescriptionFilename: validateDataDescriptionFilename(
      raw,
      `${fieldPath}.data_description_filename`,
    ),
    nameRegex: validateNameRegex(field(raw, "nameRegex"), `${fieldPath}.name_regex`),
    description: optionalString(raw.description, `${fieldPath}.description`),
    tags: optionalStringArray(raw.tags, `${fieldPath}.tags`) ?? [],
    customMetadata: optionalRecord(field(raw, "customMetadata"), `${fieldPath}.custom_metadata`),
    target: validateTarget(raw.target, `${fieldPath}.target`),
    resultsInfo: optionalRecord(field(raw, "resultsInfo"), `${fieldPath}.results_info`),
    permissions: validatePermissions(raw.permissions, `${fieldPath}.permissions`),
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
}

/**
 * Validates a settings document and returns it frozen, defaults filled in.
 *
 * @param raw - Parsed JSON settings
 * @throws {SettingsValidationError} On the first invalid field
 */
export function parseSettings(raw: unknown): PipelineMonitorSettings {
  const root = expectRecord(raw, "settings");

  if (!hasField(root, "runParams")) {
    throw new SettingsValidationError("run_params is required");
  }

  const capture = field(root, "capturedDataAssetParams");

  return deepFreeze({
    runParams: validateRunParams(field(root, "runParams")),
    capturedDataAssetParams:
      capture === undefined || capture === null
        ? undefined
        : validateCapturedDataAssetParams(capture),
  });
}
