/**
 * Job settings constants
 */

import type { Permissions } from "@/types";

/**
 * Environment variable holding the settings document as a JSON string
 */
export const JOB_SETTINGS_ENV = "JOB_SETTINGS";

/**
 * Environment variable holding a path to the settings JSON file
 * Used only when JOB_SETTINGS is unset.
 */
export const JOB_SETTINGS_FILE_ENV = "JOB_SETTINGS_FILE";

/**
 * Permissions applied to a captured asset when none are configured
 */
export const DEFAULT_CAPTURE_PERMISSIONS: Permissions = {
  everyone: "viewer",
};

export const USER_ROLES = ["owner", "editor", "viewer"] as const;
export const GROUP_ROLES = ["owner", "editor", "viewer", "discoverable"] as const;
export const EVERYONE_ROLES = ["viewer", "discoverable", "none"] as const;
