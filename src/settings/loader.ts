/**
 * Settings loading: read the job settings document from the environment
 *
 * JOB_SETTINGS (inline JSON) takes precedence over JOB_SETTINGS_FILE (path).
 */

import * as fs from "fs";
import type { PipelineMonitorSettings } from "@/types";
import { JOB_SETTINGS_ENV, JOB_SETTINGS_FILE_ENV } from "@/constants";
import { SettingsValidationError } from "@/errors";
import { parseSettings } from "@/utils";
import * as logger from "@/logger";

function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (parseError) {
    throw new SettingsValidationError(`${source} is not valid JSON`, { cause: parseError });
  }
}

/**
 * Load and validate settings from environment variables
 *
 * @throws {SettingsValidationError} If neither variable is set, the JSON is
 *   malformed, or the document is invalid
 * @throws {Error} If JOB_SETTINGS_FILE cannot be read
 */
export function loadSettingsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): PipelineMonitorSettings {
  const inline = env[JOB_SETTINGS_ENV];
  if (inline) {
    logger.debug("Loading settings from environment", { variable: JOB_SETTINGS_ENV });
    return parseSettings(parseJson(inline, JOB_SETTINGS_ENV));
  }

  const filePath = env[JOB_SETTINGS_FILE_ENV];
  if (filePath) {
    logger.debug("Loading settings from file", { path: filePath });
    const content = fs.readFileSync(filePath, "utf-8");
    return parseSettings(parseJson(content, filePath));
  }

  throw new SettingsValidationError(
    `${JOB_SETTINGS_ENV} or ${JOB_SETTINGS_FILE_ENV} must be set`,
  );
}
