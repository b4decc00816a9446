/**
 * Pipeline monitor entrypoint: start a pipeline, wait for it, capture the results
 *
 * Usage:
 *   npm start
 *
 * Environment variables:
 *   - CODEOCEAN_DOMAIN: Code Ocean deployment URL (e.g. https://codeocean.example.org)
 *   - CODEOCEAN_API_TOKEN: Code Ocean API token
 *   - JOB_SETTINGS: Settings document as a JSON string, or
 *   - JOB_SETTINGS_FILE: Path to the settings JSON file
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 *
 * Exit code 0 when every requested step finished, 1 otherwise.
 */

import "dotenv/config";
import { CodeOceanClient } from "./clients/codeOcean";
import { PipelineMonitorError } from "./errors";
import { runJob } from "./monitor";
import { loadSettingsFromEnv } from "./settings";
import * as logger from "./logger";

async function main(): Promise<void> {
  const settings = loadSettingsFromEnv();
  const client = new CodeOceanClient();

  // Ctrl-C stops the run at the next step boundary or backoff
  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Received SIGINT, aborting run");
    controller.abort();
  });

  const log = logger.withContext({
    pipelineId: settings.runParams.pipelineId,
    capsuleId: settings.runParams.capsuleId,
  });

  await runJob(settings, client, { signal: controller.signal, logger: log });
}

main()
  .then(() => {
    process.exit(0);
  })
  .catch((error: unknown) => {
    logger.error("Pipeline monitor job failed", {
      kind: error instanceof PipelineMonitorError ? error.kind : "UNEXPECTED",
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  });
