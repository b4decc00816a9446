/**
 * Name resolution type definitions
 */

import type { PipelineServiceClient } from "@/interfaces";
import type { Logger } from "./logger";
import type { Computation, RunParams } from "./pipeline";
import type { CapturedDataAssetSettings } from "./settings";

/**
 * Everything a naming strategy may look at
 */
export type NamingContext = {
  settings: CapturedDataAssetSettings;
  runParams: RunParams;
  /** The completed computation whose results are being captured */
  computation: Computation;
  client: PipelineServiceClient;
  now: () => Date;
  logger: Logger;
};

/**
 * One source of a data asset name
 * Returns null when it has nothing usable; remote errors propagate.
 */
export interface NameStrategy {
  readonly label: string;
  tryResolve(ctx: NamingContext): Promise<string | null>;
}
