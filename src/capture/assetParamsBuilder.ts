/**
 * Assemble the creation request for the captured data asset
 *
 * Pure: same inputs, same output, no remote calls.
 */

import type {
  CapturedDataAssetSettings,
  Computation,
  DataAssetParams,
} from "@/types";

/**
 * Build DataAssetParams from capture settings, the resolved name and the
 * completed computation
 *
 * - mount defaults to the name
 * - a configured target keeps its bucket, its prefix is replaced by the name
 * - the source is always the computation, never a path
 */
export function buildDataAssetParams(
  settings: CapturedDataAssetSettings,
  name: string,
  computation: Pick<Computation, "id">,
): DataAssetParams {
  return {
    name,
    mount: settings.mount ?? name,
    description: settings.description,
    tags: [...settings.tags],
    source: { computation: { id: computation.id } },
    target: settings.target
      ? { aws: { bucket: settings.target.aws.bucket, prefix: name } }
      : undefined,
    customMetadata: settings.customMetadata,
    resultsInfo: settings.resultsInfo,
  };
}
