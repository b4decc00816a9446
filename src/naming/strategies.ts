/**
 * Naming strategies for the captured data asset
 *
 * Each strategy returns a name or null. Null means "nothing usable here,
 * ask the next one"; remote errors are not caught and abort resolution.
 */

import type { NameStrategy, NamingContext } from "@/types";
import { formatNameTimestamp } from "./timestamp";

/**
 * The name given directly in the capture settings
 */
export const explicitNameStrategy: NameStrategy = {
  label: "explicit",
  async tryResolve(ctx: NamingContext): Promise<string | null> {
    return ctx.settings.name ?? null;
  },
};

/**
 * Pull the `name` field out of a data description document
 * Returns null for anything that is not a JSON object with a non-empty string name.
 */
export function extractDescriptorName(
  content: string,
  ctx: Pick<NamingContext, "logger">,
): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (parseError) {
    ctx.logger.warn("Data description is not valid JSON, ignoring", {
      error: parseError instanceof Error ? parseError.message : String(parseError),
    });
    return null;
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return null;
  }

  const name = "name" in parsed ? parsed.name : undefined;
  return typeof name === "string" && name.length > 0 ? name : null;
}

/**
 * The name recorded in the data description file among the results
 *
 * A name that does not follow the derived naming convention is dropped with
 * a warning; resolution then moves on to the default name.
 */
export const dataDescriptionStrategy: NameStrategy = {
  label: "data_description",
  async tryResolve(ctx: NamingContext): Promise<string | null> {
    const filename = ctx.settings.dataDescriptionFilename;
    if (!filename) {
      return null;
    }

    const files = await ctx.client.listResultFiles(ctx.computation.id);
    if (!files.includes(filename)) {
      ctx.logger.debug("No data description among results", {
        computationId: ctx.computation.id,
        filename,
      });
      return null;
    }

    const content = await ctx.client.downloadResultFile(ctx.computation.id, filename);
    const name = extractDescriptorName(content, ctx);
    if (name === null) {
      return null;
    }

    if (!new RegExp(ctx.settings.nameRegex).test(name)) {
      ctx.logger.warn("Name in data description does not match naming convention, ignoring", {
        name,
        pattern: ctx.settings.nameRegex,
      });
      return null;
    }

    return name;
  },
};

/**
 * Name of the run's input data
 * Explicit setting first, otherwise the first attached data asset as the service names it.
 */
async function resolveInputDataName(ctx: NamingContext): Promise<string | null> {
  if (ctx.settings.inputDataName) {
    return ctx.settings.inputDataName;
  }

  const [firstInput] = ctx.runParams.dataAssets;
  if (!firstInput) {
    return null;
  }

  const dataAsset = await ctx.client.getDataAsset(firstInput.id);
  return dataAsset.name || null;
}

/**
 * "{input name}_{suffix}_{YYYY-MM-DD_HH-MM-SS}"
 */
export const defaultNameStrategy: NameStrategy = {
  label: "default",
  async tryResolve(ctx: NamingContext): Promise<string | null> {
    const inputDataName = await resolveInputDataName(ctx);
    if (inputDataName === null) {
      return null;
    }

    const timestamp = formatNameTimestamp(ctx.now(), ctx.settings.processNameSuffixTz);
    return `${inputDataName}_${ctx.settings.processNameSuffix}_${timestamp}`;
  },
};
