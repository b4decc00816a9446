/**
 * Data asset name resolution: first strategy to produce a name wins
 */

import type { NameStrategy, NamingContext } from "@/types";
import { NameResolutionError } from "@/errors";
import {
  dataDescriptionStrategy,
  defaultNameStrategy,
  explicitNameStrategy,
} from "./strategies";

const DEFAULT_NAME_STRATEGIES: readonly NameStrategy[] = [
  explicitNameStrategy,
  dataDescriptionStrategy,
  defaultNameStrategy,
];

/**
 * Resolve the captured asset's name
 *
 * @throws {NameResolutionError} If every strategy comes back empty
 */
export async function resolveName(
  ctx: NamingContext,
  strategies: readonly NameStrategy[] = DEFAULT_NAME_STRATEGIES,
): Promise<string> {
  for (const strategy of strategies) {
    const name = await strategy.tryResolve(ctx);
    if (name) {
      ctx.logger.info("Resolved data asset name", { name, strategy: strategy.label });
      return name;
    }
  }

  throw new NameResolutionError();
}
