/**
 * Credits Command
 */

import { SubCommandRegistry } from "../registry.js";
import { formatCredits } from "../reporter.js";
import { CoreServices } from "./services.js";

export function registerCreditsCommand(registry: SubCommandRegistry, services: CoreServices): void {
  registry.register(
    "credits",
    async (_args, ctx) => {
      const groups = await services.credits.read();
      ctx.reporter.report(formatCredits(ctx.registry.prefix, groups));
    },
    { description: "List all credits." }
  );
}
