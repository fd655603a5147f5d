/**
 * Help Command
 */

import { SubCommandRegistry } from "../registry.js";
import { formatHelp } from "../reporter.js";

export function registerHelpCommand(registry: SubCommandRegistry): void {
  registry.register(
    "help",
    (_args, ctx) => {
      ctx.reporter.report(formatHelp(ctx.registry, ctx.path));
    },
    { description: "Print all sub-commands." }
  );
}
