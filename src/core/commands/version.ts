/**
 * Version Command
 */

import { SubCommandRegistry } from "../registry.js";
import { formatVersion } from "../reporter.js";
import { CoreServices } from "./services.js";

export function registerVersionCommand(registry: SubCommandRegistry, services: CoreServices): void {
  registry.register(
    "version",
    (_args, ctx) => {
      ctx.reporter.report(formatVersion(services.config.core.title, services.version));
    },
    { description: "Display version information." }
  );
}
