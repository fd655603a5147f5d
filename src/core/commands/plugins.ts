/**
 * Plugin Commands
 *
 * load, unload, reload and list. Loading itself is the plugin manager's job.
 */

import { SubCommandRegistry } from "../registry.js";
import { formatPluginListing } from "../reporter.js";
import { args } from "../utils.js";
import { CoreServices } from "./services.js";

export function registerPluginCommands(registry: SubCommandRegistry, services: CoreServices): void {
  registry.register(
    "load",
    async ([name], ctx) => {
      ctx.reporter.result(await services.plugins.load(name));
    },
    { args: args("<plugin>"), description: "Load a plugin." }
  );

  registry.register(
    "unload",
    async ([name], ctx) => {
      ctx.reporter.result(await services.plugins.unload(name));
    },
    { args: args("<plugin>"), description: "Unload a plugin." }
  );

  registry.register(
    "reload",
    async ([name], ctx) => {
      if (services.plugins.isLoaded(name)) {
        const unloaded = await services.plugins.unload(name);
        ctx.reporter.result(unloaded);
        if (unloaded.status === "error") {
          return;
        }
      }
      ctx.reporter.result(await services.plugins.load(name));
    },
    { args: args("<plugin>"), description: "Reload a plugin." }
  );

  registry.register(
    "list",
    (_args, ctx) => {
      ctx.reporter.report(formatPluginListing(ctx.registry.prefix, services.plugins.loaded()));
    },
    { description: "List all currently loaded plugins." }
  );
}
