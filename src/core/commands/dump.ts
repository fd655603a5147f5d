/**
 * Dump Command
 *
 * Writes a snapshot of in-memory state to <logs>/<filename>.txt.
 */

import * as fs from "fs/promises";
import * as path from "path";
import YAML from "yaml";
import { SubCommandRegistry } from "../registry.js";
import { formatPluginListing } from "../reporter.js";
import { args, formatArgSpec } from "../utils.js";
import { CoreServices } from "./services.js";

type DumpWriter = (registry: SubCommandRegistry, services: CoreServices) => string;

export const DUMPS: Record<string, DumpWriter> = {
  commands: (registry) => describeCommands(registry, [registry.command]).join("\n") + "\n",
  config: (_registry, services) => YAML.stringify(services.config),
  plugins: (_registry, services) => formatPluginListing("", services.plugins.loaded()) + "\n",
};

/**
 * One line per sub-command, descending into nested registries.
 */
export function describeCommands(registry: SubCommandRegistry, path: string[]): string[] {
  return registry.list().flatMap((entry) => {
    if (entry.tree) {
      return describeCommands(entry.tree, [...path, entry.name]);
    }
    const usage = [...path, entry.name, formatArgSpec(entry.args)].join(" ").trimEnd();
    return [entry.description ? `${usage}\t${entry.description}` : usage];
  });
}

export function registerDumpCommand(registry: SubCommandRegistry, services: CoreServices): void {
  registry.register(
    "dump",
    async ([dumpType, filename], ctx) => {
      const writer = Object.hasOwn(DUMPS, dumpType) ? DUMPS[dumpType] : undefined;
      if (!writer) {
        ctx.reporter.error(`Invalid dump_type "${dumpType}". The valid types are:`);
        for (const type of Object.keys(DUMPS).sort()) {
          ctx.reporter.detail(`\t${type}`);
        }
        return;
      }

      if (path.basename(filename) !== filename || filename.startsWith(".")) {
        ctx.reporter.error(`Invalid filename: "${filename}".`);
        return;
      }

      const target = path.join(services.config.paths.logs, `${filename}.txt`);
      await fs.mkdir(services.config.paths.logs, { recursive: true });
      await fs.writeFile(target, writer(registry, services), "utf-8");
      ctx.reporter.success(`Dumped ${dumpType} to ${target}.`);
    },
    { args: args("<dump_type>", "<filename>"), description: "Dump data to the logs directory." }
  );
}
