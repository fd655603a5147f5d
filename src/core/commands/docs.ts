/**
 * Docs Command
 *
 * `docs <action> <package>`: routes create, generate and build to the
 * lifecycle engine after resolving the package's category.
 */

import { classify, rejectionMessage } from "../categories.js";
import { DiagnosticReporter } from "../reporter.js";
import { SubCommandRegistry } from "../registry.js";
import { LifecycleAction } from "../schemas.js";
import { CommandResult } from "../types.js";
import { TransitionData } from "../lifecycle.js";
import { args, joinWithAnd } from "../utils.js";
import { CoreServices } from "./services.js";

/**
 * Run one documentation action and report its outcome.
 * Returns null when the action or package was rejected.
 */
export async function docsHandler(
  services: CoreServices,
  reporter: DiagnosticReporter,
  action: string,
  packageName: string
): Promise<CommandResult<TransitionData> | null> {
  const parsed = LifecycleAction.safeParse(action);
  if (!parsed.success) {
    reporter.error(
      `Invalid action: "${action}". Valid actions are: ${joinWithAnd(LifecycleAction.options)}`
    );
    return null;
  }

  const coreName = services.config.core.name;
  const category = await classify(packageName, coreName, services.catalog);
  if (!category) {
    reporter.error(rejectionMessage(packageName, coreName));
    return null;
  }

  const { lifecycle } = services;
  const result = await lifecycle.run(parsed.data, lifecycle.unit(category, packageName));
  reporter.result(result);
  return result;
}

export function registerDocsCommand(registry: SubCommandRegistry, services: CoreServices): void {
  registry.register(
    "docs",
    async ([action, packageName], ctx) => {
      await docsHandler(services, ctx.reporter, action, packageName);
    },
    {
      args: args("<action>", "<package>"),
      description: "Create, generate or build a documentation project.",
    }
  );
}
