/**
 * Built-in sub-commands
 */

import { SubCommandRegistry } from "../registry.js";
import { registerCreditsCommand } from "./credits.js";
import { registerDelayCommand } from "./delay.js";
import { registerDocsCommand } from "./docs.js";
import { registerDumpCommand } from "./dump.js";
import { registerHelpCommand } from "./help.js";
import { registerPluginCommands } from "./plugins.js";
import { registerVersionCommand } from "./version.js";
import { CoreServices } from "./services.js";

export type { CoreServices } from "./services.js";
export { docsHandler } from "./docs.js";
export { parseDelay } from "./delay.js";
export { DUMPS, describeCommands } from "./dump.js";

export function registerBuiltins(registry: SubCommandRegistry, services: CoreServices): void {
  registerPluginCommands(registry, services);
  registerDelayCommand(registry, services);
  registerDumpCommand(registry, services);
  registerVersionCommand(registry, services);
  registerCreditsCommand(registry, services);
  registerHelpCommand(registry);
  registerDocsCommand(registry, services);
}
