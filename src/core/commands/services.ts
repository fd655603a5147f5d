/**
 * Collaborators shared by the built-in sub-commands
 */

import type { ResolvedConfig } from "../config.js";
import type { LifecycleEngine } from "../lifecycle.js";
import type { CreditsStore, PackageCatalog, PluginManager } from "../../adapters/workspace/types.js";
import type { CommandHost, Scheduler } from "../../adapters/host/types.js";

export interface CoreServices {
  config: ResolvedConfig;
  version: string;
  lifecycle: LifecycleEngine;
  catalog: PackageCatalog;
  plugins: PluginManager;
  credits: CreditsStore;
  scheduler: Scheduler;
  host: CommandHost;
}
