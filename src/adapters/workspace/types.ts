/**
 * Workspace Interfaces
 *
 * Collaborators the core reads from but does not own: the package and
 * plugin directories, the plugin loader, and the credits store.
 */

import type { CommandResult, CreditGroups, LoadedPlugin } from "../../core/types.js";

/**
 * Enumerates the names known under the custom package and plugin roots.
 */
export interface PackageCatalog {
  /**
   * Entries of the custom packages root, by name without extension.
   */
  customPackages(): Promise<string[]>;

  /**
   * Subdirectories of the plugins root.
   */
  plugins(): Promise<string[]>;
}

/**
 * Tracks which plugins are loaded.
 * Loading and unloading report their outcome instead of throwing.
 */
export interface PluginManager {
  isLoaded(name: string): boolean;

  /**
   * Loaded plugins in load order
   */
  loaded(): LoadedPlugin[];

  load(name: string): Promise<CommandResult<LoadedPlugin>>;

  unload(name: string): Promise<CommandResult<string>>;
}

/**
 * Grouped name → role pairs, read once per credits report.
 */
export interface CreditsStore {
  read(): Promise<CreditGroups>;
}
