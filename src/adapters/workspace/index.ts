/**
 * Workspace Adapter Exports
 */

// Interfaces
export type { PackageCatalog, PluginManager, CreditsStore } from "./types.js";

// Filesystem implementations
export { FileSystemCatalog, YamlCreditsStore, CREDITS_FILE } from "./filesystem.js";
export { ManifestPluginManager, MANIFEST_FILE } from "./plugins.js";
