/**
 * cmdcore
 *
 * Main export for the sub-command dispatch core.
 */

// Engine
export { CoreEngine, createEngine } from "./engine.js";
export type { CoreEngineOptions, CreateEngineOptions } from "./engine.js";

// Registry and dispatch
export { SubCommandRegistry } from "./registry.js";
export { dispatch, dispatchTokens } from "./dispatcher.js";
export type { DispatchOptions } from "./dispatcher.js";

// Reporting
export {
  DiagnosticReporter,
  RULE,
  formatHelp,
  formatPluginListing,
  formatCredits,
  formatVersion,
  formatDisplayValue,
} from "./reporter.js";

// Documentation lifecycle
export { classify, rejectionMessage } from "./categories.js";
export { LifecycleEngine, observeState, stampVersionLines } from "./lifecycle.js";
export type { DocumentableUnit, TransitionData, LifecycleEngineOptions } from "./lifecycle.js";

// Configuration
export { loadConfig, resolveConfig, unitPaths, CONFIG_FILE } from "./config.js";
export type { ResolvedConfig, UnitPaths } from "./config.js";
export { readPackageInfo } from "./package-info.js";

// Types
export type {
  ArgDescriptor,
  CommandEntry,
  CommandHandler,
  CommandResult,
  CommandStatus,
  CreditGroups,
  DispatchContext,
  DisplayValue,
  LoadedPlugin,
  MessageLevel,
  OutputSink,
  PluginInfo,
  RegisterOptions,
} from "./types.js";
export { success, skipped, error } from "./types.js";

// Schemas
export { Category, ProjectState, LifecycleAction, ConfigSchema } from "./schemas.js";
export type { Config } from "./schemas.js";

// Utils
export { CoreError, args, formatArgSpec, tokenize } from "./utils.js";
export type { CoreErrorCode } from "./utils.js";

// Commands
export * as commands from "./commands/index.js";
