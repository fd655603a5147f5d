/**
 * Core Types for cmdcore
 *
 * These types define the interface between the dispatch core and adapters.
 * Handlers write through a DiagnosticReporter; adapters decide how the
 * resulting text reaches the operator.
 */

import type { DiagnosticReporter } from "./reporter.js";
import type { SubCommandRegistry } from "./registry.js";

// ============================================================================
// Output
// ============================================================================

/**
 * Severity of a single message written to an output sink
 */
export type MessageLevel = "info" | "success" | "warning" | "error" | "dim";

/**
 * Receives one formatted string per message or report.
 * The core never writes to the console itself.
 */
export interface OutputSink {
  write(message: string, level: MessageLevel): void;
}

// ============================================================================
// Commands
// ============================================================================

/**
 * A declared positional argument. Rendered as `<name>` when required
 * and `[name]` when optional or variadic.
 */
export interface ArgDescriptor {
  name: string;
  required: boolean;
}

/**
 * Everything a handler needs while it runs
 */
export interface DispatchContext {
  /** Name the handler was registered under */
  name: string;

  /** Registry the handler was found in */
  registry: SubCommandRegistry;

  /** Command words leading to this registry, e.g. ["core"] or ["core", "auth"] */
  path: string[];

  reporter: DiagnosticReporter;
}

/**
 * A sub-command routine. Receives the raw tokens after the sub-command name.
 */
export type CommandHandler = (
  args: readonly string[],
  ctx: DispatchContext
) => void | Promise<void>;

/**
 * One registered sub-command
 */
export interface CommandEntry {
  name: string;
  handler: CommandHandler;
  args: ArgDescriptor[];
  description: string;

  /** Set when the entry forwards to a nested registry */
  tree?: SubCommandRegistry;
}

export interface RegisterOptions {
  args?: ArgDescriptor[];
  description?: string;
}

// ============================================================================
// Display Values
// ============================================================================

/**
 * A value shown in a plugin listing.
 * A setting is a named configuration entry with help text.
 */
export type DisplayValue =
  | { kind: "plain"; value: string }
  | { kind: "setting"; name: string; helpText: string; value: string };

export interface PluginInfo {
  /** Ordered item name → value pairs */
  items: Array<[string, DisplayValue]>;
}

export interface LoadedPlugin {
  name: string;
  info: PluginInfo | null;
}

/**
 * Ordered group name → (name → role) pairs
 */
export type CreditGroups = Array<{ group: string; entries: Array<[string, string]> }>;

// ============================================================================
// Command Result Types
// ============================================================================

/**
 * Status of an operation.
 * "skipped" is a reported no-op (already exists, does not exist yet).
 */
export type CommandStatus = "success" | "skipped" | "error";

export interface SuccessResult<T> {
  status: "success";
  data: T;
  message: string;
  error?: undefined;
  errorCode?: undefined;
}

export interface SkippedResult<T> {
  status: "skipped";
  data: T;
  message: string;
  error?: undefined;
  errorCode?: undefined;
}

export interface ErrorResult {
  status: "error";
  data: null;
  message: string;
  error: string;
  errorCode: string;
}

/**
 * The result of an operation - discriminated union by status
 */
export type CommandResult<T = unknown> = SuccessResult<T> | SkippedResult<T> | ErrorResult;

// ============================================================================
// Helper Functions
// ============================================================================

export function success<T>(data: T, message: string): SuccessResult<T> {
  return { status: "success", data, message };
}

export function skipped<T>(data: T, message: string): SkippedResult<T> {
  return { status: "skipped", data, message };
}

/**
 * Create an error result.
 * `message` is what the operator sees; `error` carries the underlying reason.
 */
export function error(message: string, code: string, reason?: string): ErrorResult {
  return {
    status: "error",
    data: null,
    message,
    error: reason ?? message,
    errorCode: code,
  };
}
