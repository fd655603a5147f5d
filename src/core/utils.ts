/**
 * Core Utilities for cmdcore
 *
 * These are pure utility functions used across the core.
 * Output formatting is handled by the reporter and adapters, not here.
 */

import type { ArgDescriptor } from "./types.js";

// ============================================================================
// Error Handling
// ============================================================================

export type CoreErrorCode =
  | "USAGE"
  | "STATE_CONFLICT"
  | "BUILD_TOOL"
  | "INTERNAL"
  | "CONFIG_INVALID"
  | "NOT_FOUND";

export class CoreError extends Error {
  constructor(
    message: string,
    public code: CoreErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "CoreError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  try {
    return String(err);
  } catch {
    // Objects without a prototype, or with a throwing toString
    return "unknown error";
  }
}

// ============================================================================
// Tokens
// ============================================================================

/**
 * Split a raw console line on whitespace, dropping empty tokens.
 */
export function tokenize(line: string): string[] {
  return line.split(/\s+/).filter((token) => token.length > 0);
}

// ============================================================================
// Argument Specs
// ============================================================================

/**
 * Build argument descriptors from their display form.
 *
 * @example
 * args("<delay>", "<command>", "[arguments]")
 */
export function args(...specs: string[]): ArgDescriptor[] {
  return specs.map((spec) => {
    const required = spec.match(/^<([^<>[\]\s]+)>$/);
    if (required) {
      return { name: required[1], required: true };
    }
    const optional = spec.match(/^\[([^<>[\]\s]+)\]$/);
    if (optional) {
      return { name: optional[1], required: false };
    }
    throw new CoreError(`Invalid argument spec: ${spec}`, "USAGE", { spec });
  });
}

export function formatArgSpec(spec: readonly ArgDescriptor[]): string {
  return spec.map((arg) => (arg.required ? `<${arg.name}>` : `[${arg.name}]`)).join(" ");
}

export function requiredCount(spec: readonly ArgDescriptor[]): number {
  return spec.filter((arg) => arg.required).length;
}

// ============================================================================
// String Helpers
// ============================================================================

/**
 * Code-unit order, independent of locale
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * "a, b and c"
 */
export function joinWithAnd(items: readonly string[]): string {
  if (items.length <= 1) return items.join("");
  return `${items.slice(0, -1).join(", ")} and ${items[items.length - 1]}`;
}
