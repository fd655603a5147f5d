/**
 * Diagnostic Reporter
 *
 * Pure formatters for the framed reports (help, plugin listing, credits,
 * version) plus a small reporter that writes messages to an OutputSink.
 *
 * Every framed report follows the same layout:
 * ```
 * <prefix><title>
 * =============================================================
 *
 * <records, blank-line delimited>
 * =============================================================
 * ```
 */

import type {
  CommandResult,
  CreditGroups,
  DisplayValue,
  LoadedPlugin,
  MessageLevel,
  OutputSink,
} from "./types.js";
import type { SubCommandRegistry } from "./registry.js";
import { compareNames, formatArgSpec } from "./utils.js";

export const RULE = "=".repeat(61);

const HELP_COLUMN = 28;
const CREDITS_COLUMN = 20;

// ============================================================================
// Reporter
// ============================================================================

export class DiagnosticReporter {
  constructor(
    readonly sink: OutputSink,
    readonly prefix: string,
    readonly debug = false
  ) {}

  info(text: string): void {
    this.write(text, "info");
  }

  success(text: string): void {
    this.write(text, "success");
  }

  warning(text: string): void {
    this.write(text, "warning");
  }

  error(text: string): void {
    this.write(text, "error");
  }

  /**
   * Secondary detail line, written without the prefix
   */
  detail(text: string): void {
    this.sink.write(text, "dim");
  }

  /**
   * A framed report that already carries its prefix
   */
  report(block: string): void {
    this.sink.write(block, "info");
  }

  /**
   * Write the operator-facing message of an operation result
   */
  result(result: CommandResult): void {
    switch (result.status) {
      case "success":
        this.success(result.message);
        break;
      case "skipped":
        this.warning(result.message);
        break;
      case "error":
        this.error(result.message);
        if (result.error !== result.message) {
          this.detail(`  Reason: ${result.error}`);
        }
        break;
    }
  }

  private write(text: string, level: MessageLevel): void {
    this.sink.write(this.prefix + text, level);
  }
}

// ============================================================================
// Formatters
// ============================================================================

function frame(prefix: string, title: string, body: string): string {
  return `${prefix}${title}\n${RULE}\n\n${body}${RULE}`;
}

/**
 * Help listing for a registry, one line per sub-command in name order
 */
export function formatHelp(registry: SubCommandRegistry, path: readonly string[]): string {
  const usage = `usage: ${path.join(" ")} <command> [arguments]`;

  let body = "";
  for (const entry of registry.list()) {
    let text = entry.name;
    if (entry.tree) {
      text += " <command> [arguments]";
    } else if (entry.args.length > 0) {
      text += ` ${formatArgSpec(entry.args)}`;
    }
    body += `${text.padEnd(HELP_COLUMN)}${entry.description}`.trimEnd() + "\n";
  }

  return frame(registry.prefix, `Help:\n${usage}`, body);
}

export function formatDisplayValue(value: DisplayValue): string {
  switch (value.kind) {
    case "plain":
      return value.value;
    case "setting":
      return `${value.name}:\n\t\t\t${value.helpText}: ${value.value}`;
  }
}

/**
 * Listing of loaded plugins, sorted by name, with their info items
 */
export function formatPluginListing(prefix: string, plugins: readonly LoadedPlugin[]): string {
  const sorted = [...plugins].sort((a, b) => compareNames(a.name, b.name));

  let body = "";
  for (const plugin of sorted) {
    if (plugin.info) {
      body += `${plugin.name}:\n`;
      for (const [item, value] of plugin.info.items) {
        body += `\t${item}:\n\t\t${formatDisplayValue(value)}\n`;
      }
    } else {
      body += `${plugin.name}\n`;
    }
    body += "\n";
  }

  return frame(prefix, "Plugins", body);
}

export function formatCredits(prefix: string, groups: CreditGroups): string {
  let body = "";
  for (const { group, entries } of groups) {
    body += `\t${group}:\n`;
    for (const [name, role] of entries) {
      body += `\t\t${name.padEnd(CREDITS_COLUMN)}${role}\n`;
    }
    body += "\n";
  }

  return `${frame(prefix, "Credits", body)}\n\n`;
}

export function formatVersion(title: string, version: string): string {
  return `Current ${title} version: ${version}`;
}
