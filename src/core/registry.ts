/**
 * Sub-Command Registry
 *
 * Maps sub-command names to handlers with their declared argument specs.
 * Registering an existing name replaces the previous entry, so later
 * plugins can override built-ins. Enumeration is always sorted by name.
 *
 * Not synchronized: callers share one instance on a single command pump.
 */

import type { CommandEntry, CommandHandler, RegisterOptions } from "./types.js";
import { CoreError, compareNames } from "./utils.js";
import { dispatchTokens } from "./dispatcher.js";

export class SubCommandRegistry {
  private entries = new Map<string, CommandEntry>();

  /**
   * @param command - Word the registry is invoked under, used in usage lines
   * @param prefix - Label prepended to every message from this registry
   * @param description - One-line summary shown when the registry is nested
   */
  constructor(
    readonly command: string,
    readonly prefix: string,
    readonly description: string
  ) {}

  register(name: string, handler: CommandHandler, options: RegisterOptions = {}): void {
    validateName(name);
    this.entries.set(name, {
      name,
      handler,
      args: options.args ?? [],
      description: options.description ?? "",
    });
  }

  /**
   * Mount another registry under `name`. The remaining tokens are
   * dispatched into the child registry.
   */
  registerTree(name: string, tree: SubCommandRegistry): void {
    validateName(name);
    this.entries.set(name, {
      name,
      handler: (tokens, ctx) =>
        dispatchTokens(tree, tokens, {
          path: [...ctx.path, name],
          sink: ctx.reporter.sink,
          debug: ctx.reporter.debug,
        }),
      args: [],
      description: tree.description,
      tree,
    });
  }

  unregister(name: string): void {
    this.entries.delete(name);
  }

  lookup(name: string): CommandEntry | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort(compareNames);
  }

  /**
   * Entries in name order
   */
  list(): CommandEntry[] {
    return this.names().flatMap((name) => {
      const entry = this.entries.get(name);
      return entry ? [entry] : [];
    });
  }

  get size(): number {
    return this.entries.size;
  }
}

function validateName(name: string): void {
  if (name.length === 0 || /\s/.test(name)) {
    throw new CoreError(`Invalid sub-command name: "${name}"`, "USAGE", { name });
  }
}
