/**
 * Dispatcher
 *
 * Resolves the first token of a line against a registry and invokes the
 * handler with the remaining tokens. Nothing a handler throws reaches the
 * caller: every outcome, including internal failures, ends up as text on
 * the sink.
 */

import type { OutputSink } from "./types.js";
import type { SubCommandRegistry } from "./registry.js";
import { DiagnosticReporter, formatHelp } from "./reporter.js";
import { errorMessage, formatArgSpec, requiredCount, tokenize } from "./utils.js";

export interface DispatchOptions {
  sink: OutputSink;

  /** Command words leading to the registry. Defaults to [registry.command]. */
  path?: string[];

  /** Write stack traces of internal errors */
  debug?: boolean;
}

/**
 * Dispatch a raw console line.
 */
export async function dispatch(
  registry: SubCommandRegistry,
  rawLine: string,
  options: DispatchOptions
): Promise<void> {
  await dispatchTokens(registry, tokenize(rawLine), options);
}

/**
 * Dispatch an already tokenized argument list. The first token names the
 * sub-command.
 */
export async function dispatchTokens(
  registry: SubCommandRegistry,
  tokens: readonly string[],
  options: DispatchOptions
): Promise<void> {
  const path = options.path ?? [registry.command];
  const reporter = new DiagnosticReporter(options.sink, registry.prefix, options.debug ?? false);

  if (tokens.length === 0) {
    reporter.error("No sub-command given.");
    reporter.report(formatHelp(registry, path));
    return;
  }

  const [name, ...rest] = tokens;
  const entry = registry.lookup(name);

  if (!entry) {
    reporter.error(`Invalid sub-command: "${name}".`);
    reporter.report(formatHelp(registry, path));
    return;
  }

  // Extra tokens are passed through; handlers decide whether to reject them
  if (rest.length < requiredCount(entry.args)) {
    const usage = [...path, name, formatArgSpec(entry.args)].join(" ");
    reporter.error(`Invalid arguments for "${name}". Usage: ${usage}`);
    return;
  }

  try {
    await entry.handler(rest, { name, registry, path, reporter });
  } catch (err) {
    reporter.error(
      `An internal error occurred while running "${[...path, name].join(" ")}": ${errorMessage(err)}`
    );
    if (reporter.debug && err instanceof Error && err.stack) {
      reporter.detail(err.stack);
    }
  }
}
