/**
 * Delay Command
 *
 * Runs a console line on the host after a number of seconds.
 */

import { SubCommandRegistry } from "../registry.js";
import { args } from "../utils.js";
import { CoreServices } from "./services.js";

/**
 * Parse a delay token as a non-negative number of seconds.
 */
export function parseDelay(token: string): number | null {
  if (!/^\d+(\.\d+)?$|^\.\d+$/.test(token)) return null;
  const seconds = Number(token);
  return Number.isFinite(seconds) ? seconds : null;
}

export function registerDelayCommand(registry: SubCommandRegistry, services: CoreServices): void {
  registry.register(
    "delay",
    ([delay, ...rest], ctx) => {
      const seconds = parseDelay(delay);
      if (seconds === null) {
        ctx.reporter.error(`Invalid delay: "${delay}". The delay must be a number of seconds.`);
        return;
      }

      const line = rest.join(" ");
      services.scheduler.schedule(seconds, () => services.host.execute(line));
      ctx.reporter.info(`Executing "${line}" in ${seconds} second(s).`);
    },
    {
      args: args("<delay>", "<command>", "[arguments]"),
      description: "Execute a command after the given delay.",
    }
  );
}
