/**
 * Console Host
 *
 * A minimal console command subsystem: top-level command names map to
 * callbacks that receive the remaining tokens. Executions are serialized,
 * so a delayed line never runs while another dispatch is in progress.
 */

import { CommandHost, TopLevelCommand } from "./types.js";
import { OutputSink } from "../../core/types.js";
import { errorMessage, tokenize } from "../../core/utils.js";

export class ConsoleHost implements CommandHost {
  private commands = new Map<string, TopLevelCommand>();
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly sink: OutputSink) {}

  registerCommand(name: string, command: TopLevelCommand): void {
    this.commands.set(name, command);
  }

  unregisterCommand(name: string): void {
    this.commands.delete(name);
  }

  commandNames(): string[] {
    return [...this.commands.keys()];
  }

  execute(line: string): Promise<void> {
    const run = this.queue.then(() => this.run(line));
    // The caller receives any rejection; the queue itself keeps going
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async run(line: string): Promise<void> {
    const tokens = tokenize(line);
    if (tokens.length === 0) {
      return;
    }

    const [name, ...rest] = tokens;

    const command = this.commands.get(name);
    if (!command) {
      this.sink.write(`Unknown command: ${name}`, "error");
      return;
    }

    try {
      await command(rest);
    } catch (err) {
      this.sink.write(`Command "${name}" failed: ${errorMessage(err)}`, "error");
    }
  }
}
