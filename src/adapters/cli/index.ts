#!/usr/bin/env node
/**
 * cmdcore CLI - Console host for the sub-command core
 *
 * Usage:
 *   cmdcore <sub-command> [args...]     - Run one sub-command line
 *   cmdcore --console                   - Read lines from stdin
 *   cmdcore --root <dir> docs create core
 */

import * as readline from "readline";
import { createEngine } from "../../core/engine.js";
import { errorMessage } from "../../core/utils.js";
import { ConsoleHost, TimerScheduler } from "../host/index.js";
import { TerminalSink, output } from "./formatter.js";
import { parseArgs, stringFlag } from "./args.js";

// ============================================================================
// Help System
// ============================================================================

function showHelp(): void {
  output.header("cmdcore");

  output.subheader("Usage:");
  output.plain("  cmdcore [options] <sub-command> [arguments]");
  output.plain("  cmdcore [options] --console");
  output.blank();

  output.subheader("Options:");
  output.plain("  --root <dir>       Directory the configured paths are relative to");
  output.plain("  --config <file>    Configuration file (default: cmdcore.yaml)");
  output.plain("  --console          Read command lines from stdin until 'exit'");
  output.plain("  --help, -h         Show this help");
  output.blank();

  output.subheader("Examples:");
  output.plain("  cmdcore help                      List sub-commands");
  output.plain("  cmdcore docs create core          Create the core documentation project");
  output.plain("  cmdcore load my_plugin            Load a plugin");
  output.plain("  cmdcore delay 5 core version      Print the version in five seconds");
  output.blank();
}

// ============================================================================
// Console
// ============================================================================

function runConsole(host: ConsoleHost, onClose: () => void): Promise<void> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    output.info("Type a command line, or 'exit' to quit.");

    rl.on("line", (line) => {
      if (line.trim() === "exit") {
        rl.close();
        return;
      }
      host.execute(line).catch((err: unknown) => output.error(errorMessage(err)));
    });

    rl.on("close", () => {
      onClose();
      resolve();
    });
  });
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.flags.help || args.flags.h) {
    showHelp();
    return;
  }

  const sink = new TerminalSink();
  const host = new ConsoleHost(sink);
  const scheduler = new TimerScheduler((err) => output.error(errorMessage(err)));

  const engine = await createEngine({
    rootDir: stringFlag(args.flags.root),
    configFile: stringFlag(args.flags.config),
    sink,
    host,
    scheduler,
  });
  engine.attach();

  if (args.flags.console) {
    await runConsole(host, () => {
      scheduler.clear();
      engine.detach();
    });
    return;
  }

  await host.execute([engine.config.command, ...args.tokens].join(" "));
}

main().catch((err: unknown) => {
  output.error(errorMessage(err));
  if (process.env.DEBUG && err instanceof Error) {
    console.error(err.stack);
  }
  process.exit(1);
});
