import { describe, it, expect, beforeEach, vi } from "vitest";
import { SubCommandRegistry } from "../registry.js";
import { dispatch, dispatchTokens } from "../dispatcher.js";
import { RULE } from "../reporter.js";
import { DispatchContext } from "../types.js";
import { args } from "../utils.js";
import { MemorySink } from "./test-helpers.js";

describe("dispatch", () => {
  let registry: SubCommandRegistry;
  let sink: MemorySink;

  beforeEach(() => {
    registry = new SubCommandRegistry("core", "[Core] ", "Core base command.");
    sink = new MemorySink();
    registry.register("version", (_args, ctx) => ctx.reporter.info("Current Core version: 1.2.3"), {
      description: "Display version information.",
    });
  });

  const HELP =
    "[Core] Help:\n" +
    "usage: core <command> [arguments]\n" +
    `${RULE}\n` +
    "\n" +
    "version                     Display version information.\n" +
    RULE;

  // ==========================================================================
  // Resolution
  // ==========================================================================

  describe("resolution", () => {
    it("should invoke the handler with the remaining tokens", async () => {
      const handler = vi.fn();
      registry.register("echo", handler, { args: args("<text>", "[more]") });

      await dispatch(registry, "echo hello world", { sink });

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler.mock.calls[0][0]).toEqual(["hello", "world"]);
    });

    it("should collapse runs of whitespace between tokens", async () => {
      const handler = vi.fn();
      registry.register("docs", handler, { args: args("<action>", "<package>") });

      await dispatch(registry, "  docs   create \t core  ", { sink });

      expect(handler.mock.calls[0][0]).toEqual(["create", "core"]);
    });

    it("should pass the registry, path and a prefixed reporter", async () => {
      const seen: DispatchContext[] = [];
      registry.register("inspect", (_args, ctx) => {
        seen.push(ctx);
      });

      await dispatchTokens(registry, ["inspect"], { sink });

      expect(seen).toHaveLength(1);
      expect(seen[0].name).toBe("inspect");
      expect(seen[0].registry).toBe(registry);
      expect(seen[0].path).toEqual(["core"]);
      expect(seen[0].reporter.prefix).toBe("[Core] ");
    });

    it("should write handler output through the sink", async () => {
      await dispatch(registry, "version", { sink });

      expect(sink.entries).toEqual([{ level: "info", message: "[Core] Current Core version: 1.2.3" }]);
    });
  });

  // ==========================================================================
  // Rejections
  // ==========================================================================

  describe("rejections", () => {
    it("should report a missing sub-command followed by help", async () => {
      await dispatch(registry, "   ", { sink });

      expect(sink.entries).toEqual([
        { level: "error", message: "[Core] No sub-command given." },
        { level: "info", message: HELP },
      ]);
    });

    it("should report an unknown sub-command followed by help", async () => {
      await dispatch(registry, "bogus", { sink });

      expect(sink.entries).toEqual([
        { level: "error", message: '[Core] Invalid sub-command: "bogus".' },
        { level: "info", message: HELP },
      ]);
    });

    it("should be case-sensitive", async () => {
      await dispatch(registry, "VERSION", { sink });

      expect(sink.entries[0].message).toBe('[Core] Invalid sub-command: "VERSION".');
    });

    it("should report usage and skip the handler when required args are missing", async () => {
      const handler = vi.fn();
      registry.register("docs", handler, { args: args("<action>", "<package>") });

      await dispatch(registry, "docs create", { sink });

      expect(handler).not.toHaveBeenCalled();
      expect(sink.entries).toEqual([
        {
          level: "error",
          message: '[Core] Invalid arguments for "docs". Usage: core docs <action> <package>',
        },
      ]);
    });

    it("should not count optional args as required", async () => {
      const handler = vi.fn();
      registry.register("delay", handler, { args: args("<delay>", "<command>", "[arguments]") });

      await dispatch(registry, "delay 5 core", { sink });

      expect(handler.mock.calls[0][0]).toEqual(["5", "core"]);
    });

    it("should pass extra tokens through", async () => {
      const handler = vi.fn();
      registry.register("load", handler, { args: args("<plugin>") });

      await dispatch(registry, "load one two", { sink });

      expect(handler.mock.calls[0][0]).toEqual(["one", "two"]);
    });
  });

  // ==========================================================================
  // Internal errors
  // ==========================================================================

  describe("internal errors", () => {
    it("should report a thrown error without rejecting", async () => {
      registry.register("boom", () => {
        throw new Error("kaboom");
      });

      await expect(dispatch(registry, "boom", { sink })).resolves.toBeUndefined();
      expect(sink.entries).toEqual([
        { level: "error", message: '[Core] An internal error occurred while running "core boom": kaboom' },
      ]);
    });

    it("should report a rejected promise", async () => {
      registry.register("later", async () => {
        throw new Error("async failure");
      });

      await dispatch(registry, "later", { sink });

      expect(sink.messages()).toEqual([
        '[Core] An internal error occurred while running "core later": async failure',
      ]);
    });

    it("should report non-Error throws", async () => {
      registry.register("odd", () => {
        throw "plain string";
      });

      await dispatch(registry, "odd", { sink });

      expect(sink.messages()).toEqual([
        '[Core] An internal error occurred while running "core odd": plain string',
      ]);
    });

    it("should report a thrown value that cannot be stringified", async () => {
      registry.register("boom", () => {
        throw Object.create(null);
      });

      await expect(dispatch(registry, "boom", { sink, debug: true })).resolves.toBeUndefined();
      expect(sink.entries).toEqual([
        { level: "error", message: '[Core] An internal error occurred while running "core boom": unknown error' },
      ]);
    });

    it("should add the stack trace as a detail line in debug mode", async () => {
      const failure = new Error("kaboom");
      registry.register("boom", () => {
        throw failure;
      });

      await dispatch(registry, "boom", { sink, debug: true });

      expect(sink.entries).toHaveLength(2);
      expect(sink.entries[1]).toEqual({ level: "dim", message: failure.stack });
    });

    it("should keep dispatching after a failure", async () => {
      registry.register("boom", () => {
        throw new Error("kaboom");
      });

      await dispatch(registry, "boom", { sink });
      await dispatch(registry, "version", { sink });

      expect(sink.entries).toHaveLength(2);
      expect(sink.messages()[1]).toBe("[Core] Current Core version: 1.2.3");
      expect(registry.names()).toEqual(["boom", "version"]);
    });
  });

  // ==========================================================================
  // Help fallback
  // ==========================================================================

  describe("help fallback", () => {
    it("should list registered names in sorted order for an unregistered name", async () => {
      const plain = new SubCommandRegistry("core", "[Core] ", "");
      for (const name of ["alpha", "zulu", "mu"]) {
        plain.register(name, () => {});
      }

      await dispatch(plain, "list", { sink });

      expect(sink.messages()).toEqual([
        '[Core] Invalid sub-command: "list".',
        `[Core] Help:\nusage: core <command> [arguments]\n${RULE}\n\nalpha\nmu\nzulu\n${RULE}`,
      ]);
    });

    it("should track registrations and removals", async () => {
      const plain = new SubCommandRegistry("core", "", "");
      plain.register("mu", () => {});
      plain.register("alpha", () => {});
      plain.register("zulu", () => {});
      plain.unregister("alpha");
      plain.register("mu", () => {});

      await dispatch(plain, "", { sink });

      expect(plain.names()).toEqual(["mu", "zulu"]);
      expect(sink.messages()[1]).toContain(`\n\nmu\nzulu\n${RULE}`);
    });
  });

  // ==========================================================================
  // Nested registries
  // ==========================================================================

  describe("nested registries", () => {
    let auth: SubCommandRegistry;

    beforeEach(() => {
      auth = new SubCommandRegistry("auth", "[Auth] ", "Authentication commands.");
      registry.registerTree("auth", auth);
    });

    it("should forward remaining tokens to the child registry", async () => {
      const seen: Array<{ tokens: readonly string[]; path: string[] }> = [];
      auth.register(
        "login",
        (tokens, ctx) => {
          seen.push({ tokens, path: ctx.path });
        },
        { args: args("<user>") }
      );

      await dispatch(registry, "auth login test-user", { sink });

      expect(seen).toEqual([{ tokens: ["test-user"], path: ["core", "auth"] }]);
    });

    it("should report usage with the full command path", async () => {
      auth.register("login", vi.fn(), { args: args("<user>") });

      await dispatch(registry, "auth login", { sink });

      expect(sink.messages()).toEqual([
        '[Auth] Invalid arguments for "login". Usage: core auth login <user>',
      ]);
    });

    it("should print the child's help when no sub-command follows", async () => {
      auth.register("logout", vi.fn(), { description: "End the session." });

      await dispatch(registry, "auth", { sink });

      expect(sink.entries).toEqual([
        { level: "error", message: "[Auth] No sub-command given." },
        {
          level: "info",
          message:
            "[Auth] Help:\n" +
            "usage: core auth <command> [arguments]\n" +
            `${RULE}\n` +
            "\n" +
            "logout                      End the session.\n" +
            RULE,
        },
      ]);
    });

    it("should pass debug mode to the child registry", async () => {
      auth.register("fail", () => {
        throw new Error("nested");
      });

      await dispatch(registry, "auth fail", { sink, debug: true });

      expect(sink.entries[0].message).toBe(
        '[Auth] An internal error occurred while running "core auth fail": nested'
      );
      expect(sink.entries[1].level).toBe("dim");
    });
  });
});
