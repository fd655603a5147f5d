import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as path from "path";
import * as os from "os";
import { CoreEngine, createEngine } from "../engine.js";
import { SubCommandRegistry } from "../registry.js";
import { resolveConfig } from "../config.js";
import { args } from "../utils.js";
import { ConsoleHost } from "../../adapters/host/host.js";
import {
  ManualScheduler,
  MemorySink,
  TestContext,
  TEST_VERSION,
  cleanupTestContext,
  createTestContext,
} from "./test-helpers.js";

describe("CoreEngine", () => {
  let ctx: TestContext;

  describe("with default configuration", () => {
    beforeEach(async () => {
      ctx = await createTestContext();
    });

    afterEach(async () => {
      await cleanupTestContext(ctx);
    });

    it("should register the built-ins", () => {
      expect(ctx.engine.registry.names()).toEqual([
        "credits",
        "delay",
        "docs",
        "dump",
        "help",
        "list",
        "load",
        "reload",
        "unload",
        "version",
      ]);
    });

    it("should attach itself to the host under its command", () => {
      expect(ctx.host.commandNames()).toEqual(["core"]);
    });

    it("should stop receiving lines once detached", async () => {
      ctx.engine.detach();

      await ctx.host.execute("core version");

      expect(ctx.sink.entries).toEqual([{ level: "error", message: "Unknown command: core" }]);
    });

    it("should dispatch a line without the host", async () => {
      await ctx.engine.dispatch("version");

      expect(ctx.sink.messages()).toEqual([`Current Core version: ${TEST_VERSION}`]);
    });

    it("should let a later registration override a built-in", async () => {
      ctx.engine.register("version", (_args, c) => c.reporter.info("overridden"));

      await ctx.host.execute("core version");

      expect(ctx.sink.messages()).toEqual(["[Core] overridden"]);
    });

    it("should add and remove sub-commands at run time", async () => {
      ctx.engine.register("greet", ([name], c) => c.reporter.info(`Hello ${name}`), {
        args: args("<name>"),
        description: "Say hello.",
      });

      await ctx.host.execute("core greet test-user");
      ctx.engine.unregister("greet");
      await ctx.host.execute("core greet test-user");

      expect(ctx.sink.messages()[0]).toBe("[Core] Hello test-user");
      expect(ctx.sink.messages()[1]).toBe('[Core] Invalid sub-command: "greet".');
    });

    it("should mount a tree registered after construction", async () => {
      const auth = new SubCommandRegistry("auth", "[Auth] ", "Authentication commands.");
      auth.register("whoami", (_args, c) => c.reporter.info(c.path.join(" ")));
      ctx.engine.registerTree("auth", auth);

      await ctx.host.execute("core auth whoami");

      expect(ctx.sink.messages()).toEqual(["[Auth] core auth"]);
    });

    it("should serialize lines from the host", async () => {
      const order: string[] = [];
      ctx.engine.register("slow", async () => {
        await new Promise((resolve) => setTimeout(resolve, 20));
        order.push("slow");
      });
      ctx.engine.register("fast", () => {
        order.push("fast");
      });

      await Promise.all([ctx.host.execute("core slow"), ctx.host.execute("core fast")]);

      expect(order).toEqual(["slow", "fast"]);
    });
  });

  describe("with custom configuration", () => {
    beforeEach(async () => {
      ctx = await createTestContext({
        command: "engine",
        prefix: "[Engine] ",
        core: { name: "engine", title: "Engine" },
        debug: true,
      });
    });

    afterEach(async () => {
      await cleanupTestContext(ctx);
    });

    it("should use the configured command, title and prefix", async () => {
      await ctx.host.execute("engine version");
      await ctx.host.execute("engine");

      expect(ctx.host.commandNames()).toEqual(["engine"]);
      expect(ctx.sink.messages().slice(0, 2)).toEqual([
        `Current Engine version: ${TEST_VERSION}`,
        "[Engine] No sub-command given.",
      ]);
    });

    it("should use the configured core identifier for docs", async () => {
      await ctx.host.execute("engine docs create core");
      await ctx.host.execute("engine docs create engine");

      expect(ctx.sink.messages()).toEqual([
        '[Engine] "core" is not engine, a custom package or a plugin.',
        "[Engine] Documentation project has been created for Engine.",
      ]);
    });

    it("should write stack traces in debug mode", async () => {
      ctx.engine.register("boom", () => {
        throw new Error("kaboom");
      });

      await ctx.host.execute("engine boom");

      expect(ctx.sink.entries[0].message).toBe(
        '[Engine] An internal error occurred while running "engine boom": kaboom'
      );
      expect(ctx.sink.entries[1].level).toBe("dim");
      expect(ctx.sink.entries[1].message).toContain("kaboom");
    });
  });

  describe("trees option", () => {
    it("should mount supplied trees next to the built-ins", () => {
      const sink = new MemorySink();
      const host = new ConsoleHost(sink);
      const auth = new SubCommandRegistry("auth", "[Auth] ", "Authentication commands.");
      const engine = new CoreEngine({
        config: resolveConfig(os.tmpdir(), {}),
        version: TEST_VERSION,
        sink,
        host,
        scheduler: new ManualScheduler(),
        trees: { auth },
      });

      expect(engine.registry.lookup("auth")?.tree).toBe(auth);
      expect(engine.registry.names()[0]).toBe("auth");
    });
  });
});

describe("createEngine", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), "cmdcore-create-"));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it("should load the configuration file and the package version", async () => {
    await fs.writeFile(path.join(testDir, "cmdcore.yaml"), "command: tool\n");
    const sink = new MemorySink();

    const engine = await createEngine({
      rootDir: testDir,
      sink,
      host: new ConsoleHost(sink),
      scheduler: new ManualScheduler(),
    });

    expect(engine.config.command).toBe("tool");
    expect(engine.config.rootDir).toBe(path.resolve(testDir));
    expect(engine.services.version).toBe("1.0.0");
  });
});
