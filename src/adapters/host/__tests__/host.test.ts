import { describe, it, expect, beforeEach, vi } from "vitest";
import { ConsoleHost } from "../host.js";
import { MemorySink } from "../../../core/__tests__/test-helpers.js";

describe("ConsoleHost", () => {
  let sink: MemorySink;
  let host: ConsoleHost;

  beforeEach(() => {
    sink = new MemorySink();
    host = new ConsoleHost(sink);
  });

  it("should pass the tokens after the command name", async () => {
    const command = vi.fn(async () => {});
    host.registerCommand("core", command);

    await host.execute("  core   docs create  core ");

    expect(command).toHaveBeenCalledWith(["docs", "create", "core"]);
  });

  it("should ignore blank lines", async () => {
    await host.execute("   ");

    expect(sink.entries).toEqual([]);
  });

  it("should report unknown commands", async () => {
    await host.execute("bogus thing");

    expect(sink.entries).toEqual([{ level: "error", message: "Unknown command: bogus" }]);
  });

  it("should report a failing command and keep running", async () => {
    host.registerCommand("bad", async () => {
      throw new Error("broken");
    });
    const good = vi.fn(async () => {});
    host.registerCommand("good", good);

    await host.execute("bad");
    await host.execute("good");

    expect(sink.entries).toEqual([{ level: "error", message: 'Command "bad" failed: broken' }]);
    expect(good).toHaveBeenCalledTimes(1);
  });

  it("should run lines one at a time in submission order", async () => {
    const events: string[] = [];
    host.registerCommand("step", async ([name]) => {
      events.push(`start ${name}`);
      await new Promise((resolve) => setTimeout(resolve, 5));
      events.push(`end ${name}`);
    });

    await Promise.all([host.execute("step a"), host.execute("step b")]);

    expect(events).toEqual(["start a", "end a", "start b", "end b"]);
  });

  it("should keep running after a sink failure", async () => {
    let calls = 0;
    const flaky = new ConsoleHost({
      write: () => {
        calls++;
        if (calls === 1) throw new Error("sink down");
      },
    });

    await expect(flaky.execute("missing")).rejects.toThrow("sink down");
    await flaky.execute("missing");

    expect(calls).toBe(2);
  });

  it("should forget unregistered commands", async () => {
    host.registerCommand("core", vi.fn(async () => {}));
    host.unregisterCommand("core");

    await host.execute("core version");

    expect(host.commandNames()).toEqual([]);
    expect(sink.messages()).toEqual(["Unknown command: core"]);
  });
});
