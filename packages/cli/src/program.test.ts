import { describe, it, expect, vi } from "vitest";
import { CommanderError } from "commander";
import { buildProgram } from "./program.js";

function program() {
  const handler = vi.fn(async () => {});
  const cmd = buildProgram(handler)
    .exitOverride()
    .configureOutput({ writeErr: () => {}, writeOut: () => {} });
  return { handler, cmd };
}

describe("buildProgram", () => {
  it("defaults to the current directory and no flags", async () => {
    const { handler, cmd } = program();
    await cmd.parseAsync([], { from: "user" });

    expect(handler).toHaveBeenCalledWith(".", {
      recursive: false,
      dryRun: false,
      force: false,
      verbose: false,
      quiet: false,
      cacheStatus: false,
      cacheStats: false,
      cacheClearIncomplete: false,
    });
  });

  it("parses short flags and numeric options", async () => {
    const { handler, cmd } = program();
    await cmd.parseAsync(
      ["-rdfv", "--cache-hours", "0", "--concurrency", "8", "--timeout", "500", "photos"],
      { from: "user" },
    );

    expect(handler).toHaveBeenCalledWith(
      "photos",
      expect.objectContaining({
        recursive: true,
        dryRun: true,
        force: true,
        verbose: true,
        cacheHours: 0,
        concurrency: 8,
        timeout: 500,
      }),
    );
  });

  it("accepts the cache maintenance flags", async () => {
    const { handler, cmd } = program();
    await cmd.parseAsync(["--cache-clear-incomplete", "--config", "/tmp/c.json"], {
      from: "user",
    });

    expect(handler).toHaveBeenCalledWith(
      ".",
      expect.objectContaining({ cacheClearIncomplete: true, config: "/tmp/c.json" }),
    );
  });

  it("rejects invalid numbers", async () => {
    const { handler, cmd } = program();
    await expect(cmd.parseAsync(["--concurrency", "0"], { from: "user" })).rejects.toBeInstanceOf(
      CommanderError,
    );
    expect(handler).not.toHaveBeenCalled();
  });
});
