import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { access, mkdir, mkdtemp, readFile, realpath, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import pino from "pino";
import { ConfigError } from "@dsweep/core/errors";
import type { CliFlags } from "./options.js";
import { runCli, type RunContext } from "./run.js";

const logger = pino({ level: "silent" });

const baseFlags: CliFlags = {
  recursive: true,
  dryRun: false,
  force: false,
  verbose: false,
  quiet: false,
  cacheStatus: false,
  cacheStats: false,
  cacheClearIncomplete: false,
};

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe("runCli", () => {
  let stateDir: string;
  let target: string;
  let lines: string[];

  beforeEach(async () => {
    stateDir = await realpath(await mkdtemp(join(tmpdir(), "dsweep-state-")));
    target = await realpath(await mkdtemp(join(tmpdir(), "dsweep-target-")));
    lines = [];
  });

  afterEach(async () => {
    await rm(stateDir, { recursive: true, force: true });
    await rm(target, { recursive: true, force: true });
  });

  function context(signal: AbortSignal = new AbortController().signal): RunContext {
    return {
      cwd: target,
      env: { DSWEEP_ROOT_PATH: stateDir },
      signal,
      logger,
      out: (line) => lines.push(line),
    };
  }

  it("sweeps in dry-run mode without touching files", async () => {
    await writeFile(join(target, ".DS_Store"), "");
    await mkdir(join(target, "sub"));
    await writeFile(join(target, "sub", ".DS_Store"), "");

    const code = await runCli(".", { ...baseFlags, dryRun: true }, context());

    expect(code).toBe(0);
    expect(lines[0]).toMatch(/^Session [0-9a-f-]{36} completed$/);
    expect(lines.slice(1)).toEqual([
      "Directories: 2 new, 0 resumed, 0 skipped",
      "Files: 2 found, none deleted (dry run)",
      "Errors: 0",
    ]);
    expect(await exists(join(target, ".DS_Store"))).toBe(true);
    expect(await exists(join(stateDir, "cache.sqlite"))).toBe(true);

    const written = JSON.parse(await readFile(join(stateDir, "config.json"), "utf-8"));
    expect(written.database.path).toBe("cache.sqlite");
  });

  it("deletes matches", async () => {
    await writeFile(join(target, ".DS_Store"), "");

    const code = await runCli(target, baseFlags, context());

    expect(code).toBe(0);
    expect(lines[2]).toBe("Files: 1 found, 1 deleted");
    expect(await exists(join(target, ".DS_Store"))).toBe(false);
  });

  it("refuses a target that is not a directory", async () => {
    await writeFile(join(target, "plain.txt"), "");

    const code = await runCli("plain.txt", baseFlags, context());

    expect(code).toBe(1);
    expect(lines).toEqual([]);
  });

  it("exits 130 when interrupted", async () => {
    const controller = new AbortController();
    controller.abort();

    const code = await runCli(".", baseFlags, context(controller.signal));

    expect(code).toBe(130);
    expect(lines.at(-1)).toBe("Run the same command again to resume.");
  });

  it("reports and clears interrupted sessions", async () => {
    const controller = new AbortController();
    controller.abort();
    await runCli(".", baseFlags, context(controller.signal));

    lines = [];
    await runCli(".", { ...baseFlags, cacheStatus: true }, context());
    expect(lines).toContain("Interrupted sessions: 1");

    lines = [];
    await runCli(".", { ...baseFlags, cacheClearIncomplete: true }, context());
    expect(lines).toEqual([
      "Removed 0 incomplete cache entries, completed 1 interrupted sessions",
    ]);

    lines = [];
    await runCli(".", { ...baseFlags, cacheStatus: true }, context());
    expect(lines).toContain("Interrupted sessions: 0");
  });

  it("prints cache statistics", async () => {
    await runCli(".", baseFlags, context());

    lines = [];
    const code = await runCli(".", { ...baseFlags, cacheStats: true }, context());

    expect(code).toBe(0);
    expect(lines).toContain("Hit rate: 100.0%");
    expect(lines).toContain("Sessions: 0 active, 1 completed, 0 interrupted, 0 failed");
  });

  it("rejects an invalid config file", async () => {
    await writeFile(
      join(stateDir, "config.json"),
      JSON.stringify({ scan: { concurrency: 0 } }),
    );

    await expect(runCli(".", baseFlags, context())).rejects.toBeInstanceOf(ConfigError);
  });
});
