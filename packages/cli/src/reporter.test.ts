import { describe, it, expect, vi, afterEach } from "vitest";
import pino from "pino";
import { SweepStats, type SweepResult } from "@dsweep/core/sweep";
import { emptyCounters } from "@dsweep/core/storage";
import {
  exitCodeFor,
  formatCacheStats,
  formatCacheStatus,
  formatSummary,
  startProgressReporter,
} from "./reporter.js";

function result(overrides: Partial<SweepResult> = {}): SweepResult {
  return {
    session: {
      id: "s-1",
      root: "/photos",
      recursive: true,
      force: false,
      dryRun: false,
      status: "completed",
      createdAt: 0,
      updatedAt: 0,
      counters: emptyCounters(),
      error: null,
    },
    status: "completed",
    resumed: false,
    stats: {
      dirsNew: 4,
      dirsResumed: 0,
      dirsSkipped: 2,
      filesFound: 3,
      filesDeleted: 2,
      errors: 1,
      queueDepth: 0,
    },
    deletion: { deleted: 2, dryRun: 0, failed: 1, remaining: 0 },
    ...overrides,
  };
}

describe("exitCodeFor", () => {
  it("maps session outcomes to exit codes", () => {
    expect(exitCodeFor("completed")).toBe(0);
    expect(exitCodeFor("interrupted")).toBe(130);
  });
});

describe("formatSummary", () => {
  it("summarizes a completed sweep", () => {
    expect(formatSummary(result(), false)).toEqual([
      "Session s-1 completed",
      "Directories: 4 new, 0 resumed, 2 skipped",
      "Files: 3 found, 2 deleted",
      "Errors: 1",
    ]);
  });

  it("notes dry runs, resumes and interruptions", () => {
    const lines = formatSummary(
      result({ status: "interrupted", resumed: true, deletion: null }),
      true,
    );
    expect(lines).toEqual([
      "Session s-1 interrupted (resumed)",
      "Directories: 4 new, 0 resumed, 2 skipped",
      "Files: 3 found, none deleted (dry run)",
      "Errors: 1",
      "Run the same command again to resume.",
    ]);
  });
});

describe("cache reports", () => {
  it("formats cache status", () => {
    expect(
      formatCacheStatus({
        databasePath: "/state/cache.sqlite",
        windowHours: 24,
        incompletePaths: ["/photos/2024"],
        interruptedSessions: [{ id: "s-2", root: "/photos", updatedAt: 0, remaining: 3 }],
      }),
    ).toEqual([
      "Database: /state/cache.sqlite",
      "Cache window: 24h",
      "Incomplete directories: 1",
      "  /photos/2024",
      "Interrupted sessions: 1",
      "  s-2 /photos (3 remaining, updated 1970-01-01T00:00:00.000Z)",
    ]);
  });

  it("formats cache stats", () => {
    const lines = formatCacheStats({
      databasePath: "/state/cache.sqlite",
      cache: { totalEntries: 3, completed: 2, incomplete: 1, withErrors: 0, fresh: 2 },
      sessions: { active: 0, completed: 2, interrupted: 1, failed: 0 },
      foundFiles: { total: 5, pending: 0, deleted: 4, dryRun: 0, deleteFailed: 1 },
      hitRate: 66.7,
    });
    expect(lines).toEqual([
      "Database: /state/cache.sqlite",
      "Cached directories: 3 (2 completed, 1 incomplete, 0 with errors, 2 fresh)",
      "Hit rate: 66.7%",
      "Sessions: 0 active, 2 completed, 1 interrupted, 0 failed",
      "Found files: 5 (4 deleted, 0 dry run, 1 failed, 0 pending)",
    ]);
  });

  it("shows n/a for an empty cache", () => {
    const lines = formatCacheStats({
      databasePath: "/state/cache.sqlite",
      cache: { totalEntries: 0, completed: 0, incomplete: 0, withErrors: 0, fresh: 0 },
      sessions: { active: 0, completed: 0, interrupted: 0, failed: 0 },
      foundFiles: { total: 0, pending: 0, deleted: 0, dryRun: 0, deleteFailed: 0 },
      hitRate: null,
    });
    expect(lines[2]).toBe("Hit rate: n/a");
  });
});

describe("startProgressReporter", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("logs snapshots until stopped", () => {
    vi.useFakeTimers();
    const logger = pino({ level: "silent" });
    const info = vi.spyOn(logger, "info");
    const stats = new SweepStats();

    const stop = startProgressReporter(stats, logger, 1000);
    stats.addFound(2);
    vi.advanceTimersByTime(1000);

    expect(info).toHaveBeenCalledTimes(1);
    expect(info).toHaveBeenCalledWith(stats.snapshot(), "Progress");

    stop();
    vi.advanceTimersByTime(5000);
    expect(info).toHaveBeenCalledTimes(1);
  });
});
