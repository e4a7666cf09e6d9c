import { describe, it, expect } from "vitest";
import {
  SweepConfigSchema,
  DEFAULT_EXCLUDED_PATHS,
} from "./sweep-config.js";

describe("SweepConfigSchema", () => {
  it("fills every section from an empty object", () => {
    const config = SweepConfigSchema.parse({});

    expect(config.database.path).toBe("cache.sqlite");
    expect(config.cache.windowHours).toBe(24);
    expect(config.scan.targetName).toBe(".DS_Store");
    expect(config.scan.concurrency).toBe(100);
    expect(config.scan.taskTimeoutMs).toBe(30_000);
    expect(config.scan.flushIntervalMs).toBe(5_000);
    expect(config.scan.flushThreshold).toBe(500);
    expect(config.scan.deleteConcurrency).toBe(16);
    expect(config.scan.excludedPaths).toEqual(DEFAULT_EXCLUDED_PATHS);
    expect(config.logging).toEqual({ level: "info", pretty: false });
  });

  it("keeps partial overrides and defaults the rest of a section", () => {
    const config = SweepConfigSchema.parse({
      scan: { concurrency: 8 },
      cache: { windowHours: 168 },
    });

    expect(config.scan.concurrency).toBe(8);
    expect(config.scan.taskTimeoutMs).toBe(30_000);
    expect(config.cache.windowHours).toBe(168);
  });

  it("accepts a zero-hour cache window", () => {
    expect(
      SweepConfigSchema.parse({ cache: { windowHours: 0 } }).cache.windowHours,
    ).toBe(0);
  });

  it("rejects non-positive concurrency", () => {
    expect(() =>
      SweepConfigSchema.parse({ scan: { concurrency: 0 } }),
    ).toThrow();
  });

  it("rejects unknown log levels", () => {
    expect(() =>
      SweepConfigSchema.parse({ logging: { level: "trace" } }),
    ).toThrow();
  });
});
