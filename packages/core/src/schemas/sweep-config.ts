import { z } from "zod";

/** System locations a sweep never descends into. */
export const DEFAULT_EXCLUDED_PATHS = [
  "/System/Volumes",
  "/private/var/vm",
  "/private/var/folders",
  "/dev",
  "/proc",
  ".Trash",
  ".Trashes",
  ".Spotlight-V100",
  ".fseventsd",
  ".DocumentRevisions-V100",
  ".TemporaryItems",
];

export const DEFAULTS = {
  database: {
    path: "cache.sqlite",
  },
  cache: {
    windowHours: 24,
  },
  scan: {
    targetName: ".DS_Store",
    concurrency: 100,
    taskTimeoutMs: 30_000,
    flushIntervalMs: 5_000,
    flushThreshold: 500,
    deleteConcurrency: 16,
    excludedPaths: DEFAULT_EXCLUDED_PATHS,
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
};

export const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug"]);

export const SweepConfigSchema = z.object({
  database: z
    .object({
      path: z
        .string()
        .min(1)
        .default(DEFAULTS.database.path)
        .describe("SQLite file; relative paths resolve against the state directory"),
    })
    .default(DEFAULTS.database),
  cache: z
    .object({
      windowHours: z
        .number()
        .int()
        .min(0)
        .default(DEFAULTS.cache.windowHours)
        .describe("How long a completed directory scan stays fresh"),
    })
    .default(DEFAULTS.cache),
  scan: z
    .object({
      targetName: z.string().min(1).default(DEFAULTS.scan.targetName),
      concurrency: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.scan.concurrency),
      taskTimeoutMs: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.scan.taskTimeoutMs),
      flushIntervalMs: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.scan.flushIntervalMs),
      flushThreshold: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.scan.flushThreshold),
      deleteConcurrency: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.scan.deleteConcurrency),
      excludedPaths: z
        .array(z.string().min(1))
        .default(DEFAULTS.scan.excludedPaths),
    })
    .default(DEFAULTS.scan),
  logging: z
    .object({
      level: LogLevel.default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
});

export type SweepConfig = z.infer<typeof SweepConfigSchema>;
export type LoggingConfig = SweepConfig["logging"];
export type ScanConfig = SweepConfig["scan"];
