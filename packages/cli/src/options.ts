import { InvalidArgumentError } from "commander";
import type { SweepConfig } from "@dsweep/core/schemas";
import type { SweepOptions } from "@dsweep/core/sweep";

/** Parsed command-line flags, as commander hands them to the action. */
export interface CliFlags {
  recursive: boolean;
  dryRun: boolean;
  force: boolean;
  verbose: boolean;
  quiet: boolean;
  cacheHours?: number;
  concurrency?: number;
  timeout?: number;
  config?: string;
  cacheStatus: boolean;
  cacheStats: boolean;
  cacheClearIncomplete: boolean;
}

export type CliAction =
  | "sweep"
  | "cache-status"
  | "cache-stats"
  | "cache-clear-incomplete";

export function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("Expected a whole number of 0 or more.");
  }
  return n;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a whole number of 1 or more.");
  }
  return n;
}

/** Cache maintenance flags bypass the sweep; the first one given wins. */
export function actionFor(flags: CliFlags): CliAction {
  if (flags.cacheStatus) return "cache-status";
  if (flags.cacheStats) return "cache-stats";
  if (flags.cacheClearIncomplete) return "cache-clear-incomplete";
  return "sweep";
}

export function cacheWindowHours(config: SweepConfig, flags: CliFlags): number {
  return flags.cacheHours ?? config.cache.windowHours;
}

export function buildSweepOptions(
  config: SweepConfig,
  flags: CliFlags,
  rootPath: string,
): SweepOptions {
  return {
    rootPath,
    recursive: flags.recursive,
    dryRun: flags.dryRun,
    forceRefresh: flags.force,
    cacheWindowHours: cacheWindowHours(config, flags),
    concurrency: flags.concurrency ?? config.scan.concurrency,
    taskTimeoutMs: flags.timeout ?? config.scan.taskTimeoutMs,
    flushIntervalMs: config.scan.flushIntervalMs,
    flushThreshold: config.scan.flushThreshold,
    targetName: config.scan.targetName,
    excludedPaths: config.scan.excludedPaths,
    deleteConcurrency: config.scan.deleteConcurrency,
  };
}
