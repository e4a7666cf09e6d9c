import type { Logger } from "@dsweep/core/logger";
import type { CacheStatsReport, CacheStatusReport } from "@dsweep/core/maintenance";
import type { SweepResult, SweepStats, SweepStatus } from "@dsweep/core/sweep";

export const PROGRESS_INTERVAL_MS = 2_000;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export function exitCodeFor(status: SweepStatus): number {
  return status === "completed" ? EXIT_OK : EXIT_INTERRUPTED;
}

/** Logs the stats snapshot on a timer until stopped. */
export function startProgressReporter(
  stats: SweepStats,
  logger: Logger,
  intervalMs = PROGRESS_INTERVAL_MS,
): () => void {
  const timer = setInterval(() => {
    logger.info(stats.snapshot(), "Progress");
  }, intervalMs);
  timer.unref();
  return () => clearInterval(timer);
}

export function formatSummary(result: SweepResult, dryRun: boolean): string[] {
  const { stats } = result;
  const lines = [
    `Session ${result.session.id} ${result.status}${result.resumed ? " (resumed)" : ""}`,
    `Directories: ${stats.dirsNew} new, ${stats.dirsResumed} resumed, ${stats.dirsSkipped} skipped`,
    dryRun
      ? `Files: ${stats.filesFound} found, none deleted (dry run)`
      : `Files: ${stats.filesFound} found, ${stats.filesDeleted} deleted`,
    `Errors: ${stats.errors}`,
  ];
  if (result.status === "interrupted") {
    lines.push("Run the same command again to resume.");
  }
  return lines;
}

export function formatCacheStatus(report: CacheStatusReport): string[] {
  const lines = [
    `Database: ${report.databasePath}`,
    `Cache window: ${report.windowHours}h`,
    `Incomplete directories: ${report.incompletePaths.length}`,
    ...report.incompletePaths.map((path) => `  ${path}`),
    `Interrupted sessions: ${report.interruptedSessions.length}`,
  ];
  for (const session of report.interruptedSessions) {
    lines.push(
      `  ${session.id} ${session.root} (${session.remaining} remaining, updated ${new Date(session.updatedAt).toISOString()})`,
    );
  }
  return lines;
}

export function formatCacheStats(report: CacheStatsReport): string[] {
  const { cache, sessions, foundFiles } = report;
  return [
    `Database: ${report.databasePath}`,
    `Cached directories: ${cache.totalEntries} (${cache.completed} completed, ${cache.incomplete} incomplete, ${cache.withErrors} with errors, ${cache.fresh} fresh)`,
    `Hit rate: ${report.hitRate === null ? "n/a" : `${report.hitRate.toFixed(1)}%`}`,
    `Sessions: ${sessions.active} active, ${sessions.completed} completed, ${sessions.interrupted} interrupted, ${sessions.failed} failed`,
    `Found files: ${foundFiles.total} (${foundFiles.deleted} deleted, ${foundFiles.dryRun} dry run, ${foundFiles.deleteFailed} failed, ${foundFiles.pending} pending)`,
  ];
}
