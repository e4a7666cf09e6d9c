import type Database from "better-sqlite3";
import type { Logger } from "pino";
import type { SessionStatus } from "../lifecycle/state-machine.js";
import { createDirectoryCache } from "../storage/directory-cache.js";
import {
  createFoundFilesLedger,
  type OutcomeCounts,
} from "../storage/found-files.js";
import { createSessionRegistry } from "../storage/sessions.js";
import { systemClock, type CacheStats, type Clock } from "../storage/types.js";
import { createWorkQueue } from "../storage/work-queue.js";

export interface MaintenanceOptions {
  databasePath: string;
  windowHours: number;
  now?: Clock;
  logger?: Logger;
}

export interface InterruptedSessionSummary {
  id: string;
  root: string;
  updatedAt: number;
  /** pending plus in_progress queue entries */
  remaining: number;
}

export interface CacheStatusReport {
  databasePath: string;
  windowHours: number;
  incompletePaths: string[];
  interruptedSessions: InterruptedSessionSummary[];
}

export interface CacheStatsReport {
  databasePath: string;
  cache: CacheStats;
  sessions: Record<SessionStatus, number>;
  foundFiles: OutcomeCounts;
  /** Completed share of cache entries as a percentage, one decimal; null when empty */
  hitRate: number | null;
}

export interface ClearIncompleteResult {
  cacheEntriesRemoved: number;
  sessionsCompleted: number;
}

export const CLEARED_NOTE = "cleared by cache maintenance";

function storesFor(db: Database.Database, options: MaintenanceOptions) {
  const now = options.now ?? systemClock;
  return {
    cache: createDirectoryCache(db, {
      windowHours: options.windowHours,
      now,
      logger: options.logger,
    }),
    queue: createWorkQueue(db, { now }),
    sessions: createSessionRegistry(db, { now }),
    found: createFoundFilesLedger(db, { now }),
  };
}

/** Incomplete cache entries and resumable sessions. */
export function cacheStatus(
  db: Database.Database,
  options: MaintenanceOptions,
): CacheStatusReport {
  const { cache, queue, sessions } = storesFor(db, options);

  const interruptedSessions = sessions
    .listByStatus("interrupted")
    .map((session) => ({
      id: session.id,
      root: session.root,
      updatedAt: session.updatedAt,
      remaining: queue.incompleteEntries(session.id).length,
    }));

  return {
    databasePath: options.databasePath,
    windowHours: options.windowHours,
    incompletePaths: cache.incompletePaths(),
    interruptedSessions,
  };
}

export function hitRate(stats: CacheStats): number | null {
  if (stats.totalEntries === 0) return null;
  return Math.round((stats.completed / stats.totalEntries) * 1000) / 10;
}

export function cacheStats(
  db: Database.Database,
  options: MaintenanceOptions,
): CacheStatsReport {
  const { cache, sessions, found } = storesFor(db, options);
  const stats = cache.stats();

  return {
    databasePath: options.databasePath,
    cache: stats,
    sessions: sessions.countsByStatus(),
    foundFiles: found.countsByOutcome(),
    hitRate: hitRate(stats),
  };
}

/**
 * Drops incomplete cache entries and declares every interrupted session
 * completed, failing whatever was still queued for it.
 */
export function clearIncomplete(
  db: Database.Database,
  options: MaintenanceOptions,
): ClearIncompleteResult {
  const { cache, queue, sessions } = storesFor(db, options);

  const run = db.transaction((): ClearIncompleteResult => {
    const cacheEntriesRemoved = cache.clearIncomplete();
    const interrupted = sessions.listByStatus("interrupted");
    for (const session of interrupted) {
      queue.abandon(session.id, CLEARED_NOTE);
      sessions.transition(session.id, "completed");
    }
    return { cacheEntriesRemoved, sessionsCompleted: interrupted.length };
  });

  const result = run();
  options.logger?.info(result, "Cleared incomplete cache state");
  return result;
}
