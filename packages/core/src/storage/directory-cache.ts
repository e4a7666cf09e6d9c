import type Database from "better-sqlite3";
import type { Logger } from "pino";
import { errorMessage } from "../errors/catalog.js";
import {
  HOUR_MS,
  systemClock,
  type CacheRecord,
  type CacheStats,
  type Clock,
  type DirectoryCacheEntry,
  type DirectoryStatus,
} from "./types.js";

export interface DirectoryCacheOptions {
  /** Freshness window in hours */
  windowHours: number;
  /** Report every path as not_cached; writes still go through */
  forceRefresh?: boolean;
  now?: Clock;
  logger?: Logger;
}

/**
 * Durable per-directory scan freshness.
 *
 * Storage failures never escape: reads degrade to "not_cached" and writes are
 * dropped, which at worst makes a later scan redundant.
 */
export interface DirectoryCache {
  readonly windowMs: number;
  readonly forceRefresh: boolean;
  statusOf(path: string): DirectoryStatus;
  recordResult(
    sessionId: string,
    path: string,
    completed: boolean,
    error?: string | null,
  ): void;
  /** Upsert many results in one transaction. Returns false if the batch was dropped. */
  recordBatch(records: readonly CacheRecord[]): boolean;
  /** Removes entries last searched before `olderThan`. Returns count removed, 0 on failure. */
  prune(olderThan: number): number;
  /** Rebuilds the in-memory freshness index. Returns its size. */
  loadFreshIndex(): number;
  readonly freshIndexSize: number;
  incompletePaths(): string[];
  stats(): CacheStats;
  /** Deletes incomplete entries. Returns count removed. */
  clearIncomplete(): number;
}

export interface CacheRow {
  path: string;
  last_searched: number;
  completed: number;
  session_id: string | null;
  error: string | null;
}

export function rowToCacheEntry(row: CacheRow): DirectoryCacheEntry {
  return {
    path: row.path,
    lastSearched: row.last_searched,
    completed: row.completed === 1,
    sessionId: row.session_id,
    error: row.error,
  };
}

export function classifyEntry(
  entry: Pick<DirectoryCacheEntry, "lastSearched" | "completed"> | undefined,
  now: number,
  windowMs: number,
): DirectoryStatus {
  if (!entry) return "not_cached";
  if (now - entry.lastSearched >= windowMs) return "stale";
  return entry.completed ? "fresh" : "incomplete";
}

export function createDirectoryCache(
  db: Database.Database,
  options: DirectoryCacheOptions,
): DirectoryCache {
  const windowMs = options.windowHours * HOUR_MS;
  const forceRefresh = options.forceRefresh ?? false;
  const now = options.now ?? systemClock;
  const logger = options.logger;

  const freshIndex = new Set<string>();

  const getStmt = db.prepare<{ path: string }>(
    "SELECT * FROM directory_cache WHERE path = @path",
  );

  const upsertStmt = db.prepare<{
    path: string;
    last_searched: number;
    completed: number;
    session_id: string;
    error: string | null;
  }>(
    `INSERT INTO directory_cache (path, last_searched, completed, session_id, error)
     VALUES (@path, @last_searched, @completed, @session_id, @error)
     ON CONFLICT (path) DO UPDATE SET
       last_searched = excluded.last_searched,
       completed = excluded.completed,
       session_id = excluded.session_id,
       error = excluded.error`,
  );

  const freshPathsStmt = db.prepare<{ cutoff: number }>(
    "SELECT path FROM directory_cache WHERE last_searched > @cutoff AND completed = 1",
  );

  const pruneStmt = db.prepare<{ older_than: number }>(
    "DELETE FROM directory_cache WHERE last_searched < @older_than",
  );

  const incompleteStmt = db.prepare(
    "SELECT path FROM directory_cache WHERE completed = 0 ORDER BY last_searched DESC",
  );

  const statsStmt = db.prepare<{ cutoff: number }>(
    `SELECT
       COUNT(*) AS total,
       COALESCE(SUM(CASE WHEN completed = 1 THEN 1 ELSE 0 END), 0) AS completed,
       COALESCE(SUM(CASE WHEN error IS NOT NULL THEN 1 ELSE 0 END), 0) AS with_errors,
       COALESCE(SUM(CASE WHEN completed = 1 AND last_searched > @cutoff THEN 1 ELSE 0 END), 0) AS fresh
     FROM directory_cache`,
  );

  const clearIncompleteStmt = db.prepare(
    "DELETE FROM directory_cache WHERE completed = 0",
  );

  const upsertMany = db.transaction(
    (records: readonly CacheRecord[], at: number) => {
      for (const record of records) {
        upsertStmt.run({
          path: record.path,
          last_searched: at,
          completed: record.completed ? 1 : 0,
          session_id: record.sessionId,
          error: record.error ?? null,
        });
      }
    },
  );

  function noteWritten(records: readonly CacheRecord[]): void {
    for (const record of records) {
      if (record.completed) {
        freshIndex.add(record.path);
      } else {
        freshIndex.delete(record.path);
      }
    }
  }

  const cache: DirectoryCache = {
    windowMs,
    forceRefresh,

    get freshIndexSize() {
      return freshIndex.size;
    },

    statusOf(path) {
      if (forceRefresh) return "not_cached";
      if (freshIndex.has(path)) return "fresh";

      let row: CacheRow | undefined;
      try {
        row = getStmt.get({ path }) as CacheRow | undefined;
      } catch (err) {
        logger?.debug(
          { path, error: errorMessage(err) },
          "Cache lookup failed, treating directory as not cached",
        );
        return "not_cached";
      }

      const status = classifyEntry(
        row ? rowToCacheEntry(row) : undefined,
        now(),
        windowMs,
      );
      if (status === "fresh") {
        freshIndex.add(path);
      }
      return status;
    },

    recordResult(sessionId, path, completed, error) {
      cache.recordBatch([{ sessionId, path, completed, error }]);
    },

    recordBatch(records) {
      if (records.length === 0) return true;
      try {
        upsertMany(records, now());
      } catch (err) {
        logger?.debug(
          { count: records.length, error: errorMessage(err) },
          "Cache write failed, freshness hints dropped",
        );
        return false;
      }
      noteWritten(records);
      return true;
    },

    prune(olderThan) {
      try {
        return pruneStmt.run({ older_than: olderThan }).changes;
      } catch (err) {
        logger?.debug(
          { olderThan, error: errorMessage(err) },
          "Cache prune failed, keeping expired entries",
        );
        return 0;
      }
    },

    loadFreshIndex() {
      freshIndex.clear();
      if (forceRefresh) return 0;
      try {
        const rows = freshPathsStmt.all({ cutoff: now() - windowMs }) as Array<{
          path: string;
        }>;
        for (const row of rows) {
          freshIndex.add(row.path);
        }
      } catch (err) {
        logger?.debug(
          { error: errorMessage(err) },
          "Could not load freshness index, continuing without it",
        );
      }
      return freshIndex.size;
    },

    incompletePaths() {
      const rows = incompleteStmt.all() as Array<{ path: string }>;
      return rows.map((r) => r.path);
    },

    stats() {
      const row = statsStmt.get({ cutoff: now() - windowMs }) as {
        total: number;
        completed: number;
        with_errors: number;
        fresh: number;
      };
      return {
        totalEntries: row.total,
        completed: row.completed,
        incomplete: row.total - row.completed,
        withErrors: row.with_errors,
        fresh: row.fresh,
      };
    },

    clearIncomplete() {
      const removed = clearIncompleteStmt.run().changes;
      return removed;
    },
  };

  return cache;
}
