import type Database from "better-sqlite3";
import { systemClock, type Clock, type QueueState, type WorkQueueEntry } from "./types.js";

export interface DequeueResult {
  /** Entries claimed (now in_progress), in enqueue order */
  entries: WorkQueueEntry[];
  /** Paths completed without a walk because they were fresh */
  skipped: string[];
}

/**
 * Durable per-session queue of directories.
 *
 * One row per (session, path): a directory is claimed at most once per session.
 * Errors propagate; the orchestrator turns them into a failed session.
 */
export interface WorkQueue {
  /** Insert pending rows, ignoring paths already queued for the session. Returns count inserted. */
  enqueue(sessionId: string, paths: readonly string[]): number;
  /**
   * Atomically claim up to `limit` pending entries. Entries `isFresh` accepts are
   * completed on the spot and reported in `skipped` instead.
   */
  dequeueBatch(
    sessionId: string,
    limit: number,
    isFresh?: (path: string) => boolean,
  ): DequeueResult;
  /** in_progress -> completed | failed */
  complete(
    sessionId: string,
    path: string,
    outcome: "completed" | "failed",
    error?: string | null,
  ): boolean;
  /** in_progress -> pending, for tasks abandoned before they finished */
  release(sessionId: string, path: string): boolean;
  pendingCount(sessionId: string): number;
  /** pending and in_progress entries */
  incompleteEntries(sessionId: string): WorkQueueEntry[];
  /** Reset the given in_progress paths to pending and flag every pending row as resumed */
  resetInProgress(sessionId: string, paths: readonly string[]): number;
  countsByState(sessionId: string): Record<QueueState, number>;
  /** Fail every non-terminal entry with `note`. Returns count changed. */
  abandon(sessionId: string, note: string): number;
}

export interface QueueRow {
  session_id: string;
  path: string;
  state: QueueState;
  enqueued_at: number;
  resumed: number;
  error: string | null;
}

export function rowToQueueEntry(row: QueueRow): WorkQueueEntry {
  return {
    sessionId: row.session_id,
    path: row.path,
    state: row.state,
    enqueuedAt: row.enqueued_at,
    resumed: row.resumed === 1,
    error: row.error,
  };
}

export function createWorkQueue(
  db: Database.Database,
  options?: { now?: Clock },
): WorkQueue {
  const now = options?.now ?? systemClock;

  const insertStmt = db.prepare<{
    session_id: string;
    path: string;
    enqueued_at: number;
  }>(
    `INSERT OR IGNORE INTO work_queue (session_id, path, state, enqueued_at)
     VALUES (@session_id, @path, 'pending', @enqueued_at)`,
  );

  const selectPendingStmt = db.prepare<{ session_id: string; limit: number }>(
    `SELECT * FROM work_queue
     WHERE session_id = @session_id AND state = 'pending'
     ORDER BY rowid
     LIMIT @limit`,
  );

  const claimStmt = db.prepare<{ session_id: string; path: string }>(
    `UPDATE work_queue SET state = 'in_progress'
     WHERE session_id = @session_id AND path = @path AND state = 'pending'`,
  );

  const skipFreshStmt = db.prepare<{ session_id: string; path: string }>(
    `UPDATE work_queue SET state = 'completed', error = NULL
     WHERE session_id = @session_id AND path = @path AND state = 'pending'`,
  );

  const completeStmt = db.prepare<{
    session_id: string;
    path: string;
    state: "completed" | "failed";
    error: string | null;
  }>(
    `UPDATE work_queue SET state = @state, error = @error
     WHERE session_id = @session_id AND path = @path AND state = 'in_progress'`,
  );

  const releaseStmt = db.prepare<{ session_id: string; path: string }>(
    `UPDATE work_queue SET state = 'pending'
     WHERE session_id = @session_id AND path = @path AND state = 'in_progress'`,
  );

  const pendingCountStmt = db.prepare<{ session_id: string }>(
    "SELECT COUNT(*) AS cnt FROM work_queue WHERE session_id = @session_id AND state = 'pending'",
  );

  const incompleteStmt = db.prepare<{ session_id: string }>(
    `SELECT * FROM work_queue
     WHERE session_id = @session_id AND state IN ('pending', 'in_progress')
     ORDER BY rowid`,
  );

  const resetStmt = db.prepare<{ session_id: string; path: string }>(
    `UPDATE work_queue SET state = 'pending', resumed = 1
     WHERE session_id = @session_id AND path = @path AND state = 'in_progress'`,
  );

  const markResumedStmt = db.prepare<{ session_id: string }>(
    `UPDATE work_queue SET resumed = 1
     WHERE session_id = @session_id AND state = 'pending'`,
  );

  const countsStmt = db.prepare<{ session_id: string }>(
    `SELECT state, COUNT(*) AS cnt FROM work_queue
     WHERE session_id = @session_id GROUP BY state`,
  );

  const abandonStmt = db.prepare<{ session_id: string; note: string }>(
    `UPDATE work_queue SET state = 'failed', error = @note
     WHERE session_id = @session_id AND state IN ('pending', 'in_progress')`,
  );

  const enqueueMany = db.transaction(
    (sessionId: string, paths: readonly string[], at: number): number => {
      let inserted = 0;
      for (const path of paths) {
        inserted += insertStmt.run({
          session_id: sessionId,
          path,
          enqueued_at: at,
        }).changes;
      }
      return inserted;
    },
  );

  const dequeue = db.transaction(
    (
      sessionId: string,
      limit: number,
      isFresh: ((path: string) => boolean) | undefined,
    ): DequeueResult => {
      const entries: WorkQueueEntry[] = [];
      const skipped: string[] = [];

      while (entries.length < limit) {
        const rows = selectPendingStmt.all({
          session_id: sessionId,
          limit: limit - entries.length,
        }) as QueueRow[];
        if (rows.length === 0) break;

        for (const row of rows) {
          const key = { session_id: sessionId, path: row.path };
          if (isFresh?.(row.path)) {
            skipFreshStmt.run(key);
            skipped.push(row.path);
          } else if (claimStmt.run(key).changes === 1) {
            entries.push(rowToQueueEntry({ ...row, state: "in_progress" }));
          }
        }
      }

      return { entries, skipped };
    },
  );

  const resetMany = db.transaction(
    (sessionId: string, paths: readonly string[]): number => {
      let reset = 0;
      for (const path of paths) {
        reset += resetStmt.run({ session_id: sessionId, path }).changes;
      }
      markResumedStmt.run({ session_id: sessionId });
      return reset;
    },
  );

  return {
    enqueue(sessionId, paths) {
      if (paths.length === 0) return 0;
      return enqueueMany(sessionId, paths, now());
    },

    dequeueBatch(sessionId, limit, isFresh) {
      if (limit <= 0) return { entries: [], skipped: [] };
      return dequeue(sessionId, limit, isFresh);
    },

    complete(sessionId, path, outcome, error) {
      const result = completeStmt.run({
        session_id: sessionId,
        path,
        state: outcome,
        error: error ?? null,
      });
      return result.changes > 0;
    },

    release(sessionId, path) {
      return releaseStmt.run({ session_id: sessionId, path }).changes > 0;
    },

    pendingCount(sessionId) {
      const row = pendingCountStmt.get({ session_id: sessionId }) as {
        cnt: number;
      };
      return row.cnt;
    },

    incompleteEntries(sessionId) {
      const rows = incompleteStmt.all({ session_id: sessionId }) as QueueRow[];
      return rows.map(rowToQueueEntry);
    },

    resetInProgress(sessionId, paths) {
      return resetMany(sessionId, paths);
    },

    countsByState(sessionId) {
      const counts: Record<QueueState, number> = {
        pending: 0,
        in_progress: 0,
        completed: 0,
        failed: 0,
      };
      const rows = countsStmt.all({ session_id: sessionId }) as Array<{
        state: QueueState;
        cnt: number;
      }>;
      for (const row of rows) {
        counts[row.state] = row.cnt;
      }
      return counts;
    },

    abandon(sessionId, note) {
      return abandonStmt.run({ session_id: sessionId, note }).changes;
    },
  };
}
