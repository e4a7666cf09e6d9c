import type Database from "better-sqlite3";
import {
  systemClock,
  type Clock,
  type DeletionOutcome,
  type FoundFileRecord,
} from "./types.js";

export interface OutcomeCounts {
  total: number;
  pending: number;
  deleted: number;
  dryRun: number;
  deleteFailed: number;
}

/** Matched files per session; the deletion outcome is written once. */
export interface FoundFilesLedger {
  /** Insert found files, ignoring ones already recorded for the session. Returns count inserted. */
  record(sessionId: string, paths: readonly string[]): number;
  /** Sets the outcome of a file that has none yet. */
  setOutcome(
    sessionId: string,
    path: string,
    outcome: DeletionOutcome,
    error?: string | null,
  ): boolean;
  /** Files still waiting for the deletion phase, oldest first */
  pending(sessionId: string, limit?: number): FoundFileRecord[];
  /** Outcome totals for one session, or across all sessions */
  countsByOutcome(sessionId?: string): OutcomeCounts;
}

export interface FoundFileRow {
  session_id: string;
  path: string;
  found_at: number;
  outcome: DeletionOutcome | null;
  error: string | null;
}

export function rowToFoundFile(row: FoundFileRow): FoundFileRecord {
  return {
    sessionId: row.session_id,
    path: row.path,
    foundAt: row.found_at,
    outcome: row.outcome,
    error: row.error,
  };
}

export function createFoundFilesLedger(
  db: Database.Database,
  options?: { now?: Clock },
): FoundFilesLedger {
  const now = options?.now ?? systemClock;

  const insertStmt = db.prepare<{
    session_id: string;
    path: string;
    found_at: number;
  }>(
    `INSERT OR IGNORE INTO found_files (session_id, path, found_at)
     VALUES (@session_id, @path, @found_at)`,
  );

  const setOutcomeStmt = db.prepare<{
    session_id: string;
    path: string;
    outcome: DeletionOutcome;
    error: string | null;
  }>(
    `UPDATE found_files SET outcome = @outcome, error = @error
     WHERE session_id = @session_id AND path = @path AND outcome IS NULL`,
  );

  const countsSql = (where: string) =>
    `SELECT
       COUNT(*) AS total,
       COALESCE(SUM(CASE WHEN outcome IS NULL THEN 1 ELSE 0 END), 0) AS pending,
       COALESCE(SUM(CASE WHEN outcome = 'deleted' THEN 1 ELSE 0 END), 0) AS deleted,
       COALESCE(SUM(CASE WHEN outcome = 'dry_run' THEN 1 ELSE 0 END), 0) AS dry_run,
       COALESCE(SUM(CASE WHEN outcome = 'delete_failed' THEN 1 ELSE 0 END), 0) AS delete_failed
     FROM found_files ${where}`;

  const countsForSessionStmt = db.prepare<{ session_id: string }>(
    countsSql("WHERE session_id = @session_id"),
  );
  const countsAllStmt = db.prepare(countsSql(""));

  const recordMany = db.transaction(
    (sessionId: string, paths: readonly string[], at: number): number => {
      let inserted = 0;
      for (const path of paths) {
        inserted += insertStmt.run({
          session_id: sessionId,
          path,
          found_at: at,
        }).changes;
      }
      return inserted;
    },
  );

  return {
    record(sessionId, paths) {
      if (paths.length === 0) return 0;
      return recordMany(sessionId, paths, now());
    },

    setOutcome(sessionId, path, outcome, error) {
      const result = setOutcomeStmt.run({
        session_id: sessionId,
        path,
        outcome,
        error: error ?? null,
      });
      return result.changes > 0;
    },

    pending(sessionId, limit) {
      let sql =
        "SELECT * FROM found_files WHERE session_id = @session_id AND outcome IS NULL ORDER BY found_at, rowid";
      const params: Record<string, unknown> = { session_id: sessionId };

      if (limit !== undefined) {
        sql += " LIMIT @limit";
        params.limit = limit;
      }

      const rows = db.prepare(sql).all(params) as FoundFileRow[];
      return rows.map(rowToFoundFile);
    },

    countsByOutcome(sessionId) {
      const row = (
        sessionId !== undefined
          ? countsForSessionStmt.get({ session_id: sessionId })
          : countsAllStmt.get()
      ) as {
        total: number;
        pending: number;
        deleted: number;
        dry_run: number;
        delete_failed: number;
      };
      return {
        total: row.total,
        pending: row.pending,
        deleted: row.deleted,
        dryRun: row.dry_run,
        deleteFailed: row.delete_failed,
      };
    },
  };
}
