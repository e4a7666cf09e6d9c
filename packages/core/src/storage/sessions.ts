import { randomUUID } from "node:crypto";
import type Database from "better-sqlite3";
import { StorageError } from "../errors/catalog.js";
import {
  assertSessionTransition,
  isSessionStatus,
  type SessionStatus,
} from "../lifecycle/state-machine.js";
import {
  systemClock,
  type Clock,
  type SearchSession,
  type SessionCounters,
} from "./types.js";

export interface CreateSessionParams {
  root: string;
  recursive: boolean;
  force: boolean;
  dryRun: boolean;
}

/**
 * Durable record of search sessions and their lifecycle.
 * Status changes are validated against the session transition table.
 */
export interface SessionRegistry {
  create(params: CreateSessionParams): SearchSession;
  get(id: string): SearchSession | undefined;
  /** Latest interrupted, or orphaned active, session for the same root and flags */
  findResumable(
    root: string,
    recursive: boolean,
    dryRun: boolean,
  ): SearchSession | undefined;
  transition(id: string, to: SessionStatus, error?: string): SearchSession;
  saveCounters(id: string, counters: SessionCounters): void;
  listByStatus(status: SessionStatus): SearchSession[];
  countsByStatus(): Record<SessionStatus, number>;
  /**
   * Deletes unfinished sessions idle for longer than the window, and finished
   * ones older than twice the window, together with their queue and found-file
   * rows. Returns count of sessions removed.
   */
  cleanup(windowMs: number): number;
}

interface RawRow {
  id: string;
  root: string;
  recursive: number;
  force: number;
  dry_run: number;
  status: string;
  created_at: number;
  updated_at: number;
  dirs_new: number;
  dirs_resumed: number;
  dirs_skipped: number;
  dirs_errored: number;
  files_found: number;
  files_deleted: number;
  error: string | null;
}

function rowToSession(row: RawRow): SearchSession {
  if (!isSessionStatus(row.status)) {
    throw new StorageError(`Unknown session status: ${row.status}`, {
      sessionId: row.id,
    });
  }
  return {
    id: row.id,
    root: row.root,
    recursive: row.recursive === 1,
    force: row.force === 1,
    dryRun: row.dry_run === 1,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    counters: {
      dirsNew: row.dirs_new,
      dirsResumed: row.dirs_resumed,
      dirsSkipped: row.dirs_skipped,
      dirsErrored: row.dirs_errored,
      filesFound: row.files_found,
      filesDeleted: row.files_deleted,
    },
    error: row.error,
  };
}

export function createSessionRegistry(
  db: Database.Database,
  options?: { now?: Clock },
): SessionRegistry {
  const now = options?.now ?? systemClock;

  const insertStmt = db.prepare<{
    id: string;
    root: string;
    recursive: number;
    force: number;
    dry_run: number;
    at: number;
  }>(
    `INSERT INTO search_sessions
       (id, root, recursive, force, dry_run, status, created_at, updated_at)
     VALUES (@id, @root, @recursive, @force, @dry_run, 'active', @at, @at)`,
  );

  const getStmt = db.prepare<{ id: string }>(
    "SELECT * FROM search_sessions WHERE id = @id",
  );

  const findResumableStmt = db.prepare<{
    root: string;
    recursive: number;
    dry_run: number;
  }>(
    `SELECT * FROM search_sessions
     WHERE root = @root AND recursive = @recursive AND dry_run = @dry_run
       AND status IN ('interrupted', 'active')
     ORDER BY updated_at DESC, rowid DESC
     LIMIT 1`,
  );

  const transitionStmt = db.prepare<{
    id: string;
    from: SessionStatus;
    to: SessionStatus;
    error: string | null;
    at: number;
  }>(
    `UPDATE search_sessions SET status = @to, error = @error, updated_at = @at
     WHERE id = @id AND status = @from`,
  );

  const countersStmt = db.prepare<{
    id: string;
    dirs_new: number;
    dirs_resumed: number;
    dirs_skipped: number;
    dirs_errored: number;
    files_found: number;
    files_deleted: number;
    at: number;
  }>(
    `UPDATE search_sessions SET
       dirs_new = @dirs_new,
       dirs_resumed = @dirs_resumed,
       dirs_skipped = @dirs_skipped,
       dirs_errored = @dirs_errored,
       files_found = @files_found,
       files_deleted = @files_deleted,
       updated_at = @at
     WHERE id = @id`,
  );

  const listByStatusStmt = db.prepare<{ status: SessionStatus }>(
    "SELECT * FROM search_sessions WHERE status = @status ORDER BY updated_at DESC",
  );

  const countsStmt = db.prepare(
    "SELECT status, COUNT(*) AS cnt FROM search_sessions GROUP BY status",
  );

  const cleanupStmt = db.prepare<{ stale_cutoff: number; retention_cutoff: number }>(
    `DELETE FROM search_sessions
     WHERE (status IN ('active', 'interrupted') AND updated_at < @stale_cutoff)
        OR (status IN ('completed', 'failed') AND updated_at < @retention_cutoff)`,
  );

  function mustGet(id: string): SearchSession {
    const row = getStmt.get({ id }) as RawRow | undefined;
    if (!row) {
      throw new StorageError(`Unknown session: ${id}`, { sessionId: id });
    }
    return rowToSession(row);
  }

  const transition = db.transaction(
    (id: string, to: SessionStatus, error: string | null): SearchSession => {
      const current = mustGet(id);
      assertSessionTransition(current.status, to, { sessionId: id });
      transitionStmt.run({ id, from: current.status, to, error, at: now() });
      return mustGet(id);
    },
  );

  return {
    create(params) {
      const id = randomUUID();
      insertStmt.run({
        id,
        root: params.root,
        recursive: params.recursive ? 1 : 0,
        force: params.force ? 1 : 0,
        dry_run: params.dryRun ? 1 : 0,
        at: now(),
      });
      return mustGet(id);
    },

    get(id) {
      const row = getStmt.get({ id }) as RawRow | undefined;
      return row ? rowToSession(row) : undefined;
    },

    findResumable(root, recursive, dryRun) {
      const row = findResumableStmt.get({
        root,
        recursive: recursive ? 1 : 0,
        dry_run: dryRun ? 1 : 0,
      }) as RawRow | undefined;
      return row ? rowToSession(row) : undefined;
    },

    transition(id, to, error) {
      return transition(id, to, error ?? null);
    },

    saveCounters(id, counters) {
      countersStmt.run({
        id,
        dirs_new: counters.dirsNew,
        dirs_resumed: counters.dirsResumed,
        dirs_skipped: counters.dirsSkipped,
        dirs_errored: counters.dirsErrored,
        files_found: counters.filesFound,
        files_deleted: counters.filesDeleted,
        at: now(),
      });
    },

    listByStatus(status) {
      const rows = listByStatusStmt.all({ status }) as RawRow[];
      return rows.map(rowToSession);
    },

    countsByStatus() {
      const counts: Record<SessionStatus, number> = {
        active: 0,
        completed: 0,
        interrupted: 0,
        failed: 0,
      };
      const rows = countsStmt.all() as Array<{ status: string; cnt: number }>;
      for (const row of rows) {
        if (isSessionStatus(row.status)) counts[row.status] = row.cnt;
      }
      return counts;
    },

    cleanup(windowMs) {
      const at = now();
      return cleanupStmt.run({
        stale_cutoff: at - windowMs,
        retention_cutoff: at - 2 * windowMs,
      }).changes;
    },
  };
}
