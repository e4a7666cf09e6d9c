/**
 * Row readers for storage tests.
 * Read straight from the tables so assertions do not depend on the accessors under test.
 */

import type Database from "better-sqlite3";
import { rowToCacheEntry, type CacheRow } from "../storage/directory-cache.js";
import { rowToFoundFile, type FoundFileRow } from "../storage/found-files.js";
import { rowToQueueEntry, type QueueRow } from "../storage/work-queue.js";
import type {
  DirectoryCacheEntry,
  FoundFileRecord,
  WorkQueueEntry,
} from "../storage/types.js";

export function readCacheEntry(
  db: Database.Database,
  path: string,
): DirectoryCacheEntry | undefined {
  const row = db
    .prepare("SELECT * FROM directory_cache WHERE path = ?")
    .get(path) as CacheRow | undefined;
  return row ? rowToCacheEntry(row) : undefined;
}

export function readQueueEntry(
  db: Database.Database,
  sessionId: string,
  path: string,
): WorkQueueEntry | undefined {
  const row = db
    .prepare("SELECT * FROM work_queue WHERE session_id = ? AND path = ?")
    .get(sessionId, path) as QueueRow | undefined;
  return row ? rowToQueueEntry(row) : undefined;
}

/** Every found file of a session, in the order it was recorded */
export function readFoundFiles(
  db: Database.Database,
  sessionId: string,
): FoundFileRecord[] {
  const rows = db
    .prepare("SELECT * FROM found_files WHERE session_id = ? ORDER BY found_at, rowid")
    .all(sessionId) as FoundFileRow[];
  return rows.map(rowToFoundFile);
}
