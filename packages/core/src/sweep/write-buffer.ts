import type Database from "better-sqlite3";
import type { Logger } from "pino";
import type { DirectoryCache } from "../storage/directory-cache.js";
import type { FoundFilesLedger } from "../storage/found-files.js";
import type { SessionRegistry } from "../storage/sessions.js";
import type { CacheRecord } from "../storage/types.js";
import type { WorkQueue } from "../storage/work-queue.js";
import type { SweepStats } from "./stats.js";

export interface WriteBufferDeps {
  db: Database.Database;
  queue: WorkQueue;
  found: FoundFilesLedger;
  cache: DirectoryCache;
  sessions: SessionRegistry;
  logger: Logger;
}

export interface FlushResult {
  operations: number;
  filesFound: number;
  cacheWritten: boolean;
}

/**
 * Durable writes of a running sweep, held in memory and committed together.
 *
 * Queue, found-file and counter writes share one transaction, so a flush
 * lands whole or not at all; a failure there is thrown. Cache writes follow in
 * their own transaction and are allowed to fail. Child and match batches
 * that carry the buffer past its threshold are flushed on the spot.
 */
export interface WriteBuffer {
  completeTask(path: string, outcome: "completed" | "failed", error?: string): void;
  releaseTask(path: string): void;
  enqueueChildren(paths: readonly string[]): void;
  recordFound(paths: readonly string[]): void;
  recordCache(path: string, completed: boolean, error?: string): void;
  /** Buffered operations */
  readonly size: number;
  /** Child directories waiting to be enqueued */
  readonly pendingChildren: number;
  shouldFlush(): boolean;
  flush(): FlushResult;
}

interface Completion {
  path: string;
  outcome: "completed" | "failed";
  error: string | null;
}

export function createWriteBuffer(
  deps: WriteBufferDeps,
  sessionId: string,
  stats: SweepStats,
  options: { threshold: number },
): WriteBuffer {
  let completions: Completion[] = [];
  let releases: string[] = [];
  let children: string[] = [];
  let matches: string[] = [];
  let cacheRecords: CacheRecord[] = [];

  const commit = deps.db.transaction(
    (batch: {
      completions: Completion[];
      releases: string[];
      children: string[];
      matches: string[];
    }): number => {
      deps.queue.enqueue(sessionId, batch.children);
      for (const c of batch.completions) {
        deps.queue.complete(sessionId, c.path, c.outcome, c.error);
      }
      for (const path of batch.releases) {
        deps.queue.release(sessionId, path);
      }
      const inserted = deps.found.record(sessionId, batch.matches);
      const counters = stats.toCounters();
      deps.sessions.saveCounters(sessionId, {
        ...counters,
        filesFound: counters.filesFound + inserted,
      });
      return inserted;
    },
  );

  const buffer: WriteBuffer = {
    completeTask(path, outcome, error) {
      completions.push({ path, outcome, error: error ?? null });
    },

    releaseTask(path) {
      releases.push(path);
    },

    enqueueChildren(paths) {
      children.push(...paths);
      flushIfFull();
    },

    recordFound(paths) {
      matches.push(...paths);
      flushIfFull();
    },

    recordCache(path, completed, error) {
      cacheRecords.push({ sessionId, path, completed, error: error ?? null });
    },

    get size() {
      return (
        completions.length +
        releases.length +
        children.length +
        matches.length +
        cacheRecords.length
      );
    },

    get pendingChildren() {
      return children.length;
    },

    shouldFlush() {
      return buffer.size >= options.threshold;
    },

    flush() {
      const operations = buffer.size;
      const batch = { completions, releases, children, matches };
      const records = cacheRecords;

      const inserted = commit(batch);
      stats.addFound(inserted);

      completions = [];
      releases = [];
      children = [];
      matches = [];
      cacheRecords = [];

      const cacheWritten = deps.cache.recordBatch(records);
      if (operations > 0) {
        deps.logger.debug(
          { operations, filesFound: inserted, cacheWritten },
          "Flushed sweep writes",
        );
      }
      return { operations, filesFound: inserted, cacheWritten };
    },
  };

  function flushIfFull(): void {
    if (buffer.shouldFlush()) buffer.flush();
  }

  return buffer;
}
