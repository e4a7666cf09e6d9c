import type { SessionStatus } from "../lifecycle/state-machine.js";

/** Epoch-millisecond clock; injectable so window logic can be tested */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export const HOUR_MS = 60 * 60 * 1000;

export type DirectoryStatus = "fresh" | "stale" | "incomplete" | "not_cached";

export interface DirectoryCacheEntry {
  path: string;
  lastSearched: number;
  completed: boolean;
  sessionId: string | null;
  error: string | null; // set on completed-with-error (timeouts, unreadable dirs)
}

export interface CacheRecord {
  sessionId: string;
  path: string;
  completed: boolean;
  error?: string | null;
}

export interface CacheStats {
  totalEntries: number;
  completed: number;
  incomplete: number;
  withErrors: number;
  fresh: number;
}

export type QueueState = "pending" | "in_progress" | "completed" | "failed";

export interface WorkQueueEntry {
  sessionId: string;
  path: string;
  state: QueueState;
  enqueuedAt: number;
  resumed: boolean; // carried over into a resumed run
  error: string | null;
}

export interface SessionCounters {
  dirsNew: number;
  dirsResumed: number;
  dirsSkipped: number;
  dirsErrored: number;
  filesFound: number;
  filesDeleted: number;
}

export interface SearchSession {
  id: string;
  root: string;
  recursive: boolean;
  force: boolean;
  dryRun: boolean;
  status: SessionStatus;
  createdAt: number;
  updatedAt: number;
  counters: SessionCounters;
  error: string | null;
}

export type DeletionOutcome = "deleted" | "dry_run" | "delete_failed";

export interface FoundFileRecord {
  sessionId: string;
  path: string;
  foundAt: number;
  outcome: DeletionOutcome | null; // null until the deletion phase reaches it
  error: string | null;
}

export function emptyCounters(): SessionCounters {
  return {
    dirsNew: 0,
    dirsResumed: 0,
    dirsSkipped: 0,
    dirsErrored: 0,
    filesFound: 0,
    filesDeleted: 0,
  };
}
