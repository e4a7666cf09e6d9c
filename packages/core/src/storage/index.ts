export type {
  Clock,
  DirectoryStatus,
  DirectoryCacheEntry,
  CacheRecord,
  CacheStats,
  QueueState,
  WorkQueueEntry,
  SessionCounters,
  SearchSession,
  DeletionOutcome,
  FoundFileRecord,
} from "./types.js";
export { systemClock, emptyCounters, HOUR_MS } from "./types.js";
export {
  initializeDatabase,
  migrate,
  checkpoint,
  SCHEMA_VERSION,
} from "./schema.js";
export {
  createDirectoryCache,
  classifyEntry,
  type DirectoryCache,
  type DirectoryCacheOptions,
} from "./directory-cache.js";
export {
  createWorkQueue,
  type WorkQueue,
  type DequeueResult,
} from "./work-queue.js";
export {
  createSessionRegistry,
  type SessionRegistry,
  type CreateSessionParams,
} from "./sessions.js";
export {
  createFoundFilesLedger,
  type FoundFilesLedger,
  type OutcomeCounts,
} from "./found-files.js";
