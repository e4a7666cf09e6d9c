export {
  cacheStatus,
  cacheStats,
  clearIncomplete,
  hitRate,
  CLEARED_NOTE,
  type MaintenanceOptions,
  type CacheStatusReport,
  type CacheStatsReport,
  type ClearIncompleteResult,
  type InterruptedSessionSummary,
} from "./cache.js";
