export {
  runSweep,
  createSweepDeps,
  type SweepOptions,
  type SweepDeps,
  type SweepResult,
  type SweepStatus,
  type SweepObserver,
} from "./orchestrator.js";
export { SweepStats, type StatsSnapshot } from "./stats.js";
export {
  walkDirectory,
  isExcluded,
  type WalkOptions,
  type WalkResult,
  type WalkError,
  type SkippedEntry,
  type SkipReason,
} from "./walker.js";
export { runWithDeadline, type DeadlineOutcome } from "./deadline.js";
export {
  planResume,
  applyResumePlan,
  resumeBacklog,
  type ResumePlan,
} from "./reconcile.js";
export {
  createWriteBuffer,
  type WriteBuffer,
  type WriteBufferDeps,
  type FlushResult,
} from "./write-buffer.js";
export {
  deleteFoundFiles,
  type DeleteOptions,
  type DeletionSummary,
} from "./deleter.js";
