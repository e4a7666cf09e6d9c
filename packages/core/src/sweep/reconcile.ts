import type { SessionRegistry } from "../storage/sessions.js";
import type { SearchSession, WorkQueueEntry } from "../storage/types.js";
import type { WorkQueue } from "../storage/work-queue.js";

/** What resuming a session has to do, computed from persisted state alone. */
export interface ResumePlan {
  sessionId: string;
  /** in_progress entries left behind by the previous run */
  resetPaths: string[];
  /** entries still pending from the previous run */
  pendingPaths: string[];
  /** The session was still marked active: its run never shut down cleanly */
  orphaned: boolean;
}

export function planResume(
  session: SearchSession,
  incomplete: readonly WorkQueueEntry[],
): ResumePlan {
  const resetPaths: string[] = [];
  const pendingPaths: string[] = [];

  for (const entry of incomplete) {
    if (entry.sessionId !== session.id) continue;
    if (entry.state === "in_progress") {
      resetPaths.push(entry.path);
    } else if (entry.state === "pending") {
      pendingPaths.push(entry.path);
    }
  }

  return {
    sessionId: session.id,
    resetPaths,
    pendingPaths,
    orphaned: session.status === "active",
  };
}

/** Total entries the resumed run starts with as pending. */
export function resumeBacklog(plan: ResumePlan): number {
  return plan.resetPaths.length + plan.pendingPaths.length;
}

/**
 * Carries out a plan: an orphaned session is first marked interrupted, its
 * stale claims go back to pending, and the session becomes active again.
 */
export function applyResumePlan(
  deps: { sessions: SessionRegistry; queue: WorkQueue },
  plan: ResumePlan,
): SearchSession {
  if (plan.orphaned) {
    deps.sessions.transition(plan.sessionId, "interrupted", "orphaned");
  }
  deps.queue.resetInProgress(plan.sessionId, plan.resetPaths);
  return deps.sessions.transition(plan.sessionId, "active");
}
