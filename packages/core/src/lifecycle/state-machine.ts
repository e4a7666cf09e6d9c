/**
 * Lifecycle of a search session.
 *
 * States:
 * - active: scan in progress (created at search start or reactivated on resume)
 * - completed: queue drained, or declared done by cleanup
 * - interrupted: cancelled with work remaining; resumable
 * - failed: session bookkeeping could not be committed
 *
 * Completed and failed are terminal.
 */

import { InvalidSessionTransitionError } from "../errors/catalog.js";

export type SessionStatus = "active" | "completed" | "interrupted" | "failed";

export const SESSION_STATUSES: readonly SessionStatus[] = [
  "active",
  "completed",
  "interrupted",
  "failed",
];

/** Valid state transitions. Each key maps to the set of states it can transition to. */
const VALID_TRANSITIONS: Record<SessionStatus, ReadonlySet<SessionStatus>> = {
  active: new Set(["completed", "interrupted", "failed"]),
  interrupted: new Set(["active", "completed"]),
  completed: new Set(),
  failed: new Set(),
};

export function isSessionStatus(value: string): value is SessionStatus {
  return (SESSION_STATUSES as readonly string[]).includes(value);
}

export function canTransitionSession(
  from: SessionStatus,
  to: SessionStatus,
): boolean {
  return VALID_TRANSITIONS[from].has(to);
}

/**
 * Throws InvalidSessionTransitionError unless `from -> to` is in the table.
 */
export function assertSessionTransition(
  from: SessionStatus,
  to: SessionStatus,
  details?: Record<string, unknown>,
): void {
  if (!canTransitionSession(from, to)) {
    throw new InvalidSessionTransitionError(from, to, details);
  }
}
