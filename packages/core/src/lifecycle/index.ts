export {
  SESSION_STATUSES,
  assertSessionTransition,
  canTransitionSession,
  isSessionStatus,
  type SessionStatus,
} from "./state-machine.js";
