import { emptyCounters, type SessionCounters } from "../storage/types.js";

/** Read-only progress view handed to reporters. */
export interface StatsSnapshot {
  readonly dirsNew: number;
  readonly dirsResumed: number;
  readonly dirsSkipped: number;
  readonly filesFound: number;
  readonly filesDeleted: number;
  readonly errors: number;
  readonly queueDepth: number;
}

/**
 * Per-session counters, shared by reference with every task of the session.
 * Seeded from the persisted session counters so a resumed run keeps its totals.
 */
export class SweepStats {
  private counters: SessionCounters;
  private deleteFailures = 0;
  private queueDepth = 0;

  constructor(initial: SessionCounters = emptyCounters()) {
    this.counters = { ...initial };
  }

  addNew(count = 1): void {
    this.counters.dirsNew += count;
  }

  addResumed(count = 1): void {
    this.counters.dirsResumed += count;
  }

  addSkipped(count = 1): void {
    this.counters.dirsSkipped += count;
  }

  addErrored(count = 1): void {
    this.counters.dirsErrored += count;
  }

  addFound(count: number): void {
    this.counters.filesFound += count;
  }

  addDeleted(count: number): void {
    this.counters.filesDeleted += count;
  }

  addDeleteFailures(count: number): void {
    this.deleteFailures += count;
  }

  setQueueDepth(depth: number): void {
    this.queueDepth = depth;
  }

  snapshot(): StatsSnapshot {
    return Object.freeze({
      dirsNew: this.counters.dirsNew,
      dirsResumed: this.counters.dirsResumed,
      dirsSkipped: this.counters.dirsSkipped,
      filesFound: this.counters.filesFound,
      filesDeleted: this.counters.filesDeleted,
      errors: this.counters.dirsErrored + this.deleteFailures,
      queueDepth: this.queueDepth,
    });
  }

  /** Counters in the shape persisted on the session row */
  toCounters(): SessionCounters {
    return { ...this.counters };
  }
}
