import { realpath } from "node:fs/promises";
import type Database from "better-sqlite3";
import type { Logger } from "pino";
import { errorMessage, SessionFailedError } from "../errors/catalog.js";
import {
  createDirectoryCache,
  type DirectoryCache,
} from "../storage/directory-cache.js";
import {
  createFoundFilesLedger,
  type FoundFilesLedger,
} from "../storage/found-files.js";
import { checkpoint } from "../storage/schema.js";
import {
  createSessionRegistry,
  type SessionRegistry,
} from "../storage/sessions.js";
import {
  systemClock,
  type Clock,
  type SearchSession,
  type WorkQueueEntry,
} from "../storage/types.js";
import { createWorkQueue, type WorkQueue } from "../storage/work-queue.js";
import { runWithDeadline } from "./deadline.js";
import { deleteFoundFiles, type DeletionSummary } from "./deleter.js";
import { applyResumePlan, planResume, resumeBacklog } from "./reconcile.js";
import { SweepStats, type StatsSnapshot } from "./stats.js";
import { walkDirectory } from "./walker.js";
import { createWriteBuffer, type WriteBuffer } from "./write-buffer.js";

/** Fixed for the lifetime of a session. */
export interface SweepOptions {
  /** Absolute path of the directory to sweep; symlinks in it are resolved before the session starts */
  rootPath: string;
  recursive: boolean;
  dryRun: boolean;
  forceRefresh: boolean;
  cacheWindowHours: number;
  concurrency: number;
  taskTimeoutMs: number;
  flushIntervalMs: number;
  flushThreshold: number;
  targetName: string;
  excludedPaths: readonly string[];
  deleteConcurrency: number;
}

export interface SweepDeps {
  db: Database.Database;
  cache: DirectoryCache;
  queue: WorkQueue;
  sessions: SessionRegistry;
  found: FoundFilesLedger;
  logger: Logger;
  now?: Clock;
  /** Directory lister; replaced in tests */
  walk?: typeof walkDirectory;
}

export type SweepStatus = "completed" | "interrupted";

export interface SweepResult {
  session: SearchSession;
  status: SweepStatus;
  /** The run continued an earlier session */
  resumed: boolean;
  stats: StatsSnapshot;
  /** Null when the run stopped before the deletion phase */
  deletion: DeletionSummary | null;
}

/** Hooks for callers that follow a sweep while it runs. */
export interface SweepObserver {
  /** Called once the session is known, before any directory is walked */
  onSessionStart?(session: SearchSession, stats: SweepStats, resumed: boolean): void;
}

export function createSweepDeps(
  db: Database.Database,
  options: Pick<SweepOptions, "forceRefresh" | "cacheWindowHours">,
  logger: Logger,
  now: Clock = systemClock,
): SweepDeps {
  return {
    db,
    cache: createDirectoryCache(db, {
      windowHours: options.cacheWindowHours,
      forceRefresh: options.forceRefresh,
      now,
      logger: logger.child({ component: "cache" }),
    }),
    queue: createWorkQueue(db, { now }),
    sessions: createSessionRegistry(db, { now }),
    found: createFoundFilesLedger(db, { now }),
    logger,
    now,
  };
}

function startSession(
  deps: SweepDeps,
  options: SweepOptions,
  log: Logger,
): { session: SearchSession; resumed: boolean } {
  const candidate = deps.sessions.findResumable(
    options.rootPath,
    options.recursive,
    options.dryRun,
  );

  if (candidate) {
    const plan = planResume(
      candidate,
      deps.queue.incompleteEntries(candidate.id),
    );
    if (plan.orphaned) {
      log.warn(
        { sessionId: candidate.id },
        "Previous run did not shut down cleanly, resuming its session",
      );
    }
    const session = applyResumePlan(deps, plan);
    log.info(
      {
        sessionId: session.id,
        backlog: resumeBacklog(plan),
        reset: plan.resetPaths.length,
      },
      "Resuming interrupted session",
    );
    return { session, resumed: true };
  }

  const session = deps.sessions.create({
    root: options.rootPath,
    recursive: options.recursive,
    force: options.forceRefresh,
    dryRun: options.dryRun,
  });
  deps.queue.enqueue(session.id, [options.rootPath]);
  log.info({ sessionId: session.id, root: options.rootPath }, "Started session");
  return { session, resumed: false };
}

/**
 * Real path of the sweep root. Cache keys, session roots and exclusion
 * prefixes are all matched against it. A root that cannot be resolved is kept
 * as given, and walking it records the error.
 */
async function canonicalRoot(path: string, log: Logger): Promise<string> {
  try {
    return await realpath(path);
  } catch (err) {
    log.debug({ path, error: errorMessage(err) }, "Could not resolve sweep root");
    return path;
  }
}

/**
 * Runs one sweep: resumes or starts a session, walks the tree with bounded
 * concurrency, deletes what was found, and settles the session as completed
 * or interrupted. Bookkeeping failures mark the session failed and throw
 * SessionFailedError; a session that could not be started is rolled back.
 */
export async function runSweep(
  deps: SweepDeps,
  sweepOptions: SweepOptions,
  signal?: AbortSignal,
  observer?: SweepObserver,
): Promise<SweepResult> {
  const log = deps.logger.child({ component: "sweep" });
  const now = deps.now ?? systemClock;
  const { cache, queue, sessions } = deps;
  const walkOne = deps.walk ?? walkDirectory;
  const options: SweepOptions = {
    ...sweepOptions,
    rootPath: await canonicalRoot(sweepOptions.rootPath, log),
  };

  let started: { session: SearchSession; resumed: boolean };
  try {
    const removed = sessions.cleanup(cache.windowMs);
    const pruned = cache.prune(now() - 2 * cache.windowMs);
    if (removed > 0 || pruned > 0) {
      log.debug({ sessions: removed, cacheEntries: pruned }, "Removed expired state");
    }
    started = deps.db.transaction(() => startSession(deps, options, log))();
  } catch (err) {
    const message = errorMessage(err);
    log.error({ root: options.rootPath, error: message }, "Session could not be started");
    throw new SessionFailedError(null, message);
  }

  let session = started.session;
  const sessionId = session.id;

  const stats = new SweepStats(session.counters);
  observer?.onSessionStart?.(session, stats, started.resumed);
  const buffer = createWriteBuffer(deps, sessionId, stats, {
    threshold: options.flushThreshold,
  });
  const inFlight = new Set<Promise<void>>();
  let fatal: unknown;

  const freshCount = cache.loadFreshIndex();
  log.debug({ freshCount }, "Loaded freshness index");

  const isFresh = (path: string) => cache.statusOf(path) === "fresh";

  async function runTask(entry: WorkQueueEntry): Promise<void> {
    const outcome = await runWithDeadline(
      entry.path,
      options.taskTimeoutMs,
      (taskSignal) =>
        walkOne(entry.path, {
          targetName: options.targetName,
          excludedPaths: options.excludedPaths,
          signal: taskSignal,
        }),
      signal,
    );

    if (outcome.timedOut) {
      const note = outcome.error.message;
      stats.addErrored();
      buffer.completeTask(entry.path, "failed", note);
      buffer.recordCache(entry.path, true, note);
      log.debug({ path: entry.path }, note);
      return;
    }

    const result = outcome.value;
    if (result.interrupted) {
      buffer.releaseTask(entry.path);
      buffer.recordCache(entry.path, false);
      return;
    }

    buffer.recordFound(result.matches);

    if (result.error) {
      const note = result.error.message;
      stats.addErrored();
      buffer.completeTask(entry.path, "failed", note);
      buffer.recordCache(entry.path, true, note);
      log.debug(
        { path: entry.path, code: result.error.code, error: note },
        "Directory could not be read",
      );
      return;
    }

    if (options.recursive) {
      buffer.enqueueChildren(result.children);
      stats.addSkipped(result.skipped.length);
      for (const skipped of result.skipped) {
        log.debug(skipped, "Skipped directory");
      }
    }

    if (entry.resumed) {
      stats.addResumed();
    } else {
      stats.addNew();
    }
    buffer.completeTask(entry.path, "completed");
    buffer.recordCache(entry.path, true);
  }

  function dispatch(entry: WorkQueueEntry): void {
    const task: Promise<void> = runTask(entry).then(
      () => {
        inFlight.delete(task);
      },
      (err: unknown) => {
        fatal ??= err;
        inFlight.delete(task);
      },
    );
    inFlight.add(task);
  }

  const flushTimer = setInterval(() => {
    if (fatal !== undefined) return;
    try {
      buffer.flush();
    } catch (err) {
      fatal = err;
    }
  }, options.flushIntervalMs);
  flushTimer.unref();

  try {
    while (!signal?.aborted && fatal === undefined) {
      if (buffer.shouldFlush()) buffer.flush();

      const room = options.concurrency - inFlight.size;
      if (room > 0) {
        const { entries, skipped } = queue.dequeueBatch(sessionId, room, isFresh);
        stats.addSkipped(skipped.length);
        for (const entry of entries) dispatch(entry);

        if (entries.length === 0 && skipped.length === 0) {
          if (buffer.pendingChildren > 0) {
            buffer.flush();
            continue;
          }
          if (inFlight.size === 0) break;
        }
        stats.setQueueDepth(queue.pendingCount(sessionId) + buffer.pendingChildren);
        if (entries.length === 0 && skipped.length > 0) continue;
      }

      if (inFlight.size > 0) await Promise.race(inFlight);
    }

    await Promise.all(inFlight);
    clearInterval(flushTimer);
    if (fatal !== undefined) throw fatal;
    buffer.flush();

    let deletion: DeletionSummary | null = null;
    if (!signal?.aborted) {
      deletion = await deleteFoundFiles(
        { found: deps.found, logger: log },
        sessionId,
        {
          dryRun: options.dryRun,
          concurrency: options.deleteConcurrency,
          signal,
        },
      );
      stats.addDeleted(deletion.deleted);
      stats.addDeleteFailures(deletion.failed);
    }

    stats.setQueueDepth(queue.pendingCount(sessionId));
    sessions.saveCounters(sessionId, stats.toCounters());

    const status: SweepStatus =
      deletion === null || deletion.remaining > 0 ? "interrupted" : "completed";
    session = sessions.transition(sessionId, status);
    log.info({ sessionId, status, ...stats.snapshot() }, "Session finished");

    checkpoint(deps.db);
    return {
      session,
      status,
      resumed: started.resumed,
      stats: stats.snapshot(),
      deletion,
    };
  } catch (err) {
    clearInterval(flushTimer);
    await Promise.allSettled(inFlight);

    const message = errorMessage(err);
    log.error({ sessionId, error: message }, "Session failed");
    try {
      sessions.transition(sessionId, "failed", message);
    } catch (transitionErr) {
      log.error(
        { sessionId, error: errorMessage(transitionErr) },
        "Could not mark session failed",
      );
    }
    throw new SessionFailedError(sessionId, message);
  }
}
