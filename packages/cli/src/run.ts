import { stat } from "node:fs/promises";
import {
  loadConfig,
  resolveDatabasePath,
  resolveRootPath,
  resolveSearchPath,
  ROOT_PATH_ENV,
} from "@dsweep/core/config";
import { errorMessage, SessionFailedError } from "@dsweep/core/errors";
import {
  createLogger,
  levelForVerbosity,
  verbosityFromFlags,
  type Logger,
} from "@dsweep/core/logger";
import {
  cacheStats,
  cacheStatus,
  clearIncomplete,
} from "@dsweep/core/maintenance";
import { initializeDatabase } from "@dsweep/core/storage";
import { createSweepDeps, runSweep } from "@dsweep/core/sweep";
import {
  actionFor,
  buildSweepOptions,
  cacheWindowHours,
  type CliFlags,
} from "./options.js";
import {
  EXIT_FAILURE,
  EXIT_OK,
  exitCodeFor,
  formatCacheStats,
  formatCacheStatus,
  formatSummary,
  startProgressReporter,
} from "./reporter.js";
import { installSignalHandlers } from "./signals.js";

export interface RunContext {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Cancels the sweep; without one, SIGINT/SIGTERM handlers are installed */
  signal?: AbortSignal;
  /** Receives summary and report lines; stdout by default */
  out?: (line: string) => void;
  /** Replaces the logger built from config and verbosity flags */
  logger?: Logger;
  progressIntervalMs?: number;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/** Runs one invocation and returns the process exit code. */
export async function runCli(
  dir: string,
  flags: CliFlags,
  context: RunContext = {},
): Promise<number> {
  const env = context.env ?? process.env;
  const out = context.out ?? ((line: string) => process.stdout.write(`${line}\n`));

  const rootPath = resolveRootPath(env[ROOT_PATH_ENV]);
  const config = await loadConfig({ rootPath, configPath: flags.config });
  const logger =
    context.logger ??
    createLogger({
      ...config.logging,
      level: levelForVerbosity(
        verbosityFromFlags(flags.verbose, flags.quiet),
        config.logging.level,
      ),
    });

  const action = actionFor(flags);
  const searchPath = resolveSearchPath(dir, context.cwd);
  if (action === "sweep" && !(await isDirectory(searchPath))) {
    logger.error({ path: searchPath }, "Not a directory");
    return EXIT_FAILURE;
  }

  const databasePath = resolveDatabasePath(config.database.path, rootPath);
  const db = initializeDatabase(databasePath);
  const windowHours = cacheWindowHours(config, flags);
  const maintenance = { databasePath, windowHours, logger };

  try {
    switch (action) {
      case "cache-status":
        formatCacheStatus(cacheStatus(db, maintenance)).forEach(out);
        return EXIT_OK;
      case "cache-stats":
        formatCacheStats(cacheStats(db, maintenance)).forEach(out);
        return EXIT_OK;
      case "cache-clear-incomplete": {
        const cleared = clearIncomplete(db, maintenance);
        out(
          `Removed ${cleared.cacheEntriesRemoved} incomplete cache entries, completed ${cleared.sessionsCompleted} interrupted sessions`,
        );
        return EXIT_OK;
      }
      case "sweep":
        break;
    }

    const options = buildSweepOptions(config, flags, searchPath);
    const deps = createSweepDeps(db, options, logger);
    let stopReporter: (() => void) | undefined;
    let removeHandlers: (() => void) | undefined;
    let signal = context.signal;
    if (!signal) {
      const controller = new AbortController();
      removeHandlers = installSignalHandlers(controller, logger);
      signal = controller.signal;
    }

    try {
      const result = await runSweep(deps, options, signal, {
        onSessionStart(session, stats, resumed) {
          logger.debug({ sessionId: session.id, resumed }, "Sweep started");
          stopReporter = startProgressReporter(
            stats,
            logger,
            context.progressIntervalMs,
          );
        },
      });
      formatSummary(result, options.dryRun).forEach(out);
      return exitCodeFor(result.status);
    } catch (err) {
      if (err instanceof SessionFailedError) {
        logger.error({ error: errorMessage(err) }, "Sweep failed");
        return EXIT_FAILURE;
      }
      throw err;
    } finally {
      stopReporter?.();
      removeHandlers?.();
    }
  } finally {
    db.close();
  }
}
