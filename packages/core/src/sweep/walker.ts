import { access, constants, opendir, stat } from "node:fs/promises";
import { basename, isAbsolute, join, sep } from "node:path";
import { errorCode, errorMessage } from "../errors/catalog.js";

export type SkipReason = "excluded" | "symlink" | "permission";

export interface SkippedEntry {
  path: string;
  reason: SkipReason;
}

export interface WalkError {
  code: string;
  message: string;
}

export interface WalkResult {
  /** Regular files named like the target */
  matches: string[];
  /** Readable, non-excluded subdirectories */
  children: string[];
  skipped: SkippedEntry[];
  /** Set when the directory could not be opened or read */
  error: WalkError | null;
  /** The signal fired before every entry was seen */
  interrupted: boolean;
}

export interface WalkOptions {
  targetName: string;
  /** Absolute path prefixes, or bare directory names matched anywhere */
  excludedPaths: readonly string[];
  signal?: AbortSignal;
}

/**
 * Whether a directory is excluded. Absolute entries match the path itself or
 * anything below it; bare names match the last path segment.
 */
export function isExcluded(
  path: string,
  excludedPaths: readonly string[],
): boolean {
  const name = basename(path);
  for (const excluded of excludedPaths) {
    if (isAbsolute(excluded)) {
      const prefix =
        excluded.length > 1 && excluded.endsWith(sep)
          ? excluded.slice(0, -1)
          : excluded;
      if (path === prefix || path.startsWith(prefix === sep ? sep : prefix + sep)) {
        return true;
      }
    } else if (name === excluded) {
      return true;
    }
  }
  return false;
}

async function isReadable(path: string): Promise<boolean> {
  try {
    await access(path, constants.R_OK | constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

async function pointsToDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

function toWalkError(err: unknown): WalkError {
  return { code: errorCode(err) ?? "UNKNOWN", message: errorMessage(err) };
}

/**
 * Lists one directory. Symbolic links are never followed; a link to a
 * directory is reported as skipped. Errors are returned, not thrown.
 */
export async function walkDirectory(
  dir: string,
  options: WalkOptions,
): Promise<WalkResult> {
  const result: WalkResult = {
    matches: [],
    children: [],
    skipped: [],
    error: null,
    interrupted: false,
  };

  if (options.signal?.aborted) {
    result.interrupted = true;
    return result;
  }

  try {
    const handle = await opendir(dir);
    for await (const entry of handle) {
      if (options.signal?.aborted) {
        result.interrupted = true;
        break;
      }

      const path = join(dir, entry.name);

      if (entry.isSymbolicLink()) {
        if (await pointsToDirectory(path)) {
          result.skipped.push({ path, reason: "symlink" });
        }
      } else if (entry.isFile()) {
        if (entry.name === options.targetName) {
          result.matches.push(path);
        }
      } else if (entry.isDirectory()) {
        if (isExcluded(path, options.excludedPaths)) {
          result.skipped.push({ path, reason: "excluded" });
        } else if (!(await isReadable(path))) {
          result.skipped.push({ path, reason: "permission" });
        } else {
          result.children.push(path);
        }
      }
    }
  } catch (err) {
    result.error = toWalkError(err);
  }

  return result;
}
