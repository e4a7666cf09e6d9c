import { homedir } from "node:os";
import { resolve } from "node:path";
import { DEFAULT_ROOT_PATH } from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the configured state directory (or default) to an absolute path.
 */
export function resolveRootPath(input?: string): string {
  return resolve(expandHomePath(input ?? DEFAULT_ROOT_PATH));
}

/**
 * Resolves a sweep target the way a shell user means it: "~" expanded,
 * relative paths against the working directory, no trailing separator.
 */
export function resolveSearchPath(input: string, cwd = process.cwd()): string {
  return resolve(cwd, expandHomePath(input));
}

/** Resolves the configured database file against the state directory. */
export function resolveDatabasePath(configured: string, rootPath: string): string {
  return resolve(rootPath, expandHomePath(configured));
}
