/**
 * Typed error catalog for dsweep.
 *
 * Per-directory and per-file problems are never thrown past the walker or the
 * deleter; these errors describe failures that reach a caller.
 */

export class SweepError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Storage

export class StorageError extends SweepError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("STORAGE_ERROR", message, details);
  }
}

export class StorageCorruptionError extends SweepError {
  constructor(details?: Record<string, unknown>) {
    super(
      "STORAGE_CORRUPTION",
      "Cache database failed its integrity check",
      details,
    );
  }
}

// Sessions

export class InvalidSessionTransitionError extends SweepError {
  constructor(from: string, to: string, details?: Record<string, unknown>) {
    super(
      "INVALID_SESSION_TRANSITION",
      `Invalid session transition: ${from} -> ${to}`,
      { from, to, ...details },
    );
  }
}

/** `sessionId` is null when the failure came before a session was started. */
export class SessionFailedError extends SweepError {
  constructor(sessionId: string | null, cause: string) {
    super(
      "SESSION_FAILED",
      sessionId === null
        ? `Session could not be started: ${cause}`
        : `Session ${sessionId} failed: ${cause}`,
      { sessionId, cause },
    );
  }
}

// Tasks

export class TaskTimeoutError extends SweepError {
  constructor(path: string, timeoutMs: number) {
    super("TASK_TIMEOUT", `timed out after ${timeoutMs}ms`, {
      path,
      timeoutMs,
    });
  }
}

// Configuration

export class ConfigError extends SweepError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_CONFIG", message, details);
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Node system error code (ENOENT, EACCES, ...) of an unknown thrown value. */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
