import { TaskTimeoutError } from "../errors/catalog.js";

export type DeadlineOutcome<T> =
  | { timedOut: false; value: T }
  | { timedOut: true; error: TaskTimeoutError };

/**
 * Runs `task` with a signal that fires when `timeoutMs` elapses or `parent`
 * aborts. The deadline wins even if the task ignores its signal; a task that
 * settles later is left to finish on its own.
 */
export async function runWithDeadline<T>(
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<DeadlineOutcome<T>> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", forwardAbort, { once: true });
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<DeadlineOutcome<T>>((resolve) => {
    timer = setTimeout(() => {
      const error = new TaskTimeoutError(label, timeoutMs);
      resolve({ timedOut: true, error });
      controller.abort(error);
    }, timeoutMs);
  });

  const settled = task(controller.signal).then(
    (value): DeadlineOutcome<T> => ({ timedOut: false, value }),
  );

  try {
    return await Promise.race([settled, expired]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", forwardAbort);
  }
}
