import { describe, it, expect } from "vitest";
import { runWithDeadline } from "./deadline.js";
import { TaskTimeoutError } from "../errors/catalog.js";

describe("runWithDeadline", () => {
  it("returns the value of a task that finishes in time", async () => {
    const outcome = await runWithDeadline("/fast", 1000, async () => 42);
    expect(outcome).toEqual({ timedOut: false, value: 42 });
  });

  it("times out a task that never settles", async () => {
    const outcome = await runWithDeadline(
      "/stuck",
      20,
      () => new Promise<never>(() => {}),
    );

    expect(outcome.timedOut).toBe(true);
    if (outcome.timedOut) {
      expect(outcome.error).toBeInstanceOf(TaskTimeoutError);
      expect(outcome.error.message).toBe("timed out after 20ms");
      expect(outcome.error.details).toEqual({ path: "/stuck", timeoutMs: 20 });
    }
  });

  it("aborts the task signal on timeout", async () => {
    let seen: AbortSignal | undefined;
    const outcome = await runWithDeadline("/slow", 20, (signal) => {
      seen = signal;
      return new Promise<string>((resolve) => {
        signal.addEventListener("abort", () => resolve("stopped"));
      });
    });

    expect(outcome.timedOut).toBe(true);
    expect(seen?.aborted).toBe(true);
    expect(seen?.reason).toBeInstanceOf(TaskTimeoutError);
  });

  it("forwards a parent abort to the task", async () => {
    const parent = new AbortController();
    const pending = runWithDeadline(
      "/walk",
      5000,
      (signal) =>
        new Promise<string>((resolve) => {
          signal.addEventListener("abort", () => resolve("cancelled"));
        }),
      parent.signal,
    );
    parent.abort();

    expect(await pending).toEqual({ timedOut: false, value: "cancelled" });
  });

  it("hands an already aborted signal to the task", async () => {
    const parent = new AbortController();
    parent.abort();

    const outcome = await runWithDeadline(
      "/walk",
      5000,
      async (signal) => signal.aborted,
      parent.signal,
    );
    expect(outcome).toEqual({ timedOut: false, value: true });
  });

  it("propagates task errors", async () => {
    await expect(
      runWithDeadline("/bad", 1000, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
  });
});
