import { unlink } from "node:fs/promises";
import type { Logger } from "pino";
import { errorCode, errorMessage } from "../errors/catalog.js";
import type { FoundFilesLedger } from "../storage/found-files.js";
import type { DeletionOutcome, FoundFileRecord } from "../storage/types.js";

export interface DeleteOptions {
  dryRun: boolean;
  concurrency: number;
  signal?: AbortSignal;
}

export interface DeletionSummary {
  deleted: number;
  dryRun: number;
  failed: number;
  /** Files left without an outcome because the signal fired */
  remaining: number;
}

async function deleteOne(
  record: FoundFileRecord,
  dryRun: boolean,
): Promise<{ outcome: DeletionOutcome; error: string | null }> {
  if (dryRun) return { outcome: "dry_run", error: null };
  try {
    await unlink(record.path);
    return { outcome: "deleted", error: null };
  } catch (err) {
    const code = errorCode(err);
    return {
      outcome: "delete_failed",
      error: code === "ENOENT" ? "vanished" : (code ?? errorMessage(err)),
    };
  }
}

/**
 * Settles every found file of a session that has no outcome yet, with at most
 * `concurrency` deletions running at once. Per-file failures are recorded on
 * the ledger; ledger write errors propagate.
 */
export async function deleteFoundFiles(
  deps: { found: FoundFilesLedger; logger: Logger },
  sessionId: string,
  options: DeleteOptions,
): Promise<DeletionSummary> {
  const pending = deps.found.pending(sessionId);
  const summary: DeletionSummary = {
    deleted: 0,
    dryRun: 0,
    failed: 0,
    remaining: 0,
  };
  let next = 0;

  async function worker(): Promise<void> {
    while (next < pending.length && !options.signal?.aborted) {
      const record = pending[next++];
      if (record === undefined) return;

      const { outcome, error } = await deleteOne(record, options.dryRun);
      deps.found.setOutcome(sessionId, record.path, outcome, error);

      switch (outcome) {
        case "deleted":
          summary.deleted++;
          break;
        case "dry_run":
          summary.dryRun++;
          deps.logger.info({ path: record.path }, "Would delete");
          break;
        case "delete_failed":
          summary.failed++;
          deps.logger.debug({ path: record.path, error }, "Delete failed");
          break;
      }
    }
  }

  const workers = Math.max(1, Math.min(options.concurrency, pending.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));

  summary.remaining = pending.length - next;
  return summary;
}
