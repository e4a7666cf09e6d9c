import type { Logger } from "@dsweep/core/logger";
import { EXIT_INTERRUPTED } from "./reporter.js";

export interface SignalSource {
  on(event: "SIGINT" | "SIGTERM", listener: () => void): unknown;
  off(event: "SIGINT" | "SIGTERM", listener: () => void): unknown;
}

/**
 * The first SIGINT/SIGTERM aborts the sweep so it can flush and stop cleanly;
 * a second one exits at once. Returns a function that removes the handlers.
 */
export function installSignalHandlers(
  controller: AbortController,
  logger: Logger,
  source: SignalSource = process,
  exit: (code: number) => void = (code) => process.exit(code),
): () => void {
  const onSignal = () => {
    if (controller.signal.aborted) {
      logger.warn("Second interrupt, exiting without cleanup");
      exit(EXIT_INTERRUPTED);
      return;
    }
    logger.info("Interrupt received, finishing in-flight directories");
    controller.abort();
  };

  source.on("SIGINT", onSignal);
  source.on("SIGTERM", onSignal);
  return () => {
    source.off("SIGINT", onSignal);
    source.off("SIGTERM", onSignal);
  };
}
