#!/usr/bin/env node
import { SweepError, errorMessage } from "@dsweep/core/errors";
import { buildProgram } from "./program.js";
import { EXIT_FAILURE } from "./reporter.js";
import { runCli } from "./run.js";

async function main(): Promise<void> {
  const program = buildProgram(async (dir, flags) => {
    process.exitCode = await runCli(dir, flags);
  });
  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  if (err instanceof SweepError) {
    console.error(errorMessage(err), JSON.stringify(err.toJSON().error));
  } else {
    console.error(errorMessage(err));
  }
  process.exit(EXIT_FAILURE);
});
