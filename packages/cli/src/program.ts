import { createRequire } from "node:module";
import { Command } from "commander";
import { DEFAULT_CONFIG_PATH } from "@dsweep/core/config";
import {
  parseNonNegativeInt,
  parsePositiveInt,
  type CliFlags,
} from "./options.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export type CliHandler = (dir: string, flags: CliFlags) => Promise<void>;

export function buildProgram(handler: CliHandler): Command {
  const program = new Command();

  program
    .name("dsweep")
    .description(
      "Delete .DS_Store files, remembering which directories were already swept",
    )
    .version(pkg.version)
    .argument("[dir]", "directory to sweep", ".")
    .option("-r, --recursive", "descend into subdirectories", false)
    .option("-d, --dry-run", "report matches without deleting them", false)
    .option("-f, --force", "ignore cached results and rescan everything", false)
    .option("-v, --verbose", "log every directory and file problem", false)
    .option("-q, --quiet", "only log warnings and errors", false)
    .option(
      "--cache-hours <hours>",
      "how long a scanned directory stays fresh",
      parseNonNegativeInt,
    )
    .option(
      "--concurrency <n>",
      "directories scanned at once",
      parsePositiveInt,
    )
    .option("--timeout <ms>", "per-directory scan deadline", parsePositiveInt)
    .option("--config <path>", `config file (default: ${DEFAULT_CONFIG_PATH})`)
    .option("--cache-status", "list incomplete scans and resumable sessions", false)
    .option("--cache-stats", "show cache and session statistics", false)
    .option(
      "--cache-clear-incomplete",
      "forget incomplete scans and close interrupted sessions",
      false,
    )
    .action(async (dir: string, flags: CliFlags) => {
      await handler(dir, flags);
    });

  return program;
}
