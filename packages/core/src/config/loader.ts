import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { ZodError } from "zod";
import {
  SweepConfigSchema,
  type SweepConfig,
} from "../schemas/sweep-config.js";
import { ConfigError, errorCode } from "../errors/catalog.js";
import { resolveRootPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  rootPath?: string;
}

function configPathFor(options?: LoadConfigOptions): string {
  return (
    options?.configPath ??
    join(resolveRootPath(options?.rootPath), "config.json")
  );
}

export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<SweepConfig> {
  const configPath = configPathFor(options);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (errorCode(err) !== "ENOENT") {
      throw err;
    }
    // Missing file: defaults apply
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};

  let config: SweepConfig;
  try {
    config = SweepConfigSchema.parse(parsed);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(`Invalid config at ${configPath}`, {
        configPath,
        issues: err.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      });
    }
    throw err;
  }

  // Write back so that defaults are visible and editable in config.json
  const serialized = JSON.stringify(config, null, 2) + "\n";
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized);
  }

  return config;
}

export async function saveConfig(
  config: SweepConfig,
  options?: LoadConfigOptions,
): Promise<void> {
  const configPath = configPathFor(options);
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(config, null, 2) + "\n", "utf-8");
}
