import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), ".dsweep");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_ROOT_PATH, "config.json");

/** Environment variable that relocates the state directory. */
export const ROOT_PATH_ENV = "DSWEEP_ROOT_PATH";
