import { homedir } from "node:os";
import { resolve } from "node:path";
import { CONFIG_PATH_ENV_VAR, DEFAULT_CONFIG_PATH } from "./defaults.js";

/** `~` and `~/...` only; `~user` forms are left alone. */
export function expandHomePath(input: string): string {
  const match = /^~(?=$|\/)/.exec(input);
  return match ? resolve(homedir(), `.${input.slice(1)}`) : input;
}

/**
 * Locates the datastore's JSON config: an explicit path first, then
 * $BLOB_DATASTORE_CONFIG, then ~/.blob-datastore/config.json.
 */
export function resolveConfigPath(
  input?: string,
  env: Record<string, string | undefined> = process.env,
): string {
  const fromEnv = env[CONFIG_PATH_ENV_VAR] || undefined;
  return resolve(expandHomePath(input ?? fromEnv ?? DEFAULT_CONFIG_PATH));
}
