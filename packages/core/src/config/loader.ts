import { readFile } from "node:fs/promises";
import {
  DatastoreConfigSchema,
  type DatastoreConfig,
} from "../schemas/datastore-config.js";
import { ENV_VARS } from "./defaults.js";
import { resolveConfigPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  /** Defaults to process.env */
  env?: Record<string, string | undefined>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function envOverrides(
  env: Record<string, string | undefined>,
): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const [field, name] of Object.entries(ENV_VARS)) {
    const value = env[name];
    if (value !== undefined && value !== "") {
      overrides[field] = value;
    }
  }
  return overrides;
}

/**
 * Reads the JSON config file, overlays AZURE_STORAGE_* environment
 * variables and validates the result.
 *
 * The file is never written back: it may hold the account key.
 */
export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<DatastoreConfig> {
  const env = options?.env ?? process.env;
  const configPath = resolveConfigPath(options?.configPath, env);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (
      !(err instanceof Error && "code" in err && err.code === "ENOENT")
    ) {
      throw err;
    }
    // Missing file: environment and defaults only
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  if (!isRecord(parsed)) {
    return DatastoreConfigSchema.parse(parsed);
  }
  const azure = isRecord(parsed.azure) ? parsed.azure : {};

  return DatastoreConfigSchema.parse({
    ...parsed,
    azure: { ...azure, ...envOverrides(env) },
  });
}
