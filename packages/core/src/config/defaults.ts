import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), ".blob-datastore");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_ROOT_PATH, "config.json");

/** Environment variables overlaid onto the `azure` section of the file. */
export const ENV_VARS = {
  accountName: "AZURE_STORAGE_ACCOUNT",
  accountKey: "AZURE_STORAGE_KEY",
  containerName: "AZURE_STORAGE_CONTAINER",
  endpoint: "AZURE_STORAGE_ENDPOINT",
} as const;

/** Points at a config file other than DEFAULT_CONFIG_PATH. */
export const CONFIG_PATH_ENV_VAR = "BLOB_DATASTORE_CONFIG";
