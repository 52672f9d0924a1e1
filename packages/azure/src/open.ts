import type { Datastore } from "@blob-datastore/core/datastore";
import type { DatastoreConfig } from "@blob-datastore/core/schemas";
import { createLogger, type Logger } from "@blob-datastore/core/logger";

import { createAzureBlobContainer } from "./backend/azure.js";
import { createBlobDatastore } from "./datastore.js";

export interface OpenAzureDatastoreOptions {
  /** Defaults to a logger built from config.logging */
  logger?: Logger;
  signal?: AbortSignal;
}

/** Builds the Azure container from validated config and opens the datastore. */
export async function openAzureDatastore(
  config: DatastoreConfig,
  options?: OpenAzureDatastoreOptions,
): Promise<Datastore> {
  const logger = options?.logger ?? createLogger(config.logging);
  const { accountName, containerName } = config.azure;

  logger.info({ account: accountName, container: containerName }, "Opening blob datastore");

  return createBlobDatastore({
    container: createAzureBlobContainer(config.azure),
    logger,
    fetchConcurrency: config.query.fetchConcurrency,
    pageSize: config.query.pageSize,
    signal: options?.signal,
  });
}
