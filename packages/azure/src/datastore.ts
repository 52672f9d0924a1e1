/**
 * Datastore over a single blob container: each key is stored verbatim as
 * a blob name and every operation is one backend call.
 */

import type { Datastore } from "@blob-datastore/core/datastore";
import type { Logger } from "@blob-datastore/core/logger";
import { createBasicBatch } from "@blob-datastore/core/batch";
import { UnsupportedError } from "@blob-datastore/core/errors";
import { createSilentLogger } from "@blob-datastore/core/logger";
import {
  QueryResults,
  naiveQueryApply,
  normalizePrefix,
} from "@blob-datastore/core/query";

import type { BlobContainer } from "./backend/interface.js";
import {
  isBlobNotFound,
  isContainerAlreadyExists,
  translateNotFound,
} from "./errors/translate.js";
import { linkAbortSignal } from "./query/abort.js";
import { listEntries } from "./query/list.js";

export const DEFAULT_FETCH_CONCURRENCY = 16;

export interface BlobDatastoreOptions {
  /** Exclusively owned by the datastore for its lifetime. */
  container: BlobContainer;
  logger?: Logger;
  /** Max value fetches in flight per listing page. */
  fetchConcurrency?: number;
  pageSize?: number;
  /** Aborts container creation. */
  signal?: AbortSignal;
}

/**
 * Creates the container if needed and returns the datastore.
 * An existing container is fine; any other failure (e.g. bad credentials)
 * rejects unchanged.
 */
export async function createBlobDatastore(
  options: BlobDatastoreOptions,
): Promise<Datastore> {
  const { container, pageSize } = options;
  const logger = options.logger ?? createSilentLogger();
  const fetchConcurrency = options.fetchConcurrency ?? DEFAULT_FETCH_CONCURRENCY;

  try {
    await container.create({ signal: options.signal });
    logger.info({ container: container.name }, "Created blob container");
  } catch (err) {
    if (!isContainerAlreadyExists(err)) {
      throw err;
    }
    logger.debug({ container: container.name }, "Blob container already exists");
  }

  const datastore: Datastore = {
    async put(key, value, opts) {
      await container.upload(key, value, opts);
    },

    async get(key, opts) {
      try {
        return await container.download(key, opts);
      } catch (err) {
        throw translateNotFound(err, key);
      }
    },

    async has(key, opts) {
      try {
        await container.getProperties(key, opts);
        return true;
      } catch (err) {
        if (isBlobNotFound(err)) return false;
        throw err;
      }
    },

    async getSize(key, opts) {
      try {
        const { contentLength } = await container.getProperties(key, opts);
        return contentLength;
      } catch (err) {
        throw translateNotFound(err, key);
      }
    },

    async delete(key, opts) {
      try {
        await container.delete(key, opts);
      } catch (err) {
        if (!isBlobNotFound(err)) {
          throw err;
        }
      }
    },

    async query(query, opts) {
      const controller = new AbortController();
      const unlink = linkAbortSignal(opts?.signal, controller);

      const source = listEntries({
        container,
        prefix: normalizePrefix(query.prefix),
        keysOnly: query.keysOnly ?? false,
        fetch: (key, signal) => datastore.get(key, { signal }),
        fetchConcurrency,
        pageSize,
        signal: controller.signal,
        logger,
      });

      const results = new QueryResults(query, source, () => {
        unlink();
        controller.abort();
      });
      return naiveQueryApply(query, results);
    },

    // Writes are not buffered
    async sync() {},

    async batch() {
      return createBasicBatch(datastore);
    },

    async close() {},

    async diskUsage() {
      throw new UnsupportedError("diskUsage", {
        details: { container: container.name },
      });
    },
  };

  return datastore;
}
