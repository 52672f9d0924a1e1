import type { Logger } from "pino";
import type { QueryResult } from "@blob-datastore/core/query";

import type { BlobContainer, BlobItem, BlobListSegment } from "../backend/interface.js";
import { createChannel, WaitGroup } from "./channel.js";
import { toError } from "./abort.js";

export interface ListEntriesOptions {
  container: BlobContainer;
  /** Backend listing prefix, already normalised. */
  prefix: string;
  keysOnly: boolean;
  /** Reads one value; rejections become per-entry errors. */
  fetch: (key: string, signal: AbortSignal) => Promise<Uint8Array>;
  fetchConcurrency: number;
  pageSize?: number;
  signal: AbortSignal;
  logger: Logger;
}

/**
 * Fetches the values of one page with at most `fetchConcurrency` requests
 * in flight, yielding results as they complete. The channel is closed once
 * every worker has finished, and returning early still joins them.
 */
async function* fetchPage(
  items: readonly BlobItem[],
  options: ListEntriesOptions,
): AsyncGenerator<QueryResult> {
  const { fetch, signal } = options;
  const channel = createChannel<QueryResult>();
  const group = new WaitGroup();
  let next = 0;

  const worker = async () => {
    while (next < items.length && !signal.aborted) {
      const item = items[next++];
      const entry = { key: item.name, size: item.contentLength };
      try {
        const value = await fetch(item.name, signal);
        channel.send({ entry: { ...entry, value, size: value.length } });
      } catch (err) {
        if (signal.aborted) return;
        channel.send({ entry, error: toError(err) });
      }
    }
  };

  const workers = Math.min(options.fetchConcurrency, items.length);
  for (let i = 0; i < workers; i++) {
    group.go(worker);
  }
  const joined = group.wait().finally(() => channel.close());

  try {
    yield* channel;
  } finally {
    await joined;
  }
}

/**
 * Lazily pages through the container, one listing request at a time,
 * following continuation markers until the listing is exhausted.
 * Entries come out unordered within a page when values are fetched.
 */
export async function* listEntries(
  options: ListEntriesOptions,
): AsyncGenerator<QueryResult> {
  const { container, prefix, keysOnly, pageSize, signal, logger } = options;
  let marker: string | undefined;
  let page = 0;

  do {
    if (signal.aborted) {
      yield { error: toError(signal.reason) };
      return;
    }

    let segment: BlobListSegment;
    try {
      segment = await container.listBlobs({ prefix, marker, pageSize, signal });
    } catch (err) {
      if (signal.aborted) {
        yield { error: toError(signal.reason) };
        return;
      }
      logger.error(
        { err, container: container.name, prefix, page },
        "Blob listing failed",
      );
      yield { error: toError(err) };
      return;
    }
    logger.debug(
      { container: container.name, page, items: segment.items.length },
      "Listed blob page",
    );

    if (keysOnly) {
      for (const item of segment.items) {
        if (signal.aborted) {
          yield { error: toError(signal.reason) };
          return;
        }
        yield { entry: { key: item.name, size: item.contentLength } };
      }
    } else if (segment.items.length > 0) {
      yield* fetchPage(segment.items, options);
      // Workers stop early on abort; don't let a partial page pass as complete
      if (signal.aborted) {
        yield { error: toError(signal.reason) };
        return;
      }
    }

    marker = segment.nextMarker;
    page++;
  } while (marker !== undefined);
}
