import type { Entry, Query, QueryResult } from "./types.js";

/**
 * Lazy result sequence of a query.
 *
 * Wraps any async iterable source. `close()` is idempotent: it runs the
 * release hook first (so a producer blocked on backend calls gets aborted)
 * and then returns the source iterator so its cleanup runs. Breaking out of
 * a `for await` loop closes the sequence.
 */
export class QueryResults implements AsyncIterable<QueryResult> {
  private readonly iterator: AsyncIterator<QueryResult>;
  private closing: Promise<void> | null = null;

  constructor(
    readonly query: Query,
    source: AsyncIterable<QueryResult>,
    private readonly release?: () => void | Promise<void>,
  ) {
    this.iterator = source[Symbol.asyncIterator]();
  }

  /** Next result, or undefined once the sequence is exhausted or closed. */
  async next(): Promise<QueryResult | undefined> {
    if (this.closing) return undefined;
    const step = await this.iterator.next();
    if (step.done) {
      await this.close();
      return undefined;
    }
    return step.value;
  }

  /** Collects the remaining entries. Rejects with the first error result. */
  async rest(): Promise<Entry[]> {
    const entries: Entry[] = [];
    try {
      for (;;) {
        const result = await this.next();
        if (result === undefined) break;
        if (result.error !== undefined) throw result.error;
        entries.push(result.entry);
      }
    } finally {
      await this.close();
    }
    return entries;
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = (async () => {
        await this.release?.();
        await this.iterator.return?.();
      })();
    }
    return this.closing;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<QueryResult, void, undefined> {
    try {
      for (;;) {
        const result = await this.next();
        if (result === undefined) return;
        yield result;
      }
    } finally {
      await this.close();
    }
  }
}

/** Results over an in-memory list of entries. */
export function resultsFromEntries(
  query: Query,
  entries: Iterable<Entry>,
): QueryResults {
  async function* source(): AsyncGenerator<QueryResult> {
    for (const entry of entries) {
      yield { entry };
    }
  }
  return new QueryResults(query, source());
}
