import type { Filter } from "./filters.js";
import type { Order } from "./orders.js";
import type { Entry, Query, QueryResult } from "./types.js";
import { filterKeyPrefix } from "./filters.js";
import { sortEntries } from "./orders.js";
import { QueryResults } from "./results.js";

/**
 * "/a/" → "/a/", "/a" → "/a/", "" and "/" → "" (match all).
 * Keys are otherwise taken verbatim.
 */
export function normalizePrefix(prefix: string | undefined): string {
  if (prefix === undefined) return "";
  const trimmed = prefix.replace(/\/+$/, "");
  return trimmed === "" ? "" : `${trimmed}/`;
}

async function* naiveFilter(
  source: AsyncIterable<QueryResult>,
  filter: Filter,
): AsyncGenerator<QueryResult> {
  for await (const result of source) {
    if (result.error !== undefined || filter.matches(result.entry)) {
      yield result;
    }
  }
}

async function* naiveOrder(
  source: AsyncIterable<QueryResult>,
  orders: readonly Order[],
): AsyncGenerator<QueryResult> {
  const entries: Entry[] = [];
  for await (const result of source) {
    if (result.error !== undefined) {
      yield result;
      return;
    }
    entries.push(result.entry);
  }
  for (const entry of sortEntries(entries, orders)) {
    yield { entry };
  }
}

async function* naiveOffset(
  source: AsyncIterable<QueryResult>,
  offset: number,
): AsyncGenerator<QueryResult> {
  let skipped = 0;
  for await (const result of source) {
    if (result.error === undefined && skipped < offset) {
      skipped++;
      continue;
    }
    yield result;
  }
}

async function* naiveLimit(
  source: AsyncIterable<QueryResult>,
  limit: number,
): AsyncGenerator<QueryResult> {
  let emitted = 0;
  for await (const result of source) {
    yield result;
    emitted++;
    if (emitted >= limit) return;
  }
}

async function* stripValues(
  source: AsyncIterable<QueryResult>,
): AsyncGenerator<QueryResult> {
  for await (const result of source) {
    if (result.error === undefined && result.entry.value !== undefined) {
      yield { entry: { key: result.entry.key, size: result.entry.size } };
    } else {
      yield result;
    }
  }
}

/**
 * Applies prefix, filters, orders, offset and limit over any result
 * sequence, in that order. Error results pass filters and offset, and
 * count towards limit. Closing the returned sequence closes `results`.
 */
export function naiveQueryApply(
  query: Query,
  results: QueryResults,
): QueryResults {
  let source: AsyncIterable<QueryResult> = results;

  const prefix = normalizePrefix(query.prefix);
  if (prefix !== "") {
    source = naiveFilter(source, filterKeyPrefix(prefix));
  }
  for (const filter of query.filters ?? []) {
    source = naiveFilter(source, filter);
  }
  if (query.orders !== undefined && query.orders.length > 0) {
    source = naiveOrder(source, query.orders);
  }
  if (query.offset !== undefined && query.offset > 0) {
    source = naiveOffset(source, query.offset);
  }
  if (query.limit !== undefined && query.limit > 0) {
    source = naiveLimit(source, query.limit);
  }
  if (query.keysOnly) {
    source = stripValues(source);
  }

  return new QueryResults(query, source, () => results.close());
}
