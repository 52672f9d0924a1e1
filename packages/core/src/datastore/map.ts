import type { Datastore } from "./interface.js";
import type { Entry } from "../query/types.js";
import { NotFoundError } from "../errors/catalog.js";
import { createBasicBatch } from "../batch/basic.js";
import { naiveQueryApply } from "../query/naive.js";
import { resultsFromEntries } from "../query/results.js";

/**
 * In-memory datastore backed by a Map.
 * Reference implementation of the contract; no persistence.
 */
export function createMapDatastore(): Datastore {
  const store = new Map<string, Uint8Array>();

  const datastore: Datastore = {
    async put(key, value) {
      // Store a copy to prevent external mutation
      store.set(key, new Uint8Array(value));
    },

    async get(key) {
      const value = store.get(key);
      if (value === undefined) {
        throw new NotFoundError({ details: { key } });
      }
      return new Uint8Array(value);
    },

    async has(key) {
      return store.has(key);
    },

    async getSize(key) {
      const value = store.get(key);
      if (value === undefined) {
        throw new NotFoundError({ details: { key } });
      }
      return value.length;
    },

    async delete(key) {
      store.delete(key);
    },

    async query(query) {
      // Snapshot so writes during iteration don't affect the sequence
      const entries: Entry[] = [...store].map(([key, value]) =>
        query.keysOnly
          ? { key, size: value.length }
          : { key, value: new Uint8Array(value), size: value.length },
      );
      return naiveQueryApply(query, resultsFromEntries(query, entries));
    },

    async sync() {},

    async batch() {
      return createBasicBatch(datastore);
    },

    async close() {},

    async diskUsage() {
      let total = 0;
      for (const value of store.values()) {
        total += value.length;
      }
      return total;
    },
  };

  return datastore;
}
