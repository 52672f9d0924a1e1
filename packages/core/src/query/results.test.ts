import { describe, it, expect, vi } from "vitest";
import type { QueryResult } from "./types.js";
import { QueryResults, resultsFromEntries } from "./results.js";

describe("QueryResults", () => {
  it("next() walks the sequence and then returns undefined", async () => {
    const results = resultsFromEntries({}, [
      { key: "/a", size: 1 },
      { key: "/b", size: 2 },
    ]);

    expect((await results.next())?.entry?.key).toBe("/a");
    expect((await results.next())?.entry?.key).toBe("/b");
    expect(await results.next()).toBeUndefined();
    expect(await results.next()).toBeUndefined();
  });

  it("rest() rejects with the first error result", async () => {
    const failure = new Error("boom");
    async function* source(): AsyncGenerator<QueryResult> {
      yield { entry: { key: "/a", size: 0 } };
      yield { error: failure };
    }

    await expect(new QueryResults({}, source()).rest()).rejects.toBe(failure);
  });

  it("close() releases once and is idempotent", async () => {
    const release = vi.fn();
    const results = resultsFromEntries({}, []);
    const wrapped = new QueryResults({}, results, release);

    await wrapped.close();
    await wrapped.close();

    expect(release).toHaveBeenCalledTimes(1);
  });

  it("breaking out of for-await closes the sequence", async () => {
    const release = vi.fn();
    const wrapped = new QueryResults(
      {},
      resultsFromEntries({}, [
        { key: "/a", size: 0 },
        { key: "/b", size: 0 },
      ]),
      release,
    );

    for await (const result of wrapped) {
      expect(result.entry?.key).toBe("/a");
      break;
    }

    expect(release).toHaveBeenCalledTimes(1);
    expect(await wrapped.next()).toBeUndefined();
  });

  it("keeps the originating query", () => {
    const query = { prefix: "/a", keysOnly: true };
    expect(resultsFromEntries(query, []).query).toBe(query);
  });
});
