/**
 * Parametrized test suite for Datastore implementations
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Datastore } from "../datastore/interface.js";
import type { Entry } from "../query/types.js";
import { NotFoundError } from "../errors/catalog.js";
import { orderByKey, orderByKeyDescending } from "../query/orders.js";
import { filterKeyCompare } from "../query/filters.js";

/**
 * Context provided by the datastore factory
 */
export interface DatastoreTestContext {
  datastore: Datastore;
  /** Listing page size of the backend, when it pages. */
  pageSize?: number;
  cleanup?: () => Promise<void>;
}

export type DatastoreFactory = () => Promise<DatastoreTestContext>;

const text = (value: string) => new TextEncoder().encode(value);
const decode = (value: Uint8Array | undefined) =>
  value === undefined ? undefined : new TextDecoder().decode(value);

const byKey = (a: Entry, b: Entry) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0);

/**
 * Create the Datastore test suite with a specific factory
 */
export function createDatastoreTests(
  name: string,
  factory: DatastoreFactory,
): void {
  describe(`Datastore [${name}]`, () => {
    let ctx: DatastoreTestContext;

    beforeEach(async () => {
      ctx = await factory();
    });

    afterEach(async () => {
      await ctx.cleanup?.();
    });

    describe("absent keys", () => {
      it("get rejects with NotFoundError", async () => {
        await expect(ctx.datastore.get("/never/written")).rejects.toBeInstanceOf(
          NotFoundError,
        );
      });

      it("has returns false", async () => {
        expect(await ctx.datastore.has("/never/written")).toBe(false);
      });

      it("getSize rejects with NotFoundError", async () => {
        await expect(
          ctx.datastore.getSize("/never/written"),
        ).rejects.toBeInstanceOf(NotFoundError);
      });

      it("delete succeeds", async () => {
        await expect(ctx.datastore.delete("/never/written")).resolves.toBeUndefined();
      });
    });

    describe("put / get", () => {
      it("round-trips bytes exactly", async () => {
        const value = Uint8Array.from({ length: 256 }, (_, i) => i);
        await ctx.datastore.put("/bytes", value);

        expect(await ctx.datastore.get("/bytes")).toEqual(value);
        expect(await ctx.datastore.has("/bytes")).toBe(true);
        expect(await ctx.datastore.getSize("/bytes")).toBe(256);
      });

      it("stores empty values", async () => {
        await ctx.datastore.put("/empty", new Uint8Array(0));

        expect(await ctx.datastore.get("/empty")).toEqual(new Uint8Array(0));
        expect(await ctx.datastore.getSize("/empty")).toBe(0);
      });

      it("overwrites with the latest value", async () => {
        await ctx.datastore.put("/k", text("first"));
        await ctx.datastore.put("/k", text("second"));

        expect(decode(await ctx.datastore.get("/k"))).toBe("second");
        expect(await ctx.datastore.getSize("/k")).toBe(6);
      });

      it("is not affected by later mutation of the input", async () => {
        const value = text("abc");
        await ctx.datastore.put("/k", value);
        value[0] = 0x7a;

        expect(decode(await ctx.datastore.get("/k"))).toBe("abc");
      });

      it("treats keys verbatim", async () => {
        await ctx.datastore.put("/Case", text("upper"));
        await ctx.datastore.put("/case", text("lower"));

        expect(decode(await ctx.datastore.get("/Case"))).toBe("upper");
        expect(decode(await ctx.datastore.get("/case"))).toBe("lower");
      });
    });

    describe("delete", () => {
      it("removes a stored key", async () => {
        await ctx.datastore.put("/k", text("v"));
        await ctx.datastore.delete("/k");

        expect(await ctx.datastore.has("/k")).toBe(false);
        await expect(ctx.datastore.get("/k")).rejects.toBeInstanceOf(NotFoundError);
      });

      it("is idempotent", async () => {
        await ctx.datastore.put("/k", text("v"));
        await ctx.datastore.delete("/k");
        await expect(ctx.datastore.delete("/k")).resolves.toBeUndefined();
      });
    });

    describe("query", () => {
      it("keys-only returns every key without values across pages", async () => {
        const count = (ctx.pageSize ?? 10) * 3 + 1;
        const keys: string[] = [];
        for (let i = 0; i < count; i++) {
          const key = `/many/${String(i).padStart(3, "0")}`;
          keys.push(key);
          await ctx.datastore.put(key, text(`value-${i}`));
        }

        const results = await ctx.datastore.query({ keysOnly: true });
        const entries = await results.rest();

        expect(entries.map((e) => e.key).sort()).toEqual(keys);
        expect(entries.every((e) => e.value === undefined)).toBe(true);
        const first = entries.find((e) => e.key === "/many/000");
        expect(first?.size).toBe(7);
      });

      it("pairs each key with its value", async () => {
        const count = (ctx.pageSize ?? 10) * 2 + 3;
        for (let i = 0; i < count; i++) {
          await ctx.datastore.put(`/v/${i}`, text(`value-${i}`));
        }

        const entries = await (await ctx.datastore.query({})).rest();

        expect(entries).toHaveLength(count);
        for (const entry of entries) {
          const index = entry.key.slice("/v/".length);
          expect(decode(entry.value)).toBe(`value-${index}`);
          expect(entry.size).toBe(`value-${index}`.length);
        }
      });

      it("prefix /a/ yields /a/b and /a/c only", async () => {
        await ctx.datastore.put("/a/b", text("hello"));
        await ctx.datastore.put("/a/c", text("world"));
        await ctx.datastore.put("/ab", text("decoy"));
        await ctx.datastore.put("/b/a", text("other"));

        const entries = await (await ctx.datastore.query({ prefix: "/a/" })).rest();

        expect(
          entries.sort(byKey).map((e) => [e.key, decode(e.value)]),
        ).toEqual([
          ["/a/b", "hello"],
          ["/a/c", "world"],
        ]);
      });

      it("prefix without trailing slash matches the same subtree", async () => {
        await ctx.datastore.put("/a/b", text("hello"));
        await ctx.datastore.put("/ab", text("decoy"));

        const entries = await (
          await ctx.datastore.query({ prefix: "/a", keysOnly: true })
        ).rest();

        expect(entries.map((e) => e.key)).toEqual(["/a/b"]);
      });

      it("applies orders, offset and limit", async () => {
        for (const key of ["/o/3", "/o/1", "/o/4", "/o/2", "/o/5"]) {
          await ctx.datastore.put(key, text(key));
        }

        const asc = await (
          await ctx.datastore.query({ orders: [orderByKey], offset: 1, limit: 2 })
        ).rest();
        expect(asc.map((e) => e.key)).toEqual(["/o/2", "/o/3"]);

        const desc = await (
          await ctx.datastore.query({ orders: [orderByKeyDescending], limit: 2 })
        ).rest();
        expect(desc.map((e) => e.key)).toEqual(["/o/5", "/o/4"]);
      });

      it("applies filters", async () => {
        for (const key of ["/f/1", "/f/2", "/f/3"]) {
          await ctx.datastore.put(key, text(key));
        }

        const entries = await (
          await ctx.datastore.query({
            filters: [filterKeyCompare(">", "/f/1")],
            orders: [orderByKey],
          })
        ).rest();

        expect(entries.map((e) => e.key)).toEqual(["/f/2", "/f/3"]);
      });

      it("can be closed before it is drained", async () => {
        for (let i = 0; i < 5; i++) {
          await ctx.datastore.put(`/c/${i}`, text("v"));
        }

        const results = await ctx.datastore.query({});
        const first = await results.next();
        await results.close();

        expect(first?.error).toBeUndefined();
        expect(await results.next()).toBeUndefined();
      });
    });

    describe("batch", () => {
      it("applies queued operations in order on commit", async () => {
        await ctx.datastore.put("/existing", text("old"));

        const batch = await ctx.datastore.batch();
        await batch.put("/b/1", text("one"));
        await batch.delete("/b/1");
        await batch.put("/b/2", text("two"));
        await batch.delete("/existing");

        // Nothing written before commit
        expect(await ctx.datastore.has("/b/2")).toBe(false);
        expect(await ctx.datastore.has("/existing")).toBe(true);

        await batch.commit();

        expect(await ctx.datastore.has("/b/1")).toBe(false);
        expect(decode(await ctx.datastore.get("/b/2"))).toBe("two");
        expect(await ctx.datastore.has("/existing")).toBe(false);
      });
    });

    describe("lifecycle", () => {
      it("sync and close resolve", async () => {
        await expect(ctx.datastore.sync("/")).resolves.toBeUndefined();
        await expect(ctx.datastore.close()).resolves.toBeUndefined();
      });
    });
  });
}
