import type { Entry } from "./types.js";
import { compareBytes, compareStrings } from "./bytes.js";

export interface Order {
  readonly description: string;
  compare(a: Entry, b: Entry): number;
}

const EMPTY = new Uint8Array(0);

export const orderByKey: Order = {
  description: "KEY",
  compare: (a, b) => compareStrings(a.key, b.key),
};

export const orderByKeyDescending: Order = {
  description: "desc(KEY)",
  compare: (a, b) => compareStrings(b.key, a.key),
};

export const orderByValue: Order = {
  description: "VALUE",
  compare: (a, b) => compareBytes(a.value ?? EMPTY, b.value ?? EMPTY),
};

export const orderByValueDescending: Order = {
  description: "desc(VALUE)",
  compare: (a, b) => compareBytes(b.value ?? EMPTY, a.value ?? EMPTY),
};

export function orderByFunction(
  compare: (a: Entry, b: Entry) => number,
): Order {
  return { description: "FN", compare };
}

/**
 * Sorts entries in place by the given orders. Entries equal under every
 * order fall back to key order so the result is deterministic.
 */
export function sortEntries(entries: Entry[], orders: readonly Order[]): Entry[] {
  return entries.sort((a, b) => {
    for (const order of orders) {
      const cmp = order.compare(a, b);
      if (cmp !== 0) return cmp;
    }
    return compareStrings(a.key, b.key);
  });
}
