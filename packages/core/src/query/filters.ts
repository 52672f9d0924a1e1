import type { Entry } from "./types.js";
import { compareBytes, compareStrings } from "./bytes.js";

export type CompareOp = "=" | "!=" | "<" | "<=" | ">" | ">=";

export interface Filter {
  /** Human-readable form, e.g. `KEY > "/a"`. */
  readonly description: string;
  matches(entry: Entry): boolean;
}

function applyOp(op: CompareOp, cmp: number): boolean {
  switch (op) {
    case "=":
      return cmp === 0;
    case "!=":
      return cmp !== 0;
    case "<":
      return cmp < 0;
    case "<=":
      return cmp <= 0;
    case ">":
      return cmp > 0;
    case ">=":
      return cmp >= 0;
  }
}

export function filterKeyPrefix(prefix: string): Filter {
  return {
    description: `PREFIX(${JSON.stringify(prefix)})`,
    matches: (entry) => entry.key.startsWith(prefix),
  };
}

export function filterKeyCompare(op: CompareOp, key: string): Filter {
  return {
    description: `KEY ${op} ${JSON.stringify(key)}`,
    matches: (entry) => applyOp(op, compareStrings(entry.key, key)),
  };
}

/** Entries without a value (keys-only listings) never match. */
export function filterValueCompare(op: CompareOp, value: Uint8Array): Filter {
  return {
    description: `VALUE ${op} [${value.length} bytes]`,
    matches: (entry) =>
      entry.value !== undefined &&
      applyOp(op, compareBytes(entry.value, value)),
  };
}
