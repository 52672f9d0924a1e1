import type { Filter } from "./filters.js";
import type { Order } from "./orders.js";

/**
 * A single listed key. `value` is omitted for keys-only queries and
 * `size` is -1 when the backend did not report a length.
 */
export interface Entry {
  readonly key: string;
  readonly value?: Uint8Array;
  readonly size: number;
}

/**
 * One item of a query sequence. A failed value fetch keeps the entry's key
 * and size next to the error; a failed listing carries only the error.
 */
export type QueryResult =
  | { readonly entry: Entry; readonly error?: undefined }
  | { readonly entry?: Entry; readonly error: Error };

export interface Query {
  /** Key prefix; "" or "/" match everything. */
  prefix?: string;
  filters?: readonly Filter[];
  /** Applied in order; later orders break ties of earlier ones. */
  orders?: readonly Order[];
  offset?: number;
  /** 0 or undefined means unlimited. */
  limit?: number;
  keysOnly?: boolean;
  /** Hint that callers want `size`; backends that always know it ignore it. */
  returnsSizes?: boolean;
}
