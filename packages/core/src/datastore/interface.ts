import type { Batch } from "../batch/interface.js";
import type { Query } from "../query/types.js";
import type { QueryResults } from "../query/results.js";

/**
 * Keys are path-like strings ("/a/b") used verbatim by every backend.
 * No normalisation happens: "/a/./b", "/a/../b", keys differing only in
 * case, or keys with NUL bytes are stored as given.
 */
export type Key = string;

export interface OperationOptions {
  /** Aborts the backend call(s) issued on behalf of the operation. */
  signal?: AbortSignal;
}

/**
 * Generic key/value datastore.
 * Absence is a normal state: `has` answers false and `delete` succeeds,
 * while `get` and `getSize` reject with NotFoundError.
 */
export interface Datastore {
  /** Store value under key, replacing any previous value. */
  put(key: Key, value: Uint8Array, options?: OperationOptions): Promise<void>;

  /**
   * Read the full value for key.
   * @throws NotFoundError if key is absent
   */
  get(key: Key, options?: OperationOptions): Promise<Uint8Array>;

  has(key: Key, options?: OperationOptions): Promise<boolean>;

  /**
   * Size in bytes of the stored value, without reading it.
   * @throws NotFoundError if key is absent
   */
  getSize(key: Key, options?: OperationOptions): Promise<number>;

  /** Remove key. Removing an absent key succeeds. */
  delete(key: Key, options?: OperationOptions): Promise<void>;

  /** Lazy, possibly unordered sequence of matching entries. */
  query(query: Query, options?: OperationOptions): Promise<QueryResults>;

  /** Flush pending writes under prefix. */
  sync(prefix: Key): Promise<void>;

  batch(): Promise<Batch>;

  close(): Promise<void>;

  /**
   * Bytes used by the datastore.
   * @throws UnsupportedError where the backend cannot report it
   */
  diskUsage(): Promise<number>;
}
