import type { OperationOptions } from "../datastore/interface.js";

export interface Batch {
  /** Queue a put. Nothing is written until commit. */
  put(key: string, value: Uint8Array): Promise<void>;

  /** Queue a delete. */
  delete(key: string): Promise<void>;

  /**
   * Apply queued operations in call order, stopping at the first failure.
   * Already-applied operations are not rolled back.
   */
  commit(options?: OperationOptions): Promise<void>;
}
