import type { Datastore, OperationOptions } from "../datastore/interface.js";
import type { Batch } from "./interface.js";

type BatchOp =
  | { kind: "put"; key: string; value: Uint8Array }
  | { kind: "delete"; key: string };

/**
 * Sequential batch over any datastore. Values are copied when queued so
 * later mutation by the caller does not leak into the commit.
 */
export function createBasicBatch(
  datastore: Pick<Datastore, "put" | "delete">,
): Batch {
  let ops: BatchOp[] = [];

  return {
    async put(key, value) {
      ops.push({ kind: "put", key, value: new Uint8Array(value) });
    },

    async delete(key) {
      ops.push({ kind: "delete", key });
    },

    async commit(options?: OperationOptions) {
      const pending = ops;
      ops = [];
      for (const op of pending) {
        if (op.kind === "put") {
          await datastore.put(op.key, op.value, options);
        } else {
          await datastore.delete(op.key, options);
        }
      }
    },
  };
}
