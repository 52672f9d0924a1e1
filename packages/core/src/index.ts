export type { Datastore, Key, OperationOptions } from "./datastore/interface.js";
export { createMapDatastore } from "./datastore/map.js";
export type { Batch } from "./batch/interface.js";
export { createBasicBatch } from "./batch/basic.js";
export * from "./query/index.js";
export * from "./errors/index.js";
