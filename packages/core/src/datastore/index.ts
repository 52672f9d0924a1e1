export type { Datastore, Key, OperationOptions } from "./interface.js";
export { createMapDatastore } from "./map.js";
