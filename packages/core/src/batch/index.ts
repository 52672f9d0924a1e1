export type { Batch } from "./interface.js";
export { createBasicBatch } from "./basic.js";
