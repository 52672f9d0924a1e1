export type { Entry, Query, QueryResult } from "./types.js";
export {
  filterKeyPrefix,
  filterKeyCompare,
  filterValueCompare,
  type CompareOp,
  type Filter,
} from "./filters.js";
export {
  orderByKey,
  orderByKeyDescending,
  orderByValue,
  orderByValueDescending,
  orderByFunction,
  sortEntries,
  type Order,
} from "./orders.js";
export { QueryResults, resultsFromEntries } from "./results.js";
export { naiveQueryApply, normalizePrefix } from "./naive.js";
export { compareBytes } from "./bytes.js";
