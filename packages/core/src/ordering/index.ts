export { allocateOrderIndex } from './allocator.js';
export { assertCapacity } from './capacity.js';
export {
  planInsertShift,
  planDeleteShift,
  planMove,
  shiftIndex,
  applyShift,
  sortByOrder,
  isDenseOrder,
  assertDenseOrder,
  resolvePermutation,
} from './reindex.js';
export type { IndexShift } from './reindex.js';
