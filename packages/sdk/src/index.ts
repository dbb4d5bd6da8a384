/**
 * Record Index SDK
 *
 * A binary search tree index mapping CPFs to positions in an external record list
 */

// Re-export types
export type {
  PersonRecord,
  RecordInput,
  RecordSequence,
  TraversalOrder,
  LookupResult,
  IndexStats,
} from "./types.js";
export { TRAVERSAL_ORDERS } from "./types.js";

// Re-export records and the in-memory record list
export {
  createRecord,
  compareKeys,
  compareRecords,
  recordsEqual,
  cloneRecord,
  formatRecord,
} from "./record.js";
export { RecordList } from "./record-list.js";

// Re-export the index
export { RecordIndex } from "./tree/bst.js";
export { IndexNode } from "./tree/node.js";
export { preOrder, inOrder, postOrder, breadthFirst, traverseNodes } from "./tree/traversal.js";

// Re-export query helpers
export { lookupByKey, materializeSorted } from "./query.js";

// Re-export validation
export {
  RecordInputSchema,
  RecordInputListSchema,
  parseRecord,
  parseRecords,
} from "./validation.js";

// Re-export errors
export type { RecordIssue } from "./errors.js";
export { RecordIndexError, RecordPositionError, InvalidRecordError } from "./errors.js";

// Re-export observability
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { IndexMetrics, IndexCounter } from "./observability/metrics.js";
