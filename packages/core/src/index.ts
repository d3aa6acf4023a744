/**
 * trimseq core
 *
 * Append-only, index-stable lists with bulk head trimming
 */

// Re-export types
export type { Storable, TrimmableList, IndexedSource, TrimmableListFactory } from "./types.js";
export type { SliceSelector, Selector, ResolvedSelector } from "./selector.js";
export type { PoolStats } from "./chunk/pool.js";
export type { ChunkedArrayPoolStats } from "./chunked-array.js";
export type { IndexPath } from "./chunk/index-math.js";

// Collections
export { ChunkedArray } from "./chunked-array.js";
export { SlidingWindowList } from "./sliding-window-list.js";
export { ListView } from "./view.js";
export { Deque } from "./deque.js";

// Building blocks
export { KeyRange, keyRange } from "./range.js";
export { resolveSelector, resolveViewSelector } from "./selector.js";
export { Chunk } from "./chunk/chunk.js";
export { ChunkPool } from "./chunk/pool.js";
export { decompose, compose } from "./chunk/index-math.js";
export {
  CHUNK_BITS,
  CHUNK_SIZE,
  CHUNK_MASK,
  CHUNK_LEVELS,
  CHUNKED_ARRAY_CAPACITY,
} from "./contracts/capacity.js";

// Observability
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { MetricsCollector } from "./observability/metrics.js";
export type { ReadMetrics } from "./observability/metrics.js";

// Re-export errors
export {
  TrimSeqError,
  CapacityExceededError,
  InvalidIndexError,
  InvalidSelectorError,
  InvalidChunkError,
} from "./errors.js";
