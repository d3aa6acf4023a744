/**
 * Chunk geometry contracts and invariants
 */

/**
 * Bits of the index consumed by each level of the chunk tree
 */
export const CHUNK_BITS = 7;

/**
 * Slots per chunk (2^CHUNK_BITS)
 */
export const CHUNK_SIZE = 1 << CHUNK_BITS;

/**
 * Mask selecting one level's field from an index
 */
export const CHUNK_MASK = CHUNK_SIZE - 1;

/**
 * Depth of the chunk tree
 */
export const CHUNK_LEVELS = 3;

/**
 * Total addressable indices of a ChunkedArray (128^3 = 2,097,152)
 */
export const CHUNKED_ARRAY_CAPACITY = CHUNK_SIZE ** CHUNK_LEVELS;

/**
 * Chunk tree invariants:
 *
 * 1. Addressing:
 *    - index = ((remainder * 128 + k1) * 128 + k2) * 128 + k3
 *    - k1 selects a slot of the root, k2 a slot of a level-2 chunk,
 *      k3 a slot of a level-3 (leaf) chunk
 *    - remainder must be 0; anything else is a CapacityExceededError
 *
 * 2. Allocation:
 *    - The root is allocated with the array
 *    - Level-2 and leaf chunks are taken from the pool on first write below them
 *    - A slot's written flag is separate from its value
 *
 * 3. Reclamation:
 *    - trimBefore() releases every leaf chunk whose span lies fully below start
 *    - A level-2 chunk is released once its whole span lies below start
 *    - Released chunks are cleared before they re-enter the free list
 */

/**
 * Performance contracts (SLOs), checked by benchmarks/window.bench.ts:
 * - 100k appends: <250ms
 * - 100k appends with a trim every 10 appends: <400ms
 * - 100k random in-window reads: <100ms
 */
export const WINDOW_SLO = {
  APPEND_100K_MS: 250,
  APPEND_TRIM_100K_MS: 400,
  RANDOM_READ_100K_MS: 100,
} as const;
