/**
 * Radix decomposition of global indices into chunk-tree paths
 */

import { CHUNK_BITS, CHUNK_MASK, CHUNK_SIZE, CHUNKED_ARRAY_CAPACITY } from "../contracts/capacity.js";

/**
 * Path through the chunk tree: `[remainder, k1, k2, k3]`
 *
 * `remainder` holds the bits above the third level and is 0 for every
 * index the array can store.
 */
export type IndexPath = readonly [remainder: number, k1: number, k2: number, k3: number];

/**
 * Split a non-negative safe integer into its 7-bit level fields
 *
 * The level fields come from shift/mask on the low bits, which ToInt32
 * preserves for any safe integer; the remainder is computed arithmetically
 * so large indices are not truncated.
 */
export function decompose(index: number): IndexPath {
  let low = index | 0;
  const k3 = low & CHUNK_MASK;
  low >>>= CHUNK_BITS;
  const k2 = low & CHUNK_MASK;
  low >>>= CHUNK_BITS;
  const k1 = low & CHUNK_MASK;
  const remainder = Math.floor(index / CHUNKED_ARRAY_CAPACITY);
  return [remainder, k1, k2, k3];
}

/**
 * Inverse of decompose()
 */
export function compose(path: IndexPath): number {
  const [remainder, k1, k2, k3] = path;
  return ((remainder * CHUNK_SIZE + k1) * CHUNK_SIZE + k2) * CHUNK_SIZE + k3;
}

