/**
 * Core types for trimseq
 */

import type { KeyRange } from "./range.js";

/**
 * Any value a collection can hold. `undefined` is reserved as the absence
 * signal returned for out-of-window reads and empty pops.
 */
export type Storable = {} | null;

/**
 * Capability contract shared by every append-only, index-stable list
 *
 * Benchmarks and tests are written against this interface only.
 */
export interface TrimmableList<T extends Storable> {
  /**
   * Append a value and return its global index
   */
  append(value: T): number;

  /**
   * Drop every element whose global index is below `index`
   *
   * @returns The removed values in ascending index order
   */
  trimBefore(index: number): T[];

  /**
   * Currently addressable indices `[start, stop)`
   */
  indexRange(): KeyRange;

  /**
   * Value at a global index, or undefined outside the window
   */
  at(index: number): T | undefined;

  /**
   * Number of addressable elements (stop - start)
   */
  readonly length: number;
}

/**
 * Read access a view needs from its source
 */
export interface IndexedSource<T> {
  at(index: number): T | undefined;
  indexRange(): KeyRange;
}

/**
 * Constructor of a TrimmableList, used to run the same suite over each implementation
 */
export type TrimmableListFactory<T extends Storable> = () => TrimmableList<T>;
