/**
 * Three-level chunked array with pooled chunk recycling
 */

import { CHUNK_SIZE, CHUNKED_ARRAY_CAPACITY } from "./contracts/capacity.js";
import { Chunk } from "./chunk/chunk.js";
import { decompose } from "./chunk/index-math.js";
import { ChunkPool, type PoolStats } from "./chunk/pool.js";
import { CapacityExceededError, InvalidIndexError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { KeyRange } from "./range.js";
import { resolveSelector, resolveViewSelector, type Selector } from "./selector.js";
import type { Storable, TrimmableList } from "./types.js";
import { ListView } from "./view.js";

/** Indices covered by one level-2 chunk */
const BRANCH_SPAN = CHUNK_SIZE * CHUNK_SIZE;

/**
 * Pool statistics for both chunk levels
 */
export interface ChunkedArrayPoolStats {
  leaf: PoolStats;
  branch: PoolStats;
}

/**
 * Dense-keyed store mapping global indices to items through a fixed
 * three-level tree of 128-slot chunks
 *
 * Level-2 and leaf chunks are allocated on first write beneath them and
 * returned to the array's own pools when trimBefore() moves the window past
 * them. Capacity is fixed at 128^3 indices; writes beyond it throw
 * CapacityExceededError.
 */
export class ChunkedArray<T extends Storable> implements TrimmableList<T>, Iterable<T> {
  private readonly root = new Chunk<Chunk<Chunk<T>>>(CHUNK_SIZE);
  private readonly leafPool = new ChunkPool<T>("leaf");
  private readonly branchPool = new ChunkPool<Chunk<T>>("branch");
  private start = 0;
  private stop = 0;

  /**
   * Append an item at the end of the window
   *
   * @returns The index assigned to the item
   * @throws CapacityExceededError once 128^3 items have been appended
   */
  append(item: T): number {
    const index = this.stop;
    this.put(index, item);
    this.stop = index + 1;
    return index;
  }

  /**
   * Write an item at an index, allocating intermediate chunks as needed
   *
   * Writing at or beyond `stop` does not extend the window.
   *
   * @throws InvalidIndexError for negative, fractional or trimmed indices
   * @throws CapacityExceededError for indices at or beyond 128^3
   */
  put(index: number, item: T): void {
    if (!Number.isSafeInteger(index) || index < 0) {
      throw new InvalidIndexError(index, "must be a non-negative integer");
    }
    if (index >= CHUNKED_ARRAY_CAPACITY) {
      throw new CapacityExceededError(index, CHUNKED_ARRAY_CAPACITY);
    }
    if (index < this.start) {
      throw new InvalidIndexError(index, `below window start ${this.start}`);
    }

    const [, k1, k2, k3] = decompose(index);
    let branch = this.root.get(k1);
    if (branch === undefined) {
      branch = this.branchPool.acquire();
      this.root.set(k1, branch);
    }
    let leaf = branch.get(k2);
    if (leaf === undefined) {
      leaf = this.leafPool.acquire();
      branch.set(k2, leaf);
    }
    leaf.set(k3, item);
  }

  /**
   * Read an item; undefined outside the window or for a never-written slot
   */
  get(index: number): T | undefined {
    const leaf = this.leafFor(index);
    return leaf?.get(index % CHUNK_SIZE);
  }

  /**
   * Whether a slot inside the window has been written
   */
  has(index: number): boolean {
    const leaf = this.leafFor(index);
    return leaf !== undefined && leaf.has(index % CHUNK_SIZE);
  }

  at(index: number): T | undefined {
    return this.get(index);
  }

  /**
   * The window `[start, stop)`
   */
  keyRange(): KeyRange {
    return new KeyRange(this.start, this.stop);
  }

  indexRange(): KeyRange {
    return this.keyRange();
  }

  get length(): number {
    return this.stop - this.start;
  }

  /**
   * Pairs of `[index, value]` for the selected indices inside the window
   *
   * Step-1 ranges (and the default, the whole window) are clipped to the
   * window and yielded in ascending order. Index lists keep their own order
   * and skip out-of-window entries.
   *
   * @throws InvalidSelectorError if the selector cannot be interpreted
   */
  enumerate(selector?: Selector): Generator<[index: number, value: T | undefined]> {
    const resolved = resolveSelector(selector, this.keyRange());
    if (resolved.kind === "range") {
      return this.enumerateRange(resolved.range);
    }
    return this.enumerateIndices(resolved.indices);
  }

  /**
   * Non-owning view over the selected indices
   *
   * @throws InvalidSelectorError for stepped ranges or non-integer indices
   */
  view(selector?: Selector): ListView<T> {
    return new ListView(this, resolveViewSelector(selector, this.keyRange()));
  }

  /**
   * Advance the window start to `index` and reclaim chunks left fully below it
   *
   * @returns The removed items in index order; empty when `index <= start`
   */
  trimBefore(index: number): T[] {
    if (Number.isNaN(index)) {
      throw new InvalidIndexError(index, "must be a number");
    }
    const oldStart = this.start;
    const newStart = Math.min(Math.ceil(index), this.stop);
    if (newStart <= oldStart) {
      return [];
    }

    const removed: T[] = [];
    for (let i = oldStart; i < newStart; i++) {
      const [, k1, k2, k3] = decompose(i);
      const leaf = this.root.get(k1)?.get(k2);
      if (leaf === undefined) continue;
      const value = leaf.get(k3);
      if (value !== undefined) {
        removed.push(value);
      }
      leaf.clear(k3);
    }
    this.start = newStart;

    const releasedLeaves = this.releaseLeaves(oldStart, newStart);
    const releasedBranches = this.releaseBranches(oldStart, newStart);

    if (logger.isDebugEnabled()) {
      logger.debug("chunked.trim", {
        structure: "ChunkedArray",
        details: { start: newStart, removed: removed.length, releasedLeaves, releasedBranches },
      });
    }

    return removed;
  }

  /**
   * Chunks currently on the free lists
   */
  get poolSize(): number {
    return this.leafPool.size + this.branchPool.size;
  }

  poolStats(): ChunkedArrayPoolStats {
    return {
      leaf: this.leafPool.stats(),
      branch: this.branchPool.stats(),
    };
  }

  *[Symbol.iterator](): Iterator<T> {
    for (const [, value] of this.enumerate()) {
      if (value !== undefined) {
        yield value;
      }
    }
  }

  private leafFor(index: number): Chunk<T> | undefined {
    if (!Number.isInteger(index) || index < this.start || index >= this.stop) {
      return undefined;
    }
    const [, k1, k2] = decompose(index);
    return this.root.get(k1)?.get(k2);
  }

  private *enumerateRange(range: KeyRange): Generator<[index: number, value: T | undefined]> {
    for (let index = range.start; index < range.stop; index++) {
      yield [index, this.get(index)];
    }
  }

  private *enumerateIndices(
    indices: Iterable<number>
  ): Generator<[index: number, value: T | undefined]> {
    for (const index of indices) {
      if (this.start <= index && index < this.stop) {
        yield [index, this.get(index)];
      }
    }
  }

  /**
   * Release leaf chunks whose span ends at or before `newStart`
   */
  private releaseLeaves(oldStart: number, newStart: number): number {
    let released = 0;
    const firstBlock = Math.floor(oldStart / CHUNK_SIZE);
    const endBlock = Math.floor(newStart / CHUNK_SIZE);
    for (let block = firstBlock; block < endBlock; block++) {
      const [, k1, k2] = decompose(block * CHUNK_SIZE);
      const branch = this.root.get(k1);
      const leaf = branch?.get(k2);
      if (branch === undefined || leaf === undefined) continue;
      branch.clear(k2);
      this.leafPool.release(leaf);
      released++;
    }
    return released;
  }

  /**
   * Release level-2 chunks whose span ends at or before `newStart`
   */
  private releaseBranches(oldStart: number, newStart: number): number {
    let released = 0;
    const firstBlock = Math.floor(oldStart / BRANCH_SPAN);
    const endBlock = Math.floor(newStart / BRANCH_SPAN);
    for (let k1 = firstBlock; k1 < endBlock; k1++) {
      const branch = this.root.get(k1);
      if (branch === undefined) continue;
      for (let k2 = 0; k2 < CHUNK_SIZE; k2++) {
        const leaf = branch.get(k2);
        if (leaf !== undefined) {
          this.leafPool.release(leaf);
        }
      }
      this.root.clear(k1);
      this.branchPool.release(branch);
      released++;
    }
    return released;
  }
}
