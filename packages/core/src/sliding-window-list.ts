/**
 * Deque-backed sliding window with stable global indices
 */

import { Deque } from "./deque.js";
import { InvalidIndexError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { KeyRange } from "./range.js";
import { resolveViewSelector, type Selector } from "./selector.js";
import type { Storable, TrimmableList } from "./types.js";
import { ListView } from "./view.js";

/**
 * Append-only list whose head can be popped or trimmed in bulk
 *
 * Global index = removedCount + offset into the deque, so indices survive
 * every trim and are never reused.
 */
export class SlidingWindowList<T extends Storable> implements TrimmableList<T>, Iterable<T> {
  private readonly data = new Deque<T>();
  private removedCount = 0;

  /**
   * @returns The global index assigned to the value
   */
  append(value: T): number {
    const index = this.removedCount + this.data.length;
    this.data.push(value);
    return index;
  }

  /**
   * Remove the front element; undefined when the window is empty
   */
  popLeft(): T | undefined {
    const value = this.data.shift();
    if (value === undefined) {
      return undefined;
    }
    this.removedCount++;
    return value;
  }

  /**
   * Remove every element whose global index is below `index`
   *
   * @returns The removed values in removal order; empty when `index <= start`
   */
  trimBefore(index: number): T[] {
    if (Number.isNaN(index)) {
      throw new InvalidIndexError(index, "must be a number");
    }
    const count = Math.min(Math.max(Math.ceil(index) - this.removedCount, 0), this.data.length);
    const removed: T[] = [];
    for (let i = 0; i < count; i++) {
      const value = this.data.shift();
      if (value !== undefined) {
        removed.push(value);
      }
    }
    this.removedCount += count;

    if (count > 0 && logger.isDebugEnabled()) {
      logger.debug("window.trim", {
        structure: "SlidingWindowList",
        details: { start: this.removedCount, removed: count },
      });
    }

    return removed;
  }

  /**
   * The window `[removedCount, removedCount + length)`
   */
  indexRange(): KeyRange {
    return new KeyRange(this.removedCount, this.removedCount + this.data.length);
  }

  /**
   * Value at a global index, undefined outside the window
   */
  at(index: number): T | undefined {
    return this.data.get(index - this.removedCount);
  }

  /**
   * Non-owning view over the selected indices
   *
   * @throws InvalidSelectorError for stepped ranges or non-integer indices
   */
  view(selector?: Selector): ListView<T> {
    return new ListView(this, resolveViewSelector(selector, this.indexRange()));
  }

  get length(): number {
    return this.data.length;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.data[Symbol.iterator]();
  }
}
