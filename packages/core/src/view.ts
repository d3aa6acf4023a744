/**
 * Non-owning, index-mapped view over a windowed list
 */

import { KeyRange } from "./range.js";
import type { IndexedSource } from "./types.js";

/**
 * Read-only window onto a source list through an index mapping
 *
 * Position `i` of the view reads `source.at(mapping[i])`. Nothing is copied,
 * so the view observes later trims of its source: positions whose index has
 * been trimmed read as undefined.
 */
export class ListView<T> implements Iterable<T | undefined> {
  readonly #source: IndexedSource<T>;
  readonly #mapping: KeyRange | readonly number[];

  constructor(source: IndexedSource<T>, mapping: KeyRange | readonly number[]) {
    this.#source = source;
    this.#mapping = mapping;
  }

  /**
   * Number of mapped positions
   */
  get length(): number {
    return this.#mapping.length;
  }

  /**
   * Global index behind a view position, or undefined past either end
   */
  indexAt(position: number): number | undefined {
    if (this.#mapping instanceof KeyRange) {
      return this.#mapping.at(position);
    }
    if (!Number.isInteger(position) || position < 0) {
      return undefined;
    }
    return this.#mapping[position];
  }

  /**
   * Value at a view position
   */
  at(position: number): T | undefined {
    const index = this.indexAt(position);
    return index === undefined ? undefined : this.#source.at(index);
  }

  /**
   * Global indices in view order
   */
  indices(): number[] {
    return [...this.#mapping];
  }

  toArray(): Array<T | undefined> {
    return [...this];
  }

  *[Symbol.iterator](): Iterator<T | undefined> {
    for (const index of this.#mapping) {
      yield this.#source.at(index);
    }
  }
}
