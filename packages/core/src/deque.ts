/**
 * Growable ring buffer with O(1) push, shift and indexed access
 */

import type { Storable } from "./types.js";

const MIN_CAPACITY = 16;

/**
 * Capacity stays a power of two so positions wrap with a mask. `undefined`
 * marks an empty cell, hence the Storable bound.
 */
export class Deque<T extends Storable> implements Iterable<T> {
  private buffer: Array<T | undefined>;
  private head = 0;
  private size = 0;

  constructor(initialCapacity = MIN_CAPACITY) {
    let capacity = MIN_CAPACITY;
    while (capacity < initialCapacity) capacity *= 2;
    this.buffer = new Array<T | undefined>(capacity).fill(undefined);
  }

  get length(): number {
    return this.size;
  }

  push(value: T): void {
    if (this.size === this.buffer.length) {
      this.grow();
    }
    this.buffer[(this.head + this.size) & (this.buffer.length - 1)] = value;
    this.size++;
  }

  /**
   * Remove and return the front element
   */
  shift(): T | undefined {
    if (this.size === 0) return undefined;
    const value = this.buffer[this.head];
    this.buffer[this.head] = undefined;
    this.head = (this.head + 1) & (this.buffer.length - 1);
    this.size--;
    return value;
  }

  /**
   * Element at `offset` from the front, undefined outside `[0, length)`
   */
  get(offset: number): T | undefined {
    if (!Number.isInteger(offset) || offset < 0 || offset >= this.size) {
      return undefined;
    }
    return this.buffer[(this.head + offset) & (this.buffer.length - 1)];
  }

  peekFront(): T | undefined {
    return this.get(0);
  }

  clear(): void {
    this.buffer.fill(undefined);
    this.head = 0;
    this.size = 0;
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.size; i++) {
      const value = this.buffer[(this.head + i) & (this.buffer.length - 1)];
      if (value !== undefined) {
        yield value;
      }
    }
  }

  /**
   * Double the capacity, unrolling the ring so head lands at 0
   */
  private grow(): void {
    const next = new Array<T | undefined>(this.buffer.length * 2).fill(undefined);
    for (let i = 0; i < this.size; i++) {
      next[i] = this.buffer[(this.head + i) & (this.buffer.length - 1)];
    }
    this.buffer = next;
    this.head = 0;
  }
}
